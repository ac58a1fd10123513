import { serve } from "@hono/node-server";
import { readConfig } from "./lib/config";
import { createDb } from "./lib/db";
import { createDbRotationSource } from "./lib/rotations";
import { createApp } from "./routes";

function main() {
	const config = readConfig();
	if (!config.databaseUrl) {
		throw new Error("DATABASE_URL is required");
	}

	const { db, pool } = createDb(config.databaseUrl);
	const app = createApp(createDbRotationSource(db));

	const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
		console.log(`[rotad] listening port=${info.port}`);
	});

	const shutdown = (signal: string) => {
		console.log(`[rotad] shutting down signal=${signal}`);
		server.close();
		pool.end().catch((error: unknown) => {
			console.error("[rotad] failed to close database pool", { error });
		});
	};

	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();
