import * as schema from "@rota/db/schema";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

export function createDb(databaseUrl: string) {
	const pool = new Pool({
		connectionString: databaseUrl,
		max: 5,
		connectionTimeoutMillis: 10_000,
		allowExitOnIdle: true,
		query_timeout: 30_000,
		statement_timeout: 30_000,
	});

	return {
		pool,
		db: drizzle({ schema, client: pool }),
	};
}
