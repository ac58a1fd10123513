const DEFAULT_PORT = 8787;

export type RotadConfig = {
	databaseUrl: string | undefined;
	port: number;
};

export function readConfig(env: NodeJS.ProcessEnv = process.env): RotadConfig {
	const rawPort = env.PORT?.trim();
	const port = rawPort ? Number(rawPort) : DEFAULT_PORT;
	if (!Number.isInteger(port) || port <= 0) {
		throw new Error(`Invalid PORT: ${rawPort}`);
	}

	return {
		databaseUrl: env.DATABASE_URL?.trim() || undefined,
		port,
	};
}
