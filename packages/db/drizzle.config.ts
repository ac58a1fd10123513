import type { Config } from "drizzle-kit";

export default {
	schema: "./src/schema/index.ts",
	out: "./migrations",
	dialect: "postgresql",
} satisfies Config;
