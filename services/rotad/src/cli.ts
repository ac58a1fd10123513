import { parseArgs } from "node:util";
import { createValidationError, extractUserFacingMessage, renderSchedule } from "@rota/schedule";
import { readJsonFile } from "./lib/files";

export type CliIO = {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
};

const REQUIRED_OPTIONS = ["schedule", "overrides", "from", "until"] as const;

type OptionName = (typeof REQUIRED_OPTIONS)[number];

function parseCliOptions(argv: string[]): Record<OptionName, string> {
	let values: Partial<Record<OptionName, string>>;
	try {
		({ values } = parseArgs({
			args: argv,
			options: {
				schedule: { type: "string" },
				overrides: { type: "string" },
				from: { type: "string" },
				until: { type: "string" },
			},
			strict: true,
			allowPositionals: false,
		}));
	} catch (error) {
		throw createValidationError(error instanceof Error ? error.message : String(error));
	}

	const { schedule, overrides, from, until } = values;
	if (!schedule || !overrides || !from || !until) {
		const missing = REQUIRED_OPTIONS.filter((name) => !values[name]);
		throw createValidationError(`Missing required option: ${missing.map((name) => `--${name}`).join(", ")}`);
	}
	return { schedule, overrides, from, until };
}

/**
 * Renders the schedule described by the files in `argv` and returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
	try {
		const options = parseCliOptions(argv);
		const schedule = await readJsonFile(options.schedule);
		const overrides = await readJsonFile(options.overrides);

		const shifts = renderSchedule(schedule, overrides, options.from, options.until);
		io.stdout(`${JSON.stringify(shifts, null, 2)}\n`);
		return 0;
	} catch (error) {
		const message = extractUserFacingMessage(error) ?? (error instanceof Error ? error.message : String(error));
		io.stderr(`Error: ${message.split("\n")[0]}\n`);
		return 1;
	}
}
