import { readFile } from "node:fs/promises";
import { ScheduleError } from "@rota/schedule";

export async function readJsonFile(path: string): Promise<unknown> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			throw new ScheduleError(`Could not find file: ${path}`, { code: "INPUT_NOT_FOUND", cause: error });
		}
		throw error;
	}

	try {
		return JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ScheduleError(`Invalid JSON in input file ${path}: ${reason}`, { code: "MALFORMED_INPUT", cause: error });
	}
}
