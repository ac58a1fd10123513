/**
 * Error contract:
 * - Throw `ScheduleError` for failures caused by the caller's input. Its message is safe to print.
 * - Throw `Error` for internal failures that should not be exposed directly.
 */

export type ScheduleErrorCode = "INPUT_NOT_FOUND" | "MALFORMED_INPUT" | "VALIDATION_FAILED";

export class ScheduleError extends Error {
	public readonly showToUser = true;
	public readonly code: ScheduleErrorCode;

	constructor(message: string, options: { code: ScheduleErrorCode; cause?: unknown }) {
		super(message, { cause: options.cause });
		this.name = "ScheduleError";
		this.code = options.code;
	}
}

export function createValidationError(message: string): ScheduleError {
	return new ScheduleError(message, { code: "VALIDATION_FAILED" });
}

export function isScheduleError(error: unknown, code?: ScheduleErrorCode): error is ScheduleError {
	return error instanceof ScheduleError && (code === undefined || error.code === code);
}

export function extractUserFacingMessage(error: unknown): string | null {
	return error instanceof ScheduleError ? error.message : null;
}
