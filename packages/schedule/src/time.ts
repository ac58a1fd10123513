import { isValid, parseISO } from "date-fns";
import { createValidationError } from "./errors";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Date-time with an explicit offset. Naive local times are rejected since they have no absolute instant.
const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T(?:[01]\d|2[0-3]):\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})$/;

function toInstant(value: string): Date | null {
	if (!ISO_INSTANT.test(value)) {
		return null;
	}
	const date = parseISO(value);
	return isValid(date) ? date : null;
}

export function isIsoInstant(value: string): boolean {
	return toInstant(value) !== null;
}

export function parseTimestamp(value: string): Date {
	const date = toInstant(value);
	if (!date) {
		throw createValidationError(`Invalid ISO-8601 timestamp: ${value}`);
	}
	return date;
}

/**
 * UTC with a `Z` suffix and second precision, e.g. `2025-11-07T17:00:00Z`.
 * Milliseconds are only written when non-zero.
 */
export function formatTimestamp(date: Date): string {
	return date.toISOString().replace(/\.000Z$/, "Z");
}

export function daysToMs(days: number): number {
	return days * MS_PER_DAY;
}
