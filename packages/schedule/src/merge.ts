import type { Shift } from "./rotation";

/**
 * Coalesce back-to-back shifts held by the same assignee. Order is preserved
 * and the input is left untouched.
 */
export function mergeConsecutiveShifts(shifts: readonly Shift[]): Shift[] {
	const merged: Shift[] = [];

	for (const shift of shifts) {
		const previous = merged.at(-1);
		if (previous && previous.assigneeId === shift.assigneeId && previous.endAt.getTime() === shift.startAt.getTime()) {
			previous.endAt = shift.endAt;
			continue;
		}
		merged.push({ ...shift });
	}

	return merged;
}
