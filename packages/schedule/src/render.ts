import { createValidationError } from "./errors";
import { collectHandoverEvents, collectOverrideEvents, compareEvents } from "./events";
import { mergeConsecutiveShifts } from "./merge";
import { getBaseAssignee, type Rotation, type RotationOverride, type Shift } from "./rotation";

/**
 * Render the on-call timeline for `[from, until)`.
 *
 * Algorithm:
 * 1. Collect override and handover boundaries inside the window and sort them.
 * 2. Seed the override stack with overrides already running at `from`, oldest first.
 * 3. Sweep the boundaries, emitting a shift for each gap between them.
 *    The top of the stack is on call; an empty stack falls back to the rotation.
 * 4. Merge consecutive shifts held by the same assignee.
 *
 * Overrides are expected to nest. When one ends while a later one is still on top of
 * the stack its end is ignored, so the later override keeps the stack position.
 */
export function renderShifts(rotation: Rotation, overrides: readonly RotationOverride[], from: Date, until: Date): Shift[] {
	if (from >= until) {
		return [];
	}

	if (rotation.assignees.length === 0) {
		throw createValidationError("Schedule must contain at least one user");
	}

	const events = [...collectOverrideEvents(overrides, from, until), ...collectHandoverEvents(rotation, from, until)];
	events.sort(compareEvents);

	const stack = seedOverrideStack(overrides, from);
	const assigneeAt = (at: Date) => stack.at(-1) ?? getBaseAssignee(rotation, at);

	const shifts: Shift[] = [];
	let cursor = from;
	let current = assigneeAt(cursor);

	for (const event of events) {
		if (cursor < event.at) {
			shifts.push({ assigneeId: current, startAt: cursor, endAt: event.at });
		}

		switch (event.reason) {
			case "override_start":
				stack.push(event.assigneeId);
				break;
			case "override_end":
				if (stack.at(-1) === event.assigneeId) {
					stack.pop();
				}
				break;
			case "shift_change":
				// Only forces a boundary; the base assignee is re-resolved below.
				break;
		}

		cursor = event.at;
		current = assigneeAt(cursor);
	}

	if (cursor < until) {
		shifts.push({ assigneeId: current, startAt: cursor, endAt: until });
	}

	return mergeConsecutiveShifts(shifts);
}

/**
 * Assignees of overrides running at `from` (started strictly before it), oldest at the bottom.
 */
export function seedOverrideStack(overrides: readonly RotationOverride[], from: Date): string[] {
	return overrides
		.filter((override) => override.startAt < from && override.endAt > from)
		.sort((a, b) => a.startAt.getTime() - b.startAt.getTime())
		.map((override) => override.assigneeId);
}

/**
 * Assignee on call at a single instant, overrides included.
 */
export function getEffectiveAssignee(rotation: Rotation, overrides: readonly RotationOverride[], at: Date): string {
	const [shift] = renderShifts(rotation, overrides, at, new Date(at.getTime() + 1));
	if (!shift) {
		throw new Error("Rendering a non-empty window produced no shift");
	}
	return shift.assigneeId;
}
