import { getShiftStart, type Rotation, type RotationOverride } from "./rotation";

export type TransitionReason = "override_end" | "override_start" | "shift_change";

export type ScheduleEvent =
	| { at: Date; reason: "override_end"; assigneeId: string }
	| { at: Date; reason: "override_start"; assigneeId: string }
	| { at: Date; reason: "shift_change" };

// An override ending at the same instant another one (or a shift) starts must close first.
const priority: Record<TransitionReason, number> = {
	override_end: 0,
	override_start: 1,
	shift_change: 2,
};

export function compareEvents(a: ScheduleEvent, b: ScheduleEvent): number {
	const timeDiff = a.at.getTime() - b.at.getTime();
	if (timeDiff !== 0) {
		return timeDiff;
	}
	return priority[a.reason] - priority[b.reason];
}

/**
 * Override boundaries inside `[from, until)`.
 *
 * Overrides already running at `from` get no start event (they seed the stack instead),
 * and overrides still running at `until` get no end event (the last shift truncates them).
 */
export function collectOverrideEvents(overrides: readonly RotationOverride[], from: Date, until: Date): ScheduleEvent[] {
	const events: ScheduleEvent[] = [];

	for (const override of overrides) {
		if (override.startAt >= override.endAt) {
			continue;
		}
		if (override.endAt <= from || override.startAt >= until) {
			continue;
		}

		if (override.startAt >= from) {
			events.push({ at: override.startAt, reason: "override_start", assigneeId: override.assigneeId });
		}
		if (override.endAt <= until) {
			events.push({ at: override.endAt, reason: "override_end", assigneeId: override.assigneeId });
		}
	}

	return events;
}

/**
 * Shift boundaries `b` with `from <= b < until`.
 */
export function collectHandoverEvents(rotation: Rotation, from: Date, until: Date): ScheduleEvent[] {
	if (rotation.assignees.length === 0) {
		return [];
	}

	const events: ScheduleEvent[] = [];
	let boundary = getShiftStart(rotation, from).getTime();
	while (boundary < until.getTime()) {
		if (boundary >= from.getTime()) {
			events.push({ at: new Date(boundary), reason: "shift_change" });
		}
		boundary += rotation.shiftLengthMs;
	}

	return events;
}
