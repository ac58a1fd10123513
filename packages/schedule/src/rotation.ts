export type Rotation = {
	assignees: readonly string[];
	anchorAt: Date;
	shiftLengthMs: number;
};

export type RotationOverride = {
	assigneeId: string;
	startAt: Date;
	endAt: Date;
};

export type Shift = {
	assigneeId: string;
	startAt: Date;
	endAt: Date;
};

/**
 * Index of the shift covering `at`, counted from the anchor.
 * Negative before the anchor; uses floor so partial periods round down.
 */
export function getShiftIndex(rotation: Rotation, at: Date): number {
	return Math.floor((at.getTime() - rotation.anchorAt.getTime()) / rotation.shiftLengthMs);
}

export function getShiftStart(rotation: Rotation, at: Date): Date {
	return new Date(rotation.anchorAt.getTime() + getShiftIndex(rotation, at) * rotation.shiftLengthMs);
}

/**
 * Assignee on base rotation duty at `at`, ignoring overrides.
 * Instants before the anchor project the rotation backwards.
 * Callers must reject empty rotations first.
 */
export function getBaseAssignee(rotation: Rotation, at: Date): string {
	const position = mod(getShiftIndex(rotation, at), rotation.assignees.length);
	const assignee = rotation.assignees[position];
	if (assignee === undefined) {
		throw new Error(`Rotation has no assignee at position ${position}`);
	}
	return assignee;
}

function mod(value: number, base: number): number {
	return ((value % base) + base) % base;
}
