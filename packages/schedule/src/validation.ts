import type { OverrideDefinition, RenderedShift, ScheduleDefinition } from "@rota/common";
import { parseISO } from "date-fns";
import { z } from "zod";
import { createValidationError } from "./errors";
import { renderShifts } from "./render";
import type { Rotation, RotationOverride, Shift } from "./rotation";
import { daysToMs, formatTimestamp, isIsoInstant, parseTimestamp } from "./time";

const EMPTY_USERS_MESSAGE = "Schedule must contain at least one user";
const OVERRIDE_ORDER_MESSAGE = "Override must end after it starts";

const isoInstantSchema = z.string().refine(isIsoInstant, { message: "Expected an ISO-8601 timestamp with a UTC offset" });

export const scheduleDefinitionSchema = z.object({
	users: z.array(z.string().min(1)).min(1, EMPTY_USERS_MESSAGE),
	handover_start_at: isoInstantSchema,
	handover_interval_days: z.number().int().positive(),
}) satisfies z.ZodType<ScheduleDefinition>;

export const overrideDefinitionSchema = z
	.object({
		user: z.string().min(1),
		start_at: isoInstantSchema,
		end_at: isoInstantSchema,
	})
	.refine((override) => parseISO(override.start_at) < parseISO(override.end_at), {
		message: OVERRIDE_ORDER_MESSAGE,
		path: ["end_at"],
	}) satisfies z.ZodType<OverrideDefinition>;

export const overrideDefinitionListSchema = z.array(overrideDefinitionSchema, {
	invalid_type_error: "Overrides must be an array",
});

function describeIssue(issue: z.ZodIssue): string {
	const path = issue.path.join(".");
	const isMissing = issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined";

	if (path === "users" && (isMissing || issue.code === z.ZodIssueCode.too_small)) {
		return EMPTY_USERS_MESSAGE;
	}
	if (isMissing && path) {
		return `Missing required field in input: ${path}`;
	}
	if (issue.message === OVERRIDE_ORDER_MESSAGE || !path) {
		return issue.message;
	}
	return `${path}: ${issue.message}`;
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
	const result = schema.safeParse(input);
	if (!result.success) {
		const [issue] = result.error.issues;
		throw createValidationError(issue ? describeIssue(issue) : "Invalid input");
	}
	return result.data;
}

export function parseScheduleDefinition(input: unknown): Rotation {
	const definition = parseWith(scheduleDefinitionSchema, input);
	return {
		assignees: definition.users,
		anchorAt: parseTimestamp(definition.handover_start_at),
		shiftLengthMs: daysToMs(definition.handover_interval_days),
	};
}

export function parseOverrideDefinitions(input: unknown): RotationOverride[] {
	return parseWith(overrideDefinitionListSchema, input).map((override) => ({
		assigneeId: override.user,
		startAt: parseTimestamp(override.start_at),
		endAt: parseTimestamp(override.end_at),
	}));
}

export function toRenderedShift(shift: Shift): RenderedShift {
	return {
		user: shift.assigneeId,
		start_at: formatTimestamp(shift.startAt),
		end_at: formatTimestamp(shift.endAt),
	};
}

function toWindowBound(value: Date | string): Date {
	return typeof value === "string" ? parseTimestamp(value) : value;
}

/**
 * Validated entry point. Unlike `renderShifts`, an empty or inverted window is an error here.
 * Window bounds given as strings are parsed only after the schedule and overrides pass validation.
 */
export function renderSchedule(schedule: unknown, overrides: unknown, from: Date | string, until: Date | string): RenderedShift[] {
	const rotation = parseScheduleDefinition(schedule);
	const parsedOverrides = parseOverrideDefinitions(overrides);
	const windowFrom = toWindowBound(from);
	const windowUntil = toWindowBound(until);

	if (windowFrom >= windowUntil) {
		throw createValidationError("'from' time must be before 'until' time");
	}

	return renderShifts(rotation, parsedOverrides, windowFrom, windowUntil).map(toRenderedShift);
}
