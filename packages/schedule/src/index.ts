export { createValidationError, extractUserFacingMessage, isScheduleError, ScheduleError, type ScheduleErrorCode } from "./errors";
export { collectHandoverEvents, collectOverrideEvents, compareEvents, type ScheduleEvent, type TransitionReason } from "./events";
export { mergeConsecutiveShifts } from "./merge";
export { getEffectiveAssignee, renderShifts, seedOverrideStack } from "./render";
export { getBaseAssignee, getShiftIndex, getShiftStart, type Rotation, type RotationOverride, type Shift } from "./rotation";
export { daysToMs, formatTimestamp, isIsoInstant, MS_PER_DAY, parseTimestamp } from "./time";
export {
	overrideDefinitionListSchema,
	overrideDefinitionSchema,
	parseOverrideDefinitions,
	parseScheduleDefinition,
	renderSchedule,
	scheduleDefinitionSchema,
	toRenderedShift,
} from "./validation";
