/**
 * Rotation as stored in a schedule file.
 */
export type ScheduleDefinition = {
	users: string[];
	handover_start_at: string;
	handover_interval_days: number;
};

export type OverrideDefinition = {
	user: string;
	start_at: string;
	end_at: string;
};

export type RenderedShift = {
	user: string;
	start_at: string;
	end_at: string;
};
