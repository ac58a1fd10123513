import type * as schema from "@rota/db/schema";
import { rotation, rotationMember, rotationOverride } from "@rota/db/schema";
import { daysToMs, type Rotation, type RotationOverride } from "@rota/schedule";
import { and, asc, eq, gt, lt } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";

export type RotationWindow = {
	from: Date;
	until: Date;
};

export type RotationDefinition = {
	rotationId: string;
	name: string;
	rotation: Rotation;
	overrides: RotationOverride[];
};

export interface RotationSource {
	/**
	 * Returns the rotation with every override that intersects the window or is running at its start,
	 * or `null` when the rotation does not exist.
	 */
	loadRotation(rotationId: string, window: RotationWindow): Promise<RotationDefinition | null>;
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Works with any drizzle Postgres driver: `node-postgres` in the server, an in-process database in tests.
 */
export function createDbRotationSource<TQueryResult extends PgQueryResultHKT>(db: PgDatabase<TQueryResult, typeof schema>): RotationSource {
	return {
		async loadRotation(rotationId, window) {
			if (!UUID.test(rotationId)) {
				return null;
			}

			const [row] = await db
				.select({
					id: rotation.id,
					name: rotation.name,
					anchorAt: rotation.anchorAt,
					shiftLength: rotation.shiftLength,
				})
				.from(rotation)
				.where(eq(rotation.id, rotationId))
				.limit(1);

			if (!row) {
				return null;
			}

			const members = await db
				.select({ assigneeId: rotationMember.assigneeId })
				.from(rotationMember)
				.where(eq(rotationMember.rotationId, rotationId))
				.orderBy(asc(rotationMember.position));

			const overrides = await db
				.select({
					assigneeId: rotationOverride.assigneeId,
					startAt: rotationOverride.startAt,
					endAt: rotationOverride.endAt,
				})
				.from(rotationOverride)
				.where(and(eq(rotationOverride.rotationId, rotationId), gt(rotationOverride.endAt, window.from), lt(rotationOverride.startAt, window.until)))
				.orderBy(asc(rotationOverride.startAt), asc(rotationOverride.createdAt));

			return {
				rotationId: row.id,
				name: row.name,
				rotation: {
					assignees: members.map((member) => member.assigneeId),
					anchorAt: row.anchorAt,
					shiftLengthMs: daysToMs(intervalToDays(row.shiftLength)),
				},
				overrides,
			};
		},
	};
}

/**
 * Converts a Postgres interval such as `7 days` or `2 weeks` to whole days.
 */
export function intervalToDays(interval: string): number {
	const match = interval.trim().match(/^(\d+)\s+(day|week)s?$/i);
	if (!match?.[1] || !match[2]) {
		throw new Error(`Invalid interval format: ${interval}`);
	}
	const value = Number.parseInt(match[1], 10);
	const days = match[2].toLowerCase() === "week" ? value * 7 : value;

	if (days <= 0) {
		throw new Error(`Shift length must be positive: ${interval}`);
	}
	return days;
}
