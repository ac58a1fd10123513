import { PGlite } from "@electric-sql/pglite";
import * as schema from "@rota/db/schema";
import { MS_PER_DAY, renderShifts, toRenderedShift } from "@rota/schedule";
import { drizzle } from "drizzle-orm/pglite";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createDbRotationSource, type RotationSource } from "./rotations";

const PRIMARY_ID = "6f1c2b8e-3d4a-4f5b-9c6d-7e8f9a0b1c2d";
const SECONDARY_ID = "0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d";
const UNKNOWN_ID = "11111111-2222-4333-8444-555555555555";

const window = {
	from: new Date("2025-11-10T00:00:00Z"),
	until: new Date("2025-11-17T00:00:00Z"),
};

let client: PGlite;
let source: RotationSource;

beforeAll(async () => {
	client = new PGlite();
	await client.exec(`CREATE TABLE rotation (
		id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
		name text NOT NULL,
		anchor_at timestamptz NOT NULL,
		shift_length interval NOT NULL,
		created_at timestamptz NOT NULL DEFAULT now(),
		updated_at timestamptz NOT NULL DEFAULT now()
	);
	CREATE TABLE rotation_member (
		id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
		rotation_id uuid NOT NULL REFERENCES rotation(id) ON DELETE CASCADE,
		assignee_id text NOT NULL,
		position integer NOT NULL,
		created_at timestamptz NOT NULL DEFAULT now()
	);
	CREATE TABLE rotation_override (
		id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
		rotation_id uuid NOT NULL REFERENCES rotation(id) ON DELETE CASCADE,
		assignee_id text NOT NULL,
		start_at timestamptz NOT NULL,
		end_at timestamptz NOT NULL,
		created_at timestamptz NOT NULL DEFAULT now()
	);
	`);

	const db = drizzle({ client, schema });
	await db.insert(schema.rotation).values([
		{ id: PRIMARY_ID, name: "primary", anchorAt: new Date("2025-11-07T17:00:00Z"), shiftLength: "7 days" },
		{ id: SECONDARY_ID, name: "secondary", anchorAt: new Date("2025-11-03T09:00:00Z"), shiftLength: "2 weeks" },
	]);
	await db.insert(schema.rotationMember).values([
		{ rotationId: PRIMARY_ID, assigneeId: "charlie", position: 2 },
		{ rotationId: PRIMARY_ID, assigneeId: "alice", position: 0 },
		{ rotationId: PRIMARY_ID, assigneeId: "bob", position: 1 },
	]);
	await db.insert(schema.rotationOverride).values([
		{ rotationId: PRIMARY_ID, assigneeId: "dave", startAt: new Date("2025-11-12T00:00:00Z"), endAt: new Date("2025-11-12T06:00:00Z") },
		{ rotationId: PRIMARY_ID, assigneeId: "bob", startAt: new Date("2025-11-09T12:00:00Z"), endAt: new Date("2025-11-10T12:00:00Z") },
		{ rotationId: PRIMARY_ID, assigneeId: "erin", startAt: new Date("2025-11-08T00:00:00Z"), endAt: new Date("2025-11-10T00:00:00Z") },
		{ rotationId: PRIMARY_ID, assigneeId: "frank", startAt: new Date("2025-11-17T00:00:00Z"), endAt: new Date("2025-11-18T00:00:00Z") },
		{ rotationId: SECONDARY_ID, assigneeId: "gina", startAt: new Date("2025-11-11T00:00:00Z"), endAt: new Date("2025-11-11T08:00:00Z") },
	]);

	source = createDbRotationSource(db);
}, 30_000);

afterAll(async () => {
	await client.close();
});

describe("createDbRotationSource", () => {
	it("loads members by position and overrides that touch the window", async () => {
		expect(await source.loadRotation(PRIMARY_ID, window)).toEqual({
			rotationId: PRIMARY_ID,
			name: "primary",
			rotation: {
				assignees: ["alice", "bob", "charlie"],
				anchorAt: new Date("2025-11-07T17:00:00Z"),
				shiftLengthMs: 7 * MS_PER_DAY,
			},
			overrides: [
				{ assigneeId: "bob", startAt: new Date("2025-11-09T12:00:00Z"), endAt: new Date("2025-11-10T12:00:00Z") },
				{ assigneeId: "dave", startAt: new Date("2025-11-12T00:00:00Z"), endAt: new Date("2025-11-12T06:00:00Z") },
			],
		});
	});

	it("keeps the override running at the window start so it is on call first", async () => {
		const definition = await source.loadRotation(PRIMARY_ID, window);
		if (!definition) {
			throw new Error("Expected the primary rotation");
		}

		expect(renderShifts(definition.rotation, definition.overrides, window.from, window.until).map(toRenderedShift)).toEqual([
			{ user: "bob", start_at: "2025-11-10T00:00:00Z", end_at: "2025-11-10T12:00:00Z" },
			{ user: "alice", start_at: "2025-11-10T12:00:00Z", end_at: "2025-11-12T00:00:00Z" },
			{ user: "dave", start_at: "2025-11-12T00:00:00Z", end_at: "2025-11-12T06:00:00Z" },
			{ user: "alice", start_at: "2025-11-12T06:00:00Z", end_at: "2025-11-14T17:00:00Z" },
			{ user: "bob", start_at: "2025-11-14T17:00:00Z", end_at: "2025-11-17T00:00:00Z" },
		]);
	});

	it("reads week intervals and rotations without members", async () => {
		expect(await source.loadRotation(SECONDARY_ID, window)).toEqual({
			rotationId: SECONDARY_ID,
			name: "secondary",
			rotation: {
				assignees: [],
				anchorAt: new Date("2025-11-03T09:00:00Z"),
				shiftLengthMs: 14 * MS_PER_DAY,
			},
			overrides: [{ assigneeId: "gina", startAt: new Date("2025-11-11T00:00:00Z"), endAt: new Date("2025-11-11T08:00:00Z") }],
		});
	});

	it("returns null for unknown rotations", async () => {
		expect(await source.loadRotation(UNKNOWN_ID, window)).toBeNull();
		expect(await source.loadRotation("primary", window)).toBeNull();
	});
});
