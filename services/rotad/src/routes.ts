import { createValidationError, formatTimestamp, getEffectiveAssignee, isScheduleError, parseTimestamp, renderShifts, toRenderedShift } from "@rota/schedule";
import { Hono } from "hono";
import type { RotationSource } from "./lib/rotations";

function requireTimestamp(value: string | undefined, name: string): Date {
	if (!value) {
		throw createValidationError(`Missing query parameter: ${name}`);
	}
	return parseTimestamp(value);
}

export function createApp(source: RotationSource) {
	const app = new Hono();

	app.get("/health", (c) => c.json({ ok: true }));

	app.get("/rotations/:id/schedule", async (c) => {
		const rotationId = c.req.param("id");
		const from = requireTimestamp(c.req.query("from"), "from");
		const until = requireTimestamp(c.req.query("until"), "until");
		if (from >= until) {
			throw createValidationError("'from' time must be before 'until' time");
		}

		const definition = await source.loadRotation(rotationId, { from, until });
		if (!definition) {
			return c.json({ error: "Rotation not found" }, 404);
		}

		const shifts = renderShifts(definition.rotation, definition.overrides, from, until).map(toRenderedShift);
		return c.json({
			rotationId: definition.rotationId,
			from: formatTimestamp(from),
			until: formatTimestamp(until),
			shifts,
		});
	});

	app.get("/rotations/:id/on-call", async (c) => {
		const rotationId = c.req.param("id");
		const rawAt = c.req.query("at");
		const at = rawAt ? parseTimestamp(rawAt) : new Date();

		const definition = await source.loadRotation(rotationId, { from: at, until: new Date(at.getTime() + 1) });
		if (!definition) {
			return c.json({ error: "Rotation not found" }, 404);
		}

		const assigneeId = definition.rotation.assignees.length > 0 ? getEffectiveAssignee(definition.rotation, definition.overrides, at) : null;
		return c.json({
			rotationId: definition.rotationId,
			at: formatTimestamp(at),
			assigneeId,
		});
	});

	app.onError((error, c) => {
		if (isScheduleError(error)) {
			return c.json({ error: error.message }, 400);
		}

		console.error("[rotad] request failed", {
			method: c.req.method,
			path: c.req.path,
			error,
		});
		return c.json({ error: "Internal server error" }, 500);
	});

	return app;
}
