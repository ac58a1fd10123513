import { interval, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const rotation = pgTable("rotation", {
	id: uuid("id").primaryKey().defaultRandom(),
	name: text("name").notNull(),
	anchorAt: timestamp("anchor_at", { withTimezone: true }).notNull(),
	// Whole days or weeks only; anything finer is rejected when the rotation is loaded.
	shiftLength: interval("shift_length").notNull(),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	updatedAt: timestamp("updated_at", { withTimezone: true })
		.notNull()
		.defaultNow()
		.$onUpdate(() => new Date()),
});
