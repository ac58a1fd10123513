import { index, integer, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";
import { rotation } from "./rotation";

export const rotationMember = pgTable(
	"rotation_member",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		rotationId: uuid("rotation_id")
			.notNull()
			.references(() => rotation.id, { onDelete: "cascade" }),
		assigneeId: text("assignee_id").notNull(),
		// 0-based; position 0 holds the shift that starts at rotation.anchor_at.
		position: integer("position").notNull(),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [uniqueIndex("rotation_member_rotation_assignee_idx").on(table.rotationId, table.assigneeId), index("rotation_member_rotation_idx").on(table.rotationId)],
);
