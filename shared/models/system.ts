import { index, integer, jsonb, pgTable, serial, timestamp, varchar } from "drizzle-orm/pg-core";
import { users } from "./users";

// Admin logs - one row per booking transition and other moderation actions
export const adminLogs = pgTable("admin_logs", {
  id: serial("id").primaryKey(),
  actorId: integer("actor_id").references(() => users.id, { onDelete: "set null" }),
  action: varchar("action", { length: 100 }).notNull(),
  targetTable: varchar("target_table", { length: 100 }),
  targetId: integer("target_id"),
  details: jsonb("details"),
  createdAt: timestamp("created_at", { withTimezone: true, precision: 3 }).defaultNow().notNull(),
}, (table) => [
  index("admin_logs_actor_idx").on(table.actorId),
  index("admin_logs_target_idx").on(table.targetTable, table.targetId),
  index("admin_logs_created_at_idx").on(table.createdAt),
]);

export type AdminLog = typeof adminLogs.$inferSelect;
export type InsertAdminLog = typeof adminLogs.$inferInsert;
