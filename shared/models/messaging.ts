import { sql } from "drizzle-orm";
import { check, index, integer, pgTable, serial, text, timestamp, varchar } from "drizzle-orm/pg-core";
import { z } from "zod";
import { users } from "./users";

// Threads table - conversation containers keyed by what they are about
export const threads = pgTable("threads", {
  id: serial("id").primaryKey(),
  contextType: varchar("context_type", { length: 20 }).notNull(),
  contextId: integer("context_id"),
  createdBy: integer("created_by").notNull().references(() => users.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at", { withTimezone: true, precision: 3 }).notNull(),
}, (table) => [
  index("threads_context_idx").on(table.contextType, table.contextId),
  check("threads_context_type_check", sql`${table.contextType} IN ('resource', 'booking', 'general')`),
  check("threads_context_id_check", sql`(${table.contextType} = 'general') = (${table.contextId} IS NULL)`),
]);

// Messages table - append-only, ordered by (timestamp, id)
export const messages = pgTable("messages", {
  id: serial("id").primaryKey(),
  threadId: integer("thread_id").notNull().references(() => threads.id, { onDelete: "cascade" }),
  senderId: integer("sender_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  receiverId: integer("receiver_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  content: text("content").notNull(),
  timestamp: timestamp("timestamp", { withTimezone: true, precision: 3 }).notNull(),
}, (table) => [
  index("messages_thread_timestamp_idx").on(table.threadId, table.timestamp, table.id),
  index("messages_sender_receiver_idx").on(table.senderId, table.receiverId),
]);

export type ThreadRow = typeof threads.$inferSelect;
export type InsertThread = typeof threads.$inferInsert;
export type MessageRow = typeof messages.$inferSelect;
export type InsertMessage = typeof messages.$inferInsert;

// Wire shape of GET /api/threads/:id/messages?since=
export const polledMessageSchema = z.object({
  message_id: z.number().int(),
  sender_id: z.number().int(),
  receiver_id: z.number().int(),
  timestamp: z.string().datetime({ offset: true }),
  content: z.string(),
});

export type PolledMessage = z.infer<typeof polledMessageSchema>;
