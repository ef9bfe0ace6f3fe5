import { sql } from "drizzle-orm";
import { boolean, check, index, integer, pgTable, serial, text, timestamp, varchar } from "drizzle-orm/pg-core";
import { users } from "./users";

// Resources table - bookable rooms, equipment and spaces owned by staff
export const resources = pgTable("resources", {
  id: serial("id").primaryKey(),
  ownerId: integer("owner_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  title: varchar("title", { length: 255 }).notNull(),
  description: text("description").notNull().default(""),
  category: varchar("category", { length: 100 }).notNull(),
  location: varchar("location", { length: 255 }).notNull(),
  capacity: integer("capacity").notNull().default(1),
  requiresApproval: boolean("requires_approval").notNull().default(false),
  status: varchar("status", { length: 20 }).notNull().default("draft"),
  createdAt: timestamp("created_at", { withTimezone: true, precision: 3 }).defaultNow().notNull(),
}, (table) => [
  index("resources_owner_idx").on(table.ownerId),
  index("resources_status_idx").on(table.status),
  check("resources_status_check", sql`${table.status} IN ('draft', 'published', 'archived')`),
  check("resources_capacity_check", sql`${table.capacity} >= 0`),
]);

// Bookings table - reservations moved through the approval state machine.
// The no-overlap exclusion constraint is created in server/migrations/0001_init.sql
// because drizzle has no EXCLUDE builder.
export const bookings = pgTable("bookings", {
  id: serial("id").primaryKey(),
  resourceId: integer("resource_id").notNull().references(() => resources.id, { onDelete: "cascade" }),
  requesterId: integer("requester_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  startAt: timestamp("start_at", { withTimezone: true, precision: 3 }).notNull(),
  endAt: timestamp("end_at", { withTimezone: true, precision: 3 }).notNull(),
  status: varchar("status", { length: 20 }).notNull().default("pending"),
  approvalNotes: text("approval_notes"),
  reviewedBy: integer("reviewed_by").references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at", { withTimezone: true, precision: 3 }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, precision: 3 }).notNull(),
}, (table) => [
  index("bookings_resource_window_idx").on(table.resourceId, table.startAt, table.endAt),
  index("bookings_requester_idx").on(table.requesterId),
  index("bookings_status_idx").on(table.status),
  check("bookings_window_check", sql`${table.endAt} > ${table.startAt}`),
  check("bookings_status_check", sql`${table.status} IN ('pending', 'approved', 'rejected', 'cancelled', 'completed')`),
]);

export type ResourceRow = typeof resources.$inferSelect;
export type InsertResource = typeof resources.$inferInsert;
export type BookingRow = typeof bookings.$inferSelect;
export type InsertBooking = typeof bookings.$inferInsert;
