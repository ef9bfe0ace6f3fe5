import { sql } from "drizzle-orm";
import { boolean, check, pgTable, serial, text, timestamp, varchar, index } from "drizzle-orm/pg-core";
import { z } from "zod";
import { USER_ROLES } from "../constants/statuses";

// Campus accounts. Credentials live with the auth layer, not here.
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 320 }).notNull().unique(),
  role: varchar("role", { length: 20 }).notNull().default("student"),
  department: text("department"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true, precision: 3 }).defaultNow().notNull(),
}, (table) => [
  index("users_email_idx").on(table.email),
  check("users_role_check", sql`${table.role} IN ('student', 'staff', 'admin')`),
]);

export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;

// The authenticated caller as the booking and messaging core sees it
export const principalSchema = z.object({
  id: z.number().int().positive(),
  role: z.enum(USER_ROLES),
});

export type Principal = z.infer<typeof principalSchema>;
