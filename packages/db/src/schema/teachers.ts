import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const teachers = pgTable('teachers', {
  username: text('username').primaryKey(),
  displayName: text('display_name'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
