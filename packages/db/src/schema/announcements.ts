import { pgTable, uuid, text, boolean, timestamp, index } from 'drizzle-orm/pg-core';

export const announcements = pgTable(
  'announcements',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    message: text('message').notNull(),
    // Window bounds are kept exactly as supplied (ISO-8601 text) and compared lexicographically
    startDate: text('start_date'),
    endDate: text('end_date').notNull(),
    // Nullable for rows written before the flag existed; null counts as active when toggling
    active: boolean('active').default(true),
    createdBy: text('created_by').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('announcements_window_idx').on(table.active, table.endDate),
    index('announcements_created_at_idx').on(table.createdAt),
  ],
);

export type AnnouncementRow = typeof announcements.$inferSelect;
export type NewAnnouncementRow = typeof announcements.$inferInsert;
