/**
 * Announcement Store — persistence for announcement rows.
 *
 * Every call is a single statement; correctness under concurrent requests
 * relies on Postgres row-level atomicity only.
 */

import { and, desc, eq, gte, isNull, lte, or } from 'drizzle-orm';
import { announcements, type AnnouncementRow, type NewAnnouncementRow } from '@bulletin/db/schema';
import type { Database } from '@bulletin/db';
import { getDb } from '../lib/db.js';

export interface AnnouncementFilter {
  /** Only rows whose display window contains this ISO-8601 instant and whose flag is on */
  activeAt?: string;
}

export type AnnouncementChanges = Partial<Pick<AnnouncementRow, 'message' | 'startDate' | 'endDate' | 'active'>>;

export interface AnnouncementStore {
  /** Rows matching `filter`, newest `createdAt` first */
  find(filter?: AnnouncementFilter): Promise<AnnouncementRow[]>;
  insert(values: NewAnnouncementRow): Promise<AnnouncementRow>;
  /** Returns false when no row has `id` */
  update(id: string, changes: AnnouncementChanges): Promise<boolean>;
  /** Returns false when no row has `id` */
  delete(id: string): Promise<boolean>;
  findById(id: string): Promise<AnnouncementRow | null>;
}

/** Select for `AnnouncementStore.find`, newest first; with `activeAt`, only rows on display at that instant */
export function selectAnnouncements(db: Database, filter: AnnouncementFilter = {}) {
  const where = filter.activeAt
    ? and(
        eq(announcements.active, true),
        or(
          isNull(announcements.startDate),
          lte(announcements.startDate, filter.activeAt),
        ),
        gte(announcements.endDate, filter.activeAt),
      )
    : undefined;

  return db
    .select()
    .from(announcements)
    .where(where)
    .orderBy(desc(announcements.createdAt));
}

class DrizzleAnnouncementStore implements AnnouncementStore {
  async find(filter: AnnouncementFilter = {}) {
    return selectAnnouncements(getDb(), filter);
  }

  async insert(values: NewAnnouncementRow) {
    const db = getDb();
    const [row] = await db.insert(announcements).values(values).returning();
    if (!row) throw new Error('Announcement insert returned no row');
    return row;
  }

  async update(id: string, changes: AnnouncementChanges) {
    const db = getDb();
    const rows = await db
      .update(announcements)
      .set(changes)
      .where(eq(announcements.id, id))
      .returning({ id: announcements.id });
    return rows.length > 0;
  }

  async delete(id: string) {
    const db = getDb();
    const rows = await db
      .delete(announcements)
      .where(eq(announcements.id, id))
      .returning({ id: announcements.id });
    return rows.length > 0;
  }

  async findById(id: string) {
    const db = getDb();
    const [row] = await db
      .select()
      .from(announcements)
      .where(eq(announcements.id, id))
      .limit(1);
    return row ?? null;
  }
}

export const announcementStore: AnnouncementStore = new DrizzleAnnouncementStore();
