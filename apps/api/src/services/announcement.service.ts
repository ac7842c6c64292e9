/**
 * Announcement Service — time-windowed announcements managed by teachers.
 *
 * Anyone may read the currently active set. Every other operation first
 * checks the acting teacher against the teacher directory, then validates
 * its input, then makes a single store call (toggle reads, then writes).
 *
 * Window bounds are ISO-8601 strings compared lexicographically against
 * `new Date().toISOString()`, so stored bounds are expected in UTC.
 */

import type { AnnouncementRow } from '@bulletin/db/schema';
import { AnnouncementIdSchema, isIsoTimestamp } from '@bulletin/shared';
import { logger } from '../lib/logger.js';
import { AppError, Errors } from '../lib/errors.js';
import { announcementStore, type AnnouncementStore } from './announcement.store.js';
import { teacherService, type TeacherDirectory } from './teacher.service.js';

export interface CreateAnnouncementInput {
  message: string;
  endDate: string;
  /** Omitted, null or empty: shown as soon as it is created */
  startDate?: string | null;
}

export interface UpdateAnnouncementInput extends CreateAnnouncementInput {
  /** Defaults to `true`, so an edit that omits it switches the announcement back on */
  active?: boolean;
}

export class AnnouncementService {
  constructor(
    private readonly store: AnnouncementStore,
    private readonly teachers: TeacherDirectory,
  ) {}

  /** Announcements to display right now. Never throws; store failures yield an empty list. */
  async listActive(): Promise<AnnouncementRow[]> {
    try {
      const now = new Date().toISOString();
      return await this.store.find({ activeAt: now });
    } catch (err) {
      logger.error({ err }, 'Error fetching active announcements');
      return [];
    }
  }

  /** Every announcement, newest first, for the management screen */
  async listAll(teacherUsername: string): Promise<AnnouncementRow[]> {
    return this.runOperation('Failed to fetch announcements', { teacherUsername }, async () => {
      await this.requireTeacher(teacherUsername);
      return this.store.find();
    });
  }

  async create(teacherUsername: string, input: CreateAnnouncementInput): Promise<AnnouncementRow> {
    return this.runOperation('Failed to create announcement', { teacherUsername }, async () => {
      await this.requireTeacher(teacherUsername);
      const startDate = this.validateWindow(input);

      const row = await this.store.insert({
        message: input.message.trim(),
        startDate,
        endDate: input.endDate,
        createdBy: teacherUsername,
        createdAt: new Date(),
        active: true,
      });

      logger.info({ announcementId: row.id, teacherUsername }, 'Announcement created');
      return row;
    });
  }

  /** Replace message, window and flag. `createdBy`/`createdAt` are never touched. */
  async update(teacherUsername: string, announcementId: string, input: UpdateAnnouncementInput): Promise<void> {
    return this.runOperation('Failed to update announcement', { teacherUsername, announcementId }, async () => {
      await this.requireTeacher(teacherUsername);
      this.requireValidId(announcementId);
      const startDate = this.validateWindow(input);

      const matched = await this.store.update(announcementId, {
        message: input.message.trim(),
        startDate,
        endDate: input.endDate,
        active: input.active ?? true,
      });
      if (!matched) throw Errors.announcementNotFound();

      logger.info({ announcementId, teacherUsername }, 'Announcement updated');
    });
  }

  async delete(teacherUsername: string, announcementId: string): Promise<void> {
    return this.runOperation('Failed to delete announcement', { teacherUsername, announcementId }, async () => {
      await this.requireTeacher(teacherUsername);
      this.requireValidId(announcementId);

      const removed = await this.store.delete(announcementId);
      if (!removed) throw Errors.announcementNotFound();

      logger.info({ announcementId, teacherUsername }, 'Announcement deleted');
    });
  }

  /** Flip the manual switch. A row with no flag counts as on, so the first toggle turns it off. */
  async toggleActive(teacherUsername: string, announcementId: string): Promise<{ active: boolean }> {
    return this.runOperation('Failed to toggle announcement status', { teacherUsername, announcementId }, async () => {
      await this.requireTeacher(teacherUsername);
      this.requireValidId(announcementId);

      const current = await this.store.findById(announcementId);
      if (!current) throw Errors.announcementNotFound();

      const active = !(current.active ?? true);
      const matched = await this.store.update(announcementId, { active });
      // Deleted between the read and the write
      if (!matched) throw Errors.announcementNotFound();

      logger.info({ announcementId, teacherUsername, active }, active ? 'Announcement activated' : 'Announcement deactivated');
      return { active };
    });
  }

  private async requireTeacher(teacherUsername: string) {
    const exists = await this.teachers.exists(teacherUsername);
    if (!exists) throw Errors.unauthorized();
  }

  private requireValidId(announcementId: string) {
    if (!AnnouncementIdSchema.safeParse(announcementId).success) {
      throw Errors.invalidAnnouncementId();
    }
  }

  /** Check both bounds parse; returns the start bound to store (null when absent). */
  private validateWindow(input: CreateAnnouncementInput): string | null {
    const startDate = input.startDate || null;
    if (!isIsoTimestamp(input.endDate) || (startDate !== null && !isIsoTimestamp(startDate))) {
      throw Errors.invalidDate();
    }
    return startDate;
  }

  /** Client-facing AppErrors pass through; anything else is logged and reported as `failure`. */
  private async runOperation<T>(
    failure: string,
    context: Record<string, unknown>,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof AppError) throw err;
      logger.error({ err, ...context }, failure);
      throw Errors.internal(failure);
    }
  }
}

export const announcementService = new AnnouncementService(announcementStore, teacherService);
