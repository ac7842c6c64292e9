import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  TeacherAuthQuerySchema,
  AnnouncementPathSchema,
  CreateAnnouncementQuerySchema,
  UpdateAnnouncementQuerySchema,
} from '@bulletin/shared/schemas';
import { announcementService } from '../services/announcement.service.js';
import { formatAnnouncementResponse } from '../lib/format.js';
import type { AppEnv } from '../types.js';

export const announcementsRouter = new Hono<AppEnv>();

/** Hand rejected params to the error handler so they share the structured error body */
function rejectInvalid(result: { success: boolean; error?: unknown }) {
  if (!result.success) throw result.error;
}

// GET /api/v1/announcements/active — public, never fails
announcementsRouter.get('/active', async (c) => {
  const rows = await announcementService.listActive();
  return c.json(rows.map((row) => formatAnnouncementResponse(row)));
});

// GET /api/v1/announcements/all — every announcement (teacher only)
announcementsRouter.get(
  '/all',
  zValidator('query', TeacherAuthQuerySchema, rejectInvalid),
  async (c) => {
    const { teacher_username } = c.req.valid('query');
    const rows = await announcementService.listAll(teacher_username);
    return c.json(rows.map((row) => formatAnnouncementResponse(row)));
  },
);

// POST /api/v1/announcements/create
announcementsRouter.post(
  '/create',
  zValidator('query', CreateAnnouncementQuerySchema, rejectInvalid),
  async (c) => {
    const { teacher_username, message, end_date, start_date } = c.req.valid('query');

    const row = await announcementService.create(teacher_username, {
      message,
      endDate: end_date,
      startDate: start_date ?? null,
    });

    return c.json({
      message: 'Announcement created successfully',
      announcement: formatAnnouncementResponse(row),
    });
  },
);

// PUT /api/v1/announcements/update/:id
announcementsRouter.put(
  '/update/:id',
  zValidator('param', AnnouncementPathSchema, rejectInvalid),
  zValidator('query', UpdateAnnouncementQuerySchema, rejectInvalid),
  async (c) => {
    const { id } = c.req.valid('param');
    const { teacher_username, message, end_date, start_date, active } = c.req.valid('query');

    await announcementService.update(teacher_username, id, {
      message,
      endDate: end_date,
      startDate: start_date ?? null,
      active,
    });

    return c.json({ message: 'Announcement updated successfully' });
  },
);

// DELETE /api/v1/announcements/delete/:id
announcementsRouter.delete(
  '/delete/:id',
  zValidator('param', AnnouncementPathSchema, rejectInvalid),
  zValidator('query', TeacherAuthQuerySchema, rejectInvalid),
  async (c) => {
    const { id } = c.req.valid('param');
    const { teacher_username } = c.req.valid('query');

    await announcementService.delete(teacher_username, id);
    return c.json({ message: 'Announcement deleted successfully' });
  },
);

// PUT /api/v1/announcements/toggle/:id
announcementsRouter.put(
  '/toggle/:id',
  zValidator('param', AnnouncementPathSchema, rejectInvalid),
  zValidator('query', TeacherAuthQuerySchema, rejectInvalid),
  async (c) => {
    const { id } = c.req.valid('param');
    const { teacher_username } = c.req.valid('query');

    const { active } = await announcementService.toggleActive(teacher_username, id);
    return c.json({
      message: `Announcement ${active ? 'activated' : 'deactivated'} successfully`,
      active,
    });
  },
);
