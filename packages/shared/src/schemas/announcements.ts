import { z } from 'zod';
import 'zod-openapi/extend';
import { QueryBooleanSchema } from './common.js';

// ---- Identifiers ----
export const AnnouncementIdSchema = z
  .string()
  .uuid()
  .openapi({ description: 'Announcement identifier', example: '6f1c2b7e-3a40-4d52-9c1e-2b8f0a9d4e11' });

// ---- Request params ----
export const TeacherAuthQuerySchema = z.object({
  teacher_username: z.string().openapi({ description: 'Username of the acting teacher', example: 'mrodriguez' }),
});

export const AnnouncementPathSchema = z.object({
  id: z.string().openapi({ description: 'Announcement identifier' }),
});

export const CreateAnnouncementQuerySchema = TeacherAuthQuerySchema.extend({
  message: z.string().openapi({ description: 'Announcement text (surrounding whitespace is trimmed)' }),
  end_date: z.string().openapi({ description: 'End of the display window (ISO 8601)', example: '2099-01-01T00:00:00' }),
  start_date: z.string().optional().openapi({ description: 'Start of the display window (ISO 8601); omit to show immediately' }),
});

export const UpdateAnnouncementQuerySchema = CreateAnnouncementQuerySchema.extend({
  active: QueryBooleanSchema.optional().openapi({ description: 'Manual on/off switch; defaults to true when omitted' }),
});

// ---- Responses ----
export const AnnouncementResponseSchema = z
  .object({
    _id: z.string().openapi({ description: 'Announcement identifier' }),
    message: z.string(),
    start_date: z.string().nullable().openapi({ description: 'Start of the display window, null if shown immediately' }),
    end_date: z.string().openapi({ description: 'End of the display window' }),
    active: z.boolean().nullable().openapi({ description: 'Manual on/off switch' }),
    created_by: z.string().openapi({ description: 'Username of the creating teacher' }),
    created_at: z.string().datetime().openapi({ description: 'Creation time (ISO 8601)' }),
  })
  .openapi({ ref: 'Announcement' });

export const AnnouncementListResponseSchema = z.array(AnnouncementResponseSchema);

export const CreateAnnouncementResponseSchema = z
  .object({
    message: z.string().openapi({ example: 'Announcement created successfully' }),
    announcement: AnnouncementResponseSchema,
  })
  .openapi({ ref: 'CreateAnnouncementResponse' });

export const ToggleAnnouncementResponseSchema = z
  .object({
    message: z.string().openapi({ example: 'Announcement deactivated successfully' }),
    active: z.boolean().openapi({ description: 'New value of the on/off switch' }),
  })
  .openapi({ ref: 'ToggleAnnouncementResponse' });

export type AnnouncementResponse = z.infer<typeof AnnouncementResponseSchema>;
