export {
  ErrorResponseSchema,
  MessageResponseSchema,
  QueryBooleanSchema,
} from './common.js';

export {
  AnnouncementIdSchema,
  TeacherAuthQuerySchema,
  AnnouncementPathSchema,
  CreateAnnouncementQuerySchema,
  UpdateAnnouncementQuerySchema,
  AnnouncementResponseSchema,
  AnnouncementListResponseSchema,
  CreateAnnouncementResponseSchema,
  ToggleAnnouncementResponseSchema,
} from './announcements.js';

export type { AnnouncementResponse } from './announcements.js';
