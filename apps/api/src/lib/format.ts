import type { AnnouncementRow } from '@bulletin/db/schema';
import type { AnnouncementResponse } from '@bulletin/shared/schemas';

/** Format a DB announcement row into the API response shape */
export function formatAnnouncementResponse(row: AnnouncementRow): AnnouncementResponse {
  return {
    _id: String(row.id),
    message: row.message,
    start_date: row.startDate,
    end_date: row.endDate,
    active: row.active,
    created_by: row.createdBy,
    created_at: row.createdAt.toISOString(),
  };
}
