export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: number = 400,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Pre-defined errors
export const Errors = {
  unauthorized: () =>
    new AppError('UNAUTHORIZED', 'Authentication required', 401),
  invalidDate: () =>
    new AppError('INVALID_INPUT', 'Invalid date format', 400),
  invalidAnnouncementId: () =>
    new AppError('INVALID_INPUT', 'Invalid announcement ID', 400),
  announcementNotFound: () =>
    new AppError('ANNOUNCEMENT_NOT_FOUND', 'Announcement not found', 404),
  internal: (message: string) =>
    new AppError('INTERNAL_ERROR', message, 500),
} as const;
