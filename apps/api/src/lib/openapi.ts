import { createDocument } from 'zod-openapi';
import 'zod-openapi/extend';
import {
  TeacherAuthQuerySchema,
  AnnouncementPathSchema,
  CreateAnnouncementQuerySchema,
  UpdateAnnouncementQuerySchema,
  AnnouncementListResponseSchema,
  CreateAnnouncementResponseSchema,
  ToggleAnnouncementResponseSchema,
  MessageResponseSchema,
  ErrorResponseSchema,
} from '@bulletin/shared/schemas';

const json = <T>(schema: T) => ({ content: { 'application/json': { schema } } });

const errors = {
  400: { description: 'Malformed id, date or missing parameter', ...json(ErrorResponseSchema) },
  401: { description: 'Unknown teacher', ...json(ErrorResponseSchema) },
  404: { description: 'Announcement not found', ...json(ErrorResponseSchema) },
  500: { description: 'Unexpected failure', ...json(ErrorResponseSchema) },
};

/** OpenAPI 3.1 description of the HTTP surface, built from the shared zod schemas */
export function buildOpenApiDocument() {
  return createDocument({
    openapi: '3.1.0',
    info: {
      title: 'Bulletin API',
      version: '1.0.0',
      description:
        'Time-windowed school announcements. Teachers manage them; anyone can read the ones currently on display.',
    },
    servers: [{ url: 'http://localhost:3001', description: 'Local development' }],
    paths: {
      '/api/v1/announcements/active': {
        get: {
          tags: ['Announcements'],
          summary: 'Announcements on display right now',
          operationId: 'getActiveAnnouncements',
          responses: {
            200: { description: 'Active announcements, newest first', ...json(AnnouncementListResponseSchema) },
          },
        },
      },
      '/api/v1/announcements/all': {
        get: {
          tags: ['Announcements'],
          summary: 'Every announcement (teacher only)',
          operationId: 'getAllAnnouncements',
          requestParams: { query: TeacherAuthQuerySchema },
          responses: {
            200: { description: 'All announcements, newest first', ...json(AnnouncementListResponseSchema) },
            401: errors[401],
            500: errors[500],
          },
        },
      },
      '/api/v1/announcements/create': {
        post: {
          tags: ['Announcements'],
          summary: 'Create an announcement',
          operationId: 'createAnnouncement',
          requestParams: { query: CreateAnnouncementQuerySchema },
          responses: {
            200: { description: 'Created announcement', ...json(CreateAnnouncementResponseSchema) },
            400: errors[400],
            401: errors[401],
            500: errors[500],
          },
        },
      },
      '/api/v1/announcements/update/{id}': {
        put: {
          tags: ['Announcements'],
          summary: 'Replace message, window and flag',
          operationId: 'updateAnnouncement',
          requestParams: { path: AnnouncementPathSchema, query: UpdateAnnouncementQuerySchema },
          responses: {
            200: { description: 'Updated', ...json(MessageResponseSchema) },
            ...errors,
          },
        },
      },
      '/api/v1/announcements/delete/{id}': {
        delete: {
          tags: ['Announcements'],
          summary: 'Delete an announcement',
          operationId: 'deleteAnnouncement',
          requestParams: { path: AnnouncementPathSchema, query: TeacherAuthQuerySchema },
          responses: {
            200: { description: 'Deleted', ...json(MessageResponseSchema) },
            ...errors,
          },
        },
      },
      '/api/v1/announcements/toggle/{id}': {
        put: {
          tags: ['Announcements'],
          summary: 'Flip the manual on/off switch',
          operationId: 'toggleAnnouncement',
          requestParams: { path: AnnouncementPathSchema, query: TeacherAuthQuerySchema },
          responses: {
            200: { description: 'New switch value', ...json(ToggleAnnouncementResponseSchema) },
            ...errors,
          },
        },
      },
    },
  });
}
