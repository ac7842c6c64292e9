export * from './announcements.js';
export * from './teachers.js';
