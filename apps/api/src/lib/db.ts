import { createDb, type Database } from '@bulletin/db';
import { env } from '../config/env.js';
import { logger } from './logger.js';

let db: Database | null = null;

export function getDb(): Database {
  if (!db) {
    db = createDb(env.DATABASE_URL);
    logger.info('Database connection established');
  }
  return db;
}

/** End the connection pool, if one was opened. */
export async function closeDb(): Promise<void> {
  if (!db) return;
  const current = db;
  db = null;
  await current.$client.end({ timeout: 5 });
}
