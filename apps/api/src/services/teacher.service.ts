import { eq } from 'drizzle-orm';
import { teachers } from '@bulletin/db/schema';
import { getDb } from '../lib/db.js';

/** Answers whether a teacher account exists; the only authentication check this API makes. */
export interface TeacherDirectory {
  exists(username: string): Promise<boolean>;
}

class TeacherService implements TeacherDirectory {
  async exists(username: string): Promise<boolean> {
    const db = getDb();
    const [row] = await db
      .select({ username: teachers.username })
      .from(teachers)
      .where(eq(teachers.username, username))
      .limit(1);
    return row !== undefined;
  }
}

export const teacherService: TeacherDirectory = new TeacherService();
