import { randomBytes } from 'node:crypto';
import { eq, lt, gt, and } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { sessions, users } from '../db/schema.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

/**
 * Generate a cryptographically secure 256-bit session token (hex string).
 */
export function generateSessionToken(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Create a new session for a user.
 *
 * @returns The session ID, used both as cookie value and as API token
 */
export function createSession(db: DbType, userId: string, durationSeconds: number): string {
  const id = generateSessionToken();
  const now = new Date();
  const expiresAt = new Date(now.getTime() + durationSeconds * 1000);

  db.insert(sessions)
    .values({
      id,
      userId,
      expiresAt: expiresAt.toISOString(),
      createdAt: now.toISOString(),
    })
    .run();

  return id;
}

/**
 * Resolve a session token to its user.
 * Returns null if the session is unknown, expired, or the user is inactive.
 */
export function validateSession(
  db: DbType,
  sessionId: string,
): typeof users.$inferSelect | null {
  const now = new Date().toISOString();

  const result = db
    .select({ user: users })
    .from(sessions)
    .innerJoin(users, eq(sessions.userId, users.id))
    .where(and(eq(sessions.id, sessionId), gt(sessions.expiresAt, now), eq(users.isActive, true)))
    .get();

  return result?.user ?? null;
}

/**
 * Destroy a session by ID.
 */
export function destroySession(db: DbType, sessionId: string): void {
  db.delete(sessions).where(eq(sessions.id, sessionId)).run();
}

/**
 * Clean up expired sessions from the database.
 *
 * @returns Number of sessions deleted
 */
export function cleanupExpiredSessions(db: DbType): number {
  const now = new Date().toISOString();
  const result = db.delete(sessions).where(lt(sessions.expiresAt, now)).run();
  return result.changes;
}
