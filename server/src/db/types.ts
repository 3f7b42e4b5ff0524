import type { RunResult } from 'better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type * as schema from './schema.js';

/**
 * Anything queries can run against: the Drizzle database itself or the
 * `tx` handle inside `db.transaction()`. Helpers that take part in a
 * larger transaction accept this type.
 */
export type DbExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;
