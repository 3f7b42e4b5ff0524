import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from './migrate.js';
import * as schema from './schema.js';
import { createSuperuser } from '../services/userService.js';
import type { UserRow } from '../services/userService.js';

/**
 * Create a staff + superuser account from SUPERUSER_EMAIL and SUPERUSER_PASSWORD.
 * Pending migrations are applied first.
 */
export async function createSuperuserFromEnv(
  sqlite: Database.Database,
  env: NodeJS.ProcessEnv,
): Promise<UserRow> {
  const email = env.SUPERUSER_EMAIL;
  const password = env.SUPERUSER_PASSWORD;
  if (!email || !password) {
    throw new Error('SUPERUSER_EMAIL and SUPERUSER_PASSWORD must both be set');
  }

  runMigrations(sqlite);
  return createSuperuser(drizzle(sqlite, { schema }), email, password);
}

async function main() {
  const dbPath = process.env.DATABASE_URL || './data/larder.db';
  mkdirSync(dirname(dbPath), { recursive: true });

  const sqlite = new Database(dbPath);

  try {
    const user = await createSuperuserFromEnv(sqlite, process.env);
    console.warn(`Created superuser ${user.email}`);
  } catch (err) {
    console.error('Superuser creation failed:', err);
    process.exitCode = 1;
  } finally {
    sqlite.close();
  }
}

if (require.main === module) {
  void main();
}
