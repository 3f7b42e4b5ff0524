import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from './migrate.js';

// Run migrations standalone (without starting the server)
function main() {
  const dbPath = process.env.DATABASE_URL || './data/larder.db';

  // Ensure parent directory exists
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  try {
    const applied = runMigrations(db);
    for (const file of applied) {
      console.warn(`Applied migration: ${file}`);
    }
    console.warn('Migrations completed successfully');
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

main();
