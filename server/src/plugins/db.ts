import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';

// Type augmentation: makes fastify.db available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: BetterSQLite3Database<typeof schema> & { $client: Database.Database };
  }
}

export default fp(
  async function dbPlugin(fastify) {
    const dbPath = fastify.config.databaseUrl;

    // Ensure parent directory exists
    mkdirSync(dirname(dbPath), { recursive: true });

    fastify.log.info({ dbPath }, 'Opening SQLite database');

    const sqlite = new Database(dbPath);

    // Enable WAL mode for better concurrent read performance
    sqlite.pragma('journal_mode = WAL');
    // Junction rows rely on ON DELETE CASCADE
    sqlite.pragma('foreign_keys = ON');

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    for (const file of applied) {
      fastify.log.info({ migration: file }, 'Applied migration');
    }
    fastify.log.info('Database migrations completed');

    const db = drizzle(sqlite, { schema });

    fastify.decorate('db', db);

    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);
