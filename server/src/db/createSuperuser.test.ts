import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { createSuperuserFromEnv } from './createSuperuser.js';
import { ConflictError } from '../errors/AppError.js';

describe('createSuperuserFromEnv()', () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(':memory:');
  });

  afterEach(() => {
    sqlite.close();
  });

  it('migrates and creates a staff superuser', async () => {
    const user = await createSuperuserFromEnv(sqlite, {
      SUPERUSER_EMAIL: 'admin@EXAMPLE.com',
      SUPERUSER_PASSWORD: 'test-secret',
    });

    expect(user.email).toBe('admin@example.com');
    expect(user.isStaff).toBe(true);
    expect(user.isSuperuser).toBe(true);
  });

  const incompleteEnvs: NodeJS.ProcessEnv[] = [
    { SUPERUSER_EMAIL: 'admin@example.com' },
    { SUPERUSER_PASSWORD: 'test-secret' },
    {},
  ];

  it.each(incompleteEnvs)('requires both variables (%p)', async (env) => {
    await expect(createSuperuserFromEnv(sqlite, env)).rejects.toThrow(
      'SUPERUSER_EMAIL and SUPERUSER_PASSWORD must both be set',
    );
  });

  it('refuses an email that is already registered', async () => {
    const env = { SUPERUSER_EMAIL: 'admin@example.com', SUPERUSER_PASSWORD: 'test-secret' };
    await createSuperuserFromEnv(sqlite, env);

    await expect(createSuperuserFromEnv(sqlite, env)).rejects.toThrow(ConflictError);
  });
});
