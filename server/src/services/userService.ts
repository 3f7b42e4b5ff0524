import { randomUUID, scrypt as scryptCb, randomBytes, timingSafeEqual } from 'node:crypto';
import type { BinaryLike, ScryptOptions } from 'node:crypto';
import { promisify } from 'node:util';
import { eq } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { users } from '../db/schema.js';
import type { UserResponse, CreateUserRequest, UpdateUserRequest } from '@larder/shared';
import { ConflictError, NotFoundError, ValidationError } from '../errors/AppError.js';
import { isUniqueConstraintError } from '../db/constraints.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;
export type UserRow = typeof users.$inferSelect;

const scryptAsync = promisify<BinaryLike, BinaryLike, number, ScryptOptions, Buffer>(scryptCb);

const SCRYPT_N = 16384;
const SCRYPT_R = 8;
const SCRYPT_P = 1;
const KEY_LEN = 64;
const SALT_LEN = 16;
// OpenSSL requires slightly more than 128*N*r; use 128*r*(N+p+2) as safe minimum
const MAX_MEM = 128 * SCRYPT_R * (SCRYPT_N + SCRYPT_P + 2);

export const MIN_PASSWORD_LENGTH = 5;

/**
 * Hash a password using Node.js crypto.scrypt.
 * Returns a PHC-format string: $scrypt$n=N,r=R,p=P$<base64-salt>$<base64-hash>
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LEN);
  const derived = await scryptAsync(password, salt, KEY_LEN, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
    maxmem: MAX_MEM,
  });
  return `$scrypt$n=${SCRYPT_N},r=${SCRYPT_R},p=${SCRYPT_P}$${salt.toString('base64')}$${derived.toString('base64')}`;
}

/**
 * Verify a password against a scrypt PHC-format hash using timing-safe comparison.
 *
 * @returns True if password matches, false otherwise (including malformed hashes)
 */
export async function verifyPassword(hash: string, password: string): Promise<boolean> {
  const parts = hash.split('$'); // ['', 'scrypt', 'n=...,r=...,p=...', '<salt>', '<hash>']
  if (parts.length !== 5 || parts[1] !== 'scrypt') return false;

  const params = new Map(
    parts[2].split(',').map((p): [string, string] => {
      const [key, value = ''] = p.split('=');
      return [key, value];
    }),
  );
  const salt = Buffer.from(parts[3], 'base64');
  const expected = Buffer.from(parts[4], 'base64');
  const n = Number(params.get('n'));
  const r = Number(params.get('r'));
  const p = Number(params.get('p'));
  if (!Number.isInteger(n) || !Number.isInteger(r) || !Number.isInteger(p)) return false;

  const derived = await scryptAsync(password, salt, expected.length, {
    N: n,
    r,
    p,
    maxmem: 128 * r * (n + p + 2),
  });

  return timingSafeEqual(derived, expected);
}

/**
 * Lower-case the domain part of an email address; the local part is kept as given.
 * "Test3@Example.COM" becomes "Test3@example.com".
 */
export function normalizeEmail(email: string): string {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf('@');
  if (at === -1) return trimmed;
  return `${trimmed.slice(0, at)}@${trimmed.slice(at + 1).toLowerCase()}`;
}

/**
 * Convert DB row to UserResponse (never includes the password hash).
 */
export function toUserResponse(row: UserRow): UserResponse {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    isStaff: row.isStaff,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Find a user by email address. The lookup normalizes the email the same
 * way signup stores it.
 */
export function findByEmail(db: DbType, email: string): UserRow | undefined {
  return db
    .select()
    .from(users)
    .where(eq(users.email, normalizeEmail(email)))
    .get();
}

/**
 * Find a user by ID.
 */
export function findById(db: DbType, id: string): UserRow | undefined {
  return db.select().from(users).where(eq(users.id, id)).get();
}

/**
 * Create a new user (signup).
 *
 * @throws ValidationError if the email is empty or the password too short
 * @throws ConflictError if the normalized email is already registered
 */
export async function createUser(
  db: DbType,
  data: CreateUserRequest,
  flags: { isStaff?: boolean; isSuperuser?: boolean } = {},
): Promise<UserRow> {
  const email = normalizeEmail(data.email);
  if (email.length === 0) {
    throw new ValidationError('Users must have an email address');
  }
  if (data.password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
    );
  }

  if (findByEmail(db, email)) {
    throw new ConflictError('A user with this email already exists');
  }

  const now = new Date().toISOString();
  const passwordHash = await hashPassword(data.password);
  const id = randomUUID();

  // A concurrent signup for the same email can pass the check above while this one hashes
  try {
    db.insert(users)
      .values({
        id,
        email,
        name: data.name?.trim() ?? '',
        passwordHash,
        isStaff: flags.isStaff ?? false,
        isSuperuser: flags.isSuperuser ?? false,
        createdAt: now,
        updatedAt: now,
      })
      .run();
  } catch (err) {
    if (isUniqueConstraintError(err)) {
      throw new ConflictError('A user with this email already exists');
    }
    throw err;
  }

  const row = findById(db, id);
  if (!row) {
    throw new NotFoundError('User not found');
  }
  return row;
}

/**
 * Create a user with staff and superuser privileges.
 */
export function createSuperuser(db: DbType, email: string, password: string): Promise<UserRow> {
  return createUser(db, { email, password }, { isStaff: true, isSuperuser: true });
}

/**
 * Update the current user's name and/or password.
 *
 * @throws ValidationError if no field is provided or the password is too short
 * @throws NotFoundError if the user does not exist
 */
export async function updateUser(
  db: DbType,
  userId: string,
  data: UpdateUserRequest,
): Promise<UserRow> {
  if (data.name === undefined && data.password === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof users.$inferInsert> = {};
  if (data.name !== undefined) {
    updates.name = data.name.trim();
  }
  if (data.password !== undefined) {
    if (data.password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
      );
    }
    updates.passwordHash = await hashPassword(data.password);
  }
  updates.updatedAt = new Date().toISOString();

  db.update(users).set(updates).where(eq(users.id, userId)).run();

  const row = findById(db, userId);
  if (!row) {
    throw new NotFoundError('User not found');
  }
  return row;
}
