import { and, desc, eq, exists, not } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { TagAssignmentFilter, TagResponse, UpdateTagRequest } from '@larder/shared';
import { recipeTags, recipes, tags } from '../db/schema.js';
import type { DbExecutor } from '../db/types.js';
import { isUniqueConstraintError } from '../db/constraints.js';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  fieldValidationError,
} from '../errors/AppError.js';

type TagRow = typeof tags.$inferSelect;

export const MAX_TAG_NAME_LENGTH = 255;

/**
 * `assigned_only` query values as sent by clients.
 */
const ASSIGNMENT_FILTERS = new Map<number, TagAssignmentFilter>([
  [0, 'all'],
  [1, 'assigned'],
  [2, 'unassigned'],
]);

/**
 * Convert database tag row to TagResponse shape.
 */
export function toTagResponse(tag: TagRow): TagResponse {
  return {
    id: tag.id,
    name: tag.name,
  };
}

/**
 * Map the `assigned_only` query value (0, 1 or 2) to a filter. Missing means 'all'.
 * @throws ValidationError for any other value
 */
export function parseAssignmentFilter(raw: string | undefined): TagAssignmentFilter {
  if (raw === undefined || raw === '') {
    return 'all';
  }
  const value = raw.trim();
  const filter = /^\d+$/.test(value) ? ASSIGNMENT_FILTERS.get(Number(value)) : undefined;
  if (!filter) {
    throw fieldValidationError('/assigned_only', 'assigned_only must be one of 0, 1, 2');
  }
  return filter;
}

/**
 * Trim and validate a tag name.
 * @throws ValidationError if the name is empty or too long
 */
export function normalizeTagName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_TAG_NAME_LENGTH) {
    throw new ValidationError(`Tag name must be between 1 and ${MAX_TAG_NAME_LENGTH} characters`);
  }
  return trimmed;
}

/**
 * True for tags attached to at least one recipe owned by `userId`.
 * Recipes of other users never count, even for rows that bypassed this service.
 */
function assignedToOwnRecipe(db: DbExecutor, userId: string): SQL {
  return exists(
    db
      .select({ recipeId: recipeTags.recipeId })
      .from(recipeTags)
      .innerJoin(recipes, eq(recipes.id, recipeTags.recipeId))
      .where(and(eq(recipeTags.tagId, tags.id), eq(recipes.userId, userId))),
  );
}

/**
 * List the user's tags, newest name first (descending by name).
 *
 * - 'all': every tag of the user
 * - 'assigned': tags used by at least one of the user's recipes
 * - 'unassigned': tags used by none of them
 *
 * 'assigned' and 'unassigned' partition 'all'.
 */
export function listTags(
  db: DbExecutor,
  userId: string,
  assignment: TagAssignmentFilter = 'all',
): TagResponse[] {
  const conditions: SQL[] = [eq(tags.userId, userId)];

  if (assignment === 'assigned') {
    conditions.push(assignedToOwnRecipe(db, userId));
  } else if (assignment === 'unassigned') {
    conditions.push(not(assignedToOwnRecipe(db, userId)));
  }

  const tagRows = db
    .select()
    .from(tags)
    .where(and(...conditions))
    .orderBy(desc(tags.name), desc(tags.id))
    .all();
  return tagRows.map(toTagResponse);
}

/**
 * Fetch a tag owned by the user.
 * @throws NotFoundError if the tag does not exist or belongs to someone else
 */
export function getOwnedTag(db: DbExecutor, userId: string, id: number): TagRow {
  const tag = db
    .select()
    .from(tags)
    .where(and(eq(tags.id, id), eq(tags.userId, userId)))
    .get();
  if (!tag) {
    throw new NotFoundError('Tag not found');
  }
  return tag;
}

/**
 * Return the user's tag with this name, creating it when absent.
 *
 * The insert is conditional on the (user_id, name) unique index, so two
 * requests racing on the same new name end up sharing one row instead of
 * creating duplicates.
 */
export function findOrCreateTag(db: DbExecutor, userId: string, name: string): TagRow {
  const tagName = normalizeTagName(name);

  db.insert(tags)
    .values({ userId, name: tagName, createdAt: new Date().toISOString() })
    .onConflictDoNothing({ target: [tags.userId, tags.name] })
    .run();

  const tag = db
    .select()
    .from(tags)
    .where(and(eq(tags.userId, userId), eq(tags.name, tagName)))
    .get();
  if (!tag) {
    // Only reachable if the row was deleted between the two statements
    throw new NotFoundError('Tag not found');
  }
  return tag;
}

/**
 * Rename a tag.
 * @throws NotFoundError if the tag is not the user's
 * @throws ValidationError if the name is invalid
 * @throws ConflictError if the user already has another tag with that name
 */
export function updateTag(
  db: DbExecutor,
  userId: string,
  id: number,
  data: UpdateTagRequest,
): TagResponse {
  const existing = getOwnedTag(db, userId, id);
  const name = normalizeTagName(data.name);

  if (name !== existing.name) {
    // The (user_id, name) unique index decides; a separate lookup could race a find-or-create
    try {
      db.update(tags).set({ name }).where(eq(tags.id, id)).run();
    } catch (err) {
      if (isUniqueConstraintError(err)) {
        throw new ConflictError('A tag with this name already exists');
      }
      throw err;
    }
  }

  return toTagResponse({ ...existing, name });
}

/**
 * Delete a tag. Cascade removes it from every recipe that references it.
 * @throws NotFoundError if the tag is not the user's
 */
export function deleteTag(db: DbExecutor, userId: string, id: number): void {
  getOwnedTag(db, userId, id);
  db.delete(tags).where(eq(tags.id, id)).run();
}
