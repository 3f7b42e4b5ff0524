import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, inArray } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type {
  CreateRecipeRequest,
  RecipeDetail,
  RecipeImageResponse,
  RecipeListQuery,
  RecipeSummary,
  TagInput,
  TagResponse,
  UpdateRecipeRequest,
} from '@larder/shared';
import { recipeTags, recipes, tags } from '../db/schema.js';
import type { DbExecutor } from '../db/types.js';
import {
  ImageAnalysisError,
  NotFoundError,
  ValidationError,
  fieldValidationError,
} from '../errors/AppError.js';
import { IMAGE_CONTENT_TYPES } from '../constants.js';
import { formatPrice, parsePrice } from '../utils/price.js';
import { findOrCreateTag, toTagResponse } from './tagService.js';
import type { ImageLabeler } from './imageLabeler.js';

type RecipeRow = typeof recipes.$inferSelect;

export const MAX_TITLE_LENGTH = 255;
export const MAX_LINK_LENGTH = 255;

const TAG_ID_PATTERN = /^\d+$/;

/**
 * An uploaded image as received by the transport layer.
 */
export interface RecipeImageUpload {
  contentType: string;
  data: Buffer;
}

/**
 * Fetch a recipe's tags, sorted by name ascending.
 */
function getRecipeTags(db: DbExecutor, recipeId: number): TagResponse[] {
  const tagRows = db
    .select({ tag: tags })
    .from(recipeTags)
    .innerJoin(tags, eq(tags.id, recipeTags.tagId))
    .where(eq(recipeTags.recipeId, recipeId))
    .orderBy(asc(tags.name), asc(tags.id))
    .all();

  return tagRows.map((row) => toTagResponse(row.tag));
}

/**
 * Convert database recipe row to RecipeSummary shape.
 */
export function toRecipeSummary(db: DbExecutor, recipe: RecipeRow): RecipeSummary {
  return {
    id: recipe.id,
    title: recipe.title,
    timeMinutes: recipe.timeMinutes,
    price: formatPrice(recipe.priceCents),
    link: recipe.link,
    tags: getRecipeTags(db, recipe.id),
  };
}

/**
 * Convert database recipe row to RecipeDetail shape.
 */
export function toRecipeDetail(db: DbExecutor, recipe: RecipeRow): RecipeDetail {
  return {
    ...toRecipeSummary(db, recipe),
    description: recipe.description,
    image: recipe.image,
    createdAt: recipe.createdAt,
    updatedAt: recipe.updatedAt,
  };
}

/**
 * Parse the comma-separated `tags` filter ("2,3") into tag ids.
 * Returns undefined when no filter was given.
 * @throws ValidationError if any element is not a positive integer
 */
export function parseTagIdFilter(raw: string | undefined): number[] | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const ids = raw.split(',').map((part) => part.trim());
  const invalid = ids.find((part) => {
    const id = Number(part);
    return !TAG_ID_PATTERN.test(part) || !Number.isSafeInteger(id) || id < 1;
  });
  if (invalid !== undefined) {
    throw fieldValidationError(
      '/tags',
      `Tag filter must be a comma-separated list of positive integers, got: "${invalid}"`,
    );
  }
  return ids.map(Number);
}

/**
 * List the user's recipes, newest first (descending id).
 *
 * With a `tags` filter only recipes carrying at least one of the given tag
 * ids are returned. The filter is an IN-subquery over the junction table,
 * so a recipe matching several tags still appears once.
 */
export function listRecipes(
  db: DbExecutor,
  userId: string,
  query: RecipeListQuery = {},
): RecipeSummary[] {
  const tagIds = parseTagIdFilter(query.tags);

  const conditions: SQL[] = [eq(recipes.userId, userId)];
  if (tagIds) {
    conditions.push(
      inArray(
        recipes.id,
        db
          .select({ recipeId: recipeTags.recipeId })
          .from(recipeTags)
          .where(inArray(recipeTags.tagId, tagIds)),
      ),
    );
  }

  const recipeRows = db
    .select()
    .from(recipes)
    .where(and(...conditions))
    .orderBy(desc(recipes.id))
    .all();

  return recipeRows.map((recipe) => toRecipeSummary(db, recipe));
}

/**
 * Fetch a recipe owned by the user.
 * Another user's recipe is reported exactly like a missing one.
 * @throws NotFoundError
 */
export function getOwnedRecipe(db: DbExecutor, userId: string, id: number): RecipeRow {
  const recipe = db
    .select()
    .from(recipes)
    .where(and(eq(recipes.id, id), eq(recipes.userId, userId)))
    .get();
  if (!recipe) {
    throw new NotFoundError('Recipe not found');
  }
  return recipe;
}

/**
 * Get recipe detail by ID.
 * @throws NotFoundError if the recipe does not exist or is not the user's
 */
export function getRecipeDetail(db: DbExecutor, userId: string, id: number): RecipeDetail {
  return toRecipeDetail(db, getOwnedRecipe(db, userId, id));
}

function validateTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_TITLE_LENGTH) {
    throw fieldValidationError(
      '/title',
      `Title must be between 1 and ${MAX_TITLE_LENGTH} characters`,
    );
  }
  return trimmed;
}

function validateTimeMinutes(timeMinutes: number): number {
  if (!Number.isSafeInteger(timeMinutes) || timeMinutes <= 0) {
    throw fieldValidationError('/timeMinutes', 'Time estimate must be a positive whole number of minutes');
  }
  return timeMinutes;
}

function validateLink(link: string): string {
  const trimmed = link.trim();
  if (trimmed.length > MAX_LINK_LENGTH) {
    throw fieldValidationError('/link', `Link must be at most ${MAX_LINK_LENGTH} characters`);
  }
  return trimmed;
}

/**
 * Resolve tag names to the user's tag ids, creating missing tags.
 * Order follows the input; repeated names collapse to one id.
 */
function resolveTagIds(db: DbExecutor, userId: string, inputs: TagInput[]): number[] {
  const ids: number[] = [];
  for (const input of inputs) {
    const tag = findOrCreateTag(db, userId, input.name);
    if (!ids.includes(tag.id)) {
      ids.push(tag.id);
    }
  }
  return ids;
}

/**
 * Replace all tags for a recipe (set semantics). Tag rows themselves are kept.
 */
function replaceRecipeTags(db: DbExecutor, recipeId: number, tagIds: number[]): void {
  db.delete(recipeTags).where(eq(recipeTags.recipeId, recipeId)).run();

  if (tagIds.length > 0) {
    db.insert(recipeTags)
      .values(tagIds.map((tagId) => ({ recipeId, tagId })))
      .run();
  }
}

/**
 * Validate every writable field of a full recipe payload (create / PUT).
 */
function toRecipeValues(data: CreateRecipeRequest) {
  if (typeof data.description !== 'string') {
    throw fieldValidationError('/description', 'Description is required');
  }
  return {
    title: validateTitle(data.title),
    description: data.description,
    timeMinutes: validateTimeMinutes(data.timeMinutes),
    priceCents: parsePrice(data.price),
    link: validateLink(data.link ?? ''),
  };
}

/**
 * Create a recipe owned by `userId`, together with its tags.
 *
 * Each tag name is matched against the user's existing tags and created
 * when missing. The recipe row, new tags and associations are written in
 * one transaction.
 */
export function createRecipe(
  db: DbExecutor,
  userId: string,
  data: CreateRecipeRequest,
): RecipeDetail {
  const values = toRecipeValues(data);
  const now = new Date().toISOString();

  return db.transaction((tx) => {
    const created = tx
      .insert(recipes)
      .values({ ...values, userId, createdAt: now, updatedAt: now })
      .returning()
      .get();

    replaceRecipeTags(tx, created.id, resolveTagIds(tx, userId, data.tags ?? []));

    return toRecipeDetail(tx, created);
  });
}

/**
 * Partially update a recipe (PATCH).
 *
 * Only title, description, timeMinutes, price, link and tags are writable;
 * anything else in the payload (an owner id, say) is ignored, so ownership
 * never changes. When `tags` is present it replaces the whole tag set; an
 * empty list clears it. A payload with no writable field changes nothing.
 *
 * @throws NotFoundError if the recipe does not exist or is not the user's
 */
export function updateRecipe(
  db: DbExecutor,
  userId: string,
  id: number,
  data: UpdateRecipeRequest,
): RecipeDetail {
  return db.transaction((tx) => {
    getOwnedRecipe(tx, userId, id);

    const updates: Partial<typeof recipes.$inferInsert> = {};
    if (data.title !== undefined) {
      updates.title = validateTitle(data.title);
    }
    if (data.description !== undefined) {
      updates.description = data.description;
    }
    if (data.timeMinutes !== undefined) {
      updates.timeMinutes = validateTimeMinutes(data.timeMinutes);
    }
    if (data.price !== undefined) {
      updates.priceCents = parsePrice(data.price);
    }
    if (data.link !== undefined) {
      updates.link = validateLink(data.link);
    }

    const tagsProvided = data.tags !== undefined;
    if (Object.keys(updates).length > 0 || tagsProvided) {
      updates.updatedAt = new Date().toISOString();
      tx.update(recipes).set(updates).where(eq(recipes.id, id)).run();
    }

    if (data.tags !== undefined) {
      replaceRecipeTags(tx, id, resolveTagIds(tx, userId, data.tags));
    }

    return toRecipeDetail(tx, getOwnedRecipe(tx, userId, id));
  });
}

/**
 * Fully update a recipe (PUT). Required fields are the same as for create;
 * an omitted link becomes empty and omitted tags are left as they are.
 *
 * @throws NotFoundError if the recipe does not exist or is not the user's
 */
export function replaceRecipe(
  db: DbExecutor,
  userId: string,
  id: number,
  data: CreateRecipeRequest,
): RecipeDetail {
  return db.transaction((tx) => {
    getOwnedRecipe(tx, userId, id);
    const values = toRecipeValues(data);

    tx.update(recipes)
      .set({ ...values, updatedAt: new Date().toISOString() })
      .where(eq(recipes.id, id))
      .run();

    if (data.tags !== undefined) {
      replaceRecipeTags(tx, id, resolveTagIds(tx, userId, data.tags));
    }

    return toRecipeDetail(tx, getOwnedRecipe(tx, userId, id));
  });
}

/**
 * Delete a recipe and its tag associations. Tags stay.
 * @throws NotFoundError if the recipe does not exist or is not the user's
 */
export function deleteRecipe(db: DbExecutor, userId: string, id: number): void {
  db.transaction((tx) => {
    getOwnedRecipe(tx, userId, id);
    tx.delete(recipes).where(eq(recipes.id, id)).run();
  });
}

/**
 * Save an uploaded image reference on the recipe, then hand the image to the
 * labeler and return what it found.
 *
 * The stored reference is `uploads/recipe/<uuid><ext>`; the same generated
 * file name is passed to the labeler, never the client's file name.
 *
 * @throws NotFoundError if the recipe does not exist or is not the user's
 * @throws ValidationError if the upload is empty or not a supported image type
 * @throws ImageAnalysisError carrying the labeler's message when it reports an error
 */
export async function attachRecipeImage(
  db: DbExecutor,
  user: { id: string; email: string },
  id: number,
  upload: RecipeImageUpload,
  labeler: ImageLabeler,
): Promise<RecipeImageResponse> {
  getOwnedRecipe(db, user.id, id);

  const extension = IMAGE_CONTENT_TYPES.get(upload.contentType);
  if (!extension) {
    throw fieldValidationError('/image', 'Upload a valid image (JPEG, PNG, GIF or WebP)');
  }
  if (upload.data.length === 0) {
    throw new ValidationError('The submitted image file is empty');
  }

  const filename = `${randomUUID()}${extension}`;
  const image = `uploads/recipe/${filename}`;

  db.update(recipes)
    .set({ image, updatedAt: new Date().toISOString() })
    .where(eq(recipes.id, id))
    .run();

  const result = await labeler.analyze({
    userEmail: user.email,
    filename,
    contentType: upload.contentType,
    data: upload.data,
    recipeId: id,
  });

  if ('error' in result) {
    throw new ImageAnalysisError(result.error);
  }

  return { image, presignedUrl: result.presignedUrl, labels: result.labels };
}
