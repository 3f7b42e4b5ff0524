import type { TagInput, TagResponse } from './tag.js';

/**
 * Recipe-related types and interfaces.
 *
 * Prices travel as decimal strings with two fractional digits ("5.25") so
 * that no client has to round a binary float.
 */

/**
 * Recipe as shown in list responses.
 */
export interface RecipeSummary {
  id: number;
  title: string;
  timeMinutes: number;
  price: string;
  link: string;
  tags: TagResponse[];
}

/**
 * Recipe as shown in detail, create and update responses.
 */
export interface RecipeDetail extends RecipeSummary {
  description: string;
  image: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Request body for POST /api/recipes and PUT /api/recipes/:id.
 * `price` accepts a number or a decimal string with at most two fractional digits.
 */
export interface CreateRecipeRequest {
  title: string;
  description: string;
  timeMinutes: number;
  price: number | string;
  link?: string;
  tags?: TagInput[];
}

/**
 * Request body for PATCH /api/recipes/:id.
 * When `tags` is present it replaces the recipe's whole tag set.
 */
export interface UpdateRecipeRequest {
  title?: string;
  description?: string;
  timeMinutes?: number;
  price?: number | string;
  link?: string;
  tags?: TagInput[];
}

/**
 * Query parameters for GET /api/recipes.
 */
export interface RecipeListQuery {
  /** Comma-separated tag ids, e.g. "2,3" */
  tags?: string;
}

/**
 * Response for GET /api/recipes.
 */
export interface RecipeListResponse {
  recipes: RecipeSummary[];
}
