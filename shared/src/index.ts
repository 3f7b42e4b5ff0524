/**
 * @larder/shared
 *
 * Shared TypeScript types used by the server and its API clients.
 * This package contains API request/response shapes and entity types.
 */

export type { ApiError, ApiErrorResponse, FieldError } from './types/api.js';
export type { ErrorCode } from './types/errors.js';
export type {
  User,
  UserResponse,
  CreateUserRequest,
  UpdateUserRequest,
  LoginResponse,
} from './types/user.js';

// Tags
export type {
  Tag,
  TagResponse,
  TagInput,
  UpdateTagRequest,
  TagAssignmentFilter,
  TagListResponse,
} from './types/tag.js';

// Recipes
export type {
  RecipeSummary,
  RecipeDetail,
  CreateRecipeRequest,
  UpdateRecipeRequest,
  RecipeListQuery,
  RecipeListResponse,
} from './types/recipe.js';

// Image analysis
export type {
  ImageLabel,
  ImageAnalysis,
  ImageAnalysisError,
  ImageAnalysisResult,
  RecipeImageResponse,
} from './types/imageAnalysis.js';
