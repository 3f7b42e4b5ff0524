import type { FastifyInstance } from 'fastify';
import type {
  CreateRecipeRequest,
  RecipeListQuery,
  RecipeListResponse,
  UpdateRecipeRequest,
} from '@larder/shared';
import { UnauthorizedError, fieldValidationError } from '../errors/AppError.js';
import * as recipeService from '../services/recipeService.js';
import { MAX_TAG_NAME_LENGTH } from '../services/tagService.js';
import { parseIdParam } from '../utils/ids.js';

const IMAGE_FIELD = 'image';

const tagInputSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: MAX_TAG_NAME_LENGTH },
  },
  additionalProperties: false,
};

// Writable recipe fields. Unknown keys (an owner id, say) are stripped by AJV.
const recipeProperties = {
  title: { type: 'string', minLength: 1, maxLength: recipeService.MAX_TITLE_LENGTH },
  description: { type: 'string' },
  timeMinutes: { type: 'integer', minimum: 1 },
  price: { type: ['number', 'string'] },
  link: { type: 'string', maxLength: recipeService.MAX_LINK_LENGTH },
  tags: { type: 'array', items: tagInputSchema },
};

// JSON schema for POST /api/recipes and PUT /api/recipes/:id
const fullRecipeSchema = {
  body: {
    type: 'object',
    required: ['title', 'description', 'timeMinutes', 'price'],
    properties: recipeProperties,
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/recipes/:id
const partialRecipeSchema = {
  body: {
    type: 'object',
    properties: recipeProperties,
    additionalProperties: false,
  },
};

// JSON schema for GET /api/recipes
const listRecipesSchema = {
  querystring: {
    type: 'object',
    properties: {
      tags: { type: 'string' },
    },
  },
};

export default async function recipeRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/recipes?tags=1,2
   * List the user's recipes, newest first.
   * With `tags`, only recipes carrying at least one of the given tag ids.
   */
  fastify.get<{ Querystring: RecipeListQuery }>(
    '/',
    { schema: listRecipesSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: RecipeListResponse = {
        recipes: recipeService.listRecipes(fastify.db, request.user.id, request.query),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/recipes
   * Create a recipe. Tags are matched by name against the user's tags and
   * created when missing.
   */
  fastify.post<{ Body: CreateRecipeRequest }>(
    '/',
    { schema: fullRecipeSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const recipe = recipeService.createRecipe(fastify.db, request.user.id, request.body);
      request.log.info({ recipeId: recipe.id }, 'Recipe created');
      return reply.status(201).send(recipe);
    },
  );

  /**
   * GET /api/recipes/:id
   */
  fastify.get<{ Params: { id: string } }>('/:id', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const id = parseIdParam(request.params.id, 'Recipe not found');
    return reply.status(200).send(recipeService.getRecipeDetail(fastify.db, request.user.id, id));
  });

  /**
   * PUT /api/recipes/:id
   * Full update. Tags are replaced only when `tags` is sent.
   */
  fastify.put<{ Params: { id: string }; Body: CreateRecipeRequest }>(
    '/:id',
    { schema: fullRecipeSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const id = parseIdParam(request.params.id, 'Recipe not found');
      const recipe = recipeService.replaceRecipe(fastify.db, request.user.id, id, request.body);
      return reply.status(200).send(recipe);
    },
  );

  /**
   * PATCH /api/recipes/:id
   * Partial update. A `tags` list replaces the whole tag set; [] clears it.
   */
  fastify.patch<{ Params: { id: string }; Body: UpdateRecipeRequest }>(
    '/:id',
    { schema: partialRecipeSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const id = parseIdParam(request.params.id, 'Recipe not found');
      const recipe = recipeService.updateRecipe(fastify.db, request.user.id, id, request.body);
      return reply.status(200).send(recipe);
    },
  );

  /**
   * DELETE /api/recipes/:id
   * Delete a recipe. Its tags are kept.
   */
  fastify.delete<{ Params: { id: string } }>('/:id', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const id = parseIdParam(request.params.id, 'Recipe not found');
    recipeService.deleteRecipe(fastify.db, request.user.id, id);
    return reply.status(204).send();
  });

  /**
   * POST /api/recipes/:id/upload-image
   * multipart/form-data with a single `image` file field.
   * Stores the image reference and returns the labeler's presigned URL and labels.
   */
  fastify.post<{ Params: { id: string } }>('/:id/upload-image', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const id = parseIdParam(request.params.id, 'Recipe not found');
    // Ownership is checked before the upload is read
    recipeService.getOwnedRecipe(fastify.db, request.user.id, id);

    const file = await request.file();
    if (!file || file.fieldname !== IMAGE_FIELD) {
      throw fieldValidationError(`/${IMAGE_FIELD}`, 'An image file is required');
    }
    const data = await file.toBuffer();

    const result = await recipeService.attachRecipeImage(
      fastify.db,
      request.user,
      id,
      { contentType: file.mimetype, data },
      fastify.imageLabeler,
    );
    request.log.info({ recipeId: id, image: result.image }, 'Recipe image stored');
    return reply.status(200).send(result);
  });
}
