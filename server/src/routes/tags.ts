import type { FastifyInstance } from 'fastify';
import type { TagListResponse, UpdateTagRequest } from '@larder/shared';
import { UnauthorizedError } from '../errors/AppError.js';
import * as tagService from '../services/tagService.js';
import { parseIdParam } from '../utils/ids.js';

// JSON schema for GET /api/tags
const listTagsSchema = {
  querystring: {
    type: 'object',
    properties: {
      assigned_only: { type: 'string' },
    },
  },
};

// JSON schema for PATCH /api/tags/:id (rename tag)
const updateTagSchema = {
  body: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: tagService.MAX_TAG_NAME_LENGTH },
    },
    additionalProperties: false,
  },
};

export default async function tagRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/tags?assigned_only=0|1|2
   * List the user's tags, sorted by name descending.
   * 1 keeps tags used by one of the user's recipes, 2 keeps unused ones.
   */
  fastify.get<{ Querystring: { assigned_only?: string } }>(
    '/',
    { schema: listTagsSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const assignment = tagService.parseAssignmentFilter(request.query.assigned_only);
      const response: TagListResponse = {
        tags: tagService.listTags(fastify.db, request.user.id, assignment),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * PATCH /api/tags/:id
   * Rename a tag.
   */
  fastify.patch<{ Params: { id: string }; Body: UpdateTagRequest }>(
    '/:id',
    { schema: updateTagSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const id = parseIdParam(request.params.id, 'Tag not found');
      const tag = tagService.updateTag(fastify.db, request.user.id, id, request.body);
      return reply.status(200).send(tag);
    },
  );

  /**
   * DELETE /api/tags/:id
   * Delete a tag (cascade removes it from all recipes).
   */
  fastify.delete<{ Params: { id: string } }>('/:id', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const id = parseIdParam(request.params.id, 'Tag not found');
    tagService.deleteTag(fastify.db, request.user.id, id);
    return reply.status(204).send();
  });
}
