import type { FastifyInstance } from 'fastify';
import type { CreateUserRequest, UpdateUserRequest } from '@larder/shared';
import { UnauthorizedError } from '../errors/AppError.js';
import * as userService from '../services/userService.js';

// JSON schema for POST /api/users (signup)
const createUserSchema = {
  body: {
    type: 'object',
    required: ['email', 'password'],
    properties: {
      email: { type: 'string', format: 'email', maxLength: 255 },
      password: { type: 'string', minLength: userService.MIN_PASSWORD_LENGTH, maxLength: 128 },
      name: { type: 'string', maxLength: 255 },
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/users/me
const updateMeSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', maxLength: 255 },
      password: { type: 'string', minLength: userService.MIN_PASSWORD_LENGTH, maxLength: 128 },
    },
    additionalProperties: false,
  },
};

export default async function userRoutes(fastify: FastifyInstance) {
  /**
   * POST /api/users
   *
   * Public signup. Returns the created user; log in separately for a token.
   */
  fastify.post<{ Body: CreateUserRequest }>(
    '/',
    { schema: createUserSchema },
    async (request, reply) => {
      const user = await userService.createUser(fastify.db, request.body);
      request.log.info({ userId: user.id }, 'User signed up');
      return reply.status(201).send(userService.toUserResponse(user));
    },
  );

  /**
   * GET /api/users/me
   *
   * Returns the profile of the currently authenticated user.
   */
  fastify.get('/me', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError('Authentication required');
    }

    return reply.status(200).send(userService.toUserResponse(request.user));
  });

  /**
   * PATCH /api/users/me
   *
   * Updates the current user's name and/or password.
   */
  fastify.patch<{ Body: UpdateUserRequest }>(
    '/me',
    { schema: updateMeSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError('Authentication required');
      }

      const updatedUser = await userService.updateUser(fastify.db, request.user.id, request.body);
      return reply.status(200).send(userService.toUserResponse(updatedUser));
    },
  );
}
