import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import fastifyCookie from '@fastify/cookie';
import fastifyMultipart from '@fastify/multipart';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@larder/shared';
import configPlugin from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import authPlugin from './plugins/auth.js';
import imageLabelerPlugin from './plugins/imageLabeler.js';
import authRoutes from './routes/auth.js';
import userRoutes from './routes/users.js';
import recipeRoutes from './routes/recipes.js';
import tagRoutes from './routes/tags.js';
import { hashPassword, verifyPassword } from './services/userService.js';
import type { ImageLabeler } from './services/imageLabeler.js';

export interface BuildAppOptions {
  /** Replaces the labeler built from the AWS configuration. */
  imageLabeler?: ImageLabeler;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
    },
    trustProxy: process.env.TRUST_PROXY === 'true',
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Cookie parsing (required for session management)
  await app.register(fastifyCookie);

  // multipart/form-data for recipe image uploads
  await app.register(fastifyMultipart, {
    limits: {
      fileSize: app.config.maxUploadBytes,
      files: 1,
    },
  });

  // Database connection & migrations
  await app.register(dbPlugin);

  // Authentication & session management (after db, before routes)
  await app.register(authPlugin);

  // Image storage + label detection
  await app.register(imageLabelerPlugin, { labeler: options.imageLabeler });

  // Login / logout
  await app.register(authRoutes, { prefix: '/api/auth' });

  // Signup and own profile
  await app.register(userRoutes, { prefix: '/api/users' });

  // Recipe routes
  await app.register(recipeRoutes, { prefix: '/api/recipes' });

  // Tag routes
  await app.register(tagRoutes, { prefix: '/api/tags' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: verifies critical runtime components
  app.get('/api/health/ready', async () => {
    // Verify database is accessible
    app.db.run(sql`SELECT 1`);

    // Verify password hashing round-trip
    const hash = await hashPassword('healthcheck');
    const valid = await verifyPassword(hash, 'healthcheck');
    if (!valid) throw new Error('Password hash verification failed');

    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
