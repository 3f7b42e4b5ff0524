import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import type { users } from '../db/schema.js';
import * as sessionService from '../services/sessionService.js';
import { UnauthorizedError } from '../errors/AppError.js';
import { AUTH_TOKEN_SCHEME, COOKIE_NAME } from '../constants.js';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

// Public routes that don't require authentication, keyed by route pattern
const PUBLIC_ROUTES = new Map<string, ReadonlySet<string>>([
  ['/api/users', new Set(['POST'])],
  ['/api/auth/login', new Set(['POST'])],
  ['/api/auth/logout', new Set(['POST'])],
  ['/api/health', new Set(['GET', 'HEAD'])],
  ['/api/health/ready', new Set(['GET', 'HEAD'])],
]);

// Type augmentation: makes request.user available throughout the app
declare module 'fastify' {
  interface FastifyRequest {
    user: typeof users.$inferSelect | null;
  }
}

/**
 * Session token sent by the client: the session cookie, or else an
 * `Authorization: Token <token>` header.
 */
export function extractSessionToken(request: FastifyRequest): string | undefined {
  const cookie = request.cookies[COOKIE_NAME];
  if (cookie) {
    return cookie;
  }

  const header = request.headers.authorization;
  if (!header) {
    return undefined;
  }
  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (scheme !== AUTH_TOKEN_SCHEME || !token) {
    return undefined;
  }
  return token;
}

export default fp(
  async function authPlugin(fastify) {
    // Decorate request with user property
    fastify.decorateRequest('user', null);

    // Start periodic cleanup of expired sessions
    const cleanupTimer = setInterval(() => {
      try {
        const deletedCount = sessionService.cleanupExpiredSessions(fastify.db);
        if (deletedCount > 0) {
          fastify.log.info({ deletedCount }, 'Cleaned up expired sessions');
        }
      } catch (err) {
        fastify.log.error({ err }, 'Failed to clean up expired sessions');
      }
    }, CLEANUP_INTERVAL_MS);
    cleanupTimer.unref();

    // Clean up timer on shutdown
    fastify.addHook('onClose', async () => {
      clearInterval(cleanupTimer);
    });

    // Authentication preValidation hook
    // Note: This runs after route matching. For routes that don't exist, Fastify routes
    // to the notFoundHandler which we should let through (to return 404, not 401).
    fastify.addHook('preValidation', async (request, _reply) => {
      if (!request.url.startsWith('/api/')) {
        return;
      }

      // The not-found handler has no route pattern
      const routeUrl = request.routeOptions.url;
      if (!routeUrl) {
        return;
      }

      const token = extractSessionToken(request);
      if (token) {
        const user = sessionService.validateSession(fastify.db, token);
        if (user) {
          request.user = user;
        }
      }

      // Match on the route pattern rather than request.url so query strings don't matter
      const isPublicRoute = PUBLIC_ROUTES.get(routeUrl)?.has(request.method) ?? false;
      if (!isPublicRoute && !request.user) {
        throw new UnauthorizedError('Authentication required');
      }
    });
  },
  {
    name: 'auth',
    dependencies: ['config', 'db'],
  },
);
