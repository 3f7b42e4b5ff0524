import type { FastifyInstance, FastifyReply } from 'fastify';
import type { LoginResponse } from '@larder/shared';
import { AppError } from '../errors/AppError.js';
import * as userService from '../services/userService.js';
import * as sessionService from '../services/sessionService.js';
import { extractSessionToken } from '../plugins/auth.js';
import { COOKIE_NAME } from '../constants.js';

// Verified against when the email is unknown, so both failure paths cost one scrypt run
const DUMMY_PASSWORD_HASH =
  '$scrypt$n=16384,r=8,p=1$Db4AnJySH04amKoUy6he0w==$fH6mww5NQKNdODG34/7Yl7q5/W/tFFGbjep+JRzGC91ov8J8pGnUmq4Qn/AJXBpESJNzuE0a3BSHbqUn1ReMfA==';

// JSON schema for request validation (Fastify/AJV)
const loginSchema = {
  body: {
    type: 'object',
    required: ['email', 'password'],
    properties: {
      email: { type: 'string' },
      password: { type: 'string' },
    },
    additionalProperties: false,
  },
};

interface LoginBody {
  email: string;
  password: string;
}

export default async function authRoutes(fastify: FastifyInstance) {
  const setSessionCookie = (reply: FastifyReply, value: string, maxAge: number) => {
    reply.setCookie(COOKIE_NAME, value, {
      httpOnly: true,
      secure: fastify.config.secureCookies,
      sameSite: 'strict',
      path: '/',
      maxAge,
    });
  };

  /**
   * POST /api/auth/login
   *
   * Authenticates a user with email and password.
   * Returns the user and a session token; the same token is set as the
   * session cookie and is accepted as `Authorization: Token <token>`.
   */
  fastify.post<{ Body: LoginBody }>('/login', { schema: loginSchema }, async (request, reply) => {
    const { email, password } = request.body;

    const user = userService.findByEmail(fastify.db, email);
    if (!user) {
      await userService.verifyPassword(DUMMY_PASSWORD_HASH, password);
      throw new AppError('INVALID_CREDENTIALS', 401, 'Invalid email or password');
    }

    const passwordValid = await userService.verifyPassword(user.passwordHash, password);
    if (!passwordValid) {
      throw new AppError('INVALID_CREDENTIALS', 401, 'Invalid email or password');
    }

    if (!user.isActive) {
      throw new AppError('ACCOUNT_INACTIVE', 401, 'Account is inactive');
    }

    const token = sessionService.createSession(
      fastify.db,
      user.id,
      fastify.config.sessionDuration,
    );
    request.log.info({ userId: user.id }, 'User logged in');

    setSessionCookie(reply, token, fastify.config.sessionDuration);

    const response: LoginResponse = { user: userService.toUserResponse(user), token };
    return reply.status(200).send(response);
  });

  /**
   * POST /api/auth/logout
   *
   * Destroys the current session and clears the session cookie.
   * Returns 204 No Content on success.
   */
  fastify.post('/logout', async (request, reply) => {
    const token = extractSessionToken(request);
    if (token) {
      sessionService.destroySession(fastify.db, token);
    }

    // Clear the cookie (even if no session was found)
    setSessionCookie(reply, '', 0);

    return reply.status(204).send();
  });
}
