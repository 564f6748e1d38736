/**
 * Authentication Routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { TokenResponse, UserRole } from '@employee-directory/shared';
import type { JwtService } from '../../../application/auth/jwt.service.js';
import type { UserService } from '../../../application/users/user.service.js';
import { UnauthorizedError, UnimplementedError } from '../../../application/errors/app-error.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-routes');

export interface AuthRoutesOptions {
  jwtService: JwtService;
  userService: UserService;
  /** Token issuance by email alone, for development environments */
  enableTestEndpoints: boolean;
}

const LoginSchema = z.object({
  email: z.string().email('Invalid email format'),
});

const RefreshSchema = z.object({
  token: z.string().min(1, 'Token is required'),
});

const tokenResponseSchema = {
  type: 'object',
  properties: {
    token: { type: 'string', description: 'JWT for the Authorization header' },
    expiresAt: { type: 'string', format: 'date-time' },
    user: {
      type: 'object',
      properties: {
        id: { type: 'string' },
        email: { type: 'string' },
        roles: { type: 'array', items: { type: 'string' } },
      },
    },
  },
} as const;

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (
  fastify: FastifyInstance,
  options
): Promise<void> => {
  const { jwtService, userService, enableTestEndpoints } = options;

  // POST /auth/login
  fastify.post('/login', {
    schema: {
      tags: ['Auth'],
      summary: 'Issue a token for an active user',
      description: 'Development only: issues a token for the active user with the given email.',
      response: {
        200: tokenResponseSchema,
      },
    },
  }, async (request, reply) => {
    if (!enableTestEndpoints) {
      throw new UnimplementedError('Feature not implemented: This functionality is not yet available.');
    }

    const body = LoginSchema.parse(request.body);
    const user = await userService.getUserByEmail(body.email);
    if (!user) {
      logger.warn({ email: body.email }, 'Login attempted for unknown user');
      throw new UnauthorizedError('Invalid credentials');
    }

    const issued = jwtService.generateToken(user.id, user.email, ['User']);
    logger.info({ userId: user.id }, 'Token issued');

    const response: TokenResponse = {
      token: issued.token,
      expiresAt: issued.expiresAt.toISOString(),
      user: { id: String(user.id), email: user.email, roles: ['User'] },
    };
    return reply.send(response);
  });

  // POST /auth/refresh
  fastify.post('/refresh', {
    schema: {
      tags: ['Auth'],
      summary: 'Exchange a valid token for a new one',
      response: {
        200: tokenResponseSchema,
      },
    },
  }, async (request, reply) => {
    const body = RefreshSchema.parse(request.body);
    const claims = jwtService.validateToken(body.token);
    const email: unknown = claims?.['email'];
    if (!claims?.sub || typeof email !== 'string') {
      throw new UnauthorizedError('Invalid or expired token');
    }

    const rolesClaim: unknown = claims['roles'];
    const roles = Array.isArray(rolesClaim)
      ? rolesClaim.filter((role): role is UserRole => role === 'Admin' || role === 'User')
      : [];

    const issued = jwtService.generateToken(claims.sub, email, roles);
    logger.info({ userId: claims.sub }, 'Token refreshed');

    const response: TokenResponse = {
      token: issued.token,
      expiresAt: issued.expiresAt.toISOString(),
      user: { id: claims.sub, email, roles },
    };
    return reply.send(response);
  });

  // POST /auth/register
  fastify.post('/register', {
    schema: {
      tags: ['Auth'],
      summary: 'Self-service registration (not offered)',
    },
  }, async () => {
    throw new UnimplementedError('Feature not implemented: This functionality is not yet available.');
  });

  // GET /auth/me
  fastify.get('/me', {
    schema: {
      tags: ['Auth'],
      summary: 'Get current user',
      description: 'Returns the identity attached to the request by the token gate.',
      security: [{ bearerAuth: [] }],
    },
  }, async (request, reply) => {
    const user = request.user;
    if (!user) {
      throw new UnauthorizedError('Authentication required');
    }

    return reply.send({
      userId: user.userId,
      email: user.email,
      roles: user.roles,
      tokenId: user.tokenId,
      issuedAt: user.issuedAt?.toISOString() ?? null,
      expiresAt: user.expiresAt.toISOString(),
    });
  });
};
