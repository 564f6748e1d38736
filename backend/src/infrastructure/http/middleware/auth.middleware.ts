/**
 * Token Validation Middleware
 * Runs on every request before routing. Public paths pass through;
 * everything else needs a valid bearer token, taken from the
 * Authorization header, the access_token query parameter or the
 * auth_token cookie, in that order.
 */

import type { FastifyReply, FastifyRequest, onRequestAsyncHookHandler } from 'fastify';
import type { UnauthorizedResponseBody } from '@employee-directory/shared';
import type { AuthenticatedUser, JwtService } from '../../../application/auth/jwt.service.js';
import { isAppError } from '../../../application/errors/app-error.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-middleware');

// Extend FastifyRequest to include user info
declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}

export const MISSING_TOKEN_MESSAGE = 'Missing authorization token';
export const AUTHENTICATION_ERROR_MESSAGE = 'Authentication error occurred';

const BEARER_PATTERN = /^Bearer\s+(.+)$/i;

export interface TokenValidationOptions {
  jwtService: JwtService;
  /** Public along with every path below them */
  publicPaths: readonly string[];
  /** Public only on an exact match */
  publicExactPaths: readonly string[];
}

function normalizePath(url: string): string {
  const path = (url.split('?')[0] ?? '').toLowerCase();
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

export function isPublicPath(
  url: string,
  publicPaths: readonly string[],
  publicExactPaths: readonly string[]
): boolean {
  const path = normalizePath(url);
  if (publicExactPaths.some((entry) => normalizePath(entry) === path)) {
    return true;
  }
  return publicPaths.some((entry) => {
    const prefix = normalizePath(entry);
    return path === prefix || path.startsWith(`${prefix}/`);
  });
}

/**
 * Extract token from Authorization header, query string or cookie
 */
export function extractToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (authHeader) {
    const match = BEARER_PATTERN.exec(authHeader.trim());
    const token = match?.[1]?.trim();
    if (token) {
      return token;
    }
  }

  const queryIndex = request.url.indexOf('?');
  if (queryIndex >= 0) {
    const fromQuery = new URLSearchParams(request.url.slice(queryIndex + 1)).get('access_token');
    if (fromQuery) {
      return fromQuery;
    }
  }

  const fromCookie = request.cookies?.['auth_token'];
  if (fromCookie) {
    return fromCookie;
  }

  return null;
}

function sendUnauthorized(request: FastifyRequest, reply: FastifyReply, message: string): FastifyReply {
  logger.warn({
    reason: message,
    method: request.method,
    path: normalizePath(request.url),
    remoteAddress: request.ip,
  }, 'Unauthorized access attempt');

  const body: UnauthorizedResponseBody = {
    error: 'Unauthorized access',
    message,
    statusCode: 401,
    timestamp: new Date().toISOString(),
    path: request.url.split('?')[0] ?? request.url,
    method: request.method,
    traceId: request.id,
  };
  return reply.status(401).send(body);
}

/**
 * Build the onRequest hook that authenticates requests
 */
export function createTokenValidationHook(options: TokenValidationOptions): onRequestAsyncHookHandler {
  const { jwtService, publicPaths, publicExactPaths } = options;

  return async function validateToken(request, reply) {
    if (isPublicPath(request.url, publicPaths, publicExactPaths)) {
      return;
    }

    const token = extractToken(request);
    if (!token) {
      return sendUnauthorized(request, reply, MISSING_TOKEN_MESSAGE);
    }

    let user: AuthenticatedUser;
    try {
      user = jwtService.verifyForGate(token);
    } catch (error) {
      if (isAppError(error)) {
        return sendUnauthorized(request, reply, error.message);
      }
      logger.error({ err: error }, 'Unexpected error during token validation');
      return sendUnauthorized(request, reply, AUTHENTICATION_ERROR_MESSAGE);
    }

    request.user = user;
    logger.info({
      userId: user.userId,
      method: request.method,
      path: normalizePath(request.url),
    }, 'User authenticated');
  };
}
