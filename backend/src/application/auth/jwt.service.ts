/**
 * JWT Service
 * Issues and verifies HS256 tokens with jsonwebtoken.
 *
 * Two verification profiles:
 * - verifyForGate: what the request gate accepts (issuer/audience when
 *   configured, clock tolerance, required claims)
 * - validateToken: signature and lifetime only, no tolerance
 */

import { randomUUID } from 'crypto';
import jwt, { type JwtPayload, type SignOptions, type VerifyOptions } from 'jsonwebtoken';
import type { UserRole } from '@employee-directory/shared';
import type { AuthConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { UnauthorizedError } from '../errors/app-error.js';

const logger = createLogger('jwt-service');

const ALGORITHM = 'HS256';

export const TOKEN_EXPIRED_MESSAGE = 'Token has expired';
export const TOKEN_INVALID_MESSAGE = 'Invalid authorization token';

/** Identity the gate attaches to an authenticated request */
export interface AuthenticatedUser {
  userId: string;
  email: string;
  roles: string[];
  tokenId: string | null;
  issuedAt: Date | null;
  expiresAt: Date;
  claims: JwtPayload;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

function rolesOf(payload: JwtPayload): string[] {
  const roles: unknown = payload['roles'];
  if (typeof roles === 'string') {
    return [roles];
  }
  if (Array.isArray(roles)) {
    return roles.filter((role): role is string => typeof role === 'string');
  }
  return [];
}

function stringClaim(payload: JwtPayload, claim: string): string | null {
  const value: unknown = payload[claim];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export class JwtService {
  constructor(private readonly config: AuthConfig) {}

  generateToken(userId: string | number, email: string, roles: readonly UserRole[] = []): IssuedToken {
    const expiresInSeconds = this.config.expirationHours * 60 * 60;
    const options: SignOptions = {
      algorithm: ALGORITHM,
      subject: String(userId),
      jwtid: randomUUID(),
      expiresIn: expiresInSeconds,
    };
    if (this.config.issuer) {
      options.issuer = this.config.issuer;
    }
    if (this.config.audience) {
      options.audience = this.config.audience;
    }

    const payload: Record<string, unknown> = { email };
    if (roles.length > 0) {
      payload['roles'] = [...roles];
    }

    const token = jwt.sign(payload, this.config.jwtSecret, options);
    const decoded = jwt.decode(token, { json: true });
    const exp = decoded?.exp ?? Math.floor(Date.now() / 1000) + expiresInSeconds;

    logger.debug({ userId: String(userId) }, 'Token issued');
    return { token, expiresAt: new Date(exp * 1000) };
  }

  /**
   * Verify a token for the request gate.
   * Throws UnauthorizedError with TOKEN_EXPIRED_MESSAGE or TOKEN_INVALID_MESSAGE;
   * anything else it throws is unexpected.
   */
  verifyForGate(token: string): AuthenticatedUser {
    const options: VerifyOptions = {
      algorithms: [ALGORITHM],
      clockTolerance: this.config.clockSkewSeconds,
    };
    if (this.config.issuer) {
      options.issuer = this.config.issuer;
    }
    if (this.config.audience) {
      options.audience = this.config.audience;
    }

    let payload: JwtPayload;
    try {
      const verified = jwt.verify(token, this.config.jwtSecret, options);
      if (typeof verified === 'string') {
        throw new UnauthorizedError(TOKEN_INVALID_MESSAGE);
      }
      payload = verified;
    } catch (error) {
      if (error instanceof UnauthorizedError) throw error;

      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError(TOKEN_EXPIRED_MESSAGE, { cause: error });
      }
      if (error instanceof jwt.JsonWebTokenError || error instanceof jwt.NotBeforeError) {
        logger.debug({ reason: error.message }, 'Token verification failed');
        throw new UnauthorizedError(TOKEN_INVALID_MESSAGE, { cause: error });
      }
      throw error;
    }

    const userId = stringClaim(payload, 'sub');
    const email = stringClaim(payload, 'email');
    if (typeof payload.exp !== 'number' || !userId || !email) {
      logger.warn({ hasSub: !!userId, hasEmail: !!email, hasExp: typeof payload.exp === 'number' }, 'Missing required claim');
      throw new UnauthorizedError(TOKEN_INVALID_MESSAGE);
    }

    return {
      userId,
      email,
      roles: rolesOf(payload),
      tokenId: stringClaim(payload, 'jti'),
      issuedAt: typeof payload.iat === 'number' ? new Date(payload.iat * 1000) : null,
      expiresAt: new Date(payload.exp * 1000),
      claims: payload,
    };
  }

  /** Verify signature and lifetime only; null when the token is not acceptable */
  validateToken(token: string): JwtPayload | null {
    try {
      const verified = jwt.verify(token, this.config.jwtSecret, {
        algorithms: [ALGORITHM],
        clockTolerance: 0,
      });
      return typeof verified === 'string' ? null : verified;
    } catch (error) {
      logger.debug({ reason: error instanceof Error ? error.message : String(error) }, 'Token validation failed');
      return null;
    }
  }
}
