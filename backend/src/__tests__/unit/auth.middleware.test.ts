/**
 * Unit Tests: Auth Middleware
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import jwt from 'jsonwebtoken';
import { JwtService } from '../../application/auth/jwt.service.js';
import {
  AUTHENTICATION_ERROR_MESSAGE,
  MISSING_TOKEN_MESSAGE,
  createTokenValidationHook,
  extractToken,
  isPublicPath,
} from '../../infrastructure/http/middleware/auth.middleware.js';
import type { AuthConfig } from '../../config/index.js';

const authConfig: AuthConfig = {
  jwtSecret: 'test-secret',
  issuer: '',
  audience: '',
  expirationHours: 1,
  clockSkewSeconds: 300,
  publicPaths: ['/health', '/swagger', '/api/auth/login'],
  publicExactPaths: ['/api'],
  enableTestEndpoints: false,
};

describe('Auth Middleware', () => {
  describe('isPublicPath', () => {
    const check = (url: string): boolean =>
      isPublicPath(url, authConfig.publicPaths, authConfig.publicExactPaths);

    it('should match prefixes on whole path segments', () => {
      expect(check('/health')).toBe(true);
      expect(check('/swagger/index.html')).toBe(true);
      expect(check('/healthz')).toBe(false);
    });

    it('should ignore case, trailing slashes and query strings', () => {
      expect(check('/HEALTH/')).toBe(true);
      expect(check('/api/auth/login?next=%2Fapi')).toBe(true);
    });

    it('should only match exact paths exactly', () => {
      expect(check('/api')).toBe(true);
      expect(check('/api/')).toBe(true);
      expect(check('/api/users')).toBe(false);
    });
  });

  describe('token validation hook', () => {
    let server: FastifyInstance;
    let jwtService: JwtService;

    beforeEach(async () => {
      jwtService = new JwtService(authConfig);
      server = Fastify({ logger: false });
      await server.register(cookie);
      server.addHook('onRequest', createTokenValidationHook({
        jwtService,
        publicPaths: authConfig.publicPaths,
        publicExactPaths: authConfig.publicExactPaths,
      }));
      server.get('/health', async () => ({ status: 'Healthy' }));
      server.get('/api/users', async (request) => ({
        userId: request.user?.userId ?? null,
        token: extractToken(request),
      }));
      await server.ready();
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await server.close();
    });

    it('should let public paths through without a token', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
    });

    it('should reject a request without a token', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/users?page=2' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        error: 'Unauthorized access',
        message: MISSING_TOKEN_MESSAGE,
        statusCode: 401,
        path: '/api/users',
        method: 'GET',
        traceId: expect.any(String),
      });
    });

    it('should attach the identity for a valid bearer token', async () => {
      const { token } = jwtService.generateToken(11, 'marcus.okafor@company.com');

      const response = await server.inject({
        method: 'GET',
        url: '/api/users',
        headers: { authorization: `bearer ${token}` },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ userId: '11', token });
    });

    it('should fall back to the access_token query parameter', async () => {
      const { token } = jwtService.generateToken(12, 'marcus.okafor@company.com');

      const response = await server.inject({ method: 'GET', url: `/api/users?access_token=${token}` });

      expect(response.json()).toEqual({ userId: '12', token });
    });

    it('should fall back to the auth_token cookie', async () => {
      const { token } = jwtService.generateToken(13, 'marcus.okafor@company.com');

      const response = await server.inject({ method: 'GET', url: '/api/users', cookies: { auth_token: token } });

      expect(response.json()).toEqual({ userId: '13', token });
    });

    it('should prefer the header over the query and cookie', async () => {
      const header = jwtService.generateToken(1, 'alice.nguyen@company.com').token;
      const query = jwtService.generateToken(2, 'alice.nguyen@company.com').token;

      const response = await server.inject({
        method: 'GET',
        url: `/api/users?access_token=${query}`,
        headers: { authorization: `Bearer ${header}` },
        cookies: { auth_token: query },
      });

      expect(response.json()).toEqual({ userId: '1', token: header });
    });

    it('should report an expired token', async () => {
      const token = jwt.sign(
        { sub: '1', email: 'alice.nguyen@company.com', exp: Math.floor(Date.now() / 1000) - 600 },
        'test-secret'
      );

      const response = await server.inject({
        method: 'GET',
        url: '/api/users',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Token has expired');
    });

    it('should report a token with a bad signature as invalid', async () => {
      const token = jwt.sign({ sub: '1', email: 'alice.nguyen@company.com' }, 'another-secret', { expiresIn: 60 });

      const response = await server.inject({
        method: 'GET',
        url: '/api/users',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Invalid authorization token');
    });

    it('should hide unexpected verification failures behind a generic message', async () => {
      vi.spyOn(jwtService, 'verifyForGate').mockImplementation(() => {
        throw new Error('key store unavailable');
      });

      const response = await server.inject({
        method: 'GET',
        url: '/api/users',
        headers: { authorization: 'Bearer some-token' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe(AUTHENTICATION_ERROR_MESSAGE);
    });
  });
});
