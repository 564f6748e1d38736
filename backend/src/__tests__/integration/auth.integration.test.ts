/**
 * Integration Tests: Auth API
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { TokenResponse } from '@employee-directory/shared';
import { createServer } from '../../infrastructure/http/server.js';
import { JwtService } from '../../application/auth/jwt.service.js';
import { loadConfig, type Config } from '../../config/index.js';
import { createUserPayload } from '../setup.js';

describe('Auth API Integration', () => {
  let config: Config;
  let server: FastifyInstance;

  async function seedUser(): Promise<void> {
    const { token } = new JwtService(config.auth).generateToken(100, 'admin.desk@company.com', ['Admin']);
    const response = await server.inject({
      method: 'POST',
      url: '/api/users',
      headers: { authorization: `Bearer ${token}` },
      payload: createUserPayload(),
    });
    expect(response.statusCode).toBe(201);
  }

  afterEach(async () => {
    await server.close();
  });

  describe('with test endpoints enabled', () => {
    beforeEach(async () => {
      config = loadConfig();
      server = await createServer({ ...config, auth: { ...config.auth, enableTestEndpoints: true } });
      await server.ready();
    });

    it('should issue a token for an active user', async () => {
      await seedUser();

      const response = await server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'alice.nguyen@company.com' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<TokenResponse>();
      expect(body.user).toEqual({ id: '1', email: 'alice.nguyen@company.com', roles: ['User'] });
      expect(new Date(body.expiresAt).getTime()).toBeGreaterThan(Date.now());
    });

    it('should let the issued token through the gate', async () => {
      await seedUser();
      const login = await server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'alice.nguyen@company.com' },
      });

      const me = await server.inject({
        method: 'GET',
        url: '/api/auth/me',
        headers: { authorization: `Bearer ${login.json<TokenResponse>().token}` },
      });

      expect(me.statusCode).toBe(200);
      expect(me.json()).toMatchObject({ userId: '1', email: 'alice.nguyen@company.com', roles: ['User'] });
    });

    it('should refuse an unknown email', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'nobody@company.com' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toBe('Invalid credentials');
    });

    it('should reject a malformed login body', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/auth/login', payload: { email: 'nope' } });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Validation failed: email: Invalid email format');
    });
  });

  describe('with test endpoints disabled', () => {
    beforeEach(async () => {
      config = loadConfig();
      server = await createServer({ ...config, auth: { ...config.auth, enableTestEndpoints: false } });
      await server.ready();
    });

    it('should not issue tokens by email', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'alice.nguyen@company.com' },
      });

      expect(response.statusCode).toBe(501);
    });

    it('should refresh a valid token, keeping subject and roles', async () => {
      const { token } = new JwtService(config.auth).generateToken(5, 'priya.raman@company.com', ['Admin', 'User']);

      const response = await server.inject({ method: 'POST', url: '/api/auth/refresh', payload: { token } });

      expect(response.statusCode).toBe(200);
      const body = response.json<TokenResponse>();
      expect(body.user).toEqual({ id: '5', email: 'priya.raman@company.com', roles: ['Admin', 'User'] });
      expect(body.token).not.toBe(token);
    });

    it('should refuse to refresh a forged token', async () => {
      const forged = new JwtService({ ...config.auth, jwtSecret: 'another-secret' }).generateToken(
        5,
        'priya.raman@company.com'
      );

      const response = await server.inject({
        method: 'POST',
        url: '/api/auth/refresh',
        payload: { token: forged.token },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error).toBe('Invalid or expired token');
    });

    it('should not offer registration', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/auth/register', payload: {} });

      expect(response.statusCode).toBe(501);
      expect(response.json().error).toBe('Feature not implemented: This functionality is not yet available.');
    });

    it('should require a token for /api/auth/me', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/auth/me' });

      expect(response.statusCode).toBe(401);
    });
  });
});
