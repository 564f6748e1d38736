/**
 * Fastify Server Configuration
 * Composition root: builds the store, cache and services once and wires
 * them into the plugins, hooks and routes.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Config } from '../../config/index.js';
import { JwtService } from '../../application/auth/jwt.service.js';
import { TooManyRequestsError } from '../../application/errors/app-error.js';
import { CachedUserService, type CachedUserValue } from '../../application/users/cached-user.service.js';
import type { UserRecord } from '../../application/users/user.model.js';
import { DefaultUserService, type UserService } from '../../application/users/user.service.js';
import { UserValidationService } from '../../application/users/user.validation.js';
import { MemoryCache } from '../cache/memory-cache.js';
import { InMemoryUserRepository, type UserRepository } from '../database/user.repository.js';
import { loadSeedUsers } from '../database/seed.js';
import { createLogger } from '../logging/logger.js';
import { createTokenValidationHook } from './middleware/auth.middleware.js';
import { createErrorHandler, createNotFoundHandler, RATE_LIMITED_MESSAGE } from './middleware/error-handler.js';
import { registerRequestLogging } from './middleware/request-logging.js';
import { authRoutes } from './routes/auth.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import { userRoutes } from './routes/user.routes.js';

const logger = createLogger('http-server');

export const SERVICE_NAME = 'Employee Directory API';
export const API_VERSION = '1.0.0';

/** Collaborators a caller may supply instead of the defaults */
export interface ServerDependencies {
  repository?: UserRepository;
  cache?: MemoryCache<CachedUserValue>;
  userService?: UserService;
  jwtService?: JwtService;
}

async function createRepository(config: Config): Promise<UserRepository> {
  let seed: UserRecord[] = [];
  if (config.data.seedSampleData) {
    seed = await loadSeedUsers(config.data.seedFile);
  }
  return new InMemoryUserRepository(seed);
}

export async function createServer(
  config: Config,
  dependencies: ServerDependencies = {}
): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    connectionTimeout: 30000,
    keepAliveTimeout: 10000,
    // Long enough that oversized emails and departments reach their own 400 checks
    maxParamLength: 1000,
    bodyLimit: 1024 * 1024, // 1MB
  });

  const repository = dependencies.repository ?? (await createRepository(config));
  const cache =
    dependencies.cache ??
    new MemoryCache<CachedUserValue>({
      sizeLimit: config.cache.sizeLimit,
      compactionPercentage: config.cache.compactionPercentage,
    });
  const userService =
    dependencies.userService ??
    new CachedUserService(new DefaultUserService(repository, new UserValidationService()), cache);
  const jwtService = dependencies.jwtService ?? new JwtService(config.auth);

  if (config.http.enableSwagger) {
    // Swagger/OpenAPI documentation
    await server.register(swagger, {
      openapi: {
        info: {
          title: SERVICE_NAME,
          description: 'Employee records with a read-through cache and JWT authentication',
          version: API_VERSION,
        },
        servers: [
          { url: `http://localhost:${config.server.port}`, description: 'Development' },
        ],
        components: {
          securitySchemes: {
            bearerAuth: {
              type: 'http',
              scheme: 'bearer',
              bearerFormat: 'JWT',
              description: 'Token from POST /api/auth/login',
            },
          },
        },
        security: [{ bearerAuth: [] }],
        tags: [
          { name: 'Users', description: 'Employee record endpoints' },
          { name: 'Auth', description: 'Authentication endpoints' },
          { name: 'Health', description: 'Health check endpoints' },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/swagger',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // Security middleware
  await server.register(helmet, {
    contentSecurityPolicy: false, // Disable for API-only server
  });

  await server.register(cors, {
    origin: config.http.corsOrigins.includes('*') ? true : [...config.http.corsOrigins],
    credentials: true,
  });

  await server.register(cookie);

  await server.register(rateLimit, {
    global: true,
    max: config.http.rateLimitMax,
    timeWindow: '1 minute',
    errorResponseBuilder: () => new TooManyRequestsError(RATE_LIMITED_MESSAGE),
  });

  registerRequestLogging(server);

  server.addHook('onRequest', createTokenValidationHook({
    jwtService,
    publicPaths: config.auth.publicPaths,
    publicExactPaths: config.auth.publicExactPaths,
  }));

  server.setErrorHandler(createErrorHandler({ env: config.env }));
  server.setNotFoundHandler(createNotFoundHandler({ env: config.env }));

  // Register routes
  await server.register(healthRoutes, { serviceName: SERVICE_NAME, version: API_VERSION });
  await server.register(authRoutes, {
    prefix: '/api/auth',
    jwtService,
    userService,
    enableTestEndpoints: config.auth.enableTestEndpoints,
  });
  await server.register(userRoutes, { prefix: '/api/users', userService });

  logger.info('Routes registered');
  return server;
}
