/**
 * Health Check and Service Info Routes
 * Both are reachable without credentials.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { HealthCheckResponse, ServiceInfoResponse } from '@employee-directory/shared';

export interface HealthRoutesOptions {
  serviceName: string;
  version: string;
}

export const API_ENDPOINTS: readonly string[] = [
  'GET /api/users - Get all users',
  'GET /api/users/{id} - Get user by ID',
  'GET /api/users/email/{email} - Get user by email',
  'GET /api/users/department/{department} - Get users by department',
  'GET /api/users/search?searchTerm={term} - Search users',
  'POST /api/users - Create new user',
  'PUT /api/users/{id} - Update user',
  'DELETE /api/users/{id} - Delete user',
];

const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['Healthy'] },
    service: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
  },
} as const;

const serviceInfoResponseSchema = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    documentation: { type: 'string' },
    version: { type: 'string' },
    endpoints: { type: 'array', items: { type: 'string' } },
  },
} as const;

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  options
): Promise<void> => {
  // GET /health - Liveness check
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Service health check',
      description: 'Reports that the process is up and serving requests.',
      response: {
        200: healthResponseSchema,
      },
    },
  }, async (_request, reply) => {
    const response: HealthCheckResponse = {
      status: 'Healthy',
      service: options.serviceName,
      timestamp: new Date().toISOString(),
    };

    return reply.send(response);
  });

  // GET /api - Service metadata
  fastify.get('/api', {
    schema: {
      tags: ['Health'],
      summary: 'Service information',
      description: 'Welcome message, documentation location and the list of user endpoints.',
      response: {
        200: serviceInfoResponseSchema,
      },
    },
  }, async (_request, reply) => {
    const response: ServiceInfoResponse = {
      message: `Welcome to ${options.serviceName}`,
      documentation: '/swagger',
      version: options.version,
      endpoints: API_ENDPOINTS,
    };

    return reply.send(response);
  });
};
