/**
 * User Routes
 * CRUD, lookup and search over employee records.
 * Bodies are parsed with zod; failures reach the error handler.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { UserService } from '../../../application/users/user.service.js';
import {
  parseCreateUser,
  parseDepartmentLookup,
  parseEmailLookup,
  parseSearchTerm,
  parseUpdateUser,
} from '../../../application/users/user.schemas.js';
import { NotFoundError } from '../../../application/errors/app-error.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('user-routes');

export interface UserRoutesOptions {
  userService: UserService;
}

// Integer ids only; anything else falls through to the 404 handler
const ID_PARAM = ':id(^-?\\d+$)';

interface IdParams {
  id: string;
}

const SearchQuerySchema = z.object({
  searchTerm: z.string().optional(),
});

const idParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'User ID' },
  },
} as const;

export const userRoutes: FastifyPluginAsync<UserRoutesOptions> = async (
  fastify: FastifyInstance,
  options
): Promise<void> => {
  const { userService } = options;

  // GET /api/users
  fastify.get('/', {
    schema: {
      tags: ['Users'],
      summary: 'List active users',
      description: 'Returns every active user ordered by last name, then first name.',
    },
  }, async (_request, reply) => {
    const users = await userService.getAllUsers();
    return reply.send(users);
  });

  // GET /api/users/email/:email
  fastify.get<{ Params: { email: string } }>('/email/:email', {
    schema: {
      tags: ['Users'],
      summary: 'Get user by email',
    },
  }, async (request, reply) => {
    const email = parseEmailLookup(request.params.email);
    const user = await userService.getUserByEmail(email);
    if (!user) {
      throw new NotFoundError(`User with email ${email} not found`);
    }
    return reply.send(user);
  });

  // GET /api/users/department/:department
  fastify.get<{ Params: { department: string } }>('/department/:department', {
    schema: {
      tags: ['Users'],
      summary: 'List users in a department',
    },
  }, async (request, reply) => {
    const department = parseDepartmentLookup(request.params.department);
    const users = await userService.getUsersByDepartment(department);
    return reply.send(users);
  });

  // GET /api/users/search?searchTerm=
  fastify.get('/search', {
    schema: {
      tags: ['Users'],
      summary: 'Search users',
      description: 'Case-insensitive substring match over name, email, department and position.',
    },
  }, async (request, reply) => {
    const query = SearchQuerySchema.parse(request.query);
    const searchTerm = parseSearchTerm(query.searchTerm);
    const users = await userService.searchUsers(searchTerm);
    return reply.send(users);
  });

  // GET /api/users/:id
  fastify.get<{ Params: IdParams }>(`/${ID_PARAM}`, {
    schema: {
      tags: ['Users'],
      summary: 'Get user by ID',
      params: idParamsSchema,
    },
  }, async (request, reply) => {
    const id = Number(request.params.id);
    const user = await userService.getUserById(id);
    if (!user) {
      throw new NotFoundError(`User with ID ${id} not found`);
    }
    return reply.send(user);
  });

  // POST /api/users
  fastify.post('/', {
    schema: {
      tags: ['Users'],
      summary: 'Create user',
    },
  }, async (request, reply) => {
    const input = parseCreateUser(request.body);
    const user = await userService.createUser(input);

    logger.info({ userId: user.id }, 'User created via API');
    return reply
      .status(201)
      .header('location', `/api/users/${user.id}`)
      .send(user);
  });

  // PUT /api/users/:id
  fastify.put<{ Params: IdParams }>(`/${ID_PARAM}`, {
    schema: {
      tags: ['Users'],
      summary: 'Update user',
      description: 'Applies only the supplied fields.',
      params: idParamsSchema,
    },
  }, async (request, reply) => {
    const id = Number(request.params.id);
    const patch = parseUpdateUser(request.body);
    const user = await userService.updateUser(id, patch);
    if (!user) {
      throw new NotFoundError(`User with ID ${id} not found`);
    }
    return reply.send(user);
  });

  // DELETE /api/users/:id
  fastify.delete<{ Params: IdParams }>(`/${ID_PARAM}`, {
    schema: {
      tags: ['Users'],
      summary: 'Deactivate user',
      params: idParamsSchema,
    },
  }, async (request, reply) => {
    const id = Number(request.params.id);
    const deleted = await userService.deleteUser(id);
    if (!deleted) {
      throw new NotFoundError(`User with ID ${id} not found`);
    }
    return reply.status(204).send();
  });
};
