/**
 * User Service
 * Business rules over the record store: argument checks, business-rule
 * validation and mapping to the wire shape. Email uniqueness is enforced
 * by the store as part of each write.
 */

import type { CreateUserPayload, UpdateUserPayload, UserDto, UserId } from '@employee-directory/shared';
import type { UserRepository } from '../../infrastructure/database/user.repository.js';
import { createLogger, type Logger } from '../../infrastructure/logging/logger.js';
import {
  BusinessRuleViolationError,
  InvalidArgumentError,
  ServiceUnavailableError,
  isAppError,
} from '../errors/app-error.js';
import { toUserDto } from './user.model.js';
import type { UserValidationService } from './user.validation.js';

/** Capability shared by the core service and its caching decorator */
export interface UserService {
  getAllUsers(): Promise<UserDto[]>;
  getUserById(id: UserId): Promise<UserDto | null>;
  getUserByEmail(email: string): Promise<UserDto | null>;
  getUsersByDepartment(department: string): Promise<UserDto[]>;
  searchUsers(searchTerm: string): Promise<UserDto[]>;
  createUser(input: CreateUserPayload): Promise<UserDto>;
  updateUser(id: UserId, patch: UpdateUserPayload): Promise<UserDto | null>;
  deleteUser(id: UserId): Promise<boolean>;
}

function requirePositiveId(id: UserId): void {
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError('User ID must be greater than zero.');
  }
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

export class DefaultUserService implements UserService {
  private readonly logger: Logger;

  constructor(
    private readonly repository: UserRepository,
    private readonly validation: UserValidationService,
    logger: Logger = createLogger('user-service')
  ) {
    this.logger = logger;
  }

  async getAllUsers(): Promise<UserDto[]> {
    return this.guard('retrieving users', async () => {
      const users = await this.repository.list();
      this.logger.debug({ count: users.length }, 'Retrieved active users');
      return users.map(toUserDto);
    });
  }

  async getUserById(id: UserId): Promise<UserDto | null> {
    return this.guard('retrieving the user', async () => {
      requirePositiveId(id);
      const user = await this.repository.getById(id);
      if (!user) {
        this.logger.debug({ userId: id }, 'User not found');
        return null;
      }
      return toUserDto(user);
    });
  }

  async getUserByEmail(email: string): Promise<UserDto | null> {
    return this.guard('retrieving user by email', async () => {
      if (isBlank(email)) {
        throw new InvalidArgumentError('Email cannot be empty.');
      }
      const user = await this.repository.getByEmail(email);
      return user ? toUserDto(user) : null;
    });
  }

  async getUsersByDepartment(department: string): Promise<UserDto[]> {
    return this.guard('retrieving users by department', async () => {
      if (isBlank(department)) {
        throw new InvalidArgumentError('Department cannot be empty.');
      }
      const users = await this.repository.byDepartment(department);
      return users.map(toUserDto);
    });
  }

  async searchUsers(searchTerm: string): Promise<UserDto[]> {
    if (isBlank(searchTerm)) {
      return this.getAllUsers();
    }
    return this.guard('searching users', async () => {
      const users = await this.repository.search(searchTerm);
      this.logger.debug({ searchTerm, count: users.length }, 'Search completed');
      return users.map(toUserDto);
    });
  }

  async createUser(input: CreateUserPayload): Promise<UserDto> {
    return this.guard('creating user', async () => {
      const outcome = this.validation.validateCreate(input);
      if (!outcome.valid) {
        this.logger.warn({ errors: outcome.errors }, 'User creation failed business validation');
        throw new BusinessRuleViolationError(`Validation failed: ${outcome.errors.join('; ')}`);
      }

      const created = await this.repository.create(input);
      this.logger.info({ userId: created.id }, 'User created');
      return toUserDto(created);
    });
  }

  async updateUser(id: UserId, patch: UpdateUserPayload): Promise<UserDto | null> {
    return this.guard('updating the user', async () => {
      requirePositiveId(id);

      const existing = await this.repository.getById(id);
      if (!existing) {
        this.logger.debug({ userId: id }, 'User to update not found');
        return null;
      }

      const outcome = this.validation.validateUpdate(patch, existing);
      if (!outcome.valid) {
        this.logger.warn({ userId: id, errors: outcome.errors }, 'User update failed business validation');
        throw new BusinessRuleViolationError(`Validation failed: ${outcome.errors.join('; ')}`);
      }

      const updated = await this.repository.update(id, patch);
      if (!updated) {
        return null;
      }
      this.logger.info({ userId: id }, 'User updated');
      return toUserDto(updated);
    });
  }

  async deleteUser(id: UserId): Promise<boolean> {
    return this.guard('deleting the user', async () => {
      requirePositiveId(id);
      const deleted = await this.repository.softDelete(id);
      if (deleted) {
        this.logger.info({ userId: id }, 'User deactivated');
      } else {
        this.logger.debug({ userId: id }, 'User to delete not found');
      }
      return deleted;
    });
  }

  /**
   * Application errors pass through; anything else is logged and
   * replaced by a generic ServiceUnavailableError carrying it as cause.
   */
  private async guard<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      this.logger.error({ err: error, operation }, 'Unexpected error in user service');
      throw new ServiceUnavailableError(
        `An error occurred while ${operation}. Please try again later.`,
        { cause: error }
      );
    }
  }
}
