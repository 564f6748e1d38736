/**
 * User Repository
 * In-memory record store. Records are soft-deleted and never removed;
 * every read path sees active records only.
 */

import type { CreateUserPayload, UpdateUserPayload, UserId } from '@employee-directory/shared';
import { ConflictError, InvalidArgumentError } from '../../application/errors/app-error.js';
import { cloneUserRecord, type UserRecord } from '../../application/users/user.model.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('user-repository');

export interface UserRepository {
  list(): Promise<UserRecord[]>;
  getById(id: UserId): Promise<UserRecord | null>;
  getByEmail(email: string): Promise<UserRecord | null>;
  /** Rejects with ConflictError when an active record already holds the email */
  create(input: CreateUserPayload): Promise<UserRecord>;
  /**
   * Resolves null when no record has the id, active or not.
   * Rejects with ConflictError when another active record holds the new email.
   */
  update(id: UserId, patch: UpdateUserPayload): Promise<UserRecord | null>;
  softDelete(id: UserId): Promise<boolean>;
  exists(id: UserId): Promise<boolean>;
  emailExists(email: string, excludeId?: UserId): Promise<boolean>;
  byDepartment(department: string): Promise<UserRecord[]>;
  search(term: string): Promise<UserRecord[]>;
}

function requirePositiveId(id: UserId): void {
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError('User ID must be greater than zero.');
  }
}

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === '';
}

function byName(a: UserRecord, b: UserRecord): number {
  return a.lastName.localeCompare(b.lastName) || a.firstName.localeCompare(b.firstName);
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users: UserRecord[] = [];
  private lastId = 0;

  constructor(seed: readonly UserRecord[] = []) {
    for (const record of seed) {
      this.users.push(cloneUserRecord(record));
      this.lastId = Math.max(this.lastId, record.id);
    }
    if (seed.length > 0) {
      logger.info({ count: seed.length }, 'Seeded user store');
    }
  }

  async list(): Promise<UserRecord[]> {
    return this.activeUsers().sort(byName).map(cloneUserRecord);
  }

  async getById(id: UserId): Promise<UserRecord | null> {
    requirePositiveId(id);
    const user = this.users.find((u) => u.id === id && u.isActive);
    return user ? cloneUserRecord(user) : null;
  }

  async getByEmail(email: string): Promise<UserRecord | null> {
    if (isBlank(email)) {
      throw new InvalidArgumentError('Email cannot be empty.');
    }
    const normalized = email.toLowerCase();
    const user = this.activeUsers().find((u) => u.email.toLowerCase() === normalized);
    return user ? cloneUserRecord(user) : null;
  }

  async create(input: CreateUserPayload): Promise<UserRecord> {
    this.assertEmailAvailable(input.email);
    const record: UserRecord = {
      id: ++this.lastId,
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      phoneNumber: input.phoneNumber ?? null,
      department: input.department,
      position: input.position,
      address: input.address ?? null,
      salary: input.salary ?? null,
      hireDate: input.hireDate ? new Date(input.hireDate.getTime()) : null,
      createdDate: new Date(),
      updatedDate: null,
      isActive: true,
    };
    this.users.push(record);
    logger.debug({ userId: record.id }, 'User record created');
    return cloneUserRecord(record);
  }

  async update(id: UserId, patch: UpdateUserPayload): Promise<UserRecord | null> {
    requirePositiveId(id);
    const existing = this.users.find((u) => u.id === id);
    if (!existing) {
      return null;
    }
    if (patch.email !== undefined && !isBlank(patch.email)) {
      this.assertEmailAvailable(patch.email, id);
    }

    if (patch.firstName !== undefined && !isBlank(patch.firstName)) existing.firstName = patch.firstName;
    if (patch.lastName !== undefined && !isBlank(patch.lastName)) existing.lastName = patch.lastName;
    if (patch.email !== undefined && !isBlank(patch.email)) existing.email = patch.email;
    if (patch.phoneNumber !== undefined && !isBlank(patch.phoneNumber)) existing.phoneNumber = patch.phoneNumber;
    if (patch.department !== undefined && !isBlank(patch.department)) existing.department = patch.department;
    if (patch.position !== undefined && !isBlank(patch.position)) existing.position = patch.position;
    if (patch.address !== undefined && !isBlank(patch.address)) existing.address = patch.address;
    if (patch.salary !== undefined) existing.salary = patch.salary;
    if (patch.hireDate !== undefined) existing.hireDate = new Date(patch.hireDate.getTime());

    existing.updatedDate = new Date();
    return cloneUserRecord(existing);
  }

  async softDelete(id: UserId): Promise<boolean> {
    requirePositiveId(id);
    const existing = this.users.find((u) => u.id === id);
    if (!existing) {
      return false;
    }
    existing.isActive = false;
    existing.updatedDate = new Date();
    logger.debug({ userId: id }, 'User record deactivated');
    return true;
  }

  async exists(id: UserId): Promise<boolean> {
    requirePositiveId(id);
    return this.users.some((u) => u.id === id);
  }

  async emailExists(email: string, excludeId?: UserId): Promise<boolean> {
    if (isBlank(email)) {
      throw new InvalidArgumentError('Email cannot be empty.');
    }
    return this.isEmailTaken(email, excludeId);
  }

  async byDepartment(department: string): Promise<UserRecord[]> {
    if (isBlank(department)) {
      throw new InvalidArgumentError('Department cannot be empty.');
    }
    const normalized = department.toLowerCase();
    return this.activeUsers()
      .filter((u) => u.department.toLowerCase() === normalized)
      .sort(byName)
      .map(cloneUserRecord);
  }

  async search(term: string): Promise<UserRecord[]> {
    if (isBlank(term)) {
      return this.list();
    }
    const needle = term.toLowerCase();
    return this.activeUsers()
      .filter((u) =>
        [u.firstName, u.lastName, u.email, u.department, u.position].some((field) =>
          field.toLowerCase().includes(needle)
        )
      )
      .sort(byName)
      .map(cloneUserRecord);
  }

  private isEmailTaken(email: string, excludeId?: UserId): boolean {
    const normalized = email.toLowerCase();
    return this.activeUsers().some(
      (u) => u.email.toLowerCase() === normalized && (excludeId === undefined || u.id !== excludeId)
    );
  }

  // Checked in the same synchronous step as the write that follows it
  private assertEmailAvailable(email: string, excludeId?: UserId): void {
    if (this.isEmailTaken(email, excludeId)) {
      logger.warn({ email, userId: excludeId }, 'Rejected write with an email already in use');
      throw new ConflictError(`A user with email '${email}' already exists.`);
    }
  }

  private activeUsers(): UserRecord[] {
    return this.users.filter((u) => u.isActive);
  }
}
