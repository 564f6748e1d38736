/**
 * Cached User Service
 * Read-through cache in front of another UserService.
 *
 * Reads are served from the cache and seeded on miss (including a short-lived
 * placeholder for a missing id or email). Writes go through first and, on
 * success only, remove the keys they can address directly. Department and
 * search results are left to expire on their own. Callers get copies of
 * cached values, never the stored objects.
 */

import type { CreateUserPayload, UpdateUserPayload, UserDto, UserId } from '@employee-directory/shared';
import type { CacheEntryOptions, MemoryCache } from '../../infrastructure/cache/memory-cache.js';
import { createLogger, type Logger } from '../../infrastructure/logging/logger.js';
import { cloneUserDto } from './user.model.js';
import type { UserService } from './user.service.js';

/** What the user cache stores: a single lookup (null when absent) or a list */
export type CachedUserValue =
  | { readonly kind: 'user'; readonly user: UserDto | null }
  | { readonly kind: 'list'; readonly users: UserDto[] };

const MINUTE = 60 * 1000;

export const CACHE_KEYS = {
  userById: (id: UserId): string => `user:id:${id}`,
  userByEmail: (email: string): string => `user:email:${email.toLowerCase()}`,
  usersByDepartment: (department: string): string => `users:department:${department.toLowerCase()}`,
  search: (term: string): string => `users:search:${term.toLowerCase()}`,
  allUsers: 'users:all',
} as const;

export const CACHE_POLICIES = {
  user: { absoluteExpirationMs: 5 * MINUTE, slidingExpirationMs: 2 * MINUTE, priority: 'high', size: 1 },
  notFound: { absoluteExpirationMs: 1 * MINUTE, slidingExpirationMs: 2 * MINUTE, priority: 'high', size: 1 },
  department: { absoluteExpirationMs: 10 * MINUTE, slidingExpirationMs: 3 * MINUTE, priority: 'normal', size: 5 },
  search: { absoluteExpirationMs: 2 * MINUTE, slidingExpirationMs: 1 * MINUTE, priority: 'low', size: 3 },
  allUsers: { absoluteExpirationMs: 3 * MINUTE, slidingExpirationMs: 1 * MINUTE, priority: 'normal', size: 10 },
} as const satisfies Record<string, CacheEntryOptions>;

function isBlank(value: string): boolean {
  return value.trim() === '';
}

export class CachedUserService implements UserService {
  private readonly logger: Logger;

  constructor(
    private readonly inner: UserService,
    private readonly cache: MemoryCache<CachedUserValue>,
    logger: Logger = createLogger('cached-user-service')
  ) {
    this.logger = logger;
  }

  async getAllUsers(): Promise<UserDto[]> {
    return this.readList(CACHE_KEYS.allUsers, () => this.inner.getAllUsers(), CACHE_POLICIES.allUsers);
  }

  async getUserById(id: UserId): Promise<UserDto | null> {
    return this.readUser(CACHE_KEYS.userById(id), () => this.inner.getUserById(id));
  }

  async getUserByEmail(email: string): Promise<UserDto | null> {
    if (isBlank(email)) {
      return this.inner.getUserByEmail(email);
    }
    return this.readUser(CACHE_KEYS.userByEmail(email), () => this.inner.getUserByEmail(email));
  }

  async getUsersByDepartment(department: string): Promise<UserDto[]> {
    if (isBlank(department)) {
      return this.inner.getUsersByDepartment(department);
    }
    return this.readList(
      CACHE_KEYS.usersByDepartment(department),
      () => this.inner.getUsersByDepartment(department),
      CACHE_POLICIES.department
    );
  }

  async searchUsers(searchTerm: string): Promise<UserDto[]> {
    if (isBlank(searchTerm)) {
      return this.inner.searchUsers(searchTerm);
    }
    return this.readList(
      CACHE_KEYS.search(searchTerm),
      () => this.inner.searchUsers(searchTerm),
      CACHE_POLICIES.search
    );
  }

  async createUser(input: CreateUserPayload): Promise<UserDto> {
    const created = await this.inner.createUser(input);

    this.invalidate([
      CACHE_KEYS.allUsers,
      CACHE_KEYS.usersByDepartment(created.department),
      CACHE_KEYS.userById(created.id),
      CACHE_KEYS.userByEmail(created.email),
    ]);
    this.logger.info({ userId: created.id }, 'Invalidated cache after user creation');

    return created;
  }

  async updateUser(id: UserId, patch: UpdateUserPayload): Promise<UserDto | null> {
    // The warm entry, if any, tells us which email and department keys the old state lives under
    const previous = this.peekUser(CACHE_KEYS.userById(id));

    const updated = await this.inner.updateUser(id, patch);
    if (!updated) {
      return null;
    }

    const keys = new Set<string>([
      CACHE_KEYS.userById(id),
      CACHE_KEYS.userByEmail(updated.email),
      CACHE_KEYS.allUsers,
      CACHE_KEYS.usersByDepartment(updated.department),
    ]);
    if (patch.department && !isBlank(patch.department)) {
      keys.add(CACHE_KEYS.usersByDepartment(patch.department));
    }
    if (previous) {
      keys.add(CACHE_KEYS.userByEmail(previous.email));
      keys.add(CACHE_KEYS.usersByDepartment(previous.department));
    }

    this.invalidate([...keys]);
    this.logger.info({ userId: id, keys: keys.size }, 'Invalidated cache after user update');

    return updated;
  }

  async deleteUser(id: UserId): Promise<boolean> {
    const deleted = await this.inner.deleteUser(id);
    if (deleted) {
      this.invalidate([CACHE_KEYS.userById(id), CACHE_KEYS.allUsers]);
      this.logger.info({ userId: id }, 'Invalidated cache after user deletion');
    }
    return deleted;
  }

  private async readUser(key: string, load: () => Promise<UserDto | null>): Promise<UserDto | null> {
    const cached = await this.cache.getOrCreate(
      key,
      async () => {
        const user = await load();
        return { kind: 'user', user };
      },
      // A cached miss lives for a shorter time than a hit
      (value) => (value.kind === 'user' && value.user === null ? CACHE_POLICIES.notFound : CACHE_POLICIES.user)
    );

    if (cached.kind !== 'user') {
      this.logger.warn({ key }, 'Unexpected cache entry shape, reloading');
      this.cache.remove(key);
      return load();
    }

    return cached.user ? cloneUserDto(cached.user) : null;
  }

  private async readList(
    key: string,
    load: () => Promise<UserDto[]>,
    policy: CacheEntryOptions
  ): Promise<UserDto[]> {
    const cached = await this.cache.getOrCreate(
      key,
      async () => {
        const users = await load();
        return { kind: 'list', users };
      },
      policy
    );

    if (cached.kind !== 'list') {
      this.logger.warn({ key }, 'Unexpected cache entry shape, reloading');
      this.cache.remove(key);
      return load();
    }

    return cached.users.map(cloneUserDto);
  }

  private peekUser(key: string): UserDto | null {
    const entry = this.cache.peek(key);
    return entry?.kind === 'user' ? entry.user : null;
  }

  private invalidate(keys: readonly string[]): void {
    for (const key of keys) {
      this.cache.remove(key);
    }
    this.logger.debug({ keys }, 'Removed cache keys');
  }
}
