/**
 * Sample employee records loaded into the store at startup
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { UserRecord } from '../../application/users/user.model.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('seed');

const SeedUserSchema = z.object({
  id: z.number().int().positive(),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().email(),
  phoneNumber: z.string().nullable().default(null),
  department: z.string().min(1),
  position: z.string().min(1),
  address: z.string().nullable().default(null),
  salary: z.number().nullable().default(null),
  hireDate: z.coerce.date().nullable().default(null),
  createdDate: z.coerce.date(),
});

const SeedFileSchema = z.array(SeedUserSchema);

export function parseSeedUsers(raw: unknown): UserRecord[] {
  return SeedFileSchema.parse(raw).map((user) => ({
    ...user,
    updatedDate: null,
    isActive: true,
  }));
}

export async function loadSeedUsers(file: string): Promise<UserRecord[]> {
  const resolved = path.resolve(process.cwd(), file);
  const content = await readFile(resolved, 'utf-8');
  const users = parseSeedUsers(JSON.parse(content));
  logger.debug({ file: resolved, count: users.length }, 'Loaded seed users');
  return users;
}
