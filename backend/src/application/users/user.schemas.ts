/**
 * Field validation for user request bodies and lookup parameters
 * Parsed by the route handlers before business-rule validation runs.
 */

import { z } from 'zod';
import type { CreateUserPayload, UpdateUserPayload } from '@employee-directory/shared';
import { InvalidArgumentError } from '../errors/app-error.js';

const INVALID_NAMES = new Set([
  'test',
  'user',
  'admin',
  'null',
  'undefined',
  'name',
  'firstname',
  'lastname',
  'john doe',
  'jane doe',
  'test user',
  'dummy',
  'sample',
  'example',
]);

const BLOCKED_EMAIL_DOMAINS = new Set([
  'tempmail.com',
  '10minutemail.com',
  'guerrillamail.com',
  'mailinator.com',
  'throwaway.email',
]);

export const APPROVED_DEPARTMENTS: readonly string[] = [
  'IT',
  'Information Technology',
  'HR',
  'Human Resources',
  'Finance',
  'Accounting',
  'Marketing',
  'Sales',
  'Operations',
  'Engineering',
  'Legal',
  'Administration',
  'Customer Service',
  'Support',
  'Research',
  'Development',
  'R&D',
  'Quality Assurance',
  'QA',
  'Security',
  'Management',
];

const approvedDepartmentKeys = new Set(APPROVED_DEPARTMENTS.map((d) => d.toLowerCase()));

const NAME_PATTERN = /^[a-zA-Z\s\-.']+$/;
const POSITION_PATTERN = /^[a-zA-Z\s\-.]+$/;
const PHONE_PATTERN = /^[+]?[1-9]?[\d\s\-()]{7,15}$/;

const MIN_SALARY = 20000;
const MAX_SALARY = 1000000;
const MINIMUM_HIRE_DATE = Date.UTC(1950, 0, 1);

function isValidName(value: string): boolean {
  const name = value.trim();
  return (
    name.length >= 2 &&
    !INVALID_NAMES.has(name.toLowerCase()) &&
    NAME_PATTERN.test(name) &&
    !/\d/.test(name)
  );
}

function isValidPhoneNumber(value: string): boolean {
  if (!PHONE_PATTERN.test(value)) {
    return false;
  }
  const digits = value.replace(/[\s\-()]/g, '');
  return digits.length >= 7 && digits.length <= 15;
}

function emailDomain(value: string): string {
  return value.trim().toLowerCase().split('@').pop() ?? '';
}

/** Calendar day for "today" ends at midnight UTC tomorrow */
function endOfToday(): number {
  const now = new Date();
  return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1) - 1;
}

const nameField = (label: string) =>
  z
    .string({ required_error: `${label} is required.` })
    .min(2, `${label} must be between 2 and 50 characters.`)
    .max(50, `${label} must be between 2 and 50 characters.`)
    .refine(isValidName, `${label} contains invalid characters or format.`);

const emailField = z
  .string({ required_error: 'Email address is required.' })
  .max(100, 'Email address cannot exceed 100 characters.')
  .email('Please provide a valid email address.')
  .refine((value) => !BLOCKED_EMAIL_DOMAINS.has(emailDomain(value)), 'Please use a valid business email address.');

const departmentField = z
  .string({ required_error: 'Department is required.' })
  .max(50, 'Department name cannot exceed 50 characters.')
  .refine((value) => approvedDepartmentKeys.has(value.trim().toLowerCase()), 'Please select a valid department.');

const positionField = z
  .string({ required_error: 'Position/Job title is required.' })
  .min(3, 'Position must be between 3 and 100 characters.')
  .max(100, 'Position must be between 3 and 100 characters.')
  .regex(POSITION_PATTERN, 'Position can only contain letters, spaces, hyphens, and periods.');

const phoneField = z
  .string()
  .max(15, 'Phone number cannot exceed 15 characters.')
  .refine(isValidPhoneNumber, 'Please provide a valid phone number format.');

const addressField = z.string().max(200, 'Address cannot exceed 200 characters.');

const salaryField = z
  .number({ invalid_type_error: 'Salary must be a number.' })
  .min(0, 'Salary must be a positive number.')
  .refine((value) => value >= MIN_SALARY && value <= MAX_SALARY, 'Salary must be within acceptable company range.');

const CALENDAR_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

// Date parsing rolls impossible days over, so 2020-02-31 would become 2020-03-02
function isCalendarDay(value: string): boolean {
  const match = CALENDAR_DATE_PREFIX.exec(value);
  if (!match) {
    return true;
  }
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const candidate = new Date(Date.UTC(year, month, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month && candidate.getUTCDate() === day;
}

const hireDateField = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (isNaN(date.getTime()) || !isCalendarDay(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Please provide a valid date.' });
    return z.NEVER;
  }
  if (date.getTime() < MINIMUM_HIRE_DATE || date.getTime() > endOfToday()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Hire date must be a valid date not in the future.' });
    return z.NEVER;
  }
  return date;
});

// Optional fields accept null as "not supplied"
function optional<T extends z.ZodTypeAny>(field: T) {
  return field
    .nullish()
    .transform((value): z.output<T> | undefined => (value === null ? undefined : value));
}

export const CreateUserSchema = z.object({
  firstName: nameField('First name'),
  lastName: nameField('Last name'),
  email: emailField,
  phoneNumber: optional(phoneField),
  department: departmentField,
  position: positionField,
  address: optional(addressField),
  salary: optional(salaryField),
  hireDate: optional(hireDateField),
});

export const UpdateUserSchema = z.object({
  firstName: optional(nameField('First name')),
  lastName: optional(nameField('Last name')),
  email: optional(emailField),
  phoneNumber: optional(phoneField),
  department: optional(departmentField),
  position: optional(positionField),
  address: optional(addressField),
  salary: optional(salaryField),
  hireDate: optional(hireDateField),
  isActive: optional(z.boolean({ invalid_type_error: 'Active status must be a boolean.' })),
});

export function parseCreateUser(body: unknown): CreateUserPayload {
  return CreateUserSchema.parse(body);
}

export function parseUpdateUser(body: unknown): UpdateUserPayload {
  return UpdateUserSchema.parse(body ?? {});
}

const INJECTION_PATTERNS: readonly string[] = [
  "' or '1'='1",
  "' or 1=1",
  "'; drop table",
  "'; delete from",
  "'; insert into",
  "'; update ",
  "'; exec",
  "'; execute",
  'union select',
  'union all select',
  '<script',
  'javascript:',
  'onload=',
  'onerror=',
  'onclick=',
  '--',
  '/*',
  '*/',
  'char(',
  'cast(',
  'convert(',
  'waitfor delay',
];

const DEPARTMENT_LOOKUP_PATTERN = /^[a-zA-Z\s&]+$/;
const SEARCH_TERM_PATTERN = /^[a-zA-Z0-9\s@\-._]+$/;
const lookupEmailSchema = z.string().email();

export function containsInjectionPattern(value: string): boolean {
  const lowered = value.toLowerCase();
  return INJECTION_PATTERNS.some((pattern) => lowered.includes(pattern));
}

/** Email path parameter, returned as given */
export function parseEmailLookup(email: string): string {
  if (email.trim() === '') {
    throw new InvalidArgumentError('Email cannot be empty');
  }
  if (!lookupEmailSchema.safeParse(email).success) {
    throw new InvalidArgumentError('Invalid email format');
  }
  if (email.length > 100 || containsInjectionPattern(email)) {
    throw new InvalidArgumentError('Invalid email address');
  }
  return email;
}

/** Department path parameter, returned trimmed */
export function parseDepartmentLookup(department: string): string {
  if (department.trim() === '') {
    throw new InvalidArgumentError('Department cannot be empty');
  }
  const trimmed = department.trim();
  if (trimmed.length > 50 || containsInjectionPattern(trimmed)) {
    throw new InvalidArgumentError('Invalid department name');
  }
  if (!DEPARTMENT_LOOKUP_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError('Department name can only contain letters, spaces, and ampersands');
  }
  return trimmed;
}

/** Search query parameter, returned trimmed */
export function parseSearchTerm(searchTerm: string | undefined): string {
  if (searchTerm === undefined || searchTerm.trim() === '') {
    throw new InvalidArgumentError('Search term cannot be empty');
  }
  const trimmed = searchTerm.trim();
  if (trimmed.length > 100) {
    throw new InvalidArgumentError('Search term is too long (maximum 100 characters)');
  }
  if (trimmed.length < 2) {
    throw new InvalidArgumentError('Search term must be at least 2 characters long');
  }
  if (containsInjectionPattern(trimmed)) {
    throw new InvalidArgumentError('Invalid search term');
  }
  if (!SEARCH_TERM_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError('Search term contains invalid characters');
  }
  return trimmed;
}
