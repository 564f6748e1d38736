/**
 * Unit Tests: Request Schemas and Lookup Guards
 */

import { describe, it, expect } from 'vitest';
import {
  CreateUserSchema,
  UpdateUserSchema,
  containsInjectionPattern,
  parseCreateUser,
  parseDepartmentLookup,
  parseEmailLookup,
  parseSearchTerm,
  parseUpdateUser,
} from '../../application/users/user.schemas.js';
import { InvalidArgumentError } from '../../application/errors/app-error.js';

const validBody = {
  firstName: 'Alice',
  lastName: 'Nguyen',
  email: 'alice.nguyen@company.com',
  department: 'Engineering',
  position: 'Software Developer',
};

function createIssues(body: unknown): string[] {
  const result = CreateUserSchema.safeParse(body);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
}

function updateIssues(body: unknown): string[] {
  const result = UpdateUserSchema.safeParse(body);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
}

describe('User Schemas', () => {
  describe('CreateUserSchema', () => {
    it('should accept the required fields alone', () => {
      const parsed = parseCreateUser(validBody);

      expect(parsed).toEqual(validBody);
    });

    it('should treat null optional fields as absent', () => {
      const parsed = parseCreateUser({ ...validBody, phoneNumber: null, salary: null, hireDate: null });

      expect(parsed.phoneNumber).toBeUndefined();
      expect(parsed.salary).toBeUndefined();
      expect(parsed.hireDate).toBeUndefined();
    });

    it('should parse the hire date into a Date', () => {
      const parsed = parseCreateUser({ ...validBody, hireDate: '2021-06-01' });

      expect(parsed.hireDate).toEqual(new Date('2021-06-01T00:00:00.000Z'));
    });

    it('should report missing required fields', () => {
      expect(createIssues({})).toEqual([
        'First name is required.',
        'Last name is required.',
        'Email address is required.',
        'Department is required.',
        'Position/Job title is required.',
      ]);
    });

    it('should reject reserved or malformed names', () => {
      expect(createIssues({ ...validBody, firstName: 'admin' })).toEqual([
        'First name contains invalid characters or format.',
      ]);
      expect(createIssues({ ...validBody, lastName: 'Nguyen2' })).toEqual([
        'Last name contains invalid characters or format.',
      ]);
    });

    it('should reject disposable email domains', () => {
      expect(createIssues({ ...validBody, email: 'alice@mailinator.com' })).toEqual([
        'Please use a valid business email address.',
      ]);
    });

    it('should match departments case-insensitively against the approved list', () => {
      expect(createIssues({ ...validBody, department: 'r&d' })).toEqual([]);
      expect(createIssues({ ...validBody, department: 'Catering' })).toEqual(['Please select a valid department.']);
    });

    it('should reject positions with digits', () => {
      expect(createIssues({ ...validBody, position: 'Developer 2' })).toEqual([
        'Position can only contain letters, spaces, hyphens, and periods.',
      ]);
    });

    it('should reject salaries outside the company range', () => {
      expect(createIssues({ ...validBody, salary: 19999 })).toEqual([
        'Salary must be within acceptable company range.',
      ]);
      expect(createIssues({ ...validBody, salary: 'lots' })).toEqual(['Salary must be a number.']);
    });

    it('should reject malformed phone numbers', () => {
      expect(createIssues({ ...validBody, phoneNumber: 'call me' })).toEqual([
        'Please provide a valid phone number format.',
      ]);
    });

    it('should reject hire dates that cannot be parsed or are out of range', () => {
      expect(createIssues({ ...validBody, hireDate: 'someday' })).toEqual(['Please provide a valid date.']);
      expect(createIssues({ ...validBody, hireDate: '1949-12-31' })).toEqual([
        'Hire date must be a valid date not in the future.',
      ]);
      expect(createIssues({ ...validBody, hireDate: '2999-01-01' })).toEqual([
        'Hire date must be a valid date not in the future.',
      ]);
    });

    it('should reject days that do not exist in the calendar', () => {
      expect(createIssues({ ...validBody, hireDate: '2020-02-31' })).toEqual(['Please provide a valid date.']);
      expect(createIssues({ ...validBody, hireDate: '2021-02-29' })).toEqual(['Please provide a valid date.']);
      expect(createIssues({ ...validBody, hireDate: '2021-04-31T09:00:00Z' })).toEqual(['Please provide a valid date.']);
      expect(createIssues({ ...validBody, hireDate: '2020-02-29' })).toEqual([]);
    });
  });

  describe('UpdateUserSchema', () => {
    it('should accept an empty or missing body', () => {
      expect(parseUpdateUser({})).toEqual({});
      expect(parseUpdateUser(null)).toEqual({});
    });

    it('should validate only the supplied fields', () => {
      expect(updateIssues({ department: 'Finance' })).toEqual([]);
      expect(updateIssues({ email: 'not-an-email' })).toEqual(['Please provide a valid email address.']);
    });

    it('should require a boolean active flag', () => {
      expect(parseUpdateUser({ isActive: false })).toEqual({ isActive: false });
      expect(updateIssues({ isActive: 'no' })).toEqual(['Active status must be a boolean.']);
    });
  });

  describe('containsInjectionPattern', () => {
    it('should detect patterns regardless of case', () => {
      expect(containsInjectionPattern("x' OR '1'='1")).toBe(true);
      expect(containsInjectionPattern('UNION SELECT password')).toBe(true);
      expect(containsInjectionPattern('<SCRIPT>alert(1)')).toBe(true);
    });

    it('should pass ordinary text', () => {
      expect(containsInjectionPattern('Research & Development')).toBe(false);
    });
  });

  describe('parseEmailLookup', () => {
    it('should return a valid email unchanged', () => {
      expect(parseEmailLookup('Alice.Nguyen@company.com')).toBe('Alice.Nguyen@company.com');
    });

    it.each([
      ['  ', 'Email cannot be empty'],
      ['alice', 'Invalid email format'],
    ])('should reject %j with "%s"', (email, message) => {
      expect(() => parseEmailLookup(email)).toThrow(new InvalidArgumentError(message));
    });

    it('should reject emails longer than 100 characters', () => {
      const email = `${'a'.repeat(95)}@company.com`;

      expect(() => parseEmailLookup(email)).toThrow('Invalid email address');
    });
  });

  describe('parseDepartmentLookup', () => {
    it('should return the trimmed department', () => {
      expect(parseDepartmentLookup('  Research & Development ')).toBe('Research & Development');
    });

    it.each([
      ['', 'Department cannot be empty'],
      ['x'.repeat(51), 'Invalid department name'],
      ['IT--', 'Invalid department name'],
      ['Sales2', 'Department name can only contain letters, spaces, and ampersands'],
    ])('should reject %j with "%s"', (department, message) => {
      expect(() => parseDepartmentLookup(department)).toThrow(message);
    });
  });

  describe('parseSearchTerm', () => {
    it('should return the trimmed term', () => {
      expect(parseSearchTerm('  nguyen ')).toBe('nguyen');
    });

    it.each([
      [undefined, 'Search term cannot be empty'],
      ['   ', 'Search term cannot be empty'],
      ['a', 'Search term must be at least 2 characters long'],
      ['a'.repeat(101), 'Search term is too long (maximum 100 characters)'],
      ['drop--table', 'Invalid search term'],
      ['alice!', 'Search term contains invalid characters'],
    ])('should reject %j with "%s"', (term, message) => {
      expect(() => parseSearchTerm(term)).toThrow(message);
    });
  });
});
