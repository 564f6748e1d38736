/**
 * Business-rule validation for user writes
 * Runs after field validation; catches inputs that are well-formed
 * but implausible (placeholder names, test domains, out-of-band salaries).
 * Rule violations are collected, never thrown.
 */

import type { CreateUserPayload, UpdateUserPayload } from '@employee-directory/shared';
import { createLogger, type Logger } from '../../infrastructure/logging/logger.js';
import type { UserRecord } from './user.model.js';

export interface ValidationOutcome {
  valid: boolean;
  errors: string[];
}

interface SalaryBand {
  keyword: string;
  min: number;
  max: number;
}

// First keyword contained in the lower-cased position wins
const POSITION_SALARY_BANDS: readonly SalaryBand[] = [
  { keyword: 'analyst', min: 45000, max: 90000 },
  { keyword: 'developer', min: 60000, max: 120000 },
  { keyword: 'manager', min: 70000, max: 150000 },
  { keyword: 'director', min: 100000, max: 200000 },
  { keyword: 'administrator', min: 50000, max: 100000 },
  { keyword: 'specialist', min: 55000, max: 95000 },
  { keyword: 'coordinator', min: 40000, max: 75000 },
  { keyword: 'assistant', min: 30000, max: 60000 },
];

const DEFAULT_SALARY_BAND = { min: 25000, max: 300000 };

const PLACEHOLDER_FULL_NAMES = new Set([
  'test user',
  'john doe',
  'jane doe',
  'first last',
  'user name',
  'admin user',
  'sample user',
]);

const TEST_EMAIL_DOMAINS = new Set(['test.com', 'example.com', 'fake.com', 'dummy.com']);

const TEST_PHONE_NUMBERS = new Set([
  '1234567890',
  '0123456789',
  '5555555555',
  '1111111111',
  '0000000000',
  '9999999999',
]);

const MINIMUM_HIRE_DAY = '1950-01-01';

export const VALIDATION_FAILURE_MESSAGE = 'Validation error occurred. Please review your input.';

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === '';
}

/** Calendar day in UTC, comparable as a string */
function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isNamePlausible(firstName: string, lastName: string): boolean {
  if (isBlank(firstName) || isBlank(lastName)) {
    return false;
  }
  return !PLACEHOLDER_FULL_NAMES.has(`${firstName} ${lastName}`.toLowerCase());
}

function isEmailDomainAppropriate(email: string, department: string): boolean {
  if (isBlank(email) || isBlank(department)) {
    return true;
  }
  const domain = email.split('@').pop()?.toLowerCase() ?? '';
  return !TEST_EMAIL_DOMAINS.has(domain);
}

function isTestPhoneNumber(phoneNumber: string): boolean {
  return TEST_PHONE_NUMBERS.has(phoneNumber.replace(/[-() ]/g, ''));
}

export class UserValidationService {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('user-validation')) {
    this.logger = logger;
  }

  validateCreate(input: CreateUserPayload): ValidationOutcome {
    const errors: string[] = [];

    try {
      if (!isNamePlausible(input.firstName, input.lastName)) {
        errors.push('First name and last name appear to be inconsistent or potentially fake.');
      }

      if (!isEmailDomainAppropriate(input.email, input.department)) {
        errors.push('Email domain may not be appropriate for the specified department.');
      }

      if (!this.validateSalaryForPosition(input.salary, input.position, input.department)) {
        errors.push('Salary appears to be outside the typical range for this position and department.');
      }

      if (!this.validateHireDateLogic(input.hireDate)) {
        errors.push('Hire date is invalid or inconsistent.');
      }

      if (input.phoneNumber && isTestPhoneNumber(input.phoneNumber)) {
        errors.push('Please provide a real phone number, not a test number.');
      }
    } catch (error) {
      this.logger.warn({ err: error }, 'Error during user validation');
      return { valid: false, errors: [VALIDATION_FAILURE_MESSAGE] };
    }

    return { valid: errors.length === 0, errors };
  }

  validateUpdate(input: UpdateUserPayload, existing: UserRecord): ValidationOutcome {
    const errors: string[] = [];

    try {
      if (input.firstName && input.lastName && !isNamePlausible(input.firstName, input.lastName)) {
        errors.push('Updated names appear to be inconsistent or potentially fake.');
      }

      if (input.email && input.department && !isEmailDomainAppropriate(input.email, input.department)) {
        errors.push('Updated email domain may not be appropriate for the specified department.');
      }

      if (input.salary !== undefined) {
        const position = input.position || existing.position || 'Unknown';
        const department = input.department || existing.department || 'Unknown';
        if (!this.validateSalaryForPosition(input.salary, position, department)) {
          errors.push('Updated salary appears to be outside the typical range for this position.');
        }
      }

      if (input.hireDate !== undefined && !this.validateHireDateLogic(input.hireDate, existing.createdDate)) {
        errors.push('Updated hire date is invalid or inconsistent.');
      }

      if (input.phoneNumber && isTestPhoneNumber(input.phoneNumber)) {
        errors.push('Please provide a real phone number, not a test number.');
      }
    } catch (error) {
      this.logger.warn({ err: error, userId: existing.id }, 'Error during user update validation');
      return { valid: false, errors: [VALIDATION_FAILURE_MESSAGE] };
    }

    return { valid: errors.length === 0, errors };
  }

  /** Missing or non-positive salaries pass */
  validateSalaryForPosition(salary: number | null | undefined, position: string, _department: string): boolean {
    if (salary === undefined || salary === null || salary <= 0) {
      return true;
    }

    const normalizedPosition = position.toLowerCase();
    const band =
      POSITION_SALARY_BANDS.find((candidate) => normalizedPosition.includes(candidate.keyword)) ??
      DEFAULT_SALARY_BAND;

    return salary >= band.min && salary <= band.max;
  }

  /**
   * A hire date must fall between 1950-01-01 and today and, for an
   * existing record, on or before the day the record was created.
   */
  validateHireDateLogic(hireDate: Date | null | undefined, existingCreatedDate?: Date): boolean {
    if (hireDate === undefined || hireDate === null) {
      return true;
    }
    if (isNaN(hireDate.getTime())) {
      return false;
    }

    const hireDay = dayOf(hireDate);
    if (hireDay < MINIMUM_HIRE_DAY || hireDay > dayOf(new Date())) {
      return false;
    }

    if (existingCreatedDate && hireDay > dayOf(existingCreatedDate)) {
      return false;
    }

    return true;
  }
}
