/**
 * Unit Tests: User Business-Rule Validation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UserValidationService } from '../../application/users/user.validation.js';
import type { UserRecord } from '../../application/users/user.model.js';
import { createUserPayload } from '../setup.js';

const existingRecord: UserRecord = {
  id: 12,
  firstName: 'Priya',
  lastName: 'Raman',
  email: 'priya.raman@company.com',
  phoneNumber: null,
  department: 'Human Resources',
  position: 'HR Manager',
  address: null,
  salary: 88000,
  hireDate: new Date('2019-04-15T00:00:00.000Z'),
  createdDate: new Date('2020-02-10T14:30:00.000Z'),
  updatedDate: null,
  isActive: true,
};

describe('UserValidationService', () => {
  let validation: UserValidationService;

  beforeEach(() => {
    validation = new UserValidationService();
  });

  describe('validateCreate', () => {
    it('should accept a plausible new employee', () => {
      const outcome = validation.validateCreate(createUserPayload());

      expect(outcome).toEqual({ valid: true, errors: [] });
    });

    it('should flag placeholder names regardless of case', () => {
      const outcome = validation.validateCreate(createUserPayload({ firstName: 'JOHN', lastName: 'doe' }));

      expect(outcome.errors).toEqual([
        'First name and last name appear to be inconsistent or potentially fake.',
      ]);
    });

    it('should flag test email domains', () => {
      const outcome = validation.validateCreate(createUserPayload({ email: 'alice@Example.com' }));

      expect(outcome.errors).toEqual(['Email domain may not be appropriate for the specified department.']);
    });

    it('should flag a salary outside the band for the position', () => {
      const outcome = validation.validateCreate(createUserPayload({ salary: 150000 }));

      expect(outcome.errors).toEqual([
        'Salary appears to be outside the typical range for this position and department.',
      ]);
    });

    it('should flag a hire date in the future', () => {
      const outcome = validation.validateCreate(createUserPayload({ hireDate: new Date('2999-01-01T00:00:00.000Z') }));

      expect(outcome.errors).toEqual(['Hire date is invalid or inconsistent.']);
    });

    it('should flag well-known test phone numbers after stripping separators', () => {
      const outcome = validation.validateCreate(createUserPayload({ phoneNumber: '(555) 555-5555' }));

      expect(outcome.errors).toEqual(['Please provide a real phone number, not a test number.']);
    });

    it('should collect every violated rule in order', () => {
      const outcome = validation.validateCreate(
        createUserPayload({
          firstName: 'Test',
          lastName: 'User',
          email: 'test.user@fake.com',
          salary: 10000,
          phoneNumber: '1111111111',
        })
      );

      expect(outcome.valid).toBe(false);
      expect(outcome.errors).toEqual([
        'First name and last name appear to be inconsistent or potentially fake.',
        'Email domain may not be appropriate for the specified department.',
        'Salary appears to be outside the typical range for this position and department.',
        'Please provide a real phone number, not a test number.',
      ]);
    });
  });

  describe('validateUpdate', () => {
    it('should accept an empty patch', () => {
      expect(validation.validateUpdate({}, existingRecord)).toEqual({ valid: true, errors: [] });
    });

    it('should only check names when both are supplied', () => {
      expect(validation.validateUpdate({ firstName: 'Jane' }, existingRecord).valid).toBe(true);
      expect(validation.validateUpdate({ firstName: 'Jane', lastName: 'Doe' }, existingRecord).errors).toEqual([
        'Updated names appear to be inconsistent or potentially fake.',
      ]);
    });

    it('should only check the email domain when a department is supplied too', () => {
      expect(validation.validateUpdate({ email: 'priya@test.com' }, existingRecord).valid).toBe(true);
      expect(
        validation.validateUpdate({ email: 'priya@test.com', department: 'Finance' }, existingRecord).errors
      ).toEqual(['Updated email domain may not be appropriate for the specified department.']);
    });

    it('should check a new salary against the stored position', () => {
      // HR Manager band is 70000 - 150000
      expect(validation.validateUpdate({ salary: 160000 }, existingRecord).errors).toEqual([
        'Updated salary appears to be outside the typical range for this position.',
      ]);
      expect(validation.validateUpdate({ salary: 160000, position: 'Finance Director' }, existingRecord).valid).toBe(
        true
      );
    });

    it('should reject a hire date after the record was created', () => {
      const outcome = validation.validateUpdate({ hireDate: new Date('2021-01-04T00:00:00.000Z') }, existingRecord);

      expect(outcome.errors).toEqual(['Updated hire date is invalid or inconsistent.']);
    });

    it('should accept a hire date on the creation day', () => {
      const outcome = validation.validateUpdate({ hireDate: new Date('2020-02-10T08:00:00.000Z') }, existingRecord);

      expect(outcome.valid).toBe(true);
    });
  });

  describe('validateSalaryForPosition', () => {
    it('should use the first matching position keyword', () => {
      expect(validation.validateSalaryForPosition(85000, 'Senior Analyst Manager', 'Finance')).toBe(true);
      expect(validation.validateSalaryForPosition(95000, 'Senior Analyst Manager', 'Finance')).toBe(false);
    });

    it('should treat band limits as inclusive', () => {
      expect(validation.validateSalaryForPosition(40000, 'Marketing Coordinator', 'Marketing')).toBe(true);
      expect(validation.validateSalaryForPosition(75000, 'Marketing Coordinator', 'Marketing')).toBe(true);
      expect(validation.validateSalaryForPosition(75001, 'Marketing Coordinator', 'Marketing')).toBe(false);
    });

    it('should fall back to the default band for unknown positions', () => {
      expect(validation.validateSalaryForPosition(25000, 'Office Chef', 'Operations')).toBe(true);
      expect(validation.validateSalaryForPosition(24999, 'Office Chef', 'Operations')).toBe(false);
      expect(validation.validateSalaryForPosition(300001, 'Office Chef', 'Operations')).toBe(false);
    });

    it('should pass missing or non-positive salaries', () => {
      expect(validation.validateSalaryForPosition(undefined, 'Developer', 'IT')).toBe(true);
      expect(validation.validateSalaryForPosition(null, 'Developer', 'IT')).toBe(true);
      expect(validation.validateSalaryForPosition(0, 'Developer', 'IT')).toBe(true);
    });
  });

  describe('validateHireDateLogic', () => {
    it('should accept a missing hire date', () => {
      expect(validation.validateHireDateLogic(undefined)).toBe(true);
      expect(validation.validateHireDateLogic(null)).toBe(true);
    });

    it('should reject dates before 1950', () => {
      expect(validation.validateHireDateLogic(new Date('1949-12-31T00:00:00.000Z'))).toBe(false);
      expect(validation.validateHireDateLogic(new Date('1950-01-01T00:00:00.000Z'))).toBe(true);
    });

    it('should reject an invalid date', () => {
      expect(validation.validateHireDateLogic(new Date('not a date'))).toBe(false);
    });
  });
});
