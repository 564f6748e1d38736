/**
 * Stored employee record and its mapping to the wire shape
 */

import type { UserDto, UserId } from '@employee-directory/shared';

export interface UserRecord {
  id: UserId;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string | null;
  department: string;
  position: string;
  address: string | null;
  salary: number | null;
  hireDate: Date | null;
  createdDate: Date;
  updatedDate: Date | null;
  isActive: boolean;
}

export function cloneUserRecord(record: UserRecord): UserRecord {
  return {
    ...record,
    hireDate: record.hireDate ? new Date(record.hireDate.getTime()) : null,
    createdDate: new Date(record.createdDate.getTime()),
    updatedDate: record.updatedDate ? new Date(record.updatedDate.getTime()) : null,
  };
}

export function cloneUserDto(user: UserDto): UserDto {
  return {
    ...user,
    hireDate: user.hireDate ? new Date(user.hireDate.getTime()) : null,
    createdDate: new Date(user.createdDate.getTime()),
    updatedDate: user.updatedDate ? new Date(user.updatedDate.getTime()) : null,
  };
}

export function toUserDto(record: UserRecord): UserDto {
  return {
    id: record.id,
    firstName: record.firstName,
    lastName: record.lastName,
    fullName: `${record.firstName} ${record.lastName}`,
    email: record.email,
    phoneNumber: record.phoneNumber,
    department: record.department,
    position: record.position,
    address: record.address,
    salary: record.salary,
    hireDate: record.hireDate,
    createdDate: record.createdDate,
    updatedDate: record.updatedDate,
    isActive: record.isActive,
  };
}
