/**
 * Employee record types shared by the API and its clients.
 * Dates are Date objects in-process and ISO-8601 strings on the wire.
 */

export type UserId = number;

/** Read shape returned by every /api/users endpoint */
export interface UserDto {
  readonly id: UserId;
  readonly firstName: string;
  readonly lastName: string;
  readonly fullName: string;
  readonly email: string;
  readonly phoneNumber: string | null;
  readonly department: string;
  readonly position: string;
  readonly address: string | null;
  readonly salary: number | null;
  readonly hireDate: Date | null;
  readonly createdDate: Date;
  readonly updatedDate: Date | null;
  readonly isActive: boolean;
}

/** User creation payload */
export interface CreateUserPayload {
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly department: string;
  readonly position: string;
  readonly phoneNumber?: string | undefined;
  readonly address?: string | undefined;
  readonly salary?: number | undefined;
  readonly hireDate?: Date | undefined;
}

/** Partial update payload - only supplied fields are applied */
export interface UpdateUserPayload {
  readonly firstName?: string | undefined;
  readonly lastName?: string | undefined;
  readonly email?: string | undefined;
  readonly department?: string | undefined;
  readonly position?: string | undefined;
  readonly phoneNumber?: string | undefined;
  readonly address?: string | undefined;
  readonly salary?: number | undefined;
  readonly hireDate?: Date | undefined;
  readonly isActive?: boolean | undefined;
}

/** Role names carried in issued tokens */
export type UserRole = 'Admin' | 'User';
