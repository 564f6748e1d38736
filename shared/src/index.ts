// Shared types for the Employee Directory API

export {
  type UserId,
  type UserDto,
  type CreateUserPayload,
  type UpdateUserPayload,
  type UserRole,
} from './types/user.types.js';

export {
  type ErrorResponseBody,
  type ErrorDetails,
  type UnauthorizedResponseBody,
  type HealthCheckResponse,
  type ServiceInfoResponse,
  type TokenResponse,
} from './types/api.types.js';
