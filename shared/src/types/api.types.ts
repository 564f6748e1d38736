/**
 * API request/response types for the Employee Directory API.
 */

/** Body of every error response */
export interface ErrorResponseBody {
  readonly error: string;
  readonly statusCode: number;
  readonly timestamp: string;
  readonly path: string;
  readonly method: string;
  readonly traceId: string;
  readonly details?: ErrorDetails;
}

/** Diagnostic block, only present outside production */
export interface ErrorDetails {
  readonly exceptionType: string;
  readonly message: string;
  readonly stack?: string;
  readonly cause?: string;
}

/** Body written by the token gate when it rejects a request */
export interface UnauthorizedResponseBody {
  readonly error: string;
  readonly message: string;
  readonly statusCode: 401;
  readonly timestamp: string;
  readonly path: string;
  readonly method: string;
  readonly traceId: string;
}

/** Health check response */
export interface HealthCheckResponse {
  readonly status: 'Healthy';
  readonly service: string;
  readonly timestamp: string;
}

/** GET /api service metadata */
export interface ServiceInfoResponse {
  readonly message: string;
  readonly documentation: string;
  readonly version: string;
  readonly endpoints: readonly string[];
}

/** Token issued by /api/auth/login and /api/auth/refresh */
export interface TokenResponse {
  readonly token: string;
  readonly expiresAt: string;
  readonly user: {
    readonly id: string;
    readonly email: string;
    readonly roles: readonly string[];
  };
}
