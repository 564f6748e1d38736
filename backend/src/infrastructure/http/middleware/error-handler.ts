/**
 * Error Handler
 * Translates every failure into the standard error body.
 * Application errors keep their status and message; framework client
 * errors get a generic 4xx message; anything else is a 500.
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ErrorDetails, ErrorResponseBody } from '@employee-directory/shared';
import { isAppError } from '../../../application/errors/app-error.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('error-handler');

export const INVALID_REQUEST_MESSAGE = 'Invalid request: Invalid parameter value.';
export const INTERNAL_ERROR_MESSAGE = 'Internal server error: An unexpected error occurred.';
export const NOT_FOUND_MESSAGE = 'Requested resource was not found.';
export const RATE_LIMITED_MESSAGE = 'Too many requests, please slow down';

export interface ErrorHandlerOptions {
  /** Diagnostic details are included outside production */
  env: string;
}

interface TranslatedError {
  statusCode: number;
  message: string;
}

export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return `Validation failed: ${issues.join('; ')}`;
}

function translate(error: unknown): TranslatedError {
  if (isAppError(error)) {
    return { statusCode: error.statusCode, message: error.message };
  }

  if (error instanceof z.ZodError) {
    return { statusCode: 400, message: formatZodError(error) };
  }

  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    if (error.statusCode === 429) {
      return { statusCode: 429, message: RATE_LIMITED_MESSAGE };
    }
    return { statusCode: error.statusCode, message: INVALID_REQUEST_MESSAGE };
  }

  return { statusCode: 500, message: INTERNAL_ERROR_MESSAGE };
}

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

function describeError(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    const details: { exceptionType: string; message: string; stack?: string; cause?: string } = {
      exceptionType: error.name,
      message: error.message,
    };
    if (error.stack) {
      details.stack = error.stack;
    }
    if (error.cause !== undefined) {
      details.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
    return details;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return { exceptionType: typeof error, message: error.message };
  }
  return { exceptionType: typeof error, message: String(error) };
}

export function buildErrorBody(
  request: FastifyRequest,
  statusCode: number,
  message: string,
  details?: ErrorDetails
): ErrorResponseBody {
  const body: ErrorResponseBody = {
    error: message,
    statusCode,
    timestamp: new Date().toISOString(),
    path: request.url.split('?')[0] ?? request.url,
    method: request.method,
    traceId: request.id,
  };
  return details ? { ...body, details } : body;
}

export function createErrorHandler(options: ErrorHandlerOptions) {
  const includeDetails = options.env !== 'production';

  return function handleError(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
    const { statusCode, message } = translate(error);

    const context = {
      err: error,
      statusCode,
      method: request.method,
      path: request.url,
      remoteAddress: request.ip,
      requestId: request.id,
    };
    if (statusCode >= 500) {
      logger.error(context, 'Unhandled exception occurred');
    } else {
      logger.warn(context, 'Request rejected');
    }

    const body = buildErrorBody(request, statusCode, message, includeDetails ? describeError(error) : undefined);
    void reply.status(statusCode).send(body);
  };
}

export function createNotFoundHandler(options: ErrorHandlerOptions) {
  const includeDetails = options.env !== 'production';

  return function handleNotFound(request: FastifyRequest, reply: FastifyReply): void {
    logger.debug({ method: request.method, path: request.url }, 'Route not found');
    const details: ErrorDetails | undefined = includeDetails
      ? { exceptionType: 'NotFoundError', message: `Route ${request.method} ${request.url.split('?')[0] ?? ''} not found` }
      : undefined;
    void reply.status(404).send(buildErrorBody(request, 404, NOT_FOUND_MESSAGE, details));
  };
}
