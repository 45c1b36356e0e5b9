// Standardized error handling utilities

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ModelQueryError } from '../services/orchestrator/errors.js';
import { UpstreamError, UpstreamHttpError } from '../services/weather/errors.js';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  UPSTREAM_ERROR = 'upstream_error',
  MODEL_ERROR = 'model_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static upstream(statusCode: number, message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.UPSTREAM_ERROR, message, statusCode, details);
  }

  static model(message: string = 'Language model request failed', details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_ERROR, message, 502, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

/**
 * Maps any thrown value to an AppError:
 * validation → 400, upstream HTTP status → same status, other upstream → 502,
 * model failure → 502, everything else → 500.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof ZodError) {
    return AppError.validationError(
      'Invalid request',
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }

  if (error instanceof UpstreamHttpError) {
    return AppError.upstream(error.status, error.message, { body: error.body });
  }

  if (error instanceof UpstreamError) {
    return AppError.upstream(502, `Upstream error: ${error.message}`);
  }

  if (error instanceof ModelQueryError) {
    return AppError.model(error.message);
  }

  if (hasClientStatus(error)) {
    return new AppError(ErrorCode.BAD_REQUEST, error.message, error.statusCode);
  }

  return AppError.internal();
}

// Fastify's own errors (malformed JSON body, unsupported media type) carry a 4xx statusCode
function hasClientStatus(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply) {
  const appError = toAppError(error);

  if (appError.statusCode >= 500) {
    request.log.error({ err: error }, appError.message);
  } else {
    request.log.warn({ err: error }, appError.message);
  }

  return reply.code(appError.statusCode).send(formatErrorResponse(appError, appError.statusCode < 500));
}
