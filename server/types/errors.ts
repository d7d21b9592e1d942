/**
 * Error classes for the schedule pipeline.
 *
 * Every failure the pipeline raises on purpose extends ScheduleError so callers
 * (HTTP routes, the CLI) can map it to a status code and decide whether a retry
 * later makes sense.
 */

import type { Logger } from '../logger';

export type ErrorDetails = Record<string, unknown>;

// Base error class for the schedule pipeline
export class ScheduleError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly context?: ErrorDetails;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorDetails
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid or unrecognized year/week designator: out of the supported range,
 * unknown round name, or a wild-card round requested before 1978.
 */
export class DomainError extends ScheduleError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, ERROR_CODES.DOMAIN_ERROR, 400, false, context);
  }
}

/**
 * The source served its access-denial page instead of content.
 */
export class AccessDeniedError extends ScheduleError {
  constructor(url: string, context?: ErrorDetails) {
    super(`Access denied by source: ${url}`, ERROR_CODES.ACCESS_DENIED, 503, true, { url, ...context });
  }
}

/**
 * A fetched document did not have any of the known shapes.
 */
export class ParseError extends ScheduleError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, ERROR_CODES.PARSE_ERROR, 502, false, context);
  }
}

/**
 * Transport failures: network errors, timeouts, non-2xx responses, robots.txt refusals.
 */
export class FetchError extends ScheduleError {
  constructor(message: string, context?: ErrorDetails) {
    super(message, ERROR_CODES.FETCH_ERROR, 502, true, context);
  }
}

export const ERROR_CODES = {
  DOMAIN_ERROR: 'DOMAIN_ERROR',
  ACCESS_DENIED: 'ACCESS_DENIED',
  PARSE_ERROR: 'PARSE_ERROR',
  FETCH_ERROR: 'FETCH_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Standard error response format for API endpoints
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: ErrorDetails;
  };
}

export interface ErrorContext {
  operation?: string;
  requestId?: string;
  year?: number | string;
  week?: number | string;
  url?: string;
  [key: string]: unknown;
}

export function isScheduleError(error: unknown): error is ScheduleError {
  return error instanceof ScheduleError;
}

/**
 * Safe error information for logging
 */
export function extractErrorInfo(error: unknown): {
  name: string;
  message: string;
  code?: ErrorCode;
  statusCode?: number;
  retryable?: boolean;
  context?: ErrorDetails;
} {
  if (isScheduleError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      retryable: error.retryable,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }

  return { name: 'UnknownError', message: String(error) };
}

export function createErrorResponse(error: unknown, requestId?: string): ErrorResponse {
  if (isScheduleError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

export function logError(logger: Logger, error: unknown, context?: ErrorContext): void {
  const errorInfo = extractErrorInfo(error);
  logger.error({ error: errorInfo, context }, `Error occurred: ${errorInfo.message}`);
}
