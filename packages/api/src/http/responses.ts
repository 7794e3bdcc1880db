/**
 * HTTP result and error body builders
 *
 * Every route answers errors with the same `{ error: { code, message, details? } }` body.
 */

import type { ValidationIssue } from '@recovery-roadmap/shared';

export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'INVALID_JSON'
  | 'PAYLOAD_TOO_LARGE'
  | 'INVALID_REQUEST'
  | 'VALIDATION_ERROR'
  | 'TOO_MANY_TRADES'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'INTERNAL_ERROR';

export interface ApiErrorBody {
  error: {
    code: ApiErrorCode;
    message: string;
    details?: ValidationIssue[];
  };
}

/**
 * What a handler hands back to the server for writing
 */
export interface HttpResult {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export function createErrorBody(
  code: ApiErrorCode,
  message: string,
  details?: ValidationIssue[]
): ApiErrorBody {
  return {
    error: details ? { code, message, details } : { code, message },
  };
}

export function errorResult(
  status: number,
  code: ApiErrorCode,
  message: string,
  details?: ValidationIssue[]
): HttpResult {
  return { status, body: createErrorBody(code, message, details) };
}

export function jsonResult(body: unknown, status: number = 200): HttpResult {
  return { status, body };
}
