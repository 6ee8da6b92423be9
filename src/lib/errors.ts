import type { GoogleApiError } from '../types.ts';

/**
 * Raised by the Google adapter; wraps the client error with the operation that failed.
 */
export class SheetsApiError extends Error {
  readonly operation: string;
  readonly status: number | undefined;

  constructor(operation: string, cause: unknown) {
    super(`Failed to ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = 'SheetsApiError';
    this.operation = operation;
    this.status = errorStatus(cause);
  }
}

/**
 * An error the HTTP layer turns into a response with this status and detail.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, detail: string, options?: ErrorOptions) {
    super(detail, options);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const apiError: GoogleApiError = error;
  for (const candidate of [apiError.response?.status, apiError.status, apiError.statusCode, apiError.code]) {
    if (typeof candidate === 'number') return candidate;
  }
  return undefined;
}

export function isAuthError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status === 401 || status === 403) return true;
  return /invalid_grant|could not load the default credentials|unauthenticated/i.test(errorMessage(error));
}
