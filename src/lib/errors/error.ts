import { ErrorCode } from '@/lib/errors/error-codes';

import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory =
  | 'auth'
  | 'permission'
  | 'config'
  | 'network'
  | 'parse'
  | 'not_found'
  | 'cancelled'
  | 'unknown';

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
};

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Structural check only; redacted_context is free-form.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    ERROR_CODES.has(err.code) &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

/**
 * Error thrown across module boundaries. The payload is plain JSON so it can be
 * logged as-is.
 */
export class AppErrorException extends Error {
  readonly appError: AppError;

  constructor(appError: AppError, options?: { cause?: unknown }) {
    super(appError.message, options);
    this.name = 'AppErrorException';
    this.appError = appError;
  }
}

export function toPublicError(err: unknown): AppError {
  if (err instanceof AppErrorException) return err.appError;
  if (isAppError(err)) return err;
  return { code: ErrorCode.INTERNAL_ERROR, category: 'unknown', message: 'Internal error', retryable: false };
}

export function describeCause(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
