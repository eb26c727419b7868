import { describe, expect, it } from 'vitest';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, describeCause, isAppError, toPublicError } from '@/lib/errors/error';

import type { AppError } from '@/lib/errors/error';

describe('toPublicError', () => {
  it('returns INTERNAL_ERROR for unknown input', () => {
    expect(toPublicError('x').code).toBe('INTERNAL_ERROR');
    expect(toPublicError(new Error('boom')).code).toBe('INTERNAL_ERROR');
  });

  it('passes through a known AppError', () => {
    const err: AppError = {
      code: ErrorCode.VCENTER_INVENTORY_FAILED,
      category: 'network',
      message: 'inventory listing failed',
      retryable: false,
      redacted_context: { stage: 'inventory' },
    };

    expect(toPublicError(err)).toEqual(err);
  });

  it('unwraps AppErrorException', () => {
    const appError: AppError = {
      code: ErrorCode.CONFIG_INVALID,
      category: 'config',
      message: 'invalid configuration',
      retryable: false,
    };

    expect(toPublicError(new AppErrorException(appError))).toBe(appError);
  });
});

describe('isAppError', () => {
  it('rejects objects with an unknown code', () => {
    expect(isAppError({ code: 'NOPE', category: 'unknown', message: 'x', retryable: false })).toBe(false);
  });

  it('rejects objects missing retryable', () => {
    expect(isAppError({ code: ErrorCode.INTERNAL_ERROR, category: 'unknown', message: 'x' })).toBe(false);
  });
});

describe('describeCause', () => {
  it('prefers the error message', () => {
    expect(describeCause(new Error('connect ECONNREFUSED'))).toBe('connect ECONNREFUSED');
    expect(describeCause(42)).toBe('42');
  });
});
