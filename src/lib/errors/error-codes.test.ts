import { describe, expect, it } from 'vitest';

import { ErrorCode } from '@/lib/errors/error-codes';

describe('ErrorCode', () => {
  it('uses the key as the wire value', () => {
    for (const [key, value] of Object.entries(ErrorCode)) expect(value).toBe(key);
  });

  it('includes VCENTER_METRIC_NOT_FOUND', () => {
    expect(ErrorCode.VCENTER_METRIC_NOT_FOUND).toBe('VCENTER_METRIC_NOT_FOUND');
  });
});
