import { describe, expect, it } from 'vitest';

import { DEFAULT_METRIC_NAME, loadProbeConfig } from '@/lib/env/probe-env';
import { AppErrorException } from '@/lib/errors/error';

const base = {
  VCSA_SERVER: 'vc.lab.local',
  QA_VCENTER_USERNAME: 'administrator@vsphere.local',
  QA_VCENTER_PASSWORD: 'test-secret',
};

function captureConfigError(env: Record<string, string | undefined>): AppErrorException {
  try {
    loadProbeConfig(env);
  } catch (err) {
    if (err instanceof AppErrorException) return err;
    throw err;
  }
  throw new Error('expected loadProbeConfig to throw');
}

describe('loadProbeConfig', () => {
  it('applies defaults', () => {
    expect(loadProbeConfig(base)).toEqual({
      server: 'vc.lab.local',
      username: 'administrator@vsphere.local',
      password: 'test-secret',
      insecure: true,
      metricName: DEFAULT_METRIC_NAME,
      intervalSeconds: 20,
      maxSamples: 1,
      concurrency: 1,
      timeoutMs: 30_000,
      debug: false,
    });
  });

  it('parses overrides (booleans are case-insensitive)', () => {
    const config = loadProbeConfig({
      ...base,
      VCSA_INSECURE: 'FALSE',
      PERF_METRIC: 'mem.usage.average',
      PERF_INTERVAL_SECONDS: '300',
      PERF_MAX_SAMPLES: '3',
      PERF_CONCURRENCY: '8',
      PERF_TIMEOUT_MS: '5000',
      PERF_PROBE_DEBUG: '1',
    });

    expect(config).toMatchObject({
      insecure: false,
      metricName: 'mem.usage.average',
      intervalSeconds: 300,
      maxSamples: 3,
      concurrency: 8,
      timeoutMs: 5000,
      debug: true,
    });
  });

  it('treats empty strings as missing and names every missing variable', () => {
    const err = captureConfigError({ VCSA_SERVER: '', QA_VCENTER_USERNAME: 'u' });

    expect(err.appError.code).toBe('CONFIG_INVALID');
    expect(err.appError.category).toBe('config');
    expect(err.message).toContain('VCSA_SERVER');
    expect(err.message).toContain('QA_VCENTER_PASSWORD');
    expect(err.message).not.toContain('QA_VCENTER_USERNAME');
  });

  it('rejects malformed values', () => {
    expect(captureConfigError({ ...base, VCSA_INSECURE: 'yes' }).message).toContain('VCSA_INSECURE');
    expect(captureConfigError({ ...base, PERF_METRIC: 'cpu.usagemhz' }).message).toContain('PERF_METRIC');
    expect(captureConfigError({ ...base, PERF_MAX_SAMPLES: '0' }).message).toContain('PERF_MAX_SAMPLES');
  });

  it('never echoes the password', () => {
    const err = captureConfigError({ ...base, PERF_CONCURRENCY: 'many' });
    expect(JSON.stringify(err.appError)).not.toContain('test-secret');
  });
});
