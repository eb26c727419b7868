import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException } from '@/lib/errors/error';

export const DEFAULT_METRIC_NAME = 'cpu.usagemhz.average';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

export type ProbeConfig = {
  server: string;
  username: string;
  password: string;
  insecure: boolean;
  metricName: string;
  intervalSeconds: number;
  maxSamples: number;
  concurrency: number;
  timeoutMs: number;
  debug: boolean;
};

type RuntimeEnv = Record<string, string | undefined>;
type IssuePath = ReadonlyArray<PropertyKey | { key: PropertyKey }> | undefined;

function formatIssuePath(path: IssuePath): string {
  if (!path || path.length === 0) return '(root)';
  return path.map((segment) => (typeof segment === 'object' ? String(segment.key) : String(segment))).join('.');
}

/**
 * Reads and validates the probe configuration. Throws CONFIG_INVALID naming every
 * offending variable; secrets never appear in the error.
 */
export function loadProbeConfig(runtimeEnv: RuntimeEnv = process.env): ProbeConfig {
  const env = createEnv({
    server: {
      VCSA_SERVER: z.string().trim().min(1),
      QA_VCENTER_USERNAME: z.string().min(1),
      QA_VCENTER_PASSWORD: z.string().min(1),

      // Self-signed vCenter certificates are the norm in lab setups.
      VCSA_INSECURE: booleanFlag.default(true),

      PERF_METRIC: z
        .string()
        .trim()
        .regex(/^[^.\s]+\.[^.\s]+\.[^.\s]+$/, 'expected <group>.<counter>.<rollup>')
        .default(DEFAULT_METRIC_NAME),
      PERF_INTERVAL_SECONDS: z.coerce.number().int().positive().default(20),
      PERF_MAX_SAMPLES: z.coerce.number().int().positive().default(1),
      PERF_CONCURRENCY: z.coerce.number().int().positive().max(64).default(1),
      PERF_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
      PERF_PROBE_DEBUG: booleanFlag.default(false),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      const details = issues.map((issue) => ({ field: formatIssuePath(issue.path), issue: issue.message }));
      throw new AppErrorException({
        code: ErrorCode.CONFIG_INVALID,
        category: 'config',
        message: `invalid configuration: ${details.map((d) => d.field).join(', ')}`,
        retryable: false,
        redacted_context: { issues: details },
      });
    },
  });

  return {
    server: env.VCSA_SERVER,
    username: env.QA_VCENTER_USERNAME,
    password: env.QA_VCENTER_PASSWORD,
    insecure: env.VCSA_INSECURE,
    metricName: env.PERF_METRIC,
    intervalSeconds: env.PERF_INTERVAL_SECONDS,
    maxSamples: env.PERF_MAX_SAMPLES,
    concurrency: env.PERF_CONCURRENCY,
    timeoutMs: env.PERF_TIMEOUT_MS,
    debug: env.PERF_PROBE_DEBUG,
  };
}
