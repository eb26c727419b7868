import { loadProbeConfig } from '@/lib/env/probe-env';
import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, toPublicError } from '@/lib/errors/error';
import { logEvent, setDebugEnabled } from '@/lib/logging/logger';

import { createPerfPassDeps, runPerfPass } from './pipeline';

import type { PerfPassDeps } from './pipeline';

export type ProbeRunOptions = {
  env?: Record<string, string | undefined>;
  deps?: PerfPassDeps;
  signal?: AbortSignal;
};

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CANCELLED = 130;

function stageOf(err: unknown): string | undefined {
  if (err instanceof AppErrorException) {
    const stage = err.appError.redacted_context?.stage;
    return typeof stage === 'string' ? stage : undefined;
  }
  return undefined;
}

/**
 * Runs one pass and maps the outcome to a process exit code. Per-VM failures do
 * not change the exit code.
 */
export async function runProbe(options: ProbeRunOptions = {}): Promise<number> {
  try {
    const config = loadProbeConfig(options.env ?? process.env);
    setDebugEnabled(config.debug);
    await runPerfPass(
      {
        endpoint: config.server,
        username: config.username,
        password: config.password,
        insecure: config.insecure,
        timeoutMs: config.timeoutMs,
        metricName: config.metricName,
        intervalSeconds: config.intervalSeconds,
        maxSamples: config.maxSamples,
        concurrency: config.concurrency,
        signal: options.signal,
      },
      options.deps ?? createPerfPassDeps(),
    );
    return EXIT_OK;
  } catch (err) {
    const error = toPublicError(err);
    logEvent({
      level: 'error',
      service: 'perf-report',
      event_type: 'run.failed',
      message: error.message,
      stage: stageOf(err) ?? 'run',
      error,
      ...(error.code === ErrorCode.INTERNAL_ERROR ? { cause: err instanceof Error ? err.message : String(err) } : {}),
    });
    return error.code === ErrorCode.RUN_CANCELLED ? EXIT_CANCELLED : EXIT_FATAL;
  } finally {
    setDebugEnabled(undefined);
  }
}
