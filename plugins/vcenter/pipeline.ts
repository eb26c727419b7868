import { AppErrorException } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { cancelledError, extractionMismatch, toQueryError } from './errors';
import { listVirtualMachines } from './inventory';
import { fetchCounterCatalog, queryMetric, resolveCounter } from './perf';
import { createReportEmitter } from './report';
import { connect, disconnect } from './session';

import type { PerfStage } from './errors';
import type { ReportEmitter } from './report';
import type { ConnectInput } from './session';
import type { CounterCatalog, EntityOutcome, MetricSample, RunSummary, Session, VirtualMachineRef } from './types';

export type PerfPassInput = Omit<ConnectInput, 'signal'> & {
  metricName: string;
  intervalSeconds: number;
  maxSamples: number;
  /** 1 keeps the pass strictly sequential. */
  concurrency: number;
  signal?: AbortSignal;
};

export type PerfPassDeps = {
  connect: (input: ConnectInput) => Promise<Session>;
  disconnect: (session: Session, options: { signal?: AbortSignal }) => Promise<void>;
  listVirtualMachines: (session: Session, options: { signal?: AbortSignal }) => Promise<VirtualMachineRef[]>;
  fetchCounterCatalog: (session: Session, options: { signal?: AbortSignal }) => Promise<CounterCatalog>;
  queryMetric: (
    session: Session,
    entity: VirtualMachineRef,
    counterId: number,
    options: { intervalSeconds: number; maxSamples: number; signal?: AbortSignal },
  ) => Promise<MetricSample>;
  emit: ReportEmitter;
};

export function createPerfPassDeps(overrides: Partial<PerfPassDeps> = {}): PerfPassDeps {
  return {
    connect,
    disconnect,
    listVirtualMachines,
    fetchCounterCatalog,
    queryMetric,
    emit: createReportEmitter(),
    ...overrides,
  };
}

function throwIfCancelled(signal: AbortSignal | undefined, stage: PerfStage) {
  if (signal?.aborted) throw cancelledError(stage, signal.reason);
}

async function runStep<T>(stage: PerfStage, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
  throwIfCancelled(signal, stage);
  try {
    return await fn();
  } catch (err) {
    throwIfCancelled(signal, stage);
    throw err;
  }
}

/**
 * Bounded fan-out; results keep the input order whatever the completion order.
 * A failure stops the pool from taking new items, and the first failure is only
 * rethrown once every worker has stopped.
 */
async function mapLimit<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        out[index] = await fn(items[index]);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  });

  const settled = await Promise.allSettled(workers);
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
  }
  return out;
}

/**
 * One metrics pass: connect, list VMs, resolve the counter once, then query each VM.
 * Session, inventory and counter failures are fatal and stop the pass before any
 * later step runs. A failed query only drops that VM from the report.
 */
export async function runPerfPass(
  input: PerfPassInput,
  deps: PerfPassDeps = createPerfPassDeps(),
): Promise<RunSummary> {
  const { signal } = input;

  const session = await runStep('session.connect', signal, () =>
    deps.connect({
      endpoint: input.endpoint,
      username: input.username,
      password: input.password,
      insecure: input.insecure,
      timeoutMs: input.timeoutMs,
      signal,
    }),
  );

  try {
    const vms = await runStep('inventory', signal, () => deps.listVirtualMachines(session, { signal }));
    const catalog = await runStep('catalog', signal, () => deps.fetchCounterCatalog(session, { signal }));
    const counter = resolveCounter(catalog, input.metricName);

    logEvent({
      level: 'info',
      service: 'perf-report',
      event_type: 'perf.counter_resolved',
      metric: counter.name,
      counter_id: counter.key,
      unit: counter.unit,
    });

    const queryOne = async (vm: VirtualMachineRef): Promise<EntityOutcome> => {
      throwIfCancelled(signal, 'query');

      let sample: MetricSample;
      try {
        sample = await deps.queryMetric(session, vm, counter.key, {
          intervalSeconds: input.intervalSeconds,
          maxSamples: input.maxSamples,
          signal,
        });
      } catch (err) {
        throwIfCancelled(signal, 'query');
        const error = err instanceof AppErrorException ? err.appError : toQueryError(err, vm);
        logEvent({ level: 'warn', service: 'perf-report', event_type: 'perf.query_failed', vm: vm.name, error });
        return { ok: false, entity: vm, error };
      }

      if (sample.skippedKinds.length > 0) {
        const error = extractionMismatch(vm, [...new Set(sample.skippedKinds)]);
        logEvent({ level: 'warn', service: 'perf-report', event_type: 'perf.extraction_mismatch', vm: vm.name, error });
      }
      if (sample.values.length === 0) {
        logEvent({ level: 'info', service: 'perf-report', event_type: 'perf.no_sample', vm: vm.name });
      }

      deps.emit(vm.name, sample.values, counter);
      return { ok: true, sample };
    };

    const outcomes = await mapLimit(vms, input.concurrency, queryOne);

    const summary: RunSummary = {
      counter,
      vms: vms.length,
      reported: outcomes.filter((o) => o.ok && o.sample.values.length > 0).length,
      empty: outcomes.filter((o) => o.ok && o.sample.values.length === 0).length,
      failed: outcomes.filter((o) => !o.ok).length,
      outcomes,
    };

    logEvent({
      level: 'info',
      service: 'perf-report',
      event_type: 'run.completed',
      metric: counter.name,
      vms: summary.vms,
      reported: summary.reported,
      empty: summary.empty,
      failed: summary.failed,
    });

    return summary;
  } finally {
    await deps.disconnect(session, { signal });
  }
}
