import { logEvent } from '@/lib/logging/logger';

import { toCatalogError, toQueryError, unknownMetricError, VcenterPerfError } from './errors';
import { retrieveAllProperties } from './property-collector';
import { sessionConnection } from './session';
import {
  callSoap,
  escapeXml,
  isRecord,
  moRefXml,
  readSoapResponse,
  toArray,
  toNumberValue,
  toStringValue,
  xsiTypeOf,
} from './soap';

import type { ObjectContent } from './property-collector';
import type {
  CounterCatalog,
  CounterDescriptor,
  MetricSample,
  PerfEntityResult,
  PerfMetricSeries,
  QuerySpec,
  Session,
  VirtualMachineRef,
} from './types';

/** Real-time statistics granularity on ESXi / vCenter. */
export const REALTIME_INTERVAL_SECONDS = 20;

function parseCounterInfo(raw: unknown): CounterDescriptor | null {
  if (!isRecord(raw)) return null;

  const key = toNumberValue(raw.key);
  const nameInfo = isRecord(raw.nameInfo) ? raw.nameInfo : undefined;
  const groupInfo = isRecord(raw.groupInfo) ? raw.groupInfo : undefined;
  const unitInfo = isRecord(raw.unitInfo) ? raw.unitInfo : undefined;

  const counter = toStringValue(nameInfo?.key);
  const group = toStringValue(groupInfo?.key);
  const rollupType = toStringValue(raw.rollupType);
  if (key === undefined || !counter || !group || !rollupType) return null;

  const statsType = toStringValue(raw.statsType);
  const level = toNumberValue(raw.level);
  const label = toStringValue(nameInfo?.label);

  return Object.freeze({
    key,
    name: `${group}.${counter}.${rollupType}`,
    group,
    counter,
    rollupType,
    unit: toStringValue(unitInfo?.key) ?? 'unknown',
    ...(statsType ? { statsType } : {}),
    ...(level !== undefined ? { level } : {}),
    ...(label ? { label } : {}),
  });
}

/** First descriptor wins when a provider lists the same name twice. */
export function buildCounterCatalog(objects: ObjectContent[]): CounterCatalog {
  const catalog = new Map<string, CounterDescriptor>();

  for (const object of objects) {
    const val = object.props.get('perfCounter');
    const infos = isRecord(val) ? toArray(val.PerfCounterInfo) : [];
    for (const info of infos) {
      const descriptor = parseCounterInfo(info);
      if (descriptor && !catalog.has(descriptor.name)) catalog.set(descriptor.name, descriptor);
    }
  }

  return catalog;
}

export async function fetchCounterCatalog(
  session: Session,
  options: { signal?: AbortSignal } = {},
): Promise<CounterCatalog> {
  const { perfManager, propertyCollector } = session.serviceContent;
  const specSet = `<vim25:propSet>
      <vim25:type>PerformanceManager</vim25:type>
      <vim25:pathSet>perfCounter</vim25:pathSet>
    </vim25:propSet>
    <vim25:objectSet>${moRefXml('obj', 'PerformanceManager', perfManager)}</vim25:objectSet>`;

  try {
    const objects = await retrieveAllProperties(sessionConnection(session), propertyCollector, specSet, {
      signal: options.signal,
    });
    const catalog = buildCounterCatalog(objects);
    logEvent({ level: 'debug', service: 'perf-report', event_type: 'catalog.fetched', counters: catalog.size });
    return catalog;
  } catch (err) {
    if (options.signal?.aborted) throw err;
    throw toCatalogError(err);
  }
}

/** Exact-match lookup. A miss is a usage error, never a default descriptor. */
export function resolveCounter(catalog: CounterCatalog, metricName: string): CounterDescriptor {
  const descriptor = catalog.get(metricName);
  if (!descriptor) throw unknownMetricError(metricName, catalog.size);
  return descriptor;
}

export function buildQuerySpec(
  entity: VirtualMachineRef,
  counterId: number,
  options: { intervalSeconds?: number; maxSamples?: number; instance?: string } = {},
): QuerySpec {
  return Object.freeze({
    entity,
    counterId,
    intervalSeconds: options.intervalSeconds ?? REALTIME_INTERVAL_SECONDS,
    maxSamples: options.maxSamples ?? 1,
    instance: options.instance ?? '',
  });
}

export function querySpecXml(spec: QuerySpec): string {
  // Element order follows the PerfQuerySpec schema.
  return `<vim25:querySpec>
      ${moRefXml('entity', 'VirtualMachine', spec.entity.id)}
      <vim25:maxSample>${spec.maxSamples}</vim25:maxSample>
      <vim25:metricId>
        <vim25:counterId>${spec.counterId}</vim25:counterId>
        <vim25:instance>${escapeXml(spec.instance)}</vim25:instance>
      </vim25:metricId>
      <vim25:intervalId>${spec.intervalSeconds}</vim25:intervalId>
      <vim25:format>normal</vim25:format>
    </vim25:querySpec>`;
}

function parseSeries(raw: unknown): PerfMetricSeries {
  const typeName = xsiTypeOf(raw) ?? 'unknown';
  const id = isRecord(raw) && isRecord(raw.id) ? raw.id : undefined;
  const counterId = toNumberValue(id?.counterId);

  if (typeName !== 'PerfMetricIntSeries' || counterId === undefined || !isRecord(raw)) {
    return { kind: 'other', typeName, ...(counterId !== undefined ? { counterId } : {}) };
  }

  const values = toArray(raw.value)
    .map((v) => toNumberValue(v))
    .filter((v): v is number => v !== undefined);
  return { kind: 'int', counterId, instance: toStringValue(id?.instance) ?? '', values };
}

function parseEntityResult(raw: unknown): PerfEntityResult {
  const typeName = xsiTypeOf(raw) ?? 'unknown';
  if (typeName !== 'PerfEntityMetric' || !isRecord(raw)) return { kind: 'other', typeName };

  return {
    kind: 'entity',
    entityId: toStringValue(raw.entity) ?? '',
    sampleCount: toArray(raw.sampleInfo).length,
    series: toArray(raw.value).map(parseSeries),
  };
}

/** Decodes a QueryPerf answer into tagged results; zero results is a valid answer. */
export function parseQueryPerfResponse(xml: string): PerfEntityResult[] {
  const response = readSoapResponse(xml, 'QueryPerf', { typed: true });
  return toArray(response.returnval).map(parseEntityResult);
}

/**
 * Keeps the integer series whose counter id matches. Any other result or series
 * kind is reported in `skippedKinds` and contributes nothing.
 */
export function extractSeriesValues(
  results: readonly PerfEntityResult[],
  counterId: number,
): { series: number[][]; skippedKinds: string[] } {
  const series: number[][] = [];
  const skippedKinds: string[] = [];

  for (const result of results) {
    if (result.kind !== 'entity') {
      skippedKinds.push(result.typeName);
      continue;
    }
    for (const s of result.series) {
      if (s.kind !== 'int') {
        skippedKinds.push(s.typeName);
        continue;
      }
      if (s.counterId === counterId) series.push(s.values);
    }
  }

  return { series, skippedKinds };
}

export async function queryMetric(
  session: Session,
  entity: VirtualMachineRef,
  counterId: number,
  options: { intervalSeconds?: number; maxSamples?: number; signal?: AbortSignal } = {},
): Promise<MetricSample> {
  const spec = buildQuerySpec(entity, counterId, options);

  let results: PerfEntityResult[];
  try {
    const res = await callSoap(
      sessionConnection(session),
      'QueryPerf',
      `<vim25:QueryPerf>
        ${moRefXml('_this', 'PerformanceManager', session.serviceContent.perfManager)}
        ${querySpecXml(spec)}
      </vim25:QueryPerf>`,
      { signal: options.signal },
    );
    results = parseQueryPerfResponse(res.bodyText);
  } catch (err) {
    if (options.signal?.aborted) throw err;
    throw new VcenterPerfError('query', toQueryError(err, entity), { cause: err });
  }

  const { series, skippedKinds } = extractSeriesValues(results, counterId);
  return Object.freeze({ entity, counterId, values: series.flat(), skippedKinds });
}
