import type { AppError } from '@/lib/errors/error';

/** Managed object ids taken from RetrieveServiceContent. */
export type ServiceContent = {
  rootFolder: string;
  propertyCollector: string;
  viewManager: string;
  sessionManager: string;
  perfManager: string;
  about?: { fullName?: string; apiVersion?: string };
};

export type Session = Readonly<{
  sdkEndpoint: string;
  insecure: boolean;
  timeoutMs: number;
  cookie: string;
  username: string;
  serviceContent: Readonly<ServiceContent>;
}>;

export type VirtualMachineRef = Readonly<{
  /** Managed object id, e.g. `vm-42`. */
  id: string;
  name: string;
}>;

export type CounterDescriptor = Readonly<{
  key: number;
  /** `<group>.<counter>.<rollup>`, e.g. `cpu.usagemhz.average`. */
  name: string;
  group: string;
  counter: string;
  rollupType: string;
  unit: string;
  statsType?: string;
  level?: number;
  label?: string;
}>;

export type CounterCatalog = ReadonlyMap<string, CounterDescriptor>;

export type QuerySpec = Readonly<{
  entity: VirtualMachineRef;
  counterId: number;
  intervalSeconds: number;
  maxSamples: number;
  /** `''` selects the aggregate instance. */
  instance: string;
}>;

export type PerfMetricSeries =
  | { kind: 'int'; counterId: number; instance: string; values: number[] }
  | { kind: 'other'; typeName: string; counterId?: number };

export type PerfEntityResult =
  | { kind: 'entity'; entityId: string; sampleCount: number; series: PerfMetricSeries[] }
  | { kind: 'other'; typeName: string };

export type MetricSample = Readonly<{
  entity: VirtualMachineRef;
  counterId: number;
  values: readonly number[];
  /** Result or series kinds that were skipped because they are not integer series. */
  skippedKinds: readonly string[];
}>;

export type EntityOutcome =
  | { ok: true; sample: MetricSample }
  | { ok: false; entity: VirtualMachineRef; error: AppError };

export type RunSummary = {
  counter: CounterDescriptor;
  vms: number;
  reported: number;
  empty: number;
  failed: number;
  outcomes: EntityOutcome[];
};
