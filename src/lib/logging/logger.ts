export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ServiceName = 'perf-report';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

const EXCERPT_LIMIT = 2000;

function getEnv() {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.GIT_SHA ?? process.env.npm_package_version ?? 'unknown';
}

export function toBooleanValue(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return undefined;
}

let debugOverride: boolean | undefined;

/** Pins debug output to the loaded configuration; `undefined` falls back to PERF_PROBE_DEBUG. */
export function setDebugEnabled(enabled: boolean | undefined) {
  debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
  return debugOverride ?? toBooleanValue(process.env.PERF_PROBE_DEBUG) ?? false;
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

/**
 * Emits one JSON line on stderr. stdout is reserved for the report itself.
 */
export function logEvent(input: LogEventInput) {
  if (input.level === 'debug' && !isDebugEnabled()) return;

  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };

  const event = truncateExcerptsDeep(base);
  console.error(JSON.stringify(event));
}
