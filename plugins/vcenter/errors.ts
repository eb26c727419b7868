import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, describeCause } from '@/lib/errors/error';

import { SoapFaultError, SoapParseError, SoapTransportError } from './soap';

import type { ErrorCodeType } from '@/lib/errors/error-codes';
import type { AppError, ErrorCategory, JsonValue } from '@/lib/errors/error';

export type PerfStage = 'session.connect' | 'session.login' | 'inventory' | 'catalog' | 'resolve' | 'query' | 'run';

export class VcenterPerfError extends AppErrorException {
  readonly stage: PerfStage;

  constructor(stage: PerfStage, appError: AppError, options?: { cause?: unknown }) {
    super(appError, options);
    this.name = 'VcenterPerfError';
    this.stage = stage;
  }
}

function soapContext(err: unknown): Record<string, JsonValue> {
  if (err instanceof SoapFaultError) {
    return {
      op: err.op,
      status: err.status,
      ...(err.faultType ? { fault: err.faultType } : {}),
      ...(err.faultString ? { cause: err.faultString } : {}),
    };
  }
  if (err instanceof SoapTransportError) return { op: err.op, timeout: err.timeout, cause: describeCause(err.cause) };
  if (err instanceof SoapParseError) return { op: err.op, cause: err.message };
  return { cause: describeCause(err) };
}

function categoryOf(err: unknown): ErrorCategory {
  if (err instanceof SoapTransportError) return 'network';
  if (err instanceof SoapParseError) return 'parse';
  if (err instanceof SoapFaultError) {
    if (err.faultType === 'NotAuthenticated' || err.status === 401) return 'auth';
    if (err.faultType === 'NoPermission' || err.status === 403) return 'permission';
    return 'unknown';
  }
  return 'unknown';
}

function build(
  stage: PerfStage,
  code: ErrorCodeType,
  category: ErrorCategory,
  message: string,
  err: unknown,
  extra: Record<string, JsonValue> = {},
): VcenterPerfError {
  return new VcenterPerfError(
    stage,
    {
      code,
      category,
      message,
      retryable: category === 'network',
      redacted_context: { stage, ...extra, ...soapContext(err) },
    },
    { cause: err },
  );
}

/** Could not reach the endpoint, or it did not answer like a vSphere SDK. */
export function toConnectionError(err: unknown, endpoint: string): VcenterPerfError {
  if (err instanceof SoapTransportError) {
    return build('session.connect', ErrorCode.VCENTER_NETWORK_ERROR, 'network', 'could not reach vcenter', err, {
      endpoint,
    });
  }
  return build('session.connect', ErrorCode.VCENTER_BAD_RESPONSE, 'parse', 'endpoint is not a vsphere sdk', err, {
    endpoint,
  });
}

/**
 * Only a SOAP fault or a 401 means the credentials were rejected. Any other answer
 * (a proxy error page, an unparseable body) is a bad response from the endpoint.
 */
export function toLoginError(err: unknown, endpoint: string): VcenterPerfError {
  if (err instanceof SoapTransportError) return toConnectionError(err, endpoint);
  if (err instanceof SoapFaultError) {
    if (err.faultType === 'NoPermission' || err.status === 403) {
      return build('session.login', ErrorCode.VCENTER_PERMISSION_DENIED, 'permission', 'permission denied', err, {
        endpoint,
      });
    }
    if (err.faultType || err.status === 401) {
      return build('session.login', ErrorCode.VCENTER_AUTH_FAILED, 'auth', 'credentials rejected', err, { endpoint });
    }
    return build('session.login', ErrorCode.VCENTER_BAD_RESPONSE, 'network', `login answered with status ${err.status}`, err, {
      endpoint,
    });
  }
  return build('session.login', ErrorCode.VCENTER_BAD_RESPONSE, 'parse', 'unexpected login response', err, { endpoint });
}

export function missingSessionCookieError(endpoint: string): VcenterPerfError {
  return new VcenterPerfError('session.login', {
    code: ErrorCode.VCENTER_AUTH_FAILED,
    category: 'auth',
    message: 'login returned no session cookie',
    retryable: false,
    redacted_context: { stage: 'session.login', endpoint, op: 'Login' },
  });
}

export function toInventoryError(err: unknown): VcenterPerfError {
  return build('inventory', ErrorCode.VCENTER_INVENTORY_FAILED, categoryOf(err), 'inventory listing failed', err);
}

export function toCatalogError(err: unknown): VcenterPerfError {
  return build('catalog', ErrorCode.VCENTER_CATALOG_FAILED, categoryOf(err), 'counter catalog fetch failed', err);
}

export function unknownMetricError(metricName: string, catalogSize: number): VcenterPerfError {
  return new VcenterPerfError('resolve', {
    code: ErrorCode.VCENTER_METRIC_NOT_FOUND,
    category: 'not_found',
    message: `metric ${metricName} not found`,
    retryable: false,
    redacted_context: { stage: 'resolve', metric: metricName, catalog_size: catalogSize },
  });
}

export function toQueryError(err: unknown, vm: { id: string; name: string }): AppError {
  return {
    code: ErrorCode.VCENTER_QUERY_FAILED,
    category: categoryOf(err),
    message: `performance query failed for vm ${vm.name}`,
    retryable: err instanceof SoapTransportError,
    redacted_context: { stage: 'query', vm: vm.name, vm_id: vm.id, ...soapContext(err) },
  };
}

export function extractionMismatch(vm: { id: string; name: string }, kinds: string[]): AppError {
  return {
    code: ErrorCode.VCENTER_EXTRACTION_MISMATCH,
    category: 'parse',
    message: `unexpected performance result type for vm ${vm.name}`,
    retryable: false,
    redacted_context: { stage: 'query', vm: vm.name, vm_id: vm.id, kinds },
  };
}

export function cancelledError(stage: PerfStage, reason: unknown): VcenterPerfError {
  return new VcenterPerfError(
    stage,
    {
      code: ErrorCode.RUN_CANCELLED,
      category: 'cancelled',
      message: 'run cancelled',
      retryable: false,
      redacted_context: { stage, cause: describeCause(reason) },
    },
    { cause: reason },
  );
}
