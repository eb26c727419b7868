import { logEvent } from '@/lib/logging/logger';

import { missingSessionCookieError, toConnectionError, toLoginError } from './errors';
import {
  callSoap,
  escapeXml,
  extractSessionCookie,
  isRecord,
  moRefXml,
  readSoapResponse,
  SoapParseError,
  toSdkEndpoint,
  toStringValue,
} from './soap';

import type { SoapConnection } from './soap';
import type { ServiceContent, Session } from './types';

export type ConnectInput = {
  /** Host, host:port or URL of the vCenter / ESXi endpoint. */
  endpoint: string;
  username: string;
  password: string;
  /** true skips TLS certificate verification. */
  insecure: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
};

function requireMoRef(returnval: Record<string, unknown>, field: keyof Omit<ServiceContent, 'about'>): string {
  const id = toStringValue(returnval[field]);
  if (!id) throw new SoapParseError('RetrieveServiceContent', `missing ${field}`);
  return id;
}

export function parseServiceContent(xml: string): ServiceContent {
  const response = readSoapResponse(xml, 'RetrieveServiceContent');
  const returnval = response.returnval;
  if (!isRecord(returnval)) throw new SoapParseError('RetrieveServiceContent', 'missing returnval');

  const about = isRecord(returnval.about) ? returnval.about : undefined;
  return {
    rootFolder: requireMoRef(returnval, 'rootFolder'),
    propertyCollector: requireMoRef(returnval, 'propertyCollector'),
    viewManager: requireMoRef(returnval, 'viewManager'),
    sessionManager: requireMoRef(returnval, 'sessionManager'),
    perfManager: requireMoRef(returnval, 'perfManager'),
    ...(about
      ? { about: { fullName: toStringValue(about.fullName), apiVersion: toStringValue(about.apiVersion) } }
      : {}),
  };
}

export async function connect(input: ConnectInput): Promise<Session> {
  const sdkEndpoint = toSdkEndpoint(input.endpoint);
  const conn: SoapConnection = { sdkEndpoint, insecure: input.insecure, timeoutMs: input.timeoutMs };
  const signal = input.signal;

  // 1) Service content: managed object ids for everything below.
  let serviceContent: ServiceContent;
  try {
    const res = await callSoap(
      conn,
      'RetrieveServiceContent',
      `<vim25:RetrieveServiceContent>
        ${moRefXml('_this', 'ServiceInstance', 'ServiceInstance')}
      </vim25:RetrieveServiceContent>`,
      { signal },
    );
    serviceContent = parseServiceContent(res.bodyText);
  } catch (err) {
    if (signal?.aborted) throw err;
    throw toConnectionError(err, sdkEndpoint);
  }

  // 2) Login; the session lives in the vmware_soap_session cookie.
  let cookie: string | undefined;
  try {
    const res = await callSoap(
      conn,
      'Login',
      `<vim25:Login>
        ${moRefXml('_this', 'SessionManager', serviceContent.sessionManager)}
        <vim25:userName>${escapeXml(input.username)}</vim25:userName>
        <vim25:password>${escapeXml(input.password)}</vim25:password>
      </vim25:Login>`,
      { signal },
    );
    readSoapResponse(res.bodyText, 'Login');
    cookie = extractSessionCookie(res.headers);
  } catch (err) {
    if (signal?.aborted) throw err;
    throw toLoginError(err, sdkEndpoint);
  }
  if (!cookie) throw missingSessionCookieError(sdkEndpoint);

  logEvent({
    level: 'info',
    service: 'perf-report',
    event_type: 'session.connected',
    endpoint: sdkEndpoint,
    insecure: input.insecure,
    ...(serviceContent.about?.fullName ? { product: serviceContent.about.fullName } : {}),
    ...(serviceContent.about?.apiVersion ? { api_version: serviceContent.about.apiVersion } : {}),
  });

  return Object.freeze({
    sdkEndpoint,
    insecure: input.insecure,
    timeoutMs: input.timeoutMs,
    cookie,
    username: input.username,
    serviceContent: Object.freeze(serviceContent),
  });
}

export function sessionConnection(session: Session): SoapConnection {
  return {
    sdkEndpoint: session.sdkEndpoint,
    insecure: session.insecure,
    timeoutMs: session.timeoutMs,
    cookie: session.cookie,
  };
}

/**
 * Best effort: a failed Logout is logged, the session then simply expires server side.
 * A cancelled run sends no Logout at all.
 */
export async function disconnect(session: Session, options: { signal?: AbortSignal } = {}): Promise<void> {
  if (options.signal?.aborted) {
    logEvent({ level: 'debug', service: 'perf-report', event_type: 'session.logout_skipped', endpoint: session.sdkEndpoint });
    return;
  }

  try {
    await callSoap(
      sessionConnection(session),
      'Logout',
      `<vim25:Logout>
        ${moRefXml('_this', 'SessionManager', session.serviceContent.sessionManager)}
      </vim25:Logout>`,
      { signal: options.signal },
    );
    logEvent({ level: 'debug', service: 'perf-report', event_type: 'session.logout', endpoint: session.sdkEndpoint });
  } catch (err) {
    logEvent({
      level: 'warn',
      service: 'perf-report',
      event_type: 'session.logout_failed',
      endpoint: session.sdkEndpoint,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}
