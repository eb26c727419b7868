import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { XMLParser } from 'fast-xml-parser';

import { logEvent } from '@/lib/logging/logger';

import type { IncomingHttpHeaders, IncomingMessage, RequestOptions } from 'node:http';

const parser = new XMLParser({ ignoreAttributes: true, removeNSPrefix: true, parseTagValue: false });

// Polymorphic vim25 payloads carry their concrete type in xsi:type, which only survives with attributes on.
const typedParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

const EXCERPT_LIMIT = 2000;

export type SoapConnection = {
  sdkEndpoint: string;
  insecure: boolean;
  timeoutMs: number;
  cookie?: string;
};

export type SoapResponse = { status: number; headers: IncomingHttpHeaders; bodyText: string };

export class SoapTransportError extends Error {
  readonly op: string;
  readonly timeout: boolean;

  constructor(input: { op: string; timeout: boolean; cause: unknown }) {
    const reason = input.cause instanceof Error ? input.cause.message : String(input.cause);
    super(`${input.op} request failed: ${reason}`, { cause: input.cause });
    this.name = 'SoapTransportError';
    this.op = input.op;
    this.timeout = input.timeout;
  }
}

export class SoapFaultError extends Error {
  readonly op: string;
  readonly status: number;
  readonly faultString?: string;
  readonly faultType?: string;
  readonly bodyText: string;

  constructor(input: { op: string; status: number; bodyText: string }) {
    const fault = parseSoapFault(input.bodyText);
    super(
      fault.faultString
        ? `${input.op} failed with status ${input.status}: ${fault.faultString}`
        : `${input.op} failed with status ${input.status}`,
    );
    this.name = 'SoapFaultError';
    this.op = input.op;
    this.status = input.status;
    this.faultString = fault.faultString;
    this.faultType = fault.faultType;
    this.bodyText = input.bodyText;
  }
}

export class SoapParseError extends Error {
  readonly op: string;

  constructor(op: string, detail: string) {
    super(`${op} returned unexpected response: ${detail}`);
    this.name = 'SoapParseError';
    this.op = op;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function toArray<T>(value: T | T[] | null | undefined): T[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

/** Text content of a node, whether it was parsed with or without attributes. */
export function toStringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (isRecord(value)) return toStringValue(value['#text']);
  return undefined;
}

export function toNumberValue(value: unknown): number | undefined {
  const text = toStringValue(value);
  if (text === undefined || !text.trim()) return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : undefined;
}

/** `xsi:type` of a node parsed by the typed parser, without any namespace prefix. */
export function xsiTypeOf(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  const raw = toStringValue(value['@_type']);
  if (!raw) return undefined;
  const idx = raw.indexOf(':');
  return idx === -1 ? raw : raw.slice(idx + 1);
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function excerpt(text: string, limit = EXCERPT_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

/**
 * Accepts `vc.example.com`, `vc.example.com:8443`, `https://vc.example.com` or an
 * endpoint that already ends in `/sdk`.
 */
export function toSdkEndpoint(server: string): string {
  const trimmed = server.trim().replace(/\/+$/, '');
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  if (withScheme.endsWith('/sdk')) return withScheme;
  return `${withScheme}/sdk`;
}

export function soapEnvelope(innerXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:vim25="urn:vim25" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <soapenv:Body>
    ${innerXml}
  </soapenv:Body>
</soapenv:Envelope>`;
}

/** `<vim25:tag type="Type">id</vim25:tag>` */
export function moRefXml(tag: string, type: string, id: string): string {
  return `<vim25:${tag} type="${escapeXml(type)}">${escapeXml(id)}</vim25:${tag}>`;
}

function readSoapBody(xml: string, typed: boolean): Record<string, unknown> | undefined {
  const parsed: unknown = (typed ? typedParser : parser).parse(xml);
  if (!isRecord(parsed)) return undefined;
  const envelope = parsed.Envelope;
  if (!isRecord(envelope)) return undefined;
  const body = envelope.Body;
  return isRecord(body) ? body : undefined;
}

export function parseSoapFault(xml: string): { faultString?: string; faultType?: string } {
  try {
    const fault = readSoapBody(xml, false)?.Fault;
    if (!isRecord(fault)) return {};
    const detail = fault.detail;
    // vim25 wraps the fault object as <detail><InvalidLoginFault .../></detail>.
    const detailKey = isRecord(detail) ? Object.keys(detail)[0] : undefined;
    return {
      faultString: toStringValue(fault.faultstring),
      faultType: detailKey?.replace(/Fault$/, ''),
    };
  } catch (err) {
    logEvent({
      level: 'debug',
      service: 'perf-report',
      event_type: 'soap.fault_parse_error',
      cause: err instanceof Error ? err.message : String(err),
      body_excerpt: excerpt(xml),
    });
    return {};
  }
}

/**
 * Returns the `<opResponse>` element of a SOAP body. A response without the element
 * is an error: vim25 always answers with it, even when `returnval` is absent.
 */
export function readSoapResponse(
  xml: string,
  op: string,
  options: { typed?: boolean } = {},
): Record<string, unknown> {
  let body: Record<string, unknown> | undefined;
  try {
    body = readSoapBody(xml, options.typed ?? false);
  } catch (err) {
    throw new SoapParseError(op, err instanceof Error ? err.message : String(err));
  }
  if (!body) throw new SoapParseError(op, 'missing soap body');

  const response = body[`${op}Response`];
  if (isRecord(response)) return response;
  // Self-closing <opResponse/> parses as an empty string.
  if (response === '') return {};
  throw new SoapParseError(op, `missing ${op}Response`);
}

export function extractSessionCookie(headers: IncomingHttpHeaders): string | undefined {
  const cookies = headers['set-cookie'] ?? [];
  const session = cookies.find((c) => c.trim().toLowerCase().startsWith('vmware_soap_session')) ?? cookies[0];
  if (!session) return undefined;
  const pair = session.split(';')[0]?.trim();
  return pair ? pair : undefined;
}

export async function soapPost(input: {
  sdkEndpoint: string;
  bodyXml: string;
  cookie?: string;
  insecure: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<SoapResponse> {
  const url = new URL(input.sdkEndpoint);
  const body = Buffer.from(input.bodyXml, 'utf8');
  const options: RequestOptions = {
    protocol: url.protocol,
    hostname: url.hostname,
    port: url.port ? Number(url.port) : undefined,
    path: `${url.pathname}${url.search}`,
    method: 'POST',
    headers: {
      'content-type': 'text/xml; charset=utf-8',
      'content-length': String(body.length),
      ...(input.cookie ? { cookie: input.cookie } : {}),
    },
    signal: input.signal,
  };

  return new Promise((resolve, reject) => {
    const onResponse = (res: IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))));
      res.on('error', (err) => reject(err));
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, headers: res.headers, bodyText: Buffer.concat(chunks).toString('utf8') });
      });
    };

    const req =
      url.protocol === 'https:'
        ? httpsRequest({ ...options, rejectUnauthorized: !input.insecure }, onResponse)
        : httpRequest(options, onResponse);

    req.on('error', (err) => reject(err));
    req.setTimeout(input.timeoutMs, () => {
      req.destroy(new Error(`timeout after ${input.timeoutMs}ms`));
    });
    req.write(body);
    req.end();
  });
}

/**
 * Posts one vim25 operation. Transport failures become SoapTransportError, non-2xx
 * answers SoapFaultError. An aborted signal rethrows the abort reason untouched.
 */
export async function callSoap(
  conn: SoapConnection,
  op: string,
  innerXml: string,
  options: { signal?: AbortSignal } = {},
): Promise<SoapResponse> {
  options.signal?.throwIfAborted();

  const start = Date.now();
  let res: SoapResponse;
  try {
    res = await soapPost({
      sdkEndpoint: conn.sdkEndpoint,
      bodyXml: soapEnvelope(innerXml),
      cookie: conn.cookie,
      insecure: conn.insecure,
      timeoutMs: conn.timeoutMs,
      signal: options.signal,
    });
  } catch (err) {
    if (options.signal?.aborted) throw options.signal.reason;
    const timeout = err instanceof Error && err.message.startsWith('timeout after');
    logEvent({
      level: 'debug',
      service: 'perf-report',
      event_type: 'soap.request_error',
      op,
      timeout,
      duration_ms: Date.now() - start,
      cause: err instanceof Error ? err.message : String(err),
    });
    throw new SoapTransportError({ op, timeout, cause: err });
  }

  const ok = res.status >= 200 && res.status < 300;
  logEvent({
    level: 'debug',
    service: 'perf-report',
    event_type: 'soap.response',
    op,
    status: res.status,
    duration_ms: Date.now() - start,
    body_length: res.bodyText.length,
    ...(ok ? {} : { body_excerpt: excerpt(res.bodyText) }),
  });

  if (!ok) throw new SoapFaultError({ op, status: res.status, bodyText: res.bodyText });
  return res;
}
