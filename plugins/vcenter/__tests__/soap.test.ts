import { describe, expect, it } from 'vitest';

import {
  escapeXml,
  extractSessionCookie,
  moRefXml,
  parseSoapFault,
  readSoapResponse,
  SoapFaultError,
  SoapParseError,
  toArray,
  toNumberValue,
  toSdkEndpoint,
  xsiTypeOf,
} from '../soap';
import { envelope, faultXml } from './mock-vsphere';

describe('toSdkEndpoint', () => {
  it('adds https and /sdk to a bare host', () => {
    expect(toSdkEndpoint('vcsa.lab.local')).toBe('https://vcsa.lab.local/sdk');
  });

  it('keeps an explicit scheme and port', () => {
    expect(toSdkEndpoint('http://127.0.0.1:8989')).toBe('http://127.0.0.1:8989/sdk');
    expect(toSdkEndpoint('vcsa.lab.local:8443')).toBe('https://vcsa.lab.local:8443/sdk');
  });

  it('does not append /sdk twice', () => {
    expect(toSdkEndpoint('https://vcsa.lab.local/sdk/')).toBe('https://vcsa.lab.local/sdk');
  });
});

it('escapes xml special characters in credentials and ids', () => {
  expect(escapeXml(`a&b<c>"d'`)).toBe('a&amp;b&lt;c&gt;&quot;d&apos;');
  expect(moRefXml('_this', 'SessionManager', 'SessionManager')).toBe(
    '<vim25:_this type="SessionManager">SessionManager</vim25:_this>',
  );
});

it('toArray treats an empty element as no items', () => {
  expect(toArray('')).toEqual([]);
  expect(toArray(undefined)).toEqual([]);
  expect(toArray('x')).toEqual(['x']);
  expect(toArray(['x', 'y'])).toEqual(['x', 'y']);
});

it('toNumberValue reads text nodes and rejects blanks', () => {
  expect(toNumberValue('350')).toBe(350);
  expect(toNumberValue({ '#text': '42', '@_type': 'xsd:long' })).toBe(42);
  expect(toNumberValue('')).toBeUndefined();
  expect(toNumberValue('n/a')).toBeUndefined();
});

it('xsiTypeOf strips the namespace prefix', () => {
  expect(xsiTypeOf({ '@_type': 'vim25:PerfEntityMetric' })).toBe('PerfEntityMetric');
  expect(xsiTypeOf({ '@_type': 'PerfMetricIntSeries' })).toBe('PerfMetricIntSeries');
  expect(xsiTypeOf({ value: '1' })).toBeUndefined();
  expect(xsiTypeOf('text')).toBeUndefined();
});

describe('parseSoapFault', () => {
  it('reads faultstring and the fault type from detail', () => {
    const xml = faultXml('InvalidLogin', 'Cannot complete login due to an incorrect user name or password.');
    expect(parseSoapFault(xml)).toEqual({
      faultString: 'Cannot complete login due to an incorrect user name or password.',
      faultType: 'InvalidLogin',
    });
  });

  it('returns nothing for a non-fault body', () => {
    expect(parseSoapFault('<html><body>Bad Gateway</body></html>')).toEqual({});
  });

  it('feeds SoapFaultError', () => {
    const err = new SoapFaultError({ op: 'Login', status: 500, bodyText: faultXml('NoPermission', 'Permission to perform this operation was denied.') });
    expect(err.faultType).toBe('NoPermission');
    expect(err.message).toBe('Login failed with status 500: Permission to perform this operation was denied.');
  });
});

describe('readSoapResponse', () => {
  it('returns the response element', () => {
    const xml = envelope('<LoginResponse xmlns="urn:vim25"><returnval><key>k1</key><userName>user</userName></returnval></LoginResponse>');
    expect(readSoapResponse(xml, 'Login')).toEqual({ returnval: { key: 'k1', userName: 'user' } });
  });

  it('maps an empty response element to an empty record', () => {
    expect(readSoapResponse(envelope('<LogoutResponse xmlns="urn:vim25"></LogoutResponse>'), 'Logout')).toEqual({});
  });

  it('throws SoapParseError when the response element is missing', () => {
    const xml = envelope('<OtherResponse xmlns="urn:vim25"></OtherResponse>');
    expect(() => readSoapResponse(xml, 'Login')).toThrow(SoapParseError);
    expect(() => readSoapResponse(xml, 'Login')).toThrow('Login returned unexpected response: missing LoginResponse');
  });

  it('throws SoapParseError for a body that is not a soap envelope', () => {
    expect(() => readSoapResponse('<html><body>Bad Gateway</body></html>', 'RetrieveServiceContent')).toThrow(
      'RetrieveServiceContent returned unexpected response: missing soap body',
    );
  });
});

describe('extractSessionCookie', () => {
  it('keeps only the name=value pair of vmware_soap_session', () => {
    expect(
      extractSessionCookie({
        'set-cookie': ['other=1; Path=/', 'vmware_soap_session="52a7"; Path=/; HttpOnly; Secure;'],
      }),
    ).toBe('vmware_soap_session="52a7"');
  });

  it('returns undefined without set-cookie', () => {
    expect(extractSessionCookie({})).toBeUndefined();
  });
});
