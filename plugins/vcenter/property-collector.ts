import { callSoap, escapeXml, isRecord, moRefXml, readSoapResponse, toArray, toStringValue } from './soap';

import type { SoapConnection } from './soap';

export type ObjectContent = {
  obj: string;
  props: Map<string, unknown>;
};

export type RetrieveResult = {
  objects: ObjectContent[];
  token?: string;
};

const DEFAULT_PAGE_SIZE = 500;

export function parseObjectContents(objects: unknown): ObjectContent[] {
  const out: ObjectContent[] = [];

  for (const object of toArray(objects)) {
    if (!isRecord(object)) continue;

    const obj = toStringValue(object.obj);
    if (!obj) continue;

    const props = new Map<string, unknown>();
    for (const propSet of toArray(object.propSet)) {
      if (!isRecord(propSet)) continue;
      const name = toStringValue(propSet.name);
      if (name) props.set(name, propSet.val);
    }
    out.push({ obj, props });
  }

  return out;
}

/** Parses both RetrievePropertiesEx and ContinueRetrievePropertiesEx answers. */
export function parseRetrieveResult(
  xml: string,
  op: 'RetrievePropertiesEx' | 'ContinueRetrievePropertiesEx',
): RetrieveResult {
  const response = readSoapResponse(xml, op);
  const returnval = response.returnval;
  if (!isRecord(returnval)) return { objects: [] };

  const token = toStringValue(returnval.token);
  return { objects: parseObjectContents(returnval.objects), ...(token ? { token } : {}) };
}

/**
 * Runs one property collector query and follows continuation tokens until the
 * result is complete.
 */
export async function retrieveAllProperties(
  conn: SoapConnection,
  propertyCollector: string,
  specSetXml: string,
  options: { signal?: AbortSignal; pageSize?: number } = {},
): Promise<ObjectContent[]> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const collector = moRefXml('_this', 'PropertyCollector', propertyCollector);

  const first = await callSoap(
    conn,
    'RetrievePropertiesEx',
    `<vim25:RetrievePropertiesEx>
      ${collector}
      <vim25:specSet>${specSetXml}</vim25:specSet>
      <vim25:options><vim25:maxObjects>${pageSize}</vim25:maxObjects></vim25:options>
    </vim25:RetrievePropertiesEx>`,
    { signal: options.signal },
  );

  let page = parseRetrieveResult(first.bodyText, 'RetrievePropertiesEx');
  const objects = [...page.objects];

  while (page.token) {
    const next = await callSoap(
      conn,
      'ContinueRetrievePropertiesEx',
      `<vim25:ContinueRetrievePropertiesEx>
        ${collector}
        <vim25:token>${escapeXml(page.token)}</vim25:token>
      </vim25:ContinueRetrievePropertiesEx>`,
      { signal: options.signal },
    );
    page = parseRetrieveResult(next.bodyText, 'ContinueRetrievePropertiesEx');
    objects.push(...page.objects);
  }

  return objects;
}
