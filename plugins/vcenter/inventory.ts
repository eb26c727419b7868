import { logEvent } from '@/lib/logging/logger';

import { toInventoryError } from './errors';
import { retrieveAllProperties } from './property-collector';
import { sessionConnection } from './session';
import { callSoap, moRefXml, readSoapResponse, SoapParseError, toStringValue } from './soap';

import type { ObjectContent } from './property-collector';
import type { Session, VirtualMachineRef } from './types';

export function parseCreateContainerView(xml: string): string {
  const response = readSoapResponse(xml, 'CreateContainerView');
  const view = toStringValue(response.returnval);
  if (!view) throw new SoapParseError('CreateContainerView', 'missing returnval');
  return view;
}

export function toVirtualMachineRefs(objects: ObjectContent[]): VirtualMachineRef[] {
  return objects.map((o) => {
    const name = toStringValue(o.props.get('name'))?.trim();
    return Object.freeze({ id: o.obj, name: name ? name : o.obj });
  });
}

function vmNameSpecSet(viewId: string): string {
  return `<vim25:propSet>
      <vim25:type>VirtualMachine</vim25:type>
      <vim25:pathSet>name</vim25:pathSet>
    </vim25:propSet>
    <vim25:objectSet>
      ${moRefXml('obj', 'ContainerView', viewId)}
      <vim25:skip>true</vim25:skip>
      <vim25:selectSet xsi:type="vim25:TraversalSpec">
        <vim25:name>traverseView</vim25:name>
        <vim25:type>ContainerView</vim25:type>
        <vim25:path>view</vim25:path>
        <vim25:skip>false</vim25:skip>
      </vim25:selectSet>
    </vim25:objectSet>`;
}

async function destroyView(session: Session, viewId: string, signal: AbortSignal | undefined): Promise<void> {
  // Views die with the session, so a cancelled run leaves this one to expire.
  if (signal?.aborted) {
    logEvent({ level: 'debug', service: 'perf-report', event_type: 'inventory.destroy_view_skipped', view: viewId });
    return;
  }

  try {
    await callSoap(
      sessionConnection(session),
      'DestroyView',
      `<vim25:DestroyView>${moRefXml('_this', 'ContainerView', viewId)}</vim25:DestroyView>`,
      { signal },
    );
  } catch (err) {
    logEvent({
      level: 'warn',
      service: 'perf-report',
      event_type: 'inventory.destroy_view_failed',
      view: viewId,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Lists every VirtualMachine below the root folder through a recursive container
 * view. The view is destroyed before returning unless the run was cancelled.
 */
export async function listVirtualMachines(
  session: Session,
  options: { signal?: AbortSignal; pageSize?: number } = {},
): Promise<VirtualMachineRef[]> {
  const conn = sessionConnection(session);
  const { rootFolder, viewManager, propertyCollector } = session.serviceContent;

  let viewId: string;
  try {
    const res = await callSoap(
      conn,
      'CreateContainerView',
      `<vim25:CreateContainerView>
        ${moRefXml('_this', 'ViewManager', viewManager)}
        ${moRefXml('container', 'Folder', rootFolder)}
        <vim25:type>VirtualMachine</vim25:type>
        <vim25:recursive>true</vim25:recursive>
      </vim25:CreateContainerView>`,
      { signal: options.signal },
    );
    viewId = parseCreateContainerView(res.bodyText);
  } catch (err) {
    if (options.signal?.aborted) throw err;
    throw toInventoryError(err);
  }

  try {
    const objects = await retrieveAllProperties(conn, propertyCollector, vmNameSpecSet(viewId), {
      signal: options.signal,
      pageSize: options.pageSize,
    });
    const vms = toVirtualMachineRefs(objects);
    logEvent({ level: 'info', service: 'perf-report', event_type: 'inventory.listed', vms: vms.length });
    return vms;
  } catch (err) {
    if (options.signal?.aborted) throw err;
    throw toInventoryError(err);
  } finally {
    await destroyView(session, viewId, options.signal);
  }
}
