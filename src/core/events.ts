import { CoreV1Event } from '@kubernetes/client-node';

import { getCoreV1 } from './kube';
import { logDebug } from '../utils/utils';

export type EventTypeFilter = 'Warning' | 'Normal' | 'All';

export interface WorkloadEventQuery {
  ownerName: string;
  namespace: string;
  eventType?: EventTypeFilter;
  limit?: number;
}

export class EventCollectionError extends Error {
  constructor(
    message: string,
    readonly namespace: string,
  ) {
    super(message);
    this.name = 'EventCollectionError';
  }
}

/**
 * Fetches recent events for a workload and everything it owns.
 * ====================================================================
 * Events are kept when the involved object is the workload itself or one of
 * its generated children (`<owner>-xxxxx` ReplicaSets, pods, PVCs). Results
 * are de-duplicated by uid, sorted newest first and returned as
 * `[type] reason: message (Kind/name)` lines ready for classification.
 *
 * @throws {EventCollectionError} when the events API call fails
 */
export async function collectWorkloadEvents(query: WorkloadEventQuery): Promise<string[]> {
  const { ownerName, namespace, eventType = 'Warning', limit = 100 } = query;
  const coreV1 = getCoreV1();

  let items: CoreV1Event[];
  try {
    const res = await coreV1.listNamespacedEvent({
      namespace,
      fieldSelector: eventType === 'All' ? undefined : `type=${eventType}`,
      timeoutSeconds: 10,
    });
    items = res.items;
  } catch (error) {
    throw new EventCollectionError(
      `Failed to list events in namespace ${namespace}: ${error instanceof Error ? error.message : error}`,
      namespace,
    );
  }

  const related = items.filter((e) => belongsToOwner(e.involvedObject?.name, ownerName));

  const seenUids = new Set<string>();
  const uniqueEvents = related.filter((e) => {
    const uid = e.metadata?.uid || `${e.involvedObject?.name}-${e.reason}-${e.message}`;
    if (seenUids.has(uid)) return false;
    seenUids.add(uid);
    return true;
  });

  const sortedEvents = uniqueEvents
    .sort((a, b) => eventTime(b) - eventTime(a))
    .slice(0, limit);

  logDebug(`Collected ${sortedEvents.length} of ${items.length} events for ${ownerName} in ${namespace}`);

  return sortedEvents.map(formatEvent);
}

export function formatEvent(e: CoreV1Event): string {
  const type = e.type || 'Unknown';
  const reason = e.reason || '';
  const message = e.message || '(no message)';
  const source = e.involvedObject?.name ? `(${e.involvedObject.kind ?? 'Unknown'}/${e.involvedObject.name})` : '';
  return `[${type}] ${reason}: ${message} ${source}`.trim();
}

function belongsToOwner(objectName: string | undefined, ownerName: string): boolean {
  if (!objectName || !ownerName) return false;
  return objectName === ownerName || objectName.startsWith(`${ownerName}-`);
}

function eventTime(e: CoreV1Event): number {
  const time = new Date(e.lastTimestamp || e.eventTime || e.firstTimestamp || 0).getTime();
  return Number.isNaN(time) ? 0 : time;
}
