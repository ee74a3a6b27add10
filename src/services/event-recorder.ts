import type { CoreV1Api, CoreV1Event } from '@kubernetes/client-node';
import type { SearchDatabaseObject } from '../apis/v1alpha1/search-database.js';
import { MANAGED_BY } from '../builders/labels.js';
import { formatKubeError } from '../utils/kube-errors.js';
import { logDebug, logWarning } from '../utils/logger.js';
import type { EventRecorder, EventType } from './kube-client.js';

export function buildEvent(
  db: SearchDatabaseObject,
  type: EventType,
  reason: string,
  message: string,
  now: Date = new Date(),
): CoreV1Event {
  const { namespace, name, uid, resourceVersion } = db.metadata;
  return {
    apiVersion: 'v1',
    kind: 'Event',
    metadata: { generateName: `${name}.`, namespace },
    involvedObject: {
      apiVersion: db.apiVersion,
      kind: db.kind,
      name,
      namespace,
      uid,
      resourceVersion,
    },
    type,
    reason,
    message,
    source: { component: MANAGED_BY },
    reportingComponent: MANAGED_BY,
    firstTimestamp: now,
    lastTimestamp: now,
    count: 1,
  };
}

/** Records core/v1 Events against the descriptor. */
export class KubernetesEventRecorder implements EventRecorder {
  constructor(private readonly coreApi: CoreV1Api) {}

  async record(db: SearchDatabaseObject, type: EventType, reason: string, message: string): Promise<void> {
    const { namespace, name } = db.metadata;
    try {
      await this.coreApi.createNamespacedEvent({ namespace, body: buildEvent(db, type, reason, message) });
      logDebug(`Recorded ${type} event ${reason}`, { namespace, name });
    } catch (error) {
      logWarning(`Failed to record event ${reason}`, { namespace, name, error: formatKubeError(error) });
    }
  }
}
