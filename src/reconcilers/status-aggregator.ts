import type { V1Pod, V1StatefulSet } from '@kubernetes/client-node';
import { isDeepStrictEqual } from 'node:util';
import {
  CONDITION_DEGRADED,
  CONDITION_PROGRESSING,
  CONDITION_READY,
  POSTGRES_PORT,
  isBackupEnabled,
  isConnectionPoolingEnabled,
  names,
  type SearchDatabase,
  type SearchDatabaseObject,
  type SearchDatabaseStatus,
} from '../apis/v1alpha1/search-database.js';
import { parseBackupSize, formatBytes } from '../builders/backup-script.js';
import { PRUNE_CONTAINER, UPLOAD_CONTAINER } from '../builders/backup-resources.js';
import { DATABASE_CONTAINER } from '../builders/database-resources.js';
import { backupLabels, toLabelSelector } from '../builders/labels.js';
import type { DatabaseClient, KubeClient } from '../services/kube-client.js';
import type { Condition } from '../types/index.js';
import { logDebug } from '../utils/logger.js';
import { StatusUpdater } from '../utils/status-updater.js';

export interface ObservedState {
  statefulSet: V1StatefulSet | null;
  /** Pods of the backup job, any phase. */
  backupPods: V1Pod[];
}

export interface BackupRecord {
  finishedAt: Date;
  sizeBytes?: number;
}

export function serviceEndpoint(service: string, namespace: string, clusterDomain: string): string {
  return `${service}.${namespace}.${clusterDomain}:${POSTGRES_PORT}`;
}

/** The most recent successful backup, from the main container's termination state. */
export function latestBackup(pods: V1Pod[]): BackupRecord | undefined {
  let latest: BackupRecord | undefined;
  for (const pod of pods) {
    if (pod.status?.phase !== 'Succeeded') continue;
    const container = pod.status.containerStatuses?.find(
      (status) => status.name === UPLOAD_CONTAINER || status.name === PRUNE_CONTAINER,
    );
    const terminated = container?.state?.terminated;
    if (!terminated?.finishedAt) continue;
    const finishedAt = new Date(terminated.finishedAt);
    if (!latest || finishedAt > latest.finishedAt) {
      latest = { finishedAt, sizeBytes: parseBackupSize(terminated.message) };
    }
  }
  return latest;
}

function databaseImage(statefulSet: V1StatefulSet | null): string | undefined {
  return statefulSet?.spec?.template.spec?.containers.find((c) => c.name === DATABASE_CONTAINER)?.image;
}

/**
 * Derives the status of a successful pass from the live world. Pure; `now`
 * stamps conditions whose status flips.
 */
export function computeStatus(
  db: SearchDatabase,
  observed: ObservedState,
  clusterDomain: string,
  now: Date = new Date(),
): SearchDatabaseStatus {
  const previous = db.status ?? {};
  const desired = db.spec.replicas;
  const ready = Math.min(observed.statefulSet?.status?.readyReplicas ?? 0, desired);
  let conditions: Condition[] = previous.conditions ?? [];
  let phase: SearchDatabaseStatus['phase'];

  if (ready === desired && desired > 0) {
    phase = 'Running';
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_READY, 'True', 'AllReplicasReady', 'All replicas are ready', now);
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_PROGRESSING, 'False', 'DeploymentComplete', 'Deployment is complete', now);
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_DEGRADED, 'False', 'AllReplicasHealthy', 'All replicas are healthy', now);
  } else {
    const scaling = ready > 0;
    phase = scaling ? 'Updating' : 'Creating';
    const message = `${scaling ? 'Scaling' : 'Creating'}: ${ready}/${desired} replicas ready`;
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_READY, 'False', scaling ? 'Scaling' : 'Creating', message, now);
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_PROGRESSING, 'True', scaling ? 'Scaling' : 'Creating', message, now);
    conditions = StatusUpdater.updateCondition(conditions, CONDITION_DEGRADED, 'False', 'Reconciled', 'Reconciliation succeeded', now);
  }

  const { namespace } = db.metadata;
  const status: SearchDatabaseStatus = {
    phase,
    readyReplicas: ready,
    endpoint: serviceEndpoint(names.service(db), namespace, clusterDomain),
    conditions,
  };

  const version = databaseImage(observed.statefulSet);
  if (version) status.currentVersion = version;
  if (isConnectionPoolingEnabled(db)) {
    status.poolerEndpoint = serviceEndpoint(names.poolerService(db), namespace, clusterDomain);
  }
  if (db.metadata.generation !== undefined) status.observedGeneration = db.metadata.generation;

  if (isBackupEnabled(db)) {
    const backup = latestBackup(observed.backupPods);
    if (backup) {
      status.lastBackup = backup.finishedAt.toISOString();
      if (backup.sizeBytes !== undefined) status.lastBackupSize = formatBytes(backup.sizeBytes);
    } else {
      if (previous.lastBackup) status.lastBackup = previous.lastBackup;
      if (previous.lastBackupSize) status.lastBackupSize = previous.lastBackupSize;
    }
  }

  return status;
}

// Compares as the API server stores them: undefined fields dropped
function sameStatus(a: SearchDatabaseStatus | undefined, b: SearchDatabaseStatus): boolean {
  const normalize = (value: unknown): unknown => JSON.parse(JSON.stringify(value ?? {}));
  return isDeepStrictEqual(normalize(a), normalize(b));
}

/**
 * Writes `status` unless the stored one already equals it. The result keeps
 * the caller's spec with the server's metadata and status.
 */
export async function writeStatusIfChanged<T extends SearchDatabaseObject>(
  databases: DatabaseClient,
  db: T,
  status: SearchDatabaseStatus,
): Promise<T> {
  if (sameStatus(db.status, status)) {
    return db;
  }
  const updated = await databases.replaceStatus(db, status);
  return { ...db, metadata: updated.metadata, status: updated.status };
}

export class StatusAggregator {
  constructor(
    private readonly client: KubeClient,
    private readonly clusterDomain: string,
  ) {}

  async observe(db: SearchDatabase, signal: AbortSignal): Promise<ObservedState> {
    const { namespace } = db.metadata;
    signal.throwIfAborted();
    const statefulSet = await this.client.statefulSets.get(namespace, names.statefulSet(db));
    let backupPods: V1Pod[] = [];
    if (isBackupEnabled(db)) {
      signal.throwIfAborted();
      backupPods = await this.client.pods.list(namespace, toLabelSelector(backupLabels(db)));
    }
    signal.throwIfAborted();
    return { statefulSet, backupPods };
  }

  async aggregate(db: SearchDatabase, signal: AbortSignal): Promise<SearchDatabase> {
    const observed = await this.observe(db, signal);
    const status = computeStatus(db, observed, this.clusterDomain);
    const updated = await writeStatusIfChanged(this.client.databases, db, status);
    logDebug(updated === db ? 'Status unchanged' : 'Status updated', {
      namespace: db.metadata.namespace,
      name: db.metadata.name,
      phase: status.phase,
      readyReplicas: status.readyReplicas,
    });
    return updated;
  }
}
