import type {
  KubernetesObject,
  V1ConfigMap,
  V1CronJob,
  V1Deployment,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Secret,
  V1Service,
  V1StatefulSet,
} from '@kubernetes/client-node';
import type { SearchDatabaseObject, SearchDatabaseStatus } from '../apis/v1alpha1/search-database.js';
import type { ServiceMonitor } from '../builders/monitoring-resources.js';
import type { Certificate } from '../builders/tls-resources.js';

/**
 * Namespaced access to one kind. `get` resolves to null when the object does
 * not exist; every other API failure rejects.
 */
export interface ResourceClient<T extends KubernetesObject> {
  get(namespace: string, name: string): Promise<T | null>;
  create(namespace: string, body: T): Promise<T>;
  /** Full replace; the body's resourceVersion makes concurrent writes fail with 409. */
  replace(namespace: string, name: string, body: T): Promise<T>;
}

/** Descriptors are read with their spec unvalidated, so deletion never depends on it. */
export interface DatabaseClient {
  get(namespace: string, name: string): Promise<SearchDatabaseObject | null>;
  /** JSON patch of metadata.finalizers, guarded by a test of the object's resourceVersion. */
  patchFinalizers(db: SearchDatabaseObject, finalizers: string[]): Promise<void>;
  replaceStatus(db: SearchDatabaseObject, status: SearchDatabaseStatus): Promise<SearchDatabaseObject>;
}

export interface PodLister {
  list(namespace: string, labelSelector: string): Promise<V1Pod[]>;
}

export interface KubeClient {
  readonly databases: DatabaseClient;
  readonly secrets: ResourceClient<V1Secret>;
  readonly configMaps: ResourceClient<V1ConfigMap>;
  readonly services: ResourceClient<V1Service>;
  readonly statefulSets: ResourceClient<V1StatefulSet>;
  readonly deployments: ResourceClient<V1Deployment>;
  readonly cronJobs: ResourceClient<V1CronJob>;
  readonly persistentVolumeClaims: ResourceClient<V1PersistentVolumeClaim>;
  readonly certificates: ResourceClient<Certificate>;
  readonly serviceMonitors: ResourceClient<ServiceMonitor>;
  readonly pods: PodLister;
  /** Resolves when the API server answers. */
  ping(): Promise<void>;
}

export type EventType = 'Normal' | 'Warning';

export interface EventRecorder {
  /** Never rejects; failures to record are logged. */
  record(db: SearchDatabaseObject, type: EventType, reason: string, message: string): Promise<void>;
}
