import * as k8s from '@kubernetes/client-node';
import type { z } from 'zod';
import {
  SEARCH_DATABASE_GROUP,
  SEARCH_DATABASE_PLURAL,
  SEARCH_DATABASE_VERSION,
  parseSearchDatabaseObject,
  type SearchDatabaseObject,
  type SearchDatabaseStatus,
} from '../apis/v1alpha1/search-database.js';
import {
  SERVICE_MONITOR_GROUP,
  SERVICE_MONITOR_PLURAL,
  SERVICE_MONITOR_VERSION,
  serviceMonitorSchema,
  type ServiceMonitor,
} from '../builders/monitoring-resources.js';
import {
  CERTIFICATE_GROUP,
  CERTIFICATE_PLURAL,
  CERTIFICATE_VERSION,
  certificateSchema,
  type Certificate,
} from '../builders/tls-resources.js';
import { isNotFound } from '../utils/kube-errors.js';
import logger from '../utils/logger.js';
import type { DatabaseClient, KubeClient, PodLister, ResourceClient } from './kube-client.js';

/** Resolves to null on 404. */
async function orNull<T>(request: Promise<T>): Promise<T | null> {
  try {
    return await request;
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

interface NamespacedApi<T> {
  read(name: string, namespace: string): Promise<T>;
  create(namespace: string, body: T): Promise<T>;
  replace(name: string, namespace: string, body: T): Promise<T>;
}

function resourceClient<T extends k8s.KubernetesObject>(api: NamespacedApi<T>): ResourceClient<T> {
  return {
    get: (namespace, name) => orNull(api.read(name, namespace)),
    create: (namespace, body) => api.create(namespace, body),
    replace: (namespace, name, body) => api.replace(name, namespace, body),
  };
}

interface CustomResource {
  group: string;
  version: string;
  plural: string;
}

function customResourceClient<T extends k8s.KubernetesObject>(
  api: k8s.CustomObjectsApi,
  resource: CustomResource,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ResourceClient<T> {
  return {
    get: async (namespace, name) => {
      const raw: unknown = await orNull(api.getNamespacedCustomObject({ ...resource, namespace, name }));
      return raw === null ? null : schema.parse(raw);
    },
    create: async (namespace, body) =>
      schema.parse(await api.createNamespacedCustomObject({ ...resource, namespace, body })),
    replace: async (namespace, name, body) =>
      schema.parse(await api.replaceNamespacedCustomObject({ ...resource, namespace, name, body })),
  };
}

const SEARCH_DATABASE_RESOURCE: CustomResource = {
  group: SEARCH_DATABASE_GROUP,
  version: SEARCH_DATABASE_VERSION,
  plural: SEARCH_DATABASE_PLURAL,
};

class SearchDatabaseClient implements DatabaseClient {
  constructor(private readonly api: k8s.CustomObjectsApi) {}

  async get(namespace: string, name: string): Promise<SearchDatabaseObject | null> {
    const raw: unknown = await orNull(
      this.api.getNamespacedCustomObject({ ...SEARCH_DATABASE_RESOURCE, namespace, name }),
    );
    return raw === null ? null : parseSearchDatabaseObject(raw);
  }

  async patchFinalizers(db: SearchDatabaseObject, finalizers: string[]): Promise<void> {
    const { namespace, name, resourceVersion } = db.metadata;
    const patch = [
      { op: 'test', path: '/metadata/resourceVersion', value: resourceVersion },
      { op: db.metadata.finalizers ? 'replace' : 'add', path: '/metadata/finalizers', value: finalizers },
    ];
    await this.api.patchNamespacedCustomObject(
      { ...SEARCH_DATABASE_RESOURCE, namespace, name, body: patch },
      k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.JsonPatch),
    );
  }

  async replaceStatus(db: SearchDatabaseObject, status: SearchDatabaseStatus): Promise<SearchDatabaseObject> {
    const { namespace, name } = db.metadata;
    const updated: unknown = await this.api.replaceNamespacedCustomObjectStatus({
      ...SEARCH_DATABASE_RESOURCE,
      namespace,
      name,
      body: { ...db, status },
    });
    return parseSearchDatabaseObject(updated);
  }
}

/**
 * API access for the operator, built from one KubeConfig. Implements the
 * injected `KubeClient` seam so controllers never touch the generated APIs.
 */
export class KubernetesService implements KubeClient {
  readonly databases: DatabaseClient;
  readonly secrets: ResourceClient<k8s.V1Secret>;
  readonly configMaps: ResourceClient<k8s.V1ConfigMap>;
  readonly services: ResourceClient<k8s.V1Service>;
  readonly statefulSets: ResourceClient<k8s.V1StatefulSet>;
  readonly deployments: ResourceClient<k8s.V1Deployment>;
  readonly cronJobs: ResourceClient<k8s.V1CronJob>;
  readonly persistentVolumeClaims: ResourceClient<k8s.V1PersistentVolumeClaim>;
  readonly certificates: ResourceClient<Certificate>;
  readonly serviceMonitors: ResourceClient<ServiceMonitor>;
  readonly pods: PodLister;

  private readonly coreV1Api: k8s.CoreV1Api;
  private readonly versionApi: k8s.VersionApi;

  constructor(kubeConfig: k8s.KubeConfig) {
    this.coreV1Api = kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.versionApi = kubeConfig.makeApiClient(k8s.VersionApi);
    const core = this.coreV1Api;
    const apps = kubeConfig.makeApiClient(k8s.AppsV1Api);
    const batch = kubeConfig.makeApiClient(k8s.BatchV1Api);
    const custom = kubeConfig.makeApiClient(k8s.CustomObjectsApi);

    this.databases = new SearchDatabaseClient(custom);
    this.secrets = resourceClient<k8s.V1Secret>({
      read: (name, namespace) => core.readNamespacedSecret({ name, namespace }),
      create: (namespace, body) => core.createNamespacedSecret({ namespace, body }),
      replace: (name, namespace, body) => core.replaceNamespacedSecret({ name, namespace, body }),
    });
    this.configMaps = resourceClient<k8s.V1ConfigMap>({
      read: (name, namespace) => core.readNamespacedConfigMap({ name, namespace }),
      create: (namespace, body) => core.createNamespacedConfigMap({ namespace, body }),
      replace: (name, namespace, body) => core.replaceNamespacedConfigMap({ name, namespace, body }),
    });
    this.services = resourceClient<k8s.V1Service>({
      read: (name, namespace) => core.readNamespacedService({ name, namespace }),
      create: (namespace, body) => core.createNamespacedService({ namespace, body }),
      replace: (name, namespace, body) => core.replaceNamespacedService({ name, namespace, body }),
    });
    this.persistentVolumeClaims = resourceClient<k8s.V1PersistentVolumeClaim>({
      read: (name, namespace) => core.readNamespacedPersistentVolumeClaim({ name, namespace }),
      create: (namespace, body) => core.createNamespacedPersistentVolumeClaim({ namespace, body }),
      replace: (name, namespace, body) => core.replaceNamespacedPersistentVolumeClaim({ name, namespace, body }),
    });
    this.statefulSets = resourceClient<k8s.V1StatefulSet>({
      read: (name, namespace) => apps.readNamespacedStatefulSet({ name, namespace }),
      create: (namespace, body) => apps.createNamespacedStatefulSet({ namespace, body }),
      replace: (name, namespace, body) => apps.replaceNamespacedStatefulSet({ name, namespace, body }),
    });
    this.deployments = resourceClient<k8s.V1Deployment>({
      read: (name, namespace) => apps.readNamespacedDeployment({ name, namespace }),
      create: (namespace, body) => apps.createNamespacedDeployment({ namespace, body }),
      replace: (name, namespace, body) => apps.replaceNamespacedDeployment({ name, namespace, body }),
    });
    this.cronJobs = resourceClient<k8s.V1CronJob>({
      read: (name, namespace) => batch.readNamespacedCronJob({ name, namespace }),
      create: (namespace, body) => batch.createNamespacedCronJob({ namespace, body }),
      replace: (name, namespace, body) => batch.replaceNamespacedCronJob({ name, namespace, body }),
    });
    this.certificates = customResourceClient(
      custom,
      { group: CERTIFICATE_GROUP, version: CERTIFICATE_VERSION, plural: CERTIFICATE_PLURAL },
      certificateSchema,
    );
    this.serviceMonitors = customResourceClient(
      custom,
      { group: SERVICE_MONITOR_GROUP, version: SERVICE_MONITOR_VERSION, plural: SERVICE_MONITOR_PLURAL },
      serviceMonitorSchema,
    );
    this.pods = {
      list: async (namespace, labelSelector) =>
        (await core.listNamespacedPod({ namespace, labelSelector })).items,
    };
  }

  /**
   * Load the configuration in-cluster when a service account is mounted,
   * otherwise from KUBECONFIG or the default location.
   */
  static loadKubeConfig(): k8s.KubeConfig {
    const kubeConfig = new k8s.KubeConfig();
    if (process.env.KUBERNETES_SERVICE_HOST && process.env.KUBERNETES_SERVICE_PORT) {
      kubeConfig.loadFromCluster();
      logger.info('Loaded in-cluster Kubernetes configuration');
    } else {
      kubeConfig.loadFromDefault();
      logger.info('Loaded default Kubernetes configuration');
    }
    return kubeConfig;
  }

  getCoreV1Api(): k8s.CoreV1Api {
    return this.coreV1Api;
  }

  async ping(): Promise<void> {
    await this.versionApi.getCode();
  }
}
