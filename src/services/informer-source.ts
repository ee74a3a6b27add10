import * as k8s from '@kubernetes/client-node';
import {
  SEARCH_DATABASE_API_VERSION,
  SEARCH_DATABASE_GROUP,
  SEARCH_DATABASE_KIND,
  SEARCH_DATABASE_PLURAL,
  SEARCH_DATABASE_VERSION,
} from '../apis/v1alpha1/search-database.js';
import { MANAGED_BY_SELECTOR } from '../builders/labels.js';
import type { ReconcileRequest, WatchSource } from '../types/index.js';
import { getKubeStatusCode } from '../utils/kube-errors.js';
import { logDebug, logError, logInfo } from '../utils/logger.js';

const RESTART_DELAY_MS = 5000;

type ListFn = (namespace: string | undefined, labelSelector: string | undefined) => Promise<k8s.KubernetesListObject<k8s.KubernetesObject>>;

interface WatchTarget {
  kind: string;
  /** API path prefix, without the namespace segment. */
  prefix: string;
  plural: string;
  /** Owned objects are filtered by the managed-by label. */
  owned: boolean;
  list: ListFn;
}

/** The descriptor to reconcile for an owned object, from its controller owner reference. */
export function resolveOwnerRequest(obj: k8s.KubernetesObject): ReconcileRequest | null {
  const namespace = obj.metadata?.namespace;
  if (!namespace) return null;
  const owner = obj.metadata?.ownerReferences?.find(
    (ref) => ref.controller === true && ref.kind === SEARCH_DATABASE_KIND && ref.apiVersion === SEARCH_DATABASE_API_VERSION,
  );
  return owner ? { namespace, name: owner.name } : null;
}

/** The descriptor itself. */
export function resolvePrimaryRequest(obj: k8s.KubernetesObject): ReconcileRequest | null {
  const namespace = obj.metadata?.namespace;
  const name = obj.metadata?.name;
  return namespace && name ? { namespace, name } : null;
}

export function watchPath(target: Pick<WatchTarget, 'prefix' | 'plural'>, namespace?: string): string {
  return namespace ? `${target.prefix}/namespaces/${namespace}/${target.plural}` : `${target.prefix}/${target.plural}`;
}

/**
 * Informers over SearchDatabases and every kind the operator creates. One
 * informer per kind when all namespaces are watched, otherwise one per kind
 * and namespace.
 */
export class InformerSource implements WatchSource {
  readonly name = 'informers';
  private informers: k8s.Informer<k8s.KubernetesObject>[] = [];
  private restartTimers = new Set<NodeJS.Timeout>();
  private running = false;

  constructor(
    private readonly kubeConfig: k8s.KubeConfig,
    private readonly namespaces: string[],
  ) {}

  private targets(): WatchTarget[] {
    const core = this.kubeConfig.makeApiClient(k8s.CoreV1Api);
    const apps = this.kubeConfig.makeApiClient(k8s.AppsV1Api);
    const batch = this.kubeConfig.makeApiClient(k8s.BatchV1Api);
    const custom = this.kubeConfig.makeApiClient(k8s.CustomObjectsApi);
    const resource = { group: SEARCH_DATABASE_GROUP, version: SEARCH_DATABASE_VERSION, plural: SEARCH_DATABASE_PLURAL };

    return [
      {
        kind: SEARCH_DATABASE_KIND,
        prefix: `/apis/${SEARCH_DATABASE_GROUP}/${SEARCH_DATABASE_VERSION}`,
        plural: SEARCH_DATABASE_PLURAL,
        owned: false,
        list: (namespace) =>
          namespace
            ? custom.listNamespacedCustomObject({ ...resource, namespace })
            : custom.listClusterCustomObject(resource),
      },
      {
        kind: 'Secret',
        prefix: '/api/v1',
        plural: 'secrets',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? core.listNamespacedSecret({ namespace, labelSelector })
            : core.listSecretForAllNamespaces({ labelSelector }),
      },
      {
        kind: 'ConfigMap',
        prefix: '/api/v1',
        plural: 'configmaps',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? core.listNamespacedConfigMap({ namespace, labelSelector })
            : core.listConfigMapForAllNamespaces({ labelSelector }),
      },
      {
        kind: 'Service',
        prefix: '/api/v1',
        plural: 'services',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? core.listNamespacedService({ namespace, labelSelector })
            : core.listServiceForAllNamespaces({ labelSelector }),
      },
      {
        kind: 'StatefulSet',
        prefix: '/apis/apps/v1',
        plural: 'statefulsets',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? apps.listNamespacedStatefulSet({ namespace, labelSelector })
            : apps.listStatefulSetForAllNamespaces({ labelSelector }),
      },
      {
        kind: 'Deployment',
        prefix: '/apis/apps/v1',
        plural: 'deployments',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? apps.listNamespacedDeployment({ namespace, labelSelector })
            : apps.listDeploymentForAllNamespaces({ labelSelector }),
      },
      {
        kind: 'CronJob',
        prefix: '/apis/batch/v1',
        plural: 'cronjobs',
        owned: true,
        list: (namespace, labelSelector) =>
          namespace
            ? batch.listNamespacedCronJob({ namespace, labelSelector })
            : batch.listCronJobForAllNamespaces({ labelSelector }),
      },
    ];
  }

  async start(onChange: (request: ReconcileRequest) => void): Promise<void> {
    this.running = true;
    const scopes: Array<string | undefined> = this.namespaces.length > 0 ? this.namespaces : [undefined];

    for (const target of this.targets()) {
      for (const namespace of scopes) {
        const informer = this.createInformer(target, namespace, onChange);
        this.informers.push(informer);
        await informer.start();
      }
    }
    logInfo('Watches started', { informers: this.informers.length, namespaces: this.namespaces });
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const timer of this.restartTimers) clearTimeout(timer);
    this.restartTimers.clear();
    await Promise.all(this.informers.map((informer) => informer.stop()));
    this.informers = [];
  }

  private createInformer(
    target: WatchTarget,
    namespace: string | undefined,
    onChange: (request: ReconcileRequest) => void,
  ): k8s.Informer<k8s.KubernetesObject> {
    const labelSelector = target.owned ? MANAGED_BY_SELECTOR : undefined;
    const informer = k8s.makeInformer<k8s.KubernetesObject>(
      this.kubeConfig,
      watchPath(target, namespace),
      () => target.list(namespace, labelSelector),
      labelSelector,
    );
    const resolve = target.owned ? resolveOwnerRequest : resolvePrimaryRequest;

    const notify = (verb: string) => (obj: k8s.KubernetesObject) => {
      const request = resolve(obj);
      if (!request) return;
      logDebug(`${target.kind} ${verb}`, {
        namespace: obj.metadata?.namespace,
        name: obj.metadata?.name,
        owner: request.name,
      });
      onChange(request);
    };

    informer.on('add', notify('added'));
    informer.on('update', notify('updated'));
    informer.on('delete', notify('deleted'));
    informer.on('error', (error: unknown) => {
      logError(`Watch error for ${target.kind}`, error, { namespace, status: getKubeStatusCode(error) });
      if (!this.running) return;
      const timer = setTimeout(() => {
        this.restartTimers.delete(timer);
        if (!this.running) return;
        logInfo(`Restarting watch for ${target.kind}`, { namespace });
        informer.start().catch((restartError: unknown) => {
          logError(`Failed to restart watch for ${target.kind}`, restartError, { namespace });
        });
      }, RESTART_DELAY_MS);
      this.restartTimers.add(timer);
    });

    return informer;
  }
}
