import type {
  KubernetesObject,
  V1ConfigMap,
  V1Container,
  V1CronJob,
  V1Deployment,
  V1ObjectMeta,
  V1PodTemplateSpec,
  V1Service,
  V1ServicePort,
  V1StatefulSet,
} from '@kubernetes/client-node';
import {
  isBackupEnabled,
  isConnectionPoolingEnabled,
  isMonitoringEnabled,
  isServiceMonitorEnabled,
  isTLSEnabled,
  names,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';
import {
  backupTarget,
  buildBackupCronJob,
  buildBackupVolumeClaim,
  type BackupTarget,
} from '../builders/backup-resources.js';
import { unsupportedPrivileges } from '../builders/config-builder.js';
import {
  buildConfigMap,
  buildCredentialsSecret,
  buildHeadlessService,
  buildService,
  buildStatefulSet,
  generatePassword,
} from '../builders/database-resources.js';
import {
  buildExporterQueriesConfigMap,
  buildMetricsService,
  buildServiceMonitor,
  type ServiceMonitor,
} from '../builders/monitoring-resources.js';
import { buildPoolerConfigMap, buildPoolerDeployment, buildPoolerService } from '../builders/pooler-resources.js';
import { buildCertificate, type Certificate } from '../builders/tls-resources.js';
import type { KubeClient } from '../services/kube-client.js';
import { PreconditionError } from '../types/index.js';
import { quantityValues } from '../utils/quantity.js';
import type { ReconcileStep, ResourceSyncer, SyncOutcome, SyncStep } from './resource-syncer.js';

export interface SyncPlanOptions {
  clusterDomain: string;
  uploaderImage: string;
}

/** One step of a pass. `message` prefixes the error when the step fails. */
export interface PlannedStep {
  message: string;
  execute(syncer: ResourceSyncer, signal: AbortSignal): Promise<SyncOutcome>;
}

function planned<T extends KubernetesObject>(db: SearchDatabase, message: string, step: SyncStep<T>): PlannedStep {
  return { message, execute: (syncer, signal) => syncer.sync(db, step, signal) };
}

function failing(message: string, error: Error): PlannedStep {
  return {
    message,
    execute: async () => {
      throw error;
    },
  };
}

function mergedMetadata(live: KubernetesObject, desired: KubernetesObject): V1ObjectMeta {
  const metadata = live.metadata ?? {};
  const labels = { ...metadata.labels, ...desired.metadata?.labels };
  const annotations = desired.metadata?.annotations
    ? { ...metadata.annotations, ...desired.metadata.annotations }
    : metadata.annotations;
  return { ...metadata, labels, annotations };
}

function metadataProjection(obj: KubernetesObject): { labels?: Record<string, string>; annotations?: Record<string, string> } {
  return { labels: obj.metadata?.labels, annotations: obj.metadata?.annotations };
}

// The API server stores quantities canonicalised ("0.5" as "500m"); compare their values
function containerQuantities(container: V1Container): unknown {
  const { resources } = container;
  if (!resources) return container;
  return {
    ...container,
    resources: { ...resources, requests: quantityValues(resources.requests), limits: quantityValues(resources.limits) },
  };
}

function templateProjection(template: V1PodTemplateSpec | undefined): unknown {
  if (!template?.spec) return template;
  return {
    ...template,
    spec: {
      ...template.spec,
      containers: template.spec.containers.map(containerQuantities),
      initContainers: template.spec.initContainers?.map(containerQuantities),
    },
  };
}

/** Desired ports, keeping the node ports the cluster allocated to the live ones. */
export function withAllocatedNodePorts(
  desired: V1ServicePort[] | undefined,
  live: V1ServicePort[] | undefined,
  type: string | undefined,
): V1ServicePort[] | undefined {
  if (type !== 'NodePort' && type !== 'LoadBalancer') return desired;
  return desired?.map((port) => {
    if (port.nodePort !== undefined) return port;
    const match = live?.find((candidate) =>
      port.name !== undefined ? candidate.name === port.name : candidate.port === port.port,
    );
    return match?.nodePort === undefined ? port : { ...port, nodePort: match.nodePort };
  });
}

// Per-kind mutable projections

const configMapFields: Pick<ReconcileStep<V1ConfigMap>, 'project' | 'apply' | 'compare'> = {
  compare: 'exact',
  project: (obj) => obj.data ?? {},
  apply: (live, desired) => ({ ...live, metadata: mergedMetadata(live, desired), data: desired.data }),
};

const serviceFields: Pick<ReconcileStep<V1Service>, 'project' | 'apply'> = {
  project: (obj) => ({
    ...metadataProjection(obj),
    ports: obj.spec?.ports,
    type: obj.spec?.type,
    selector: obj.spec?.selector,
  }),
  apply: (live, desired) => ({
    ...live,
    metadata: mergedMetadata(live, desired),
    spec: {
      ...live.spec,
      ports: withAllocatedNodePorts(desired.spec?.ports, live.spec?.ports, desired.spec?.type),
      type: desired.spec?.type,
      selector: desired.spec?.selector,
    },
  }),
};

const statefulSetFields: Pick<ReconcileStep<V1StatefulSet>, 'project' | 'apply'> = {
  project: (obj) => ({
    labels: obj.metadata?.labels,
    replicas: obj.spec?.replicas,
    template: templateProjection(obj.spec?.template),
  }),
  apply: (live, desired) => {
    const spec = live.spec ?? desired.spec;
    if (!spec || !desired.spec) return live;
    return {
      ...live,
      metadata: mergedMetadata(live, desired),
      spec: { ...spec, replicas: desired.spec.replicas, template: desired.spec.template },
    };
  },
};

const deploymentFields: Pick<ReconcileStep<V1Deployment>, 'project' | 'apply'> = {
  project: (obj) => ({
    labels: obj.metadata?.labels,
    replicas: obj.spec?.replicas,
    template: templateProjection(obj.spec?.template),
  }),
  apply: (live, desired) => {
    const spec = live.spec ?? desired.spec;
    if (!spec || !desired.spec) return live;
    return {
      ...live,
      metadata: mergedMetadata(live, desired),
      spec: { ...spec, replicas: desired.spec.replicas, template: desired.spec.template },
    };
  },
};

const cronJobFields: Pick<ReconcileStep<V1CronJob>, 'project' | 'apply'> = {
  project: (obj) => ({
    labels: obj.metadata?.labels,
    schedule: obj.spec?.schedule,
    concurrencyPolicy: obj.spec?.concurrencyPolicy,
    successfulJobsHistoryLimit: obj.spec?.successfulJobsHistoryLimit,
    failedJobsHistoryLimit: obj.spec?.failedJobsHistoryLimit,
    jobTemplate: obj.spec?.jobTemplate,
  }),
  apply: (live, desired) => {
    const spec = live.spec ?? desired.spec;
    if (!spec || !desired.spec) return live;
    return {
      ...live,
      metadata: mergedMetadata(live, desired),
      spec: {
        ...spec,
        schedule: desired.spec.schedule,
        concurrencyPolicy: desired.spec.concurrencyPolicy,
        successfulJobsHistoryLimit: desired.spec.successfulJobsHistoryLimit,
        failedJobsHistoryLimit: desired.spec.failedJobsHistoryLimit,
        jobTemplate: desired.spec.jobTemplate,
      },
    };
  },
};

const certificateFields: Pick<ReconcileStep<Certificate>, 'project' | 'apply'> = {
  project: (obj) => ({ labels: obj.metadata.labels, spec: obj.spec }),
  apply: (live, desired) => ({ ...live, metadata: mergedMetadata(live, desired), spec: desired.spec }),
};

const serviceMonitorFields: Pick<ReconcileStep<ServiceMonitor>, 'project' | 'apply'> = {
  project: (obj) => ({ labels: obj.metadata.labels, spec: obj.spec }),
  apply: (live, desired) => ({ ...live, metadata: mergedMetadata(live, desired), spec: desired.spec }),
};

function validationSteps(db: SearchDatabase): PlannedStep[] {
  const problems = db.spec.auth.users
    .map((user) => ({ user: user.name, unsupported: unsupportedPrivileges(user) }))
    .filter(({ unsupported }) => unsupported.length > 0)
    .map(({ user, unsupported }) => `user ${user} has unsupported database privileges ${unsupported.join(', ')}`);
  if (problems.length === 0) return [];
  return [failing('Failed to validate users', new PreconditionError(problems.join('; ')))];
}

function credentialsSteps(db: SearchDatabase, client: KubeClient): PlannedStep[] {
  const external = db.spec.auth.superuserSecretRef;
  if (external) {
    return [
      planned(db, 'Failed to verify superuser Secret', {
        mode: 'verify',
        kind: 'Secret',
        objectName: external.name,
        client: client.secrets,
      }),
    ];
  }
  return [
    planned(db, 'Failed to create credentials Secret', {
      mode: 'create-once',
      kind: 'Secret',
      objectName: names.credentialsSecret(db),
      client: client.secrets,
      build: () => buildCredentialsSecret(db, generatePassword()),
      createdEvent: { reason: 'SecretCreated', message: `Created credentials Secret ${names.credentialsSecret(db)}` },
    }),
  ];
}

function tlsSteps(db: SearchDatabase, client: KubeClient, options: SyncPlanOptions): PlannedStep[] {
  if (!isTLSEnabled(db)) return [];
  const tls = db.spec.tls;
  if (tls?.secretRef) {
    return [
      planned(db, 'Failed to verify TLS Secret', {
        mode: 'verify',
        kind: 'Secret',
        objectName: tls.secretRef.name,
        client: client.secrets,
      }),
    ];
  }
  if (tls?.certManager?.enabled) {
    return [
      planned(db, 'Failed to reconcile Certificate', {
        mode: 'reconcile',
        kind: 'Certificate',
        objectName: names.certificate(db),
        client: client.certificates,
        build: () => buildCertificate(db, options.clusterDomain),
        createdEvent: { reason: 'CertificateCreated', message: `Requested Certificate ${names.certificate(db)}` },
        ...certificateFields,
      }),
    ];
  }
  return [
    failing(
      'Failed to configure TLS',
      new PreconditionError('tls.enabled requires tls.secretRef or tls.certManager.enabled'),
    ),
  ];
}

function databaseSteps(db: SearchDatabase, client: KubeClient): PlannedStep[] {
  return [
    planned(db, 'Failed to reconcile ConfigMap', {
      mode: 'reconcile',
      kind: 'ConfigMap',
      objectName: names.configMap(db),
      client: client.configMaps,
      build: () => buildConfigMap(db),
      ...configMapFields,
    }),
    planned(db, 'Failed to reconcile StatefulSet', {
      mode: 'reconcile',
      kind: 'StatefulSet',
      objectName: names.statefulSet(db),
      client: client.statefulSets,
      build: () => buildStatefulSet(db),
      createdEvent: { reason: 'StatefulSetCreated', message: `Created StatefulSet ${names.statefulSet(db)}` },
      ...statefulSetFields,
    }),
    planned(db, 'Failed to reconcile Service', {
      mode: 'reconcile',
      kind: 'Service',
      objectName: names.service(db),
      client: client.services,
      build: () => buildService(db),
      createdEvent: { reason: 'ServiceCreated', message: `Created Service ${names.service(db)}` },
      ...serviceFields,
    }),
    planned(db, 'Failed to create headless Service', {
      mode: 'create-once',
      kind: 'Service',
      objectName: names.headlessService(db),
      client: client.services,
      build: () => buildHeadlessService(db),
      createdEvent: { reason: 'ServiceCreated', message: `Created headless Service ${names.headlessService(db)}` },
    }),
  ];
}

function poolerSteps(db: SearchDatabase, client: KubeClient): PlannedStep[] {
  if (!isConnectionPoolingEnabled(db)) return [];
  return [
    planned(db, 'Failed to reconcile pooler ConfigMap', {
      mode: 'reconcile',
      kind: 'ConfigMap',
      objectName: names.poolerConfigMap(db),
      client: client.configMaps,
      build: () => buildPoolerConfigMap(db),
      ...configMapFields,
    }),
    planned(db, 'Failed to reconcile pooler Deployment', {
      mode: 'reconcile',
      kind: 'Deployment',
      objectName: names.poolerDeployment(db),
      client: client.deployments,
      build: () => buildPoolerDeployment(db),
      createdEvent: { reason: 'PoolerCreated', message: `Created connection pooler ${names.poolerDeployment(db)}` },
      ...deploymentFields,
    }),
    planned(db, 'Failed to reconcile pooler Service', {
      mode: 'reconcile',
      kind: 'Service',
      objectName: names.poolerService(db),
      client: client.services,
      build: () => buildPoolerService(db),
      ...serviceFields,
    }),
  ];
}

function monitoringSteps(db: SearchDatabase, client: KubeClient): PlannedStep[] {
  if (!isMonitoringEnabled(db)) return [];
  const steps: PlannedStep[] = [];

  const queries = buildExporterQueriesConfigMap(db);
  if (queries) {
    steps.push(
      planned(db, 'Failed to reconcile exporter queries ConfigMap', {
        mode: 'reconcile',
        kind: 'ConfigMap',
        objectName: names.exporterQueriesConfigMap(db),
        client: client.configMaps,
        build: () => queries,
        ...configMapFields,
      }),
    );
  }

  steps.push(
    planned(db, 'Failed to reconcile metrics Service', {
      mode: 'reconcile',
      kind: 'Service',
      objectName: names.metricsService(db),
      client: client.services,
      build: () => buildMetricsService(db),
      ...serviceFields,
    }),
  );

  if (isServiceMonitorEnabled(db)) {
    steps.push(
      planned(db, 'Failed to reconcile ServiceMonitor', {
        mode: 'reconcile',
        kind: 'ServiceMonitor',
        objectName: names.serviceMonitor(db),
        client: client.serviceMonitors,
        build: () => buildServiceMonitor(db),
        ...serviceMonitorFields,
      }),
    );
  }
  return steps;
}

function backupSteps(db: SearchDatabase, client: KubeClient, options: SyncPlanOptions): PlannedStep[] {
  if (!isBackupEnabled(db)) return [];

  let target: BackupTarget;
  try {
    target = backupTarget(db);
  } catch (error) {
    return [failing('Failed to configure backup', error instanceof Error ? error : new Error(String(error)))];
  }

  const targetStep =
    target.kind === 's3'
      ? planned(db, 'Failed to verify backup credentials Secret', {
          mode: 'verify',
          kind: 'Secret',
          objectName: target.s3.secretRef.name,
          client: client.secrets,
        })
      : planned(db, 'Failed to create backup PersistentVolumeClaim', {
          mode: 'create-once',
          kind: 'PersistentVolumeClaim',
          objectName: names.backupVolumeClaim(db),
          client: client.persistentVolumeClaims,
          build: () => buildBackupVolumeClaim(db),
        });

  return [
    targetStep,
    planned(db, 'Failed to reconcile backup CronJob', {
      mode: 'reconcile',
      kind: 'CronJob',
      objectName: names.backupCronJob(db),
      client: client.cronJobs,
      build: () => buildBackupCronJob(db, options.uploaderImage),
      createdEvent: {
        reason: 'BackupScheduled',
        message: `Scheduled backups for ${db.metadata.name} (${db.spec.backup?.schedule ?? ''})`,
      },
      ...cronJobFields,
    }),
  ];
}

/**
 * The ordered steps of one pass: user validation, credentials, TLS,
 * configuration, the database StatefulSet and its Services, then the
 * optional pooler, monitoring and backup tiers.
 */
export function buildSyncPlan(db: SearchDatabase, client: KubeClient, options: SyncPlanOptions): PlannedStep[] {
  return [
    ...validationSteps(db),
    ...credentialsSteps(db, client),
    ...tlsSteps(db, client, options),
    ...databaseSteps(db, client),
    ...poolerSteps(db, client),
    ...monitoringSteps(db, client),
    ...backupSteps(db, client, options),
  ];
}
