import type {
  V1ConfigMap,
  V1Container,
  V1EnvVar,
  V1ObjectMeta,
  V1Service,
  V1Volume,
} from '@kubernetes/client-node';
import { z } from 'zod';
import {
  credentialsSecretName,
  monitoringSettings,
  names,
  POSTGRES_PORT,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';
import { EXPORTER_QUERIES_KEY, EXPORTER_QUERIES_MOUNT_PATH, buildExporterQueries } from './config-builder.js';
import { secretKeyEnv } from './env.js';
import { databaseLabels, databaseSelectorLabels, type Labels } from './labels.js';

export const EXPORTER_CONTAINER = 'postgres-exporter';
export const SERVICE_MONITOR_GROUP = 'monitoring.coreos.com';
export const SERVICE_MONITOR_VERSION = 'v1';
export const SERVICE_MONITOR_PLURAL = 'servicemonitors';

const isRecord = (value: unknown): boolean => typeof value === 'object' && value !== null;

export const serviceMonitorSchema = z
  .object({
    apiVersion: z.string(),
    kind: z.string(),
    metadata: z.custom<V1ObjectMeta>(isRecord),
    spec: z
      .object({
        selector: z.object({ matchLabels: z.record(z.string()).optional() }).passthrough(),
        endpoints: z.array(
          z.object({ port: z.string().optional(), interval: z.string().optional(), path: z.string().optional() }).passthrough(),
        ),
      })
      .passthrough(),
  })
  .passthrough();

export type ServiceMonitor = z.infer<typeof serviceMonitorSchema>;

function hasCustomQueries(db: SearchDatabase): boolean {
  return Object.keys(monitoringSettings(db).customQueries).length > 0;
}

export function metricsServiceLabels(db: SearchDatabase): Labels {
  return { ...databaseLabels(db), 'app.kubernetes.io/component': 'metrics' };
}

export function buildExporterContainer(db: SearchDatabase): V1Container {
  const monitoring = monitoringSettings(db);
  const secret = credentialsSecretName(db);
  const env: V1EnvVar[] = [
    {
      name: 'DATA_SOURCE_URI',
      value: `localhost:${POSTGRES_PORT}/${db.spec.auth.database}?sslmode=disable`,
    },
    secretKeyEnv('DATA_SOURCE_USER', secret, 'username'),
    secretKeyEnv('DATA_SOURCE_PASS', secret, 'password'),
  ];

  const container: V1Container = {
    name: EXPORTER_CONTAINER,
    image: monitoring.image,
    ports: [{ name: 'metrics', containerPort: monitoring.port, protocol: 'TCP' }],
    env,
    resources: monitoring.resources,
  };

  if (monitoring.port !== 9187) {
    env.push({ name: 'PG_EXPORTER_WEB_LISTEN_ADDRESS', value: `:${monitoring.port}` });
  }
  if (hasCustomQueries(db)) {
    env.push({ name: 'PG_EXPORTER_EXTEND_QUERY_PATH', value: `${EXPORTER_QUERIES_MOUNT_PATH}/${EXPORTER_QUERIES_KEY}` });
    container.volumeMounts = [{ name: 'exporter-queries', mountPath: EXPORTER_QUERIES_MOUNT_PATH, readOnly: true }];
  }
  return container;
}

export function exporterVolumes(db: SearchDatabase): V1Volume[] {
  if (!hasCustomQueries(db)) return [];
  return [{ name: 'exporter-queries', configMap: { name: names.exporterQueriesConfigMap(db) } }];
}

/** Only built when custom queries are present. */
export function buildExporterQueriesConfigMap(db: SearchDatabase): V1ConfigMap | null {
  if (!hasCustomQueries(db)) return null;
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: names.exporterQueriesConfigMap(db),
      namespace: db.metadata.namespace,
      labels: metricsServiceLabels(db),
    },
    data: {
      [EXPORTER_QUERIES_KEY]: buildExporterQueries(monitoringSettings(db).customQueries),
    },
  };
}

export function buildMetricsService(db: SearchDatabase): V1Service {
  const { port } = monitoringSettings(db);
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.metricsService(db),
      namespace: db.metadata.namespace,
      labels: metricsServiceLabels(db),
      annotations: {
        'prometheus.io/scrape': 'true',
        'prometheus.io/port': String(port),
      },
    },
    spec: {
      selector: databaseSelectorLabels(db),
      type: 'ClusterIP',
      ports: [{ name: 'metrics', port, protocol: 'TCP' }],
    },
  };
}

export function buildServiceMonitor(db: SearchDatabase): ServiceMonitor {
  const serviceMonitor = monitoringSettings(db).serviceMonitor;
  return {
    apiVersion: `${SERVICE_MONITOR_GROUP}/${SERVICE_MONITOR_VERSION}`,
    kind: 'ServiceMonitor',
    metadata: {
      name: names.serviceMonitor(db),
      namespace: db.metadata.namespace,
      labels: { ...databaseLabels(db), ...(serviceMonitor?.labels ?? {}) },
    },
    spec: {
      selector: { matchLabels: metricsServiceLabels(db) },
      endpoints: [{ port: 'metrics', interval: serviceMonitor?.interval ?? '30s' }],
    },
  };
}
