import type { V1ConfigMap, V1Container, V1Deployment, V1Probe, V1Service } from '@kubernetes/client-node';
import {
  POSTGRES_PORT,
  credentialsSecretName,
  names,
  type ConnectionPoolingSpec,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';
import { POOLER_CONFIG_MOUNT_PATH, POOLER_CONF_KEY, buildPoolerConfig, configHash } from './config-builder.js';
import { secretKeyEnv } from './env.js';
import { CONFIG_HASH_ANNOTATION, poolerLabels, poolerSelectorLabels } from './labels.js';

export const POOLER_CONTAINER = 'pgbouncer';

function pooling(db: SearchDatabase): ConnectionPoolingSpec {
  const spec = db.spec.connectionPooling;
  if (!spec) {
    throw new Error(`Connection pooling is not configured for ${db.metadata.name}`);
  }
  return spec;
}

function poolerConfigData(db: SearchDatabase): Record<string, string> {
  return { [POOLER_CONF_KEY]: buildPoolerConfig(db) };
}

export function buildPoolerConfigMap(db: SearchDatabase): V1ConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: names.poolerConfigMap(db),
      namespace: db.metadata.namespace,
      labels: poolerLabels(db),
    },
    data: poolerConfigData(db),
  };
}

function tcpProbe(initialDelaySeconds: number, periodSeconds: number): V1Probe {
  return { tcpSocket: { port: POSTGRES_PORT }, initialDelaySeconds, periodSeconds };
}

function buildPoolerContainer(db: SearchDatabase): V1Container {
  const spec = pooling(db);
  const secret = credentialsSecretName(db);
  return {
    name: POOLER_CONTAINER,
    image: spec.image,
    ports: [{ name: 'pgbouncer', containerPort: POSTGRES_PORT, protocol: 'TCP' }],
    env: [
      { name: 'PGBOUNCER_DATABASE', value: db.spec.auth.database },
      { name: 'PGBOUNCER_PORT', value: String(POSTGRES_PORT) },
      { name: 'POSTGRESQL_HOST', value: names.service(db) },
      { name: 'POSTGRESQL_PORT', value: String(POSTGRES_PORT) },
      secretKeyEnv('POSTGRESQL_USERNAME', secret, 'username'),
      secretKeyEnv('POSTGRESQL_PASSWORD', secret, 'password'),
      { name: 'PGBOUNCER_POOL_MODE', value: spec.poolMode },
      { name: 'PGBOUNCER_MAX_CLIENT_CONN', value: String(spec.maxClientConnections) },
      { name: 'PGBOUNCER_DEFAULT_POOL_SIZE', value: String(spec.defaultPoolSize) },
      { name: 'PGBOUNCER_MIN_POOL_SIZE', value: String(spec.minPoolSize) },
      { name: 'PGBOUNCER_RESERVE_POOL_SIZE', value: String(spec.reservePoolSize) },
    ],
    volumeMounts: [
      {
        name: 'config',
        mountPath: `${POOLER_CONFIG_MOUNT_PATH}/${POOLER_CONF_KEY}`,
        subPath: POOLER_CONF_KEY,
        readOnly: true,
      },
    ],
    resources: spec.resources,
    livenessProbe: tcpProbe(10, 10),
    readinessProbe: tcpProbe(5, 5),
  };
}

export function buildPoolerDeployment(db: SearchDatabase): V1Deployment {
  const labels = poolerLabels(db);
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: names.poolerDeployment(db),
      namespace: db.metadata.namespace,
      labels,
    },
    spec: {
      replicas: pooling(db).replicas,
      selector: { matchLabels: poolerSelectorLabels(db) },
      template: {
        metadata: {
          labels,
          annotations: { [CONFIG_HASH_ANNOTATION]: configHash(poolerConfigData(db)) },
        },
        spec: {
          containers: [buildPoolerContainer(db)],
          volumes: [{ name: 'config', configMap: { name: names.poolerConfigMap(db) } }],
          nodeSelector: db.spec.nodeSelector,
          tolerations: db.spec.tolerations,
        },
      },
    },
  };
}

export function buildPoolerService(db: SearchDatabase): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.poolerService(db),
      namespace: db.metadata.namespace,
      labels: poolerLabels(db),
    },
    spec: {
      selector: poolerSelectorLabels(db),
      type: 'ClusterIP',
      ports: [{ name: 'pgbouncer', port: POSTGRES_PORT, protocol: 'TCP' }],
    },
  };
}
