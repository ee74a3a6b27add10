import { randomBytes } from 'crypto';
import type {
  V1ConfigMap,
  V1Container,
  V1EnvVar,
  V1PersistentVolumeClaim,
  V1Secret,
  V1Service,
  V1ServicePort,
  V1StatefulSet,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node';
import {
  POSTGRES_PORT,
  credentialsSecretName,
  isMonitoringEnabled,
  monitoringSettings,
  names,
  tlsSecretName,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';
import {
  CONFIG_MOUNT_PATH,
  DATA_MOUNT_PATH,
  INIT_MOUNT_PATH,
  INIT_SCRIPT_KEY,
  PGDATA,
  PG_HBA_KEY,
  POSTGRES_CONF_KEY,
  TLS_MOUNT_PATH,
  WAL_MOUNT_PATH,
  buildDatabaseConfigData,
  configHash,
  userPasswordEnv,
} from './config-builder.js';
import { secretKeyEnv } from './env.js';
import { CONFIG_HASH_ANNOTATION, databaseLabels, databaseSelectorLabels } from './labels.js';
import { buildExporterContainer, exporterVolumes } from './monitoring-resources.js';

export const DATABASE_CONTAINER = 'database';
export const SUPERUSER = 'postgres';

export function generatePassword(length = 24): string {
  return randomBytes(length).toString('base64url').slice(0, length);
}

function encode(value: string): string {
  return Buffer.from(value).toString('base64');
}

export function buildCredentialsSecret(db: SearchDatabase, password: string): V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: names.credentialsSecret(db),
      namespace: db.metadata.namespace,
      labels: databaseLabels(db),
    },
    type: 'Opaque',
    data: {
      username: encode(SUPERUSER),
      password: encode(password),
      database: encode(db.spec.auth.database),
    },
  };
}

export function buildConfigMap(db: SearchDatabase): V1ConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: names.configMap(db),
      namespace: db.metadata.namespace,
      labels: databaseLabels(db),
    },
    data: buildDatabaseConfigData(db),
  };
}

function postgresPort(name = 'postgres'): V1ServicePort {
  return { name, port: POSTGRES_PORT, protocol: 'TCP' };
}

export function buildService(db: SearchDatabase): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.service(db),
      namespace: db.metadata.namespace,
      labels: databaseLabels(db),
    },
    spec: {
      selector: databaseSelectorLabels(db),
      type: db.spec.serviceType,
      ports: [postgresPort()],
    },
  };
}

export function buildHeadlessService(db: SearchDatabase): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.headlessService(db),
      namespace: db.metadata.namespace,
      labels: databaseLabels(db),
    },
    spec: {
      selector: databaseSelectorLabels(db),
      clusterIP: 'None',
      ports: [postgresPort()],
    },
  };
}

function databaseEnv(db: SearchDatabase): V1EnvVar[] {
  const secret = credentialsSecretName(db);
  const env: V1EnvVar[] = [
    secretKeyEnv('POSTGRES_USER', secret, 'username'),
    secretKeyEnv('POSTGRES_PASSWORD', secret, 'password'),
    { name: 'POSTGRES_DB', value: db.spec.auth.database },
    { name: 'PGDATA', value: PGDATA },
  ];
  if (db.spec.storage.walStorage) {
    env.push({ name: 'POSTGRES_INITDB_WALDIR', value: `${WAL_MOUNT_PATH}/pg_wal` });
  }
  db.spec.auth.users.forEach((user, index) => {
    env.push(secretKeyEnv(userPasswordEnv(index), user.secretRef.name, 'password'));
  });
  return env;
}

function databaseVolumeMounts(db: SearchDatabase): V1VolumeMount[] {
  const mounts: V1VolumeMount[] = [
    { name: 'data', mountPath: DATA_MOUNT_PATH },
    { name: 'config', mountPath: CONFIG_MOUNT_PATH },
    { name: 'init', mountPath: INIT_MOUNT_PATH },
  ];
  if (db.spec.storage.walStorage) {
    mounts.push({ name: 'wal', mountPath: WAL_MOUNT_PATH });
  }
  if (tlsSecretName(db)) {
    mounts.push({ name: 'tls', mountPath: TLS_MOUNT_PATH, readOnly: true });
  }
  return mounts;
}

function databaseVolumes(db: SearchDatabase): V1Volume[] {
  const configMapName = names.configMap(db);
  const volumes: V1Volume[] = [
    {
      name: 'config',
      configMap: {
        name: configMapName,
        items: [
          { key: POSTGRES_CONF_KEY, path: POSTGRES_CONF_KEY },
          { key: PG_HBA_KEY, path: PG_HBA_KEY },
        ],
      },
    },
    {
      name: 'init',
      configMap: {
        name: configMapName,
        items: [{ key: INIT_SCRIPT_KEY, path: INIT_SCRIPT_KEY }],
      },
    },
  ];
  const tlsSecret = tlsSecretName(db);
  if (tlsSecret) {
    volumes.push({ name: 'tls', secret: { secretName: tlsSecret, defaultMode: 0o600 } });
  }
  return volumes;
}

function buildDatabaseContainer(db: SearchDatabase): V1Container {
  const readiness = ['pg_isready', '-h', '127.0.0.1', '-p', String(POSTGRES_PORT)];
  return {
    name: DATABASE_CONTAINER,
    image: db.spec.image,
    args: ['postgres', '-c', `config_file=${CONFIG_MOUNT_PATH}/${POSTGRES_CONF_KEY}`],
    ports: [{ name: 'postgres', containerPort: POSTGRES_PORT, protocol: 'TCP' }],
    env: databaseEnv(db),
    volumeMounts: databaseVolumeMounts(db),
    resources: db.spec.resources,
    securityContext: db.spec.containerSecurityContext,
    livenessProbe: {
      exec: { command: readiness },
      initialDelaySeconds: 30,
      periodSeconds: 10,
      timeoutSeconds: 5,
      failureThreshold: 6,
    },
    readinessProbe: {
      exec: { command: readiness },
      initialDelaySeconds: 5,
      periodSeconds: 5,
      timeoutSeconds: 3,
      failureThreshold: 3,
    },
  };
}

function volumeClaimTemplates(db: SearchDatabase): V1PersistentVolumeClaim[] {
  const { storage } = db.spec;
  const labels = databaseLabels(db);
  const claims: V1PersistentVolumeClaim[] = [
    {
      metadata: { name: 'data', labels },
      spec: {
        accessModes: storage.accessModes,
        storageClassName: storage.storageClassName,
        resources: { requests: { storage: storage.size } },
      },
    },
  ];
  if (storage.walStorage) {
    claims.push({
      metadata: { name: 'wal', labels },
      spec: {
        accessModes: storage.accessModes,
        storageClassName: storage.walStorage.storageClassName,
        resources: { requests: { storage: storage.walStorage.size } },
      },
    });
  }
  return claims;
}

export function buildStatefulSet(db: SearchDatabase): V1StatefulSet {
  const labels = databaseLabels(db);
  const annotations: Record<string, string> = {
    [CONFIG_HASH_ANNOTATION]: configHash(buildDatabaseConfigData(db)),
  };
  const containers = [buildDatabaseContainer(db)];
  const volumes = databaseVolumes(db);

  if (isMonitoringEnabled(db)) {
    const monitoring = monitoringSettings(db);
    annotations['prometheus.io/scrape'] = 'true';
    annotations['prometheus.io/port'] = String(monitoring.port);
    containers.push(buildExporterContainer(db));
    volumes.push(...exporterVolumes(db));
  }

  return {
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: {
      name: names.statefulSet(db),
      namespace: db.metadata.namespace,
      labels,
    },
    spec: {
      serviceName: names.headlessService(db),
      replicas: db.spec.replicas,
      selector: { matchLabels: databaseSelectorLabels(db) },
      template: {
        metadata: { labels, annotations },
        spec: {
          containers,
          volumes,
          nodeSelector: db.spec.nodeSelector,
          tolerations: db.spec.tolerations,
          affinity: db.spec.affinity,
          securityContext: db.spec.podSecurityContext,
        },
      },
      volumeClaimTemplates: volumeClaimTemplates(db),
    },
  };
}
