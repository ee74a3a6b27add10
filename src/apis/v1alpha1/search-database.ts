import type {
  V1Affinity,
  V1PodSecurityContext,
  V1ResourceRequirements,
  V1SecurityContext,
  V1Toleration,
} from '@kubernetes/client-node';
import { z } from 'zod';
import { InvalidSpecError } from '../../types/index.js';

export const SEARCH_DATABASE_GROUP = 'searchdb.io';
export const SEARCH_DATABASE_VERSION = 'v1alpha1';
export const SEARCH_DATABASE_PLURAL = 'searchdatabases';
export const SEARCH_DATABASE_KIND = 'SearchDatabase';
export const SEARCH_DATABASE_API_VERSION = `${SEARCH_DATABASE_GROUP}/${SEARCH_DATABASE_VERSION}`;

export const POSTGRES_PORT = 5432;
export const DEFAULT_METRICS_PORT = 9187;
export const DEFAULT_IMAGE = 'paradedb/paradedb:latest';
export const DEFAULT_POOLER_IMAGE = 'bitnami/pgbouncer:latest';
export const DEFAULT_EXPORTER_IMAGE = 'quay.io/prometheuscommunity/postgres-exporter:latest';

export const PHASES = ['Pending', 'Creating', 'Running', 'Updating', 'Failed', 'Deleting'] as const;
export type SearchDatabasePhase = (typeof PHASES)[number];

export const CONDITION_READY = 'Ready';
export const CONDITION_PROGRESSING = 'Progressing';
export const CONDITION_DEGRADED = 'Degraded';

const isRecord = (value: unknown): boolean => typeof value === 'object' && value !== null && !Array.isArray(value);

// Quantities arrive as "10Gi" or as bare numbers
const quantity = z.union([z.string().min(1), z.number()]).transform((value) => String(value));
const secretRef = z.object({ name: z.string().min(1) });
const stringMap = z.record(z.string()).default({});

const storageSchema = z.object({
  size: quantity.default('10Gi'),
  storageClassName: z.string().optional(),
  accessModes: z.array(z.string()).default(['ReadWriteOnce']),
  walStorage: z
    .object({
      size: quantity.default('5Gi'),
      storageClassName: z.string().optional(),
    })
    .optional(),
});

const userSchema = z.object({
  name: z.string().min(1),
  secretRef,
  databases: z.array(z.string().min(1)).default([]),
  privileges: z.array(z.string().min(1)).default([]),
});

const authSchema = z.object({
  superuserSecretRef: secretRef.optional(),
  database: z.string().min(1).default('paradedb'),
  users: z.array(userSchema).default([]),
  pgHBA: z.array(z.string()).default([]),
});

const tlsSchema = z.object({
  enabled: z.boolean().default(false),
  secretRef: secretRef.optional(),
  certManager: z
    .object({
      enabled: z.boolean().default(false),
      issuerRef: z
        .object({
          name: z.string().min(1),
          kind: z.enum(['Issuer', 'ClusterIssuer']).default('Issuer'),
        })
        .optional(),
    })
    .optional(),
});

const connectionPoolingSchema = z.object({
  enabled: z.boolean().default(false),
  image: z.string().min(1).default(DEFAULT_POOLER_IMAGE),
  replicas: z.number().int().min(1).default(1),
  poolMode: z.enum(['session', 'transaction', 'statement']).default('transaction'),
  maxClientConnections: z.number().int().nonnegative().default(100),
  defaultPoolSize: z.number().int().nonnegative().default(20),
  minPoolSize: z.number().int().nonnegative().default(0),
  reservePoolSize: z.number().int().nonnegative().default(5),
  resources: z.custom<V1ResourceRequirements>(isRecord).optional(),
});

const backupSchema = z.object({
  enabled: z.boolean().default(false),
  schedule: z.string().min(1).default('0 2 * * *'),
  retentionPolicy: z
    .object({
      keepLast: z.number().int().nonnegative().default(7),
      keepDaily: z.number().int().nonnegative().default(7),
      keepWeekly: z.number().int().nonnegative().default(4),
    })
    .default({}),
  s3: z
    .object({
      endpoint: z.string().min(1),
      bucket: z.string().min(1),
      region: z.string().optional(),
      secretRef,
      path: z.string().optional(),
    })
    .optional(),
  pvc: z
    .object({
      size: quantity.default('20Gi'),
      storageClassName: z.string().optional(),
    })
    .optional(),
});

const monitoringSchema = z.object({
  enabled: z.boolean().default(true),
  image: z.string().min(1).default(DEFAULT_EXPORTER_IMAGE),
  port: z.number().int().positive().default(DEFAULT_METRICS_PORT),
  resources: z.custom<V1ResourceRequirements>(isRecord).optional(),
  serviceMonitor: z
    .object({
      enabled: z.boolean().default(false),
      labels: stringMap,
      interval: z.string().min(1).default('30s'),
    })
    .optional(),
  customQueries: stringMap,
});

const extensionsSchema = z.object({
  pgSearch: z.boolean().default(true),
  pgAnalytics: z.boolean().default(true),
  pgVector: z.boolean().default(false),
  additional: z.array(z.string().min(1)).default([]),
});

export const searchDatabaseSpecSchema = z.object({
  image: z.string().min(1).default(DEFAULT_IMAGE),
  replicas: z.number().int().min(1).max(10).default(1),
  postgresVersion: z.string().min(1).default('16'),
  storage: storageSchema.default({}),
  resources: z.custom<V1ResourceRequirements>(isRecord).optional(),
  auth: authSchema.default({}),
  tls: tlsSchema.optional(),
  connectionPooling: connectionPoolingSchema.optional(),
  backup: backupSchema.optional(),
  monitoring: monitoringSchema.optional(),
  extensions: extensionsSchema.default({}),
  postgresConfig: stringMap,
  serviceType: z.enum(['ClusterIP', 'NodePort', 'LoadBalancer']).default('ClusterIP'),
  nodeSelector: z.record(z.string()).optional(),
  tolerations: z.array(z.custom<V1Toleration>(isRecord)).optional(),
  affinity: z.custom<V1Affinity>(isRecord).optional(),
  podSecurityContext: z.custom<V1PodSecurityContext>(isRecord).optional(),
  containerSecurityContext: z.custom<V1SecurityContext>(isRecord).optional(),
});

const conditionSchema = z.object({
  type: z.string(),
  status: z.enum(['True', 'False', 'Unknown']),
  lastTransitionTime: z.string(),
  reason: z.string().default(''),
  message: z.string().default(''),
});

export const searchDatabaseStatusSchema = z.object({
  phase: z.enum(PHASES).optional(),
  readyReplicas: z.number().int().nonnegative().optional(),
  currentVersion: z.string().optional(),
  endpoint: z.string().optional(),
  poolerEndpoint: z.string().optional(),
  lastBackup: z.string().optional(),
  lastBackupSize: z.string().optional(),
  conditions: z.array(conditionSchema).optional(),
  observedGeneration: z.number().int().optional(),
  message: z.string().optional(),
});

const metadataSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().min(1),
    uid: z.string().default(''),
    resourceVersion: z.string().optional(),
    generation: z.number().int().optional(),
    deletionTimestamp: z.string().optional(),
    finalizers: z.array(z.string()).optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

// Identity and status only; the spec is validated separately
export const searchDatabaseObjectSchema = z.object({
  apiVersion: z.string().default(SEARCH_DATABASE_API_VERSION),
  kind: z.string().default(SEARCH_DATABASE_KIND),
  metadata: metadataSchema,
  spec: z.unknown(),
  status: searchDatabaseStatusSchema.optional(),
});

export type SearchDatabaseSpec = z.infer<typeof searchDatabaseSpecSchema>;
export type SearchDatabaseStatus = z.infer<typeof searchDatabaseStatusSchema>;
export type SearchDatabaseObject = z.infer<typeof searchDatabaseObjectSchema>;

/** A descriptor whose spec validated, with the CRD defaults applied. */
export interface SearchDatabase extends Omit<SearchDatabaseObject, 'spec'> {
  spec: SearchDatabaseSpec;
}

export type SearchDatabaseUser = SearchDatabaseSpec['auth']['users'][number];
export type ConnectionPoolingSpec = NonNullable<SearchDatabaseSpec['connectionPooling']>;
export type BackupSpec = NonNullable<SearchDatabaseSpec['backup']>;
export type MonitoringSpec = z.infer<typeof monitoringSchema>;

/** Parses metadata and status, leaving the spec raw. */
export function parseSearchDatabaseObject(raw: unknown): SearchDatabaseObject {
  return searchDatabaseObjectSchema.parse(raw);
}

function formatSpecIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${['spec', ...issue.path].join('.')}: ${issue.message}`).join('; ');
}

/**
 * Validates the spec of a fetched descriptor and applies its defaults.
 * Throws InvalidSpecError naming every offending field.
 */
export function resolveSpec(obj: SearchDatabaseObject): SearchDatabase {
  const result = searchDatabaseSpecSchema.default({}).safeParse(obj.spec);
  if (!result.success) {
    throw new InvalidSpecError(formatSpecIssues(result.error));
  }
  return { ...obj, spec: result.data };
}

// Deterministic names, all derived from the descriptor name

export const names = {
  service: (db: SearchDatabase): string => db.metadata.name,
  statefulSet: (db: SearchDatabase): string => db.metadata.name,
  credentialsSecret: (db: SearchDatabase): string => `${db.metadata.name}-credentials`,
  configMap: (db: SearchDatabase): string => `${db.metadata.name}-config`,
  headlessService: (db: SearchDatabase): string => `${db.metadata.name}-headless`,
  poolerDeployment: (db: SearchDatabase): string => `${db.metadata.name}-pooler`,
  poolerService: (db: SearchDatabase): string => `${db.metadata.name}-pooler`,
  poolerConfigMap: (db: SearchDatabase): string => `${db.metadata.name}-pooler-config`,
  metricsService: (db: SearchDatabase): string => `${db.metadata.name}-metrics`,
  serviceMonitor: (db: SearchDatabase): string => `${db.metadata.name}-metrics`,
  exporterQueriesConfigMap: (db: SearchDatabase): string => `${db.metadata.name}-exporter-queries`,
  certificate: (db: SearchDatabase): string => `${db.metadata.name}-tls`,
  backupCronJob: (db: SearchDatabase): string => `${db.metadata.name}-backup`,
  backupVolumeClaim: (db: SearchDatabase): string => `${db.metadata.name}-backup`,
};

/** Secret holding the superuser credentials, external or generated. */
export function credentialsSecretName(db: SearchDatabase): string {
  return db.spec.auth.superuserSecretRef?.name ?? names.credentialsSecret(db);
}

/** Secret the database mounts for TLS, when TLS is on. */
export function tlsSecretName(db: SearchDatabase): string | undefined {
  if (!isTLSEnabled(db)) return undefined;
  if (db.spec.tls?.secretRef) return db.spec.tls.secretRef.name;
  if (db.spec.tls?.certManager?.enabled) return names.certificate(db);
  return undefined;
}

export function isConnectionPoolingEnabled(db: SearchDatabase): boolean {
  return db.spec.connectionPooling?.enabled === true;
}

export function isTLSEnabled(db: SearchDatabase): boolean {
  return db.spec.tls?.enabled === true;
}

export function isBackupEnabled(db: SearchDatabase): boolean {
  return db.spec.backup?.enabled === true;
}

// An absent monitoring block means monitoring with defaults
export function isMonitoringEnabled(db: SearchDatabase): boolean {
  return db.spec.monitoring === undefined || db.spec.monitoring.enabled;
}

export function monitoringSettings(db: SearchDatabase): MonitoringSpec {
  return db.spec.monitoring ?? monitoringSchema.parse({});
}

export function isServiceMonitorEnabled(db: SearchDatabase): boolean {
  return isMonitoringEnabled(db) && db.spec.monitoring?.serviceMonitor?.enabled === true;
}

