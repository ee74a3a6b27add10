import type { V1Container, V1CronJob, V1EnvVar, V1PersistentVolumeClaim, V1Volume } from '@kubernetes/client-node';
import {
  credentialsSecretName,
  names,
  type BackupSpec,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';
import { PreconditionError } from '../types/index.js';
import {
  BACKUP_MOUNT_PATH,
  buildDumpScript,
  buildS3UploadScript,
  buildVolumePruneScript,
  type BackupScriptOptions,
} from './backup-script.js';
import { secretKeyEnv } from './env.js';
import { backupLabels } from './labels.js';

export const DUMP_CONTAINER = 'dump';
export const UPLOAD_CONTAINER = 'upload';
export const PRUNE_CONTAINER = 'prune';

// Keys expected in the user's S3 credentials Secret
export const S3_ACCESS_KEY_ID_KEY = 'access-key-id';
export const S3_SECRET_ACCESS_KEY_KEY = 'secret-access-key';

export type BackupTarget = { kind: 's3'; s3: NonNullable<BackupSpec['s3']> } | { kind: 'pvc' };

function backup(db: SearchDatabase): BackupSpec {
  const spec = db.spec.backup;
  if (!spec) {
    throw new Error(`Backup is not configured for ${db.metadata.name}`);
  }
  return spec;
}

/** S3 wins when both targets are given. */
export function backupTarget(db: SearchDatabase): BackupTarget {
  const spec = backup(db);
  if (spec.s3) return { kind: 's3', s3: spec.s3 };
  if (spec.pvc) return { kind: 'pvc' };
  throw new PreconditionError(`backup for ${db.metadata.name} needs an s3 or pvc target`);
}

export function s3Destination(s3: NonNullable<BackupSpec['s3']>): string {
  const path = (s3.path ?? '').replace(/^\/+|\/+$/g, '');
  return path ? `s3://${s3.bucket}/${path}/` : `s3://${s3.bucket}/`;
}

export function buildBackupVolumeClaim(db: SearchDatabase): V1PersistentVolumeClaim {
  const pvc = backup(db).pvc;
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: names.backupVolumeClaim(db),
      namespace: db.metadata.namespace,
      labels: backupLabels(db),
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      storageClassName: pvc?.storageClassName,
      resources: { requests: { storage: pvc?.size ?? '20Gi' } },
    },
  };
}

function credentialsEnv(db: SearchDatabase): V1EnvVar[] {
  const secret = credentialsSecretName(db);
  return [secretKeyEnv('PGUSER', secret, 'username'), secretKeyEnv('PGPASSWORD', secret, 'password')];
}

function dumpContainer(db: SearchDatabase): V1Container {
  return {
    name: DUMP_CONTAINER,
    image: db.spec.image,
    command: ['/bin/sh', '-c', buildDumpScript(db.metadata.name, names.service(db), db.spec.auth.database)],
    env: credentialsEnv(db),
    volumeMounts: [{ name: 'backup', mountPath: BACKUP_MOUNT_PATH }],
  };
}

function mainContainer(db: SearchDatabase, target: BackupTarget, uploaderImage: string): V1Container {
  const options: BackupScriptOptions = { prefix: db.metadata.name, retention: backup(db).retentionPolicy };
  const volumeMounts = [{ name: 'backup', mountPath: BACKUP_MOUNT_PATH }];

  if (target.kind === 'pvc') {
    return {
      name: PRUNE_CONTAINER,
      image: db.spec.image,
      command: ['/bin/sh', '-c', buildVolumePruneScript(options)],
      volumeMounts,
    };
  }

  const { s3 } = target;
  return {
    name: UPLOAD_CONTAINER,
    image: uploaderImage,
    command: ['/bin/sh', '-c', buildS3UploadScript({ ...options, destination: s3Destination(s3) })],
    env: [
      { name: 'S3_ENDPOINT', value: s3.endpoint },
      { name: 'AWS_DEFAULT_REGION', value: s3.region ?? 'us-east-1' },
      secretKeyEnv('AWS_ACCESS_KEY_ID', s3.secretRef.name, S3_ACCESS_KEY_ID_KEY),
      secretKeyEnv('AWS_SECRET_ACCESS_KEY', s3.secretRef.name, S3_SECRET_ACCESS_KEY_KEY),
    ],
    volumeMounts,
  };
}

function backupVolume(db: SearchDatabase, target: BackupTarget): V1Volume {
  if (target.kind === 'pvc') {
    return { name: 'backup', persistentVolumeClaim: { claimName: names.backupVolumeClaim(db) } };
  }
  return { name: 'backup', emptyDir: {} };
}

export function buildBackupCronJob(db: SearchDatabase, uploaderImage: string): V1CronJob {
  const target = backupTarget(db);
  const labels = backupLabels(db);
  return {
    apiVersion: 'batch/v1',
    kind: 'CronJob',
    metadata: {
      name: names.backupCronJob(db),
      namespace: db.metadata.namespace,
      labels,
    },
    spec: {
      schedule: backup(db).schedule,
      concurrencyPolicy: 'Forbid',
      successfulJobsHistoryLimit: 3,
      failedJobsHistoryLimit: 1,
      jobTemplate: {
        metadata: { labels },
        spec: {
          backoffLimit: 2,
          template: {
            metadata: { labels },
            spec: {
              restartPolicy: 'Never',
              initContainers: [dumpContainer(db)],
              containers: [mainContainer(db, target, uploaderImage)],
              volumes: [backupVolume(db, target)],
              nodeSelector: db.spec.nodeSelector,
              tolerations: db.spec.tolerations,
            },
          },
        },
      },
    },
  };
}
