import type { V1OwnerReference } from '@kubernetes/client-node';
import {
  SEARCH_DATABASE_API_VERSION,
  SEARCH_DATABASE_KIND,
  type SearchDatabase,
} from '../apis/v1alpha1/search-database.js';

export const MANAGED_BY = 'searchdb-operator';
export const MANAGED_BY_SELECTOR = `app.kubernetes.io/managed-by=${MANAGED_BY}`;
export const CONFIG_HASH_ANNOTATION = 'searchdb.io/config-hash';

export type Labels = Record<string, string>;

export function databaseLabels(db: SearchDatabase): Labels {
  return {
    'app.kubernetes.io/name': 'searchdb',
    'app.kubernetes.io/instance': db.metadata.name,
    'app.kubernetes.io/version': db.spec.postgresVersion,
    'app.kubernetes.io/component': 'database',
    'app.kubernetes.io/managed-by': MANAGED_BY,
  };
}

export function databaseSelectorLabels(db: SearchDatabase): Labels {
  return {
    'app.kubernetes.io/name': 'searchdb',
    'app.kubernetes.io/instance': db.metadata.name,
  };
}

export function poolerLabels(db: SearchDatabase): Labels {
  return {
    'app.kubernetes.io/name': 'pgbouncer',
    'app.kubernetes.io/instance': db.metadata.name,
    'app.kubernetes.io/component': 'pooler',
    'app.kubernetes.io/managed-by': MANAGED_BY,
  };
}

export function poolerSelectorLabels(db: SearchDatabase): Labels {
  return {
    'app.kubernetes.io/name': 'pgbouncer',
    'app.kubernetes.io/instance': db.metadata.name,
    'app.kubernetes.io/component': 'pooler',
  };
}

export function backupLabels(db: SearchDatabase): Labels {
  return {
    'app.kubernetes.io/name': 'searchdb-backup',
    'app.kubernetes.io/instance': db.metadata.name,
    'app.kubernetes.io/component': 'backup',
    'app.kubernetes.io/managed-by': MANAGED_BY,
  };
}

export function toLabelSelector(labels: Labels): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

export function controllerReference(db: SearchDatabase): V1OwnerReference {
  return {
    apiVersion: SEARCH_DATABASE_API_VERSION,
    kind: SEARCH_DATABASE_KIND,
    name: db.metadata.name,
    uid: db.metadata.uid,
    controller: true,
    blockOwnerDeletion: true,
  };
}
