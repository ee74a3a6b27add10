import { parseSearchDatabaseObject, resolveSpec, type SearchDatabase } from '../../src/apis/v1alpha1/search-database.js';

export const NAMESPACE = 'db';
export const CLUSTER_DOMAIN = 'svc.cluster.local';
export const UPLOADER_IMAGE = 'amazon/aws-cli:2.15.0';

export function manifest(spec: Record<string, unknown> = {}, name = 'demo'): Record<string, unknown> {
  return {
    apiVersion: 'searchdb.io/v1alpha1',
    kind: 'SearchDatabase',
    metadata: { name, namespace: NAMESPACE, uid: `uid-${name}`, generation: 1 },
    spec,
  };
}

export function database(spec: Record<string, unknown> = {}, name = 'demo'): SearchDatabase {
  return resolveSpec(parseSearchDatabaseObject(manifest(spec, name)));
}

export function signal(): AbortSignal {
  return new AbortController().signal;
}
