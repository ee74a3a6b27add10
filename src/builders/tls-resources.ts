import type { V1ObjectMeta } from '@kubernetes/client-node';
import { z } from 'zod';
import { names, type SearchDatabase } from '../apis/v1alpha1/search-database.js';
import { PreconditionError } from '../types/index.js';
import { databaseLabels } from './labels.js';

export const CERTIFICATE_GROUP = 'cert-manager.io';
export const CERTIFICATE_VERSION = 'v1';
export const CERTIFICATE_PLURAL = 'certificates';

const isRecord = (value: unknown): boolean => typeof value === 'object' && value !== null;

export const certificateSchema = z
  .object({
    apiVersion: z.string(),
    kind: z.string(),
    metadata: z.custom<V1ObjectMeta>(isRecord),
    spec: z
      .object({
        secretName: z.string(),
        commonName: z.string().optional(),
        dnsNames: z.array(z.string()).default([]),
        issuerRef: z.object({ name: z.string(), kind: z.string().optional(), group: z.string().optional() }),
        usages: z.array(z.string()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type Certificate = z.infer<typeof certificateSchema>;

/** DNS names the server certificate must cover: both services, short and qualified. */
export function certificateDnsNames(db: SearchDatabase, clusterDomain: string): string[] {
  const { namespace } = db.metadata;
  const hosts = [names.service(db), names.headlessService(db)];
  return hosts.flatMap((host) => [host, `${host}.${namespace}`, `${host}.${namespace}.${clusterDomain}`]);
}

export function buildCertificate(db: SearchDatabase, clusterDomain: string): Certificate {
  const issuerRef = db.spec.tls?.certManager?.issuerRef;
  if (!issuerRef) {
    throw new PreconditionError(`tls.certManager.issuerRef is required for ${db.metadata.name}`);
  }
  const dnsNames = certificateDnsNames(db, clusterDomain);
  return {
    apiVersion: `${CERTIFICATE_GROUP}/${CERTIFICATE_VERSION}`,
    kind: 'Certificate',
    metadata: {
      name: names.certificate(db),
      namespace: db.metadata.namespace,
      labels: databaseLabels(db),
    },
    spec: {
      secretName: names.certificate(db),
      commonName: dnsNames[2],
      dnsNames,
      issuerRef: { name: issuerRef.name, kind: issuerRef.kind, group: CERTIFICATE_GROUP },
      usages: ['server auth', 'digital signature', 'key encipherment'],
    },
  };
}
