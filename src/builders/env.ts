import type { V1EnvVar } from '@kubernetes/client-node';

export function secretKeyEnv(name: string, secret: string, key: string): V1EnvVar {
  return { name, valueFrom: { secretKeyRef: { name: secret, key } } };
}
