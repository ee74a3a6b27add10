import { config as dotenvConfig } from 'dotenv';
import { join } from 'path';
import { z } from 'zod';

// Load environment variables
dotenvConfig({ path: join(process.cwd(), '.env') });

const durationMs = z.coerce.number().int().nonnegative();

// Define the configuration schema using Zod
const configSchema = z
  .object({
    // Kubernetes Configuration
    kubernetes: z.object({
      namespace: z.string().min(1).default('searchdb-system'),
      watchNamespaces: z
        .string()
        .default('')
        .transform((val) => {
          if (!val) return [];
          return val
            .split(',')
            .map((ns) => ns.trim())
            .filter((ns) => ns.length > 0);
        }),
      clusterDomain: z.string().min(1).default('svc.cluster.local'),
    }),

    // Operator Configuration
    operator: z.object({
      logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      healthPort: z.coerce.number().int().positive().default(15080),
      maxConcurrentReconciles: z.coerce.number().int().positive().default(4),
    }),

    // Reconciliation timing
    reconcile: z.object({
      timeoutMs: durationMs.default(120000),
      requeueAfterSuccessMs: durationMs.default(60000),
      requeueAfterErrorMs: durationMs.default(30000),
    }),

    // Backup job images
    backup: z.object({
      uploaderImage: z.string().min(1).default('amazon/aws-cli:2.15.0'),
    }),

    // Environment
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  })
  .transform((data) => ({
    ...data,
    isDevelopment: data.nodeEnv === 'development',
    isProduction: data.nodeEnv === 'production',
    isTest: data.nodeEnv === 'test',
  }));

// Infer the TypeScript type from the schema
export type Config = z.infer<typeof configSchema>;

// Parse and validate the configuration
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Map environment variables to the schema structure
  const rawConfig = {
    kubernetes: {
      namespace: env.KUBERNETES_NAMESPACE,
      watchNamespaces: env.WATCH_NAMESPACES,
      clusterDomain: env.CLUSTER_DOMAIN,
    },
    operator: {
      logLevel: env.LOG_LEVEL,
      healthPort: env.HEALTH_PORT,
      maxConcurrentReconciles: env.MAX_CONCURRENT_RECONCILES,
    },
    reconcile: {
      timeoutMs: env.RECONCILE_TIMEOUT_MS,
      requeueAfterSuccessMs: env.REQUEUE_AFTER_SUCCESS_MS,
      requeueAfterErrorMs: env.REQUEUE_AFTER_ERROR_MS,
    },
    backup: {
      uploaderImage: env.BACKUP_UPLOADER_IMAGE,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new Error(
      `Invalid configuration: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
    );
  }

  return result.data;
}

export const config = loadConfig();
