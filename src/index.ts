import { config } from './config/index.js';
import { ControllerRegistry } from './controllers/registry.js';
import { SearchDatabaseController } from './controllers/search-database-controller.js';
import { createServer, startServer } from './server.js';
import { KubernetesEventRecorder } from './services/event-recorder.js';
import { InformerSource } from './services/informer-source.js';
import { KubernetesService } from './services/kubernetes-service.js';
import logger, { logError } from './utils/logger.js';

async function startOperator(): Promise<void> {
  logger.info('Starting searchdb operator...', {
    namespace: config.kubernetes.namespace,
    watchNamespaces: config.kubernetes.watchNamespaces.length > 0 ? config.kubernetes.watchNamespaces : 'all',
    maxConcurrentReconciles: config.operator.maxConcurrentReconciles,
    logLevel: config.operator.logLevel,
  });

  const kubeConfig = KubernetesService.loadKubeConfig();
  const kube = new KubernetesService(kubeConfig);
  const recorder = new KubernetesEventRecorder(kube.getCoreV1Api());
  const informers = new InformerSource(kubeConfig, config.kubernetes.watchNamespaces);

  const registry = new ControllerRegistry();
  registry.register(
    new SearchDatabaseController(kube, recorder, [informers], {
      name: 'searchdatabase',
      maxConcurrentReconciles: config.operator.maxConcurrentReconciles,
      reconcileTimeoutMs: config.reconcile.timeoutMs,
      requeueAfterErrorMs: config.reconcile.requeueAfterErrorMs,
      requeueAfterSuccessMs: config.reconcile.requeueAfterSuccessMs,
      clusterDomain: config.kubernetes.clusterDomain,
      uploaderImage: config.backup.uploaderImage,
    }),
  );

  const server = await startServer(createServer({ config, registry, kube }), config.operator.healthPort);
  await registry.startAll();

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);
    await registry.stopAll();
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logError('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

startOperator().catch((error: unknown) => {
  logError('Failed to start operator', error);
  process.exit(1);
});
