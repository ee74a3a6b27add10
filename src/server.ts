import express, { Express, Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { Config } from './config/index.js';
import type { ControllerRegistry } from './controllers/registry.js';
import type { KubeClient } from './services/kube-client.js';
import logger, { logError } from './utils/logger.js';

export interface ServerDependencies {
  config: Config;
  registry: ControllerRegistry;
  kube: Pick<KubeClient, 'ping'>;
}

export function createServer({ config, registry, kube }: ServerDependencies): Express {
  const app = express();

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path}`, {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  // Health check endpoint (liveness probe)
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
    });
  });

  // Readiness probe endpoint
  app.get('/ready', async (_req: Request, res: Response): Promise<void> => {
    if (!registry.allRunning()) {
      res.status(503).json({
        status: 'not ready',
        reason: 'Controllers are not running',
        timestamp: new Date().toISOString(),
        controllers: registry.getStatus(),
      });
      return;
    }

    try {
      await kube.ping();
    } catch (error) {
      logError('Readiness check failed', error);
      res.status(503).json({
        status: 'not ready',
        reason: 'Cannot connect to Kubernetes API',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    res.status(200).json({
      status: 'ready',
      timestamp: new Date().toISOString(),
      checks: {
        kubernetes: 'connected',
        controllers: 'running',
      },
    });
  });

  // Basic info endpoint
  app.get('/info', (_req: Request, res: Response) => {
    res.json({
      name: 'searchdb-operator',
      version: process.env.npm_package_version || '0.1.0',
      environment: config.nodeEnv,
      watchNamespaces: config.kubernetes.watchNamespaces,
      operatorNamespace: config.kubernetes.namespace,
      controllers: registry.list(),
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logError('Unhandled error in Express', err);
    res.status(500).json({
      error: 'Internal Server Error',
      message: config.isDevelopment ? err.message : 'An error occurred',
    });
  });

  return app;
}

export async function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Health server listening on port ${port}`, {
        endpoints: ['/health', '/ready', '/info'],
      });
      resolve(server);
    });

    server.on('error', (error) => {
      logError('Failed to start health server', error);
      reject(error);
    });
  });
}
