import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../../src/config/index.js';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    const config = loadConfig({});

    assert.deepEqual(config.kubernetes, {
      namespace: 'searchdb-system',
      watchNamespaces: [],
      clusterDomain: 'svc.cluster.local',
    });
    assert.deepEqual(config.operator, { logLevel: 'info', healthPort: 15080, maxConcurrentReconciles: 4 });
    assert.deepEqual(config.reconcile, { timeoutMs: 120000, requeueAfterSuccessMs: 60000, requeueAfterErrorMs: 30000 });
    assert.equal(config.backup.uploaderImage, 'amazon/aws-cli:2.15.0');
    assert.equal(config.isDevelopment, true);
  });

  it('reads and coerces the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      WATCH_NAMESPACES: ' team-a,,team-b ',
      CLUSTER_DOMAIN: 'cluster.example',
      HEALTH_PORT: '9000',
      MAX_CONCURRENT_RECONCILES: '1',
      REQUEUE_AFTER_ERROR_MS: '500',
      LOG_LEVEL: 'debug',
    });

    assert.deepEqual(config.kubernetes.watchNamespaces, ['team-a', 'team-b']);
    assert.equal(config.kubernetes.clusterDomain, 'cluster.example');
    assert.equal(config.operator.healthPort, 9000);
    assert.equal(config.operator.maxConcurrentReconciles, 1);
    assert.equal(config.operator.logLevel, 'debug');
    assert.equal(config.reconcile.requeueAfterErrorMs, 500);
    assert.equal(config.isProduction, true);
  });

  it('rejects invalid values with the offending path', () => {
    assert.throws(() => loadConfig({ HEALTH_PORT: 'abc' }), /Invalid configuration: operator\.healthPort/);
    assert.throws(() => loadConfig({ LOG_LEVEL: 'verbose' }), /operator\.logLevel/);
  });
});
