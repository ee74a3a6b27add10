import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { V1Pod, V1StatefulSet } from '@kubernetes/client-node';
import { resolveSpec } from '../../src/apis/v1alpha1/search-database.js';
import {
  StatusAggregator,
  computeStatus,
  latestBackup,
  serviceEndpoint,
  writeStatusIfChanged,
} from '../../src/reconcilers/status-aggregator.js';
import { FakeKubeClient } from '../support/fake-kube-client.js';
import { CLUSTER_DOMAIN, NAMESPACE, database, manifest, signal } from '../support/fixtures.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');
const LATER = new Date('2024-06-01T12:05:00.000Z');

function statefulSet(readyReplicas: number, image = 'paradedb/paradedb:0.8.0'): V1StatefulSet {
  return {
    metadata: { name: 'demo' },
    spec: {
      selector: {},
      serviceName: 'demo-headless',
      template: { spec: { containers: [{ name: 'database', image }] } },
    },
    status: { replicas: 3, readyReplicas },
  };
}

function backupPod(name: string, phase: string, finishedAt?: string, message?: string): V1Pod {
  return {
    metadata: { name, namespace: NAMESPACE },
    status: {
      phase,
      containerStatuses: [
        {
          name: 'upload',
          image: 'uploader',
          imageID: '',
          ready: false,
          restartCount: 0,
          state: finishedAt
            ? { terminated: { exitCode: 0, finishedAt: new Date(finishedAt), message } }
            : { running: {} },
        },
      ],
    },
  };
}

describe('status aggregation', () => {
  it('formats service endpoints with the cluster domain', () => {
    assert.equal(serviceEndpoint('demo', 'db', CLUSTER_DOMAIN), 'demo.db.svc.cluster.local:5432');
  });

  it('reports Running when every replica is ready', () => {
    const status = computeStatus(database({ replicas: 3 }), { statefulSet: statefulSet(3), backupPods: [] }, CLUSTER_DOMAIN, NOW);

    assert.equal(status.phase, 'Running');
    assert.equal(status.readyReplicas, 3);
    assert.equal(status.endpoint, 'demo.db.svc.cluster.local:5432');
    assert.equal(status.currentVersion, 'paradedb/paradedb:0.8.0');
    assert.equal(status.observedGeneration, 1);
    assert.deepEqual(
      status.conditions?.map((c) => [c.type, c.status, c.reason]),
      [
        ['Ready', 'True', 'AllReplicasReady'],
        ['Progressing', 'False', 'DeploymentComplete'],
        ['Degraded', 'False', 'AllReplicasHealthy'],
      ],
    );
  });

  it('reports Updating while some replicas are ready', () => {
    const status = computeStatus(database({ replicas: 3 }), { statefulSet: statefulSet(1), backupPods: [] }, CLUSTER_DOMAIN, NOW);

    assert.equal(status.phase, 'Updating');
    assert.equal(status.conditions?.[0].message, 'Scaling: 1/3 replicas ready');
    assert.equal(status.conditions?.[1].status, 'True');
  });

  it('reports Creating with no ready replicas or no stateful set', () => {
    const status = computeStatus(database({ replicas: 2 }), { statefulSet: null, backupPods: [] }, CLUSTER_DOMAIN, NOW);

    assert.equal(status.phase, 'Creating');
    assert.equal(status.readyReplicas, 0);
    assert.equal(status.currentVersion, undefined);
    assert.equal(status.conditions?.[0].message, 'Creating: 0/2 replicas ready');
  });

  it('never reports more ready replicas than desired', () => {
    const status = computeStatus(database({ replicas: 1 }), { statefulSet: statefulSet(3), backupPods: [] }, CLUSTER_DOMAIN, NOW);

    assert.equal(status.readyReplicas, 1);
    assert.equal(status.phase, 'Running');
  });

  it('keeps transition times across passes without a flip', () => {
    const db = database({ replicas: 1 });
    const first = computeStatus(db, { statefulSet: statefulSet(1), backupPods: [] }, CLUSTER_DOMAIN, NOW);
    const again = computeStatus({ ...db, status: first }, { statefulSet: statefulSet(1), backupPods: [] }, CLUSTER_DOMAIN, LATER);

    assert.deepEqual(again, first);
  });

  it('adds the pooler endpoint when pooling is on', () => {
    const status = computeStatus(
      database({ connectionPooling: { enabled: true } }),
      { statefulSet: null, backupPods: [] },
      CLUSTER_DOMAIN,
      NOW,
    );

    assert.equal(status.poolerEndpoint, 'demo-pooler.db.svc.cluster.local:5432');
  });

  describe('backups', () => {
    it('picks the newest succeeded pod', () => {
      const latest = latestBackup([
        backupPod('a', 'Succeeded', '2024-05-30T02:01:00Z', 'size=1024'),
        backupPod('b', 'Succeeded', '2024-05-31T02:01:00Z', 'size=1536'),
        backupPod('c', 'Failed', '2024-06-01T02:01:00Z', 'size=9'),
        backupPod('d', 'Running'),
      ]);

      assert.deepEqual(latest, { finishedAt: new Date('2024-05-31T02:01:00Z'), sizeBytes: 1536 });
      assert.equal(latestBackup([]), undefined);
    });

    it('reports the last backup and its size', () => {
      const db = database({ backup: { enabled: true, pvc: {} } });
      const status = computeStatus(
        db,
        { statefulSet: null, backupPods: [backupPod('b', 'Succeeded', '2024-05-31T02:01:00Z', 'size=1536')] },
        CLUSTER_DOMAIN,
        NOW,
      );

      assert.equal(status.lastBackup, '2024-05-31T02:01:00.000Z');
      assert.equal(status.lastBackupSize, '1.5 KiB');
    });

    it('keeps the previous record once the job pods are gone', () => {
      const db = database({ backup: { enabled: true, pvc: {} } });
      const status = computeStatus(
        { ...db, status: { lastBackup: '2024-05-01T02:00:00.000Z', lastBackupSize: '2.0 MiB' } },
        { statefulSet: null, backupPods: [] },
        CLUSTER_DOMAIN,
        NOW,
      );

      assert.equal(status.lastBackup, '2024-05-01T02:00:00.000Z');
      assert.equal(status.lastBackupSize, '2.0 MiB');
    });
  });

  describe('writing', () => {
    it('skips the write when the stored status is equal', async () => {
      const kube = new FakeKubeClient();
      const db = resolveSpec(kube.databases.apply(manifest({ replicas: 1 })));
      const status = computeStatus(db, { statefulSet: null, backupPods: [] }, CLUSTER_DOMAIN, NOW);

      const written = await writeStatusIfChanged(kube.databases, db, status);
      assert.equal(kube.writes.length, 1);
      assert.equal(written.spec.replicas, 1);
      assert.notEqual(written.metadata.resourceVersion, db.metadata.resourceVersion);

      const again = await writeStatusIfChanged(kube.databases, written, { ...status, currentVersion: undefined });
      assert.equal(again, written);
      assert.equal(kube.writes.length, 1);
    });

    it('observes the stateful set and writes the status', async () => {
      const kube = new FakeKubeClient();
      kube.statefulSets.seed(NAMESPACE, statefulSet(1));
      const db = resolveSpec(kube.databases.apply(manifest({ replicas: 1 })));

      const updated = await new StatusAggregator(kube, CLUSTER_DOMAIN).aggregate(db, signal());

      assert.equal(updated.status?.phase, 'Running');
      assert.deepEqual(kube.writes, [{ verb: 'status', kind: 'SearchDatabase', namespace: NAMESPACE, name: 'demo' }]);
    });
  });
});
