import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SearchDatabaseController } from '../../src/controllers/search-database-controller.js';
import { FINALIZER } from '../../src/reconcilers/finalizer-manager.js';
import { FakeApiError, FakeEventRecorder, FakeKubeClient } from '../support/fake-kube-client.js';
import { CLUSTER_DOMAIN, NAMESPACE, UPLOADER_IMAGE, manifest, signal } from '../support/fixtures.js';

const request = { namespace: NAMESPACE, name: 'demo' };

describe('SearchDatabase lifecycle', () => {
  let kube: FakeKubeClient;
  let recorder: FakeEventRecorder;
  let controller: SearchDatabaseController;

  beforeEach(() => {
    kube = new FakeKubeClient();
    recorder = new FakeEventRecorder();
    controller = new SearchDatabaseController(kube, recorder, [], {
      name: 'searchdatabase',
      maxConcurrentReconciles: 1,
      reconcileTimeoutMs: 5000,
      requeueAfterErrorMs: 30000,
      requeueAfterSuccessMs: 60000,
      clusterDomain: CLUSTER_DOMAIN,
      uploaderImage: UPLOADER_IMAGE,
    });
  });

  const reconcile = () => controller.reconcile(request, signal());

  async function current() {
    const db = await kube.databases.get(NAMESPACE, 'demo');
    assert.ok(db, 'SearchDatabase db/demo should exist');
    return db;
  }

  /** Finalizer, Pending, then the first full pass. */
  async function bringUp(spec: Record<string, unknown> = {}) {
    kube.databases.apply(manifest(spec));
    assert.deepEqual(await reconcile(), { requeue: true });
    assert.deepEqual(await reconcile(), { requeue: true });
    return reconcile();
  }

  it('returns without writes for an absent descriptor', async () => {
    assert.deepEqual(await reconcile(), {});
    assert.equal(kube.writes.length, 0);
  });

  it('adds the finalizer, then marks the descriptor Pending', async () => {
    kube.databases.apply(manifest());

    assert.deepEqual(await reconcile(), { requeue: true });
    assert.deepEqual((await current()).metadata.finalizers, [FINALIZER]);
    assert.equal((await current()).status, undefined);

    assert.deepEqual(await reconcile(), { requeue: true });
    assert.equal((await current()).status?.phase, 'Pending');
    assert.deepEqual(
      kube.writes.map((w) => w.verb),
      ['patch', 'status'],
    );
  });

  it('creates the default objects and reports Creating', async () => {
    assert.deepEqual(await bringUp(), { requeueAfter: 60000 });

    assert.deepEqual(kube.secrets.names(), ['db/demo-credentials']);
    assert.deepEqual(kube.configMaps.names(), ['db/demo-config']);
    assert.deepEqual(kube.statefulSets.names(), ['db/demo']);
    assert.deepEqual(kube.services.names(), ['db/demo', 'db/demo-headless', 'db/demo-metrics']);
    assert.deepEqual(kube.deployments.names(), []);
    assert.deepEqual(kube.cronJobs.names(), []);
    assert.deepEqual(recorder.reasons(), ['Creating', 'SecretCreated', 'StatefulSetCreated', 'ServiceCreated', 'ServiceCreated']);

    const { status } = await current();
    assert.equal(status?.phase, 'Creating');
    assert.equal(status?.readyReplicas, 0);
    assert.equal(status?.endpoint, 'demo.db.svc.cluster.local:5432');
    assert.equal(status?.currentVersion, 'paradedb/paradedb:latest');
    assert.equal(status?.observedGeneration, 1);
    assert.equal(status?.conditions?.find((c) => c.type === 'Ready')?.status, 'False');
  });

  it('owns every object it creates', async () => {
    await bringUp();

    const set = await kube.statefulSets.get(NAMESPACE, 'demo');
    assert.deepEqual(set?.metadata?.ownerReferences, [
      {
        apiVersion: 'searchdb.io/v1alpha1',
        kind: 'SearchDatabase',
        name: 'demo',
        uid: 'uid-demo',
        controller: true,
        blockOwnerDeletion: true,
      },
    ]);
    assert.equal((await kube.secrets.get(NAMESPACE, 'demo-credentials'))?.metadata?.ownerReferences?.[0].uid, 'uid-demo');
  });

  it('writes nothing on a pass over an unchanged world', async () => {
    await bringUp({ connectionPooling: { enabled: true }, backup: { enabled: true, pvc: {} } });
    const before = kube.writes.length;
    const events = recorder.events.length;

    assert.deepEqual(await reconcile(), { requeueAfter: 60000 });
    assert.equal(kube.writes.length, before);
    assert.equal(recorder.events.length, events);
  });

  it('reports Running once the replicas are ready', async () => {
    await bringUp({ replicas: 2 });

    kube.statefulSets.mutate(NAMESPACE, 'demo', (set) => {
      set.status = { replicas: 2, readyReplicas: 1 };
    });
    await reconcile();
    let { status } = await current();
    assert.equal(status?.phase, 'Updating');
    assert.equal(status?.readyReplicas, 1);

    kube.statefulSets.mutate(NAMESPACE, 'demo', (set) => {
      set.status = { replicas: 3, readyReplicas: 3 };
    });
    const before = kube.writes.length;
    await reconcile();
    ({ status } = await current());
    assert.equal(status?.phase, 'Running');
    assert.equal(status?.readyReplicas, 2);
    assert.equal(status?.conditions?.find((c) => c.type === 'Ready')?.reason, 'AllReplicasReady');
    assert.deepEqual(kube.writes.slice(before), [{ verb: 'status', kind: 'SearchDatabase', namespace: NAMESPACE, name: 'demo' }]);
  });

  it('restores drifted objects', async () => {
    await bringUp();
    kube.statefulSets.mutate(NAMESPACE, 'demo', (set) => {
      if (set.spec) set.spec.replicas = 5;
    });

    await reconcile();
    assert.equal((await kube.statefulSets.get(NAMESPACE, 'demo'))?.spec?.replicas, 1);
  });

  it('keeps the generated password across passes', async () => {
    await bringUp();
    const before = (await kube.secrets.get(NAMESPACE, 'demo-credentials'))?.data?.password;

    await reconcile();
    assert.ok(before);
    assert.equal((await kube.secrets.get(NAMESPACE, 'demo-credentials'))?.data?.password, before);
  });

  it('uses an external superuser secret instead of generating one', async () => {
    kube.secrets.seed(NAMESPACE, { metadata: { name: 'external' }, data: { username: 'YWRtaW4=', password: 'dGVzdA==' } });

    await bringUp({ auth: { superuserSecretRef: { name: 'external' } } });

    assert.deepEqual(kube.secrets.names(), ['db/external']);
    assert.equal((await kube.secrets.get(NAMESPACE, 'external'))?.metadata?.ownerReferences, undefined);
    const env = (await kube.statefulSets.get(NAMESPACE, 'demo'))?.spec?.template.spec?.containers[0].env;
    assert.equal(env?.find((e) => e.name === 'POSTGRES_PASSWORD')?.valueFrom?.secretKeyRef?.name, 'external');
  });

  it('fails the pass while a referenced secret is missing, then recovers', async () => {
    assert.deepEqual(await bringUp({ auth: { superuserSecretRef: { name: 'external' } } }), { requeueAfter: 30000 });

    let { status } = await current();
    assert.equal(status?.phase, 'Failed');
    assert.equal(status?.message, 'Failed to verify superuser Secret: Secret db/external not found');
    assert.deepEqual(
      status?.conditions?.map((c) => [c.type, c.status, c.reason]),
      [['Degraded', 'True', 'PreconditionMissing']],
    );
    assert.deepEqual(recorder.events.at(-1), {
      name: 'demo',
      type: 'Warning',
      reason: 'PreconditionMissing',
      message: 'Failed to verify superuser Secret: Secret db/external not found',
    });
    assert.deepEqual(kube.statefulSets.names(), []);

    kube.secrets.seed(NAMESPACE, { metadata: { name: 'external' } });
    assert.deepEqual(await reconcile(), { requeueAfter: 60000 });

    ({ status } = await current());
    assert.equal(status?.phase, 'Creating');
    assert.equal(status?.message, undefined);
    assert.equal(status?.conditions?.find((c) => c.type === 'Degraded')?.status, 'False');
  });

  it('reports API failures with their status code', async () => {
    kube.failOn('create', 'StatefulSet', new FakeApiError(500, 'etcdserver: request timed out'));

    assert.deepEqual(await bringUp(), { requeueAfter: 30000 });
    const { status } = await current();
    assert.equal(status?.phase, 'Failed');
    assert.equal(status?.message, 'Failed to reconcile StatefulSet: etcdserver: request timed out (status=500)');
    assert.equal(status?.conditions?.find((c) => c.type === 'Degraded')?.reason, 'ReconciliationFailed');
    assert.deepEqual(kube.services.names(), []);
  });

  it('keeps allocated node ports when restoring a Service', async () => {
    await bringUp({ serviceType: 'NodePort' });
    kube.services.mutate(NAMESPACE, 'demo', (service) => {
      if (service.spec?.ports) service.spec.ports[0].nodePort = 31234;
      if (service.metadata?.labels) service.metadata.labels['app.kubernetes.io/version'] = '15';
    });
    const before = kube.writes.length;

    await reconcile();
    const service = await kube.services.get(NAMESPACE, 'demo');
    assert.deepEqual(kube.writes.slice(before), [{ verb: 'replace', kind: 'Service', namespace: NAMESPACE, name: 'demo' }]);
    assert.equal(service?.metadata?.labels?.['app.kubernetes.io/version'], '16');
    assert.deepEqual(service?.spec?.ports, [{ name: 'postgres', port: 5432, protocol: 'TCP', nodePort: 31234 }]);
  });

  it('writes nothing when the server canonicalises resource quantities', async () => {
    await bringUp({
      resources: { requests: { cpu: '0.5', memory: '1024Mi' } },
      connectionPooling: { enabled: true, resources: { limits: { cpu: '1.5' } } },
    });
    const set = await kube.statefulSets.get(NAMESPACE, 'demo');
    assert.deepEqual(set?.spec?.template.spec?.containers[0].resources?.requests, { cpu: '500m', memory: '1Gi' });
    const before = kube.writes.length;

    await reconcile();
    assert.equal(kube.writes.length, before);
  });

  it('fails an invalid spec, then still deletes the descriptor', async () => {
    await bringUp();
    kube.databases.apply(manifest({ replicas: 'three' }));

    assert.deepEqual(await reconcile(), { requeueAfter: 30000 });
    const { status } = await current();
    assert.equal(status?.phase, 'Failed');
    assert.equal(status?.message, 'Invalid SearchDatabase spec: spec.replicas: Expected number, received string');
    const degraded = status?.conditions?.find((c) => c.type === 'Degraded');
    assert.deepEqual([degraded?.status, degraded?.reason], ['True', 'InvalidSpec']);
    assert.equal(recorder.events.at(-1)?.reason, 'InvalidSpec');

    kube.databases.markDeleted(NAMESPACE, 'demo');
    assert.deepEqual(await reconcile(), {});
    assert.equal(kube.databases.isDeleted(NAMESPACE, 'demo'), true);
  });

  it('refuses privileges that cannot be granted on a database', async () => {
    await bringUp({ auth: { users: [{ name: 'reporting', secretRef: { name: 'reporting-secret' }, privileges: ['SELECT'] }] } });

    const { status } = await current();
    assert.equal(status?.phase, 'Failed');
    assert.equal(status?.message, 'Failed to validate users: user reporting has unsupported database privileges SELECT');
    assert.equal(status?.conditions?.find((c) => c.type === 'Degraded')?.reason, 'PreconditionMissing');
    assert.deepEqual(kube.statefulSets.names(), []);
  });

  it('does not mark an aborted pass Failed', async () => {
    kube.databases.apply(manifest());
    await reconcile();
    await reconcile();
    const abort = new AbortController();
    const create = kube.statefulSets.create.bind(kube.statefulSets);
    kube.statefulSets.create = async (namespace, body) => {
      abort.abort();
      return create(namespace, body);
    };

    await assert.rejects(controller.reconcile(request, abort.signal), { name: 'AbortError' });
    assert.equal((await current()).status?.phase, 'Creating');
    assert.deepEqual(recorder.reasons(), ['Creating', 'SecretCreated', 'StatefulSetCreated']);
    assert.equal(recorder.events.some((event) => event.type === 'Warning'), false);
    assert.deepEqual(kube.services.names(), []);
  });

  it('rejects TLS without a certificate source', async () => {
    await bringUp({ tls: { enabled: true } });

    assert.equal(
      (await current()).status?.message,
      'Failed to configure TLS: tls.enabled requires tls.secretRef or tls.certManager.enabled',
    );
  });

  it('builds the optional tiers when enabled', async () => {
    kube.secrets.seed(NAMESPACE, { metadata: { name: 's3-creds' } });

    await bringUp({
      tls: { enabled: true, certManager: { enabled: true, issuerRef: { name: 'ca' } } },
      connectionPooling: { enabled: true },
      monitoring: { serviceMonitor: { enabled: true } },
      backup: { enabled: true, s3: { endpoint: 'https://s3.example.test', bucket: 'dumps', secretRef: { name: 's3-creds' } } },
    });

    assert.deepEqual(kube.certificates.names(), ['db/demo-tls']);
    assert.deepEqual(kube.deployments.names(), ['db/demo-pooler']);
    assert.deepEqual(kube.configMaps.names(), ['db/demo-config', 'db/demo-pooler-config']);
    assert.deepEqual(kube.services.names(), ['db/demo', 'db/demo-headless', 'db/demo-metrics', 'db/demo-pooler']);
    assert.deepEqual(kube.serviceMonitors.names(), ['db/demo-metrics']);
    assert.deepEqual(kube.cronJobs.names(), ['db/demo-backup']);
    assert.deepEqual(kube.persistentVolumeClaims.names(), []);
    assert.equal((await current()).status?.poolerEndpoint, 'demo-pooler.db.svc.cluster.local:5432');
    assert.deepEqual(recorder.reasons(), [
      'Creating',
      'SecretCreated',
      'CertificateCreated',
      'StatefulSetCreated',
      'ServiceCreated',
      'ServiceCreated',
      'PoolerCreated',
      'BackupScheduled',
    ]);
  });

  it('follows spec changes into owned objects', async () => {
    await bringUp();
    kube.databases.apply(manifest({ replicas: 3, postgresConfig: { work_mem: '64MB' } }));

    await reconcile();
    assert.equal((await kube.statefulSets.get(NAMESPACE, 'demo'))?.spec?.replicas, 3);
    const config = (await kube.configMaps.get(NAMESPACE, 'demo-config'))?.data?.['postgresql.conf'];
    assert.ok(config?.endsWith("work_mem = '64MB'\n"));
    assert.equal((await current()).status?.observedGeneration, 2);
  });

  it('finalizes before releasing the descriptor', async () => {
    await bringUp();
    const before = kube.writes.length;
    kube.databases.markDeleted(NAMESPACE, 'demo');

    assert.deepEqual(await reconcile(), {});
    assert.deepEqual(
      kube.writes.slice(before).map((w) => w.verb),
      ['status', 'patch'],
    );
    assert.equal(recorder.events.at(-1)?.reason, 'Deleted');
    assert.equal(kube.databases.isDeleted(NAMESPACE, 'demo'), true);
    assert.deepEqual(await reconcile(), {});
  });

  it('keeps the finalizer when finalization fails', async () => {
    await bringUp();
    kube.databases.markDeleted(NAMESPACE, 'demo');
    kube.failOn('status', 'SearchDatabase', new FakeApiError(409, 'SearchDatabase db/demo was modified'));

    await assert.rejects(reconcile(), /was modified/);
    assert.deepEqual((await current()).metadata.finalizers, [FINALIZER]);

    kube.clearFailures();
    await reconcile();
    assert.equal(kube.databases.isDeleted(NAMESPACE, 'demo'), true);
  });
});
