import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'http';
import { z } from 'zod';
import { loadConfig } from '../../src/config/index.js';
import { ControllerRegistry } from '../../src/controllers/registry.js';
import { createServer } from '../../src/server.js';
import type { Controller } from '../../src/types/index.js';
import { FakeKubeClient } from '../support/fake-kube-client.js';

class StubController implements Controller {
  running = false;

  constructor(readonly name: string) {}

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  getIsRunning(): boolean {
    return this.running;
  }
}

const jsonBody = z.record(z.unknown());

async function get(url: string): Promise<{ status: number; body: Record<string, unknown> }> {
  const response = await fetch(url);
  return { status: response.status, body: jsonBody.parse(await response.json()) };
}

describe('health server', () => {
  let server: Server;
  let baseUrl: string;
  let kube: FakeKubeClient;
  let controller: StubController;

  beforeEach(async () => {
    kube = new FakeKubeClient();
    controller = new StubController('searchdatabase');
    const registry = new ControllerRegistry();
    registry.register(controller);
    const app = createServer({
      config: loadConfig({ NODE_ENV: 'test', WATCH_NAMESPACES: 'db, search' }),
      registry,
      kube,
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('answers the liveness probe', async () => {
    const { status, body } = await get(`${baseUrl}/health`);

    assert.equal(status, 200);
    assert.equal(body.status, 'healthy');
  });

  it('is not ready until the controllers run', async () => {
    const { status, body } = await get(`${baseUrl}/ready`);

    assert.equal(status, 503);
    assert.equal(body.reason, 'Controllers are not running');
    assert.deepEqual(body.controllers, {
      searchdatabase: { name: 'searchdatabase', running: false, type: 'StubController' },
    });
  });

  it('is ready when controllers run and the API server answers', async () => {
    await controller.start();
    const { status, body } = await get(`${baseUrl}/ready`);

    assert.equal(status, 200);
    assert.deepEqual(body.checks, { kubernetes: 'connected', controllers: 'running' });
  });

  it('is not ready when the API server is unreachable', async () => {
    await controller.start();
    kube.pingError = new Error('connect ECONNREFUSED');
    const { status, body } = await get(`${baseUrl}/ready`);

    assert.equal(status, 503);
    assert.equal(body.reason, 'Cannot connect to Kubernetes API');
  });

  it('describes the operator', async () => {
    const { body } = await get(`${baseUrl}/info`);

    assert.equal(body.name, 'searchdb-operator');
    assert.equal(body.environment, 'test');
    assert.deepEqual(body.watchNamespaces, ['db', 'search']);
    assert.equal(body.operatorNamespace, 'searchdb-system');
    assert.deepEqual(body.controllers, ['searchdatabase']);
  });

  it('returns 404 for unknown routes', async () => {
    const { status, body } = await get(`${baseUrl}/metrics`);

    assert.equal(status, 404);
    assert.equal(body.message, 'Route GET /metrics not found');
  });
});
