import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  classifyKubeError,
  formatKubeError,
  getKubeStatusCode,
  isNotFound,
} from '../../src/utils/kube-errors.js';
import { FakeApiError } from '../support/fake-kube-client.js';

describe('kube errors', () => {
  it('reads the status from the shapes clients throw', () => {
    assert.equal(getKubeStatusCode({ code: 404 }), 404);
    assert.equal(getKubeStatusCode({ statusCode: 409 }), 409);
    assert.equal(getKubeStatusCode({ response: { statusCode: 500 } }), 500);
    assert.equal(getKubeStatusCode(new Error('plain')), null);
    assert.equal(getKubeStatusCode('text'), null);
    assert.equal(getKubeStatusCode(null), null);
  });

  it('classifies by status', () => {
    assert.equal(classifyKubeError(new FakeApiError(404, 'gone')), 'not-found');
    assert.equal(classifyKubeError(new FakeApiError(409, 'modified')), 'conflict');
    assert.equal(classifyKubeError(new FakeApiError(500, 'oops')), 'transient');
    assert.equal(classifyKubeError(new Error('socket hang up')), 'transient');
    assert.equal(isNotFound({ code: 404 }), true);
    assert.equal(isNotFound({ code: 403 }), false);
  });

  it('formats errors with their status', () => {
    assert.equal(formatKubeError(new FakeApiError(409, 'Secret db/demo was modified')), 'Secret db/demo was modified (status=409)');
    assert.equal(formatKubeError(new Error('timeout')), 'timeout');
    assert.equal(formatKubeError('raw'), 'raw');
  });
});
