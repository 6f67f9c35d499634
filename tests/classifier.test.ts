/**
 * Event classification
 * - system vs. user origin from ce-type
 * - request kind dispatch keys
 * - abuse-protection handshake detection
 */

import { strict as assert } from 'assert';
import { isValidationRequest, originOf, requestKindOf } from '../src/events/classifier.js';
import { MissingRequestOriginError } from '../src/protocol/errors.js';
import { createRun } from './harness.js';

async function run() {
  const t = createRun('Classifier');

  await t.check('system prefix marks lifecycle events', () => {
    assert.equal(originOf('azure.webpubsub.sys.connected'), 'system');
    assert.equal(originOf('Azure.WebPubSub.Sys.Connect'), 'system');
  });

  await t.check('anything else is a user event', () => {
    assert.equal(originOf('chat.message'), 'user');
    assert.equal(originOf('azure.webpubsub.user.message'), 'user');
    assert.equal(originOf(''), 'user');
  });

  await t.check('system event names map to request kinds', () => {
    assert.equal(requestKindOf('system', 'connected'), 'connected');
    assert.equal(requestKindOf('system', 'disconnected'), 'disconnected');
    assert.equal(requestKindOf('system', 'connect'), 'connect');
    assert.equal(requestKindOf('system', 'CONNECT'), 'connect');
  });

  await t.check('unknown system events are ignored and reported', () => {
    const seen: string[] = [];
    assert.equal(requestKindOf('system', 'foo', (name) => seen.push(name)), 'ignored');
    assert.deepEqual(seen, ['foo']);
  });

  await t.check('user origin always wins', () => {
    const seen: string[] = [];
    assert.equal(requestKindOf('user', 'anything', (name) => seen.push(name)), 'user');
    assert.equal(requestKindOf('user', 'connect'), 'user');
    assert.deepEqual(seen, []);
  });

  await t.check('GET and OPTIONS are validation requests', () => {
    const headers = { 'webhook-request-origin': 'a.example.local' };
    assert.deepEqual(isValidationRequest({ method: 'GET', headers }), { isValidation: true, origins: ['a.example.local'] });
    assert.deepEqual(isValidationRequest({ method: 'options', headers }), { isValidation: true, origins: ['a.example.local'] });
  });

  await t.check('origins keep header order', () => {
    const check = isValidationRequest({
      method: 'OPTIONS',
      headers: { 'webhook-request-origin': ['b.example.local, a.example.local', 'c.example.local'] },
    });
    assert.deepEqual(check.origins, ['b.example.local', 'a.example.local', 'c.example.local']);
  });

  await t.check('POST is not a validation request', () => {
    assert.deepEqual(isValidationRequest({ method: 'POST', headers: {} }), { isValidation: false, origins: [] });
  });

  await t.check('validation request without origin header throws', () => {
    assert.throws(() => isValidationRequest({ method: 'OPTIONS', headers: {} }), MissingRequestOriginError);
    assert.throws(() => isValidationRequest({ method: 'GET', headers: { 'webhook-request-origin': ' ' } }), MissingRequestOriginError);
  });

  t.finish();
}

run().catch((e) => { console.error(e); process.exit(1); });
