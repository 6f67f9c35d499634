/**
 * CloudEvents header reading and event request construction
 */

import { strict as assert } from 'assert';
import { readEventHeaders } from '../src/events/cloud-events.js';
import { buildEventRequest } from '../src/events/requests.js';
import { InvalidEventHeadersError } from '../src/protocol/errors.js';
import { createRun, makeContext } from './harness.js';

const HEADERS = {
  'ce-type': 'azure.webpubsub.sys.connect',
  'ce-eventname': 'connect',
  'ce-hub': 'chat',
  'ce-connectionid': 'conn-1',
  'ce-userid': 'user-1',
  'ce-signature': 'sha256=abc',
};

async function run() {
  const t = createRun('CloudEvents');

  await t.check('required and optional headers are read', () => {
    const ce = readEventHeaders({ ...HEADERS, 'ce-id': ['id-1', 'id-2'] });
    assert.equal(ce.type, 'azure.webpubsub.sys.connect');
    assert.equal(ce.eventName, 'connect');
    assert.equal(ce.hub, 'chat');
    assert.equal(ce.connectionId, 'conn-1');
    assert.equal(ce.userId, 'user-1');
    assert.equal(ce.signature, 'sha256=abc');
    assert.equal(ce.id, 'id-1');
    assert.equal(ce.connectionState, undefined);
  });

  await t.check('missing required header is named', () => {
    const { 'ce-hub': _hub, ...rest } = HEADERS;
    assert.throws(() => readEventHeaders(rest), (e: unknown) =>
      e instanceof InvalidEventHeadersError && e.header === 'ce-hub'
    );
    assert.throws(() => readEventHeaders({ ...HEADERS, 'ce-eventname': '' }), InvalidEventHeadersError);
  });

  await t.check('connect body becomes a connect request', () => {
    const body = Buffer.from(JSON.stringify({
      claims: { role: ['admin'], name: 'ada' },
      query: { room: ['a'] },
      headers: { 'x-trace': ['t1', 2] },
      subprotocols: ['json.webpubsub.azure.v1', 7],
      clientCertificates: [{ thumbprint: 'ab12' }, { content: 'no-thumbprint' }],
    }), 'utf8');
    const event = buildEventRequest('connect', makeContext(), body, 'application/json');
    assert.ok(event && event.kind === 'connect');
    assert.deepEqual(event.claims, { role: ['admin'], name: ['ada'] });
    assert.deepEqual(event.query, { room: ['a'] });
    assert.deepEqual(event.headers, { 'x-trace': ['t1'] });
    assert.deepEqual(event.subprotocols, ['json.webpubsub.azure.v1']);
    assert.deepEqual(event.clientCertificates, [{ thumbprint: 'ab12' }]);
  });

  await t.check('empty connect body is allowed', () => {
    const event = buildEventRequest('connect', makeContext(), Buffer.alloc(0), undefined);
    assert.ok(event && event.kind === 'connect');
    assert.deepEqual(event.claims, {});
    assert.deepEqual(event.subprotocols, []);
  });

  await t.check('malformed connect body throws', () => {
    assert.throws(() => buildEventRequest('connect', makeContext(), Buffer.from('{', 'utf8'), 'application/json'), SyntaxError);
  });

  await t.check('disconnected carries the reason', () => {
    const event = buildEventRequest('disconnected', makeContext(), Buffer.from('{"reason":"closed by client"}', 'utf8'), 'application/json');
    assert.deepEqual(event && event.kind === 'disconnected' ? event.reason : null, 'closed by client');
  });

  await t.check('user event data type comes from content-type', () => {
    const data = Buffer.from('hello', 'utf8');
    const text = buildEventRequest('user', makeContext(), data, 'text/plain; charset=utf-8');
    assert.ok(text && text.kind === 'user');
    assert.equal(text.dataType, 'text');
    assert.equal(text.data.toString('utf8'), 'hello');
    const unknown = buildEventRequest('user', makeContext(), data, 'application/xml');
    assert.ok(unknown && unknown.kind === 'user');
    assert.equal(unknown.dataType, 'binary');
  });

  await t.check('content-type parameters are dropped before matching', () => {
    const data = Buffer.from('{"n":1}', 'utf8');
    const json = buildEventRequest('user', makeContext(), data, 'Application/JSON ; charset=utf-8');
    assert.ok(json && json.kind === 'user');
    assert.equal(json.dataType, 'json');
    const bare = buildEventRequest('user', makeContext(), data, 'text/plain');
    assert.ok(bare && bare.kind === 'user');
    assert.equal(bare.dataType, 'text');
  });

  await t.check('ignored events build no request', () => {
    assert.equal(buildEventRequest('ignored', makeContext(), Buffer.alloc(0), undefined), null);
  });

  t.finish();
}

run().catch((e) => { console.error(e); process.exit(1); });
