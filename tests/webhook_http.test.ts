/**
 * Webhook over a real socket (in-process, ephemeral port)
 */

import { strict as assert } from 'assert';
import * as http from 'http';
import { defaultConfig } from '../src/config/loader.js';
import { startWebhook } from '../src/connectors/webhook.js';
import { WebhookHandler } from '../src/events/requests.js';
import { UserEventResponse } from '../src/protocol/responses.js';
import { createRun, decodeStateHeader, httpRequest, listenEphemeral } from './harness.js';

const CONNECT_HEADERS = {
  'ce-type': 'azure.webpubsub.sys.connect',
  'ce-eventName': 'connect',
  'ce-hub': 'chat',
  'ce-connectionId': 'conn-7',
};

function closeWithin(server: http.Server, ms: number): Promise<'closed' | 'timeout'> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      server.closeAllConnections();
      resolve('timeout');
    }, ms);
    server.close(() => {
      clearTimeout(timer);
      resolve('closed');
    });
  });
}

async function run() {
  const t = createRun('WebhookHttp');

  const handler: WebhookHandler = (event) => {
    switch (event.kind) {
      case 'connect':
        return { userId: 'ada', states: { room: 'a' } };
      case 'user':
        return new UserEventResponse(`echo:${event.data.toString('utf8')}`, 'text', { last: 'msg' });
      default:
        return undefined;
    }
  };

  const server: http.Server = startWebhook(handler, {
    ...defaultConfig(),
    port: 0,
    logPath: 'off',
    allowedOrigins: ['a.example.local'],
    maxBodyBytes: 64,
  });
  const port = await listenEphemeral(server);

  await t.check('handshake echoes the allowed origin', async () => {
    const res = await httpRequest({ port, method: 'OPTIONS', path: '/eventhandler', headers: { 'WebHook-Request-Origin': 'a.example.local' } });
    assert.equal(res.status, 200);
    assert.equal(res.headers['webhook-allowed-origin'], 'a.example.local');
  });

  await t.check('connect response carries body and state header', async () => {
    const res = await httpRequest({ port, method: 'POST', path: '/eventhandler', headers: CONNECT_HEADERS, body: '{}' });
    assert.equal(res.status, 200);
    assert.equal(res.headers['content-type'], 'application/json');
    assert.equal(res.body.toString('utf8'), '{"userId":"ada","states":{"room":"a"}}');
    const state = res.headers['ce-connectionstate'];
    assert.deepEqual(decodeStateHeader(typeof state === 'string' ? state : undefined), { room: 'a' });
  });

  await t.check('user message round trip', async () => {
    const res = await httpRequest({
      port,
      method: 'POST',
      path: '/eventhandler?source=test',
      headers: {
        'ce-type': 'azure.webpubsub.user.message',
        'ce-eventName': 'message',
        'ce-hub': 'chat',
        'ce-connectionId': 'conn-7',
        'content-type': 'text/plain',
      },
      body: 'hi',
    });
    assert.equal(res.status, 200);
    assert.equal(res.headers['content-type'], 'text/plain');
    assert.equal(res.body.toString('utf8'), 'echo:hi');
  });

  await t.check('body over the limit is 413', async () => {
    const res = await httpRequest({ port, method: 'POST', path: '/eventhandler', headers: CONNECT_HEADERS, body: 'x'.repeat(65) });
    assert.equal(res.status, 413);
    assert.equal(JSON.parse(res.body.toString('utf8')).code, 'PayloadTooLarge');
  });

  await t.check('unknown path is 404', async () => {
    const res = await httpRequest({ port, method: 'POST', path: '/nope', headers: CONNECT_HEADERS, body: '{}' });
    assert.equal(res.status, 404);
  });

  await new Promise<void>((resolve) => server.close(() => resolve()));

  await t.check('oversized upload gets 413 and the server still closes', async () => {
    const small = startWebhook(handler, { ...defaultConfig(), port: 0, logPath: 'off', maxBodyBytes: 1024 });
    const smallPort = await listenEphemeral(small);
    const res = await httpRequest({
      port: smallPort,
      method: 'POST',
      path: '/eventhandler',
      headers: CONNECT_HEADERS,
      body: Buffer.alloc(4 * 1024 * 1024, 0x78),
    });
    assert.equal(res.status, 413);
    assert.equal(res.headers.connection, 'close');
    assert.equal(await closeWithin(small, 3000), 'closed');
  });

  t.finish();
}

run().catch((e) => { console.error(e); process.exit(1); });
