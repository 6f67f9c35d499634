import * as http from 'http';
import { createStateCodec } from '../codec/state.js';
import { StateCodec } from '../codec/types.js';
import { WebhookConfig } from '../config/loader.js';
import { isValidationRequest, originOf, requestKindOf } from '../events/classifier.js';
import { readEventHeaders, EventHeaders } from '../events/cloud-events.js';
import { buildEventRequest, HandlerOutput, WebhookEventRequest, WebhookHandler } from '../events/requests.js';
import { JsonlLogger, LogInput } from '../logging/jsonl.js';
import { Headers, ResponseHeaders } from '../protocol/constants.js';
import { WebhookError } from '../protocol/errors.js';
import { RequestKind, WebhookRequest, WebhookResponse } from '../protocol/types.js';
import { buildValidResponse } from '../response/builder.js';
import { validateSignature } from '../security/signature.js';
import { ConnectionContext } from '../state/connection-context.js';

export interface WebhookPipeline {
  handler: WebhookHandler;
  config: WebhookConfig;
  logger: JsonlLogger;
  codec: StateCodec;
}

export function createPipeline(handler: WebhookHandler, config: WebhookConfig, logger?: JsonlLogger): WebhookPipeline {
  return {
    handler,
    config,
    logger: logger ?? new JsonlLogger(config.logPath),
    codec: createStateCodec({ maxDecodedSize: config.maxStateBytes, maxDepth: config.maxStateDepth }),
  };
}

function send(status: number, body: unknown, headers: Record<string, string> = {}): WebhookResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: Buffer.from(JSON.stringify(body), 'utf8'),
  };
}

function empty(status: number, headers: Record<string, string> = {}): WebhookResponse {
  return { status, headers, body: Buffer.alloc(0) };
}

function headerValue(h: WebhookRequest['headers'], name: string): string | undefined {
  const v = h[name];
  return Array.isArray(v) ? v[0] : v;
}

function allowedOrigin(origins: string[], allowed: string[]): string | undefined {
  if (allowed.includes('*')) return '*';
  const set = new Set(allowed.map(o => o.toLowerCase()));
  return origins.find(o => set.has(o.toLowerCase()));
}

function handleValidation(p: WebhookPipeline, req: WebhookRequest, log: (e: Omit<LogInput, 'event'>) => void): WebhookResponse | null {
  let origins: string[];
  try {
    const check = isValidationRequest(req);
    if (!check.isValidation) return null;
    origins = check.origins;
  } catch (e) {
    const code = e instanceof WebhookError ? e.code : 'BadRequest';
    log({ status: 400, error: code });
    return send(400, { error: e instanceof Error ? e.message : String(e), code });
  }

  const match = allowedOrigin(origins, p.config.allowedOrigins);
  if (!match) {
    log({ status: 403, error: 'OriginNotAllowed', origin: origins.join(',') });
    return send(403, { error: 'Origin not allowed', code: 'OriginNotAllowed' });
  }
  log({ status: 200, origin: match });
  return empty(200, { [ResponseHeaders.allowedOrigin]: match });
}

/**
 * Runs one request through the webhook: abuse-protection handshake, event
 * header checks, the application handler, then response translation.
 */
export async function handleWebhookRequest(p: WebhookPipeline, req: WebhookRequest): Promise<WebhookResponse> {
  const startTime = process.hrtime.bigint();
  const durMs = () => Math.round(Number(process.hrtime.bigint() - startTime) / 1e6);
  const base = { ip: req.ip || 'unknown', method: req.method, path: req.path };

  if (req.path !== p.config.path) {
    p.logger.log({ event: 'webhook_request_complete', ...base, status: 404, durMs: durMs(), error: 'not_found' });
    return empty(404);
  }

  const validation = handleValidation(p, req, (e) =>
    p.logger.log({ event: 'webhook_validation', ...base, durMs: durMs(), ...e })
  );
  if (validation) return validation;

  if (req.method.toUpperCase() !== 'POST') {
    p.logger.log({ event: 'webhook_request_complete', ...base, status: 405, durMs: durMs(), error: 'method_not_allowed' });
    return send(405, { error: 'Method not allowed', code: 'MethodNotAllowed' }, { allow: 'GET, OPTIONS, POST' });
  }

  let ce: EventHeaders;
  let context: ConnectionContext;
  try {
    ce = readEventHeaders(req.headers);
    if (p.config.hub && ce.hub.toLowerCase() !== p.config.hub.toLowerCase()) {
      p.logger.log({ event: 'webhook_request_complete', ...base, status: 400, durMs: durMs(), hub: ce.hub, error: 'HubMismatch' });
      return send(400, { error: `Unexpected hub: ${ce.hub}`, code: 'HubMismatch' });
    }
    if (!validateSignature(ce.connectionId, ce.signature, p.config.accessKeys)) {
      p.logger.log({ event: 'webhook_request_complete', ...base, status: 401, durMs: durMs(), connectionId: ce.connectionId, error: 'InvalidSignature' });
      return send(401, { error: 'Signature validation failed', code: 'InvalidSignature' });
    }
    context = new ConnectionContext(
      {
        hub: ce.hub,
        connectionId: ce.connectionId,
        eventName: ce.eventName,
        eventType: ce.type,
        userId: ce.userId,
        signature: ce.signature,
        origin: headerValue(req.headers, Headers.requestOrigin),
      },
      p.codec.decode(ce.connectionState)
    );
  } catch (e) {
    const code = e instanceof WebhookError ? e.code : 'BadRequest';
    p.logger.log({ event: 'webhook_request_complete', ...base, status: 400, durMs: durMs(), error: code });
    return send(400, { error: e instanceof Error ? e.message : String(e), code });
  }

  if (req.body.length > p.config.maxBodyBytes) {
    p.logger.log({ event: 'webhook_request_complete', ...base, status: 413, bytes: req.body.length, durMs: durMs(), error: 'PayloadTooLarge' });
    return send(413, { error: 'PayloadTooLarge', code: 'PayloadTooLarge' });
  }

  const eventLog = { ...base, hub: ce.hub, eventName: ce.eventName, connectionId: ce.connectionId, bytes: req.body.length };
  const kind: RequestKind = requestKindOf(originOf(ce.type), ce.eventName, (name) => {
    console.warn(`[Webhook] Ignoring unknown system event: ${name}`);
    p.logger.log({ event: 'event_ignored', ...eventLog, reason: 'unknown_system_event' });
  });

  let event: WebhookEventRequest | null;
  try {
    event = buildEventRequest(kind, context, req.body, headerValue(req.headers, 'content-type'));
  } catch (e) {
    p.logger.log({ event: 'webhook_request_complete', ...eventLog, requestKind: kind, status: 400, durMs: durMs(), error: 'InvalidEventBody' });
    return send(400, { error: e instanceof Error ? e.message : String(e), code: 'InvalidEventBody' });
  }
  if (!event) {
    p.logger.log({ event: 'webhook_request_complete', ...eventLog, requestKind: kind, status: 200, durMs: durMs() });
    return empty(200);
  }

  let output: HandlerOutput;
  try {
    output = await p.handler(event);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`[Webhook] Handler failed for ${ce.eventName}: ${message}`);
    p.logger.log({ event: 'handler_failed', ...eventLog, requestKind: kind, status: 500, durMs: durMs(), error: message });
    return { status: 500, headers: { 'content-type': 'text/plain' }, body: Buffer.from('Handler failed', 'utf8') };
  }

  const result = buildValidResponse(output, kind, context, { codec: p.codec });
  if (!result.ok) {
    // the service still gets an empty 200; only the log shows why
    console.warn(`[Webhook] Dropped ${kind} response (${result.reason}): ${result.error.message}`);
    p.logger.log({ event: 'response_build_failed', ...eventLog, requestKind: kind, reason: result.reason, error: result.error.message });
  }
  const response = result.ok && result.response ? result.response : empty(200);
  p.logger.log({ event: 'webhook_request_complete', ...eventLog, requestKind: kind, status: response.status, durMs: durMs() });
  return response;
}

/**
 * Resolves null as soon as the body passes `limit`; the rest of the upload is
 * read and discarded.
 */
function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let overflowed = false;
    req.on('data', (chunk: unknown) => {
      if (overflowed) return;
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8');
      received += buf.length;
      if (received > limit) {
        overflowed = true;
        chunks.length = 0;
        resolve(null);
        return;
      }
      chunks.push(buf);
    });
    req.on('end', () => {
      if (!overflowed) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

function writeResponse(res: http.ServerResponse, response: WebhookResponse) {
  res.writeHead(response.status, { ...response.headers, 'content-length': String(response.body.length) });
  res.end(response.body);
}

export function startWebhook(handler: WebhookHandler, config: WebhookConfig, logger?: JsonlLogger): http.Server {
  const pipeline = createPipeline(handler, config, logger);

  const server = http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const ip = req.socket.remoteAddress || 'unknown';
    try {
      const body = await readBody(req, config.maxBodyBytes);
      if (!body) {
        pipeline.logger.log({ event: 'webhook_request_complete', ip, method: req.method, path: url.pathname, status: 413, error: 'PayloadTooLarge' });
        writeResponse(res, send(413, { error: 'PayloadTooLarge', code: 'PayloadTooLarge' }, { connection: 'close' }));
        req.resume();
        return;
      }
      const response = await handleWebhookRequest(pipeline, {
        method: req.method || 'GET',
        path: url.pathname,
        headers: req.headers,
        body,
        ip,
      });
      writeResponse(res, response);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      pipeline.logger.log({ event: 'webhook_request_complete', ip, method: req.method, path: url.pathname, status: 500, error: 'internal_error', reason: message });
      if (!res.headersSent) res.writeHead(500);
      res.end();
    }
  });

  server.on('close', () => {
    pipeline.logger.close().catch((e: Error) => console.error(`[Webhook] Failed to close log: ${e.message}`));
  });

  server.listen(config.port, config.bind);
  return server;
}
