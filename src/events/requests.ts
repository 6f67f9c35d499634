import { JsonValue, getField, isJsonObject, parseJson } from '../codec/json.js';
import { tryKindOf } from '../codec/data-type.js';
import { ConnectionContext } from '../state/connection-context.js';
import { PayloadKind, RequestKind } from '../protocol/types.js';
import { WebhookEventResponse } from '../protocol/responses.js';

export interface ConnectEventRequest {
  kind: 'connect';
  context: ConnectionContext;
  claims: Record<string, string[]>;
  query: Record<string, string[]>;
  headers: Record<string, string[]>;
  subprotocols: string[];
  clientCertificates: Array<{ thumbprint: string; content?: string }>;
}

export interface ConnectedEventRequest {
  kind: 'connected';
  context: ConnectionContext;
}

export interface DisconnectedEventRequest {
  kind: 'disconnected';
  context: ConnectionContext;
  reason?: string;
}

export interface UserEventRequest {
  kind: 'user';
  context: ConnectionContext;
  data: Buffer;
  dataType: PayloadKind;
}

export type WebhookEventRequest =
  | ConnectEventRequest
  | ConnectedEventRequest
  | DisconnectedEventRequest
  | UserEventRequest;

/** Anything a handler may hand back: a typed response, raw JSON (value or text), or nothing */
export type HandlerOutput = WebhookEventResponse | JsonValue | undefined;

export type WebhookHandler = (event: WebhookEventRequest) => HandlerOutput | Promise<HandlerOutput>;

function readObject(body: Buffer): Record<string, JsonValue> {
  if (body.length === 0) return {};
  const parsed = parseJson(body);
  return isJsonObject(parsed) ? parsed : {};
}

function stringMultiMap(value: JsonValue | undefined): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, v] of Object.entries(value)) {
    if (Array.isArray(v)) out[key] = v.filter((s): s is string => typeof s === 'string');
    else if (typeof v === 'string') out[key] = [v];
  }
  return out;
}

function stringList(value: JsonValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((s): s is string => typeof s === 'string') : [];
}

function certificates(value: JsonValue | undefined): Array<{ thumbprint: string; content?: string }> {
  if (!Array.isArray(value)) return [];
  const out: Array<{ thumbprint: string; content?: string }> = [];
  for (const item of value) {
    if (!isJsonObject(item)) continue;
    const thumbprint = getField(item, 'thumbprint');
    if (typeof thumbprint !== 'string') continue;
    const content = getField(item, 'content');
    out.push(typeof content === 'string' ? { thumbprint, content } : { thumbprint });
  }
  return out;
}

/** `text/plain; charset=utf-8` -> `text/plain` */
function mediaTypeOf(contentType: string | undefined): string | undefined {
  return contentType === undefined ? undefined : contentType.split(';')[0].trim();
}

/**
 * Builds the event object passed to the application handler. Returns null for
 * ignored system events. Throws when a connect or disconnected body is not JSON.
 */
export function buildEventRequest(
  kind: RequestKind,
  context: ConnectionContext,
  body: Buffer,
  contentType: string | undefined
): WebhookEventRequest | null {
  switch (kind) {
    case 'connect': {
      const doc = readObject(body);
      return {
        kind,
        context,
        claims: stringMultiMap(getField(doc, 'claims')),
        query: stringMultiMap(getField(doc, 'query')),
        headers: stringMultiMap(getField(doc, 'headers')),
        subprotocols: stringList(getField(doc, 'subprotocols')),
        clientCertificates: certificates(getField(doc, 'clientCertificates')),
      };
    }
    case 'connected':
      return { kind, context };
    case 'disconnected': {
      const reason = getField(readObject(body), 'reason');
      return typeof reason === 'string' ? { kind, context, reason } : { kind, context };
    }
    case 'user':
      return { kind, context, data: body, dataType: tryKindOf(mediaTypeOf(contentType)).kind };
    case 'ignored':
      return null;
  }
}
