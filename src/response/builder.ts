import { contentTypeOf, parseDataType } from '../codec/data-type.js';
import { JsonValue, getField, isJsonObject, parseJson } from '../codec/json.js';
import { stateCodec } from '../codec/state.js';
import { StateCodec } from '../codec/types.js';
import { HandlerOutput } from '../events/requests.js';
import { ResponseHeaders } from '../protocol/constants.js';
import { ConnectEventResponse, EventErrorResponse, UserEventResponse } from '../protocol/responses.js';
import { ConnectionStates, PayloadKind, RequestKind, WebhookResponse } from '../protocol/types.js';
import { ConnectionContext } from '../state/connection-context.js';
import { encodeStates, extractStateUpdate, mergeStates } from '../state/merger.js';

/** Handler output, classified once before dispatch */
export type ClassifiedOutput =
  | { shape: 'error'; code: string; errorMessage: string }
  | { shape: 'connect'; response: ConnectEventResponse }
  | { shape: 'user'; response: UserEventResponse }
  | { shape: 'raw'; text: string; document: JsonValue };

export type BuildResult =
  | { ok: true; response: WebhookResponse | null }
  | { ok: false; reason: 'invalid_json' | 'build_failed'; error: Error };

export interface BuildOptions {
  codec?: StateCodec;
}

export function statusOf(code: string): number {
  switch (code.toLowerCase()) {
    case 'usererror':
      return 400;
    case 'unauthorized':
      return 401;
    case 'servererror':
      return 500;
    default:
      return 500;
  }
}

export function buildErrorResponse(error: { code: string; errorMessage: string }): WebhookResponse {
  return {
    status: statusOf(error.code),
    headers: { 'content-type': contentTypeOf('text') },
    body: Buffer.from(error.errorMessage, 'utf8'),
  };
}

function withStates(headers: Record<string, string>, codec: StateCodec, merged: ConnectionStates) {
  const encoded = encodeStates(codec, merged);
  if (encoded !== undefined) headers[ResponseHeaders.connectionState] = encoded;
  return headers;
}

export function buildConnectEventResponse(
  body: string,
  merged: ConnectionStates,
  codec: StateCodec = stateCodec,
  dataType: PayloadKind = 'json'
): WebhookResponse {
  return {
    status: 200,
    headers: withStates({ 'content-type': contentTypeOf(dataType) }, codec, merged),
    body: Buffer.from(body, 'utf8'),
  };
}

export function buildUserEventResponse(
  response: { data: Buffer; dataType: PayloadKind },
  merged: ConnectionStates,
  codec: StateCodec = stateCodec
): WebhookResponse {
  return {
    status: 200,
    headers: withStates({ 'content-type': contentTypeOf(response.dataType) }, codec, merged),
    body: response.data,
  };
}

/** Throws when untyped output is not JSON */
export function classifyOutput(output: Exclude<HandlerOutput, undefined>): ClassifiedOutput {
  if (output instanceof EventErrorResponse) {
    return { shape: 'error', code: output.code, errorMessage: output.errorMessage };
  }
  if (output instanceof ConnectEventResponse) return { shape: 'connect', response: output };
  if (output instanceof UserEventResponse) return { shape: 'user', response: output };

  const text = typeof output === 'string' ? output : JSON.stringify(output);
  const document = parseJson(text);
  if (isJsonObject(document)) {
    const code = getField(document, 'code');
    if (code !== undefined) {
      const message = getField(document, 'errorMessage');
      return {
        shape: 'error',
        code: typeof code === 'string' ? code : String(code),
        errorMessage: typeof message === 'string' ? message : '',
      };
    }
  }
  return { shape: 'raw', text, document };
}

function readUserResponse(document: JsonValue): { data: Buffer; dataType: PayloadKind } {
  if (!isJsonObject(document)) {
    throw new TypeError('User event response must be a JSON object');
  }
  const data = getField(document, 'data');
  const dataType = parseDataType(getField(document, 'dataType'));
  let bytes: Buffer;
  if (data === undefined || data === null) bytes = Buffer.alloc(0);
  else if (typeof data === 'string') bytes = Buffer.from(data, 'utf8');
  else bytes = Buffer.from(JSON.stringify(data), 'utf8');
  return { data: bytes, dataType };
}

function dispatch(
  classified: ClassifiedOutput,
  kind: RequestKind,
  context: ConnectionContext,
  codec: StateCodec
): WebhookResponse | null {
  if (classified.shape === 'error') {
    return buildErrorResponse(classified);
  }

  switch (kind) {
    case 'connect':
      if (classified.shape === 'raw') {
        const merged = mergeStates(context, extractStateUpdate(classified.document));
        return buildConnectEventResponse(classified.text, merged, codec);
      }
      if (classified.shape === 'connect') {
        const merged = mergeStates(context, classified.response.states);
        return buildConnectEventResponse(JSON.stringify(classified.response), merged, codec);
      }
      return null;
    case 'user':
      if (classified.shape === 'raw') {
        const response = readUserResponse(classified.document);
        const merged = mergeStates(context, extractStateUpdate(classified.document));
        return buildUserEventResponse(response, merged, codec);
      }
      if (classified.shape === 'user') {
        const merged = mergeStates(context, classified.response.states);
        return buildUserEventResponse(classified.response, merged, codec);
      }
      return null;
    case 'connected':
    case 'disconnected':
    case 'ignored':
      // the service expects no body for these
      return null;
  }
}

/**
 * Turns handler output into the response sent back to the service. Failures
 * never throw: they come back as `ok: false` so the caller can log them and
 * fall back to an empty 200.
 */
export function buildValidResponse(
  output: HandlerOutput,
  kind: RequestKind,
  context: ConnectionContext,
  options: BuildOptions = {}
): BuildResult {
  if (output === undefined) return { ok: true, response: null };

  let classified: ClassifiedOutput;
  try {
    classified = classifyOutput(output);
  } catch (err) {
    return { ok: false, reason: 'invalid_json', error: toError(err) };
  }

  try {
    return { ok: true, response: dispatch(classified, kind, context, options.codec ?? stateCodec) };
  } catch (err) {
    return { ok: false, reason: 'build_failed', error: toError(err) };
  }
}

export function responseOf(result: BuildResult): WebhookResponse | null {
  return result.ok ? result.response : null;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
