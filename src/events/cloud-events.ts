import { Headers } from '../protocol/constants.js';
import { InvalidEventHeadersError } from '../protocol/errors.js';

export interface EventHeaders {
  type: string;
  eventName: string;
  hub: string;
  connectionId: string;
  userId?: string;
  signature?: string;
  connectionState?: string;
  id?: string;
  time?: string;
  specVersion?: string;
  source?: string;
}

function single(headers: Record<string, string | string[] | undefined>, name: string): string | undefined {
  const v = headers[name];
  const value = Array.isArray(v) ? v[0] : v;
  return value === undefined || value === '' ? undefined : value;
}

function required(headers: Record<string, string | string[] | undefined>, name: string): string {
  const value = single(headers, name);
  if (value === undefined) throw new InvalidEventHeadersError(name);
  return value;
}

/** Expects lower-cased header names */
export function readEventHeaders(headers: Record<string, string | string[] | undefined>): EventHeaders {
  return {
    type: required(headers, Headers.type),
    eventName: required(headers, Headers.eventName),
    hub: required(headers, Headers.hub),
    connectionId: required(headers, Headers.connectionId),
    userId: single(headers, Headers.userId),
    signature: single(headers, Headers.signature),
    connectionState: single(headers, Headers.connectionState),
    id: single(headers, Headers.id),
    time: single(headers, Headers.time),
    specVersion: single(headers, Headers.specVersion),
    source: single(headers, Headers.source),
  };
}
