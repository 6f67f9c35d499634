import { JsonValue, getField, isJsonObject } from '../codec/json.js';
import { StateCodec } from '../codec/types.js';
import { ConnectionStates } from '../protocol/types.js';
import { ConnectionContext } from './connection-context.js';

/**
 * Only an object-valued `states` counts as an update. A null or array from a
 * client SDK is a no-op, never "clear all".
 */
export function extractStateUpdate(document: JsonValue): ConnectionStates {
  if (!isJsonObject(document)) return {};
  const states = getField(document, 'states');
  if (!isJsonObject(states)) return {};
  return { ...states };
}

export function mergeStates(context: ConnectionContext, update: ConnectionStates): ConnectionStates {
  return context.updateStates(update);
}

/** Header value for the merged state, or undefined when there is nothing to send */
export function encodeStates(codec: StateCodec, merged: ConnectionStates): string | undefined {
  if (Object.keys(merged).length === 0) return undefined;
  return codec.encode(merged);
}
