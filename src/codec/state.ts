import { StateCodec } from './types.js';
import { DecodedGuardrails, DEFAULT_STATE_GUARDRAILS, checkDecodedPayload } from './guards.js';
import { isJsonObject, parseJson } from './json.js';
import { InvalidConnectionStateError } from '../protocol/errors.js';
import { ConnectionStates } from '../protocol/types.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Connection state header: base64 of the state object's UTF-8 JSON */
export function createStateCodec(guardrails: DecodedGuardrails = DEFAULT_STATE_GUARDRAILS): StateCodec {
  return {
    name: 'base64-json',
    encode(states: ConnectionStates): string {
      return Buffer.from(JSON.stringify(states), 'utf8').toString('base64');
    },
    decode(header: string | undefined): ConnectionStates {
      const raw = (header || '').trim();
      if (!raw) return {};
      if (raw.length % 4 !== 0 || !BASE64.test(raw)) {
        throw new InvalidConnectionStateError('not base64');
      }
      let parsed: unknown;
      try {
        parsed = parseJson(Buffer.from(raw, 'base64'));
      } catch {
        throw new InvalidConnectionStateError('not JSON');
      }
      if (!isJsonObject(parsed)) {
        throw new InvalidConnectionStateError('not an object');
      }
      const check = checkDecodedPayload(parsed, guardrails);
      if (!check.valid) {
        throw new InvalidConnectionStateError(`${check.reason} (${check.actual} > ${check.limit})`);
      }
      return parsed;
    }
  };
}

export const stateCodec = createStateCodec();
