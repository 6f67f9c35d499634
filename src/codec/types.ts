import { ConnectionStates } from '../protocol/types.js';

export interface StateCodec {
  name: string; // 'base64-json' | future
  encode(states: ConnectionStates): string;
  decode(header: string | undefined): ConnectionStates;
}
