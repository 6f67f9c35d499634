import { ConnectionStates, ErrorCode, PayloadKind } from './types.js';

/** Returned by a handler to reject the event; always wins over the event kind */
export class EventErrorResponse {
  constructor(readonly code: ErrorCode, readonly errorMessage: string) {}
}

export interface ConnectEventResponseInit {
  userId?: string;
  groups?: string[];
  roles?: string[];
  subprotocol?: string;
  states?: ConnectionStates;
}

export class ConnectEventResponse {
  userId?: string;
  groups?: string[];
  roles?: string[];
  subprotocol?: string;
  readonly states: ConnectionStates;

  constructor(init: ConnectEventResponseInit = {}) {
    this.userId = init.userId;
    this.groups = init.groups;
    this.roles = init.roles;
    this.subprotocol = init.subprotocol;
    this.states = { ...(init.states || {}) };
  }

  setState(key: string, value: unknown): this {
    this.states[key] = value;
    return this;
  }

  // states travel in the connection state header, not in the body
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    if (this.userId !== undefined) out.userId = this.userId;
    if (this.groups !== undefined) out.groups = this.groups;
    if (this.roles !== undefined) out.roles = this.roles;
    if (this.subprotocol !== undefined) out.subprotocol = this.subprotocol;
    return out;
  }
}

export class UserEventResponse {
  readonly data: Buffer;
  readonly dataType: PayloadKind;
  readonly states: ConnectionStates;

  constructor(data: Buffer | string, dataType?: PayloadKind, states: ConnectionStates = {}) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    this.dataType = dataType ?? (typeof data === 'string' ? 'text' : 'binary');
    this.states = { ...states };
  }

  setState(key: string, value: unknown): this {
    this.states[key] = value;
    return this;
  }
}

export type WebhookEventResponse = EventErrorResponse | ConnectEventResponse | UserEventResponse;
