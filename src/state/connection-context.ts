import { ConnectionStates } from '../protocol/types.js';

export interface ConnectionInfo {
  hub: string;
  connectionId: string;
  eventName: string;
  eventType: string;
  userId?: string;
  signature?: string;
  origin?: string;
}

/**
 * Per-request view of one live connection. The state map is owned here and
 * only changes through updateStates.
 */
export class ConnectionContext {
  private current: Map<string, unknown>;

  constructor(readonly info: ConnectionInfo, states: ConnectionStates = {}) {
    this.current = new Map(Object.entries(states));
  }

  get connectionId(): string {
    return this.info.connectionId;
  }

  get hub(): string {
    return this.info.hub;
  }

  get userId(): string | undefined {
    return this.info.userId;
  }

  get states(): ConnectionStates {
    return Object.fromEntries(this.current);
  }

  get hasStates(): boolean {
    return this.current.size > 0;
  }

  /** New values win on key conflict; returns the full merged map */
  updateStates(update: ConnectionStates): ConnectionStates {
    for (const [key, value] of Object.entries(update)) {
      this.current.set(key, value);
    }
    return this.states;
  }
}
