export type PayloadKind = 'binary' | 'text' | 'json';

export type EventOrigin = 'system' | 'user';

export type RequestKind = 'connect' | 'connected' | 'disconnected' | 'user' | 'ignored';

export type ErrorCode = 'userError' | 'unauthorized' | 'serverError';

export type ConnectionStates = Record<string, unknown>;

/** Transport-neutral HTTP request handed to the webhook pipeline */
export interface WebhookRequest {
  method: string;
  path: string;
  /** Lower-cased header names, as node's http module delivers them */
  headers: Record<string, string | string[] | undefined>;
  body: Buffer;
  ip?: string;
}

export interface WebhookResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}
