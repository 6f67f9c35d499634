export const ContentTypes = {
  text: 'text/plain',
  json: 'application/json',
  binary: 'application/octet-stream',
} as const;

// CloudEvents binding headers sent by the service
export const Headers = {
  type: 'ce-type',
  eventName: 'ce-eventname',
  hub: 'ce-hub',
  connectionId: 'ce-connectionid',
  userId: 'ce-userid',
  signature: 'ce-signature',
  connectionState: 'ce-connectionstate',
  id: 'ce-id',
  time: 'ce-time',
  specVersion: 'ce-specversion',
  source: 'ce-source',
  requestOrigin: 'webhook-request-origin',
} as const;

// Outbound header names keep the casing the service documents
export const ResponseHeaders = {
  connectionState: 'ce-connectionState',
  allowedOrigin: 'WebHook-Allowed-Origin',
} as const;

export const SYSTEM_EVENT_PREFIX = 'azure.webpubsub.sys.';

export const SystemEvents = {
  connect: 'connect',
  connected: 'connected',
  disconnected: 'disconnected',
} as const;
