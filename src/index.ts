export { startWebhook, handleWebhookRequest, createPipeline } from './connectors/webhook.js';
export type { WebhookPipeline } from './connectors/webhook.js';
export { loadConfig, configFromEnv, defaultConfig, ConfigLoader, CONFIG_VERSION } from './config/loader.js';
export type { WebhookConfig } from './config/loader.js';
export { contentTypeOf, kindOf, tryKindOf, parseDataType } from './codec/data-type.js';
export { createStateCodec, stateCodec } from './codec/state.js';
export type { StateCodec } from './codec/types.js';
export { originOf, requestKindOf, isValidationRequest } from './events/classifier.js';
export { readEventHeaders } from './events/cloud-events.js';
export type { EventHeaders } from './events/cloud-events.js';
export { buildEventRequest } from './events/requests.js';
export type {
  ConnectEventRequest,
  ConnectedEventRequest,
  DisconnectedEventRequest,
  UserEventRequest,
  WebhookEventRequest,
  WebhookHandler,
  HandlerOutput,
} from './events/requests.js';
export { ConnectionContext } from './state/connection-context.js';
export { extractStateUpdate, mergeStates, encodeStates } from './state/merger.js';
export {
  buildValidResponse,
  buildErrorResponse,
  buildConnectEventResponse,
  buildUserEventResponse,
  classifyOutput,
  responseOf,
  statusOf,
} from './response/builder.js';
export type { BuildResult, ClassifiedOutput } from './response/builder.js';
export { signConnectionId, validateSignature } from './security/signature.js';
export { JsonlLogger } from './logging/jsonl.js';
export * from './protocol/constants.js';
export * from './protocol/errors.js';
export * from './protocol/responses.js';
export type * from './protocol/types.js';
