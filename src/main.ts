import { startWebhook } from './connectors/webhook.js';
import { loadConfig } from './config/loader.js';
import { WebhookHandler } from './events/requests.js';
import { ConnectEventResponse, UserEventResponse } from './protocol/responses.js';

// Demo: accepts every connection and echoes user messages back to the sender
const echo: WebhookHandler = (event) => {
  switch (event.kind) {
    case 'connect':
      return new ConnectEventResponse({ userId: event.context.userId }).setState('connectedAt', new Date().toISOString());
    case 'user':
      return new UserEventResponse(event.data, event.dataType);
    default:
      console.log(`[Webhook] ${event.kind}: ${event.context.connectionId}`);
      return undefined;
  }
};

const config = loadConfig();
startWebhook(echo, config);

console.log(`Webhook on ${config.bind}:${config.port}${config.path}`);
