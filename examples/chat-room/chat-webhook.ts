#!/usr/bin/env node
import {
  ConnectEventResponse,
  EventErrorResponse,
  UserEventResponse,
  WebhookHandler,
  loadConfig,
  startWebhook,
} from '../../src/index.js';

// Chat room webhook
// Connect: requires a user id, joins the room named in ?room=, remembers it in connection state
// Message: replies with a JSON envelope and counts messages per connection

const handler: WebhookHandler = (event) => {
  switch (event.kind) {
    case 'connect': {
      if (!event.context.userId) {
        return new EventErrorResponse('unauthorized', 'Sign in before joining a room');
      }
      const room = event.query.room?.[0] || 'lobby';
      console.log(`[ChatRoom] ${event.context.userId} joining ${room}`);
      return new ConnectEventResponse({ userId: event.context.userId, groups: [room] })
        .setState('room', room)
        .setState('messages', 0);
    }
    case 'user': {
      const states = event.context.states;
      const room = typeof states.room === 'string' ? states.room : 'lobby';
      const count = typeof states.messages === 'number' ? states.messages + 1 : 1;
      const reply = {
        room,
        from: event.context.userId ?? event.context.connectionId,
        text: event.data.toString('utf8'),
        seq: count,
      };
      return new UserEventResponse(JSON.stringify(reply), 'json', { messages: count });
    }
    case 'disconnected':
      console.log(`[ChatRoom] ${event.context.connectionId} left (${event.reason ?? 'no reason'})`);
      return undefined;
    default:
      return undefined;
  }
};

const config = loadConfig();
startWebhook(handler, config);
console.log(`[ChatRoom] Listening on ${config.bind}:${config.port}${config.path}`);
