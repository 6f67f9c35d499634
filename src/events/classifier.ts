import { Headers, SYSTEM_EVENT_PREFIX, SystemEvents } from '../protocol/constants.js';
import { MissingRequestOriginError } from '../protocol/errors.js';
import { EventOrigin, RequestKind } from '../protocol/types.js';

export function originOf(eventType: string): EventOrigin {
  return eventType.toLowerCase().startsWith(SYSTEM_EVENT_PREFIX) ? 'system' : 'user';
}

/**
 * Unknown system events map to 'ignored' rather than failing; `onIgnored`
 * lets callers notice a service sending events this bridge does not know.
 */
export function requestKindOf(
  origin: EventOrigin,
  eventName: string,
  onIgnored?: (eventName: string) => void
): RequestKind {
  if (origin === 'user') return 'user';
  switch (eventName.toLowerCase()) {
    case SystemEvents.connect:
      return 'connect';
    case SystemEvents.connected:
      return 'connected';
    case SystemEvents.disconnected:
      return 'disconnected';
    default:
      onIgnored?.(eventName);
      return 'ignored';
  }
}

export interface ValidationCheck {
  isValidation: boolean;
  origins: string[];
}

export function isValidationRequest(request: {
  method: string;
  headers: Record<string, string | string[] | undefined>;
}): ValidationCheck {
  const method = request.method.toUpperCase();
  if (method !== 'OPTIONS' && method !== 'GET') {
    return { isValidation: false, origins: [] };
  }
  const raw = request.headers[Headers.requestOrigin];
  if (raw === undefined) {
    throw new MissingRequestOriginError();
  }
  const values = Array.isArray(raw) ? raw : [raw];
  const origins = values
    .flatMap(v => v.split(','))
    .map(v => v.trim())
    .filter(v => v.length > 0);
  if (origins.length === 0) {
    throw new MissingRequestOriginError();
  }
  return { isValidation: true, origins };
}
