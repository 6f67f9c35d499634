export class WebhookError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedMediaTypeError extends WebhookError {
  constructor(readonly contentType: string) {
    super('UnsupportedMediaType', `Unsupported data type: ${contentType}`);
  }
}

export class MissingRequestOriginError extends WebhookError {
  constructor() {
    super('MissingRequestOrigin', 'Validation request is missing the WebHook-Request-Origin header');
  }
}

export class InvalidEventHeadersError extends WebhookError {
  constructor(readonly header: string) {
    super('InvalidEventHeaders', `Missing required header: ${header}`);
  }
}

export class InvalidConnectionStateError extends WebhookError {
  constructor(reason: string) {
    super('InvalidConnectionState', `Invalid connection state: ${reason}`);
  }
}

export class ConfigError extends WebhookError {
  constructor(message: string) {
    super('InvalidConfig', message);
  }
}
