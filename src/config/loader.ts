import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { ConfigError } from '../protocol/errors.js';

export const CONFIG_VERSION = 'webhook/v1';

export interface WebhookConfig {
  bind: string;
  port: number;
  path: string;
  /** When set, events for any other hub are rejected */
  hub?: string;
  allowedOrigins: string[];
  accessKeys: string[];
  maxBodyBytes: number;
  logPath: string;
  maxStateBytes: number;
  maxStateDepth: number;
}

export function defaultConfig(): WebhookConfig {
  return {
    bind: '127.0.0.1',
    port: 9090,
    path: '/eventhandler',
    allowedOrigins: ['*'],
    accessKeys: [],
    maxBodyBytes: 1_048_576, // 1MB
    logPath: path.join(process.cwd(), 'reports', 'webhook.log.jsonl'),
    maxStateBytes: 65536,
    maxStateDepth: 16,
  };
}

type Env = Record<string, string | undefined>;

function csv(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function positiveInt(name: string, value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return n;
}

function stringField(name: string, value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function stringList(name: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${name} must be a list of strings`);
  }
  return value;
}

export class ConfigLoader {
  load(filePath: string): Partial<WebhookConfig> {
    const content = fs.readFileSync(filePath, 'utf8');
    const doc: unknown = YAML.parse(content);
    return this.validate(doc);
  }

  private validate(doc: unknown): Partial<WebhookConfig> {
    if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
      throw new ConfigError('Webhook config must be a mapping');
    }
    const raw = new Map(Object.entries(doc));

    const version = raw.get('version');
    if (!version) {
      throw new ConfigError('Webhook config missing required field: version');
    }
    if (version !== CONFIG_VERSION) {
      throw new ConfigError(`Unsupported webhook config version: ${String(version)}`);
    }

    const out: Partial<WebhookConfig> = {};
    for (const [key, value] of raw) {
      switch (key) {
        case 'version':
          break;
        case 'bind':
          out.bind = stringField(key, value);
          break;
        case 'port':
          out.port = positiveInt(key, value);
          break;
        case 'path':
          out.path = stringField(key, value);
          break;
        case 'hub':
          out.hub = stringField(key, value);
          break;
        case 'allowedOrigins':
          out.allowedOrigins = stringList(key, value);
          break;
        case 'accessKeys':
          out.accessKeys = stringList(key, value);
          break;
        case 'maxBodyBytes':
          out.maxBodyBytes = positiveInt(key, value);
          break;
        case 'logPath':
          out.logPath = stringField(key, value);
          break;
        case 'maxStateBytes':
          out.maxStateBytes = positiveInt(key, value);
          break;
        case 'maxStateDepth':
          out.maxStateDepth = positiveInt(key, value);
          break;
        default:
          throw new ConfigError(`Unknown webhook config field: ${key}`);
      }
    }
    if (out.path !== undefined && !out.path.startsWith('/')) {
      throw new ConfigError('path must start with /');
    }
    return out;
  }
}

export function configFromEnv(env: Env = process.env): Partial<WebhookConfig> {
  const out: Partial<WebhookConfig> = {};
  if (env.PUBSUB_WEBHOOK_BIND) out.bind = env.PUBSUB_WEBHOOK_BIND;
  if (env.PUBSUB_WEBHOOK_PORT) out.port = positiveInt('PUBSUB_WEBHOOK_PORT', env.PUBSUB_WEBHOOK_PORT);
  if (env.PUBSUB_WEBHOOK_PATH) out.path = env.PUBSUB_WEBHOOK_PATH;
  if (env.PUBSUB_WEBHOOK_HUB) out.hub = env.PUBSUB_WEBHOOK_HUB;
  if (env.PUBSUB_WEBHOOK_ALLOWED_ORIGINS) out.allowedOrigins = csv(env.PUBSUB_WEBHOOK_ALLOWED_ORIGINS);
  if (env.PUBSUB_WEBHOOK_ACCESS_KEYS) out.accessKeys = csv(env.PUBSUB_WEBHOOK_ACCESS_KEYS);
  if (env.PUBSUB_WEBHOOK_MAX_BODY) out.maxBodyBytes = positiveInt('PUBSUB_WEBHOOK_MAX_BODY', env.PUBSUB_WEBHOOK_MAX_BODY);
  if (env.PUBSUB_WEBHOOK_LOG) out.logPath = env.PUBSUB_WEBHOOK_LOG;
  if (env.PUBSUB_WEBHOOK_STATE_MAX_SIZE) {
    out.maxStateBytes = positiveInt('PUBSUB_WEBHOOK_STATE_MAX_SIZE', env.PUBSUB_WEBHOOK_STATE_MAX_SIZE);
  }
  if (env.PUBSUB_WEBHOOK_STATE_MAX_DEPTH) {
    out.maxStateDepth = positiveInt('PUBSUB_WEBHOOK_STATE_MAX_DEPTH', env.PUBSUB_WEBHOOK_STATE_MAX_DEPTH);
  }
  return out;
}

/** defaults, then the YAML file named by PUBSUB_WEBHOOK_CONFIG, then env */
export function loadConfig(env: Env = process.env): WebhookConfig {
  const fromFile = env.PUBSUB_WEBHOOK_CONFIG ? new ConfigLoader().load(env.PUBSUB_WEBHOOK_CONFIG) : {};
  return { ...defaultConfig(), ...fromFile, ...configFromEnv(env) };
}
