import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '../errors.js';
import { CONFIG_DIR } from './directory.js';
import { isRecord, type StorageBackendName } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type OAuthConfig = {
  clientId: string;
  clientSecret: string;
  scopes: string[];
  storage: StorageBackendName;
  tokenPath: string;
  callbackPorts: number[];
  authorizationTimeoutMs: number;
  openBrowser: boolean;
  loginHint?: string;
};

export type CameraConfig = {
  deviceIndex: number;
  input?: string;
  format?: string;
  inputArgs?: string[];
  framesPerSecond: number;
  width?: number;
  diffThreshold?: number;
  captureRetryMs?: number;
  frameTimeoutMs?: number;
  ffmpegPath?: string;
};

export type MotionConfig = {
  sensitivity: number;
};

export type NotificationsConfig = {
  to: string;
  from?: string;
  minIntervalSeconds: number;
  snapshot: boolean;
  jpegQuality?: number;
  subject: string;
  body: string;
  anomalyThreshold: number;
};

export type SummaryConfig = {
  enabled: boolean;
  intervalMinutes: number;
  subject: string;
};

export type CenConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  oauth: OAuthConfig;
  camera: CameraConfig;
  motion: MotionConfig;
  notifications: NotificationsConfig;
  summary: SummaryConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const portSchema: JsonSchema = { type: 'number', minimum: 0, maximum: 65535 };

const cenConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'oauth', 'camera', 'motion', 'notifications', 'summary'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    oauth: {
      type: 'object',
      required: [
        'clientId',
        'clientSecret',
        'scopes',
        'storage',
        'tokenPath',
        'callbackPorts',
        'authorizationTimeoutMs',
        'openBrowser'
      ],
      additionalProperties: false,
      properties: {
        clientId: { type: 'string' },
        clientSecret: { type: 'string' },
        scopes: { type: 'array', items: { type: 'string' } },
        storage: { type: 'string', enum: ['keyring', 'file'] },
        tokenPath: { type: 'string' },
        callbackPorts: { type: 'array', items: portSchema },
        authorizationTimeoutMs: { type: 'number', minimum: 1 },
        openBrowser: { type: 'boolean' },
        loginHint: { type: 'string' }
      }
    },
    camera: {
      type: 'object',
      required: ['deviceIndex', 'framesPerSecond'],
      additionalProperties: false,
      properties: {
        deviceIndex: { type: 'number', minimum: 0 },
        input: { type: 'string' },
        format: { type: 'string' },
        inputArgs: { type: 'array', items: { type: 'string' } },
        framesPerSecond: { type: 'number', minimum: 0.1 },
        width: { type: 'number', minimum: 16 },
        diffThreshold: { type: 'number', minimum: 0, maximum: 255 },
        captureRetryMs: { type: 'number', minimum: 0 },
        frameTimeoutMs: { type: 'number', minimum: 1 },
        ffmpegPath: { type: 'string' }
      }
    },
    motion: {
      type: 'object',
      required: ['sensitivity'],
      additionalProperties: false,
      properties: {
        sensitivity: { type: 'number', minimum: 0 }
      }
    },
    notifications: {
      type: 'object',
      required: ['to', 'minIntervalSeconds', 'snapshot', 'subject', 'body', 'anomalyThreshold'],
      additionalProperties: false,
      properties: {
        to: { type: 'string' },
        from: { type: 'string' },
        minIntervalSeconds: { type: 'number', minimum: 0 },
        snapshot: { type: 'boolean' },
        jpegQuality: { type: 'number', minimum: 1, maximum: 100 },
        subject: { type: 'string' },
        body: { type: 'string' },
        anomalyThreshold: { type: 'number', minimum: 0 }
      }
    },
    summary: {
      type: 'object',
      required: ['enabled', 'intervalMinutes', 'subject'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        intervalMinutes: { type: 'number', minimum: 1 },
        subject: { type: 'string' }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const obj = value;

    for (const key of schema.required ?? []) {
      if (!(key in obj)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in obj)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is CenConfig {
  assertSchema(config);
  assertLogicalConstraints(config);
}

function assertSchema(config: unknown): asserts config is CenConfig {
  const errors = validateAgainstSchema(cenConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }
}

function assertLogicalConstraints(config: CenConfig) {
  const errors: string[] = [];
  if (config.oauth.callbackPorts.length === 0) {
    errors.push('config.oauth.callbackPorts must list at least one port');
  }
  if (!Number.isInteger(config.camera.deviceIndex)) {
    errors.push('config.camera.deviceIndex must be an integer');
  }
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }
}

export function parseConfig(contents: string): CenConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): CenConfig {
  const resolvedPath = path.resolve(filePath);
  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to read configuration ${resolvedPath}: ${message}`);
  }
  return parseConfig(contents);
}

export function parseScopes(raw: string): string[] {
  return raw
    .split(',')
    .map(scope => scope.trim())
    .filter(scope => scope.length > 0);
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Overlays the process environment on a file configuration. The returned
 * object is a copy; the input is left untouched.
 */
export function applyEnvironmentOverrides(
  config: CenConfig,
  env: NodeJS.ProcessEnv = process.env
): CenConfig {
  const oauth: OAuthConfig = { ...config.oauth };
  const notifications: NotificationsConfig = { ...config.notifications };

  const clientId = readEnv(env, 'GOOGLE_CLIENT_ID');
  if (clientId) {
    oauth.clientId = clientId;
  }
  const clientSecret = readEnv(env, 'GOOGLE_CLIENT_SECRET');
  if (clientSecret) {
    oauth.clientSecret = clientSecret;
  }
  const scopes = readEnv(env, 'CEN_OAUTH_SCOPES');
  if (scopes) {
    oauth.scopes = parseScopes(scopes);
  }
  const storage = readEnv(env, 'CEN_TOKEN_STORAGE');
  if (storage) {
    oauth.storage = parseStorageBackend(storage);
  }
  const loginHint = readEnv(env, 'GMAIL_LOGIN_HINT');
  if (loginHint) {
    oauth.loginHint = loginHint;
  }
  const sender = readEnv(env, 'GMAIL_SENDER');
  if (sender) {
    notifications.from = sender;
  }
  const recipient = readEnv(env, 'CEN_NOTIFY_TO');
  if (recipient) {
    notifications.to = recipient;
  }

  return { ...config, oauth, notifications };
}

export function parseStorageBackend(value: string): StorageBackendName {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'keyring' || normalized === 'file') {
    return normalized;
  }
  throw new ConfigurationError(`Invalid storage backend "${value}" (expected keyring or file)`);
}

export const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, 'default.json');

export class ConfigManager {
  private readonly currentConfig: CenConfig;
  private readonly filePath: string;

  constructor(filePath = DEFAULT_CONFIG_PATH, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.filePath = path.resolve(filePath);
    this.currentConfig = this.loadFromDisk();
  }

  getConfig(): CenConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  private loadFromDisk(): CenConfig {
    return applyEnvironmentOverrides(loadConfigFromFile(this.filePath), this.env);
  }
}
