import { ConfigurationError } from '../errors.js';
import { isRecord } from '../types.js';

export const GMAIL_SEND_SCOPE = 'https://www.googleapis.com/auth/gmail.send';
export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/**
 * Persisted "authorized user" shape shared with the Google client libraries,
 * so a token exported here can be handed to other tooling unchanged.
 */
export interface AuthorizedUserInfo {
  type?: 'authorized_user';
  token?: string | null;
  refresh_token?: string | null;
  token_uri?: string;
  client_id: string;
  client_secret: string;
  scopes?: string[];
  expiry?: string | null;
}

export type CredentialFields = {
  token: string | null;
  refreshToken: string | null;
  tokenUri?: string;
  clientId: string;
  clientSecret: string;
  scopes: readonly string[];
  expiresAt: number | null;
};

export class Credential {
  readonly token: string | null;
  readonly refreshToken: string | null;
  readonly tokenUri: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly scopes: readonly string[];
  readonly expiresAt: number | null;

  constructor(fields: CredentialFields) {
    this.token = fields.token;
    this.refreshToken = fields.refreshToken;
    this.tokenUri = fields.tokenUri ?? GOOGLE_TOKEN_URI;
    this.clientId = fields.clientId;
    this.clientSecret = fields.clientSecret;
    this.scopes = Object.freeze([...fields.scopes]);
    this.expiresAt = fields.expiresAt;
  }

  isExpired(now = Date.now()): boolean {
    return this.expiresAt !== null && this.expiresAt <= now;
  }

  isValid(now = Date.now()): boolean {
    return this.token !== null && !this.isExpired(now);
  }

  canRefresh(): boolean {
    return this.refreshToken !== null;
  }

  with(fields: Partial<CredentialFields>): Credential {
    return new Credential({
      token: this.token,
      refreshToken: this.refreshToken,
      tokenUri: this.tokenUri,
      clientId: this.clientId,
      clientSecret: this.clientSecret,
      scopes: this.scopes,
      expiresAt: this.expiresAt,
      ...fields
    });
  }

  toAuthorizedUserInfo(): AuthorizedUserInfo {
    return {
      type: 'authorized_user',
      token: this.token,
      refresh_token: this.refreshToken,
      token_uri: this.tokenUri,
      client_id: this.clientId,
      client_secret: this.clientSecret,
      scopes: [...this.scopes],
      expiry: this.expiresAt === null ? null : new Date(this.expiresAt).toISOString()
    };
  }

  toJSON(): AuthorizedUserInfo {
    return this.toAuthorizedUserInfo();
  }

  serialize(): string {
    return JSON.stringify(this.toAuthorizedUserInfo());
  }

  static fromAuthorizedUserInfo(info: unknown, defaultScopes: readonly string[] = []): Credential {
    if (!isRecord(info)) {
      throw new ConfigurationError('Authorized user info must be a JSON object');
    }
    const record = info;

    const clientId = requireString(record, 'client_id');
    const clientSecret = requireString(record, 'client_secret');
    const token = optionalString(record, 'token');
    const refreshToken = optionalString(record, 'refresh_token');
    const tokenUri = optionalString(record, 'token_uri') ?? GOOGLE_TOKEN_URI;

    let scopes: readonly string[] = defaultScopes;
    if (record.scopes !== undefined && record.scopes !== null) {
      scopes = parseScopeField(record.scopes);
    }

    let expiresAt: number | null = null;
    const expiry = optionalString(record, 'expiry');
    if (expiry) {
      const parsed = Date.parse(normalizeExpiry(expiry));
      if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`Authorized user info has an invalid expiry "${expiry}"`);
      }
      expiresAt = parsed;
    }

    return new Credential({
      token,
      refreshToken,
      tokenUri,
      clientId,
      clientSecret,
      scopes,
      expiresAt
    });
  }

  static parse(serialized: string, defaultScopes: readonly string[] = []): Credential {
    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Authorized user info is not valid JSON: ${message}`);
    }
    return Credential.fromAuthorizedUserInfo(parsed, defaultScopes);
  }
}

function requireString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`Authorized user info is missing ${key}`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (value === undefined || value === null || value === '') {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Authorized user info field ${key} must be a string`);
  }
  return value;
}

function parseScopeField(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(scope => scope.length > 0);
  }
  if (Array.isArray(value) && value.every(scope => typeof scope === 'string')) {
    return [...value];
  }
  throw new ConfigurationError('Authorized user info scopes must be a list of strings');
}

// Timestamps written by other Google client libraries carry microseconds and
// may omit the zone designator; both are UTC.
function normalizeExpiry(value: string): string {
  let normalized = value.trim().replace(/(\.\d{3})\d+/, '$1');
  if (!/(Z|[+-]\d{2}:?\d{2})$/.test(normalized)) {
    normalized = `${normalized}Z`;
  }
  return normalized;
}
