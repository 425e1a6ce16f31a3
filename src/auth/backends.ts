import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type Logger } from '../logger.js';
import { toError } from '../errors.js';
import type { StorageBackendName } from '../types.js';

export const KEYRING_SERVICE = 'cen-gmail';
export const KEYRING_ACCOUNT = 'cen-user';
export const DEFAULT_TOKEN_PATH = 'token.json';
export const TOKEN_ENV_KEYS = ['CEN_GMAIL_TOKEN_JSON', 'GMAIL_AUTHORIZED_USER', 'GMAIL_TOKEN_JSON'];

export type SaveResult =
  | { ok: true; backend: StorageBackendName }
  | { ok: false; backend: StorageBackendName; error: Error };

export interface TokenBackend {
  readonly name: StorageBackendName;
  read(): Promise<string | null>;
  write(serialized: string): Promise<SaveResult>;
}

export interface KeyringAdapter {
  getPassword(service: string, account: string): Promise<string | null>;
  setPassword(service: string, account: string, value: string): Promise<void>;
}

let keyringModule: typeof import('@napi-rs/keyring') | null = null;

async function loadKeyringModule() {
  if (!keyringModule) {
    keyringModule = await import('@napi-rs/keyring');
  }
  return keyringModule;
}

/**
 * OS secret store through the native keyring bindings. The bindings are
 * loaded on first use so hosts without a secret service (containers, CI)
 * only fail when the keyring is actually touched.
 */
export function createNativeKeyring(): KeyringAdapter {
  return {
    async getPassword(service, account) {
      const { Entry } = await loadKeyringModule();
      return new Entry(service, account).getPassword() ?? null;
    },
    async setPassword(service, account, value) {
      const { Entry } = await loadKeyringModule();
      new Entry(service, account).setPassword(value);
    }
  };
}

export class KeyringBackend implements TokenBackend {
  readonly name = 'keyring' as const;

  constructor(
    private readonly adapter: KeyringAdapter = createNativeKeyring(),
    private readonly logger: Logger = loggerModule,
    private readonly service = KEYRING_SERVICE,
    private readonly account = KEYRING_ACCOUNT
  ) {}

  async read(): Promise<string | null> {
    try {
      const value = await this.adapter.getPassword(this.service, this.account);
      return value && value.length > 0 ? value : null;
    } catch (error) {
      this.logger.warn({ err: error, backend: this.name }, 'Keyring read failed');
      return null;
    }
  }

  async write(serialized: string): Promise<SaveResult> {
    try {
      await this.adapter.setPassword(this.service, this.account, serialized);
      return { ok: true, backend: this.name };
    } catch (error) {
      return { ok: false, backend: this.name, error: toError(error) };
    }
  }
}

export class FileBackend implements TokenBackend {
  readonly name = 'file' as const;
  readonly filePath: string;

  constructor(
    filePath: string = DEFAULT_TOKEN_PATH,
    private readonly logger: Logger = loggerModule
  ) {
    this.filePath = path.resolve(filePath);
  }

  async read(): Promise<string | null> {
    try {
      const contents = await fs.readFile(this.filePath, 'utf-8');
      return contents.trim().length > 0 ? contents : null;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        this.logger.warn({ err: error, path: this.filePath }, 'Token file read failed');
      }
      return null;
    }
  }

  async write(serialized: string): Promise<SaveResult> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, serialized, { encoding: 'utf-8', mode: 0o600 });
      return { ok: true, backend: this.name };
    } catch (error) {
      return { ok: false, backend: this.name, error: toError(error) };
    }
  }
}

export function readEnvironmentToken(env: NodeJS.ProcessEnv = process.env): string | null {
  for (const key of TOKEN_ENV_KEYS) {
    const value = env[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }
  return null;
}
