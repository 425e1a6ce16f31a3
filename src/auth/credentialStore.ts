import loggerModule, { type Logger } from '../logger.js';
import type { AuthorizationMode, StorageBackendName } from '../types.js';
import type { AuthorizeOptions, CredentialAuthorizer } from './authorizer.js';
import {
  DEFAULT_TOKEN_PATH,
  FileBackend,
  KeyringBackend,
  readEnvironmentToken,
  type SaveResult,
  type TokenBackend
} from './backends.js';
import { Credential } from './credential.js';
import type { OAuthClient } from './oauthClient.js';

type CredentialOrigin = StorageBackendName | 'env';

export type CredentialStoreOptions = {
  oauth: OAuthClient;
  authorizer: CredentialAuthorizer;
  backends?: Partial<Record<StorageBackendName, TokenBackend>>;
  tokenPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => number;
};

export type EnsureValidOptions = AuthorizeOptions & {
  force?: boolean;
  mode?: AuthorizationMode;
};

/**
 * Owns the single credential used for mail delivery. Callers only ever see a
 * valid credential; anything expired and unrefreshable is treated as absent.
 */
export class CredentialStore {
  private cached: Credential | null = null;
  private inFlight: Promise<Credential> | null = null;
  private readonly backends: Record<StorageBackendName, TokenBackend>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: CredentialStoreOptions) {
    this.logger = options.logger ?? loggerModule;
    this.env = options.env ?? process.env;
    this.now = options.now ?? Date.now;
    this.backends = {
      keyring: options.backends?.keyring ?? new KeyringBackend(undefined, this.logger),
      file:
        options.backends?.file ??
        new FileBackend(options.tokenPath ?? DEFAULT_TOKEN_PATH, this.logger)
    };
  }

  async load(backend: StorageBackendName): Promise<Credential | null> {
    const raw = await this.backends[backend].read();
    if (!raw) {
      return null;
    }
    const credential = this.parse(raw, backend);
    return credential ? this.resolve(credential, backend) : null;
  }

  async loadFromEnvironment(): Promise<Credential | null> {
    const raw = readEnvironmentToken(this.env);
    if (!raw) {
      return null;
    }
    const credential = this.parse(raw, 'env');
    return credential ? this.resolve(credential, 'env') : null;
  }

  async save(backend: StorageBackendName, credential: Credential): Promise<SaveResult> {
    const serialized = credential.serialize();
    const result = await this.backends[backend].write(serialized);
    if (result.ok) {
      this.logger.debug({ backend }, 'Credential stored');
      return result;
    }

    if (backend === 'keyring') {
      this.logger.warn(
        { err: result.error, backend },
        'Keyring unavailable, storing credential in token file'
      );
      const fallback = await this.backends.file.write(serialized);
      if (!fallback.ok) {
        this.logger.error({ err: fallback.error, backend: 'file' }, 'Credential could not be stored');
      }
      return fallback;
    }

    this.logger.error({ err: result.error, backend }, 'Credential could not be stored');
    return result;
  }

  /**
   * Concurrent callers share one resolution, so a refresh or consent flow
   * runs once no matter how many senders are waiting on it.
   */
  async ensureValid(
    backend: StorageBackendName,
    options: EnsureValidOptions = {}
  ): Promise<Credential> {
    if (!options.force && this.cached && this.cached.isValid(this.now())) {
      return this.cached;
    }
    return this.singleFlight(() => this.resolveValid(backend, options));
  }

  async login(backend: StorageBackendName, options: EnsureValidOptions = {}): Promise<Credential> {
    return this.singleFlight(async () => {
      if (!options.force) {
        const stored = await this.load(backend);
        if (stored) {
          return this.remember(stored);
        }
      }
      return this.authorizeAndPersist(backend, options);
    });
  }

  getCached(): Credential | null {
    return this.cached;
  }

  private singleFlight(task: () => Promise<Credential>): Promise<Credential> {
    if (!this.inFlight) {
      this.inFlight = task().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async resolveValid(
    backend: StorageBackendName,
    options: EnsureValidOptions
  ): Promise<Credential> {
    if (options.force) {
      return this.authorizeAndPersist(backend, options);
    }

    const fromEnv = await this.loadFromEnvironment();
    if (fromEnv) {
      return this.remember(fromEnv);
    }

    const stored = await this.load(backend);
    if (stored) {
      return this.remember(stored);
    }

    return this.authorizeAndPersist(backend, options);
  }

  private async authorizeAndPersist(
    backend: StorageBackendName,
    options: EnsureValidOptions
  ): Promise<Credential> {
    const credential = await this.options.authorizer.authorize(options.mode ?? 'local_server', {
      loginHint: options.loginHint,
      signal: options.signal
    });
    await this.save(backend, credential);
    return this.remember(credential);
  }

  private remember(credential: Credential): Credential {
    this.cached = credential;
    return credential;
  }

  private parse(raw: string, origin: CredentialOrigin): Credential | null {
    try {
      return Credential.parse(raw, this.options.oauth.scopes);
    } catch (error) {
      this.logger.warn({ err: error, origin }, 'Ignoring malformed stored credential');
      return null;
    }
  }

  private async resolve(credential: Credential, origin: CredentialOrigin): Promise<Credential | null> {
    if (credential.isValid(this.now())) {
      return credential;
    }

    if (!credential.canRefresh()) {
      this.logger.info({ origin }, 'Stored credential expired and has no refresh token');
      return null;
    }

    let refreshed: Credential;
    try {
      refreshed = await this.options.oauth.refresh(credential);
    } catch (error) {
      this.logger.warn({ err: error, origin }, 'Credential refresh failed');
      return null;
    }

    if (!refreshed.isValid(this.now())) {
      this.logger.warn({ origin }, 'Refreshed credential is not valid');
      return null;
    }

    if (origin !== 'env') {
      await this.save(origin, refreshed);
    }
    return refreshed;
  }
}
