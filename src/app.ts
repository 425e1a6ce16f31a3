import loggerModule, { type Logger } from './logger.js';
import { ConfigurationError } from './errors.js';
import type { CenConfig, OAuthConfig } from './config/index.js';
import { Authorizer, type CredentialAuthorizer } from './auth/authorizer.js';
import type { CallbackServer } from './auth/callbackServer.js';
import { CredentialStore } from './auth/credentialStore.js';
import type { TokenBackend } from './auth/backends.js';
import { GoogleOAuthClient, type OAuthClient } from './auth/oauthClient.js';
import { GmailTransport, type MailApi } from './mail/gmail.js';
import type { AuthorizationMode, MailTransport, StorageBackendName } from './types.js';

export type ServiceOverrides = {
  mode?: AuthorizationMode;
  signal?: AbortSignal;
  oauth?: OAuthClient;
  authorizer?: CredentialAuthorizer;
  backends?: Partial<Record<StorageBackendName, TokenBackend>>;
  mailApi?: MailApi;
  launchBrowser?: (url: string) => Promise<void>;
  listen?: (port: number, host: string) => Promise<CallbackServer>;
  output?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => number;
};

export type CenServices = {
  backend: StorageBackendName;
  oauth: OAuthClient;
  authorizer: CredentialAuthorizer;
  store: CredentialStore;
  transport: MailTransport;
};

export function assertOAuthClientConfig(oauth: OAuthConfig) {
  const missing: string[] = [];
  if (!oauth.clientId) {
    missing.push('client id (GOOGLE_CLIENT_ID or --client-id)');
  }
  if (!oauth.clientSecret) {
    missing.push('client secret (GOOGLE_CLIENT_SECRET or --client-secret)');
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing OAuth ${missing.join(' and ')}`);
  }
  if (oauth.scopes.length === 0) {
    throw new ConfigurationError('At least one OAuth scope is required');
  }
}

/**
 * Wires the credential store, the consent flow and the Gmail transport from a
 * resolved configuration. The transport asks the store for a valid credential
 * on every send, so long-running monitors pick up refreshed tokens; a consent
 * flow started from a send uses the caller's mode and abort signal.
 */
export function createServices(config: CenConfig, overrides: ServiceOverrides = {}): CenServices {
  const oauthConfig = config.oauth;
  const logger = overrides.logger ?? loggerModule;
  const backend = oauthConfig.storage;

  let oauth = overrides.oauth;
  if (!oauth) {
    assertOAuthClientConfig(oauthConfig);
    oauth = new GoogleOAuthClient({
      clientId: oauthConfig.clientId,
      clientSecret: oauthConfig.clientSecret,
      scopes: oauthConfig.scopes
    });
  }

  const authorizer =
    overrides.authorizer ??
    new Authorizer({
      oauth,
      callbackPorts: oauthConfig.callbackPorts,
      openBrowser: oauthConfig.openBrowser,
      timeoutMs: oauthConfig.authorizationTimeoutMs,
      launchBrowser: overrides.launchBrowser,
      listen: overrides.listen,
      output: overrides.output,
      logger
    });

  const store = new CredentialStore({
    oauth,
    authorizer,
    backends: overrides.backends,
    tokenPath: oauthConfig.tokenPath,
    env: overrides.env,
    logger,
    now: overrides.now
  });

  const transport = new GmailTransport({
    credentials: () =>
      store.ensureValid(backend, {
        mode: overrides.mode,
        loginHint: oauthConfig.loginHint,
        signal: overrides.signal
      }),
    api: overrides.mailApi,
    logger
  });

  return { backend, oauth, authorizer, store, transport };
}
