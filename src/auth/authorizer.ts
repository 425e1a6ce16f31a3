import open from 'open';
import loggerModule, { type Logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';
import type { AuthorizationMode } from '../types.js';
import {
  bindFirstAvailable,
  listenForCallback,
  type CallbackServer
} from './callbackServer.js';
import type { Credential } from './credential.js';
import type { OAuthClient } from './oauthClient.js';

// Avoids ports commonly taken by local dev servers and databases (3000, 5432, 6379, 8000).
export const DEFAULT_CALLBACK_PORTS: readonly number[] = [
  8080, 8081, 8082, 8090, 9000, 9001, 9090, 9091
];
export const DEFAULT_AUTHORIZATION_TIMEOUT_MS = 5 * 60 * 1000;

export type AuthorizerOptions = {
  oauth: OAuthClient;
  callbackPorts?: readonly number[];
  openBrowser?: boolean;
  timeoutMs?: number;
  host?: string;
  launchBrowser?: (url: string) => Promise<void>;
  listen?: (port: number, host: string) => Promise<CallbackServer>;
  output?: NodeJS.WritableStream;
  logger?: Logger;
};

export type AuthorizeOptions = {
  loginHint?: string;
  signal?: AbortSignal;
};

export interface CredentialAuthorizer {
  authorize(mode: AuthorizationMode, options?: AuthorizeOptions): Promise<Credential>;
}

/**
 * Runs the installed-app consent flow against a short-lived loopback
 * listener. Produces a credential; persisting it is up to the caller.
 */
export class Authorizer implements CredentialAuthorizer {
  private readonly callbackPorts: readonly number[];
  private readonly openBrowser: boolean;
  private readonly timeoutMs: number;
  private readonly host: string;
  private readonly launchBrowser: (url: string) => Promise<void>;
  private readonly listen: (port: number, host: string) => Promise<CallbackServer>;
  private readonly output: NodeJS.WritableStream;
  private readonly logger: Logger;

  constructor(private readonly options: AuthorizerOptions) {
    this.callbackPorts = options.callbackPorts ?? DEFAULT_CALLBACK_PORTS;
    this.openBrowser = options.openBrowser ?? true;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AUTHORIZATION_TIMEOUT_MS;
    this.host = options.host ?? '127.0.0.1';
    this.launchBrowser =
      options.launchBrowser ??
      (async url => {
        await open(url);
      });
    this.listen = options.listen ?? listenForCallback;
    this.output = options.output ?? process.stdout;
    this.logger = options.logger ?? loggerModule;
  }

  async authorize(mode: AuthorizationMode, options: AuthorizeOptions = {}): Promise<Credential> {
    const server = await this.bind(mode);
    this.logger.debug({ mode, port: server.port }, 'OAuth callback listener ready');

    try {
      const url = this.options.oauth.buildAuthorizationUrl({
        redirectUri: server.redirectUri,
        loginHint: options.loginHint
      });

      if (mode === 'local_server' && this.openBrowser) {
        await this.tryLaunchBrowser(url);
      }

      this.output.write('\nPlease visit this URL to authorize the application:\n');
      this.output.write(`${url}\n`);
      this.output.write('\nWaiting for authorization... (Press Ctrl+C to cancel)\n');

      const code = await server.waitForCode({ timeoutMs: this.timeoutMs, signal: options.signal });
      const credential = await this.options.oauth.exchangeCode(code, server.redirectUri);
      this.output.write('Authorization successful!\n');
      this.logger.info({ mode, scopes: credential.scopes }, 'Authorization completed');
      return credential;
    } finally {
      await server.close();
    }
  }

  private async bind(mode: AuthorizationMode): Promise<CallbackServer> {
    if (mode === 'local_server') {
      return bindFirstAvailable(this.callbackPorts, {
        host: this.host,
        listen: this.listen,
        logger: this.logger
      });
    }

    try {
      return await this.listen(0, this.host);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Could not start OAuth callback listener: ${message}`);
    }
  }

  private async tryLaunchBrowser(url: string) {
    try {
      await this.launchBrowser(url);
    } catch (error) {
      this.logger.warn({ err: error }, 'Unable to open a browser; visit the URL manually');
    }
  }
}
