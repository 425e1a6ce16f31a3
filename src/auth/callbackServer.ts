import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import { URL } from 'node:url';
import loggerModule, { type Logger } from '../logger.js';
import { AuthorizationError, AuthorizationTimeoutError, NoCallbackPortError } from '../errors.js';

const DEFAULT_HOST = '127.0.0.1';

const SUCCESS_PAGE =
  '<html><body><h1>Authorization successful!</h1>' +
  '<p>You can close this window and return to the terminal.</p></body></html>';
const MISSING_CODE_PAGE =
  '<html><body><h1>Authorization failed!</h1><p>No code received.</p></body></html>';
const DENIED_PAGE =
  '<html><body><h1>Authorization failed!</h1><p>Consent was not granted.</p></body></html>';
const COMPLETED_PAGE =
  '<html><body><h1>Authorization already completed</h1></body></html>';

type CallbackOutcome = { code: string } | { error: Error };

type PendingWait = {
  resolve: (code: string) => void;
  reject: (error: Error) => void;
};

export type WaitForCodeOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export interface CallbackServer {
  readonly port: number;
  readonly redirectUri: string;
  waitForCode(options: WaitForCodeOptions): Promise<string>;
  close(): Promise<void>;
}

class LoopbackCallbackServer implements CallbackServer {
  readonly redirectUri: string;
  private outcome: CallbackOutcome | null = null;
  private pending: PendingWait | null = null;
  private closePromise: Promise<void> | null = null;

  constructor(
    private readonly server: http.Server,
    readonly port: number
  ) {
    this.redirectUri = `http://localhost:${port}/`;
    server.on('request', (req: IncomingMessage, res: ServerResponse) => {
      this.handleRequest(req, res);
    });
  }

  waitForCode(options: WaitForCodeOptions): Promise<string> {
    if (this.outcome) {
      return 'code' in this.outcome
        ? Promise.resolve(this.outcome.code)
        : Promise.reject(this.outcome.error);
    }

    return new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const signal = options.signal;

      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };

      const onAbort = () => {
        cleanup();
        reject(new AuthorizationError('Authorization was cancelled'));
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }

      timer = setTimeout(() => {
        cleanup();
        reject(new AuthorizationTimeoutError(options.timeoutMs));
      }, options.timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        resolve: code => {
          cleanup();
          resolve(code);
        },
        reject: error => {
          cleanup();
          reject(error);
        }
      };
    });
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = new Promise<void>(resolve => {
        this.server.close(() => resolve());
        this.server.closeAllConnections();
      });
    }
    return this.closePromise;
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse) {
    const url = new URL(req.url ?? '/', this.redirectUri);
    if (url.pathname !== '/') {
      respond(res, 404, '<html><body><h1>Not found</h1></body></html>');
      return;
    }

    if (this.outcome) {
      respond(res, 409, COMPLETED_PAGE);
      return;
    }

    const error = url.searchParams.get('error');
    if (error) {
      respond(res, 400, DENIED_PAGE);
      this.settle({ error: new AuthorizationError(`Authorization was denied: ${error}`) });
      return;
    }

    const code = url.searchParams.get('code');
    if (!code) {
      respond(res, 400, MISSING_CODE_PAGE);
      return;
    }

    respond(res, 200, SUCCESS_PAGE);
    this.settle({ code });
  }

  private settle(outcome: CallbackOutcome) {
    this.outcome = outcome;
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if ('code' in outcome) {
      pending.resolve(outcome.code);
    } else {
      pending.reject(outcome.error);
    }
  }
}

function respond(res: ServerResponse, status: number, body: string) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'text/html');
  res.setHeader('Connection', 'close');
  res.end(body);
}

export async function listenForCallback(
  port: number,
  host: string = DEFAULT_HOST
): Promise<CallbackServer> {
  const server = http.createServer();

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;
  return new LoopbackCallbackServer(server, actualPort);
}

export type BindOptions = {
  host?: string;
  listen?: (port: number, host: string) => Promise<CallbackServer>;
  logger?: Pick<Logger, 'debug'>;
};

/**
 * Binds the first candidate port that is free. Candidates are tried strictly
 * in order.
 */
export async function bindFirstAvailable(
  ports: readonly number[],
  options: BindOptions = {}
): Promise<CallbackServer> {
  const host = options.host ?? DEFAULT_HOST;
  const listen = options.listen ?? listenForCallback;
  const log = options.logger ?? loggerModule;

  for (const port of ports) {
    try {
      return await listen(port, host);
    } catch (error) {
      log.debug({ err: error, port }, 'OAuth callback port unavailable');
    }
  }
  throw new NoCallbackPortError(ports);
}
