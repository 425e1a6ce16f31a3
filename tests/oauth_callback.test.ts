import http from 'node:http';
import { Writable } from 'node:stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { Authorizer } from '../src/auth/authorizer.js';
import {
  bindFirstAvailable,
  listenForCallback,
  type CallbackServer
} from '../src/auth/callbackServer.js';
import {
  AuthorizationError,
  AuthorizationTimeoutError,
  ConfigurationError,
  NoCallbackPortError
} from '../src/errors.js';
import { FakeOAuthClient, createSilentLogger } from './helpers/fakes.js';

const openServers: Array<{ close: () => Promise<void> }> = [];

async function listenTracked(port = 0) {
  const server = await listenForCallback(port);
  openServers.push(server);
  return server;
}

async function occupyPort(): Promise<{ port: number; close: () => Promise<void> }> {
  const server = http.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;
  const handle = {
    port,
    close: () => new Promise<void>(resolve => server.close(() => resolve()))
  };
  openServers.push(handle);
  return handle;
}

function callbackUrl(server: CallbackServer, query: string) {
  return `http://127.0.0.1:${server.port}/${query}`;
}

function fakeCallbackServer(port: number, code: Promise<string>) {
  const close = vi.fn(async () => {});
  return {
    port,
    redirectUri: `http://localhost:${port}/`,
    waitForCode: () => code,
    close
  } satisfies CallbackServer;
}

function captureOutput() {
  let text = '';
  const stream = new Writable({
    write(chunk, _enc, callback) {
      text += chunk.toString();
      callback();
    }
  });
  return { stream, text: () => text };
}

afterEach(async () => {
  await Promise.all(openServers.splice(0).map(server => server.close()));
});

describe('OAuth callback listener', () => {
  it('accepts exactly one authorization code', async () => {
    const server = await listenTracked();
    expect(server.redirectUri).toBe(`http://localhost:${server.port}/`);

    const code = server.waitForCode({ timeoutMs: 5_000 });
    const response = await fetch(callbackUrl(server, '?code=test-code&state=x'));

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('Authorization successful!');
    await expect(code).resolves.toBe('test-code');

    const repeat = await fetch(callbackUrl(server, '?code=second-code'));
    expect(repeat.status).toBe(409);
    await expect(server.waitForCode({ timeoutMs: 5_000 })).resolves.toBe('test-code');
  });

  it('keeps waiting after a request without a code', async () => {
    const server = await listenTracked();
    const code = server.waitForCode({ timeoutMs: 5_000 });

    const empty = await fetch(callbackUrl(server, ''));
    expect(empty.status).toBe(400);
    expect(await empty.text()).toContain('No code received.');

    const other = await fetch(`http://127.0.0.1:${server.port}/favicon.ico`);
    expect(other.status).toBe(404);

    await fetch(callbackUrl(server, '?code=late-code'));
    await expect(code).resolves.toBe('late-code');
  });

  it('fails the wait when consent is denied', async () => {
    const server = await listenTracked();
    const code = server.waitForCode({ timeoutMs: 5_000 });
    const rejection = expect(code).rejects.toThrow('Authorization was denied: access_denied');

    const response = await fetch(callbackUrl(server, '?error=access_denied'));

    expect(response.status).toBe(400);
    await rejection;
  });

  it('resolves a code that arrived before anyone waited', async () => {
    const server = await listenTracked();
    await fetch(callbackUrl(server, '?code=early-code'));

    await expect(server.waitForCode({ timeoutMs: 10 })).resolves.toBe('early-code');
  });

  it('times out', async () => {
    const server = await listenTracked();

    const wait = server.waitForCode({ timeoutMs: 20 });

    await expect(wait).rejects.toBeInstanceOf(AuthorizationTimeoutError);
  });

  it('stops waiting when cancelled', async () => {
    const server = await listenTracked();
    const controller = new AbortController();

    const wait = server.waitForCode({ timeoutMs: 5_000, signal: controller.signal });
    controller.abort();

    await expect(wait).rejects.toThrow('Authorization was cancelled');
  });

  it('closes idempotently', async () => {
    const server = await listenForCallback(0);

    await server.close();
    await server.close();

    await expect(fetch(callbackUrl(server, '?code=x'))).rejects.toThrow();
  });
});

describe('bindFirstAvailable', () => {
  it('tries candidate ports strictly in order', async () => {
    const attempts: number[] = [];
    const listen = vi.fn(async (port: number) => {
      attempts.push(port);
      if (port === 8080) {
        throw Object.assign(new Error('listen EADDRINUSE'), { code: 'EADDRINUSE' });
      }
      return fakeCallbackServer(port, new Promise<string>(() => {}));
    });

    const server = await bindFirstAvailable([8080, 8081, 8082], {
      listen,
      logger: createSilentLogger()
    });

    expect(server.port).toBe(8081);
    expect(attempts).toEqual([8080, 8081]);
  });

  it('raises a configuration error when every port is taken', async () => {
    const first = await occupyPort();
    const second = await occupyPort();

    const attempt = bindFirstAvailable([first.port, second.port], { logger: createSilentLogger() });

    await expect(attempt).rejects.toBeInstanceOf(NoCallbackPortError);
    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toThrow(
      `Could not start OAuth callback server on any of ports ${first.port}, ${second.port}. ` +
        'Use the --console flag instead.'
    );
  });
});

describe('Authorizer', () => {
  it('completes the console flow over a real loopback listener', async () => {
    const oauth = new FakeOAuthClient();
    const output = captureOutput();
    const launchBrowser = vi.fn(async () => {});
    const servers: CallbackServer[] = [];
    const authorizer = new Authorizer({
      oauth,
      output: output.stream,
      launchBrowser,
      logger: createSilentLogger(),
      listen: async (port, host) => {
        const server = await listenForCallback(port, host);
        servers.push(server);
        return server;
      }
    });

    const pending = authorizer.authorize('console', { loginHint: 'owner@example.test' });
    await vi.waitFor(() => {
      expect(output.text()).toContain('Waiting for authorization');
    });
    const [server] = servers;
    if (!server) {
      throw new Error('listener was not started');
    }

    await fetch(callbackUrl(server, '?code=console-code'));
    const credential = await pending;

    expect(credential.token).toBe('access-for-console-code');
    expect(oauth.exchangeCode).toHaveBeenCalledWith('console-code', server.redirectUri);
    expect(oauth.urlRequests).toEqual([
      { redirectUri: server.redirectUri, loginHint: 'owner@example.test' }
    ]);
    expect(launchBrowser).not.toHaveBeenCalled();
    expect(output.text()).toContain('Please visit this URL to authorize the application:');
    expect(output.text()).toContain('Authorization successful!');
    await expect(fetch(callbackUrl(server, '?code=again'))).rejects.toThrow();
  });

  it('opens the browser in local server mode and releases the listener', async () => {
    const oauth = new FakeOAuthClient();
    const fake = fakeCallbackServer(8080, Promise.resolve('local-code'));
    const launchBrowser = vi.fn(async () => {});
    const authorizer = new Authorizer({
      oauth,
      launchBrowser,
      output: captureOutput().stream,
      logger: createSilentLogger(),
      listen: async () => fake
    });

    const credential = await authorizer.authorize('local_server');

    expect(credential.token).toBe('access-for-local-code');
    expect(launchBrowser).toHaveBeenCalledWith(
      'https://accounts.example.test/auth?redirect_uri=http://localhost:8080/'
    );
    expect(fake.close).toHaveBeenCalledTimes(1);
  });

  it('continues when the browser cannot be opened', async () => {
    const logger = createSilentLogger();
    const authorizer = new Authorizer({
      oauth: new FakeOAuthClient(),
      launchBrowser: async () => {
        throw new Error('no display');
      },
      output: captureOutput().stream,
      logger,
      listen: async port => fakeCallbackServer(port, Promise.resolve('code'))
    });

    await expect(authorizer.authorize('local_server')).resolves.toMatchObject({
      token: 'access-for-code'
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('skips the browser when disabled', async () => {
    const launchBrowser = vi.fn(async () => {});
    const authorizer = new Authorizer({
      oauth: new FakeOAuthClient(),
      openBrowser: false,
      launchBrowser,
      output: captureOutput().stream,
      logger: createSilentLogger(),
      listen: async port => fakeCallbackServer(port, Promise.resolve('code'))
    });

    await authorizer.authorize('local_server');
    expect(launchBrowser).not.toHaveBeenCalled();
  });

  it('releases the listener when the exchange fails', async () => {
    const oauth = new FakeOAuthClient();
    oauth.exchangeCode.mockRejectedValueOnce(
      new AuthorizationError('Authorization code exchange failed: invalid_grant')
    );
    const fake = fakeCallbackServer(9000, Promise.resolve('bad-code'));
    const authorizer = new Authorizer({
      oauth,
      openBrowser: false,
      output: captureOutput().stream,
      logger: createSilentLogger(),
      listen: async () => fake
    });

    await expect(authorizer.authorize('local_server')).rejects.toThrow(
      'Authorization code exchange failed: invalid_grant'
    );
    expect(fake.close).toHaveBeenCalledTimes(1);
  });

  it('reports when no callback port is free', async () => {
    const authorizer = new Authorizer({
      oauth: new FakeOAuthClient(),
      callbackPorts: [8080, 8081],
      output: captureOutput().stream,
      logger: createSilentLogger(),
      listen: async () => {
        throw new Error('listen EADDRINUSE');
      }
    });

    await expect(authorizer.authorize('local_server')).rejects.toThrow(
      'Could not start OAuth callback server on any of ports 8080, 8081. Use the --console flag instead.'
    );
  });

  it('times out in console mode and releases the listener', async () => {
    const servers: CallbackServer[] = [];
    const authorizer = new Authorizer({
      oauth: new FakeOAuthClient(),
      timeoutMs: 30,
      output: captureOutput().stream,
      logger: createSilentLogger(),
      listen: async (port, host) => {
        const server = await listenForCallback(port, host);
        servers.push(server);
        return server;
      }
    });

    await expect(authorizer.authorize('console')).rejects.toBeInstanceOf(
      AuthorizationTimeoutError
    );
    const [server] = servers;
    expect(server).toBeDefined();
    if (server) {
      await expect(fetch(callbackUrl(server, '?code=late'))).rejects.toThrow();
    }
  });
});
