import { describe, expect, it, vi } from 'vitest';
import { assertOAuthClientConfig, createServices } from '../src/app.js';
import { DEFAULT_CONFIG_PATH, loadConfigFromFile, type CenConfig } from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';
import type { MailApi } from '../src/mail/gmail.js';
import type { AuthorizationMode } from '../src/types.js';
import {
  FakeAuthorizer,
  FakeOAuthClient,
  MemoryBackend,
  NOW,
  createSilentLogger
} from './helpers/fakes.js';

function defaults(): CenConfig {
  return loadConfigFromFile(DEFAULT_CONFIG_PATH);
}

describe('createServices', () => {
  function createEmptyServices(overrides: { mode?: AuthorizationMode; signal?: AbortSignal }) {
    const authorizer = new FakeAuthorizer();
    const sendRaw = vi.fn(async (_raw: string) => 'gmail-id-1');
    const mailApi: MailApi = { sendRaw };
    const services = createServices(defaults(), {
      ...overrides,
      oauth: new FakeOAuthClient(),
      authorizer,
      backends: { keyring: new MemoryBackend('keyring'), file: new MemoryBackend('file') },
      mailApi,
      env: {},
      logger: createSilentLogger(),
      now: () => NOW
    });
    return { services, authorizer, sendRaw };
  }

  it('authorizes from a send with the configured mode and signal', async () => {
    const controller = new AbortController();
    const { services, authorizer, sendRaw } = createEmptyServices({
      mode: 'console',
      signal: controller.signal
    });

    await expect(
      services.transport.send({ to: 'owner@example.test', subject: 'Hi', body: 'Hello' })
    ).resolves.toBe('gmail-id-1');

    expect(authorizer.authorize).toHaveBeenCalledTimes(1);
    expect(authorizer.authorize).toHaveBeenCalledWith('console', {
      loginHint: undefined,
      signal: controller.signal
    });
    expect(sendRaw).toHaveBeenCalledTimes(1);
  });

  it('falls back to the local server flow when no mode is given', async () => {
    const { services, authorizer } = createEmptyServices({});

    await services.transport.send({ to: 'owner@example.test', subject: 'Hi', body: 'Hello' });

    expect(authorizer.authorize).toHaveBeenCalledWith('local_server', {
      loginHint: undefined,
      signal: undefined
    });
  });

  it('stores the consented credential in the configured backend', async () => {
    const { services } = createEmptyServices({ mode: 'console' });

    await services.transport.send({ to: 'owner@example.test', subject: 'Hi', body: 'Hello' });

    expect(services.backend).toBe('keyring');
    expect(services.store.getCached()?.token).toBe('interactive-access-token');
  });
});

describe('assertOAuthClientConfig', () => {
  it('names the missing client secret', () => {
    const oauth = { ...defaults().oauth, clientId: 'test-client-id' };

    expect(() => assertOAuthClientConfig(oauth)).toThrow(
      new ConfigurationError(
        'Missing OAuth client secret (GOOGLE_CLIENT_SECRET or --client-secret)'
      )
    );
  });

  it('requires at least one scope', () => {
    const oauth = {
      ...defaults().oauth,
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      scopes: []
    };

    expect(() => assertOAuthClientConfig(oauth)).toThrow('At least one OAuth scope is required');
  });
});
