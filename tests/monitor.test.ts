import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CredentialStore } from '../src/auth/credentialStore.js';
import { ConfigManager, DEFAULT_CONFIG_PATH, type CenConfig } from '../src/config/index.js';
import { ConfigurationError, MailSendError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { runMonitor, type MonitorOptions } from '../src/monitor.js';
import {
  FakeAuthorizer,
  FakeOAuthClient,
  FakeVision,
  MemoryBackend,
  NOW,
  RecordingTransport,
  createSilentLogger,
  makeCredential,
  solidFrame
} from './helpers/fakes.js';

function baseConfig(to = 'owner@example.test'): CenConfig {
  const config = new ConfigManager(DEFAULT_CONFIG_PATH, {}).getConfig();
  return {
    ...config,
    notifications: { ...config.notifications, to, minIntervalSeconds: 60 }
  };
}

describe('runMonitor', () => {
  let transport: RecordingTransport;
  let authorizer: FakeAuthorizer;
  let store: CredentialStore;
  let metrics: MetricsRegistry;
  let vision: FakeVision;
  let controller: AbortController;

  function createOptions(config: CenConfig, timestamps: number[]): MonitorOptions {
    const pending = [...timestamps];
    return {
      config,
      services: { backend: 'keyring', store, transport },
      vision,
      signal: controller.signal,
      logger: createSilentLogger(),
      metrics,
      now: () => pending.shift() ?? NOW,
      sleep: async () => {}
    };
  }

  async function stopWhenIdle() {
    await vi.waitFor(() => {
      expect(vision.isIdle()).toBe(true);
    });
    controller.abort();
  }

  beforeEach(() => {
    transport = new RecordingTransport();
    authorizer = new FakeAuthorizer();
    store = new CredentialStore({
      oauth: new FakeOAuthClient(),
      authorizer,
      backends: {
        keyring: new MemoryBackend('keyring', makeCredential().serialize()),
        file: new MemoryBackend('file')
      },
      env: {},
      logger: createSilentLogger(),
      now: () => NOW
    });
    metrics = new MetricsRegistry();
    const frame = solidFrame(4, 4, 0);
    vision = new FakeVision([frame, frame, frame, frame], [[600], [700], [900]]);
    controller = new AbortController();
  });

  it('throttles notifications until the signal stops the loop', async () => {
    const running = runMonitor(createOptions(baseConfig(), [NOW, NOW + 10_000, NOW + 70_000]));
    await stopWhenIdle();

    await expect(running).resolves.toEqual({ events: 3, sent: 2, suppressed: 1, failed: 0 });
    expect(transport.messages.map(message => message.body.split('\n').at(-2))).toEqual([
      'Motion area: 600',
      'Motion area: 900'
    ]);
    expect(vision.released).toHaveBeenCalledTimes(1);
    expect(authorizer.authorize).not.toHaveBeenCalled();
    expect(metrics.snapshot().detectors.notifier.counters).toEqual({ sent: 2, suppressed: 1 });
  });

  it('keeps watching after a failed send', async () => {
    transport.failures.push(new MailSendError('Gmail send failed: quota exceeded'));

    const running = runMonitor(createOptions(baseConfig(), [NOW, NOW + 10_000, NOW + 70_000]));
    await stopWhenIdle();

    await expect(running).resolves.toEqual({ events: 3, sent: 2, suppressed: 0, failed: 1 });
    expect(transport.messages).toHaveLength(2);
  });

  it('stops on unexpected errors and releases the camera', async () => {
    transport.failures.push(new Error('transport exploded'));

    await expect(runMonitor(createOptions(baseConfig(), [NOW]))).rejects.toThrow(
      'transport exploded'
    );
    expect(vision.released).toHaveBeenCalledTimes(1);
  });

  it('requires a recipient', async () => {
    const running = runMonitor(createOptions(baseConfig(''), []));

    await expect(running).rejects.toThrow(ConfigurationError);
    await expect(running).rejects.toThrow('A recipient address is required (--to or CEN_NOTIFY_TO)');
    expect(vision.released).not.toHaveBeenCalled();
  });

  it('returns without sampling when already aborted', async () => {
    controller.abort();

    await expect(runMonitor(createOptions(baseConfig(), []))).resolves.toEqual({
      events: 0,
      sent: 0,
      suppressed: 0,
      failed: 0
    });
    expect(vision.diffCalls).toBe(0);
    expect(vision.released).not.toHaveBeenCalled();
  });

  it('authorizes before sampling when no credential is stored', async () => {
    store = new CredentialStore({
      oauth: new FakeOAuthClient(),
      authorizer,
      backends: { keyring: new MemoryBackend('keyring'), file: new MemoryBackend('file') },
      env: {},
      logger: createSilentLogger(),
      now: () => NOW
    });
    controller.abort();

    await runMonitor({ ...createOptions(baseConfig(), []), mode: 'console' });

    expect(authorizer.authorize).toHaveBeenCalledWith('console', {
      loginHint: undefined,
      signal: controller.signal
    });
  });
});
