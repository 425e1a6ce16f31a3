import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  applyEnvironmentOverrides,
  loadConfigFromFile,
  parseConfig,
  parseScopes,
  parseStorageBackend,
  type CenConfig
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';

function defaults(): CenConfig {
  return loadConfigFromFile(DEFAULT_CONFIG_PATH);
}

describe('configuration', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cen-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('ships valid defaults', () => {
    const config = defaults();

    expect(config.oauth.storage).toBe('keyring');
    expect(config.oauth.callbackPorts).toEqual([8080, 8081, 8082, 8090, 9000, 9001, 9090, 9091]);
    expect(config.oauth.authorizationTimeoutMs).toBe(300_000);
    expect(config.motion.sensitivity).toBe(500);
    expect(config.notifications.minIntervalSeconds).toBe(60);
    expect(config.notifications.anomalyThreshold).toBe(5);
    expect(config.summary).toEqual({
      enabled: false,
      intervalMinutes: 60,
      subject: 'CEN hourly summary'
    });
  });

  it('lists every schema violation', () => {
    const config = defaults();
    const broken = {
      ...config,
      oauth: { ...config.oauth, storage: 'vault' },
      motion: { sensitivity: -1 },
      extra: true
    };

    expect(() => parseConfig(JSON.stringify(broken))).toThrow(
      'config.oauth.storage must be one of keyring, file; config.motion.sensitivity must be >= 0'
    );
  });

  it('rejects unknown keys inside a section', () => {
    const config = defaults();
    const broken = { ...config, summary: { ...config.summary, cron: '* * * * *' } };

    expect(() => parseConfig(JSON.stringify(broken))).toThrow('config.summary.cron is not allowed');
  });

  it('applies logical checks after the schema', () => {
    const config = defaults();

    expect(() =>
      parseConfig(JSON.stringify({ ...config, oauth: { ...config.oauth, callbackPorts: [] } }))
    ).toThrow('config.oauth.callbackPorts must list at least one port');
    expect(() =>
      parseConfig(JSON.stringify({ ...config, camera: { ...config.camera, deviceIndex: 1.5 } }))
    ).toThrow('config.camera.deviceIndex must be an integer');
  });

  it('reports unreadable and malformed files as configuration errors', () => {
    const missing = path.join(tempDir, 'missing.json');
    expect(() => loadConfigFromFile(missing)).toThrow(ConfigurationError);

    const malformed = path.join(tempDir, 'malformed.json');
    fs.writeFileSync(malformed, '{ "app": ');
    expect(() => loadConfigFromFile(malformed)).toThrow(/^Failed to parse configuration/);
  });

  it('overlays environment settings on a copy', () => {
    const config = defaults();

    const overridden = applyEnvironmentOverrides(config, {
      GOOGLE_CLIENT_ID: 'env-client-id',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      CEN_TOKEN_STORAGE: 'FILE',
      CEN_OAUTH_SCOPES: 'scope-a, scope-b,',
      GMAIL_LOGIN_HINT: 'owner@example.test',
      GMAIL_SENDER: 'camera@example.test',
      CEN_NOTIFY_TO: 'alerts@example.test'
    });

    expect(overridden.oauth).toMatchObject({
      clientId: 'env-client-id',
      clientSecret: 'test-secret',
      storage: 'file',
      scopes: ['scope-a', 'scope-b'],
      loginHint: 'owner@example.test'
    });
    expect(overridden.notifications.from).toBe('camera@example.test');
    expect(overridden.notifications.to).toBe('alerts@example.test');
    expect(config.oauth.clientId).toBe('');
    expect(config.notifications.to).toBe('');
  });

  it('ignores blank environment values', () => {
    const config = defaults();
    const overridden = applyEnvironmentOverrides(config, { GOOGLE_CLIENT_ID: '   ' });
    expect(overridden.oauth.clientId).toBe('');
  });

  it('parses storage backends and scope lists', () => {
    expect(parseStorageBackend(' Keyring ')).toBe('keyring');
    expect(() => parseStorageBackend('vault')).toThrow(
      'Invalid storage backend "vault" (expected keyring or file)'
    );
    expect(parseScopes('a,,b , c')).toEqual(['a', 'b', 'c']);
  });

  it('loads the file and overlays the environment', () => {
    const filePath = path.join(tempDir, 'cen.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({ ...defaults(), motion: { sensitivity: 1200 } })
    );

    const manager = new ConfigManager(filePath, { CEN_NOTIFY_TO: 'alerts@example.test' });

    expect(manager.getConfig().notifications.to).toBe('alerts@example.test');
    expect(manager.getConfig().motion.sensitivity).toBe(1200);
    expect(manager.getPath()).toBe(filePath);
  });
});
