import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadKinbotConfig, loadKinbotSecrets, parseKinbotConfig } from './config.js';

const CONFIG_PATH = '/srv/kinbot/kinbot.config.json';

describe('parseKinbotConfig', () => {
  it('fills defaults and resolves paths beside the config file', () => {
    const config = parseKinbotConfig(
      { server: { port: 8000 }, store: { path: 'state/kinbot.db' }, secretsFile: 'secrets.json' },
      CONFIG_PATH,
    );

    expect(config.server).toEqual({
      port: 8000,
      wsPath: '/ws/interact',
      restorePath: '/api/restore',
      maxPayloadBytes: 26_214_400,
    });
    expect(config.auth.handshakeTimeoutMs).toBe(10_000);
    expect(config.history).toEqual({ compactionThreshold: 20, keepRecent: 5 });
    expect(config.model.backend).toBe('gemini');
    expect(config.storePath).toBe('/srv/kinbot/state/kinbot.db');
    expect(config.secretsFilePath).toBe('/srv/kinbot/secrets.json');
  });

  it('keeps an in-memory store path as is', () => {
    const config = parseKinbotConfig(
      { server: { port: 8000 }, store: { path: ':memory:' }, secretsFile: '/etc/kinbot/secrets.json' },
      CONFIG_PATH,
    );

    expect(config.storePath).toBe(':memory:');
    expect(config.secretsFilePath).toBe('/etc/kinbot/secrets.json');
  });

  it('names every invalid field', () => {
    expect(() =>
      parseKinbotConfig(
        {
          server: { port: 8000, wsPath: 'ws' },
          store: { path: 'kinbot.db' },
          history: { compactionThreshold: 5, keepRecent: 5 },
          secretsFile: 'secrets.json',
        },
        CONFIG_PATH,
      ),
    ).toThrow(
      `[kinbot] invalid config in ${CONFIG_PATH}: server.wsPath: server.wsPath must start with "/"; ` +
        'history.keepRecent: history.keepRecent must be lower than history.compactionThreshold',
    );
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'kinbot-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prefers the local config file', () => {
    const base = { server: { port: 8000 }, store: { path: 'kinbot.db' }, secretsFile: 'secrets.json' };
    writeFileSync(path.join(dir, 'kinbot.config.json'), JSON.stringify(base));
    writeFileSync(path.join(dir, 'kinbot.config.local.json'), JSON.stringify({ ...base, server: { port: 9000 } }));

    const config = loadKinbotConfig(dir);

    expect(config.server.port).toBe(9000);
    expect(config.configFilePath).toBe(path.join(dir, 'kinbot.config.local.json'));
  });

  it('reads and validates secrets', () => {
    const secretsPath = path.join(dir, 'secrets.json');
    writeFileSync(secretsPath, JSON.stringify({ apiKey: 'test-secret', modelApiKey: 'test-model-key' }));

    expect(loadKinbotSecrets(secretsPath)).toEqual({ apiKey: 'test-secret', modelApiKey: 'test-model-key' });
  });

  it('rejects secrets that are not JSON', () => {
    const secretsPath = path.join(dir, 'secrets.json');
    writeFileSync(secretsPath, 'apiKey=test-secret');

    expect(() => loadKinbotSecrets(secretsPath)).toThrow(`[kinbot] secrets file is not valid JSON: ${secretsPath}`);
  });
});
