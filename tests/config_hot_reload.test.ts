import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type ConfigReloadEvent,
  type PatrolConfig
} from '../src/config/index.js';
import { createTempDir, createTestConfig } from './helpers/config.js';

function clone(config: PatrolConfig): Record<string, unknown> {
  return structuredClone({ ...config });
}

describe('ConfigValidation', () => {
  it('accepts the shipped default configuration', () => {
    const config = loadConfigFromFile('config/default.json');
    expect(config.app.robotId).toBe('robot-01');
    expect(config.liveMonitor.enabled).toBe(false);
    expect(config.relay.maxBackoffMs).toBe(30_000);
  });

  it('accepts a complete configuration', () => {
    expect(() => validateConfig(createTestConfig(createTempDir()))).not.toThrow();
  });

  it('ConfigSchemaValidationErrors names the offending path', () => {
    const base = createTestConfig(createTempDir());

    const missing = clone(base);
    Reflect.deleteProperty(missing, 'scheduler');
    expect(() => validateConfig(missing)).toThrow('config.scheduler is required');

    const extra = clone(base);
    extra.app = { ...base.app, extra: 'x' };
    expect(() => validateConfig(extra)).toThrow('config.app.extra is not allowed');

    const slow = createTestConfig(createTempDir(), { video: { framesPerSecond: 0 } });
    expect(() => validateConfig(slow)).toThrow('config.video.framesPerSecond must be >= 1');

    const wrongType = clone(base);
    wrongType.scheduler = { pollIntervalMs: '30s' };
    expect(() => validateConfig(wrongType)).toThrow('config.scheduler.pollIntervalMs must be a number');

    const loud = clone(base);
    loud.logging = { level: 'loud' };
    expect(() => validateConfig(loud)).toThrow(
      'config.logging.level must be one of trace, debug, info, warn, error, fatal, silent'
    );
  });

  it('ConfigLogicalValidation joins every failed check', () => {
    const root = createTempDir();
    expect(() =>
      validateConfig(createTestConfig(root, { app: { timezone: 'Mars/Olympus', robotId: ' ' } }))
    ).toThrow('config.app.timezone "Mars/Olympus" is not a known IANA timezone; config.app.robotId must not be empty');

    expect(() => validateConfig(createTestConfig(root, { liveMonitor: { enabled: true } }))).toThrow(
      'config.liveMonitor.serviceUrl is required when the live monitor is enabled'
    );

    expect(() =>
      validateConfig(createTestConfig(root, { liveMonitor: { rules: ['smoke', 'person', ' '], maxRules: 1 } }))
    ).toThrow('config.liveMonitor.rules has 2 rules, more than maxRules (1)');

    expect(() => validateConfig(createTestConfig(root, { relay: { externalRtsp: true } }))).toThrow(
      'config.relay.externalRtspUrl is required when the external relay is enabled'
    );

    expect(() =>
      validateConfig(createTestConfig(root, { relay: { restartBaseDelayMs: 5000, maxBackoffMs: 1000 } }))
    ).toThrow('config.relay.maxBackoffMs must be >= config.relay.restartBaseDelayMs');

    expect(() => validateConfig(createTestConfig(root, { telegram: { enabled: true, botToken: 'test-token' } }))).toThrow(
      'config.telegram.botToken and config.telegram.userId are required when telegram is enabled'
    );
  });

  it('reports unreadable JSON', () => {
    expect(() => parseConfig('{ "app": ')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;
  let base: PatrolConfig;

  beforeEach(() => {
    tempDir = createTempDir('patrol-config-');
    configPath = path.join(tempDir, 'config.json');
    base = createTestConfig(tempDir);
    fs.writeFileSync(configPath, JSON.stringify(base, null, 2));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('emits the previous and next configuration on reload', () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    const updated = { ...base, patrol: { ...base.patrol, defaultPointPrompt: 'Any leaks?' } };
    fs.writeFileSync(configPath, JSON.stringify(updated));
    manager.reload();

    expect(manager.getPath()).toBe(configPath);
    expect(manager.getConfig().patrol.defaultPointPrompt).toBe('Any leaks?');
    expect(events).toHaveLength(1);
    expect(events[0]?.previous.patrol.defaultPointPrompt).toBe('Is everything normal?');
    expect(events[0]?.next.patrol.defaultPointPrompt).toBe('Any leaks?');
  });

  it('keeps the current configuration when a manual reload fails', () => {
    const manager = new ConfigManager(configPath);
    fs.writeFileSync(configPath, JSON.stringify({ ...base, scheduler: { pollIntervalMs: 0 } }));

    expect(() => manager.reload()).toThrow('config.scheduler.pollIntervalMs must be >= 1');
    expect(manager.getConfig().scheduler.pollIntervalMs).toBe(30_000);
  });

  it('ConfigHotReloadRollback applies valid edits and restores the last good file', async () => {
    const manager = new ConfigManager(configPath);
    const errors: Error[] = [];
    manager.on('error', (error: Error) => errors.push(error));
    const unwatch = manager.watch();

    try {
      const updatedRaw = JSON.stringify({ ...base, patrol: { ...base.patrol, settleDelayMs: 250 } }, null, 2);
      fs.writeFileSync(configPath, updatedRaw);
      await vi.waitFor(() => expect(manager.getConfig().patrol.settleDelayMs).toBe(250), { timeout: 4000 });

      fs.writeFileSync(configPath, JSON.stringify({ ...base, app: { ...base.app, timezone: 'Mars/Olympus' } }));
      await vi.waitFor(() => expect(errors.length).toBeGreaterThan(0), { timeout: 4000 });
      await vi.waitFor(() => expect(fs.readFileSync(configPath, 'utf-8')).toBe(updatedRaw), { timeout: 4000 });

      expect(errors[0]?.message).toBe('config.app.timezone "Mars/Olympus" is not a known IANA timezone');
      expect(manager.getConfig().patrol.settleDelayMs).toBe(250);
    } finally {
      unwatch();
    }
  });
});
