import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  bootstrap,
  collectHealthChecks,
  createPatrolRuntime,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks
} from '../src/app.js';
import { staticConfigSource } from '../src/config/index.js';
import { openDatabase } from '../src/db.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { createTempDir, createTestConfig, writePoints } from './helpers/config.js';
import { createTestLogger, FakeRobot, FakeVlm } from './helpers/fakes.js';

const tempDirs: string[] = [];

function tempRoot() {
  const dir = createTempDir('patrol-app-');
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  resetAppLifecycle();
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('PatrolRuntime', () => {
  it('runs a turbo patrol through the wired services and stops once', async () => {
    const config = createTestConfig(tempRoot(), { patrol: { turboMode: true } });
    writePoints(config, [{ name: 'Gate' }]);
    const logger = createTestLogger();
    const runtime = createPatrolRuntime({
      config: staticConfigSource(config),
      robot: new FakeRobot(),
      vlm: new FakeVlm(),
      db: openDatabase({ path: ':memory:', logger }),
      createNotifier: () => null,
      logger,
      metrics: new MetricsRegistry()
    });

    runtime.start();
    expect(runtime.worker.isRunning()).toBe(true);

    expect(await runtime.orchestrator.startPatrol()).toEqual({ ok: true, message: 'Started' });
    await runtime.orchestrator.whenIdle();

    expect(runtime.db.getRun(1)?.status).toBe('Completed');
    expect(runtime.db.listInspections(1).map(row => [row.pointName, row.isNg])).toEqual([['Gate', false]]);

    await runtime.stop();
    await runtime.stop();

    expect(runtime.worker.isRunning()).toBe(false);
    expect(runtime.db.db.open).toBe(false);
    expect(logger.info.mock.calls.filter(([message]) => message === 'Patrol runtime stopped')).toHaveLength(1);
  });
});

describe('AppLifecycle', () => {
  it('collects health checks and marks a throwing indicator degraded', async () => {
    registerHealthIndicator('robot', () => ({ status: 'starting' }));
    registerHealthIndicator('robot', () => ({ status: 'ok', details: { connected: true } }));
    registerHealthIndicator('alerts', () => {
      throw new Error('probe offline');
    });
    const unregister = registerHealthIndicator('removed', () => ({ status: 'ok' }));
    unregister();

    const results = await collectHealthChecks({
      service: { status: 'running', startedAt: 1 },
      metrics: new MetricsRegistry().snapshot()
    });

    expect(results).toEqual([
      { name: 'robot', status: 'ok', details: { connected: true } },
      { name: 'alerts', status: 'degraded', details: { error: 'probe offline' } }
    ]);
  });

  it('runs shutdown hooks newest first and keeps going after a failure', async () => {
    const order: string[] = [];
    registerShutdownHook('database', () => {
      order.push('database');
    });
    registerShutdownHook('relays', async context => {
      order.push(`relays:${context.reason}`);
      throw new Error('relay still busy');
    });

    const results = await runShutdownHooks({ reason: 'test', signal: 'SIGTERM' });

    expect(order).toEqual(['relays:test', 'database']);
    expect(results).toEqual([
      { name: 'relays', status: 'error', error: new Error('relay still busy') },
      { name: 'database', status: 'ok' }
    ]);
  });

  it('bootstraps from a configuration file and shuts down through its hook', async () => {
    const root = tempRoot();
    const configPath = path.join(root, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(createTestConfig(root)));
    const metrics = new MetricsRegistry();

    const runtime = bootstrap({
      configPath,
      robot: new FakeRobot(),
      vlm: new FakeVlm(),
      createNotifier: () => null,
      logger: createTestLogger(),
      metrics
    });

    const [health] = await collectHealthChecks({ service: { status: 'running', startedAt: 1 }, metrics: metrics.snapshot() });
    expect(health).toEqual({
      name: 'patrol',
      status: 'ok',
      details: {
        patrol: { isPatrolling: false, status: 'Idle', phase: 'idle', currentIndex: -1 },
        relays: {},
        liveMonitorActive: false
      }
    });

    expect(await runShutdownHooks({ reason: 'test' })).toEqual([{ name: 'patrol-runtime', status: 'ok' }]);
    expect(runtime.db.db.open).toBe(false);
    expect(runtime.worker.isRunning()).toBe(false);
  });
});
