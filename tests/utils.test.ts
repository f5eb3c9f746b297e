import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { createDeferred, delay, waitWithTimeout } from '../src/utils/async.js';
import { CancellationToken } from '../src/utils/cancellation.js';
import { readJsonFile, safeName, writeJsonAtomic } from '../src/utils/files.js';
import { BackgroundLoop } from '../src/utils/loop.js';
import { attempt, attemptValue, failure, success } from '../src/utils/outcome.js';
import { formatFileTimestamp, formatTimestamp, getZonedParts, isValidTimezone } from '../src/utils/time.js';
import { createTempDir } from './helpers/config.js';
import { createTestLogger } from './helpers/fakes.js';

describe('BackgroundLoop', () => {
  it('ends when a tick returns false', async () => {
    let ticks = 0;
    const loop = new BackgroundLoop({
      name: 'counter',
      intervalMs: 1,
      logger: createTestLogger(),
      tick: () => {
        ticks += 1;
        return ticks < 3;
      }
    });

    expect(loop.start()).toBe(true);
    expect(loop.start()).toBe(false);
    expect(await loop.join()).toBe(true);
    expect(ticks).toBe(3);
    expect(loop.isRunning()).toBe(false);
    expect(loop.name).toBe('counter');
  });

  it('wakes from its sleep when stopped', async () => {
    const tick = vi.fn();
    const loop = new BackgroundLoop({ name: 'slow', intervalMs: 60_000, tick, logger: createTestLogger() });
    loop.start();
    await vi.waitFor(() => expect(tick).toHaveBeenCalledTimes(1));

    expect(await loop.stop(1000)).toBe(true);
    expect(loop.isRunning()).toBe(false);
  });

  it('waits one interval before the first tick when not immediate', async () => {
    const tick = vi.fn();
    const loop = new BackgroundLoop({
      name: 'deferred',
      intervalMs: 60_000,
      immediate: false,
      tick,
      logger: createTestLogger()
    });
    loop.start();
    await loop.stop();
    expect(tick).not.toHaveBeenCalled();
  });

  it('logs a failed tick and keeps going', async () => {
    const logger = createTestLogger();
    let calls = 0;
    const probeError = new Error('probe failed');
    const loop = new BackgroundLoop({
      name: 'health',
      intervalMs: 1,
      logger,
      tick: () => {
        calls += 1;
        if (calls === 1) {
          throw probeError;
        }
        return false;
      }
    });
    loop.start();
    await loop.join();

    expect(calls).toBe(2);
    expect(logger.error).toHaveBeenCalledWith({ err: probeError, loop: 'health' }, 'Background loop tick failed');
  });

  it('reports a tick that outlives the stop timeout', async () => {
    const gate = createDeferred();
    const loop = new BackgroundLoop({ name: 'stuck', intervalMs: 10, tick: () => gate.promise, logger: createTestLogger() });
    loop.start();

    expect(await loop.stop(20)).toBe(false);
    gate.resolve();
    expect(await loop.join()).toBe(true);
    expect(loop.isRunning()).toBe(false);
  });

  it('treats stopping a loop that never started as done', async () => {
    const loop = new BackgroundLoop({ name: 'idle', intervalMs: 10, tick: vi.fn(), logger: createTestLogger() });
    expect(await loop.stop(10)).toBe(true);
  });
});

describe('CancellationToken', () => {
  it('notifies listeners once', () => {
    const token = new CancellationToken();
    const first = vi.fn();
    const second = vi.fn();
    token.onCancel(first);
    const unsubscribe = token.onCancel(second);
    unsubscribe();

    token.cancel();
    token.cancel();

    expect(token.isCancelled).toBe(true);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it('runs late listeners immediately', () => {
    const token = new CancellationToken();
    token.cancel();
    const listener = vi.fn();
    token.onCancel(listener);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('ends a pending delay early', async () => {
    const token = new CancellationToken();
    const startedAt = Date.now();
    const sleeping = delay(60_000, token);
    token.cancel();
    await sleeping;
    expect(Date.now() - startedAt).toBeLessThan(1000);
    await expect(delay(60_000, token)).resolves.toBeUndefined();
  });
});

describe('waitWithTimeout', () => {
  it('tells whether the promise settled in time', async () => {
    expect(await waitWithTimeout(Promise.resolve('done'), 50)).toBe(true);
    expect(await waitWithTimeout(Promise.reject(new Error('failed')), 50)).toBe(true);
    expect(await waitWithTimeout(new Promise(() => {}), 10)).toBe(false);
  });
});

describe('Outcome', () => {
  it('folds thrown errors and rejections into failures', async () => {
    expect(await attempt(() => success(1))).toEqual({ ok: true, value: 1 });
    expect(
      await attempt(() => {
        throw new Error('boom');
      })
    ).toEqual({ ok: false, error: new Error('boom') });
    expect(await attemptValue(async () => 'value')).toEqual({ ok: true, value: 'value' });
    expect(await attemptValue(() => Promise.reject('offline'))).toEqual({ ok: false, error: new Error('offline') });
    expect(failure(42)).toEqual({ ok: false, error: new Error('42') });
  });
});

describe('ZonedTime', () => {
  const instant = new Date('2026-03-01T23:30:05Z');

  it('formats timestamps in the configured timezone', () => {
    expect(formatTimestamp('UTC', instant)).toBe('2026-03-01 23:30:05');
    expect(formatTimestamp('Asia/Taipei', instant)).toBe('2026-03-02 07:30:05');
    expect(formatFileTimestamp('Asia/Taipei', instant)).toBe('20260302_073005');
  });

  it('numbers weekdays from Monday', () => {
    expect(getZonedParts('UTC', instant).weekday).toBe(6);
    expect(getZonedParts('Asia/Taipei', instant).weekday).toBe(0);
  });

  it('falls back to UTC for unknown zones', () => {
    expect(isValidTimezone('Europe/Berlin')).toBe(true);
    expect(isValidTimezone('Mars/Olympus')).toBe(false);
    expect(formatTimestamp('Mars/Olympus', instant)).toBe('2026-03-01 23:30:05');
  });
});

describe('JsonFiles', () => {
  it('writes atomically and reads back', () => {
    const dir = createTempDir('patrol-files-');
    try {
      const target = path.join(dir, 'nested', 'schedule.json');
      writeJsonAtomic(target, [{ id: 'a1' }]);

      expect(readJsonFile(target)).toEqual([{ id: 'a1' }]);
      expect(fs.readdirSync(path.dirname(target))).toEqual(['schedule.json']);
      expect(readJsonFile(path.join(dir, 'missing.json'))).toBeUndefined();

      fs.writeFileSync(target, '{ broken');
      expect(() => readJsonFile(target)).toThrow(`Failed to parse ${target}: `);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('replaces path separators in names', () => {
    expect(safeName('Dock/Bay\\2')).toBe('Dock_Bay_2');
  });
});
