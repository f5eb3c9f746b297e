import net from 'node:net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  RelayManager,
  restartBackoffMs,
  waitForStream,
  type RelayCommandSpec,
  type RelaySettings
} from '../src/relay/manager.js';
import { createDeferred, delay } from '../src/utils/async.js';
import { createTestLogger, FakeCommand } from './helpers/fakes.js';

function createManager(settings: Partial<RelaySettings> = {}) {
  const commands: FakeCommand[] = [];
  const specs: RelayCommandSpec[] = [];
  const metrics = new MetricsRegistry();
  const logger = createTestLogger();
  const manager = new RelayManager({
    settings: {
      feederIntervalMs: 200,
      restartBaseDelayMs: 0,
      maxRestarts: 2,
      terminateTimeoutMs: 20,
      killTimeoutMs: 20,
      feederJoinTimeoutMs: 100,
      ...settings
    },
    commandFactory: spec => {
      const command = new FakeCommand();
      commands.push(command);
      specs.push(spec);
      return command.asCommand();
    },
    logger,
    metrics
  });
  return { manager, commands, specs, metrics, logger };
}

describe('RelayManager', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts one relay per key and feeds robot frames into it', async () => {
    const { manager, commands, specs, metrics } = createManager();
    const frameSource = vi.fn(async () => Buffer.from('frame'));

    expect(manager.startRobotCameraRelay('robot-01', frameSource, 'media:8554')).toBe('/robot-01/camera');
    expect(manager.startRobotCameraRelay('robot-01', frameSource, 'media:8554')).toBe('/robot-01/camera');

    expect(commands).toHaveLength(1);
    expect(commands[0]?.runCount).toBe(1);
    expect(specs[0]).toMatchObject({
      type: 'robot_camera',
      key: 'robot-01/camera',
      target: 'rtsp://media:8554/robot-01/camera',
      framesPerSecond: 5
    });
    await vi.waitFor(() => expect(frameSource).toHaveBeenCalled());
    expect(metrics.snapshot().relays.started).toBe(1);

    await manager.stopAll();
    expect(commands[0]?.killedSignals).toEqual(['SIGTERM']);
    expect(manager.getStatus()).toEqual({});
  });

  it('passes the external source through unchanged', () => {
    const { manager, specs } = createManager();
    expect(manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554')).toBe('/robot-01/external');
    expect(specs).toEqual([
      {
        type: 'external_rtsp',
        key: 'robot-01/external',
        source: 'rtsp://cam.local/stream',
        target: 'rtsp://media:8554/robot-01/external'
      }
    ]);
  });

  it('escalates to SIGKILL when the process ignores SIGTERM', async () => {
    const { manager, commands, logger } = createManager();
    manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554');
    const [command] = commands;
    if (!command) {
      throw new Error('relay command not created');
    }
    command.exitOnKill = false;

    expect(await manager.stopRelay('robot-01/external')).toBe(true);
    expect(command.killedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(logger.warn).toHaveBeenCalledWith({ relay: 'robot-01/external' }, 'Relay did not exit after SIGTERM, killing');
    expect(await manager.stopRelay('robot-01/external')).toBe(false);
  });

  it('restarts a dead relay and gives up after the restart limit', async () => {
    const { manager, commands, metrics, logger } = createManager({ maxRestarts: 2 });
    manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554');

    commands[0]?.crash();
    expect(manager.getStatus()['robot-01/external']).toMatchObject({ running: false, uptimeSeconds: 0, restartCount: 0 });

    await manager.checkHealth();
    expect(commands).toHaveLength(2);
    expect(manager.getStatus()['robot-01/external']).toMatchObject({ running: true, restartCount: 1, abandoned: false });

    commands[1]?.crash();
    await manager.checkHealth();
    commands[2]?.crash();
    await manager.checkHealth();
    await manager.checkHealth();

    expect(commands).toHaveLength(3);
    expect(manager.getStatus()['robot-01/external']).toEqual({
      type: 'external_rtsp',
      running: false,
      uptimeSeconds: 0,
      restartCount: 2,
      abandoned: true
    });
    const snapshot = metrics.snapshot().relays;
    expect(snapshot.restarts).toBe(2);
    expect(snapshot.abandoned).toBe(1);
    expect(snapshot.byKey).toEqual({ 'robot-01/external': 2 });
    expect(logger.error).toHaveBeenCalledWith(
      { relay: 'robot-01/external', maxRestarts: 2 },
      'Relay exceeded restart limit, giving up'
    );
  });

  it('leaves healthy relays alone', async () => {
    const { manager, commands } = createManager();
    manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554');
    await manager.checkHealth();
    expect(commands).toHaveLength(1);
  });

  it('abandons a pending restart on shutdown', async () => {
    const { manager, commands } = createManager({ restartBaseDelayMs: 60_000 });
    manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554');
    commands[0]?.crash();

    const health = manager.checkHealth();
    await manager.shutdown();
    await health;

    expect(commands).toHaveLength(1);
    expect(manager.getStatus()).toEqual({});
  });

  it('does not respawn a relay that was stopped during its restart', async () => {
    const { manager, commands } = createManager({ feederIntervalMs: 5, feederJoinTimeoutMs: 1000 });
    const gate = createDeferred<Buffer | null>();
    const frameSource = vi.fn(() => gate.promise);
    manager.startRobotCameraRelay('robot-01', frameSource, 'media:8554');
    await vi.waitFor(() => expect(frameSource).toHaveBeenCalledTimes(1));
    commands[0]?.crash();

    const health = manager.checkHealth();
    await delay(20);
    const stopping = manager.stopAll();
    gate.resolve(Buffer.from('frame'));
    await Promise.all([health, stopping]);

    expect(commands).toHaveLength(1);
    expect(manager.getStatus()).toEqual({});
    await delay(30);
    expect(frameSource).toHaveBeenCalledTimes(1);
  });

  it('skips frames while ffmpeg is not draining its input', async () => {
    const { manager, specs } = createManager({ feederIntervalMs: 5 });
    const frameSource = vi.fn(async () => Buffer.alloc(20_000));
    manager.startRobotCameraRelay('robot-01', frameSource, 'media:8554');
    await vi.waitFor(() => expect(frameSource).toHaveBeenCalledTimes(1));

    await delay(40);
    expect(frameSource).toHaveBeenCalledTimes(1);

    const [spec] = specs;
    if (spec?.type !== 'robot_camera') {
      throw new Error('camera relay spec missing');
    }
    expect(spec.input.writableLength).toBe(20_000);
    spec.input.resume();
    await vi.waitFor(() => expect(frameSource.mock.calls.length).toBeGreaterThan(1));

    await manager.stopAll();
  });

  it('reports uptime in tenths of a second', () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const { manager } = createManager();
    manager.startExternalRtspRelay('robot-01', 'rtsp://cam.local/stream', 'media:8554');
    now.mockReturnValue(1_012_345);

    expect(manager.getStatus()['robot-01/external']?.uptimeSeconds).toBe(12.3);
  });

  it('doubles the restart backoff up to the cap', () => {
    const settings = { restartBaseDelayMs: 1000, maxBackoffMs: 30_000 };
    expect(restartBackoffMs(0, settings)).toBe(1000);
    expect(restartBackoffMs(3, settings)).toBe(8000);
    expect(restartBackoffMs(10, settings)).toBe(30_000);
  });
});

describe('waitForStream', () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0, servers.length)) {
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  });

  async function listen(statusLine: string) {
    const server = net.createServer(socket => {
      socket.once('data', () => {
        socket.end(`${statusLine}\r\nCSeq: 1\r\n\r\n`);
      });
    });
    servers.push(server);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    return address.port;
  }

  it('resolves true once the media server answers 200', async () => {
    const port = await listen('RTSP/1.0 200 OK');
    await expect(
      waitForStream(`rtsp://127.0.0.1:${port}/robot-01/camera`, 2000, { logger: createTestLogger() })
    ).resolves.toBe(true);
  });

  it('gives up at the deadline when the stream is missing', async () => {
    const port = await listen('RTSP/1.0 404 Not Found');
    const logger = createTestLogger();
    await expect(
      waitForStream(`rtsp://127.0.0.1:${port}/robot-01/camera`, 100, { pollIntervalMs: 10, logger })
    ).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ url: `rtsp://127.0.0.1:${port}/robot-01/camera`, maxWaitMs: 100 }),
      'Stream not ready before deadline'
    );
  });
});
