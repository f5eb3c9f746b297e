import net from 'node:net';
import { PassThrough } from 'node:stream';
import ffmpeg from 'fluent-ffmpeg';
import type { RelayConfig } from '../config/index.js';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { FrameSource, StreamType } from '../types.js';
import { delay, waitWithTimeout } from '../utils/async.js';
import { CancellationToken } from '../utils/cancellation.js';
import { BackgroundLoop } from '../utils/loop.js';
import { FrameWriter } from '../utils/stream.js';

export type RelayCommandSpec =
  | { type: 'robot_camera'; key: string; input: PassThrough; target: string; framesPerSecond: number }
  | { type: 'external_rtsp'; key: string; source: string; target: string };

export type RelayCommandFactory = (spec: RelayCommandSpec) => ffmpeg.FfmpegCommand;

export type RelaySettings = Pick<
  RelayConfig,
  | 'feederIntervalMs'
  | 'monitorIntervalMs'
  | 'maxRestarts'
  | 'restartBaseDelayMs'
  | 'maxBackoffMs'
  | 'terminateTimeoutMs'
  | 'killTimeoutMs'
  | 'feederJoinTimeoutMs'
>;

export const DEFAULT_RELAY_SETTINGS: RelaySettings = {
  feederIntervalMs: 200,
  monitorIntervalMs: 10_000,
  maxRestarts: 3,
  restartBaseDelayMs: 1000,
  maxBackoffMs: 30_000,
  terminateTimeoutMs: 5000,
  killTimeoutMs: 3000,
  feederJoinTimeoutMs: 3000
};

export type RelayManagerOptions = {
  settings?: Partial<RelaySettings>;
  commandFactory?: RelayCommandFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type RelayStatus = {
  type: StreamType;
  running: boolean;
  uptimeSeconds: number;
  restartCount: number;
  abandoned: boolean;
};

type RelayHandle = {
  command: ffmpeg.FfmpegCommand;
  input: PassThrough | null;
  feeder: BackgroundLoop | null;
  exited: Promise<void>;
  running: boolean;
  stopping: boolean;
};

type RelayDefinition = {
  key: string;
  type: StreamType;
  target: string;
  source: string | null;
  frameSource: FrameSource | null;
};

type RelayEntry = RelayDefinition & {
  handle: RelayHandle;
  startedAt: number;
  restartCount: number;
  abandoned: boolean;
};

export function createRelayCommand(spec: RelayCommandSpec): ffmpeg.FfmpegCommand {
  if (spec.type === 'robot_camera') {
    return ffmpeg(spec.input)
      .inputFormat('image2pipe')
      .inputOptions(['-framerate', String(spec.framesPerSecond)])
      .videoFilters('scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2')
      .videoCodec('libx264')
      .outputOptions([
        '-preset',
        'ultrafast',
        '-tune',
        'zerolatency',
        '-profile:v',
        'baseline',
        '-pix_fmt',
        'yuv420p',
        '-x264-params',
        'keyint=30:min-keyint=30:repeat-headers=1'
      ])
      .format('rtsp')
      .outputOptions(['-rtsp_transport', 'tcp'])
      .output(spec.target);
  }

  return ffmpeg(spec.source)
    .inputOptions(['-rtsp_transport', 'tcp'])
    .outputOptions(['-c:v', 'copy', '-an'])
    .format('rtsp')
    .outputOptions(['-rtsp_transport', 'tcp'])
    .output(spec.target);
}

export function restartBackoffMs(restartCount: number, settings: Pick<RelaySettings, 'restartBaseDelayMs' | 'maxBackoffMs'>) {
  return Math.min(2 ** restartCount * settings.restartBaseDelayMs, settings.maxBackoffMs);
}

export class RelayManager {
  private readonly settings: RelaySettings;
  private readonly commandFactory: RelayCommandFactory;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly relays = new Map<string, RelayEntry>();
  private readonly monitor: BackgroundLoop;
  private shutdownToken = new CancellationToken();

  constructor(options: RelayManagerOptions = {}) {
    this.settings = { ...DEFAULT_RELAY_SETTINGS, ...options.settings };
    this.commandFactory = options.commandFactory ?? createRelayCommand;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.monitor = new BackgroundLoop({
      name: 'relay-health',
      intervalMs: this.settings.monitorIntervalMs,
      immediate: false,
      logger: this.logger,
      tick: () => this.checkHealth()
    });
  }

  start() {
    if (this.shutdownToken.isCancelled) {
      this.shutdownToken = new CancellationToken();
    }
    return this.monitor.start();
  }

  async shutdown() {
    this.shutdownToken.cancel();
    await this.monitor.stop();
    await this.stopAll();
  }

  startRobotCameraRelay(robotId: string, frameSource: FrameSource, target: string): string {
    return this.startRelay({
      key: `${robotId}/camera`,
      type: 'robot_camera',
      target,
      source: null,
      frameSource
    });
  }

  startExternalRtspRelay(robotId: string, sourceUrl: string, target: string): string {
    return this.startRelay({
      key: `${robotId}/external`,
      type: 'external_rtsp',
      target,
      source: sourceUrl,
      frameSource: null
    });
  }

  async stopRelay(key: string): Promise<boolean> {
    const entry = this.relays.get(key);
    if (!entry) {
      return false;
    }
    this.relays.delete(key);
    this.logger.info({ relay: key }, 'Stopping relay');
    await this.stopProcess(entry.key, entry.handle);
    return true;
  }

  async stopAll() {
    const keys = [...this.relays.keys()];
    for (const key of keys) {
      await this.stopRelay(key);
    }
  }

  getStatus(): Record<string, RelayStatus> {
    const now = Date.now();
    const status: Record<string, RelayStatus> = {};
    for (const [key, entry] of this.relays) {
      const running = entry.handle.running;
      status[key] = {
        type: entry.type,
        running,
        uptimeSeconds: running ? Math.round((now - entry.startedAt) / 100) / 10 : 0,
        restartCount: entry.restartCount,
        abandoned: entry.abandoned
      };
    }
    return status;
  }

  async checkHealth() {
    for (const entry of [...this.relays.values()]) {
      if (entry.handle.running || entry.abandoned) {
        continue;
      }

      if (entry.restartCount >= this.settings.maxRestarts) {
        entry.abandoned = true;
        this.metrics.recordRelayAbandoned();
        this.logger.error(
          { relay: entry.key, maxRestarts: this.settings.maxRestarts },
          'Relay exceeded restart limit, giving up'
        );
        continue;
      }

      const backoffMs = restartBackoffMs(entry.restartCount, this.settings);
      this.logger.warn(
        { relay: entry.key, attempt: entry.restartCount + 1, backoffMs },
        'Relay died, scheduling restart'
      );
      await delay(backoffMs, this.shutdownToken);

      if (this.shutdownToken.isCancelled || this.relays.get(entry.key) !== entry) {
        continue;
      }

      await this.stopProcess(entry.key, entry.handle);
      if (this.shutdownToken.isCancelled || this.relays.get(entry.key) !== entry) {
        continue;
      }

      entry.restartCount += 1;
      try {
        entry.handle = this.spawn(entry);
        entry.startedAt = Date.now();
        this.metrics.recordRelayRestart(entry.key);
        this.logger.info({ relay: entry.key, restartCount: entry.restartCount }, 'Relay restarted');
      } catch (error) {
        this.logger.error({ err: error, relay: entry.key }, 'Failed to restart relay');
      }
    }
  }

  private startRelay(init: RelayDefinition): string {
    const rtspPath = `/${init.key}`;
    const existing = this.relays.get(init.key);
    if (existing?.handle.running) {
      this.logger.info({ relay: init.key }, 'Relay already running');
      return rtspPath;
    }

    const definition: RelayDefinition = { ...init, target: `rtsp://${init.target}${rtspPath}` };
    const entry: RelayEntry = {
      ...definition,
      handle: this.spawn(definition),
      startedAt: Date.now(),
      restartCount: 0,
      abandoned: false
    };
    this.relays.set(entry.key, entry);
    this.metrics.recordRelayStart();
    this.logger.info({ relay: entry.key, type: entry.type, target: entry.target }, 'Relay started');
    return rtspPath;
  }

  private spawn(entry: RelayDefinition): RelayHandle {
    const input = entry.type === 'robot_camera' ? new PassThrough() : null;
    const spec: RelayCommandSpec =
      input !== null
        ? {
            type: 'robot_camera',
            key: entry.key,
            input,
            target: entry.target,
            framesPerSecond: Math.max(1, Math.round(1000 / this.settings.feederIntervalMs))
          }
        : { type: 'external_rtsp', key: entry.key, source: entry.source ?? '', target: entry.target };

    const command = this.commandFactory(spec);
    let markExited: () => void = () => {};
    const handle: RelayHandle = {
      command,
      input,
      feeder: null,
      exited: new Promise<void>(resolve => {
        markExited = resolve;
      }),
      running: true,
      stopping: false
    };

    const onExit = () => {
      handle.running = false;
      markExited();
    };

    command.on('start', (commandLine: string) => {
      this.logger.debug({ relay: entry.key, commandLine }, 'ffmpeg relay spawned');
    });
    command.on('stderr', (line: string) => {
      this.logger.debug({ relay: entry.key, line }, 'ffmpeg relay output');
    });
    command.on('error', (error: Error) => {
      if (!handle.stopping) {
        this.logger.warn({ err: error, relay: entry.key }, 'Relay process exited with error');
      }
      onExit();
    });
    command.on('end', () => {
      this.logger.info({ relay: entry.key }, 'Relay process ended');
      onExit();
    });

    if (input) {
      input.on('error', error => {
        this.logger.debug({ err: error, relay: entry.key }, 'Relay input stream error');
      });
    }

    command.run();

    if (input && entry.frameSource) {
      handle.feeder = this.createFeeder(entry.key, handle, input, entry.frameSource);
      handle.feeder.start();
    }

    return handle;
  }

  private createFeeder(key: string, handle: RelayHandle, input: PassThrough, frameSource: FrameSource) {
    const writer = new FrameWriter(input);
    return new BackgroundLoop({
      name: `relay-feeder:${key}`,
      intervalMs: this.settings.feederIntervalMs,
      logger: this.logger,
      tick: async () => {
        if (!handle.running || !writer.isOpen()) {
          return false;
        }
        // ffmpeg is behind; skip this frame
        if (writer.isBlocked()) {
          return true;
        }
        const frame = await frameSource();
        if (!frame || frame.length === 0) {
          return true;
        }
        if (!handle.running || !writer.isOpen()) {
          return false;
        }
        writer.write(frame);
        return true;
      }
    });
  }

  // Stop the feeder, SIGTERM, wait, SIGKILL, wait, then join the feeder.
  private async stopProcess(key: string, handle: RelayHandle) {
    handle.stopping = true;
    const feederStopped = handle.feeder ? handle.feeder.stop(this.settings.feederJoinTimeoutMs) : Promise.resolve(true);
    if (handle.input && !handle.input.writableEnded) {
      handle.input.end();
    }

    if (handle.running) {
      this.signal(key, handle, 'SIGTERM');
      const exited = await waitWithTimeout(handle.exited, this.settings.terminateTimeoutMs);
      if (!exited) {
        this.logger.warn({ relay: key }, 'Relay did not exit after SIGTERM, killing');
        this.signal(key, handle, 'SIGKILL');
        await waitWithTimeout(handle.exited, this.settings.killTimeoutMs);
      }
    }

    if (!(await feederStopped)) {
      this.logger.warn({ relay: key }, 'Relay feeder did not stop in time');
    }
  }

  private signal(key: string, handle: RelayHandle, signal: NodeJS.Signals) {
    try {
      handle.command.kill(signal);
    } catch (error) {
      this.logger.debug({ err: error, relay: key, signal }, 'Failed to signal relay process');
    }
  }
}

export function describeStream(url: string, timeoutMs = 3000): Promise<string> {
  const parsed = new URL(url);
  const host = parsed.hostname;
  const port = parsed.port ? Number(parsed.port) : 8554;
  const streamPath = parsed.pathname || '/';

  return new Promise((resolve, reject) => {
    let response = '';
    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.write(`DESCRIBE rtsp://${host}:${port}${streamPath} RTSP/1.0\r\nCSeq: 1\r\n\r\n`);
    });
    socket.on('data', chunk => {
      response += chunk.toString('utf8');
      if (response.includes('\r\n')) {
        socket.destroy();
        resolve(response);
      }
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error(`RTSP probe timed out after ${timeoutMs}ms`));
    });
    socket.once('error', reject);
    socket.once('end', () => resolve(response));
  });
}

export async function waitForStream(
  url: string,
  maxWaitMs = 20_000,
  options: { pollIntervalMs?: number; probeTimeoutMs?: number; logger?: Logger } = {}
): Promise<boolean> {
  const logger = options.logger ?? loggerModule;
  const pollIntervalMs = options.pollIntervalMs ?? 1000;
  const deadline = Date.now() + maxWaitMs;
  let attempts = 0;

  while (Date.now() < deadline) {
    attempts += 1;
    try {
      const response = await describeStream(url, options.probeTimeoutMs ?? 3000);
      if (response.includes('RTSP/1.0 200')) {
        logger.info({ url, attempts }, 'Stream ready');
        return true;
      }
      logger.debug({ url, attempts, status: response.split('\r\n')[0] || 'no response' }, 'Stream not ready');
    } catch (error) {
      logger.debug({ err: error, url, attempts }, 'Stream probe failed');
    }
    await delay(Math.min(pollIntervalMs, Math.max(0, deadline - Date.now())));
  }

  logger.warn({ url, attempts, maxWaitMs }, 'Stream not ready before deadline');
  return false;
}
