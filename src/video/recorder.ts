import fs from 'node:fs';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import ffmpeg from 'fluent-ffmpeg';
import loggerModule, { type Logger } from '../logger.js';
import type { FrameSource } from '../types.js';
import { waitWithTimeout } from '../utils/async.js';
import { BackgroundLoop } from '../utils/loop.js';
import { FrameWriter } from '../utils/stream.js';

export type RecorderCommandSpec = {
  input: PassThrough;
  outputPath: string;
  framesPerSecond: number;
  width: number;
  height: number;
};

export type VideoRecorderOptions = {
  outputPath: string;
  frameSource: FrameSource;
  framesPerSecond?: number;
  width?: number;
  height?: number;
  stopTimeoutMs?: number;
  commandFactory?: (spec: RecorderCommandSpec) => ffmpeg.FfmpegCommand;
  logger?: Logger;
};

export function createRecorderCommand(spec: RecorderCommandSpec): ffmpeg.FfmpegCommand {
  return ffmpeg(spec.input)
    .inputFormat('image2pipe')
    .inputOptions(['-framerate', String(spec.framesPerSecond)])
    .videoCodec('libx264')
    .size(`${spec.width}x${spec.height}`)
    .outputOptions(['-pix_fmt', 'yuv420p', '-movflags', '+faststart'])
    .format('mp4')
    .output(spec.outputPath);
}

export class VideoRecorder {
  readonly outputPath: string;
  private readonly options: VideoRecorderOptions;
  private readonly logger: Logger;
  private command: ffmpeg.FfmpegCommand | null = null;
  private input: PassThrough | null = null;
  private loop: BackgroundLoop | null = null;
  private exited: Promise<boolean> | null = null;
  private encoderRunning = false;
  private framesWritten = 0;

  constructor(options: VideoRecorderOptions) {
    this.options = options;
    this.outputPath = options.outputPath;
    this.logger = options.logger ?? loggerModule;
  }

  get frameCount() {
    return this.framesWritten;
  }

  isRecording() {
    return this.encoderRunning && (this.loop?.isRunning() ?? false);
  }

  start(): boolean {
    if (this.command) {
      return false;
    }

    const framesPerSecond = this.options.framesPerSecond ?? 5;
    const spec: RecorderCommandSpec = {
      input: new PassThrough(),
      outputPath: this.outputPath,
      framesPerSecond,
      width: this.options.width ?? 640,
      height: this.options.height ?? 480
    };

    fs.mkdirSync(path.dirname(this.outputPath), { recursive: true });
    const command = (this.options.commandFactory ?? createRecorderCommand)(spec);
    const input = spec.input;
    input.on('error', error => {
      this.logger.debug({ err: error, outputPath: this.outputPath }, 'Recorder input stream error');
    });

    this.exited = new Promise<boolean>(resolve => {
      command.once('end', () => {
        this.encoderRunning = false;
        resolve(true);
      });
      command.once('error', (error: Error) => {
        this.encoderRunning = false;
        this.logger.error({ err: error, outputPath: this.outputPath }, 'Video recorder ffmpeg failed');
        resolve(false);
      });
    });

    this.encoderRunning = true;
    command.run();
    this.command = command;
    this.input = input;
    this.framesWritten = 0;
    const writer = new FrameWriter(input);

    this.loop = new BackgroundLoop({
      name: 'video-recorder',
      intervalMs: Math.max(1, Math.round(1000 / framesPerSecond)),
      logger: this.logger,
      tick: async () => {
        if (!this.encoderRunning || !writer.isOpen()) {
          return false;
        }
        if (writer.isBlocked()) {
          return true;
        }
        const frame = await this.options.frameSource();
        if (frame && frame.length > 0 && this.encoderRunning && writer.write(frame)) {
          this.framesWritten += 1;
        }
        return true;
      }
    });
    this.loop.start();
    this.logger.info({ outputPath: this.outputPath, framesPerSecond }, 'Started video recording');
    return true;
  }

  // Resolves true when ffmpeg finalized the file on its own.
  async stop(): Promise<boolean> {
    const command = this.command;
    const exited = this.exited;
    if (!command || !exited) {
      return false;
    }

    const timeoutMs = this.options.stopTimeoutMs ?? 5000;
    await this.loop?.stop(timeoutMs);
    if (this.input && !this.input.writableEnded) {
      this.input.end();
    }

    let finished = false;
    const settled = await waitWithTimeout(
      exited.then(result => {
        finished = result;
      }),
      timeoutMs
    );
    if (!settled) {
      this.logger.warn({ outputPath: this.outputPath }, 'Video recorder did not finish in time, killing');
      try {
        command.kill('SIGKILL');
      } catch (error) {
        this.logger.debug({ err: error }, 'Failed to kill video recorder');
      }
    }

    this.command = null;
    this.input = null;
    this.loop = null;
    this.exited = null;
    this.logger.info({ outputPath: this.outputPath, frames: this.framesWritten, finished }, 'Stopped video recording');
    return finished;
  }
}
