import { PassThrough } from 'node:stream';
import ffmpeg from 'fluent-ffmpeg';
import { failure, success, type Outcome } from '../utils/outcome.js';

export type SnapshotCommandFactory = (url: string) => ffmpeg.FfmpegCommand;

export function createSnapshotCommand(url: string): ffmpeg.FfmpegCommand {
  return ffmpeg(url)
    .inputOptions(['-rtsp_transport', 'tcp'])
    .frames(1)
    .outputOptions(['-f', 'image2', '-vcodec', 'mjpeg']);
}

export function grabFrame(
  url: string,
  options: { timeoutMs?: number; commandFactory?: SnapshotCommandFactory } = {}
): Promise<Outcome<Buffer>> {
  const command = (options.commandFactory ?? createSnapshotCommand)(url);
  const timeoutMs = options.timeoutMs ?? 10_000;

  return new Promise(resolve => {
    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (result: Outcome<Buffer>) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      const timeout = new Error(`Frame grab timed out after ${timeoutMs}ms`);
      try {
        command.kill('SIGKILL');
      } catch (error) {
        finish(failure(new AggregateError([timeout, error], timeout.message)));
        return;
      }
      finish(failure(timeout));
    }, timeoutMs);
    timer.unref?.();

    command.once('error', (error: Error) => finish(failure(error)));

    const stream = new PassThrough();
    stream.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    stream.once('error', error => finish(failure(error)));
    stream.once('end', () => {
      const frame = Buffer.concat(chunks);
      finish(frame.length > 0 ? success(frame) : failure(new Error('Frame grab produced no data')));
    });

    try {
      command.pipe(stream, { end: true });
    } catch (error) {
      finish(failure(error));
    }
  });
}
