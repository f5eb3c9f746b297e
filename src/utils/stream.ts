import type { Writable } from 'node:stream';

// Writes frames into an ffmpeg stdin pipe and holds off after a short write until 'drain'.
export class FrameWriter {
  private readonly target: Writable;
  private waitingForDrain = false;

  constructor(target: Writable) {
    this.target = target;
  }

  isOpen() {
    return !this.target.destroyed && !this.target.writableEnded;
  }

  isBlocked() {
    return this.waitingForDrain;
  }

  write(frame: Buffer): boolean {
    if (this.waitingForDrain || !this.isOpen()) {
      return false;
    }
    if (!this.target.write(frame)) {
      this.waitingForDrain = true;
      this.target.once('drain', () => {
        this.waitingForDrain = false;
      });
    }
    return true;
  }
}
