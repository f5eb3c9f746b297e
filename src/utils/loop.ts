import loggerModule, { type Logger } from '../logger.js';
import { waitWithTimeout } from './async.js';

// Return false to end the loop from inside a tick.
export type LoopTick = () => Promise<boolean | void> | boolean | void;

export interface BackgroundLoopOptions {
  name: string;
  intervalMs: number;
  tick: LoopTick;
  immediate?: boolean;
  logger?: Logger;
}

export class BackgroundLoop {
  private readonly options: BackgroundLoopOptions;
  private readonly logger: Logger;
  private running = false;
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private done: Promise<void> | null = null;

  constructor(options: BackgroundLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
  }

  get name() {
    return this.options.name;
  }

  start(): boolean {
    if (this.running) {
      return false;
    }
    this.running = true;
    this.stopRequested = false;
    this.done = this.run();
    return true;
  }

  isRunning() {
    return this.running;
  }

  async stop(timeoutMs?: number): Promise<boolean> {
    if (!this.done) {
      return true;
    }
    this.stopRequested = true;
    this.wake?.();
    return this.join(timeoutMs);
  }

  async join(timeoutMs?: number): Promise<boolean> {
    const done = this.done;
    if (!done) {
      return true;
    }
    if (timeoutMs === undefined) {
      await done;
      return true;
    }
    return waitWithTimeout(done, timeoutMs);
  }

  private async run() {
    try {
      if (this.options.immediate === false) {
        await this.sleep(this.options.intervalMs);
      }

      while (!this.stopRequested) {
        const startedAt = Date.now();
        let next: boolean | void = undefined;
        try {
          next = await this.options.tick();
        } catch (error) {
          this.logger.error({ err: error, loop: this.options.name }, 'Background loop tick failed');
        }

        if (next === false || this.stopRequested) {
          break;
        }

        const elapsed = Date.now() - startedAt;
        await this.sleep(Math.max(0, this.options.intervalMs - elapsed));
      }
    } finally {
      this.running = false;
      this.wake = null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      timer.unref?.();
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
