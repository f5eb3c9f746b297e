import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { waitWithTimeout } from '../utils/async.js';
import { toError } from '../utils/outcome.js';
import {
  errorOutcome,
  runInspection,
  saveInspection,
  type InspectionContext,
  type InspectionTask
} from './inspection.js';
import { InspectionQueue, QueueClosedError } from './inspectionQueue.js';

export type InspectionWorkerOptions = {
  queue: InspectionQueue<InspectionTask>;
  context: InspectionContext;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export class InspectionWorker {
  private readonly queue: InspectionQueue<InspectionTask>;
  private readonly context: InspectionContext;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private done: Promise<void> | null = null;

  constructor(options: InspectionWorkerOptions) {
    this.queue = options.queue;
    this.context = options.context;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  start() {
    if (this.done) {
      return false;
    }
    this.done = this.run().finally(() => {
      this.done = null;
    });
    return true;
  }

  isRunning() {
    return this.done !== null;
  }

  async stop(timeoutMs = 10_000): Promise<boolean> {
    const done = this.done;
    this.queue.close();
    if (!done) {
      return true;
    }
    return waitWithTimeout(done, timeoutMs);
  }

  private async run() {
    this.logger.info('Inspection worker started');
    for (;;) {
      let task: InspectionTask;
      try {
        task = await this.queue.get();
      } catch (error) {
        if (error instanceof QueueClosedError) {
          break;
        }
        throw error;
      }

      try {
        this.logger.info({ point: task.point.name, runId: task.runId }, 'Worker processing inspection');
        await runInspection(task, { ...this.context, logger: this.logger, metrics: this.metrics });
      } catch (error) {
        this.logger.error({ err: error, point: task.point.name }, 'Inspection worker task failed');
        this.recordFailure(task, error);
      } finally {
        this.queue.taskDone();
        this.metrics.setQueueDepth(this.queue.pending);
      }
    }
    this.logger.info('Inspection worker stopped');
  }

  private recordFailure(task: InspectionTask, error: unknown) {
    const message = toError(error).message;
    const outcome = errorOutcome(message, `AI Error: ${message}`);
    saveInspection(
      { ...this.context, logger: this.logger, metrics: this.metrics },
      {
        runId: task.runId,
        site: task.site,
        point: task.point,
        prompt: task.userPrompt,
        outcome,
        imagePath: task.imagePath,
        movingStatus: 'Success'
      }
    );
    this.metrics.recordInspection('error');
    task.results.push({ point: task.point.name, result: outcome.resultText });
  }
}
