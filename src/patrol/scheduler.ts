import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { BackgroundLoop } from '../utils/loop.js';
import { getZonedParts } from '../utils/time.js';
import type { ScheduleStore } from './scheduleStore.js';

export interface PatrolStarter {
  isPatrolling(): boolean;
  startPatrol(): Promise<{ ok: boolean; message: string }>;
}

export type PatrolSchedulerOptions = {
  store: Pick<ScheduleStore, 'list'>;
  patrol: PatrolStarter;
  timezone: () => string;
  pollIntervalMs?: number;
  clock?: () => Date;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export class PatrolScheduler {
  private readonly options: PatrolSchedulerOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly triggered = new Set<string>();
  private readonly loop: BackgroundLoop;

  constructor(options: PatrolSchedulerOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.loop = new BackgroundLoop({
      name: 'patrol-scheduler',
      intervalMs: options.pollIntervalMs ?? 30_000,
      logger: this.logger,
      tick: async () => {
        await this.check();
      }
    });
  }

  start() {
    return this.loop.start();
  }

  stop() {
    return this.loop.stop();
  }

  isRunning() {
    return this.loop.isRunning();
  }

  async check(): Promise<string[]> {
    const parts = getZonedParts(this.options.timezone(), this.options.clock?.() ?? new Date());
    const currentTime = `${parts.hour}:${parts.minute}`;
    const currentDate = `${parts.year}-${parts.month}-${parts.day}`;
    const started: string[] = [];

    for (const entry of this.options.store.list()) {
      if (!entry.enabled || !entry.days.includes(parts.weekday) || entry.time !== currentTime) {
        continue;
      }
      const key = `${entry.id}_${currentDate}`;
      if (this.triggered.has(key)) {
        continue;
      }
      if (this.options.patrol.isPatrolling()) {
        this.metrics.recordScheduleTrigger(true);
        this.logger.info({ id: entry.id, time: entry.time }, 'Scheduled patrol skipped, already patrolling');
        continue;
      }

      this.triggered.add(key);
      this.metrics.recordScheduleTrigger(false);
      this.logger.info({ id: entry.id, time: entry.time }, 'Scheduled patrol triggered');
      const result = await this.options.patrol.startPatrol();
      if (result.ok) {
        started.push(entry.id);
      } else {
        this.logger.warn({ id: entry.id, message: result.message }, 'Scheduled patrol did not start');
      }
    }

    for (const key of [...this.triggered]) {
      if (!key.endsWith(`_${currentDate}`)) {
        this.triggered.delete(key);
      }
    }
    return started;
  }
}
