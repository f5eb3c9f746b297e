import ffmpeg from 'fluent-ffmpeg';
import { InspectionAnalyzer } from './ai/analyzer.js';
import type { VlmClient } from './ai/types.js';
import { ConfigManager, type ConfigSource, type TelegramConfig } from './config/index.js';
import { openDatabase, type PatrolDatabase } from './db.js';
import { LiveAlertMonitor } from './live/monitor.js';
import { LiveMonitorRehearsal } from './live/rehearsal.js';
import type { AlertServiceApi } from './live/alertService.js';
import type { SocketFactory } from './live/session.js';
import loggerModule, { type Logger } from './logger.js';
import metricsModule, { type MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
import type { Notifier } from './notify/telegram.js';
import type { InspectionTask } from './patrol/inspection.js';
import { InspectionQueue } from './patrol/inspectionQueue.js';
import { PatrolOrchestrator, type RecorderFactory, type ReportRenderer } from './patrol/orchestrator.js';
import { ScheduleStore } from './patrol/scheduleStore.js';
import { PatrolScheduler } from './patrol/scheduler.js';
import { InspectionWorker } from './patrol/worker.js';
import { RelayManager, type RelayCommandFactory } from './relay/manager.js';
import type { RobotClient } from './robot/types.js';
import { waitWithTimeout } from './utils/async.js';
import { toError } from './utils/outcome.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext) {
  const results: Array<{ name: string; status: HealthStatus; details?: Record<string, unknown> }> = [];
  const metricsSnapshot = context.metrics ?? metricsModule.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: toError(error).message
        }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: toError(error) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export type PatrolRuntimeOptions = {
  config: ConfigSource;
  robot: RobotClient;
  vlm: VlmClient;
  db?: PatrolDatabase;
  reportRenderer?: ReportRenderer;
  relayCommandFactory?: RelayCommandFactory;
  createRecorder?: RecorderFactory;
  createNotifier?: (config: TelegramConfig) => Notifier | null;
  alertClientFactory?: (serviceUrl: string) => AlertServiceApi;
  socketFactory?: SocketFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type PatrolRuntime = {
  orchestrator: PatrolOrchestrator;
  relays: RelayManager;
  liveMonitor: LiveAlertMonitor;
  rehearsal: LiveMonitorRehearsal;
  schedule: ScheduleStore;
  scheduler: PatrolScheduler;
  db: PatrolDatabase;
  worker: InspectionWorker;
  queue: InspectionQueue<InspectionTask>;
  start(): void;
  stop(): Promise<void>;
};

export function createPatrolRuntime(options: PatrolRuntimeOptions): PatrolRuntime {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;
  const config = options.config.getConfig();

  if (config.ffmpeg?.path) {
    ffmpeg.setFfmpegPath(config.ffmpeg.path);
  }

  const db = options.db ?? openDatabase({ path: config.database.path, busyTimeoutMs: config.database.busyTimeoutMs, logger });
  const analyzer = new InspectionAnalyzer(options.vlm);
  const queue = new InspectionQueue<InspectionTask>();
  const worker = new InspectionWorker({ queue, context: { db, analyzer }, logger, metrics });
  const relays = new RelayManager({
    settings: config.relay,
    commandFactory: options.relayCommandFactory,
    logger,
    metrics
  });
  const liveMonitor = new LiveAlertMonitor({
    db,
    settings: config.liveMonitor,
    dataDir: config.paths.dataDir,
    liveAlertsDir: config.paths.liveAlertsDir,
    robotId: config.app.robotId,
    timezone: config.app.timezone,
    clientFactory: options.alertClientFactory,
    socketFactory: options.socketFactory,
    logger,
    metrics
  });
  const rehearsal = new LiveMonitorRehearsal({
    settings: config.liveMonitor,
    timezone: config.app.timezone,
    resultLimit: config.liveMonitor.testResultLimit,
    previewIntervalMs: config.liveMonitor.previewIntervalMs,
    clientFactory: options.alertClientFactory,
    socketFactory: options.socketFactory,
    logger,
    metrics
  });
  const orchestrator = new PatrolOrchestrator({
    config: options.config,
    db,
    robot: options.robot,
    analyzer,
    queue,
    relays,
    liveMonitor,
    createNotifier: options.createNotifier,
    createRecorder: options.createRecorder,
    reportRenderer: options.reportRenderer,
    logger,
    metrics
  });
  const schedule = new ScheduleStore(config.paths.scheduleFile, logger);
  const scheduler = new PatrolScheduler({
    store: schedule,
    patrol: orchestrator,
    timezone: () => options.config.getConfig().app.timezone,
    pollIntervalMs: config.scheduler.pollIntervalMs,
    logger,
    metrics
  });

  let stopped = false;

  return {
    orchestrator,
    relays,
    liveMonitor,
    rehearsal,
    schedule,
    scheduler,
    db,
    worker,
    queue,
    start() {
      worker.start();
      relays.start();
      scheduler.start();
    },
    async stop() {
      if (stopped) {
        return;
      }
      stopped = true;
      await scheduler.stop();
      await orchestrator.stopPatrol();
      const idle = await waitWithTimeout(orchestrator.whenIdle(), config.patrol.staleJoinTimeoutMs);
      if (!idle) {
        logger.warn('Patrol mission still running at shutdown');
      }
      await rehearsal.stop();
      await relays.shutdown();
      await worker.stop();
      db.close();
      logger.info('Patrol runtime stopped');
    }
  };
}

export type BootstrapOptions = Omit<PatrolRuntimeOptions, 'config'> & {
  configPath?: string;
  watchConfig?: boolean;
};

export function bootstrap(options: BootstrapOptions) {
  const logger = options.logger ?? loggerModule;
  logger.info('Patrol runtime bootstrap starting');

  const manager = new ConfigManager(options.configPath);
  manager.on('error', (error: Error) => {
    logger.error({ err: error, file: manager.getPath() }, 'Configuration reload failed, previous file restored');
  });
  manager.on('reload', () => {
    logger.info({ file: manager.getPath() }, 'Configuration reloaded');
  });
  const unwatch = options.watchConfig ? manager.watch() : () => {};

  const runtime = createPatrolRuntime({ ...options, config: manager });
  runtime.start();

  registerHealthIndicator('patrol', () => {
    const status = runtime.orchestrator.getStatus();
    const relays = runtime.relays.getStatus();
    const abandoned = Object.values(relays).some(relay => relay.abandoned);
    return {
      status: abandoned ? 'degraded' : 'ok',
      details: { patrol: status, relays, liveMonitorActive: runtime.liveMonitor.isActive() }
    };
  });
  registerShutdownHook('patrol-runtime', async context => {
    logger.info({ reason: context.reason, signal: context.signal }, 'Shutting down patrol runtime');
    unwatch();
    await runtime.stop();
  });

  logger.info('Bootstrap completed');
  return runtime;
}
