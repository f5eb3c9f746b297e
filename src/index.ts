export {
  bootstrap,
  collectHealthChecks,
  createPatrolRuntime,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks,
  type BootstrapOptions,
  type PatrolRuntime,
  type PatrolRuntimeOptions
} from './app.js';
export { InspectionAnalyzer, normalizeInspection, normalizeText } from './ai/analyzer.js';
export type { InspectionOutcome, TextOutcome } from './ai/analyzer.js';
export type { VlmClient, VlmResponse } from './ai/types.js';
export { ConfigManager, loadConfigFromFile, parseConfig, staticConfigSource, validateConfig } from './config/index.js';
export type { ConfigSource, PatrolConfig } from './config/index.js';
export { PatrolDatabase, openDatabase } from './db.js';
export { AlertServiceClient, deriveWebsocketUrl } from './live/alertService.js';
export type { AlertServiceApi } from './live/alertService.js';
export { LiveAlertMonitor } from './live/monitor.js';
export type { LiveMonitorStartConfig, LiveStreamConfig } from './live/monitor.js';
export { LiveMonitorRehearsal } from './live/rehearsal.js';
export type { RehearsalStatus } from './live/rehearsal.js';
export { default as logger, getLogLevel, setLogLevel, onLogLevelChange } from './logger.js';
export { default as metrics, MetricsRegistry } from './metrics/index.js';
export { TelegramNotifier, createTelegramNotifier } from './notify/telegram.js';
export type { Notifier } from './notify/telegram.js';
export { InspectionQueue, QueueClosedError } from './patrol/inspectionQueue.js';
export { PatrolOrchestrator } from './patrol/orchestrator.js';
export type { MissionRecorder, PatrolPhase, PatrolStatus, ReportRenderer } from './patrol/orchestrator.js';
export { loadPatrolPoints } from './patrol/points.js';
export { ScheduleStore } from './patrol/scheduleStore.js';
export { PatrolScheduler } from './patrol/scheduler.js';
export { InspectionWorker } from './patrol/worker.js';
export { RelayManager, waitForStream } from './relay/manager.js';
export type { RelayStatus } from './relay/manager.js';
export type { MoveResult, RobotClient, RobotLocation } from './robot/types.js';
export { robotFrameSource } from './robot/types.js';
export type * from './types.js';
export { EMPTY_USAGE } from './types.js';
export { BackgroundLoop } from './utils/loop.js';
export { CancellationToken } from './utils/cancellation.js';
export type { Outcome } from './utils/outcome.js';
export { VideoRecorder } from './video/recorder.js';
export { grabFrame } from './video/snapshot.js';
