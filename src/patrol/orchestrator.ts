import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { InspectionAnalyzer } from '../ai/analyzer.js';
import type { ConfigSource, PatrolConfig, PatrolSettings, TelegramConfig, VideoRecordingConfig } from '../config/index.js';
import type { PatrolDatabase } from '../db.js';
import type { LiveAlertMonitor, LiveStreamConfig } from '../live/monitor.js';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { createTelegramNotifier, type Notifier } from '../notify/telegram.js';
import type { RelayManager } from '../relay/manager.js';
import { robotFrameSource, type RobotClient } from '../robot/types.js';
import {
  EMPTY_USAGE,
  type FrameSource,
  type InspectionSummary,
  type LiveAlertRecord,
  type PatrolPoint,
  type RunStatus
} from '../types.js';
import { delay, waitWithTimeout } from '../utils/async.js';
import { CancellationToken } from '../utils/cancellation.js';
import { ensureDirectory } from '../utils/files.js';
import { attempt, attemptValue, toError } from '../utils/outcome.js';
import { formatFileTimestamp, formatTimestamp } from '../utils/time.js';
import { VideoRecorder } from '../video/recorder.js';
import {
  errorOutcome,
  processingImageName,
  runInspection,
  saveInspection,
  type InspectionContext,
  type InspectionSite,
  type InspectionTask
} from './inspection.js';
import type { InspectionQueue } from './inspectionQueue.js';
import { loadPatrolPoints } from './points.js';
import { buildReportPrompt, buildTelegramPrompt, reportFilename, TELEGRAM_FALLBACK } from './report.js';

export type PatrolPhase =
  | 'idle'
  | 'starting'
  | 'moving'
  | 'inspecting'
  | 'returning-home'
  | 'processing-images'
  | 'analyzing-video'
  | 'generating-report'
  | 'finished'
  | 'stopping'
  | 'error';

export type PatrolStatus = {
  isPatrolling: boolean;
  status: string;
  phase: PatrolPhase;
  currentIndex: number;
};

export type StartResult = { ok: boolean; message: string };

export interface ReportRenderer {
  render(runId: number): Promise<Buffer>;
}

export interface MissionRecorder {
  readonly outputPath: string;
  start(): boolean;
  stop(): Promise<boolean>;
}

export type RecorderFactory = (
  outputPath: string,
  frameSource: FrameSource,
  settings: VideoRecordingConfig
) => MissionRecorder;

export type PatrolOrchestratorOptions = {
  config: ConfigSource;
  db: PatrolDatabase;
  robot: RobotClient;
  analyzer: InspectionAnalyzer;
  queue: InspectionQueue<InspectionTask>;
  relays?: Pick<RelayManager, 'startRobotCameraRelay' | 'startExternalRtspRelay' | 'stopAll'>;
  liveMonitor?: Pick<LiveAlertMonitor, 'start' | 'stop' | 'getAlerts'>;
  createNotifier?: (config: TelegramConfig) => Notifier | null;
  createRecorder?: RecorderFactory;
  reportRenderer?: ReportRenderer;
  loadPoints?: (filePath: string) => PatrolPoint[];
  logger?: Logger;
  metrics?: MetricsRegistry;
};

type MissionSubsystems = {
  recorder: MissionRecorder | null;
  liveMonitorActive: boolean;
};

const defaultRecorderFactory: RecorderFactory = (outputPath, frameSource, settings) =>
  new VideoRecorder({
    outputPath,
    frameSource,
    framesPerSecond: settings.framesPerSecond,
    width: settings.width,
    height: settings.height,
    stopTimeoutMs: settings.stopTimeoutMs
  });

export class PatrolOrchestrator {
  private readonly options: PatrolOrchestratorOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly robot: RobotClient;
  private readonly db: PatrolDatabase;
  private readonly analyzer: InspectionAnalyzer;
  private readonly queue: InspectionQueue<InspectionTask>;
  private active = false;
  private starting = false;
  private status = 'Idle';
  private phase: PatrolPhase = 'idle';
  private currentIndex = -1;
  private currentRunId: number | null = null;
  private token: CancellationToken | null = null;
  private missionTask: Promise<void> | null = null;

  constructor(options: PatrolOrchestratorOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.robot = options.robot;
    this.db = options.db;
    this.analyzer = options.analyzer;
    this.queue = options.queue;
  }

  getStatus(): PatrolStatus {
    return {
      isPatrolling: this.active,
      status: this.status,
      phase: this.phase,
      currentIndex: this.currentIndex
    };
  }

  isPatrolling() {
    return this.active;
  }

  getCurrentRunId() {
    return this.currentRunId;
  }

  whenIdle(): Promise<void> {
    return this.missionTask ?? Promise.resolve();
  }

  async startPatrol(): Promise<StartResult> {
    if (this.active || this.starting) {
      this.metrics.recordPatrolRejected();
      return { ok: false, message: 'Already patrolling' };
    }

    this.starting = true;
    try {
      const previous = this.missionTask;
      if (previous) {
        const settled = await waitWithTimeout(previous, this.options.config.getConfig().patrol.staleJoinTimeoutMs);
        if (!settled) {
          this.logger.warn('Previous patrol mission still running after join timeout');
        }
      }
      if (this.active) {
        this.metrics.recordPatrolRejected();
        return { ok: false, message: 'Already patrolling' };
      }

      this.active = true;
      this.currentIndex = -1;
      this.currentRunId = null;
      const token = new CancellationToken();
      this.token = token;
      this.metrics.recordPatrolStart();
      this.logger.info('Starting patrol');

      const task = this.runMission(token).finally(() => {
        if (this.missionTask === task) {
          this.missionTask = null;
        }
      });
      this.missionTask = task;
      return { ok: true, message: 'Started' };
    } finally {
      this.starting = false;
    }
  }

  async stopPatrol(): Promise<boolean> {
    const wasPatrolling = this.active;
    this.token?.cancel();

    if (wasPatrolling) {
      this.setStatus('Stopping...', 'stopping');
      this.logger.info('Stop patrol requested');
      const cancelled = await attempt(() => this.robot.cancelCommand());
      if (!cancelled.ok) {
        this.logger.error({ err: cancelled.error }, 'Failed to cancel robot command');
      }
      const home = await attempt(() => this.robot.returnHome());
      if (!home.ok) {
        this.logger.error({ err: home.error }, 'Failed to send robot home');
      }
    }
    return true;
  }

  private setStatus(status: string, phase: PatrolPhase) {
    this.status = status;
    this.phase = phase;
  }

  private async runMission(token: CancellationToken) {
    try {
      await this.executeMission(this.options.config.getConfig(), token);
    } catch (error) {
      const message = toError(error).message;
      const status: RunStatus = `Error: ${message}`;
      this.logger.error({ err: error, runId: this.currentRunId }, 'Patrol mission failed');
      this.setStatus(status, 'error');
      this.metrics.recordPatrolFinished(status);
      const runId = this.currentRunId;
      if (runId !== null) {
        this.finalizeRun(runId, { status, endTime: formatTimestamp(this.options.config.getConfig().app.timezone) });
        this.updateTokenTotals(runId);
      }
    } finally {
      this.active = false;
      this.currentRunId = null;
      this.currentIndex = -1;
    }
  }

  private async executeMission(config: PatrolConfig, token: CancellationToken) {
    const timezone = config.app.timezone;
    this.setStatus('Starting...', 'starting');
    const points = (this.options.loadPoints ?? loadPatrolPoints)(config.paths.pointsFile);

    if (!this.analyzer.isConfigured()) {
      this.logger.error('Patrol started but the AI model is not configured');
      this.setStatus('Error: AI Not Configured', 'error');
      this.metrics.recordPatrolFinished('Error: AI Not Configured');
      return;
    }

    const enabled = points.filter(point => point.enabled);
    if (enabled.length === 0) {
      this.logger.warn('Patrol started with no enabled points');
      this.setStatus('No enabled points', 'idle');
      return;
    }

    const serial = await attempt(() => this.robot.getSerial());
    let runId: number;
    try {
      runId = this.db.createRun({
        startTime: formatTimestamp(timezone),
        robotSerial: serial.ok ? serial.value : null,
        robotId: config.app.robotId,
        modelId: this.analyzer.modelName()
      });
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to create patrol run');
      this.setStatus('Error: Database Error', 'error');
      this.metrics.recordPatrolFinished('Error: Database Error');
      return;
    }
    this.currentRunId = runId;
    this.logger.info({ runId, points: enabled.length }, 'Patrol run started');

    const site: InspectionSite = {
      imagesDir: config.paths.imagesDir,
      robotId: config.app.robotId,
      timezone
    };
    const runDir = path.join(config.paths.imagesDir, `${runId}_${formatFileTimestamp(timezone)}`);
    ensureDirectory(runDir);

    const notifier = (this.options.createNotifier ?? createTelegramNotifier)(config.telegram);
    const frameSource = robotFrameSource(this.robot);
    const results: InspectionSummary[] = [];
    const context: InspectionContext = {
      db: this.db,
      analyzer: this.analyzer,
      logger: this.logger,
      metrics: this.metrics
    };

    let subsystems: MissionSubsystems = { recorder: null, liveMonitorActive: false };
    let recordingFinished = false;
    try {
      subsystems = await this.startSubsystems(config, runId, frameSource, notifier, token);

      for (const [index, point] of enabled.entries()) {
        if (token.isCancelled) {
          break;
        }
        this.currentIndex = index;
        this.setStatus(`Moving to ${point.name}...`, 'moving');
        this.logger.info({ runId, point: point.name, index: index + 1, total: enabled.length }, 'Moving to point');

        const moveStatus = await this.moveWithRetries(point, config.patrol, token);
        if (moveStatus !== 'Success') {
          this.metrics.recordMoveFailure();
          this.logger.warn({ runId, point: point.name, moveStatus }, 'Move failed');
          saveInspection(context, {
            runId,
            site,
            point,
            prompt: '',
            outcome: errorOutcome(moveStatus, 'Move Failed'),
            imagePath: '',
            movingStatus: moveStatus
          });
          await delay(config.patrol.moveFailureDelayMs, token);
          continue;
        }

        if (token.isCancelled) {
          break;
        }

        this.setStatus(`Inspecting ${point.name}...`, 'inspecting');
        await delay(config.patrol.settleDelayMs);
        await this.inspectPoint({ config, runId, site, runDir, point, results, context });
      }
    } finally {
      recordingFinished = await this.stopSubsystems(subsystems);
    }

    const completed = !token.isCancelled;
    if (!completed) {
      this.finalizeRun(runId, { status: 'Patrol Stopped', endTime: formatTimestamp(timezone) });
      this.updateTokenTotals(runId);
      this.setStatus('Patrol Stopped', 'idle');
      this.metrics.recordPatrolFinished('Patrol Stopped');
      this.logger.info({ runId }, 'Patrol run stopped');
      return;
    }

    this.setStatus('Returning Home...', 'returning-home');
    const home = await attempt(() => this.robot.returnHome());
    if (!home.ok) {
      this.logger.error({ err: home.error }, 'Return home failed');
    }

    if (config.patrol.turboMode) {
      this.setStatus('Processing Images...', 'processing-images');
      await this.queue.join();
    }

    await delay(config.patrol.returnHomeSettleMs);

    let videoPath: string | null = null;
    let videoAnalysis: string | null = null;
    if (subsystems.recorder && recordingFinished) {
      videoPath = subsystems.recorder.outputPath;
      this.setStatus('Analyzing Video...', 'analyzing-video');
      videoAnalysis = await this.analyzeVideo(runId, videoPath, config);
    }

    this.finalizeRun(runId, { status: 'Completed', endTime: formatTimestamp(timezone), videoPath, videoAnalysis });

    this.setStatus('Generating Report...', 'generating-report');
    const liveAlerts = subsystems.liveMonitorActive && this.options.liveMonitor ? this.options.liveMonitor.getAlerts() : [];
    await this.generateReport({ config, runId, results, videoAnalysis, liveAlerts, notifier });

    this.updateTokenTotals(runId);
    this.setStatus('Finished', 'finished');
    this.metrics.recordPatrolFinished('Completed');
    this.logger.info({ runId, results: results.length }, 'Patrol run finished');
  }

  private async startSubsystems(
    config: PatrolConfig,
    runId: number,
    frameSource: FrameSource,
    notifier: Notifier | null,
    token: CancellationToken
  ): Promise<MissionSubsystems> {
    const subsystems: MissionSubsystems = { recorder: null, liveMonitorActive: false };

    if (config.video.enabled) {
      const outputPath = path.join(config.paths.videoDir, `${runId}_${formatFileTimestamp(config.app.timezone)}.mp4`);
      const recorder = (this.options.createRecorder ?? defaultRecorderFactory)(outputPath, frameSource, config.video);
      const started = await attemptValue(() => recorder.start());
      if (started.ok && started.value) {
        subsystems.recorder = recorder;
      } else {
        this.logger.error({ err: started.ok ? undefined : started.error, outputPath }, 'Failed to start video recording');
      }
    }

    const relays = this.options.relays;
    const liveMonitor = this.options.liveMonitor;
    const live = config.liveMonitor;
    if (!live.enabled || !live.serviceUrl || !relays || !liveMonitor) {
      return subsystems;
    }

    const streams: LiveStreamConfig[] = [];
    if (config.relay.robotCamera) {
      try {
        const streamPath = relays.startRobotCameraRelay(config.app.robotId, frameSource, config.relay.mediaServerInternal);
        streams.push({
          url: `rtsp://${config.relay.mediaServerExternal}${streamPath}`,
          name: `${config.app.robotName || config.app.robotId} Camera`,
          type: 'robot_camera',
          frameSource
        });
      } catch (error) {
        this.logger.error({ err: error }, 'Failed to start robot camera relay');
      }
    }
    if (config.relay.externalRtsp && config.relay.externalRtspUrl) {
      try {
        const streamPath = relays.startExternalRtspRelay(
          config.app.robotId,
          config.relay.externalRtspUrl,
          config.relay.mediaServerInternal
        );
        streams.push({
          url: `rtsp://${config.relay.mediaServerExternal}${streamPath}`,
          name: 'External Camera',
          type: 'external_rtsp'
        });
      } catch (error) {
        this.logger.error({ err: error }, 'Failed to start external RTSP relay');
      }
    }

    if (streams.length === 0) {
      return subsystems;
    }
    await delay(config.patrol.streamWarmupMs, token);

    if (!live.rules.some(rule => rule.trim().length > 0)) {
      this.logger.warn({ runId }, 'Live monitor enabled without rules');
      return subsystems;
    }

    const started = await attemptValue(() =>
      liveMonitor.start(runId, {
        serviceUrl: live.serviceUrl,
        websocketUrl: live.websocketUrl || undefined,
        streams,
        rules: live.rules,
        notifier
      })
    );
    if (!started.ok) {
      this.logger.error({ err: started.error }, 'Failed to start live monitor');
    }
    subsystems.liveMonitorActive = started.ok && started.value;
    return subsystems;
  }

  private async stopSubsystems(subsystems: MissionSubsystems): Promise<boolean> {
    if (subsystems.liveMonitorActive && this.options.liveMonitor) {
      const liveMonitor = this.options.liveMonitor;
      const stopped = await attemptValue(() => liveMonitor.stop());
      if (!stopped.ok) {
        this.logger.error({ err: stopped.error }, 'Error stopping live monitor');
      }
    }

    if (this.options.relays) {
      const relays = this.options.relays;
      const stopped = await attemptValue(() => relays.stopAll());
      if (!stopped.ok) {
        this.logger.error({ err: stopped.error }, 'Error stopping relays');
      }
    }

    const recorder = subsystems.recorder;
    if (!recorder) {
      return false;
    }
    const stopped = await attemptValue(() => recorder.stop());
    if (!stopped.ok) {
      this.logger.error({ err: stopped.error }, 'Error stopping video recorder');
      return false;
    }
    return stopped.value;
  }

  private async moveTo(point: PatrolPoint): Promise<string> {
    if (!this.robot.isConnected()) {
      return 'Error: Disconnected';
    }
    const result = await attempt(() => this.robot.moveTo({ x: point.x, y: point.y, theta: point.theta }, { wait: true }));
    if (!result.ok) {
      return `Error: ${result.error.message}`;
    }
    return result.value.success ? 'Success' : `Error: ${result.value.errorCode ?? 'Unknown'}`;
  }

  private async moveWithRetries(point: PatrolPoint, settings: PatrolSettings, token: CancellationToken) {
    let status = await this.moveTo(point);
    for (let retry = 1; status !== 'Success' && retry <= settings.moveRetries; retry += 1) {
      if (token.isCancelled) {
        break;
      }
      this.logger.warn({ point: point.name, status, retry }, 'Retrying move');
      await delay(settings.moveRetryDelayMs, token);
      if (token.isCancelled) {
        break;
      }
      status = await this.moveTo(point);
    }
    return status;
  }

  private async inspectPoint(input: {
    config: PatrolConfig;
    runId: number;
    site: InspectionSite;
    runDir: string;
    point: PatrolPoint;
    results: InspectionSummary[];
    context: InspectionContext;
  }) {
    const { config, runId, site, runDir, point, results, context } = input;
    const userPrompt = point.prompt ?? config.patrol.defaultPointPrompt;
    const captureFailed = (reason: string) => {
      this.metrics.recordInspection('error');
      this.logger.error({ runId, point: point.name, reason }, 'Image capture failed');
      saveInspection(context, {
        runId,
        site,
        point,
        prompt: userPrompt,
        outcome: errorOutcome(`Capture failed: ${reason}`, 'Capture Failed'),
        imagePath: '',
        movingStatus: 'Success'
      });
    };

    const frame = await attempt(() => this.robot.captureFrontFrame());
    if (!frame.ok) {
      captureFailed(frame.error.message);
      return;
    }
    if (!frame.value || frame.value.length === 0) {
      captureFailed('no image returned');
      return;
    }

    const imageId = randomUUID();
    const imagePath = path.join(runDir, processingImageName(point.name, imageId));
    try {
      fs.writeFileSync(imagePath, frame.value);
    } catch (error) {
      captureFailed(toError(error).message);
      return;
    }

    const task: InspectionTask = {
      runId,
      site,
      point,
      imagePath,
      imageId,
      userPrompt,
      systemPrompt: config.patrol.systemPrompt,
      results
    };

    if (config.patrol.turboMode) {
      this.logger.info({ runId, point: point.name }, 'Queuing inspection');
      this.queue.put(task);
      this.metrics.setQueueDepth(this.queue.pending);
      return;
    }

    this.logger.info({ runId, point: point.name }, 'Analyzing point');
    await runInspection(task, context);
  }

  private async analyzeVideo(runId: number, videoPath: string, config: PatrolConfig): Promise<string> {
    const analysis = await this.analyzer.analyzeVideo(videoPath, config.patrol.videoPrompt || 'Analyze this patrol video.');
    if (!analysis.ok) {
      this.logger.error({ err: analysis.error, videoPath }, 'Video analysis failed');
      return `Analysis Failed: ${analysis.error.message}`;
    }
    try {
      this.db.recordRunTokens(runId, 'video', analysis.value.usage);
    } catch (error) {
      this.logger.error({ err: error, runId }, 'Failed to save video token usage');
    }
    this.metrics.recordTokens('video', analysis.value.usage);
    return analysis.value.text;
  }

  private async generateReport(input: {
    config: PatrolConfig;
    runId: number;
    results: InspectionSummary[];
    videoAnalysis: string | null;
    liveAlerts: LiveAlertRecord[];
    notifier: Notifier | null;
  }) {
    const { config, runId, results, videoAnalysis, liveAlerts, notifier } = input;
    if (results.length === 0) {
      this.logger.info({ runId }, 'No inspection results, skipping report');
      return;
    }

    const prompt = buildReportPrompt({ results, customPrompt: config.patrol.reportPrompt, videoAnalysis, liveAlerts });
    const report = await this.analyzer.generateText(prompt);
    if (!report.ok) {
      this.logger.error({ err: report.error, runId }, 'Report generation failed');
      return;
    }

    try {
      this.db.saveReport(runId, { content: report.value.text, usageJson: report.value.usageJson, usage: report.value.usage });
    } catch (error) {
      this.logger.error({ err: error, runId }, 'Failed to save report');
      return;
    }
    this.metrics.recordTokens('report', report.value.usage);
    this.logger.info({ runId }, 'Report generated and saved');

    if (notifier) {
      await this.sendNotification(config, runId, results, videoAnalysis, notifier);
    }
  }

  private async sendNotification(
    config: PatrolConfig,
    runId: number,
    results: InspectionSummary[],
    videoAnalysis: string | null,
    notifier: Notifier
  ) {
    const prompt = buildTelegramPrompt({ results, customPrompt: config.patrol.telegramMessagePrompt, videoAnalysis });
    const generated = await this.analyzer.generateText(prompt);
    let text = TELEGRAM_FALLBACK;
    let usage = { ...EMPTY_USAGE };
    if (generated.ok) {
      text = generated.value.text;
      usage = generated.value.usage;
    } else {
      this.logger.error({ err: generated.error, runId }, 'Telegram message generation failed');
    }

    try {
      this.db.recordRunTokens(runId, 'telegram', usage);
    } catch (error) {
      this.logger.error({ err: error, runId }, 'Failed to save telegram token usage');
    }
    this.metrics.recordTokens('telegram', usage);

    const sent = await notifier.sendText(text);
    if (!sent.ok) {
      this.logger.error({ err: sent.error, runId }, 'Failed to send patrol notification');
    }

    const renderer = this.options.reportRenderer;
    if (!renderer) {
      return;
    }
    const pdf = await attemptValue(() => renderer.render(runId));
    if (!pdf.ok) {
      this.logger.error({ err: pdf.error, runId }, 'Failed to render patrol report');
      return;
    }
    const run = await attemptValue(() => this.db.getRun(runId));
    const filename = run.ok && run.value ? reportFilename(run.value.startTime) : `Patrol_Report_${runId}.pdf`;
    const document = await notifier.sendDocument(pdf.value, filename);
    if (document.ok) {
      this.logger.info({ runId, filename }, 'Patrol notification sent');
    } else {
      this.logger.error({ err: document.error, runId }, 'Failed to send patrol report document');
    }
  }

  private finalizeRun(
    runId: number,
    update: { status: RunStatus; endTime: string; videoPath?: string | null; videoAnalysis?: string | null }
  ) {
    try {
      this.db.updateRunStatus(runId, update);
    } catch (error) {
      this.logger.error({ err: error, runId, status: update.status }, 'Failed to update patrol run status');
    }
  }

  private updateTokenTotals(runId: number) {
    try {
      this.db.updateRunTokenTotals(runId);
    } catch (error) {
      this.logger.error({ err: error, runId }, 'Failed to update token totals');
    }
  }
}
