import fs from 'node:fs';
import path from 'node:path';
import type { LiveMonitorConfig } from '../config/index.js';
import type { PatrolDatabase } from '../db.js';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { Notifier } from '../notify/telegram.js';
import type { FrameSource, LiveAlertRecord, StreamType } from '../types.js';
import { waitWithTimeout } from '../utils/async.js';
import { toPosixRelative } from '../utils/files.js';
import type { Outcome } from '../utils/outcome.js';
import { formatTimestamp } from '../utils/time.js';
import { grabFrame } from '../video/snapshot.js';
import { AlertServiceClient, deriveWebsocketUrl, type AlertServiceApi } from './alertService.js';
import { AlertCooldown } from './cooldown.js';
import { AlertSession, type AlertEvent, type SessionSettings, type SocketFactory } from './session.js';

export type LiveStreamConfig = {
  url: string;
  name: string;
  type: StreamType;
  frameSource?: FrameSource;
};

export type LiveMonitorStartConfig = {
  serviceUrl: string;
  websocketUrl?: string;
  streams: LiveStreamConfig[];
  rules: string[];
  notifier?: Notifier | null;
};

export type LiveMonitorSettings = SessionSettings &
  Pick<LiveMonitorConfig, 'cooldownMs' | 'maxRules' | 'requestTimeoutMs'>;

export type LiveAlertMonitorOptions = {
  db: PatrolDatabase;
  settings: LiveMonitorSettings;
  dataDir: string;
  liveAlertsDir: string;
  robotId: string;
  timezone: string;
  clientFactory?: (serviceUrl: string) => AlertServiceApi;
  socketFactory?: SocketFactory;
  grabFrame?: (url: string) => Promise<Outcome<Buffer>>;
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export function normalizeRules(rules: string[], maxRules: number): string[] {
  return rules
    .map(rule => rule.trim())
    .filter(rule => rule.length > 0)
    .slice(0, Math.max(0, maxRules));
}

export function evidenceFilename(runId: number, epochSeconds: number, rule: string) {
  return `${runId}_${epochSeconds}_${rule.slice(0, 40).replace(/[/\\ ]/g, '_')}.jpg`;
}

export function alertCaption(rule: string, robotId: string, timestamp: string) {
  return `⚠️ Live Monitor Alert\n\nRule: ${rule}\nRobot: ${robotId}\nTime: ${timestamp}`;
}

export class LiveAlertMonitor {
  private readonly options: LiveAlertMonitorOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private session: AlertSession<LiveStreamConfig> | null = null;
  private cooldown: AlertCooldown;
  private runId: number | null = null;
  private notifier: Notifier | null = null;
  private alerts: LiveAlertRecord[] = [];
  private readonly pending = new Set<Promise<void>>();
  private leftoverIds: string[] = [];

  constructor(options: LiveAlertMonitorOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.now = options.now ?? Date.now;
    this.cooldown = new AlertCooldown(options.settings.cooldownMs, this.now);
  }

  isActive() {
    return this.session !== null;
  }

  getAlerts(): LiveAlertRecord[] {
    return [...this.alerts];
  }

  async start(runId: number, config: LiveMonitorStartConfig): Promise<boolean> {
    if (this.session) {
      this.logger.warn({ runId }, 'Live monitor already active');
      return false;
    }

    const rules = normalizeRules(config.rules, this.options.settings.maxRules);
    if (rules.length === 0 || config.streams.length === 0) {
      this.logger.warn({ runId, streams: config.streams.length, rules: rules.length }, 'Live monitor has nothing to watch');
      return false;
    }

    this.runId = runId;
    this.notifier = config.notifier ?? null;
    this.alerts = [];
    this.cooldown = new AlertCooldown(this.options.settings.cooldownMs, this.now);

    const client = (this.options.clientFactory ?? this.defaultClient())(config.serviceUrl);
    const session = new AlertSession<LiveStreamConfig>({
      client,
      websocketUrl: config.websocketUrl || deriveWebsocketUrl(config.serviceUrl),
      settings: this.options.settings,
      socketFactory: this.options.socketFactory,
      onEvent: event => this.track(this.handleEvent(event)),
      logger: this.logger,
      metrics: this.metrics
    });
    this.session = session;

    const urls = config.streams.map(stream => stream.url);
    const stale = this.leftoverIds;
    this.leftoverIds = [];
    await session.cleanupStale(stale, urls);

    const registered = await session.register(
      config.streams.map(stream => ({ url: stream.url, description: stream.name, meta: stream }))
    );
    if (this.session !== session) {
      this.leftoverIds.push(...session.takeUnreleased());
      return false;
    }
    if (registered.length === 0) {
      this.logger.error({ runId }, 'No live streams registered, live monitor aborted');
      this.session = null;
      await session.close();
      return false;
    }

    await session.pushRules(rules);
    session.openChannel();
    this.logger.info({ runId, streams: registered.length, rules: rules.length }, 'Live monitor started');
    return true;
  }

  async stop() {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    const failed = await session.close();
    this.leftoverIds.push(...failed);

    const drained = await waitWithTimeout(Promise.allSettled([...this.pending]), this.options.settings.stopTimeoutMs);
    if (!drained) {
      this.logger.warn({ pending: this.pending.size }, 'Live alert handlers still running after stop');
    }
    this.logger.info({ runId: this.runId, alerts: this.alerts.length }, 'Live monitor stopped');
  }

  async whenSettled() {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  private defaultClient() {
    return (serviceUrl: string): AlertServiceApi =>
      new AlertServiceClient({ baseUrl: serviceUrl, timeoutMs: this.options.settings.requestTimeoutMs });
  }

  private track(task: Promise<void>) {
    this.pending.add(task);
    task.finally(() => this.pending.delete(task)).catch(error => {
      this.logger.error({ err: error }, 'Live alert handler failed');
    });
  }

  private async handleEvent(event: AlertEvent) {
    const session = this.session;
    const runId = this.runId;
    if (!session || runId === null) {
      return;
    }
    const registration = session.findRegistration(event.streamId);
    if (!registration) {
      this.logger.debug({ streamId: event.streamId }, 'Ignoring alert for unknown stream');
      return;
    }

    if (this.cooldown.shouldSuppress(AlertCooldown.key(event.streamId, event.rule))) {
      this.metrics.recordSuppressedAlert();
      this.logger.debug({ rule: event.rule, streamId: event.streamId }, 'Live alert suppressed by cooldown');
      return;
    }

    const stream = registration.stream.meta;
    const nowMs = this.now();
    const timestamp = formatTimestamp(this.options.timezone, new Date(nowMs));
    const frame = await this.captureEvidence(stream);
    const imagePath = frame ? this.saveEvidence(runId, nowMs, event.rule, frame) : '';

    const alert: LiveAlertRecord = {
      runId,
      rule: event.rule,
      response: event.response,
      imagePath,
      timestamp,
      streamSource: stream.name,
      streamId: event.streamId,
      robotId: this.options.robotId
    };

    try {
      alert.id = this.options.db.insertLiveAlert(alert);
    } catch (error) {
      this.logger.error({ err: error, rule: event.rule }, 'Failed to save live alert');
    }
    this.alerts.push(alert);
    this.metrics.recordLiveAlert(event.rule);
    this.logger.warn({ rule: event.rule, streamId: event.streamId, alertId: event.alertId }, 'Live alert triggered');

    if (this.notifier && frame && imagePath) {
      const sent = await this.notifier.sendPhoto(
        frame,
        alertCaption(event.rule, this.options.robotId, timestamp),
        `alert_${Math.floor(nowMs / 1000)}.jpg`
      );
      if (!sent.ok) {
        this.logger.error({ err: sent.error, rule: event.rule }, 'Failed to send live alert notification');
      }
    }
  }

  private async captureEvidence(stream: LiveStreamConfig): Promise<Buffer | null> {
    if (stream.type === 'robot_camera' && stream.frameSource) {
      const frame = await stream.frameSource();
      return frame && frame.length > 0 ? frame : null;
    }
    const grabbed = await (this.options.grabFrame ?? grabFrame)(stream.url);
    if (!grabbed.ok) {
      this.logger.warn({ err: grabbed.error, url: stream.url }, 'Failed to capture live alert evidence');
      return null;
    }
    return grabbed.value;
  }

  private saveEvidence(runId: number, nowMs: number, rule: string, frame: Buffer): string {
    const file = path.join(this.options.liveAlertsDir, evidenceFilename(runId, Math.floor(nowMs / 1000), rule));
    try {
      fs.mkdirSync(this.options.liveAlertsDir, { recursive: true });
      fs.writeFileSync(file, frame);
      return toPosixRelative(this.options.dataDir, file);
    } catch (error) {
      this.logger.error({ err: error, file }, 'Failed to save live alert evidence');
      return '';
    }
  }
}
