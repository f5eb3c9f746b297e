import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { FrameSource } from '../types.js';
import { BackgroundLoop } from '../utils/loop.js';
import { formatTimestamp } from '../utils/time.js';
import { AlertServiceClient, deriveWebsocketUrl, type AlertServiceApi } from './alertService.js';
import { normalizeRules, type LiveMonitorSettings } from './monitor.js';
import { AlertSession, type AlertEvent, type SocketFactory } from './session.js';

export type RehearsalResult = {
  timestamp: string;
  rule: string;
  streamId: string;
  alertId: string | null;
  response: string;
};

export type RehearsalStatus = {
  active: boolean;
  eventCount: number;
  error: string | null;
  results: RehearsalResult[];
};

export type RehearsalStartConfig = {
  serviceUrl: string;
  websocketUrl?: string;
  streamUrl: string;
  rules: string[];
  frameSource?: FrameSource;
};

export type LiveMonitorRehearsalOptions = {
  settings: LiveMonitorSettings;
  timezone: string;
  resultLimit?: number;
  previewIntervalMs?: number;
  clientFactory?: (serviceUrl: string) => AlertServiceApi;
  socketFactory?: SocketFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export class LiveMonitorRehearsal {
  private readonly options: LiveMonitorRehearsalOptions;
  private readonly logger: Logger;
  private readonly resultLimit: number;
  private session: AlertSession<null> | null = null;
  private preview: BackgroundLoop | null = null;
  private previewFrame: Buffer | null = null;
  private results: RehearsalResult[] = [];
  private eventCount = 0;
  private error: string | null = null;
  private leftoverIds: string[] = [];

  constructor(options: LiveMonitorRehearsalOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.resultLimit = options.resultLimit ?? 50;
  }

  async start(config: RehearsalStartConfig): Promise<boolean> {
    if (this.session) {
      return false;
    }

    this.results = [];
    this.eventCount = 0;
    this.error = null;
    this.previewFrame = null;

    const rules = normalizeRules(config.rules, this.options.settings.maxRules);
    if (rules.length === 0) {
      this.error = 'No rules configured';
      return false;
    }

    const client = (
      this.options.clientFactory ??
      ((serviceUrl: string) =>
        new AlertServiceClient({ baseUrl: serviceUrl, timeoutMs: this.options.settings.requestTimeoutMs }))
    )(config.serviceUrl);

    const session = new AlertSession<null>({
      client,
      websocketUrl: config.websocketUrl || deriveWebsocketUrl(config.serviceUrl),
      settings: this.options.settings,
      socketFactory: this.options.socketFactory,
      onEvent: event => this.record(event),
      logger: this.logger,
      metrics: this.options.metrics ?? metricsModule
    });
    this.session = session;

    const stale = this.leftoverIds;
    this.leftoverIds = [];
    await session.cleanupStale(stale, [config.streamUrl]);
    const registered = await session.register([{ url: config.streamUrl, description: 'Rehearsal Stream', meta: null }]);
    if (this.session !== session) {
      this.leftoverIds.push(...session.takeUnreleased());
      return false;
    }
    if (registered.length === 0) {
      this.error = 'Stream registration failed';
      this.session = null;
      await session.close();
      return false;
    }

    await session.pushRules(rules);
    session.openChannel();

    if (config.frameSource) {
      const frameSource = config.frameSource;
      this.preview = new BackgroundLoop({
        name: 'rehearsal-preview',
        intervalMs: this.options.previewIntervalMs ?? 1000,
        logger: this.logger,
        tick: async () => {
          const frame = await frameSource();
          if (frame && frame.length > 0) {
            this.previewFrame = frame;
            this.error = null;
          } else {
            this.error = 'Camera not available';
          }
        }
      });
      this.preview.start();
    }

    this.logger.info({ streamUrl: config.streamUrl, rules: rules.length }, 'Live monitor rehearsal started');
    return true;
  }

  async stop() {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    await this.preview?.stop(this.options.settings.stopTimeoutMs);
    this.preview = null;
    this.leftoverIds.push(...(await session.close()));
    this.logger.info({ events: this.eventCount }, 'Live monitor rehearsal stopped');
  }

  getPreviewFrame(): Buffer | null {
    return this.previewFrame;
  }

  getStatus(): RehearsalStatus {
    return {
      active: this.session !== null,
      eventCount: this.eventCount,
      error: this.session?.hasChannelFailed ? 'Event channel unavailable' : this.error,
      results: [...this.results]
    };
  }

  private record(event: AlertEvent) {
    this.eventCount += 1;
    this.results.push({
      timestamp: formatTimestamp(this.options.timezone),
      rule: event.rule,
      streamId: event.streamId,
      alertId: event.alertId,
      response: event.response
    });
    if (this.results.length > this.resultLimit) {
      this.results.splice(0, this.results.length - this.resultLimit);
    }
  }
}
