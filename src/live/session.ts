import WebSocket from 'ws';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { delay, waitWithTimeout } from '../utils/async.js';
import { CancellationToken } from '../utils/cancellation.js';
import type { AlertServiceApi } from './alertService.js';

export type AlertEvent = {
  rule: string;
  streamId: string;
  alertId: string | null;
  response: string;
};

export type SessionSettings = {
  registerAttempts: number;
  registerBackoffMs: number;
  reconnectDelayMs: number;
  maxReconnectAttempts: number;
  stopTimeoutMs: number;
};

export type SocketFactory = (url: string) => WebSocket;

export type SessionStream<T> = {
  url: string;
  description: string;
  meta: T;
};

export type Registration<T> = {
  streamId: string;
  stream: SessionStream<T>;
};

export type AlertSessionOptions = {
  client: AlertServiceApi;
  websocketUrl: string;
  settings: SessionSettings;
  onEvent: (event: AlertEvent) => void;
  socketFactory?: SocketFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

function decodeMessage(data: unknown): string | null {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data) && data.every(chunk => Buffer.isBuffer(chunk))) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return null;
}

function readText(value: object, ...keys: string[]): string | null {
  for (const key of keys) {
    const field = Reflect.get(value, key);
    if (typeof field === 'string' && field.trim()) {
      return field;
    }
    if (typeof field === 'number') {
      return String(field);
    }
  }
  return null;
}

export function parseAlertEvents(raw: string): AlertEvent[] {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return [];
  }
  const entries: unknown[] = Array.isArray(payload) ? payload : [payload];
  const events: AlertEvent[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) {
      continue;
    }
    const rule = readText(entry, 'rule', 'rule_string');
    const streamId = readText(entry, 'stream_id');
    if (!rule || !streamId) {
      continue;
    }
    events.push({
      rule,
      streamId,
      alertId: readText(entry, 'alert_id', 'id'),
      response: readText(entry, 'response', 'alert_str') ?? 'Triggered'
    });
  }
  return events;
}

export class AlertSession<T> {
  private readonly client: AlertServiceApi;
  private readonly options: AlertSessionOptions;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly socketFactory: SocketFactory;
  private readonly token = new CancellationToken();
  private readonly registrations: Registration<T>[] = [];
  private readonly unreleased: string[] = [];
  private socket: WebSocket | null = null;
  private socketClosed: Promise<void> = Promise.resolve();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private channelFailed = false;

  constructor(options: AlertSessionOptions) {
    this.options = options;
    this.client = options.client;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.socketFactory = options.socketFactory ?? (url => new WebSocket(url));
  }

  get isClosed() {
    return this.token.isCancelled;
  }

  get hasChannelFailed() {
    return this.channelFailed;
  }

  getRegistrations(): Registration<T>[] {
    return [...this.registrations];
  }

  findRegistration(streamId: string): Registration<T> | undefined {
    return this.registrations.find(entry => entry.streamId === streamId);
  }

  async cleanupStale(staleIds: string[], urls: string[]): Promise<string[]> {
    const removed: string[] = [];
    const remaining: string[] = [];
    const seen = new Set<string>();

    const remove = async (streamId: string) => {
      seen.add(streamId);
      const result = await this.client.deregisterStream(streamId);
      if (result.ok) {
        removed.push(streamId);
      } else {
        remaining.push(streamId);
        this.logger.warn({ err: result.error, streamId }, 'Failed to remove stale stream registration');
      }
    };

    for (const streamId of staleIds) {
      await remove(streamId);
    }

    const listed = await this.client.listStreams();
    if (!listed.ok) {
      this.logger.warn({ err: listed.error }, 'Failed to list registered streams');
      return removed;
    }
    for (const stream of listed.value) {
      if (!seen.has(stream.id) && stream.liveStreamUrl && urls.includes(stream.liveStreamUrl)) {
        await remove(stream.id);
      }
    }

    if (removed.length > 0) {
      this.logger.info({ removed }, 'Removed stale stream registrations');
    }
    return removed;
  }

  async register(streams: SessionStream<T>[]): Promise<Registration<T>[]> {
    const { registerAttempts, registerBackoffMs } = this.options.settings;
    for (const stream of streams) {
      for (let attempt = 1; attempt <= Math.max(1, registerAttempts); attempt += 1) {
        if (this.token.isCancelled) {
          return this.getRegistrations();
        }
        const result = await this.client.registerStream(stream.url, stream.description);
        if (result.ok && this.token.isCancelled) {
          await this.releaseLateRegistration(result.value);
          return this.getRegistrations();
        }
        if (result.ok) {
          this.registrations.push({ streamId: result.value, stream });
          this.logger.info({ streamId: result.value, url: stream.url }, 'Registered live stream');
          break;
        }
        this.metrics.recordStreamRegistrationFailure();
        this.logger.warn(
          { err: result.error, url: stream.url, attempt, attempts: registerAttempts },
          'Live stream registration failed'
        );
        if (attempt < registerAttempts) {
          await delay(registerBackoffMs * attempt, this.token);
        }
      }
    }
    return this.getRegistrations();
  }

  async pushRules(rules: string[]) {
    for (const registration of this.registrations) {
      const result = await this.client.setRules(registration.streamId, rules);
      if (result.ok) {
        this.logger.info({ streamId: registration.streamId, rules: rules.length }, 'Alert rules applied');
      } else {
        this.logger.warn({ err: result.error, streamId: registration.streamId }, 'Failed to apply alert rules');
      }
    }
  }

  openChannel() {
    if (this.token.isCancelled || this.socket) {
      return;
    }
    this.connect();
  }

  // Returns the stream ids that could not be deregistered.
  async close(): Promise<string[]> {
    this.token.cancel();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const socket = this.socket;
    if (socket) {
      try {
        socket.close();
      } catch (error) {
        this.logger.debug({ err: error }, 'Failed to close alert event channel');
      }
      const closed = await waitWithTimeout(this.socketClosed, this.options.settings.stopTimeoutMs);
      if (!closed) {
        this.logger.warn('Alert event channel did not close in time, terminating');
        socket.terminate();
      }
      this.socket = null;
    }

    const failed: string[] = [];
    for (const registration of this.registrations.splice(0, this.registrations.length)) {
      const result = await this.client.deregisterStream(registration.streamId);
      if (result.ok) {
        this.logger.info({ streamId: registration.streamId }, 'Deregistered live stream');
      } else {
        failed.push(registration.streamId);
        this.logger.warn({ err: result.error, streamId: registration.streamId }, 'Failed to deregister live stream');
      }
    }
    return failed;
  }

  // Stream ids registered after close() whose deregistration also failed.
  takeUnreleased(): string[] {
    return this.unreleased.splice(0, this.unreleased.length);
  }

  private async releaseLateRegistration(streamId: string) {
    const result = await this.client.deregisterStream(streamId);
    if (result.ok) {
      this.logger.info({ streamId }, 'Deregistered stream registered after close');
      return;
    }
    this.unreleased.push(streamId);
    this.logger.warn({ err: result.error, streamId }, 'Failed to deregister live stream');
  }

  private connect() {
    let socket: WebSocket;
    try {
      socket = this.socketFactory(this.options.websocketUrl);
    } catch (error) {
      this.logger.warn({ err: error, url: this.options.websocketUrl }, 'Failed to open alert event channel');
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;
    this.socketClosed = new Promise<void>(resolve => {
      socket.once('close', () => resolve());
    });

    socket.on('open', () => {
      this.reconnectAttempts = 0;
      this.logger.info({ url: this.options.websocketUrl }, 'Alert event channel connected');
    });
    socket.on('message', (data: WebSocket.RawData) => {
      const text = decodeMessage(data);
      if (text === null) {
        return;
      }
      for (const event of parseAlertEvents(text)) {
        this.options.onEvent(event);
      }
    });
    socket.on('error', (error: Error) => {
      this.logger.warn({ err: error, url: this.options.websocketUrl }, 'Alert event channel error');
    });
    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      if (!this.token.isCancelled) {
        this.scheduleReconnect();
      }
    });
  }

  private scheduleReconnect() {
    const { maxReconnectAttempts, reconnectDelayMs } = this.options.settings;
    if (this.reconnectAttempts >= maxReconnectAttempts) {
      this.channelFailed = true;
      this.logger.error(
        { url: this.options.websocketUrl, attempts: this.reconnectAttempts },
        'Alert event channel reconnect attempts exhausted'
      );
      return;
    }
    this.reconnectAttempts += 1;
    this.metrics.recordEventChannelReconnect();
    this.logger.warn(
      { url: this.options.websocketUrl, attempt: this.reconnectAttempts, delayMs: reconnectDelayMs },
      'Alert event channel disconnected, reconnecting'
    );
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.token.isCancelled) {
        this.connect();
      }
    }, reconnectDelayMs);
    this.reconnectTimer.unref?.();
  }
}
