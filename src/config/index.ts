import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { isValidTimezone } from '../utils/time.js';

export type AppConfig = {
  name: string;
  robotId: string;
  robotName?: string;
  timezone: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
  busyTimeoutMs?: number;
};

export type PathsConfig = {
  dataDir: string;
  imagesDir: string;
  videoDir: string;
  liveAlertsDir: string;
  pointsFile: string;
  scheduleFile: string;
};

export type FfmpegConfig = {
  path?: string;
};

export type PatrolSettings = {
  turboMode: boolean;
  settleDelayMs: number;
  moveFailureDelayMs: number;
  // Extra move attempts after a failed move.
  moveRetries: number;
  moveRetryDelayMs: number;
  returnHomeSettleMs: number;
  staleJoinTimeoutMs: number;
  streamWarmupMs: number;
  systemPrompt: string;
  defaultPointPrompt: string;
  reportPrompt: string;
  telegramMessagePrompt: string;
  videoPrompt: string;
};

export type VideoRecordingConfig = {
  enabled: boolean;
  framesPerSecond: number;
  width: number;
  height: number;
  stopTimeoutMs: number;
};

export type RelayConfig = {
  robotCamera: boolean;
  externalRtsp: boolean;
  externalRtspUrl: string;
  mediaServerInternal: string;
  mediaServerExternal: string;
  feederIntervalMs: number;
  monitorIntervalMs: number;
  maxRestarts: number;
  restartBaseDelayMs: number;
  maxBackoffMs: number;
  terminateTimeoutMs: number;
  killTimeoutMs: number;
  feederJoinTimeoutMs: number;
};

export type LiveMonitorConfig = {
  enabled: boolean;
  serviceUrl: string;
  websocketUrl: string;
  rules: string[];
  maxRules: number;
  cooldownMs: number;
  registerAttempts: number;
  registerBackoffMs: number;
  reconnectDelayMs: number;
  maxReconnectAttempts: number;
  stopTimeoutMs: number;
  requestTimeoutMs: number;
  testResultLimit: number;
  previewIntervalMs: number;
};

export type TelegramConfig = {
  enabled: boolean;
  botToken: string;
  userId: string;
  apiBaseUrl: string;
  timeoutMs: number;
};

export type SchedulerConfig = {
  pollIntervalMs: number;
};

export type PatrolConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  paths: PathsConfig;
  ffmpeg?: FfmpegConfig;
  patrol: PatrolSettings;
  video: VideoRecordingConfig;
  relay: RelayConfig;
  liveMonitor: LiveMonitorConfig;
  telegram: TelegramConfig;
  scheduler: SchedulerConfig;
};

export interface ConfigSource {
  getConfig(): PatrolConfig;
}

export function staticConfigSource(config: PatrolConfig): ConfigSource {
  return {
    getConfig: () => config
  };
}

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  pattern?: string;
};

const nonNegative: JsonSchema = { type: 'number', minimum: 0 };
const positive: JsonSchema = { type: 'number', minimum: 1 };

const patrolConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'database',
    'paths',
    'patrol',
    'video',
    'relay',
    'liveMonitor',
    'telegram',
    'scheduler'
  ],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name', 'robotId', 'timezone'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        robotId: { type: 'string' },
        robotName: { type: 'string' },
        timezone: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']
        }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' },
        busyTimeoutMs: nonNegative
      }
    },
    paths: {
      type: 'object',
      required: ['dataDir', 'imagesDir', 'videoDir', 'liveAlertsDir', 'pointsFile', 'scheduleFile'],
      additionalProperties: false,
      properties: {
        dataDir: { type: 'string' },
        imagesDir: { type: 'string' },
        videoDir: { type: 'string' },
        liveAlertsDir: { type: 'string' },
        pointsFile: { type: 'string' },
        scheduleFile: { type: 'string' }
      }
    },
    ffmpeg: {
      type: 'object',
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    patrol: {
      type: 'object',
      required: [
        'turboMode',
        'settleDelayMs',
        'moveFailureDelayMs',
        'moveRetries',
        'moveRetryDelayMs',
        'returnHomeSettleMs',
        'staleJoinTimeoutMs',
        'streamWarmupMs',
        'systemPrompt',
        'defaultPointPrompt',
        'reportPrompt',
        'telegramMessagePrompt',
        'videoPrompt'
      ],
      additionalProperties: false,
      properties: {
        turboMode: { type: 'boolean' },
        settleDelayMs: nonNegative,
        moveFailureDelayMs: nonNegative,
        moveRetries: { type: 'number', minimum: 0, maximum: 10 },
        moveRetryDelayMs: nonNegative,
        returnHomeSettleMs: nonNegative,
        staleJoinTimeoutMs: nonNegative,
        streamWarmupMs: nonNegative,
        systemPrompt: { type: 'string' },
        defaultPointPrompt: { type: 'string' },
        reportPrompt: { type: 'string' },
        telegramMessagePrompt: { type: 'string' },
        videoPrompt: { type: 'string' }
      }
    },
    video: {
      type: 'object',
      required: ['enabled', 'framesPerSecond', 'width', 'height', 'stopTimeoutMs'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        framesPerSecond: { type: 'number', minimum: 1, maximum: 60 },
        width: positive,
        height: positive,
        stopTimeoutMs: nonNegative
      }
    },
    relay: {
      type: 'object',
      required: [
        'robotCamera',
        'externalRtsp',
        'externalRtspUrl',
        'mediaServerInternal',
        'mediaServerExternal',
        'feederIntervalMs',
        'monitorIntervalMs',
        'maxRestarts',
        'restartBaseDelayMs',
        'maxBackoffMs',
        'terminateTimeoutMs',
        'killTimeoutMs',
        'feederJoinTimeoutMs'
      ],
      additionalProperties: false,
      properties: {
        robotCamera: { type: 'boolean' },
        externalRtsp: { type: 'boolean' },
        externalRtspUrl: { type: 'string' },
        mediaServerInternal: { type: 'string' },
        mediaServerExternal: { type: 'string' },
        feederIntervalMs: positive,
        monitorIntervalMs: positive,
        maxRestarts: nonNegative,
        restartBaseDelayMs: nonNegative,
        maxBackoffMs: nonNegative,
        terminateTimeoutMs: nonNegative,
        killTimeoutMs: nonNegative,
        feederJoinTimeoutMs: nonNegative
      }
    },
    liveMonitor: {
      type: 'object',
      required: [
        'enabled',
        'serviceUrl',
        'websocketUrl',
        'rules',
        'maxRules',
        'cooldownMs',
        'registerAttempts',
        'registerBackoffMs',
        'reconnectDelayMs',
        'maxReconnectAttempts',
        'stopTimeoutMs',
        'requestTimeoutMs',
        'testResultLimit',
        'previewIntervalMs'
      ],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        serviceUrl: { type: 'string' },
        websocketUrl: { type: 'string' },
        rules: { type: 'array', items: { type: 'string' } },
        maxRules: positive,
        cooldownMs: nonNegative,
        registerAttempts: positive,
        registerBackoffMs: nonNegative,
        reconnectDelayMs: nonNegative,
        maxReconnectAttempts: nonNegative,
        stopTimeoutMs: nonNegative,
        requestTimeoutMs: positive,
        testResultLimit: positive,
        previewIntervalMs: positive
      }
    },
    telegram: {
      type: 'object',
      required: ['enabled', 'botToken', 'userId', 'apiBaseUrl', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        botToken: { type: 'string' },
        userId: { type: 'string' },
        apiBaseUrl: { type: 'string' },
        timeoutMs: positive
      }
    },
    scheduler: {
      type: 'object',
      required: ['pollIntervalMs'],
      additionalProperties: false,
      properties: {
        pollIntervalMs: positive
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
      errors.push(`${pathLabel} must match ${schema.pattern}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is PatrolConfig {
  const errors = validateAgainstSchema(patrolConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // The structural pass above guarantees the shape the logical checks read.
  validateLogicalConfig(config as PatrolConfig);
}

export function parseConfig(contents: string): PatrolConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): PatrolConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: PatrolConfig) {
  const messages: string[] = [];

  if (!isValidTimezone(config.app.timezone)) {
    messages.push(`config.app.timezone "${config.app.timezone}" is not a known IANA timezone`);
  }

  if (!config.app.robotId.trim()) {
    messages.push('config.app.robotId must not be empty');
  }

  const rules = config.liveMonitor.rules.map(rule => rule.trim()).filter(rule => rule.length > 0);
  if (rules.length > config.liveMonitor.maxRules) {
    messages.push(
      `config.liveMonitor.rules has ${rules.length} rules, more than maxRules (${config.liveMonitor.maxRules})`
    );
  }

  if (config.liveMonitor.enabled && !config.liveMonitor.serviceUrl.trim()) {
    messages.push('config.liveMonitor.serviceUrl is required when the live monitor is enabled');
  }

  if (config.relay.externalRtsp && !config.relay.externalRtspUrl.trim()) {
    messages.push('config.relay.externalRtspUrl is required when the external relay is enabled');
  }

  if (config.relay.maxBackoffMs < config.relay.restartBaseDelayMs) {
    messages.push('config.relay.maxBackoffMs must be >= config.relay.restartBaseDelayMs');
  }

  if (config.telegram.enabled && (!config.telegram.botToken || !config.telegram.userId)) {
    messages.push('config.telegram.botToken and config.telegram.userId are required when telegram is enabled');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: PatrolConfig;
  next: PatrolConfig;
};

export class ConfigManager extends EventEmitter implements ConfigSource {
  private currentConfig: PatrolConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): PatrolConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): PatrolConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: PatrolConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { patrolConfigSchema };
