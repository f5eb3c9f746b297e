import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics, { type PrometheusLogLevelOptions } from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'patrolbot';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values)
    .map(level => level.toLowerCase())
    .concat('silent')
);

const levelEvents = new EventEmitter();

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value instanceof Error && value.message) {
      return value.message;
    }
  }
  return undefined;
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
      return method.apply(this, inputArgs);
    }
  }
});

export type Logger = Pick<typeof logger, 'debug' | 'info' | 'warn' | 'error'>;

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  const wrapper = (level: string, previous: string | null) => {
    listener(level, previous);
  };
  levelEvents.on('change', wrapper);
  return () => {
    levelEvents.off('change', wrapper);
  };
}

export function getLogLevelMetrics() {
  return metrics.exportLogLevelMetrics();
}

export function getLogLevelPrometheusMetrics(options?: PrometheusLogLevelOptions) {
  return metrics.exportLogLevelCountersForPrometheus(options);
}

export default logger;
