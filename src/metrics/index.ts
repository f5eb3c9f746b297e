import pino from 'pino';
import type { TokenCategoryName, TokenUsage } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type PrometheusLogLevelOptions = {
  labels?: Record<string, string>;
  levelMetricName?: string;
  levelHelp?: string;
  stateMetricName?: string;
  stateHelp?: string;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    levelChanges: CounterMap;
  };
  patrol: {
    started: number;
    rejected: number;
    byStatus: CounterMap;
    lastFinishedAt: string | null;
  };
  inspections: {
    ok: number;
    ng: number;
    errors: number;
    moveFailures: number;
    queueDepth: number;
  };
  tokens: Record<TokenCategoryName, TokenUsage>;
  relays: {
    started: number;
    restarts: number;
    abandoned: number;
    byKey: CounterMap;
  };
  liveAlerts: {
    persisted: number;
    suppressed: number;
    reconnects: number;
    registrationFailures: number;
    byRule: CounterMap;
  };
  scheduler: {
    triggered: number;
    skipped: number;
  };
  latencies: Record<string, LatencyStats>;
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function emptyTokens(): Record<TokenCategoryName, TokenUsage> {
  return {
    inspection: { input: 0, output: 0, total: 0 },
    report: { input: 0, output: 0, total: 0 },
    telegram: { input: 0, output: 0, total: 0 },
    video: { input: 0, output: 0, total: 0 }
  };
}

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private patrolStarted = 0;
  private patrolRejected = 0;
  private readonly patrolByStatus = new Map<string, number>();
  private lastPatrolFinishedAt: number | null = null;
  private inspectionsOk = 0;
  private inspectionsNg = 0;
  private inspectionErrors = 0;
  private moveFailures = 0;
  private queueDepth = 0;
  private tokens = emptyTokens();
  private relayStarts = 0;
  private relayRestarts = 0;
  private relayAbandoned = 0;
  private readonly relayRestartsByKey = new Map<string, number>();
  private liveAlertsPersisted = 0;
  private liveAlertsSuppressed = 0;
  private eventChannelReconnects = 0;
  private streamRegistrationFailures = 0;
  private readonly liveAlertsByRule = new Map<string, number>();
  private schedulerTriggered = 0;
  private schedulerSkipped = 0;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.patrolStarted = 0;
    this.patrolRejected = 0;
    this.patrolByStatus.clear();
    this.lastPatrolFinishedAt = null;
    this.inspectionsOk = 0;
    this.inspectionsNg = 0;
    this.inspectionErrors = 0;
    this.moveFailures = 0;
    this.queueDepth = 0;
    this.tokens = emptyTokens();
    this.relayStarts = 0;
    this.relayRestarts = 0;
    this.relayAbandoned = 0;
    this.relayRestartsByKey.clear();
    this.liveAlertsPersisted = 0;
    this.liveAlertsSuppressed = 0;
    this.eventChannelReconnects = 0;
    this.streamRegistrationFailures = 0;
    this.liveAlertsByRule.clear();
    this.schedulerTriggered = 0;
    this.schedulerSkipped = 0;
    this.latencyStats.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  recordPatrolStart() {
    this.patrolStarted += 1;
  }

  recordPatrolRejected() {
    this.patrolRejected += 1;
  }

  recordPatrolFinished(status: string) {
    const key = status.startsWith('Error') ? 'Error' : status;
    this.patrolByStatus.set(key, (this.patrolByStatus.get(key) ?? 0) + 1);
    this.lastPatrolFinishedAt = Date.now();
  }

  recordInspection(outcome: 'ok' | 'ng' | 'error') {
    if (outcome === 'ok') {
      this.inspectionsOk += 1;
    } else if (outcome === 'ng') {
      this.inspectionsNg += 1;
    } else {
      this.inspectionErrors += 1;
    }
  }

  recordMoveFailure() {
    this.moveFailures += 1;
  }

  setQueueDepth(depth: number) {
    this.queueDepth = Math.max(0, depth);
  }

  recordTokens(category: TokenCategoryName, usage: TokenUsage) {
    const current = this.tokens[category];
    current.input += usage.input;
    current.output += usage.output;
    current.total += usage.total;
  }

  recordRelayStart() {
    this.relayStarts += 1;
  }

  recordRelayRestart(key: string) {
    this.relayRestarts += 1;
    this.relayRestartsByKey.set(key, (this.relayRestartsByKey.get(key) ?? 0) + 1);
  }

  recordRelayAbandoned() {
    this.relayAbandoned += 1;
  }

  recordLiveAlert(rule: string) {
    this.liveAlertsPersisted += 1;
    this.liveAlertsByRule.set(rule, (this.liveAlertsByRule.get(rule) ?? 0) + 1);
  }

  recordSuppressedAlert() {
    this.liveAlertsSuppressed += 1;
  }

  recordEventChannelReconnect() {
    this.eventChannelReconnects += 1;
  }

  recordStreamRegistrationFailure() {
    this.streamRegistrationFailures += 1;
  }

  recordScheduleTrigger(skipped: boolean) {
    if (skipped) {
      this.schedulerSkipped += 1;
    } else {
      this.schedulerTriggered += 1;
    }
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      currentLevel: this.currentLogLevel,
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const levelName = options.levelMetricName ?? 'patrol_log_level_total';
    lines.push(`# HELP ${levelName} ${options.levelHelp ?? 'Total log events grouped by Pino level'}`);
    lines.push(`# TYPE ${levelName} gauge`);
    for (const [level, value] of Object.entries(mapLogLevelCounters(this.logLevelCounters))) {
      lines.push(`${levelName}${formatLabels({ ...baseLabels, level })} ${value}`);
    }

    const stateName = options.stateMetricName ?? 'patrol_log_level_state';
    lines.push(`# HELP ${stateName} ${options.stateHelp ?? 'Current active Pino log level'}`);
    lines.push(`# TYPE ${stateName} gauge`);
    lines.push(`${stateName}${formatLabels({ ...baseLabels, level: this.currentLogLevel })} 1`);

    return lines.join('\n');
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      patrol: {
        started: this.patrolStarted,
        rejected: this.patrolRejected,
        byStatus: mapFrom(this.patrolByStatus),
        lastFinishedAt: this.lastPatrolFinishedAt ? new Date(this.lastPatrolFinishedAt).toISOString() : null
      },
      inspections: {
        ok: this.inspectionsOk,
        ng: this.inspectionsNg,
        errors: this.inspectionErrors,
        moveFailures: this.moveFailures,
        queueDepth: this.queueDepth
      },
      tokens: {
        inspection: { ...this.tokens.inspection },
        report: { ...this.tokens.report },
        telegram: { ...this.tokens.telegram },
        video: { ...this.tokens.video }
      },
      relays: {
        started: this.relayStarts,
        restarts: this.relayRestarts,
        abandoned: this.relayAbandoned,
        byKey: mapFrom(this.relayRestartsByKey)
      },
      liveAlerts: {
        persisted: this.liveAlertsPersisted,
        suppressed: this.liveAlertsSuppressed,
        reconnects: this.eventChannelReconnects,
        registrationFailures: this.streamRegistrationFailures,
        byRule: mapFrom(this.liveAlertsByRule)
      },
      scheduler: {
        triggered: this.schedulerTriggered,
        skipped: this.schedulerSkipped
      },
      latencies: mapFromLatencies(this.latencyStats)
    };
  }
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const level of PINO_LEVEL_ORDER) {
    result[level] = source.get(level) ?? 0;
  }
  const extras = Array.from(source.entries())
    .filter(([level]) => !(level in result) && level in pino.levels.values)
    .sort(([a], [b]) => a.localeCompare(b));
  for (const [level, value] of extras) {
    result[level] = value;
  }
  return result;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
    };
  }
  return result;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) {
    return '';
  }
  return `{${entries.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`).join(',')}}`;
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
