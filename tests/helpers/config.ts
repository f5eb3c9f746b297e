import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { PatrolConfig } from '../../src/config/index.js';
import type { PatrolPoint } from '../../src/types.js';

type Overrides = {
  [Section in keyof PatrolConfig]?: Partial<NonNullable<PatrolConfig[Section]>>;
};

export function createTempDir(prefix = 'patrol-test-') {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function createTestConfig(root: string, overrides: Overrides = {}): PatrolConfig {
  const dataDir = path.join(root, 'data');
  return {
    app: { name: 'patrol-test', robotId: 'robot-01', robotName: 'Unit', timezone: 'UTC', ...overrides.app },
    logging: { level: 'silent', ...overrides.logging },
    database: { path: ':memory:', busyTimeoutMs: 1000, ...overrides.database },
    paths: {
      dataDir,
      imagesDir: path.join(dataDir, 'images'),
      videoDir: path.join(dataDir, 'report', 'video'),
      liveAlertsDir: path.join(dataDir, 'report', 'live_alerts'),
      pointsFile: path.join(dataDir, 'config', 'points.json'),
      scheduleFile: path.join(dataDir, 'config', 'schedule.json'),
      ...overrides.paths
    },
    ffmpeg: { ...overrides.ffmpeg },
    patrol: {
      turboMode: false,
      settleDelayMs: 0,
      moveFailureDelayMs: 0,
      moveRetries: 0,
      moveRetryDelayMs: 0,
      returnHomeSettleMs: 0,
      staleJoinTimeoutMs: 1000,
      streamWarmupMs: 0,
      systemPrompt: 'You are an inspector.',
      defaultPointPrompt: 'Is everything normal?',
      reportPrompt: '',
      telegramMessagePrompt: '',
      videoPrompt: '',
      ...overrides.patrol
    },
    video: { enabled: false, framesPerSecond: 5, width: 640, height: 480, stopTimeoutMs: 1000, ...overrides.video },
    relay: {
      robotCamera: false,
      externalRtsp: false,
      externalRtspUrl: '',
      mediaServerInternal: 'media:8554',
      mediaServerExternal: 'media.example:8554',
      feederIntervalMs: 200,
      monitorIntervalMs: 10_000,
      maxRestarts: 3,
      restartBaseDelayMs: 1000,
      maxBackoffMs: 30_000,
      terminateTimeoutMs: 100,
      killTimeoutMs: 100,
      feederJoinTimeoutMs: 100,
      ...overrides.relay
    },
    liveMonitor: {
      enabled: false,
      serviceUrl: '',
      websocketUrl: '',
      rules: [],
      maxRules: 10,
      cooldownMs: 60_000,
      registerAttempts: 3,
      registerBackoffMs: 0,
      reconnectDelayMs: 1000,
      maxReconnectAttempts: 3,
      stopTimeoutMs: 100,
      requestTimeoutMs: 1000,
      testResultLimit: 50,
      previewIntervalMs: 1000,
      ...overrides.liveMonitor
    },
    telegram: {
      enabled: false,
      botToken: '',
      userId: '',
      apiBaseUrl: 'https://telegram.invalid',
      timeoutMs: 1000,
      ...overrides.telegram
    },
    scheduler: { pollIntervalMs: 30_000, ...overrides.scheduler }
  };
}

export function writePoints(config: PatrolConfig, points: Array<Partial<PatrolPoint> & { name: string }>) {
  fs.mkdirSync(path.dirname(config.paths.pointsFile), { recursive: true });
  const entries = points.map((point, index) => ({ x: index, y: index * 2, ...point }));
  fs.writeFileSync(config.paths.pointsFile, JSON.stringify(entries), 'utf-8');
}
