import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import loggerModule, { type Logger } from './logger.js';
import {
  EMPTY_USAGE,
  type InspectionRecord,
  type LiveAlertRecord,
  type PatrolRunRecord,
  type RunStatus,
  type TokenCategoryName,
  type TokenUsage
} from './types.js';

const SCHEMA_VERSION = 2;

const TOKEN_CATEGORIES: TokenCategoryName[] = ['inspection', 'report', 'telegram', 'video'];

type ColumnDefinition = { name: string; sql: string };

const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS patrol_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    start_time TEXT NOT NULL,
    end_time TEXT,
    status TEXT NOT NULL,
    robot_serial TEXT,
    report_content TEXT,
    model_id TEXT,
    token_usage TEXT
  );

  CREATE TABLE IF NOT EXISTS inspection_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL REFERENCES patrol_runs (id) ON DELETE CASCADE,
    point_name TEXT NOT NULL,
    coordinate_x REAL,
    coordinate_y REAL,
    prompt TEXT,
    ai_response TEXT,
    is_ng INTEGER NOT NULL DEFAULT 0,
    ai_description TEXT,
    token_usage TEXT,
    image_path TEXT,
    timestamp TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS live_alerts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL REFERENCES patrol_runs (id) ON DELETE CASCADE,
    rule TEXT NOT NULL,
    response TEXT,
    image_path TEXT,
    timestamp TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_inspection_results_run ON inspection_results (run_id);
  CREATE INDEX IF NOT EXISTS idx_live_alerts_run ON live_alerts (run_id);
`;

const tokenColumns = (prefix: string): ColumnDefinition[] =>
  ['input', 'output', 'total'].map(kind => {
    const name = prefix ? `${prefix}_${kind}_tokens` : `${kind}_tokens`;
    return { name, sql: `${name} INTEGER DEFAULT 0` };
  });

const RUN_COLUMNS: ColumnDefinition[] = [
  { name: 'robot_id', sql: 'robot_id TEXT' },
  { name: 'video_path', sql: 'video_path TEXT' },
  { name: 'video_analysis', sql: 'video_analysis TEXT' },
  ...tokenColumns(''),
  ...TOKEN_CATEGORIES.flatMap(category => tokenColumns(category))
];

const INSPECTION_COLUMNS: ColumnDefinition[] = [
  ...tokenColumns(''),
  { name: 'robot_moving_status', sql: 'robot_moving_status TEXT' },
  { name: 'robot_id', sql: 'robot_id TEXT' }
];

const ALERT_COLUMNS: ColumnDefinition[] = [
  { name: 'stream_source', sql: 'stream_source TEXT' },
  { name: 'stream_id', sql: 'stream_id TEXT' },
  { name: 'robot_id', sql: 'robot_id TEXT' }
];

type RunRow = {
  id: number;
  start_time: string;
  end_time: string | null;
  status: string;
  robot_serial: string | null;
  robot_id: string | null;
  model_id: string | null;
  report_content: string | null;
  token_usage: string | null;
  video_path: string | null;
  video_analysis: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  total_tokens: number | null;
  inspection_input_tokens: number | null;
  inspection_output_tokens: number | null;
  inspection_total_tokens: number | null;
  report_input_tokens: number | null;
  report_output_tokens: number | null;
  report_total_tokens: number | null;
  telegram_input_tokens: number | null;
  telegram_output_tokens: number | null;
  telegram_total_tokens: number | null;
  video_input_tokens: number | null;
  video_output_tokens: number | null;
  video_total_tokens: number | null;
};

type InspectionRow = {
  id: number;
  run_id: number;
  point_name: string;
  coordinate_x: number | null;
  coordinate_y: number | null;
  prompt: string | null;
  ai_response: string | null;
  is_ng: number;
  ai_description: string | null;
  token_usage: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  total_tokens: number | null;
  image_path: string | null;
  timestamp: string;
  robot_moving_status: string | null;
  robot_id: string | null;
};

type AlertRow = {
  id: number;
  run_id: number;
  rule: string;
  response: string | null;
  image_path: string | null;
  timestamp: string;
  stream_source: string | null;
  stream_id: string | null;
  robot_id: string | null;
};

type SumRow = { input: number | null; output: number | null; total: number | null };

export type NewRun = {
  startTime: string;
  robotSerial: string | null;
  robotId: string | null;
  modelId: string | null;
};

export type RunStatusUpdate = {
  status: RunStatus;
  endTime?: string | null;
  videoPath?: string | null;
  videoAnalysis?: string | null;
};

export type NewInspection = Omit<InspectionRecord, 'id'>;

export type NewLiveAlert = Omit<LiveAlertRecord, 'id'>;

export type DatabaseOptions = {
  path: string;
  busyTimeoutMs?: number;
  logger?: Logger;
};

export type MigrationResult = {
  previousVersion: number;
  version: number;
  addedColumns: string[];
  backfilledLegacyTokens: boolean;
};

export class PatrolDatabase {
  readonly db: Database.Database;
  readonly path: string;
  readonly migration: MigrationResult;
  private readonly logger: Logger;
  private readonly statements: Statements;

  constructor(options: DatabaseOptions) {
    this.logger = options.logger ?? loggerModule;
    this.path = options.path === ':memory:' ? options.path : path.resolve(options.path);
    if (this.path !== ':memory:') {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
    }

    this.db = new Database(this.path);
    if (this.path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(options.busyTimeoutMs ?? 5000))}`);
    this.db.pragma('foreign_keys = ON');

    this.migration = migrate(this.db);
    if (this.migration.addedColumns.length > 0) {
      this.logger.info(
        { addedColumns: this.migration.addedColumns, version: this.migration.version },
        'Database schema migrated'
      );
    }

    this.statements = prepareStatements(this.db);
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  createRun(run: NewRun): number {
    const result = this.statements.insertRun.run({
      startTime: run.startTime,
      status: 'Running',
      robotSerial: run.robotSerial,
      robotId: run.robotId,
      modelId: run.modelId
    });
    return Number(result.lastInsertRowid);
  }

  updateRunStatus(runId: number, update: RunStatusUpdate) {
    const current = this.statements.getRun.get({ id: runId });
    if (!current) {
      throw new Error(`Patrol run ${runId} not found`);
    }
    this.statements.updateRunStatus.run({
      id: runId,
      status: update.status,
      endTime: update.endTime === undefined ? current.end_time : update.endTime,
      videoPath: update.videoPath === undefined ? current.video_path : update.videoPath,
      videoAnalysis: update.videoAnalysis === undefined ? current.video_analysis : update.videoAnalysis
    });
  }

  saveReport(runId: number, report: { content: string; usageJson: string; usage: TokenUsage }) {
    this.transaction(() => {
      this.statements.updateReport.run({ id: runId, content: report.content, usageJson: report.usageJson });
      this.recordRunTokens(runId, 'report', report.usage);
    });
  }

  recordRunTokens(runId: number, category: Exclude<TokenCategoryName, 'inspection'>, usage: TokenUsage) {
    this.statements.runTokens[category].run({
      id: runId,
      input: usage.input,
      output: usage.output,
      total: usage.total
    });
  }

  updateRunTokenTotals(runId: number): TokenUsage {
    return this.transaction(() => {
      const sums = this.statements.sumInspectionTokens.get({ runId });
      const inspection: TokenUsage = {
        input: sums?.input ?? 0,
        output: sums?.output ?? 0,
        total: sums?.total ?? 0
      };
      this.statements.runTokens.inspection.run({ id: runId, ...inspection });

      const row = this.statements.getRun.get({ id: runId });
      if (!row) {
        throw new Error(`Patrol run ${runId} not found`);
      }
      const tokens = mapRunTokens(row);
      const totals = TOKEN_CATEGORIES.reduce<TokenUsage>(
        (acc, category) => ({
          input: acc.input + tokens[category].input,
          output: acc.output + tokens[category].output,
          total: acc.total + tokens[category].total
        }),
        { ...EMPTY_USAGE }
      );
      this.statements.updateRunTotals.run({ id: runId, ...totals });
      return totals;
    });
  }

  getRun(runId: number): PatrolRunRecord | null {
    const row = this.statements.getRun.get({ id: runId });
    return row ? mapRunRow(row) : null;
  }

  listRuns(limit = 50): PatrolRunRecord[] {
    return this.statements.listRuns.all({ limit: clampLimit(limit) }).map(mapRunRow);
  }

  insertInspection(result: NewInspection): number {
    const inserted = this.statements.insertInspection.run({
      runId: result.runId,
      pointName: result.pointName,
      coordinateX: result.coordinateX,
      coordinateY: result.coordinateY,
      prompt: result.prompt,
      aiResponse: result.aiResponse,
      isNg: result.isNg ? 1 : 0,
      aiDescription: result.aiDescription,
      tokenUsage: result.tokenUsage,
      input: result.usage.input,
      output: result.usage.output,
      total: result.usage.total,
      imagePath: result.imagePath,
      timestamp: result.timestamp,
      movingStatus: result.robotMovingStatus,
      robotId: result.robotId
    });
    return Number(inserted.lastInsertRowid);
  }

  listInspections(runId: number): InspectionRecord[] {
    return this.statements.listInspections.all({ runId }).map(mapInspectionRow);
  }

  insertLiveAlert(alert: NewLiveAlert): number {
    const inserted = this.statements.insertAlert.run({
      runId: alert.runId,
      rule: alert.rule,
      response: alert.response,
      imagePath: alert.imagePath,
      timestamp: alert.timestamp,
      streamSource: alert.streamSource,
      streamId: alert.streamId,
      robotId: alert.robotId
    });
    return Number(inserted.lastInsertRowid);
  }

  listLiveAlerts(runId: number): LiveAlertRecord[] {
    return this.statements.listAlerts.all({ runId }).map(mapAlertRow);
  }
}

function prepareStatements(db: Database.Database) {
  const runTokenStatement = (category: TokenCategoryName) =>
    db.prepare<{ id: number; input: number; output: number; total: number }>(
      `UPDATE patrol_runs
       SET ${category}_input_tokens = @input,
           ${category}_output_tokens = @output,
           ${category}_total_tokens = @total
       WHERE id = @id`
    );

  return {
    insertRun: db.prepare<{
      startTime: string;
      status: string;
      robotSerial: string | null;
      robotId: string | null;
      modelId: string | null;
    }>(
      `INSERT INTO patrol_runs (start_time, status, robot_serial, robot_id, model_id)
       VALUES (@startTime, @status, @robotSerial, @robotId, @modelId)`
    ),
    getRun: db.prepare<{ id: number }, RunRow>('SELECT * FROM patrol_runs WHERE id = @id'),
    listRuns: db.prepare<{ limit: number }, RunRow>('SELECT * FROM patrol_runs ORDER BY id DESC LIMIT @limit'),
    updateRunStatus: db.prepare<{
      id: number;
      status: string;
      endTime: string | null;
      videoPath: string | null;
      videoAnalysis: string | null;
    }>(
      `UPDATE patrol_runs
       SET status = @status, end_time = @endTime, video_path = @videoPath, video_analysis = @videoAnalysis
       WHERE id = @id`
    ),
    updateReport: db.prepare<{ id: number; content: string; usageJson: string }>(
      'UPDATE patrol_runs SET report_content = @content, token_usage = @usageJson WHERE id = @id'
    ),
    updateRunTotals: db.prepare<{ id: number; input: number; output: number; total: number }>(
      `UPDATE patrol_runs
       SET input_tokens = @input, output_tokens = @output, total_tokens = @total
       WHERE id = @id`
    ),
    runTokens: {
      inspection: runTokenStatement('inspection'),
      report: runTokenStatement('report'),
      telegram: runTokenStatement('telegram'),
      video: runTokenStatement('video')
    },
    sumInspectionTokens: db.prepare<{ runId: number }, SumRow>(
      `SELECT SUM(COALESCE(input_tokens, 0)) AS input,
              SUM(COALESCE(output_tokens, 0)) AS output,
              SUM(COALESCE(total_tokens, 0)) AS total
       FROM inspection_results WHERE run_id = @runId`
    ),
    insertInspection: db.prepare<{
      runId: number;
      pointName: string;
      coordinateX: number | null;
      coordinateY: number | null;
      prompt: string;
      aiResponse: string;
      isNg: number;
      aiDescription: string;
      tokenUsage: string;
      input: number;
      output: number;
      total: number;
      imagePath: string;
      timestamp: string;
      movingStatus: string;
      robotId: string | null;
    }>(
      `INSERT INTO inspection_results
       (run_id, point_name, coordinate_x, coordinate_y, prompt, ai_response, is_ng, ai_description,
        token_usage, input_tokens, output_tokens, total_tokens, image_path, timestamp,
        robot_moving_status, robot_id)
       VALUES (@runId, @pointName, @coordinateX, @coordinateY, @prompt, @aiResponse, @isNg, @aiDescription,
        @tokenUsage, @input, @output, @total, @imagePath, @timestamp, @movingStatus, @robotId)`
    ),
    listInspections: db.prepare<{ runId: number }, InspectionRow>(
      'SELECT * FROM inspection_results WHERE run_id = @runId ORDER BY id ASC'
    ),
    insertAlert: db.prepare<{
      runId: number;
      rule: string;
      response: string;
      imagePath: string;
      timestamp: string;
      streamSource: string;
      streamId: string;
      robotId: string | null;
    }>(
      `INSERT INTO live_alerts (run_id, rule, response, image_path, timestamp, stream_source, stream_id, robot_id)
       VALUES (@runId, @rule, @response, @imagePath, @timestamp, @streamSource, @streamId, @robotId)`
    ),
    listAlerts: db.prepare<{ runId: number }, AlertRow>(
      'SELECT * FROM live_alerts WHERE run_id = @runId ORDER BY id ASC'
    )
  };
}

type Statements = ReturnType<typeof prepareStatements>;

export function openDatabase(options: DatabaseOptions): PatrolDatabase {
  return new PatrolDatabase(options);
}

function readUserVersion(db: Database.Database): number {
  const value = db.pragma('user_version', { simple: true });
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function setUserVersion(db: Database.Database, version: number) {
  const normalized = Math.max(0, Math.floor(Number(version)) || 0);
  db.pragma(`user_version = ${normalized}`);
}

function listColumns(db: Database.Database, table: string): Set<string> {
  const rows = db.prepare<[], { name: string }>(`PRAGMA table_info('${table}')`).all();
  return new Set(rows.map(row => row.name));
}

function ensureColumns(db: Database.Database, table: string, columns: ColumnDefinition[]): string[] {
  const existing = listColumns(db, table);
  const added: string[] = [];
  for (const column of columns) {
    if (!existing.has(column.name)) {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column.sql}`);
      added.push(`${table}.${column.name}`);
    }
  }
  return added;
}

// Early files kept token counts in prompt_tokens/candidate_tokens; the legacy columns stay.
function backfillLegacyTokens(db: Database.Database, table: string): boolean {
  const columns = listColumns(db, table);
  if (!columns.has('prompt_tokens') && !columns.has('candidate_tokens')) {
    return false;
  }
  if (columns.has('prompt_tokens')) {
    db.exec(
      `UPDATE ${table} SET input_tokens = prompt_tokens
       WHERE COALESCE(input_tokens, 0) = 0 AND prompt_tokens IS NOT NULL`
    );
  }
  if (columns.has('candidate_tokens')) {
    db.exec(
      `UPDATE ${table} SET output_tokens = candidate_tokens
       WHERE COALESCE(output_tokens, 0) = 0 AND candidate_tokens IS NOT NULL`
    );
  }
  return true;
}

function migrate(db: Database.Database): MigrationResult {
  const previousVersion = readUserVersion(db);
  return db.transaction(() => {
    db.exec(BASE_SCHEMA);
    const addedColumns = [
      ...ensureColumns(db, 'patrol_runs', RUN_COLUMNS),
      ...ensureColumns(db, 'inspection_results', INSPECTION_COLUMNS),
      ...ensureColumns(db, 'live_alerts', ALERT_COLUMNS)
    ];
    const runsBackfilled = backfillLegacyTokens(db, 'patrol_runs');
    const resultsBackfilled = backfillLegacyTokens(db, 'inspection_results');
    if (previousVersion < SCHEMA_VERSION) {
      setUserVersion(db, SCHEMA_VERSION);
    }
    return {
      previousVersion,
      version: Math.max(previousVersion, SCHEMA_VERSION),
      addedColumns,
      backfilledLegacyTokens: runsBackfilled || resultsBackfilled
    };
  })();
}

function clampLimit(limit: number) {
  if (!Number.isFinite(limit) || limit <= 0) {
    return 50;
  }
  return Math.min(500, Math.floor(limit));
}

function usage(input: number | null, output: number | null, total: number | null): TokenUsage {
  return { input: input ?? 0, output: output ?? 0, total: total ?? 0 };
}

function mapRunTokens(row: RunRow): Record<TokenCategoryName, TokenUsage> {
  return {
    inspection: usage(row.inspection_input_tokens, row.inspection_output_tokens, row.inspection_total_tokens),
    report: usage(row.report_input_tokens, row.report_output_tokens, row.report_total_tokens),
    telegram: usage(row.telegram_input_tokens, row.telegram_output_tokens, row.telegram_total_tokens),
    video: usage(row.video_input_tokens, row.video_output_tokens, row.video_total_tokens)
  };
}

function toRunStatus(value: string): RunStatus {
  if (value === 'Running' || value === 'Completed' || value === 'Patrol Stopped') {
    return value;
  }
  if (value.startsWith('Error: ')) {
    return `Error: ${value.slice('Error: '.length)}`;
  }
  return `Error: ${value}`;
}

function mapRunRow(row: RunRow): PatrolRunRecord {
  return {
    id: row.id,
    startTime: row.start_time,
    endTime: row.end_time,
    status: toRunStatus(row.status),
    robotSerial: row.robot_serial,
    robotId: row.robot_id,
    modelId: row.model_id,
    reportContent: row.report_content,
    tokenUsage: row.token_usage,
    videoPath: row.video_path,
    videoAnalysis: row.video_analysis,
    tokens: mapRunTokens(row),
    totals: usage(row.input_tokens, row.output_tokens, row.total_tokens)
  };
}

function mapInspectionRow(row: InspectionRow): InspectionRecord {
  return {
    id: row.id,
    runId: row.run_id,
    pointName: row.point_name,
    coordinateX: row.coordinate_x,
    coordinateY: row.coordinate_y,
    prompt: row.prompt ?? '',
    aiResponse: row.ai_response ?? '',
    isNg: row.is_ng === 1,
    aiDescription: row.ai_description ?? '',
    tokenUsage: row.token_usage ?? '{}',
    usage: usage(row.input_tokens, row.output_tokens, row.total_tokens),
    imagePath: row.image_path ?? '',
    timestamp: row.timestamp,
    robotMovingStatus: row.robot_moving_status ?? '',
    robotId: row.robot_id
  };
}

function mapAlertRow(row: AlertRow): LiveAlertRecord {
  return {
    id: row.id,
    runId: row.run_id,
    rule: row.rule,
    response: row.response ?? '',
    imagePath: row.image_path ?? '',
    timestamp: row.timestamp,
    streamSource: row.stream_source ?? '',
    streamId: row.stream_id ?? '',
    robotId: row.robot_id
  };
}

export const __test__ = {
  SCHEMA_VERSION,
  RUN_COLUMNS,
  INSPECTION_COLUMNS,
  ALERT_COLUMNS,
  readUserVersion,
  setUserVersion,
  listColumns,
  migrate
};
