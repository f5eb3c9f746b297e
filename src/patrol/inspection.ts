import fs from 'node:fs';
import path from 'node:path';
import type { InspectionAnalyzer, InspectionOutcome } from '../ai/analyzer.js';
import type { PatrolDatabase } from '../db.js';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { EMPTY_USAGE, type InspectionSummary, type PatrolPoint } from '../types.js';
import { safeName, toPosixRelative } from '../utils/files.js';
import { attemptValue } from '../utils/outcome.js';
import { formatTimestamp } from '../utils/time.js';

export type InspectionSite = {
  imagesDir: string;
  robotId: string | null;
  timezone: string;
};

export type InspectionTask = {
  runId: number;
  site: InspectionSite;
  point: PatrolPoint;
  imagePath: string;
  imageId: string;
  userPrompt: string;
  systemPrompt: string;
  results: InspectionSummary[];
};

export type InspectionContext = {
  db: PatrolDatabase;
  analyzer: InspectionAnalyzer;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type InspectionRow = {
  runId: number;
  site: InspectionSite;
  point: PatrolPoint;
  prompt: string;
  outcome: InspectionOutcome;
  imagePath: string;
  movingStatus: string;
};

export function processingImageName(pointName: string, imageId: string) {
  return `${safeName(pointName)}_processing_${imageId}.jpg`;
}

export function errorOutcome(description: string, resultText: string): InspectionOutcome {
  return { isNG: true, description, resultText, usage: { ...EMPTY_USAGE }, usageJson: '{}' };
}

export function renameInspectionImage(
  imagePath: string,
  pointName: string,
  isNG: boolean,
  imageId: string,
  logger: Logger = loggerModule
): string {
  const target = path.join(path.dirname(imagePath), `${safeName(pointName)}_${isNG ? 'NG' : 'OK'}_${imageId}.jpg`);
  try {
    fs.renameSync(imagePath, target);
    return target;
  } catch (error) {
    logger.warn({ err: error, imagePath }, 'Failed to rename inspection image');
    return imagePath;
  }
}

export function saveInspection(context: InspectionContext, row: InspectionRow): number | null {
  const logger = context.logger ?? loggerModule;
  const metrics = context.metrics ?? metricsModule;
  const relativePath = row.imagePath ? toPosixRelative(row.site.imagesDir, row.imagePath) : '';

  try {
    const id = context.db.insertInspection({
      runId: row.runId,
      pointName: row.point.name,
      coordinateX: row.point.x,
      coordinateY: row.point.y,
      prompt: row.prompt,
      aiResponse: row.outcome.resultText,
      isNg: row.outcome.isNG,
      aiDescription: row.outcome.description,
      tokenUsage: row.outcome.usageJson,
      usage: row.outcome.usage,
      imagePath: relativePath,
      timestamp: formatTimestamp(row.site.timezone),
      robotMovingStatus: row.movingStatus,
      robotId: row.site.robotId
    });
    metrics.recordTokens('inspection', row.outcome.usage);
    return id;
  } catch (error) {
    logger.error({ err: error, point: row.point.name, runId: row.runId }, 'Failed to save inspection result');
    return null;
  }
}

export async function runInspection(task: InspectionTask, context: InspectionContext): Promise<InspectionSummary> {
  const logger = context.logger ?? loggerModule;
  const metrics = context.metrics ?? metricsModule;
  const pointName = task.point.name;
  const startedAt = Date.now();

  let outcome: InspectionOutcome;
  let errored = true;
  const image = await attemptValue(() => fs.promises.readFile(task.imagePath));
  if (!image.ok) {
    logger.error({ err: image.error, point: pointName }, 'Failed to read inspection image');
    outcome = errorOutcome(image.error.message, `AI Error: ${image.error.message}`);
  } else {
    const analyzed = await context.analyzer.inspect(image.value, task.userPrompt, task.systemPrompt);
    if (analyzed.ok) {
      outcome = analyzed.value;
      errored = false;
    } else {
      logger.error({ err: analyzed.error, point: pointName }, 'Inspection analysis failed');
      outcome = errorOutcome(analyzed.error.message, `AI Error: ${analyzed.error.message}`);
    }
  }

  const imagePath = image.ok
    ? renameInspectionImage(task.imagePath, pointName, outcome.isNG, task.imageId, logger)
    : task.imagePath;

  saveInspection(context, {
    runId: task.runId,
    site: task.site,
    point: task.point,
    prompt: task.userPrompt,
    outcome,
    imagePath,
    movingStatus: 'Success'
  });

  metrics.recordInspection(errored ? 'error' : outcome.isNG ? 'ng' : 'ok');
  metrics.observeLatency('inspection', Date.now() - startedAt);

  const summary = { point: pointName, result: outcome.resultText };
  task.results.push(summary);
  logger.info({ point: pointName, isNG: outcome.isNG, runId: task.runId }, 'Inspection finished');
  return summary;
}
