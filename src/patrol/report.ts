import type { InspectionSummary, LiveAlertRecord } from '../types.js';

export const DEFAULT_REPORT_HEADER = 'Generate a summary report for this patrol:';
export const DEFAULT_REPORT_FOOTER = 'Provide a concise overview of status and anomalies.';
export const DEFAULT_TELEGRAM_HEADER = 'Generate a concise Telegram notification summarizing this patrol.';
export const TELEGRAM_FALLBACK = 'Patrol completed. Failed to generate summary.';

function resultLines(results: InspectionSummary[]) {
  return results.map(entry => `- Point: ${entry.point}\n  Result: ${entry.result}\n\n`).join('');
}

export type ReportPromptInput = {
  results: InspectionSummary[];
  customPrompt?: string;
  videoAnalysis?: string | null;
  liveAlerts?: Pick<LiveAlertRecord, 'timestamp' | 'rule' | 'response'>[];
};

export function buildReportPrompt(input: ReportPromptInput): string {
  const custom = input.customPrompt?.trim();
  let prompt = custom ? `${custom}\n\n` : `${DEFAULT_REPORT_HEADER}\n\n`;
  prompt += resultLines(input.results);

  if (input.videoAnalysis) {
    prompt += `\n\nVideo Analysis Summary:\n${input.videoAnalysis}\n\n`;
  }

  const alerts = input.liveAlerts ?? [];
  if (alerts.length > 0) {
    prompt += `\n\nLive Monitor Alerts (${alerts.length} triggered):\n`;
    for (const alert of alerts) {
      prompt += `- [${alert.timestamp}] Rule: ${alert.rule} -> ${alert.response}\n`;
    }
    prompt += '\n';
  }

  if (!custom) {
    prompt += DEFAULT_REPORT_FOOTER;
  }
  return prompt;
}

export function buildTelegramPrompt(input: Omit<ReportPromptInput, 'liveAlerts'>): string {
  const custom = input.customPrompt?.trim();
  let prompt = `${custom || DEFAULT_TELEGRAM_HEADER}\n\n`;
  prompt += resultLines(input.results);
  if (input.videoAnalysis) {
    prompt += `\nVideo Analysis Summary:\n${input.videoAnalysis}\n\n`;
  }
  return prompt;
}

// `2026-03-01 08:15:30` becomes `Patrol_Report_2026-03-01_081530.pdf`
export function reportFilename(startTime: string): string {
  return `Patrol_Report_${startTime.replace(/ /g, '_').replace(/:/g, '')}.pdf`;
}
