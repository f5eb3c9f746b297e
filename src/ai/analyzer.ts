import { EMPTY_USAGE, type TokenUsage } from '../types.js';
import { attempt, success, type Outcome } from '../utils/outcome.js';
import type { InspectionVerdict, VlmClient, VlmResponse } from './types.js';

export type InspectionOutcome = {
  isNG: boolean;
  description: string;
  resultText: string;
  usage: TokenUsage;
  usageJson: string;
};

export type TextOutcome = {
  text: string;
  usage: TokenUsage;
  usageJson: string;
};

const NG_PATTERN = /\bng\b/i;

export function parseVerdict(value: unknown): InspectionVerdict | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const isNg = Reflect.get(value, 'is_NG');
  const description = Reflect.get(value, 'Description');
  if (typeof isNg !== 'boolean') {
    return null;
  }
  return { is_NG: isNg, Description: typeof description === 'string' ? description : '' };
}

function parseJsonVerdict(text: string): InspectionVerdict | null {
  const trimmed = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/```$/, '')
    .trim();
  if (!trimmed.startsWith('{')) {
    return null;
  }
  try {
    return parseVerdict(JSON.parse(trimmed));
  } catch {
    return null;
  }
}

function count(value: number | undefined) {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function extractUsage(response: VlmResponse): { usage: TokenUsage; usageJson: string } {
  switch (response.provider) {
    case 'gemini': {
      const raw = response.usage ?? {};
      return {
        usage: {
          input: count(raw.prompt_token_count),
          output: count(raw.candidates_token_count),
          total: count(raw.total_token_count)
        },
        usageJson: JSON.stringify(raw)
      };
    }
    case 'openai': {
      const raw = response.usage ?? {};
      return {
        usage: {
          input: count(raw.prompt_tokens),
          output: count(raw.completion_tokens),
          total: count(raw.total_tokens)
        },
        usageJson: JSON.stringify(raw)
      };
    }
    case 'text':
      return { usage: { ...EMPTY_USAGE }, usageJson: '{}' };
  }
}

function fromVerdict(verdict: InspectionVerdict) {
  return {
    isNG: verdict.is_NG,
    description: verdict.Description,
    resultText: JSON.stringify(verdict)
  };
}

function fromText(text: string) {
  return { isNG: NG_PATTERN.test(text), description: text, resultText: text };
}

function readVerdict(response: VlmResponse) {
  switch (response.provider) {
    case 'gemini':
      return typeof response.result === 'string' ? fromText(response.result) : fromVerdict(response.result);
    case 'openai': {
      const parsed = parseJsonVerdict(response.content);
      return parsed ? fromVerdict(parsed) : fromText(response.content.trim());
    }
    case 'text':
      return fromText(response.text);
  }
}

export function normalizeInspection(response: VlmResponse): InspectionOutcome {
  return { ...readVerdict(response), ...extractUsage(response) };
}

export function normalizeText(response: VlmResponse): TextOutcome {
  const { usage, usageJson } = extractUsage(response);
  switch (response.provider) {
    case 'gemini':
      return {
        text: typeof response.result === 'string' ? response.result : JSON.stringify(response.result),
        usage,
        usageJson
      };
    case 'openai':
      return { text: response.content.trim(), usage, usageJson };
    case 'text':
      return { text: response.text, usage, usageJson };
  }
}

export class InspectionAnalyzer {
  constructor(private readonly client: VlmClient) {}

  isConfigured() {
    return this.client.isConfigured();
  }

  modelName() {
    return this.client.getModelName();
  }

  async inspect(image: Buffer, userPrompt: string, systemPrompt: string): Promise<Outcome<InspectionOutcome>> {
    const response = await attempt(() => this.client.generateInspection(image, userPrompt, systemPrompt));
    return response.ok ? success(normalizeInspection(response.value)) : response;
  }

  async generateText(prompt: string): Promise<Outcome<TextOutcome>> {
    const response = await attempt(() => this.client.generateReport(prompt));
    return response.ok ? success(normalizeText(response.value)) : response;
  }

  async analyzeVideo(videoPath: string, prompt: string): Promise<Outcome<TextOutcome>> {
    const response = await attempt(() => this.client.analyzeVideo(videoPath, prompt));
    return response.ok ? success(normalizeText(response.value)) : response;
  }
}
