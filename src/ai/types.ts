import type { Outcome } from '../utils/outcome.js';

export type InspectionVerdict = {
  is_NG: boolean;
  Description: string;
};

export type GeminiUsage = {
  prompt_token_count?: number;
  candidates_token_count?: number;
  total_token_count?: number;
};

export type OpenAiUsage = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export type GeminiResponse = {
  provider: 'gemini';
  result: InspectionVerdict | string;
  usage?: GeminiUsage;
};

export type OpenAiResponse = {
  provider: 'openai';
  content: string;
  usage?: OpenAiUsage;
};

export type PlainTextResponse = {
  provider: 'text';
  text: string;
};

export type VlmResponse = GeminiResponse | OpenAiResponse | PlainTextResponse;

export interface VlmClient {
  isConfigured(): boolean;
  getModelName(): string;
  generateInspection(image: Buffer, userPrompt: string, systemPrompt: string): Promise<Outcome<VlmResponse>>;
  generateReport(prompt: string): Promise<Outcome<VlmResponse>>;
  analyzeVideo(videoPath: string, prompt: string): Promise<Outcome<VlmResponse>>;
}
