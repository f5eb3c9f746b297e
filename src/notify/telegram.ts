import { failure, success, type Outcome } from '../utils/outcome.js';

export type TelegramOptions = {
  botToken: string;
  userId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

export interface Notifier {
  sendText(text: string): Promise<Outcome<void>>;
  sendPhoto(photo: Buffer, caption: string, filename?: string): Promise<Outcome<void>>;
  sendDocument(document: Buffer, filename: string, caption?: string): Promise<Outcome<void>>;
}

export class TelegramNotifier implements Notifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramOptions) {
    this.baseUrl = (options.apiBaseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  static isConfigured(options: { botToken?: string; userId?: string }) {
    return Boolean(options.botToken && options.userId);
  }

  async sendText(text: string): Promise<Outcome<void>> {
    return this.call('sendMessage', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ chat_id: this.options.userId, text, parse_mode: 'Markdown' })
    });
  }

  async sendPhoto(photo: Buffer, caption: string, filename = `alert_${Date.now()}.jpg`): Promise<Outcome<void>> {
    const form = new FormData();
    form.append('chat_id', this.options.userId);
    form.append('caption', caption);
    form.append('photo', new Blob([photo], { type: 'image/jpeg' }), filename);
    return this.call('sendPhoto', { method: 'POST', body: form });
  }

  async sendDocument(document: Buffer, filename: string, caption?: string): Promise<Outcome<void>> {
    const form = new FormData();
    form.append('chat_id', this.options.userId);
    if (caption) {
      form.append('caption', caption);
    }
    form.append('document', new Blob([document], { type: 'application/pdf' }), filename);
    return this.call('sendDocument', { method: 'POST', body: form });
  }

  private async call(method: string, init: RequestInit): Promise<Outcome<void>> {
    const url = `${this.baseUrl}/bot${this.options.botToken}/${method}`;
    try {
      const response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        const body = await response.text();
        return failure(new Error(`Telegram ${method} failed with ${response.status}: ${body}`));
      }
      return success(undefined);
    } catch (error) {
      return failure(error);
    }
  }
}

export function createTelegramNotifier(config: {
  enabled: boolean;
  botToken: string;
  userId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
}): Notifier | null {
  if (!config.enabled || !TelegramNotifier.isConfigured(config)) {
    return null;
  }
  return new TelegramNotifier({
    botToken: config.botToken,
    userId: config.userId,
    apiBaseUrl: config.apiBaseUrl,
    timeoutMs: config.timeoutMs
  });
}
