import { failure, success, type Outcome } from '../utils/outcome.js';

export type ServiceStream = {
  id: string;
  liveStreamUrl?: string;
  description?: string;
};

export interface AlertServiceApi {
  registerStream(liveStreamUrl: string, description: string): Promise<Outcome<string>>;
  setRules(streamId: string, rules: string[]): Promise<Outcome<void>>;
  deregisterStream(streamId: string): Promise<Outcome<void>>;
  listStreams(): Promise<Outcome<ServiceStream[]>>;
}

export type AlertServiceClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

// `http://host:5010` becomes `ws://host:5010/api/v1/alerts/ws`
export function deriveWebsocketUrl(serviceUrl: string): string {
  const url = new URL(serviceUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/api/v1/alerts/ws`;
  url.search = '';
  return url.toString();
}

function readStream(value: unknown): ServiceStream | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const id = Reflect.get(value, 'id');
  if (typeof id !== 'string' && typeof id !== 'number') {
    return null;
  }
  const stream: ServiceStream = { id: String(id) };
  const liveStreamUrl = Reflect.get(value, 'liveStreamUrl');
  const description = Reflect.get(value, 'description');
  if (typeof liveStreamUrl === 'string') {
    stream.liveStreamUrl = liveStreamUrl;
  }
  if (typeof description === 'string') {
    stream.description = description;
  }
  return stream;
}

export class AlertServiceClient implements AlertServiceApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AlertServiceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async registerStream(liveStreamUrl: string, description: string): Promise<Outcome<string>> {
    const response = await this.request('POST', '/api/v1/live-stream', { liveStreamUrl, description });
    if (!response.ok) {
      return response;
    }
    const stream = readStream(response.value);
    return stream ? success(stream.id) : failure(new Error('Stream registration response carried no id'));
  }

  async setRules(streamId: string, rules: string[]): Promise<Outcome<void>> {
    const response = await this.request('POST', '/api/v1/alerts', { alerts: rules, id: streamId });
    return response.ok ? success(undefined) : response;
  }

  async deregisterStream(streamId: string): Promise<Outcome<void>> {
    const response = await this.request('DELETE', `/api/v1/live-stream/${encodeURIComponent(streamId)}`);
    return response.ok ? success(undefined) : response;
  }

  async listStreams(): Promise<Outcome<ServiceStream[]>> {
    const response = await this.request('GET', '/api/v1/live-stream');
    if (!response.ok) {
      return response;
    }
    if (!Array.isArray(response.value)) {
      return failure(new Error('Stream list response is not an array'));
    }
    const streams: ServiceStream[] = [];
    for (const entry of response.value) {
      const stream = readStream(entry);
      if (stream) {
        streams.push(stream);
      }
    }
    return success(streams);
  }

  private async request(method: string, pathname: string, body?: unknown): Promise<Outcome<unknown>> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        method,
        headers: body === undefined ? undefined : { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const text = await response.text();
      if (!response.ok) {
        return failure(new Error(`${method} ${pathname} failed with ${response.status}: ${text}`));
      }
      if (!text) {
        return success(null);
      }
      try {
        return success(JSON.parse(text));
      } catch {
        return success(text);
      }
    } catch (error) {
      return failure(error);
    }
  }
}
