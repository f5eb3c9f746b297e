import { describe, expect, it } from 'vitest';
import { AlertServiceClient, deriveWebsocketUrl } from '../src/live/alertService.js';
import { createTelegramNotifier, TelegramNotifier } from '../src/notify/telegram.js';
import { createFakeFetch } from './helpers/fakes.js';

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('AlertServiceClient', () => {
  it('registers a stream and returns its id', async () => {
    const { requests, fetch } = createFakeFetch(() => json({ id: 12, liveStreamUrl: 'rtsp://m/a' }));
    const client = new AlertServiceClient({ baseUrl: 'http://alerts.test:5010/', fetch });

    expect(await client.registerStream('rtsp://m/a', 'Unit Camera')).toEqual({ ok: true, value: '12' });
    expect(requests).toEqual([
      {
        url: 'http://alerts.test:5010/api/v1/live-stream',
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"liveStreamUrl":"rtsp://m/a","description":"Unit Camera"}'
      }
    ]);
  });

  it('pushes rules and deregisters by id', async () => {
    const { requests, fetch } = createFakeFetch(() => new Response('', { status: 200 }));
    const client = new AlertServiceClient({ baseUrl: 'http://alerts.test:5010', fetch });

    expect(await client.setRules('stream 1', ['smoke', 'person'])).toEqual({ ok: true, value: undefined });
    expect(await client.deregisterStream('stream 1')).toEqual({ ok: true, value: undefined });
    expect(requests.map(request => `${request.method} ${request.url}`)).toEqual([
      'POST http://alerts.test:5010/api/v1/alerts',
      'DELETE http://alerts.test:5010/api/v1/live-stream/stream%201'
    ]);
    expect(requests[0]?.body).toBe('{"alerts":["smoke","person"],"id":"stream 1"}');
    expect(requests[1]?.body).toBeUndefined();
  });

  it('reports the status and body of a failed call', async () => {
    const { fetch } = createFakeFetch(() => new Response('busy', { status: 503 }));
    const client = new AlertServiceClient({ baseUrl: 'http://alerts.test:5010', fetch });

    const result = await client.registerStream('rtsp://m/a', 'Unit Camera');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('POST /api/v1/live-stream failed with 503: busy');
    }
  });

  it('rejects a registration reply without an id', async () => {
    const { fetch } = createFakeFetch(() => json({ status: 'ok' }));
    const result = await new AlertServiceClient({ baseUrl: 'http://alerts.test:5010', fetch }).registerStream('u', 'd');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Stream registration response carried no id');
    }
  });

  it('lists streams and skips entries without an id', async () => {
    const { fetch } = createFakeFetch(() =>
      json([{ id: 'a', liveStreamUrl: 'rtsp://m/a', description: 'A' }, { liveStreamUrl: 'rtsp://m/b' }, { id: 3 }])
    );
    const client = new AlertServiceClient({ baseUrl: 'http://alerts.test:5010', fetch });

    expect(await client.listStreams()).toEqual({
      ok: true,
      value: [{ id: 'a', liveStreamUrl: 'rtsp://m/a', description: 'A' }, { id: '3' }]
    });
  });

  it('turns a network error into a failed outcome', async () => {
    const { fetch } = createFakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const result = await new AlertServiceClient({ baseUrl: 'http://alerts.test:5010', fetch }).listStreams();
    expect(result).toEqual({ ok: false, error: new TypeError('fetch failed') });
  });
});

describe('deriveWebsocketUrl', () => {
  it('maps the service URL onto the alerts channel', () => {
    expect(deriveWebsocketUrl('http://host:5010')).toBe('ws://host:5010/api/v1/alerts/ws');
    expect(deriveWebsocketUrl('https://alerts.example/base/')).toBe('wss://alerts.example/base/api/v1/alerts/ws');
  });
});

describe('TelegramNotifier', () => {
  it('sends text messages as Markdown to the configured chat', async () => {
    const { requests, fetch } = createFakeFetch(() => json({ ok: true }));
    const notifier = new TelegramNotifier({
      botToken: 'test-token',
      userId: '42',
      apiBaseUrl: 'https://telegram.invalid/',
      fetch
    });

    expect(await notifier.sendText('Patrol done')).toEqual({ ok: true, value: undefined });
    expect(requests[0]?.url).toBe('https://telegram.invalid/bottest-token/sendMessage');
    expect(requests[0]?.body).toBe('{"chat_id":"42","text":"Patrol done","parse_mode":"Markdown"}');
  });

  it('uploads photos and documents as multipart forms', async () => {
    const { requests, fetch } = createFakeFetch(() => json({ ok: true }));
    const notifier = new TelegramNotifier({ botToken: 'test-token', userId: '42', apiBaseUrl: 'https://telegram.invalid', fetch });

    await notifier.sendPhoto(Buffer.from('jpeg'), 'Alert', 'alert_1.jpg');
    await notifier.sendDocument(Buffer.from('%PDF'), 'Patrol_Report.pdf');

    const [photoRequest, documentRequest] = requests;
    expect(photoRequest?.url).toBe('https://telegram.invalid/bottest-token/sendPhoto');
    const photoForm = photoRequest?.body;
    if (!(photoForm instanceof FormData)) {
      throw new Error('expected a multipart body');
    }
    expect(photoForm.get('chat_id')).toBe('42');
    expect(photoForm.get('caption')).toBe('Alert');
    const photo = photoForm.get('photo');
    expect(photo instanceof File ? photo.name : null).toBe('alert_1.jpg');

    const documentForm = documentRequest?.body;
    if (!(documentForm instanceof FormData)) {
      throw new Error('expected a multipart body');
    }
    expect(documentForm.get('caption')).toBeNull();
    const document = documentForm.get('document');
    expect(document instanceof File ? [document.name, document.type, await document.text()] : null).toEqual([
      'Patrol_Report.pdf',
      'application/pdf',
      '%PDF'
    ]);
  });

  it('reports API errors', async () => {
    const { fetch } = createFakeFetch(() => new Response('Unauthorized', { status: 401 }));
    const notifier = new TelegramNotifier({ botToken: 'test-token', userId: '42', fetch });
    const result = await notifier.sendText('x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Telegram sendMessage failed with 401: Unauthorized');
    }
  });

  it('is only built when enabled and complete', () => {
    expect(createTelegramNotifier({ enabled: false, botToken: 'test-token', userId: '42' })).toBeNull();
    expect(createTelegramNotifier({ enabled: true, botToken: '', userId: '42' })).toBeNull();
    expect(createTelegramNotifier({ enabled: true, botToken: 'test-token', userId: '42' })).toBeInstanceOf(
      TelegramNotifier
    );
  });
});
