import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DownloadError } from '../src/domain/errors/ExpenseBotErrors.js';
import { TelegramBotApiTransport } from '../src/infrastructure/adapters/telegram/TelegramBotApiTransport.js';
import { HttpRequest, HttpResponse } from '../src/infrastructure/http/FetchTransport.js';

const jsonResponse = (status: number, body: unknown): HttpResponse => ({
  status,
  body: Buffer.from(JSON.stringify(body)),
});

const createHttp = (response: HttpResponse) => vi.fn(async (_input: HttpRequest): Promise<HttpResponse> => response);

const config = { botToken: 'test-token', apiBaseUrl: 'https://api.telegram.org/' };

describe('TelegramBotApiTransport', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends Markdown messages to the chat', async () => {
    const http = createHttp(jsonResponse(200, { ok: true }));

    await new TelegramBotApiTransport(config, http).sendMessage(10, 'hello');

    expect(http).toHaveBeenCalledWith({
      url: 'https://api.telegram.org/bottest-token/sendMessage',
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: 10, text: 'hello', parse_mode: 'Markdown' }),
    });
  });

  it('logs rejected messages without the bot token', async () => {
    const http = createHttp(jsonResponse(400, { ok: false, description: "Bad Request: can't parse entities" }));

    await expect(new TelegramBotApiTransport(config, http).sendMessage(10, '*broken')).resolves.toBeUndefined();

    expect(console.warn).toHaveBeenCalledWith(
      "⚠️ sendMessage to chat 10 responded with status 400: Bad Request: can't parse entities",
    );
  });

  it('resolves a file handle to its path', async () => {
    const http = createHttp(
      jsonResponse(200, { ok: true, result: { file_id: 'abc/1', file_path: 'photos/file_7.jpg', file_size: 1234 } }),
    );

    const filePath = await new TelegramBotApiTransport(config, http).resolveFilePath('abc/1');

    expect(filePath).toBe('photos/file_7.jpg');
    expect(http).toHaveBeenCalledWith({
      url: 'https://api.telegram.org/bottest-token/getFile?file_id=abc%2F1',
      method: 'GET',
    });
  });

  it('raises a DownloadError when getFile fails', async () => {
    const http = createHttp(jsonResponse(400, { ok: false, description: 'Bad Request: invalid file_id' }));
    const failure = new TelegramBotApiTransport(config, http).resolveFilePath('bogus');

    await expect(failure).rejects.toBeInstanceOf(DownloadError);
    await expect(failure).rejects.toThrow('getFile responded with status 400: Bad Request: invalid file_id');
  });

  it('raises a DownloadError when getFile returns no path', async () => {
    const http = createHttp(jsonResponse(200, { ok: true, result: { file_id: 'abc' } }));

    await expect(new TelegramBotApiTransport(config, http).resolveFilePath('abc')).rejects.toThrow(
      'getFile response did not include a file path',
    );
  });

  it('downloads file bytes from the file endpoint', async () => {
    const http = createHttp({ status: 200, body: Buffer.from('jpeg-bytes') });

    const data = await new TelegramBotApiTransport(config, http).downloadFile('photos/file_7.jpg');

    expect(data.toString()).toBe('jpeg-bytes');
    expect(http).toHaveBeenCalledWith({
      url: 'https://api.telegram.org/file/bottest-token/photos/file_7.jpg',
      method: 'GET',
    });
  });

  it('raises a DownloadError for failed downloads', async () => {
    const http = createHttp({ status: 404, body: Buffer.from('Not Found') });

    await expect(new TelegramBotApiTransport(config, http).downloadFile('photos/gone.jpg')).rejects.toThrow(
      new DownloadError('File download responded with status 404'),
    );
  });
});
