import { z } from 'zod';
import { ChatTransportPort } from '../../../application/ports/ChatTransportPort.js';
import { DownloadError } from '../../../domain/errors/ExpenseBotErrors.js';
import { HttpTransport, decodeJsonBody, isSuccessStatus } from '../../http/FetchTransport.js';

export interface TelegramBotApiConfig {
  botToken: string;
  apiBaseUrl: string;
}

const GetFileResponseSchema = z.object({
  ok: z.literal(true),
  result: z.object({
    file_id: z.string(),
    file_path: z.string(),
    file_size: z.number().optional(),
  }),
});

const describeFailure = (body: unknown): string => {
  const parsed = z.object({ description: z.string() }).safeParse(body);
  return parsed.success ? `: ${parsed.data.description}` : '';
};

// URLs embed the bot token, so they never appear in errors or logs.
export class TelegramBotApiTransport implements ChatTransportPort {
  private readonly methodUrl: string;
  private readonly fileUrl: string;

  constructor(
    config: TelegramBotApiConfig,
    private readonly http: HttpTransport,
  ) {
    const baseUrl = config.apiBaseUrl.replace(/\/+$/, '');
    this.methodUrl = `${baseUrl}/bot${config.botToken}`;
    this.fileUrl = `${baseUrl}/file/bot${config.botToken}`;
  }

  /** Fire and forget: a rejected message is logged, never retried. */
  async sendMessage(chatId: number, text: string): Promise<void> {
    const response = await this.http({
      url: `${this.methodUrl}/sendMessage`,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'Markdown' }),
    });

    if (!isSuccessStatus(response.status)) {
      console.warn(
        `⚠️ sendMessage to chat ${chatId} responded with status ${response.status}${describeFailure(
          decodeJsonBody(response.body),
        )}`,
      );
    }
  }

  async resolveFilePath(fileId: string): Promise<string> {
    const response = await this.http({
      url: `${this.methodUrl}/getFile?file_id=${encodeURIComponent(fileId)}`,
      method: 'GET',
    });
    const body = decodeJsonBody(response.body);

    if (!isSuccessStatus(response.status)) {
      throw new DownloadError(`getFile responded with status ${response.status}${describeFailure(body)}`);
    }

    const parsed = GetFileResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DownloadError('getFile response did not include a file path');
    }

    return parsed.data.result.file_path;
  }

  async downloadFile(filePath: string): Promise<Buffer> {
    const response = await this.http({ url: `${this.fileUrl}/${filePath}`, method: 'GET' });

    if (!isSuccessStatus(response.status)) {
      throw new DownloadError(`File download responded with status ${response.status}`);
    }

    return response.body;
  }
}
