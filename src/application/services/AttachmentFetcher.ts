import { DownloadError } from '../../domain/errors/ExpenseBotErrors.js';
import { ChatTransportPort } from '../ports/ChatTransportPort.js';

export class AttachmentFetcher {
  constructor(private readonly transport: ChatTransportPort) {}

  /** Resolves a transport file handle to its bytes. Every failure surfaces as a DownloadError. */
  async fetch(fileId: string): Promise<Buffer> {
    try {
      const filePath = await this.transport.resolveFilePath(fileId);
      return await this.transport.downloadFile(filePath);
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }

      const detail = error instanceof Error ? error.message : 'Unknown error';
      throw new DownloadError(detail, { cause: error });
    }
  }
}
