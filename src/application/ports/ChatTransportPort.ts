export interface ChatTransportPort {
  sendMessage(chatId: number, text: string): Promise<void>;
  resolveFilePath(fileId: string): Promise<string>;
  downloadFile(filePath: string): Promise<Buffer>;
}
