import { ValidationError } from '../../domain/errors/ExpenseBotErrors.js';
import { TelegramMessageDTO } from '../dto/TelegramUpdateDTO.js';
import {
  captionTooLongMessage,
  fileTooLargeMessage,
  inputErrorMessage,
  textTooLongMessage,
} from '../messages/BotMessages.js';

export const MAX_FILE_SIZE_BYTES = 5 * 1024 * 1024;
export const MAX_TEXT_CHARS = 500;

const DEFAULT_IMAGE_MIME_TYPE = 'image/jpeg';

export const BOT_COMMANDS = ['start', 'daily', 'week', 'month'] as const;

export type BotCommand = (typeof BOT_COMMANDS)[number];

export type InputKind =
  | { kind: 'command'; command: BotCommand }
  | { kind: 'attachment'; source: 'photo' | 'document'; fileId: string; mimeType: string; caption?: string }
  | { kind: 'text'; text: string }
  | { kind: 'rejected'; error: ValidationError };

const commandPattern = /^\/([a-z]+)(?:@\w+)?$/;

const isBotCommand = (value: string): value is BotCommand => (BOT_COMMANDS as readonly string[]).includes(value);

// Counts code points, so an emoji is one character.
const characterCount = (text: string): number => Array.from(text).length;

const parseCommand = (text: string): BotCommand | null => {
  const match = commandPattern.exec(text.trim().toLowerCase());
  const name = match?.[1];

  return name && isBotCommand(name) ? name : null;
};

const rejected = (message: string): InputKind => ({ kind: 'rejected', error: new ValidationError(message) });

const classifyAttachment = (
  source: 'photo' | 'document',
  file: { file_id: string; file_size?: number },
  mimeType: string,
  caption: string | undefined,
): InputKind => {
  const size = file.file_size ?? 0;

  if (size > MAX_FILE_SIZE_BYTES) {
    return rejected(fileTooLargeMessage(size, MAX_FILE_SIZE_BYTES));
  }

  if (caption !== undefined && characterCount(caption) > MAX_TEXT_CHARS) {
    return rejected(captionTooLongMessage(characterCount(caption), MAX_TEXT_CHARS));
  }

  return { kind: 'attachment', source, fileId: file.file_id, mimeType, caption: caption || undefined };
};

/**
 * Decides how an inbound message is handled. The first matching rule wins:
 * a known slash command, a photo, a document, plain text. Size limits are
 * enforced here so nothing oversized is ever downloaded or sent for extraction.
 */
export const classifyMessage = (message: TelegramMessageDTO): InputKind => {
  if (message.text?.trim().startsWith('/')) {
    const command = parseCommand(message.text);

    if (command) {
      return { kind: 'command', command };
    }
  }

  if (message.photo && message.photo.length > 0) {
    // Telegram lists photo sizes smallest first.
    const largest = message.photo[message.photo.length - 1];
    return classifyAttachment('photo', largest, DEFAULT_IMAGE_MIME_TYPE, message.caption);
  }

  if (message.document) {
    const mimeType = message.document.mime_type?.startsWith('image/')
      ? message.document.mime_type
      : DEFAULT_IMAGE_MIME_TYPE;
    return classifyAttachment('document', message.document, mimeType, message.caption);
  }

  if (message.text !== undefined) {
    const length = characterCount(message.text);

    if (length > MAX_TEXT_CHARS) {
      return rejected(textTooLongMessage(length, MAX_TEXT_CHARS));
    }

    if (message.text.trim()) {
      return { kind: 'text', text: message.text };
    }
  }

  return rejected(inputErrorMessage());
};
