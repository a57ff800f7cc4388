import { ExpenseRecord } from '../../domain/entities/Expense.js';
import { DownloadError, ExtractionError, PersistenceError } from '../../domain/errors/ExpenseBotErrors.js';
import { parseAmount } from '../../domain/services/AmountParser.js';
import { PromptPart } from '../dto/ExtractionResultDTO.js';
import { TelegramMessageDTO, TelegramUpdateSchema } from '../dto/TelegramUpdateDTO.js';
import {
  downloadFailedMessage,
  expenseSavedMessage,
  extractionFailedMessage,
  reportFailedMessage,
  saveFailedMessage,
  saveUncertainMessage,
  welcomeMessage,
} from '../messages/BotMessages.js';
import { ChatTransportPort } from '../ports/ChatTransportPort.js';
import { ExpenseExtractorPort } from '../ports/ExpenseExtractorPort.js';
import { ExpenseRepositoryPort } from '../ports/ExpenseRepositoryPort.js';
import { AttachmentFetcher } from './AttachmentFetcher.js';
import { BotCommand, classifyMessage } from './InputClassifier.js';
import { ReportService } from './ReportService.js';

export const DEFAULT_IMAGE_PROMPT = 'Extract expense details from this bill/receipt image.';

export type WebhookOutcome = { status: 'ok' } | { status: 'error'; message: string };

export interface WebhookOrchestratorOptions {
  currencySymbol: string;
  now?: () => Date;
}

const OK: WebhookOutcome = { status: 'ok' };

const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : `UnknownError: ${String(error)}`;

/**
 * Handles one webhook delivery end to end. Known failures become a chat message
 * at the point they happen; anything else is logged and returned as an error
 * outcome. The transport is acknowledged either way.
 */
export class WebhookOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly transport: ChatTransportPort,
    private readonly attachments: AttachmentFetcher,
    private readonly extractor: ExpenseExtractorPort,
    private readonly repository: ExpenseRepositoryPort,
    private readonly reports: ReportService,
    private readonly options: WebhookOrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handleUpdate(update: unknown): Promise<WebhookOutcome> {
    try {
      const parsed = TelegramUpdateSchema.parse(update);

      // Edited messages, callbacks and channel posts are acknowledged silently.
      if (!parsed.message) {
        return OK;
      }

      await this.handleMessage(parsed.message);
      return OK;
    } catch (error) {
      const message = `An unexpected error occurred: ${describeError(error)}`;
      console.error(`❌ ${message}`);
      return { status: 'error', message };
    }
  }

  private async handleMessage(message: TelegramMessageDTO): Promise<void> {
    const chatId = message.chat.id;
    const ownerId = message.from.id;
    const input = classifyMessage(message);

    switch (input.kind) {
      case 'rejected':
        console.log(`🚫 Rejected input from ${ownerId}: ${input.error.message}`);
        return this.transport.sendMessage(chatId, input.error.message);

      case 'command':
        return this.handleCommand(chatId, ownerId, input.command);

      case 'attachment': {
        let image: Buffer;

        try {
          image = await this.attachments.fetch(input.fileId);
        } catch (error) {
          if (error instanceof DownloadError) {
            console.warn(`⚠️ Download of ${input.source} failed for ${ownerId}: ${error.message}`);
            return this.transport.sendMessage(chatId, downloadFailedMessage(error.message));
          }

          throw error;
        }

        return this.recordExpense(chatId, ownerId, [
          { type: 'image', data: image, mimeType: input.mimeType },
          { type: 'text', text: input.caption ?? DEFAULT_IMAGE_PROMPT },
        ]);
      }

      case 'text':
        return this.recordExpense(chatId, ownerId, [{ type: 'text', text: input.text }]);
    }
  }

  private async handleCommand(chatId: number, ownerId: number, command: BotCommand): Promise<void> {
    if (command === 'start') {
      return this.transport.sendMessage(chatId, welcomeMessage());
    }

    let report: string;

    try {
      report = await this.reports.buildReport(ownerId, command, this.now());
    } catch (error) {
      if (error instanceof PersistenceError) {
        console.warn(`⚠️ /${command} report failed for ${ownerId}: ${error.message}`);
        return this.transport.sendMessage(chatId, reportFailedMessage(error.message));
      }

      throw error;
    }

    return this.transport.sendMessage(chatId, report);
  }

  private async recordExpense(chatId: number, ownerId: number, parts: PromptPart[]): Promise<void> {
    const createdAt = this.now().toISOString();
    let expense: ExpenseRecord;

    try {
      expense = await this.extractExpense(parts, ownerId, createdAt);
    } catch (error) {
      if (error instanceof ExtractionError) {
        console.warn(`⚠️ Extraction failed for ${ownerId}: ${error.message}`);
        return this.transport.sendMessage(chatId, extractionFailedMessage(error.message));
      }

      throw error;
    }

    try {
      const stored = await this.repository.create(expense);
      console.log(`✅ Saved expense ${stored.id} for ${ownerId}: ${stored.category} ${stored.amount}`);
    } catch (error) {
      if (error instanceof PersistenceError) {
        console.warn(`⚠️ Saving expense failed for ${ownerId}: ${error.message}`);
        const reply = error.outcomeUnknown ? saveUncertainMessage(error.message) : saveFailedMessage(error.message);
        return this.transport.sendMessage(chatId, reply);
      }

      throw error;
    }

    return this.transport.sendMessage(chatId, expenseSavedMessage(expense, this.options.currencySymbol));
  }

  private async extractExpense(parts: PromptPart[], ownerId: number, createdAt: string): Promise<ExpenseRecord> {
    const result = await this.extractor.extract(parts);

    if (!result.ok) {
      throw new ExtractionError(result.reason);
    }

    const amount = parseAmount(result.amount);

    if (amount === null) {
      throw new ExtractionError(`Could not read a valid amount from "${result.amount}".`);
    }

    return {
      ownerId,
      category: result.category,
      description: result.description,
      amount,
      createdAt,
    };
  }
}
