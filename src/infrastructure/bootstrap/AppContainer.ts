import { Client, Databases } from 'node-appwrite';
import OpenAI from 'openai';
import { ChatTransportPort } from '../../application/ports/ChatTransportPort.js';
import { ExpenseExtractorPort } from '../../application/ports/ExpenseExtractorPort.js';
import { ExpenseRepositoryPort } from '../../application/ports/ExpenseRepositoryPort.js';
import { AttachmentFetcher } from '../../application/services/AttachmentFetcher.js';
import { ReportService } from '../../application/services/ReportService.js';
import { WebhookOrchestrator } from '../../application/services/WebhookOrchestrator.js';
import { OpenAIExpenseExtractor } from '../adapters/extraction/OpenAIExpenseExtractor.js';
import { AppwriteExpenseRepository } from '../adapters/storage/AppwriteExpenseRepository.js';
import { InMemoryExpenseRepository } from '../adapters/storage/InMemoryExpenseRepository.js';
import { TelegramBotApiTransport } from '../adapters/telegram/TelegramBotApiTransport.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { HttpTransport, createFetchTransport } from '../http/FetchTransport.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  http?: HttpTransport;
  transport?: ChatTransportPort;
  extractor?: ExpenseExtractorPort;
  repository?: ExpenseRepositoryPort;
  now?: () => Date;
}

/**
 * Builds every long-lived client once. Components receive them by reference,
 * so no request re-authenticates against the store or the extraction service.
 */
export class AppContainer {
  readonly config: AppConfig;
  private readonly appwriteLive: boolean;

  readonly transport: ChatTransportPort;
  readonly extractor: ExpenseExtractorPort;
  readonly repository: ExpenseRepositoryPort;
  readonly attachments: AttachmentFetcher;
  readonly reports: ReportService;
  readonly orchestrator: WebhookOrchestrator;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const timeoutMs = this.config.app.requestTimeoutMs;

    this.transport =
      overrides.transport ??
      new TelegramBotApiTransport(this.config.telegram, overrides.http ?? createFetchTransport(timeoutMs));

    this.extractor =
      overrides.extractor ??
      new OpenAIExpenseExtractor(
        new OpenAI({
          baseURL: this.config.extraction.baseUrl,
          apiKey: this.config.extraction.apiKey,
          timeout: timeoutMs,
          maxRetries: 0,
        }),
        { model: this.config.extraction.model },
      );

    if (overrides.repository) {
      this.repository = overrides.repository;
      this.appwriteLive = overrides.repository instanceof AppwriteExpenseRepository;
    } else {
      const { endpoint, projectId, apiKey, databaseId, collectionId } = this.config.appwrite;

      if (endpoint && projectId && apiKey) {
        const client = new Client().setEndpoint(endpoint).setProject(projectId).setKey(apiKey);
        this.repository = new AppwriteExpenseRepository(new Databases(client), { databaseId, collectionId, timeoutMs });
        this.appwriteLive = true;
      } else {
        console.warn('⚠️ Appwrite credentials are not configured, expenses are kept in memory only.');
        this.repository = new InMemoryExpenseRepository();
        this.appwriteLive = false;
      }
    }

    this.attachments = new AttachmentFetcher(this.transport);
    this.reports = new ReportService(this.repository, this.config.app.currencySymbol);
    this.orchestrator = new WebhookOrchestrator(
      this.transport,
      this.attachments,
      this.extractor,
      this.repository,
      this.reports,
      { currencySymbol: this.config.app.currencySymbol, now: overrides.now },
    );
  }

  hasLiveAppwrite(): boolean {
    return this.appwriteLive;
  }
}
