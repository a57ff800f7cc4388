import { ID, Permission, Query, Role } from 'node-appwrite';
import { z } from 'zod';
import { DEFAULT_QUERY_LIMIT, ExpenseRepositoryPort } from '../../../application/ports/ExpenseRepositoryPort.js';
import { ExpenseRecord, StoredExpense, isExpenseCategory } from '../../../domain/entities/Expense.js';
import { ReportWindow } from '../../../domain/entities/ReportWindow.js';
import { PersistenceError } from '../../../domain/errors/ExpenseBotErrors.js';
import { DEFAULT_TIMEOUT_MS, DeadlineExceededError, withDeadline } from '../../http/FetchTransport.js';

/** The part of the node-appwrite `Databases` service this repository calls. */
export interface AppwriteDocumentsClient {
  createDocument(
    databaseId: string,
    collectionId: string,
    documentId: string,
    data: Record<string, unknown>,
    permissions?: string[],
  ): Promise<{ $id: string }>;
  listDocuments(databaseId: string, collectionId: string, queries?: string[]): Promise<{ documents: unknown[] }>;
}

export interface AppwriteExpenseRepositoryConfig {
  databaseId: string;
  collectionId: string;
  timeoutMs?: number;
}

const ExpenseDocumentSchema = z.object({
  $id: z.string(),
  telegram_user_id: z.number(),
  category: z.string(),
  description: z.string(),
  amount: z.number(),
  created_at: z.string(),
});

type ExpenseDocument = z.infer<typeof ExpenseDocumentSchema>;

const toStoredExpense = (document: ExpenseDocument): StoredExpense => ({
  id: document.$id,
  ownerId: document.telegram_user_id,
  category: isExpenseCategory(document.category) ? document.category : 'Other',
  description: document.description,
  amount: document.amount,
  createdAt: document.created_at,
});

export class AppwriteExpenseRepository implements ExpenseRepositoryPort {
  private readonly timeoutMs: number;

  constructor(
    private readonly documents: AppwriteDocumentsClient,
    private readonly config: AppwriteExpenseRepositoryConfig,
  ) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async create(record: ExpenseRecord): Promise<StoredExpense> {
    const owner = Role.user(String(record.ownerId));

    try {
      const created = await withDeadline(
        this.documents.createDocument(
          this.config.databaseId,
          this.config.collectionId,
          ID.unique(),
          {
            telegram_user_id: record.ownerId,
            category: record.category,
            description: record.description,
            amount: record.amount,
            created_at: record.createdAt,
          },
          [Permission.read(owner), Permission.write(owner)],
        ),
        this.timeoutMs,
        'Appwrite createDocument',
      );

      return { ...record, id: created.$id };
    } catch (error) {
      throw new PersistenceError(
        `Failed to save expense: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error, outcomeUnknown: error instanceof DeadlineExceededError },
      );
    }
  }

  async query(ownerId: number, window: ReportWindow, limit: number = DEFAULT_QUERY_LIMIT): Promise<StoredExpense[]> {
    let documents: unknown[];

    try {
      const result = await withDeadline(
        this.documents.listDocuments(this.config.databaseId, this.config.collectionId, [
          Query.equal('telegram_user_id', ownerId),
          Query.greaterThanEqual('created_at', window.start),
          Query.lessThanEqual('created_at', window.end),
          Query.limit(limit),
        ]),
        this.timeoutMs,
        'Appwrite listDocuments',
      );
      documents = result.documents;
    } catch (error) {
      throw new PersistenceError(
        `Failed to fetch expenses: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      );
    }

    const expenses: StoredExpense[] = [];

    for (const document of documents) {
      const parsed = ExpenseDocumentSchema.safeParse(document);

      if (parsed.success) {
        expenses.push(toStoredExpense(parsed.data));
      } else {
        console.warn('⚠️ Skipping malformed expense document:', parsed.error.issues.map((issue) => issue.path.join('.')));
      }
    }

    return expenses;
  }
}
