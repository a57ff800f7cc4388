import { ExpenseRecord, StoredExpense } from '../../domain/entities/Expense.js';
import { ReportWindow } from '../../domain/entities/ReportWindow.js';

export const DEFAULT_QUERY_LIMIT = 20;

export interface ExpenseRepositoryPort {
  /** Stores the record readable and writable by its owner only. */
  create(record: ExpenseRecord): Promise<StoredExpense>;
  /** Records of one owner created within the inclusive window, at most `limit` of them. */
  query(ownerId: number, window: ReportWindow, limit?: number): Promise<StoredExpense[]>;
}
