import crypto from 'node:crypto';
import { DEFAULT_QUERY_LIMIT, ExpenseRepositoryPort } from '../../../application/ports/ExpenseRepositoryPort.js';
import { ExpenseRecord, StoredExpense } from '../../../domain/entities/Expense.js';
import { ReportWindow } from '../../../domain/entities/ReportWindow.js';

/** Process-local store for running without Appwrite credentials. Nothing survives a restart. */
export class InMemoryExpenseRepository implements ExpenseRepositoryPort {
  private readonly expenses = new Map<string, StoredExpense>();

  async create(record: ExpenseRecord): Promise<StoredExpense> {
    const stored: StoredExpense = { ...record, id: crypto.randomUUID() };
    this.expenses.set(stored.id, stored);
    return stored;
  }

  async query(ownerId: number, window: ReportWindow, limit: number = DEFAULT_QUERY_LIMIT): Promise<StoredExpense[]> {
    // ISO timestamps with the same offset marker compare correctly as strings.
    return Array.from(this.expenses.values())
      .filter((expense) => expense.ownerId === ownerId)
      .filter((expense) => expense.createdAt >= window.start && expense.createdAt <= window.end)
      .slice(0, limit);
  }
}
