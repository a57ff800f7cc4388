export const EXPENSE_CATEGORIES = [
  'Food',
  'Travel',
  'Study',
  'Shopping',
  'Utility',
  'Subscription',
  'Other',
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

// Returned by the extraction service when it cannot read an expense. Never persisted.
export const EXTRACTION_ERROR_CATEGORY = 'ERROR';

export const isExpenseCategory = (value: string): value is ExpenseCategory =>
  (EXPENSE_CATEGORIES as readonly string[]).includes(value);

export interface ExpenseRecord {
  ownerId: number;
  category: ExpenseCategory;
  description: string;
  amount: number;
  createdAt: string; // ISO timestamp, UTC
}

export interface StoredExpense extends ExpenseRecord {
  id: string;
}
