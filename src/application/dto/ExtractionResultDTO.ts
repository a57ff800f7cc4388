import { z } from 'zod';
import { ExpenseCategory } from '../../domain/entities/Expense.js';

// Shape the extraction service is asked to answer with.
export const ExtractedExpenseSchema = z.object({
  Category: z.string(),
  Description: z.string(),
  Amount: z.string(),
});

export type ExtractedExpenseDTO = z.infer<typeof ExtractedExpenseSchema>;

export type ExtractionResult =
  | { ok: true; category: ExpenseCategory; description: string; amount: string }
  | { ok: false; reason: string };

export type PromptPart =
  | { type: 'image'; data: Buffer; mimeType: string }
  | { type: 'text'; text: string };
