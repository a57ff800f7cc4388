import { ExpenseRecord } from '../../domain/entities/Expense.js';
import { ExpenseSummary, roundHalfUp } from '../../domain/services/ExpenseReportAggregator.js';

const BYTES_PER_MIB = 1024 * 1024;

// Backticks would close the inline code spans the values are rendered in.
const inlineCode = (value: string): string => `\`${value.replace(/`/g, "'")}\``;

// Upstream error text lands in free Markdown, where a lone `_` or `*` makes Telegram reject the message.
export const escapeMarkdown = (value: string): string => value.replace(/[_*`[]/g, '\\$&');

export const welcomeMessage = (): string =>
  [
    '👋 *Welcome to your AI Expense Tracker!* 📊',
    '',
    'I help you track your spending effortlessly.',
    '',
    '*1. Record an Expense:*',
    '   - 📸 *Upload* any photo of a bill or receipt.',
    '   - 💬 *Type* in natural language (e.g., `220 pizza`, `paid 1500 for flight ticket`).',
    '',
    '*2. Get Reports (Use the menu or type):*',
    "   - /daily: See today's spending.",
    "   - /week: See this week's spending.",
    "   - /month: See this month's spending.",
  ].join('\n');

export const fileTooLargeMessage = (sizeBytes: number, limitBytes: number): string =>
  `❌ *File Too Large!* The uploaded file size (${roundHalfUp(sizeBytes / BYTES_PER_MIB, 2)} MB) exceeds the limit of ${Math.round(
    limitBytes / BYTES_PER_MIB,
  )} MB. Please send a smaller file.`;

export const textTooLongMessage = (length: number, limit: number): string =>
  `❌ *Text Too Long!* Your input has ${length} characters, exceeding the limit of ${limit}. Please summarize your expense details.`;

export const captionTooLongMessage = (length: number, limit: number): string =>
  `❌ *Caption Too Long!* Your caption has ${length} characters, exceeding the limit of ${limit}. Please shorten your description.`;

export const inputErrorMessage = (): string =>
  "*Input Error*: Please send a bill image or write your expense (e.g., '150 food pizza').";

export const downloadFailedMessage = (detail: string): string =>
  `⚠️ *File Download Error*: Could not retrieve file from Telegram. Details: ${escapeMarkdown(detail)}`;

export const extractionFailedMessage = (reason: string): string =>
  `*Extraction Failed!* 😭 \n_Details_: ${escapeMarkdown(reason)}`;

export const saveFailedMessage = (detail: string): string =>
  `⚠️ *Save Error*: The expense was read but could not be stored. Please send it again. Details: ${escapeMarkdown(detail)}`;

export const saveUncertainMessage = (detail: string): string =>
  `⚠️ *Save Pending*: The store did not confirm the expense in time, so it may still have been saved. Check /daily before sending it again. Details: ${escapeMarkdown(detail)}`;

export const expenseSavedMessage = (
  expense: Pick<ExpenseRecord, 'category' | 'amount' | 'description'>,
  currencySymbol: string,
): string =>
  [
    '✅ *Expense Saved!* ',
    '',
    `*Category*: ${inlineCode(expense.category)}`,
    `*Amount*: ${currencySymbol}${inlineCode(roundHalfUp(expense.amount, 2))}`,
    `*Description*: ${inlineCode(expense.description)}`,
  ].join('\n');

export const noExpensesMessage = (periodLabel: string): string =>
  `😔 No expenses found for the *${periodLabel}* period.`;

export const reportFailedMessage = (detail: string): string =>
  `⚠️ *Report Error*: Failed to fetch your expenses. Details: ${escapeMarkdown(detail)}`;

export const reportMessage = (periodLabel: string, summary: ExpenseSummary, currencySymbol: string): string => {
  const lines = [
    `📊 *${periodLabel} Expense Report* 📊`,
    `Total Expenses: ${currencySymbol}${inlineCode(roundHalfUp(summary.total, 2))}`,
    '',
    '*Category Breakdown:*',
  ];

  summary.categories.forEach((entry) => {
    lines.push(
      ` • ${entry.category}: ${currencySymbol}${inlineCode(roundHalfUp(entry.total, 2))} (${inlineCode(
        roundHalfUp(entry.percentage, 1),
      )}%)`,
    );
  });

  return lines.join('\n');
};
