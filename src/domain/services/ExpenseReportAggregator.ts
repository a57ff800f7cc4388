import { ExpenseRecord } from '../entities/Expense.js';

export interface CategoryTotal {
  category: string;
  total: number;
  percentage: number;
}

export interface ExpenseSummary {
  total: number;
  categories: CategoryTotal[];
}

export const aggregateExpenses = (expenses: Array<Pick<ExpenseRecord, 'category' | 'amount'>>): ExpenseSummary => {
  const categoryTotals = new Map<string, number>();
  let total = 0;

  expenses.forEach((expense) => {
    total += expense.amount;
    categoryTotals.set(expense.category, (categoryTotals.get(expense.category) ?? 0) + expense.amount);
  });

  const categories = Array.from(categoryTotals.entries())
    .map(([category, categoryTotal]) => ({
      category,
      total: categoryTotal,
      percentage: total > 0 ? (categoryTotal / total) * 100 : 0,
    }))
    .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category));

  return { total, categories };
};

/** Half-up rounding to a fixed number of decimals, rendered as a string. */
export const roundHalfUp = (value: number, decimals: number): string => {
  // 15 significant digits drop binary noise such as 28.749999999999996 before the decimal point is shifted.
  const cleaned = Number(value.toPrecision(15));
  const text = String(cleaned);

  if (text.includes('e')) {
    return cleaned.toFixed(decimals);
  }

  const shifted = Math.round(Number(`${text}e${decimals}`));
  return Number(`${shifted}e-${decimals}`).toFixed(decimals);
};
