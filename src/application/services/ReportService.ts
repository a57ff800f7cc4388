import { ReportSelector } from '../../domain/entities/ReportWindow.js';
import { aggregateExpenses } from '../../domain/services/ExpenseReportAggregator.js';
import { resolveReportWindow } from '../../domain/services/ReportWindowResolver.js';
import { noExpensesMessage, reportMessage } from '../messages/BotMessages.js';
import { DEFAULT_QUERY_LIMIT, ExpenseRepositoryPort } from '../ports/ExpenseRepositoryPort.js';
import { BotCommand } from './InputClassifier.js';

export type ReportCommand = Exclude<BotCommand, 'start'>;

const selectorByCommand: Record<ReportCommand, ReportSelector> = {
  daily: 'daily',
  week: 'weekly',
  month: 'monthly',
};

// "week" -> "Week"
export const periodLabel = (command: ReportCommand): string => command.charAt(0).toUpperCase() + command.slice(1);

export class ReportService {
  constructor(
    private readonly repository: ExpenseRepositoryPort,
    private readonly currencySymbol: string,
  ) {}

  /** Builds the report message for one user; repository failures propagate to the caller. */
  async buildReport(ownerId: number, command: ReportCommand, now: Date): Promise<string> {
    const window = resolveReportWindow(selectorByCommand[command], now);
    const label = periodLabel(command);

    const expenses = await this.repository.query(ownerId, window, DEFAULT_QUERY_LIMIT);

    if (expenses.length === 0) {
      return noExpensesMessage(label);
    }

    return reportMessage(label, aggregateExpenses(expenses), this.currencySymbol);
  }
}
