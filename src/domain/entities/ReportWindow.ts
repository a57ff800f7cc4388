export type ReportSelector = 'daily' | 'weekly' | 'monthly';

export interface ReportWindow {
  start: string; // ISO timestamp, inclusive
  end: string; // ISO timestamp, inclusive
}
