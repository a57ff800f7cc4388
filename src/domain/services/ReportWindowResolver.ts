import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { ReportSelector, ReportWindow } from '../entities/ReportWindow.js';

dayjs.extend(utc);

/**
 * Maps a report selector to an inclusive window ending today 23:59:59.999.
 * Calendar days are UTC days, matching the UTC timestamps expenses are written with.
 * Unknown selectors resolve to the daily window.
 */
export const resolveReportWindow = (selector: ReportSelector | string, now: Date): ReportWindow => {
  const today = dayjs.utc(now);
  const end = today.endOf('day');

  let start = today.startOf('day');

  if (selector === 'weekly') {
    // dayjs counts weekdays from Sunday = 0
    const daysSinceMonday = (today.day() + 6) % 7;
    start = start.subtract(daysSinceMonday, 'day');
  } else if (selector === 'monthly') {
    start = today.startOf('month');
  }

  return { start: start.toISOString(), end: end.toISOString() };
};
