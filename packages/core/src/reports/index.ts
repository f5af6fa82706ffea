/**
 * Reports Domain
 */

export { ReportRepository } from './report-repository.js';
export { resolvePeriod, formatPeriod, toIsoDate, trailingWindowStart } from './period.js';
export type { Period } from './period.js';
export type {
  MonthlySummary,
  CategoryTotal,
  CategoryBreakdown,
  MonthlyTrend,
  TypeTotals,
} from './report-types.js';
