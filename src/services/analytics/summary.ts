import { PENDING_STATUS } from '../../config/constants';
import { GroupTotal, MonthlyTotal, SummaryStats } from '../../types/analytics';
import { ExpenseRow } from '../../types/expense';
import { monthKey } from '../../utils/date';

export function summarize(rows: readonly ExpenseRow[]): SummaryStats {
  const totalSum = rows.reduce((sum, row) => sum + row.total, 0);

  return {
    count: rows.length,
    totalSum,
    mean: rows.length > 0 ? totalSum / rows.length : 0,
    pendingCount: rows.filter((row) => row.paymentStatus === PENDING_STATUS).length,
  };
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function groupTotals<T extends ExpenseRow>(rows: readonly T[], keyOf: (row: T) => string): GroupTotal[] {
  const groups = new Map<string, GroupTotal>();

  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key) ?? { key, total: 0, count: 0 };
    group.total += row.total;
    group.count += 1;
    groups.set(key, group);
  }

  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

export function groupByCategory(rows: readonly ExpenseRow[]): GroupTotal[] {
  return groupTotals(rows, (row) => row.category);
}

export function groupByStatus(rows: readonly ExpenseRow[]): GroupTotal[] {
  return groupTotals(rows, (row) => row.paymentStatus);
}

/**
 * Sum per `YYYY-MM`, oldest first. Rows without a date are left out.
 */
export function groupByMonth(rows: readonly ExpenseRow[]): MonthlyTotal[] {
  const dated = rows.filter((row): row is ExpenseRow & { date: Date } => row.date !== null);
  return groupTotals(dated, (row) => monthKey(row.date)).map(({ key, total }) => ({ month: key, total }));
}
