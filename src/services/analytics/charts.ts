import { ChartInput, DashboardCharts } from '../../types/analytics';
import { ExpenseRow } from '../../types/expense';
import { groupByCategory, groupByMonth, groupByStatus } from './summary';

export function buildCharts(rows: readonly ExpenseRow[]): DashboardCharts {
  const byCategory = groupByCategory(rows);
  const byStatus = groupByStatus(rows);
  const byMonth = groupByMonth(rows);

  return {
    byCategory: {
      kind: 'pie',
      title: 'Gastos por Categoria',
      labels: byCategory.map((group) => group.key),
      values: byCategory.map((group) => group.total),
    },
    byStatus: {
      kind: 'bar',
      title: 'Status dos Pagamentos',
      labels: byStatus.map((group) => group.key),
      values: byStatus.map((group) => group.total),
    },
    byMonth: {
      kind: 'line',
      title: 'Evolução Mensal dos Gastos',
      labels: byMonth.map((entry) => entry.month),
      values: byMonth.map((entry) => entry.total),
    },
  };
}

const BAR_WIDTH = 20;

/**
 * Horizontal bar rendering for chat clients that cannot draw charts.
 */
export function renderTextChart(chart: ChartInput, formatValue: (value: number) => string): string {
  if (chart.values.length === 0) {
    return `${chart.title}\n(sem dados)`;
  }

  // Negative totals (refunds, credits) get no bar but still scale the others.
  const scale = Math.max(...chart.values.map(Math.abs));
  const lines = chart.labels.map((label, index) => {
    const value = chart.values[index] ?? 0;
    const length = scale > 0 ? Math.max(0, Math.round((value / scale) * BAR_WIDTH)) : 0;
    return `${label}\n${'█'.repeat(length)} ${formatValue(value)}`;
  });

  return [chart.title, '', ...lines].join('\n');
}
