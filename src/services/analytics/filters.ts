import { ALL, Criterion, FilterCriteria, FilterOptions } from '../../types/analytics';
import { ExpenseRow } from '../../types/expense';

export const NO_FILTERS: FilterCriteria = {
  client: ALL,
  category: ALL,
  paymentStatus: ALL,
  minDate: null,
};

function matches(criterion: Criterion, value: string): boolean {
  return criterion === ALL || criterion === value;
}

/**
 * Every criterion must hold. A row without a date never passes a `minDate` bound.
 */
export function applyFilters(rows: readonly ExpenseRow[], criteria: FilterCriteria): ExpenseRow[] {
  const minTime = criteria.minDate?.getTime();

  return rows.filter((row) => {
    if (!matches(criteria.client, row.client)) return false;
    if (!matches(criteria.category, row.category)) return false;
    if (!matches(criteria.paymentStatus, row.paymentStatus)) return false;
    if (minTime !== undefined && (row.date === null || row.date.getTime() < minTime)) return false;
    return true;
  });
}

function distinct(values: string[]): string[] {
  return [...new Set(values)];
}

export function listFilterOptions(rows: readonly ExpenseRow[]): FilterOptions {
  let earliestDate: Date | null = null;
  for (const row of rows) {
    if (row.date && (earliestDate === null || row.date.getTime() < earliestDate.getTime())) {
      earliestDate = row.date;
    }
  }

  return {
    clients: distinct(rows.map((row) => row.client)),
    categories: distinct(rows.map((row) => row.category)),
    statuses: distinct(rows.map((row) => row.paymentStatus)),
    earliestDate,
  };
}

export function describeCriteria(criteria: FilterCriteria, formatDate: (date: Date) => string): string {
  const label = (criterion: Criterion, all: string) => (criterion === ALL ? all : criterion);
  return [
    `Cliente/Projeto: ${label(criteria.client, 'Todos')}`,
    `Categoria: ${label(criteria.category, 'Todas')}`,
    `Status Pagamento: ${label(criteria.paymentStatus, 'Todos')}`,
    `Período (início): ${criteria.minDate ? formatDate(criteria.minDate) : 'Sem limite'}`,
  ].join('\n');
}
