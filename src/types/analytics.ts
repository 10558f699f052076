import { ExpenseRow } from './expense';

export const ALL: unique symbol = Symbol('all');

export type Criterion = string | typeof ALL;

export interface FilterCriteria {
  client: Criterion;
  category: Criterion;
  paymentStatus: Criterion;
  minDate: Date | null;
}

export interface SummaryStats {
  count: number;
  totalSum: number;
  mean: number;
  pendingCount: number;
}

export interface GroupTotal {
  key: string;
  total: number;
  count: number;
}

export interface MonthlyTotal {
  month: string;
  total: number;
}

export interface FilterOptions {
  clients: string[];
  categories: string[];
  statuses: string[];
  earliestDate: Date | null;
}

export interface ChartInput {
  kind: 'pie' | 'bar' | 'line';
  title: string;
  labels: string[];
  values: number[];
}

export interface DashboardCharts {
  byCategory: ChartInput;
  byStatus: ChartInput;
  byMonth: ChartInput;
}

export interface DashboardView {
  rows: ExpenseRow[];
  summary: SummaryStats;
  byCategory: GroupTotal[];
  byStatus: GroupTotal[];
  byMonth: MonthlyTotal[];
  charts: DashboardCharts;
  options: FilterOptions;
  totalRecords: number;
  coercedCells: number;
  error?: string;
}
