export { applyFilters, listFilterOptions, describeCriteria, NO_FILTERS } from './filters';
export { summarize, groupByCategory, groupByStatus, groupByMonth } from './summary';
export { buildCharts, renderTextChart } from './charts';
export type { FilterCriteria, SummaryStats, GroupTotal, MonthlyTotal, FilterOptions, ChartInput, DashboardCharts } from '../../types/analytics';
