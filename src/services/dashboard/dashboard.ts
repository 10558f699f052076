import { DashboardView, FilterCriteria } from '../../types/analytics';
import { ExpenseRecord, LoadedTable } from '../../types/expense';
import { ExportFormat, ExportResult } from '../../types/export';
import { OperationResult, ReconcileResult, TabularStore } from '../../types/sheet';
import { applyFilters, listFilterOptions, NO_FILTERS } from '../analytics/filters';
import { buildCharts } from '../analytics/charts';
import { groupByCategory, groupByMonth, groupByStatus, summarize } from '../analytics/summary';
import { CostSheetError } from '../errors';
import { prepareExpense } from '../expense/entry';
import { handleExport } from '../export';
import { RecordCache } from '../records/cache';
import { RecordLoader } from '../records/loader';
import { RecordWriter } from '../records/writer';
import { OperationLock } from '../sheets/lock';
import { reconcileSchema } from '../sheets/schema';

export interface DashboardOptions {
  store: TabularStore;
  cache?: RecordCache<LoadedTable>;
  lock?: OperationLock;
  reportTitle?: string;
}

/**
 * Every user action the bot offers, over one store, one cache and one lock.
 */
export class CostDashboard {
  readonly store: TabularStore;
  readonly cache: RecordCache<LoadedTable>;
  private readonly lock: OperationLock;
  private readonly loader: RecordLoader;
  private readonly writer: RecordWriter;
  private readonly reportTitle?: string;

  constructor(options: DashboardOptions) {
    this.store = options.store;
    this.cache = options.cache ?? new RecordCache<LoadedTable>();
    this.lock = options.lock ?? new OperationLock();
    this.loader = new RecordLoader(this.store, this.cache);
    this.writer = new RecordWriter(this.store, this.cache, this.lock);
    this.reportTitle = options.reportTitle;
  }

  async reconfigure(): Promise<ReconcileResult> {
    const result = await reconcileSchema(this.store, this.lock);
    if (result.success) {
      this.cache.invalidate('reconfigured');
    }
    return result;
  }

  /**
   * Validate raw form values, derive subtotal/total and append the row.
   */
  async submit(input: unknown): Promise<OperationResult> {
    let record: ExpenseRecord;
    try {
      record = prepareExpense(input);
    } catch (error) {
      if (error instanceof CostSheetError) {
        return { success: false, message: error.message, errorCode: error.code };
      }
      throw error;
    }

    return this.writer.append(record);
  }

  async view(criteria: FilterCriteria = NO_FILTERS): Promise<DashboardView> {
    const { table, error } = await this.loader.load();
    const rows = applyFilters(table.rows, criteria);

    return {
      rows,
      summary: summarize(rows),
      byCategory: groupByCategory(rows),
      byStatus: groupByStatus(rows),
      byMonth: groupByMonth(rows),
      charts: buildCharts(rows),
      options: listFilterOptions(table.rows),
      totalRecords: table.rows.length,
      coercedCells: table.coercedCells,
      error,
    };
  }

  async export(format: ExportFormat, criteria: FilterCriteria = NO_FILTERS, now: Date = new Date()): Promise<ExportResult> {
    const { table, error } = await this.loader.load();
    if (error) {
      return { success: false, format, message: error };
    }

    return handleExport({
      format,
      rows: applyFilters(table.rows, criteria),
      generatedAt: now,
      title: this.reportTitle,
    });
  }
}
