import { COLUMNS } from '../../config/constants';
import { LoadedTable, LoadResult } from '../../types/expense';
import { TabularStore } from '../../types/sheet';
import { errorMessage } from '../errors';
import { RecordCache } from './cache';
import { toExpenseRow, toSheetRecords } from './parse';

export function emptyTable(): LoadedTable {
  return { columns: COLUMNS, rows: [], coercedCells: 0 };
}

export class RecordLoader {
  constructor(
    private readonly store: TabularStore,
    private readonly cache: RecordCache<LoadedTable>
  ) {}

  async load(): Promise<LoadResult> {
    const cached = this.cache.get();
    if (cached) {
      return { table: cached, fromCache: true };
    }

    try {
      const values = await this.store.getAllValues();
      const table = buildTable(values);
      this.cache.set(table);

      if (table.coercedCells > 0) {
        console.warn(`[Loader] ${table.coercedCells} numeric cell(s) could not be parsed and were read as 0`);
      }

      return { table, fromCache: false };
    } catch (error) {
      const message = errorMessage(error);
      console.error('[Loader] Failed to load records:', message);
      return { table: emptyTable(), fromCache: false, error: `Erro ao carregar dados: ${message}` };
    }
  }
}

export function buildTable(values: string[][]): LoadedTable {
  const records = toSheetRecords(values);
  if (records.length === 0) return emptyTable();

  const table = emptyTable();
  for (const record of records) {
    const { row, coercedCells } = toExpenseRow(record);
    table.rows.push(row);
    table.coercedCells += coercedCells;
  }
  return table;
}
