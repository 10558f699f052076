import { EXPENSE_COLUMNS, NUMERIC_COLUMNS, NumericColumnKey } from '../../config/constants';
import { ExpenseRecord, ExpenseRow } from '../../types/expense';
import { CellValue } from '../../types/sheet';
import { formatSheetDate, parseSheetDate } from '../../utils/date';
import { ParseError } from '../errors';

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Strict variant for cells that must hold a number. */
export function requireDecimal(value: string, column: string): number {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    throw new ParseError(`${column}: '${value}' não é um número`);
  }
  return parsed;
}

export type SheetRecord = Record<string, string>;

/**
 * Plain decimal parse. Thousands separators and decimal commas are not numbers here,
 * matching how the sheet stores values written by this app.
 */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Key each data row by the header found in row 0. Short rows read as empty strings,
 * rows with no content at all are dropped.
 */
export function toSheetRecords(values: string[][]): SheetRecord[] {
  if (values.length <= 1) return [];

  const [header, ...dataRows] = values;
  const records: SheetRecord[] = [];

  for (const row of dataRows) {
    if (!row.some((cell) => cell.trim() !== '')) continue;

    const record: SheetRecord = {};
    header.forEach((name, index) => {
      record[name] = row[index] ?? '';
    });
    records.push(record);
  }

  return records;
}

export interface TypedRow {
  row: ExpenseRow;
  coercedCells: number;
}

export function toExpenseRow(record: SheetRecord): TypedRow {
  const text = (header: string) => record[header] ?? '';
  let coercedCells = 0;

  const numbers: Record<NumericColumnKey, number> = {
    quantity: 0,
    unitPrice: 0,
    subtotal: 0,
    discountPercent: 0,
    total: 0,
  };
  for (const column of EXPENSE_COLUMNS) {
    const key = column.key;
    if (!isNumericKey(key)) continue;

    const raw = text(column.header);
    if (raw.trim() === '') continue;

    try {
      numbers[key] = requireDecimal(raw, column.header);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      coercedCells++;
    }
  }

  return {
    row: {
      date: parseSheetDate(text('Data')),
      client: text('Cliente/Projeto'),
      category: text('Categoria'),
      description: text('Descrição'),
      quantity: numbers.quantity,
      unitPrice: numbers.unitPrice,
      subtotal: numbers.subtotal,
      discountPercent: numbers.discountPercent,
      total: numbers.total,
      paymentStatus: text('Status Pagamento'),
      paymentMethod: text('Forma Pagamento'),
      notes: text('Observações'),
    },
    coercedCells,
  };
}

function isNumericKey(key: string): key is NumericColumnKey {
  const numericKeys: readonly string[] = NUMERIC_COLUMNS;
  return numericKeys.includes(key);
}

/** Cells in header order, date as `DD/MM/YYYY`. */
export function toSheetRow(record: ExpenseRecord): CellValue[] {
  return [
    formatSheetDate(record.date),
    record.client,
    record.category,
    record.description,
    record.quantity,
    record.unitPrice,
    record.subtotal,
    record.discountPercent,
    record.total,
    record.paymentStatus,
    record.paymentMethod,
    record.notes,
  ];
}
