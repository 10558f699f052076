import { COLUMN_WIDTHS, COLUMNS, HEADER_FORMAT } from '../../config/constants';
import { ReconcileResult, TabularStore } from '../../types/sheet';
import { parseSheetDate } from '../../utils/date';
import { errorMessage, SchemaMismatchError, toStoreError } from '../errors';
import { OperationLock } from './lock';

export function isExpectedHeader(row: readonly string[] | undefined): boolean {
  if (!row || row.length !== COLUMNS.length) return false;
  return COLUMNS.every((name, index) => row[index] === name);
}

/**
 * A first row that names at least one known column and does not start with a date
 * is an outdated header rather than data.
 */
export function isHeaderLike(row: readonly string[]): boolean {
  const first = row[0] ?? '';
  if (parseSheetDate(first) !== null) return false;

  const known = new Set<string>(COLUMNS);
  return row.some((cell) => known.has(cell.trim()));
}

export function normalizeRow(row: readonly string[]): string[] {
  const padded = [...row];
  while (padded.length < COLUMNS.length) padded.push('');
  return padded.slice(0, COLUMNS.length);
}

/** Data rows to carry over when the header has to be rewritten. */
export function rowsToPreserve(values: string[][]): string[][] {
  if (values.length === 0) return [];

  const dataRows = isHeaderLike(values[0]) ? values.slice(1) : values;
  return dataRows.filter((row) => row.some((cell) => cell !== '')).map(normalizeRow);
}

async function applyFormatting(store: TabularStore): Promise<string[]> {
  const warnings: string[] = [];

  try {
    await store.formatHeaderRow(HEADER_FORMAT);
  } catch (error) {
    warnings.push(`Formatação do cabeçalho não aplicada: ${errorMessage(error)}`);
  }

  try {
    await store.setColumnWidths(COLUMN_WIDTHS);
  } catch (error) {
    warnings.push(`Largura das colunas não aplicada: ${errorMessage(error)}`);
  }

  for (const warning of warnings) {
    console.warn(`[Schema] ${warning}`);
  }
  return warnings;
}

/**
 * Make row 0 of the sheet equal the fixed header.
 *
 * When it does not, the sheet is cleared and rewritten: header first, then every
 * preserved data row padded or truncated to the header width. This is not atomic,
 * so it runs under the same lock as appends.
 */
export async function reconcileSchema(store: TabularStore, lock: OperationLock): Promise<ReconcileResult> {
  try {
    return await lock.run(async () => {
      const values = await store.getAllValues();

      if (isExpectedHeader(values[0])) {
        return {
          success: true,
          changed: false,
          preservedRows: 0,
          warnings: [],
          message: 'Planilha já está configurada corretamente',
        };
      }

      const mismatch = new SchemaMismatchError(
        values.length === 0 ? 'Planilha vazia, sem cabeçalho' : 'Cabeçalho ausente ou diferente do esperado'
      );
      console.log(`[Schema] ${mismatch.message}; rewriting ${store.describe()}`);

      const preserved = rowsToPreserve(values);

      await store.clear();
      await store.appendRows([[...COLUMNS], ...preserved]);

      const warnings = await applyFormatting(store);

      console.log(`[Schema] Header written, ${preserved.length} row(s) preserved`);
      return {
        success: true,
        changed: true,
        preservedRows: preserved.length,
        warnings,
        message: 'Planilha configurada com sucesso!',
      };
    });
  } catch (error) {
    const failure = toStoreError(error, (message, options) => new SchemaMismatchError(message, options));
    console.error(`[Schema] ${failure.name}:`, failure.message);

    return {
      success: false,
      changed: false,
      preservedRows: 0,
      warnings: [],
      message: `Erro ao configurar planilha: ${failure.message}`,
      errorCode: failure.code,
    };
  }
}
