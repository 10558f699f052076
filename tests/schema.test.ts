import { describe, it, expect } from 'vitest';
import { COLUMN_WIDTHS, COLUMNS, HEADER_FORMAT } from '../src/config/constants';
import { isHeaderLike, normalizeRow, reconcileSchema, rowsToPreserve } from '../src/services/sheets/schema';
import { OperationLock } from '../src/services/sheets/lock';
import { RecordCache, RecordWriter } from '../src/services/records';
import { buildExpenseRecord } from '../src/services/expense/entry';
import { LoadedTable } from '../src/types/expense';
import { InMemoryStore } from './helpers/memory-store';

const HEADER = [...COLUMNS];

const DATA_ROW = ['15/03/2024', 'Obra A', 'Ferramentas', 'Martelo', '1', '100', '100', '0', '100', 'Pago', 'PIX', ''];

describe('Schema Reconciler', () => {
  it('should leave a sheet with the expected header untouched', async () => {
    const store = new InMemoryStore([HEADER, DATA_ROW]);

    const result = await reconcileSchema(store, new OperationLock());

    expect(result).toEqual({
      success: true,
      changed: false,
      preservedRows: 0,
      warnings: [],
      message: 'Planilha já está configurada corretamente',
    });
    expect(store.calls.clear).toBe(0);
    expect(store.calls.appendRows).toBe(0);
    expect(store.rows).toEqual([HEADER, DATA_ROW]);
  });

  it('should write the header into an empty sheet', async () => {
    const store = new InMemoryStore();

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.success).toBe(true);
    expect(result.changed).toBe(true);
    expect(result.preservedRows).toBe(0);
    expect(store.rows).toEqual([HEADER]);
    expect(store.headerFormat).toEqual(HEADER_FORMAT);
    expect(store.columnWidths).toEqual(COLUMN_WIDTHS);
  });

  it('should keep data rows when the header is missing, padded or truncated to 12 cells', async () => {
    const store = new InMemoryStore([
      ['15/03/2024', 'Obra A', 'Ferramentas'],
      ['', '', ''],
      ['16/03/2024', 'Obra B', 'Pintura', 'Tinta', '1', '50', '50', '0', '50', 'Pago', 'PIX', 'ok', 'extra'],
    ]);

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.message).toBe('Planilha configurada com sucesso!');
    expect(result.preservedRows).toBe(2);
    expect(store.rows).toEqual([
      HEADER,
      ['15/03/2024', 'Obra A', 'Ferramentas', '', '', '', '', '', '', '', '', ''],
      ['16/03/2024', 'Obra B', 'Pintura', 'Tinta', '1', '50', '50', '0', '50', 'Pago', 'PIX', 'ok'],
    ]);
    expect(store.calls.clear).toBe(1);
    expect(store.calls.appendRows).toBe(1);
  });

  it('should replace an outdated header instead of keeping it as data', async () => {
    const store = new InMemoryStore([
      ['Data', 'Cliente', 'Valor'],
      ['15/03/2024', 'Obra A', 'Ferramentas'],
    ]);

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.preservedRows).toBe(1);
    expect(store.rows).toHaveLength(2);
    expect(store.rows[0]).toEqual(HEADER);
    expect(store.rows[1][0]).toBe('15/03/2024');
  });

  it('should still succeed when header formatting fails', async () => {
    const store = new InMemoryStore([['Data']]);
    store.failOn.add('formatHeaderRow');

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(['Formatação do cabeçalho não aplicada: formatHeaderRow failed']);
    expect(store.rows).toEqual([HEADER]);
    expect(store.columnWidths).toEqual(COLUMN_WIDTHS);
  });

  it('should report a failure when the sheet cannot be read', async () => {
    const store = new InMemoryStore();
    store.failOn.add('getAllValues');

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.success).toBe(false);
    expect(result.changed).toBe(false);
    expect(result.errorCode).toBe('SCHEMA_MISMATCH');
    expect(result.message).toBe('Erro ao configurar planilha: getAllValues failed');
  });

  it('should classify rejected credentials as connectivity errors', async () => {
    const store = new InMemoryStore();
    store.getAllValues = async () => {
      throw Object.assign(new Error('The caller does not have permission'), { status: 403 });
    };

    const result = await reconcileSchema(store, new OperationLock());

    expect(result.success).toBe(false);
    expect(result.errorCode).toBe('CONNECTIVITY');
    expect(result.message).toBe('Erro ao configurar planilha: The caller does not have permission');
  });

  it('should not interleave an append with a rewrite in progress', async () => {
    const store = new InMemoryStore([['15/03/2024', 'Obra A']]);
    const lock = new OperationLock();
    const writer = new RecordWriter(store, new RecordCache<LoadedTable>(), lock);
    const record = buildExpenseRecord({
      date: new Date(Date.UTC(2024, 3, 1)),
      client: 'Obra B',
      category: 'Pintura',
      description: 'Tinta',
      quantity: 1,
      unitPrice: 50,
      discountPercent: 0,
      paymentStatus: 'Pago',
      paymentMethod: 'PIX',
      notes: '',
    });

    const [reconciled, appended] = await Promise.all([reconcileSchema(store, lock), writer.append(record)]);

    expect(reconciled.success).toBe(true);
    expect(appended.success).toBe(true);
    expect(store.rows).toHaveLength(3);
    expect(store.rows[0]).toEqual(HEADER);
    expect(store.rows[1][0]).toBe('15/03/2024');
    expect(store.rows[2][0]).toBe('01/04/2024');
  });

  describe('helpers', () => {
    it('should tell outdated headers from data rows', () => {
      expect(isHeaderLike(['Data', 'Valor'])).toBe(true);
      expect(isHeaderLike(['15/03/2024', 'Categoria'])).toBe(false);
      expect(isHeaderLike(['foo', 'bar'])).toBe(false);
    });

    it('should normalize row width', () => {
      expect(normalizeRow(['a'])).toHaveLength(12);
      expect(normalizeRow(new Array<string>(15).fill('x'))).toHaveLength(12);
    });

    it('should drop blank rows', () => {
      expect(rowsToPreserve([HEADER, ['', ''], DATA_ROW])).toEqual([DATA_ROW]);
    });
  });
});
