import { ExpenseRecord, LoadedTable } from '../../types/expense';
import { OperationResult, TabularStore } from '../../types/sheet';
import { toStoreError, WriteError } from '../errors';
import { OperationLock } from '../sheets/lock';
import { RecordCache } from './cache';
import { toSheetRow } from './parse';

export class RecordWriter {
  constructor(
    private readonly store: TabularStore,
    private readonly cache: RecordCache<LoadedTable>,
    private readonly lock: OperationLock
  ) {}

  async append(record: ExpenseRecord): Promise<OperationResult> {
    try {
      await this.lock.run(() => this.store.appendRows([toSheetRow(record)]));
      this.cache.invalidate('record appended');

      return { success: true, message: 'Registro salvo com sucesso!' };
    } catch (error) {
      const failure = toStoreError(error, (message, options) => new WriteError(message, options));
      console.error(`[Writer] ${failure.name}:`, failure.message);

      return {
        success: false,
        message: `Erro ao salvar: ${failure.message}`,
        errorCode: failure.code,
      };
    }
  }
}
