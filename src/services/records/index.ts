export { RecordCache } from './cache';
export { RecordLoader, buildTable, emptyTable } from './loader';
export { RecordWriter } from './writer';
export { parseDecimal, toSheetRecords, toExpenseRow, toSheetRow } from './parse';
