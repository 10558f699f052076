export {
  GoogleSheetsStore,
  cellToString,
  credentialCandidates,
  findAppRoot,
  quoteSheetTitle,
  resolveCredentials,
  type DriveClient,
  type GoogleStoreConfig,
  type ResolvedCredentials,
  type SheetsClient,
  type SpreadsheetTarget,
} from './google-store';
export { reconcileSchema, isExpectedHeader, isHeaderLike, rowsToPreserve, normalizeRow } from './schema';
export { OperationLock } from './lock';
