import { ExpenseRow } from './expense';

export type ExportFormat = 'csv' | 'xlsx' | 'txt' | 'pdf';

export interface ExportRequest {
  format: ExportFormat;
  rows: ExpenseRow[];
  generatedAt?: Date;
  title?: string;
}

export interface ExportResult {
  success: boolean;
  format: ExportFormat;
  fileName?: string;
  mimeType?: string;
  message: string;
  data?: Buffer;
}
