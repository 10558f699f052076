import { ExportFormat, ExportRequest, ExportResult } from '../../types/export';
import { fileTimestamp } from '../../utils/date';
import { errorMessage } from '../errors';
import { exportToCSV } from './csv';
import { exportToPDF } from './pdf';
import { generateReportText } from './text';
import { exportToXLSX } from './xlsx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx', 'txt', 'pdf'];

const MIME_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  txt: 'text/plain',
  pdf: 'application/pdf',
};

export function isExportFormat(value: string): value is ExportFormat {
  const formats: readonly string[] = EXPORT_FORMATS;
  return formats.includes(value);
}

export function exportFileName(format: ExportFormat, generatedAt: Date): string {
  const stamp = fileTimestamp(generatedAt);
  if (format === 'txt' || format === 'pdf') {
    return `relatorio_custos_${stamp}.${format}`;
  }
  return `custos_${stamp}.${format}`;
}

async function render(request: ExportRequest, generatedAt: Date): Promise<Buffer> {
  switch (request.format) {
    case 'csv':
      return exportToCSV(request.rows);
    case 'xlsx':
      return exportToXLSX(request.rows);
    case 'txt':
      return Buffer.from(generateReportText(request.rows, generatedAt, request.title), 'utf8');
    case 'pdf':
      return exportToPDF(request.rows, generatedAt, request.title);
  }
}

export async function handleExport(request: ExportRequest): Promise<ExportResult> {
  const generatedAt = request.generatedAt ?? new Date();

  try {
    const data = await render(request, generatedAt);
    const fileName = exportFileName(request.format, generatedAt);

    return {
      success: true,
      format: request.format,
      fileName,
      mimeType: MIME_TYPES[request.format],
      message: `Arquivo pronto: ${fileName}`,
      data,
    };
  } catch (error) {
    const message = errorMessage(error);
    console.error('[Export] Error:', message);
    return {
      success: false,
      format: request.format,
      message: `Falha na exportação: ${message}`,
    };
  }
}

export { exportToCSV, escapeCsvField, UTF8_BOM } from './csv';
export { exportToXLSX } from './xlsx';
export { exportToPDF } from './pdf';
export { generateReportText } from './text';
