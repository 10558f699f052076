import { COLUMNS } from '../../config/constants';
import { ExpenseRow } from '../../types/expense';
import { formatSheetDate } from '../../utils/date';

export const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

export function exportToCSV(rows: readonly ExpenseRow[]): Buffer {
  const csvLines: string[] = [COLUMNS.map(escapeCsvField).join(',')];

  for (const row of rows) {
    const values = [
      row.date ? formatSheetDate(row.date) : '',
      escapeCsvField(row.client),
      escapeCsvField(row.category),
      escapeCsvField(row.description),
      String(row.quantity),
      String(row.unitPrice),
      String(row.subtotal),
      String(row.discountPercent),
      String(row.total),
      escapeCsvField(row.paymentStatus),
      escapeCsvField(row.paymentMethod),
      escapeCsvField(row.notes),
    ];
    csvLines.push(values.join(','));
  }

  return Buffer.concat([UTF8_BOM, Buffer.from(csvLines.join('\n') + '\n', 'utf8')]);
}

export function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
