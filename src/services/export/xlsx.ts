import ExcelJS from 'exceljs';
import { EXPENSE_COLUMNS, EXPORT_SHEET_NAME } from '../../config/constants';
import { ExpenseRow } from '../../types/expense';

const PIXELS_PER_CHARACTER = 7;

export async function exportToXLSX(rows: readonly ExpenseRow[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(EXPORT_SHEET_NAME);

  sheet.columns = EXPENSE_COLUMNS.map((column) => ({
    header: column.header,
    key: column.key,
    width: Math.round(column.width / PIXELS_PER_CHARACTER),
  }));
  sheet.getRow(1).font = { bold: true };
  sheet.getColumn('date').numFmt = 'dd/mm/yyyy';

  for (const row of rows) {
    sheet.addRow(row);
  }

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
