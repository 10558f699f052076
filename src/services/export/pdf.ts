import PDFDocument from 'pdfkit';
import { ExpenseRow } from '../../types/expense';
import { formatDateTime, formatSheetDate } from '../../utils/date';
import { groupByCategory, summarize } from '../analytics/summary';
import { formatCurrency } from '../feedback/messages';
import { DEFAULT_REPORT_TITLE } from './text';

const MAX_TABLE_ROWS = 200;

export async function exportToPDF(
  rows: readonly ExpenseRow[],
  generatedAt: Date,
  title: string = DEFAULT_REPORT_TITLE
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 50, bottom: 50, left: 50, right: 50 },
    });
    const buffers: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => buffers.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(buffers)));
    doc.on('error', reject);

    // Header
    doc.fontSize(20).font('Helvetica-Bold').text(title, { align: 'center' });
    doc.moveDown(0.3);
    doc.fontSize(11).font('Helvetica').text('Relatório de Custos', { align: 'center' });
    doc.moveDown(0.5);

    doc.moveTo(50, doc.y).lineTo(545, doc.y).stroke();
    doc.moveDown();

    const stats = summarize(rows);

    doc.fontSize(14).font('Helvetica-Bold').text('Resumo Financeiro');
    doc.moveDown(0.5);
    doc.fontSize(10).font('Helvetica');
    doc.text(`Total de Registros: ${stats.count}`);
    doc.text(`Valor Total: ${formatCurrency(stats.totalSum)}`);
    doc.text(`Ticket Médio: ${formatCurrency(stats.mean)}`);
    doc.text(`Pagamentos Pendentes: ${stats.pendingCount}`);
    doc.moveDown();

    const categories = groupByCategory(rows);
    if (categories.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Distribuição por Categoria');
      doc.moveDown(0.5);
      doc.fontSize(10).font('Helvetica');

      for (const group of categories) {
        const percentage = stats.totalSum > 0 ? ((group.total / stats.totalSum) * 100).toFixed(1) : '0.0';
        doc.text(`${group.key}: ${formatCurrency(group.total)} (${percentage}%)`);
      }
      doc.moveDown();
    }

    if (rows.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Registros Detalhados');
      doc.moveDown(0.5);

      const headers = ['Data', 'Cliente', 'Categoria', 'Descrição', 'Total', 'Status'];
      const colWidths = [60, 90, 85, 130, 70, 60];
      const tableStartX = 50;
      const rowHeight = 18;
      let currentY = doc.y;

      const drawHeader = () => {
        doc.fontSize(9).font('Helvetica-Bold');
        let xPos = tableStartX;
        headers.forEach((header, i) => {
          doc.text(header, xPos, currentY, { width: colWidths[i] });
          xPos += colWidths[i];
        });
        currentY += rowHeight;
        doc.moveTo(tableStartX, currentY - 4).lineTo(tableStartX + 495, currentY - 4).stroke();
        doc.fontSize(8).font('Helvetica');
      };

      drawHeader();

      for (const row of rows.slice(0, MAX_TABLE_ROWS)) {
        if (currentY > 750) {
          doc.addPage();
          currentY = 50;
          drawHeader();
        }

        const cells = [
          row.date ? formatSheetDate(row.date) : 'N/A',
          truncate(row.client, 18),
          truncate(row.category, 16),
          truncate(row.description, 28),
          formatCurrency(row.total),
          truncate(row.paymentStatus, 12),
        ];

        let xPos = tableStartX;
        cells.forEach((cell, i) => {
          doc.text(cell, xPos, currentY, { width: colWidths[i], lineBreak: false });
          xPos += colWidths[i];
        });
        currentY += rowHeight;
      }

      if (rows.length > MAX_TABLE_ROWS) {
        doc.text(`... e mais ${rows.length - MAX_TABLE_ROWS} registros`, tableStartX, currentY);
      }
    }

    // Footer
    doc.moveDown(2);
    doc.fontSize(8).font('Helvetica').text(`Gerado em ${formatDateTime(generatedAt)}`, 50, doc.y, { align: 'center' });

    doc.end();
  });
}

function truncate(str: string, maxLen: number): string {
  if (!str) return '-';
  return str.length > maxLen ? str.substring(0, maxLen - 1) + '…' : str;
}
