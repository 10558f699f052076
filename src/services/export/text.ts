import { ExpenseRow } from '../../types/expense';
import { formatDateTime, formatSheetDate } from '../../utils/date';
import { groupByCategory, summarize } from '../analytics/summary';
import { formatCurrency } from '../feedback/messages';

export const DEFAULT_REPORT_TITLE = 'CONTROLE DE CUSTOS';

export function generateReportText(
  rows: readonly ExpenseRow[],
  generatedAt: Date,
  title: string = DEFAULT_REPORT_TITLE
): string {
  const stats = summarize(rows);

  let report = `${title} - RELATÓRIO DE CUSTOS\n`;
  report += `Gerado em: ${formatDateTime(generatedAt)}\n\n`;

  report += 'RESUMO FINANCEIRO:\n';
  report += `- Total de Registros: ${stats.count}\n`;
  report += `- Valor Total: ${formatCurrency(stats.totalSum)}\n`;
  report += `- Ticket Médio: ${formatCurrency(stats.mean)}\n`;
  report += `- Pagamentos Pendentes: ${stats.pendingCount}\n\n`;

  report += 'DISTRIBUIÇÃO POR CATEGORIA:\n';
  for (const group of groupByCategory(rows)) {
    report += `- ${group.key}: ${formatCurrency(group.total)}\n`;
  }

  report += '\nREGISTROS DETALHADOS:\n';
  for (const row of rows) {
    report += '\n';
    report += `Data: ${row.date ? formatSheetDate(row.date) : 'N/A'}\n`;
    report += `Cliente: ${row.client}\n`;
    report += `Categoria: ${row.category}\n`;
    report += `Descrição: ${row.description}\n`;
    report += `Total: ${formatCurrency(row.total)}\n`;
    report += `Status: ${row.paymentStatus}\n`;
    report += '---\n';
  }

  return report;
}
