import { DashboardView, FilterCriteria } from '../../types/analytics';
import { ExpenseRow } from '../../types/expense';
import { formatSheetDate } from '../../utils/date';
import { describeCriteria } from '../analytics/filters';
import { renderTextChart } from '../analytics/charts';
import { formatCurrency, messages } from '../feedback/messages';

export function formatSummary(view: DashboardView, criteria: FilterCriteria): string {
  const { summary } = view;
  let text = 'RESUMO EXECUTIVO\n\n';
  text += `📋 Total de Registros: ${summary.count}\n`;
  text += `💰 Valor Total: ${formatCurrency(summary.totalSum)}\n`;
  text += `📈 Ticket Médio: ${formatCurrency(summary.mean)}\n`;
  text += `⏳ Pagamentos Pendentes: ${summary.pendingCount}\n`;

  if (view.byCategory.length > 0) {
    text += '\nPor Categoria:\n';
    for (const group of view.byCategory) {
      text += `- ${group.key}: ${formatCurrency(group.total)} (${group.count})\n`;
    }
  }

  if (view.byStatus.length > 0) {
    text += '\nPor Status:\n';
    for (const group of view.byStatus) {
      text += `- ${group.key}: ${formatCurrency(group.total)}\n`;
    }
  }

  text += `\nFiltros:\n${describeCriteria(criteria, formatSheetDate)}`;

  if (view.coercedCells > 0) {
    text += `\n\n⚠️ ${view.coercedCells} célula(s) numérica(s) inválida(s) lidas como 0`;
  }
  return text;
}

export function formatCharts(view: DashboardView): string {
  return [view.charts.byCategory, view.charts.byStatus, view.charts.byMonth]
    .map((chart) => renderTextChart(chart, formatCurrency))
    .join('\n\n');
}

/**
 * Current criteria, the values available to filter on and the command syntax.
 * A failed load shows the error instead of empty option lists.
 */
export function formatFilterHelp(view: DashboardView, criteria: FilterCriteria): string {
  if (view.error) {
    return `❌ ${view.error}`;
  }

  const { options } = view;
  let text = `Filtros atuais:\n${describeCriteria(criteria, formatSheetDate)}\n\n`;
  text += `Clientes: ${options.clients.join(', ') || '-'}\n`;
  text += `Categorias: ${options.categories.join(', ') || '-'}\n`;
  text += `Status: ${options.statuses.join(', ') || '-'}\n`;
  if (options.earliestDate) {
    text += `Primeiro registro: ${formatSheetDate(options.earliestDate)}\n`;
  }
  return `${text}\n${messages.info.helpFilter}`;
}

export const RECORDS_PAGE_SIZE = 5;

export interface RecordsPage {
  text: string;
  page: number;
  totalPages: number;
}

/**
 * One page of the filtered rows. `page` is 1-based and clamped to the available pages.
 */
export function formatRecordsPage(
  rows: readonly ExpenseRow[],
  page: number,
  pageSize: number = RECORDS_PAGE_SIZE
): RecordsPage {
  const totalPages = Math.max(1, Math.ceil(rows.length / pageSize));
  const current = Math.min(Math.max(1, Math.trunc(page) || 1), totalPages);
  const start = (current - 1) * pageSize;

  const blocks = rows.slice(start, start + pageSize).map((row) =>
    [
      `Data: ${row.date ? formatSheetDate(row.date) : 'N/A'}`,
      `Cliente/Projeto: ${row.client}`,
      `Categoria: ${row.category}`,
      `Descrição: ${row.description}`,
      `Quantidade: ${row.quantity} | Preço Unitário: ${formatCurrency(row.unitPrice)}`,
      `Total: ${formatCurrency(row.total)} | Status Pagamento: ${row.paymentStatus}`,
    ].join('\n')
  );

  const header = `REGISTROS DETALHADOS (${rows.length}) - página ${current}/${totalPages}`;
  return { text: [header, ...blocks].join('\n\n'), page: current, totalPages };
}
