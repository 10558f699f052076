import { describe, it, expect } from 'vitest';
import { COLUMNS } from '../src/config/constants';
import { CostDashboard } from '../src/services/dashboard';
import { NO_FILTERS } from '../src/services/analytics';
import { messages } from '../src/services/feedback/messages';
import { getRecordsKeyboard } from '../src/services/telegram/buttons';
import { formatCharts, formatFilterHelp, formatRecordsPage } from '../src/services/telegram/format';
import { InMemoryStore } from './helpers/memory-store';
import { makeRow } from './helpers/rows';

describe('Records listing', () => {
  it('should show the detail columns of each row', () => {
    const page = formatRecordsPage(
      [
        makeRow(),
        makeRow({
          date: null,
          client: 'Obra B',
          quantity: 2.5,
          unitPrice: 19.9,
          total: 49.75,
          paymentStatus: 'Pendente',
        }),
      ],
      1
    );

    expect(page).toEqual({
      page: 1,
      totalPages: 1,
      text: [
        'REGISTROS DETALHADOS (2) - página 1/1',
        '',
        'Data: 15/03/2024',
        'Cliente/Projeto: Obra A',
        'Categoria: Ferramentas',
        'Descrição: Martelo',
        'Quantidade: 1 | Preço Unitário: R$ 100.00',
        'Total: R$ 100.00 | Status Pagamento: Pago',
        '',
        'Data: N/A',
        'Cliente/Projeto: Obra B',
        'Categoria: Ferramentas',
        'Descrição: Martelo',
        'Quantidade: 2.5 | Preço Unitário: R$ 19.90',
        'Total: R$ 49.75 | Status Pagamento: Pendente',
      ].join('\n'),
    });
  });

  it('should split rows into pages', () => {
    const rows = Array.from({ length: 12 }, (_, index) => makeRow({ description: `Item ${index + 1}` }));

    const last = formatRecordsPage(rows, 3, 5);
    const blocks = last.text.split('\n\n');

    expect(last.totalPages).toBe(3);
    expect(blocks[0]).toBe('REGISTROS DETALHADOS (12) - página 3/3');
    expect(blocks).toHaveLength(3);
    expect(blocks[1]).toContain('Descrição: Item 11\n');
    expect(blocks[2]).toContain('Descrição: Item 12\n');
  });

  it('should clamp the page number', () => {
    const rows = Array.from({ length: 6 }, () => makeRow());

    expect(formatRecordsPage(rows, 0, 5).page).toBe(1);
    expect(formatRecordsPage(rows, 99, 5).page).toBe(2);
    expect(formatRecordsPage(rows, Number.NaN, 5).page).toBe(1);
    expect(formatRecordsPage([], 1)).toEqual({ text: 'REGISTROS DETALHADOS (0) - página 1/1', page: 1, totalPages: 1 });
  });

  it('should offer only the pages that exist', () => {
    const callbacks = (page: number, totalPages: number) =>
      getRecordsKeyboard(page, totalPages).inline_keyboard.map((row) =>
        row.map((button) => ('callback_data' in button ? button.callback_data : ''))
      );

    expect(callbacks(1, 3)).toEqual([['records_2'], ['back_main']]);
    expect(callbacks(2, 3)).toEqual([['records_1', 'records_3'], ['back_main']]);
    expect(callbacks(1, 1)).toEqual([['back_main']]);
  });
});

describe('Charts message', () => {
  it('should render groups that sum to a negative total', async () => {
    const store = new InMemoryStore([
      [...COLUMNS],
      ['15/03/2024', 'Obra A', 'Ferramentas', 'Martelo', '1', '100', '100', '0', '100', 'Pago', 'PIX', ''],
      ['16/03/2024', 'Obra A', 'Outros', 'Estorno', '1', '-40', '-40', '0', '-40', 'Pago', 'PIX', ''],
    ]);
    const view = await new CostDashboard({ store }).view();

    expect(formatCharts(view)).toBe(
      [
        `Gastos por Categoria\n\nFerramentas\n${'█'.repeat(20)} R$ 100.00\nOutros\n R$ -40.00`,
        `Status dos Pagamentos\n\nPago\n${'█'.repeat(20)} R$ 60.00`,
        `Evolução Mensal dos Gastos\n\n2024-03\n${'█'.repeat(20)} R$ 60.00`,
      ].join('\n\n')
    );
  });
});

describe('Filter help', () => {
  it('should list the available values and the syntax', async () => {
    const store = new InMemoryStore([
      [...COLUMNS],
      ['15/03/2024', 'Obra A', 'Pintura', 'Tinta', '1', '50', '50', '0', '50', 'Pendente', 'PIX', ''],
    ]);
    const view = await new CostDashboard({ store }).view();

    expect(formatFilterHelp(view, NO_FILTERS)).toBe(
      [
        'Filtros atuais:',
        'Cliente/Projeto: Todos',
        'Categoria: Todas',
        'Status Pagamento: Todos',
        'Período (início): Sem limite',
        '',
        'Clientes: Obra A',
        'Categorias: Pintura',
        'Status: Pendente',
        'Primeiro registro: 15/03/2024',
        '',
        messages.info.helpFilter,
      ].join('\n')
    );
  });

  it('should show the load error instead of empty lists', async () => {
    const store = new InMemoryStore();
    store.failOn.add('getAllValues');
    const view = await new CostDashboard({ store }).view();

    expect(formatFilterHelp(view, NO_FILTERS)).toBe('❌ Erro ao carregar dados: getAllValues failed');
  });
});
