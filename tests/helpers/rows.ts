import { ExpenseRow } from '../../src/types/expense';

export function makeRow(overrides: Partial<ExpenseRow> = {}): ExpenseRow {
  return {
    date: new Date(Date.UTC(2024, 2, 15)),
    client: 'Obra A',
    category: 'Ferramentas',
    description: 'Martelo',
    quantity: 1,
    unitPrice: 100,
    subtotal: 100,
    discountPercent: 0,
    total: 100,
    paymentStatus: 'Pago',
    paymentMethod: 'PIX',
    notes: '',
    ...overrides,
  };
}
