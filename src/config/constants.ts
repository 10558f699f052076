export const EXPENSE_COLUMNS = [
  { header: 'Data', key: 'date', width: 120 },
  { header: 'Cliente/Projeto', key: 'client', width: 200 },
  { header: 'Categoria', key: 'category', width: 150 },
  { header: 'Descrição', key: 'description', width: 250 },
  { header: 'Quantidade', key: 'quantity', width: 100 },
  { header: 'Preço Unitário', key: 'unitPrice', width: 120 },
  { header: 'Subtotal', key: 'subtotal', width: 120 },
  { header: 'Desconto (%)', key: 'discountPercent', width: 100 },
  { header: 'Total', key: 'total', width: 120 },
  { header: 'Status Pagamento', key: 'paymentStatus', width: 150 },
  { header: 'Forma Pagamento', key: 'paymentMethod', width: 150 },
  { header: 'Observações', key: 'notes', width: 200 },
] as const;

export type ColumnHeader = (typeof EXPENSE_COLUMNS)[number]['header'];
export type ColumnKey = (typeof EXPENSE_COLUMNS)[number]['key'];

export const COLUMNS: readonly ColumnHeader[] = EXPENSE_COLUMNS.map((c) => c.header);
export const COLUMN_WIDTHS: readonly number[] = EXPENSE_COLUMNS.map((c) => c.width);

export const NUMERIC_COLUMNS = ['quantity', 'unitPrice', 'subtotal', 'discountPercent', 'total'] as const;
export type NumericColumnKey = (typeof NUMERIC_COLUMNS)[number];

export const CATEGORIES = [
  'Materiais de Construção',
  'Ferramentas',
  'Mão de Obra',
  'Transporte',
  'Equipamentos',
  'Limpeza',
  'Pintura',
  'Elétrica',
  'Hidráulica',
  'Outros',
] as const;

export const PAYMENT_STATUSES = ['Pendente', 'Pago', 'Parcial', 'Cancelado'] as const;
export const PENDING_STATUS = 'Pendente';

export const PAYMENT_METHODS = [
  'Dinheiro',
  'PIX',
  'Cartão Débito',
  'Cartão Crédito',
  'Transferência',
  'Cheque',
  'Boleto',
] as const;

export const MIN_QUANTITY = 0.01;
export const MAX_DISCOUNT_PERCENT = 50;

export const RECORD_CACHE_TTL_MS = 5 * 60 * 1000;
export const FORM_CONTEXT_TTL_MS = 5 * 60 * 1000;

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

export const HEADER_FORMAT = {
  backgroundColor: { red: 0.2, green: 0.4, blue: 0.8 },
  foregroundColor: { red: 1, green: 1, blue: 1 },
  fontSize: 11,
  bold: true,
  horizontalAlignment: 'CENTER',
} as const;

export const CURRENCY_PREFIX = 'R$';
export const EXPORT_SHEET_NAME = 'Custos';

export const DEFAULT_MESSAGES = {
  WELCOME: 'Controle de custos: registre um gasto com /novo ou use o menu abaixo.',
  ERROR: 'Ocorreu um erro. Tente novamente.',
  SUCCESS: 'Registro salvo com sucesso!',
};
