import { CATEGORIES, PAYMENT_METHODS, PAYMENT_STATUSES } from '../config/constants';

export type Category = (typeof CATEGORIES)[number];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * An expense ready to be appended to the sheet.
 * `subtotal` and `total` are derived at write time and stored as-is.
 */
export interface ExpenseRecord {
  date: Date;
  client: string;
  category: Category;
  description: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  discountPercent: number;
  total: number;
  paymentStatus: PaymentStatus;
  paymentMethod: PaymentMethod;
  notes: string;
}

/**
 * A row as read back from the sheet. Text columns are kept as found,
 * so categories and statuses outside the fixed lists survive a load.
 */
export interface ExpenseRow {
  date: Date | null;
  client: string;
  category: string;
  description: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  discountPercent: number;
  total: number;
  paymentStatus: string;
  paymentMethod: string;
  notes: string;
}

export interface LoadedTable {
  columns: readonly string[];
  rows: ExpenseRow[];
  coercedCells: number;
}

export interface LoadResult {
  table: LoadedTable;
  fromCache: boolean;
  error?: string;
}

export interface ExpenseFormInput {
  date: Date;
  client: string;
  category: Category;
  description: string;
  quantity: number;
  unitPrice: number;
  discountPercent: number;
  paymentStatus: PaymentStatus;
  paymentMethod: PaymentMethod;
  notes: string;
}
