import { ExpenseFormInput, ExpenseRecord } from '../../types/expense';
import { ValidationError } from '../errors';
import { ExpenseFormSchema, validateInput } from '../validation/schemas';

export interface DerivedAmounts {
  subtotal: number;
  total: number;
}

/**
 * subtotal = quantity × unit price; total = subtotal × (1 − discount/100)
 */
export function computeAmounts(quantity: number, unitPrice: number, discountPercent: number): DerivedAmounts {
  const subtotal = quantity * unitPrice;
  const total = subtotal * (1 - discountPercent / 100);
  return { subtotal, total };
}

export function buildExpenseRecord(input: ExpenseFormInput): ExpenseRecord {
  const { subtotal, total } = computeAmounts(input.quantity, input.unitPrice, input.discountPercent);
  return { ...input, subtotal, total };
}

/**
 * Validate raw form values and derive the stored amounts.
 * Throws ValidationError before anything reaches the sheet.
 */
export function prepareExpense(input: unknown): ExpenseRecord {
  const result = validateInput(ExpenseFormSchema, input);
  if (!result.valid) {
    throw new ValidationError(result.error);
  }
  return buildExpenseRecord(result.data);
}
