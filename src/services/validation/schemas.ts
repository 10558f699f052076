import { z } from 'zod';
import { CATEGORIES, MAX_DISCOUNT_PERCENT, MIN_QUANTITY, PAYMENT_METHODS, PAYMENT_STATUSES } from '../../config/constants';
import { parseSheetDate } from '../../utils/date';

/**
 * Date typed as DD/MM/AAAA
 */
export const DateInputSchema = z
  .string()
  .trim()
  .transform((val, ctx) => {
    const date = parseSheetDate(val);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Data inválida. Use DD/MM/AAAA (ex.: 15/03/2024)' });
      return z.NEVER;
    }
    return date;
  });

/**
 * Decimal typed by the user, accepting a comma or a dot as separator
 */
export const DecimalInputSchema = z
  .string()
  .trim()
  .regex(/^\d+(?:[.,]\d{1,2})?$/, 'Valor inválido. Use por exemplo 10 ou 10,50')
  .transform((val) => Number(val.replace(',', '.')));

export const QuantityInputSchema = DecimalInputSchema.refine(
  (val) => val >= MIN_QUANTITY,
  `Quantidade mínima é ${MIN_QUANTITY.toFixed(2).replace('.', ',')}`
);

export const DiscountInputSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Desconto deve ser um número inteiro')
  .transform(Number)
  .refine((val) => val <= MAX_DISCOUNT_PERCENT, `Desconto máximo é ${MAX_DISCOUNT_PERCENT}%`);

export const RequiredTextSchema = z.string().trim().min(1, 'Campo obrigatório').max(500, 'Texto muito longo');

export const NotesInputSchema = z
  .string()
  .trim()
  .max(500, 'Texto muito longo')
  .transform((val) => (val === '-' ? '' : val));

export const ExpenseFormSchema = z.object({
  date: z.date({ required_error: 'Data obrigatória' }),
  client: z.string().trim().min(1, 'Preencha pelo menos Cliente e Descrição!'),
  category: z.enum(CATEGORIES),
  description: z.string().trim().min(1, 'Preencha pelo menos Cliente e Descrição!'),
  quantity: z.number().min(MIN_QUANTITY, `Quantidade mínima é ${MIN_QUANTITY}`),
  unitPrice: z.number().min(0, 'Preço unitário não pode ser negativo'),
  discountPercent: z
    .number()
    .int('Desconto deve ser inteiro')
    .min(0, 'Desconto não pode ser negativo')
    .max(MAX_DISCOUNT_PERCENT, `Desconto máximo é ${MAX_DISCOUNT_PERCENT}%`),
  paymentStatus: z.enum(PAYMENT_STATUSES),
  paymentMethod: z.enum(PAYMENT_METHODS),
  notes: z.string().trim().default(''),
});

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Entrada inválida' };
}
