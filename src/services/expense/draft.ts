import { CATEGORIES, PAYMENT_METHODS, PAYMENT_STATUSES } from '../../config/constants';
import { Category, ExpenseFormInput, PaymentMethod, PaymentStatus } from '../../types/expense';
import { formatSheetDate } from '../../utils/date';
import { formatCurrency } from '../feedback/messages';
import {
  DateInputSchema,
  DecimalInputSchema,
  DiscountInputSchema,
  NotesInputSchema,
  QuantityInputSchema,
  RequiredTextSchema,
  validateInput,
} from '../validation/schemas';
import { computeAmounts } from './entry';

/**
 * Order of the questions asked when adding an expense through the bot.
 */
export const DRAFT_STEPS = [
  'date',
  'client',
  'category',
  'description',
  'quantity',
  'unitPrice',
  'discountPercent',
  'paymentStatus',
  'paymentMethod',
  'notes',
] as const;

export type DraftStep = (typeof DRAFT_STEPS)[number];

export type ExpenseDraft = Partial<ExpenseFormInput>;

export type StepOutcome =
  | { ok: true; draft: ExpenseDraft; next: DraftStep | null }
  | { ok: false; error: string };

export const STEP_PROMPTS: Record<DraftStep, string> = {
  date: 'Data do gasto (DD/MM/AAAA) ou "hoje":',
  client: 'Cliente/Projeto (ex.: Reforma Apto 101):',
  category: 'Categoria do gasto:',
  description: 'Descrição detalhada (ex.: Tinta látex branca 18L):',
  quantity: 'Quantidade (ex.: 1 ou 2,5):',
  unitPrice: 'Preço unitário em R$ (ex.: 89,90):',
  discountPercent: 'Desconto em % (0 a 50):',
  paymentStatus: 'Status do pagamento:',
  paymentMethod: 'Forma de pagamento:',
  notes: 'Observações (ou "-" para deixar em branco):',
};

/** Steps answered by tapping a button rather than typing. */
export const CHOICE_STEPS: Partial<Record<DraftStep, readonly string[]>> = {
  category: CATEGORIES,
  paymentStatus: PAYMENT_STATUSES,
  paymentMethod: PAYMENT_METHODS,
};

export function nextStep(step: DraftStep): DraftStep | null {
  const index = DRAFT_STEPS.indexOf(step);
  return DRAFT_STEPS[index + 1] ?? null;
}

function pick<T extends string>(options: readonly T[], answer: string): T | undefined {
  return options.find((option) => option.toLowerCase() === answer.trim().toLowerCase());
}

/**
 * Apply one answer to the draft. `today` is used when the user answers "hoje".
 */
export function applyDraftAnswer(draft: ExpenseDraft, step: DraftStep, answer: string, today: Date): StepOutcome {
  const advance = (patch: ExpenseDraft): StepOutcome => ({
    ok: true,
    draft: { ...draft, ...patch },
    next: nextStep(step),
  });

  switch (step) {
    case 'date': {
      if (answer.trim().toLowerCase() === 'hoje') return advance({ date: today });
      const result = validateInput(DateInputSchema, answer);
      return result.valid ? advance({ date: result.data }) : { ok: false, error: result.error };
    }
    case 'client': {
      const result = validateInput(RequiredTextSchema, answer);
      return result.valid ? advance({ client: result.data }) : { ok: false, error: result.error };
    }
    case 'description': {
      const result = validateInput(RequiredTextSchema, answer);
      return result.valid ? advance({ description: result.data }) : { ok: false, error: result.error };
    }
    case 'category': {
      const category: Category | undefined = pick(CATEGORIES, answer);
      return category ? advance({ category }) : { ok: false, error: 'Escolha uma das categorias listadas' };
    }
    case 'quantity': {
      const result = validateInput(QuantityInputSchema, answer);
      return result.valid ? advance({ quantity: result.data }) : { ok: false, error: result.error };
    }
    case 'unitPrice': {
      const result = validateInput(DecimalInputSchema, answer);
      return result.valid ? advance({ unitPrice: result.data }) : { ok: false, error: result.error };
    }
    case 'discountPercent': {
      const result = validateInput(DiscountInputSchema, answer);
      return result.valid ? advance({ discountPercent: result.data }) : { ok: false, error: result.error };
    }
    case 'paymentStatus': {
      const paymentStatus: PaymentStatus | undefined = pick(PAYMENT_STATUSES, answer);
      return paymentStatus ? advance({ paymentStatus }) : { ok: false, error: 'Escolha um dos status listados' };
    }
    case 'paymentMethod': {
      const paymentMethod: PaymentMethod | undefined = pick(PAYMENT_METHODS, answer);
      return paymentMethod ? advance({ paymentMethod }) : { ok: false, error: 'Escolha uma das formas listadas' };
    }
    case 'notes': {
      const result = validateInput(NotesInputSchema, answer);
      return result.valid ? advance({ notes: result.data }) : { ok: false, error: result.error };
    }
  }
}

export function describeDraft(draft: ExpenseDraft): string {
  const lines: string[] = [];
  if (draft.date) lines.push(`Data: ${formatSheetDate(draft.date)}`);
  if (draft.client) lines.push(`Cliente/Projeto: ${draft.client}`);
  if (draft.category) lines.push(`Categoria: ${draft.category}`);
  if (draft.description) lines.push(`Descrição: ${draft.description}`);
  if (draft.quantity !== undefined) lines.push(`Quantidade: ${draft.quantity}`);
  if (draft.unitPrice !== undefined) lines.push(`Preço Unitário: ${formatCurrency(draft.unitPrice)}`);

  if (draft.quantity !== undefined && draft.unitPrice !== undefined) {
    const { subtotal, total } = computeAmounts(draft.quantity, draft.unitPrice, draft.discountPercent ?? 0);
    lines.push(`Subtotal: ${formatCurrency(subtotal)}`);
    if (draft.discountPercent !== undefined) {
      lines.push(`Desconto: ${draft.discountPercent}%`);
      lines.push(`Total: ${formatCurrency(total)}`);
    }
  }

  if (draft.paymentStatus) lines.push(`Status: ${draft.paymentStatus}`);
  if (draft.paymentMethod) lines.push(`Forma de Pagamento: ${draft.paymentMethod}`);
  if (draft.notes) lines.push(`Observações: ${draft.notes}`);
  return lines.join('\n');
}
