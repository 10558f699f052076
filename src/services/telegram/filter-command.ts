import { ALL, Criterion, FilterCriteria } from '../../types/analytics';
import { DateInputSchema, validateInput } from '../validation/schemas';
import { NO_FILTERS } from '../analytics/filters';

const FILTER_PATTERN = /(cliente|categoria|status|desde)\s*=\s*(.*?)(?=\s+(?:cliente|categoria|status|desde)\s*=|$)/gi;
const ALL_WORDS = new Set(['todos', 'todas', '*']);

export type FilterCommandResult =
  | { ok: true; criteria: FilterCriteria }
  | { ok: false; error: string };

function toCriterion(value: string): Criterion {
  return ALL_WORDS.has(value.toLowerCase()) ? ALL : value;
}

/**
 * Parse `/filtro` arguments such as `cliente=Obra A status=Pago desde=01/03/2024`
 * on top of the current criteria. `limpar` resets everything.
 */
export function parseFilterCommand(args: string, current: FilterCriteria): FilterCommandResult {
  const trimmed = args.trim();
  if (trimmed.toLowerCase() === 'limpar') {
    return { ok: true, criteria: NO_FILTERS };
  }

  const criteria: FilterCriteria = { ...current };
  let matched = 0;

  for (const match of trimmed.matchAll(FILTER_PATTERN)) {
    const key = match[1].toLowerCase();
    const value = match[2].trim();
    matched++;

    if (!value) {
      return { ok: false, error: `Informe um valor para ${key}` };
    }

    switch (key) {
      case 'cliente':
        criteria.client = toCriterion(value);
        break;
      case 'categoria':
        criteria.category = toCriterion(value);
        break;
      case 'status':
        criteria.paymentStatus = toCriterion(value);
        break;
      case 'desde': {
        if (ALL_WORDS.has(value.toLowerCase())) {
          criteria.minDate = null;
          break;
        }
        const result = validateInput(DateInputSchema, value);
        if (!result.valid) return { ok: false, error: result.error };
        criteria.minDate = result.data;
        break;
      }
    }
  }

  if (matched === 0) {
    return { ok: false, error: 'Nenhum filtro reconhecido' };
  }
  return { ok: true, criteria };
}
