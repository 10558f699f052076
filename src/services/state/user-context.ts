import { FORM_CONTEXT_TTL_MS } from '../../config/constants';
import { FilterCriteria } from '../../types/analytics';
import { DraftStep, ExpenseDraft } from '../expense/draft';
import { NO_FILTERS } from '../analytics/filters';

export enum UserState {
  FILLING_EXPENSE = 'filling_expense',
  CONFIRMING_EXPENSE = 'confirming_expense',
}

export interface UserContextData {
  userId: string;
  state: UserState;
  step: DraftStep | null;
  draft: ExpenseDraft;
  createdAt: number;
  expiresAt: number;
}

// In-memory form state, expires after 5 minutes of inactivity
const contextMap = new Map<string, UserContextData>();

// Filters chosen with /filtro, kept for the whole session
const filterMap = new Map<string, FilterCriteria>();

/**
 * Get current user context
 */
export function getUserContext(userId: string, now: number = Date.now()): UserContextData | null {
  const context = contextMap.get(userId);

  if (!context) {
    return null;
  }

  if (now > context.expiresAt) {
    contextMap.delete(userId);
    return null;
  }

  return context;
}

/**
 * Set user context, restarting its expiry window
 */
export function setUserContext(
  userId: string,
  state: UserState,
  step: DraftStep | null,
  draft: ExpenseDraft,
  now: number = Date.now()
): UserContextData {
  const context: UserContextData = {
    userId,
    state,
    step,
    draft,
    createdAt: contextMap.get(userId)?.createdAt ?? now,
    expiresAt: now + FORM_CONTEXT_TTL_MS,
  };
  contextMap.set(userId, context);
  return context;
}

export function clearUserContext(userId: string): void {
  contextMap.delete(userId);
}

export function getUserFilters(userId: string): FilterCriteria {
  return filterMap.get(userId) ?? NO_FILTERS;
}

export function setUserFilters(userId: string, criteria: FilterCriteria): void {
  filterMap.set(userId, criteria);
}

export function clearUserFilters(userId: string): void {
  filterMap.delete(userId);
}

/**
 * Clean up expired contexts
 */
export function cleanupExpiredContexts(now: number = Date.now()): number {
  let count = 0;

  for (const [userId, context] of contextMap.entries()) {
    if (now > context.expiresAt) {
      contextMap.delete(userId);
      count++;
    }
  }

  if (count > 0) {
    console.debug(`[UserContext] Cleaned up ${count} expired contexts`);
  }
  return count;
}
