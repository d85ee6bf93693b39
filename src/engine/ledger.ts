/**
 * Budget Ledger
 *
 * Headroom per budget scope. A cap of zero means the scope is unset, which is
 * reported as unbounded and never as zero remaining.
 */

import type { Cents } from '../lib/money';
import type { SpendSnapshot } from './snapshot';

export type Headroom =
  | { unbounded: true }
  | {
      unbounded: false;
      cap: Cents;
      spent: Cents;
      /** cap - spent, negative once the cap has been overrun */
      rawRemaining: Cents;
      cappedRemaining: Cents;
    };

/**
 * Budget scopes in the order their caps are enforced
 */
export const BUDGET_SCOPES = ['brandDay', 'brandMonth', 'campaignDay', 'campaignMonth'] as const;

export type BudgetScope = (typeof BUDGET_SCOPES)[number];

export type LedgerReport = Record<BudgetScope, Headroom>;

export function remaining(cap: Cents, spent: Cents): Headroom {
  if (cap === 0) {
    return { unbounded: true };
  }

  const rawRemaining = cap - spent;
  return {
    unbounded: false,
    cap,
    spent,
    rawRemaining,
    cappedRemaining: Math.max(0, rawRemaining),
  };
}

/**
 * Check if spending an amount would take a capped scope past its cap
 */
export function wouldExceed(headroom: Headroom, amount: Cents): boolean {
  if (headroom.unbounded) {
    return false;
  }
  return headroom.spent + amount > headroom.cap;
}

/**
 * Headroom at brand-day, brand-month, campaign-day and campaign-month.
 * Brand totals already cover every campaign of the brand.
 */
export function evaluateLedger(snapshot: SpendSnapshot): LedgerReport {
  const { brand, campaign, brandSpent, campaignSpent } = snapshot;

  return {
    brandDay: remaining(brand.dailyBudget, brandSpent.today),
    brandMonth: remaining(brand.monthlyBudget, brandSpent.month),
    campaignDay: remaining(campaign.dailyBudget, campaignSpent.today),
    campaignMonth: remaining(campaign.monthlyBudget, campaignSpent.month),
  };
}
