/**
 * Spend Authorization Engine
 *
 * Pure decision over a spend snapshot. Checks run in a fixed order and the
 * first failing one names the decision:
 *
 *   1. campaign inactive
 *   2. outside the date range or schedule
 *   3. brand daily cap
 *   4. brand monthly cap
 *   5. campaign daily cap
 *   6. campaign monthly cap
 *
 * The engine never writes. Callers must record the expense only after
 * ALLOWED, and must re-check against fresh totals inside the same
 * transaction as the write (see SpendService.record).
 */

import type { LocalInstant } from '../lib/date';
import type { Cents } from '../lib/money';
import { BUDGET_SCOPES, BudgetScope, LedgerReport, evaluateLedger, wouldExceed } from './ledger';
import {
  SpendSnapshot,
  localInstantSchema,
  parseOrThrow,
  proposedAmountSchema,
  spendSnapshotSchema,
} from './snapshot';
import { isWithinWindow } from './window';

export const Decision = {
  ALLOWED: 'ALLOWED',
  DENIED_INACTIVE: 'DENIED_INACTIVE',
  DENIED_OUT_OF_WINDOW: 'DENIED_OUT_OF_WINDOW',
  DENIED_BRAND_DAILY_CAP: 'DENIED_BRAND_DAILY_CAP',
  DENIED_BRAND_MONTHLY_CAP: 'DENIED_BRAND_MONTHLY_CAP',
  DENIED_CAMPAIGN_DAILY_CAP: 'DENIED_CAMPAIGN_DAILY_CAP',
  DENIED_CAMPAIGN_MONTHLY_CAP: 'DENIED_CAMPAIGN_MONTHLY_CAP',
} as const;

export type Decision = (typeof Decision)[keyof typeof Decision];

const CAP_DENIALS: Record<BudgetScope, Decision> = {
  brandDay: Decision.DENIED_BRAND_DAILY_CAP,
  brandMonth: Decision.DENIED_BRAND_MONTHLY_CAP,
  campaignDay: Decision.DENIED_CAMPAIGN_DAILY_CAP,
  campaignMonth: Decision.DENIED_CAMPAIGN_MONTHLY_CAP,
};

export interface AuthorizationResult {
  decision: Decision;
  allowed: boolean;
  instant: LocalInstant;
  /** Headroom before the proposed amount, reported for every decision */
  headroom: LedgerReport;
}

/**
 * Decide whether a campaign may spend an amount at a local instant
 *
 * @throws ValidationError if the amount is not positive whole cents, or the
 * snapshot or instant is malformed
 */
export function authorize(
  snapshot: SpendSnapshot,
  proposedAmount: Cents,
  instant: LocalInstant
): AuthorizationResult {
  const amount = parseOrThrow(proposedAmountSchema, proposedAmount, 'Invalid proposed amount');
  const snap = parseOrThrow(spendSnapshotSchema, snapshot, 'Invalid spend snapshot');
  const at = parseOrThrow(localInstantSchema, instant, 'Invalid evaluation instant');

  const headroom = evaluateLedger(snap);
  const decide = (decision: Decision): AuthorizationResult => ({
    decision,
    allowed: decision === Decision.ALLOWED,
    instant: at,
    headroom,
  });

  if (!snap.campaign.active) {
    return decide(Decision.DENIED_INACTIVE);
  }

  if (!isWithinWindow(snap.campaign, snap.schedule, at)) {
    return decide(Decision.DENIED_OUT_OF_WINDOW);
  }

  for (const scope of BUDGET_SCOPES) {
    if (wouldExceed(headroom[scope], amount)) {
      return decide(CAP_DENIALS[scope]);
    }
  }

  return decide(Decision.ALLOWED);
}
