export { authorize, Decision } from './authorize';
export type { AuthorizationResult } from './authorize';
export { BUDGET_SCOPES, evaluateLedger, remaining, wouldExceed } from './ledger';
export type { BudgetScope, Headroom, LedgerReport } from './ledger';
export { isWithinDateRange, isWithinSchedule, isWithinWindow } from './window';
export type {
  BrandSnapshot,
  CampaignSnapshot,
  ScheduleSnapshot,
  SpendSnapshot,
  SpendTotals,
} from './snapshot';
