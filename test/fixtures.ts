/**
 * Snapshot builders shared by the engine tests
 */

import type {
  BrandSnapshot,
  CampaignSnapshot,
  ScheduleSnapshot,
  SpendSnapshot,
  SpendTotals,
} from '../src/engine';

export interface SnapshotOverrides {
  brand?: Partial<BrandSnapshot>;
  campaign?: Partial<CampaignSnapshot>;
  schedule?: ScheduleSnapshot | null;
  brandSpent?: Partial<SpendTotals>;
  campaignSpent?: Partial<SpendTotals>;
}

/**
 * Brand "Acme" (id 1) with campaign "Launch" (id 10): active, no window,
 * no schedule, every cap unset and nothing spent
 */
export function makeSnapshot(overrides: SnapshotOverrides = {}): SpendSnapshot {
  return {
    brand: {
      id: 1,
      name: 'Acme',
      dailyBudget: 0,
      monthlyBudget: 0,
      ...overrides.brand,
    },
    campaign: {
      id: 10,
      brandId: 1,
      name: 'Launch',
      dailyBudget: 0,
      monthlyBudget: 0,
      active: true,
      startDate: null,
      endDate: null,
      ...overrides.campaign,
    },
    schedule: overrides.schedule ?? null,
    brandSpent: { today: 0, month: 0, ...overrides.brandSpent },
    campaignSpent: { today: 0, month: 0, ...overrides.campaignSpent },
  };
}

export const NOON = { date: '2026-10-19', hour: 12 };
