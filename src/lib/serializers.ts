/**
 * Response serializers: snake_case JSON with amounts as decimal strings
 */

import type { AuthorizationResult, Headroom, LedgerReport, SpendTotals } from '../engine';
import type { Brand, Campaign, Expense, Schedule } from '../types';
import { formatCents } from './money';
import type { CampaignStatus, RecordResult } from './spend';

function pad2(hour: number): string {
  return String(hour).padStart(2, '0');
}

export function campaignLabel(campaign: Campaign, brand: Brand): string {
  return `${campaign.name} (${brand.name})`;
}

export function scheduleLabel(schedule: Schedule, campaign: Campaign): string {
  return `Schedule for ${campaign.name}: ${pad2(schedule.startHour)}:00–${pad2(schedule.endHour)}:00`;
}

export function expenseLabel(expense: Expense, campaign: Campaign): string {
  return `${campaign.name} - ${formatCents(expense.amount)} on ${expense.date}`;
}

export function serializeSpendTotals(totals: SpendTotals) {
  return {
    spent_today: formatCents(totals.today),
    spent_this_month: formatCents(totals.month),
  };
}

export function serializeBrand(brand: Brand, totals?: SpendTotals) {
  return {
    id: brand.id,
    name: brand.name,
    label: brand.name,
    daily_budget: formatCents(brand.dailyBudget),
    monthly_budget: formatCents(brand.monthlyBudget),
    created_at: brand.createdAt,
    updated_at: brand.updatedAt,
    ...(totals ? { spend: serializeSpendTotals(totals) } : {}),
  };
}

export function serializeSchedule(schedule: Schedule, campaign: Campaign) {
  return {
    campaign_id: schedule.campaignId,
    start_hour: schedule.startHour,
    end_hour: schedule.endHour,
    label: scheduleLabel(schedule, campaign),
  };
}

export function serializeCampaign(
  campaign: Campaign,
  brand: Brand,
  extra: { schedule?: Schedule | null; totals?: SpendTotals } = {}
) {
  return {
    id: campaign.id,
    brand_id: campaign.brandId,
    name: campaign.name,
    label: campaignLabel(campaign, brand),
    daily_budget: formatCents(campaign.dailyBudget),
    monthly_budget: formatCents(campaign.monthlyBudget),
    active: campaign.active,
    start_date: campaign.startDate,
    end_date: campaign.endDate,
    created_at: campaign.createdAt,
    updated_at: campaign.updatedAt,
    ...(extra.schedule !== undefined
      ? { schedule: extra.schedule ? serializeSchedule(extra.schedule, campaign) : null }
      : {}),
    ...(extra.totals ? { spend: serializeSpendTotals(extra.totals) } : {}),
  };
}

export function serializeExpense(expense: Expense, campaign: Campaign) {
  return {
    id: expense.id,
    campaign_id: expense.campaignId,
    amount: formatCents(expense.amount),
    date: expense.date,
    notes: expense.notes,
    label: expenseLabel(expense, campaign),
    created_at: expense.createdAt,
  };
}

export function serializeHeadroom(headroom: Headroom) {
  if (headroom.unbounded) {
    return { unbounded: true };
  }
  return {
    unbounded: false,
    cap: formatCents(headroom.cap),
    spent: formatCents(headroom.spent),
    raw_remaining: formatCents(headroom.rawRemaining),
    capped_remaining: formatCents(headroom.cappedRemaining),
  };
}

export function serializeLedger(report: LedgerReport) {
  return {
    brand_day: serializeHeadroom(report.brandDay),
    brand_month: serializeHeadroom(report.brandMonth),
    campaign_day: serializeHeadroom(report.campaignDay),
    campaign_month: serializeHeadroom(report.campaignMonth),
  };
}

export function serializeAuthorization(result: AuthorizationResult) {
  return {
    decision: result.decision,
    allowed: result.allowed,
    local_date: result.instant.date,
    local_hour: result.instant.hour,
    headroom: serializeLedger(result.headroom),
  };
}

export function serializeRecord(outcome: RecordResult, campaign: Campaign) {
  return {
    ...serializeAuthorization(outcome.result),
    expense: outcome.expense ? serializeExpense(outcome.expense, campaign) : null,
  };
}

export function serializeStatus(status: CampaignStatus) {
  return {
    local_date: status.instant.date,
    local_hour: status.instant.hour,
    active: status.active,
    within_date_range: status.withinDateRange,
    within_schedule: status.withinSchedule,
    within_window: status.withinWindow,
    headroom: serializeLedger(status.headroom),
  };
}
