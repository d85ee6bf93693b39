/**
 * Database Repository Functions
 *
 * Thin repository layer over SQLite: administrative CRUD for brands,
 * campaigns, schedules and expenses, plus the spend aggregates the
 * authorization engine consumes. Amounts are stored as integer cents.
 */

import { getDb } from './sqlite';
import { ConflictError } from '../lib/errors';
import { monthStartISO } from '../lib/date';
import type { Cents } from '../lib/money';
import type { SpendSnapshot, SpendTotals } from '../engine';
import type {
  Brand,
  BrandInput,
  Campaign,
  CampaignInput,
  DateRange,
  Expense,
  ExpenseInput,
  Schedule,
  ScheduleInput,
} from '../types';

interface BrandRow {
  id: number;
  name: string;
  daily_budget_cents: number;
  monthly_budget_cents: number;
  created_at: string;
  updated_at: string;
}

interface CampaignRow {
  id: number;
  brand_id: number;
  name: string;
  daily_budget_cents: number;
  monthly_budget_cents: number;
  active: number;
  start_date: string | null;
  end_date: string | null;
  created_at: string;
  updated_at: string;
}

interface ScheduleRow {
  id: number;
  campaign_id: number;
  start_hour: number;
  end_hour: number;
}

interface ExpenseRow {
  id: number;
  campaign_id: number;
  amount_cents: number;
  date: string;
  notes: string | null;
  created_at: string;
}

function mapBrand(row: BrandRow): Brand {
  return {
    id: row.id,
    name: row.name,
    dailyBudget: row.daily_budget_cents,
    monthlyBudget: row.monthly_budget_cents,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    brandId: row.brand_id,
    name: row.name,
    dailyBudget: row.daily_budget_cents,
    monthlyBudget: row.monthly_budget_cents,
    active: row.active !== 0,
    startDate: row.start_date,
    endDate: row.end_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    startHour: row.start_hour,
    endHour: row.end_hour,
  };
}

function mapExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    amount: row.amount_cents,
    date: row.date,
    notes: row.notes,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

// ============================================
// BRANDS
// ============================================

export function getBrand(id: number): Brand | null {
  const row = getDb()
    .prepare<[number], BrandRow>('SELECT * FROM brands WHERE id = ?')
    .get(id);

  return row ? mapBrand(row) : null;
}

export function listBrands(): Brand[] {
  return getDb()
    .prepare<[], BrandRow>('SELECT * FROM brands ORDER BY name')
    .all()
    .map(mapBrand);
}

/**
 * Create a brand
 *
 * @throws ConflictError if the name is already taken
 */
export function createBrand(input: BrandInput): Brand {
  try {
    const result = getDb()
      .prepare<{ name: string; daily: Cents; monthly: Cents }>(
        `INSERT INTO brands (name, daily_budget_cents, monthly_budget_cents)
         VALUES (@name, @daily, @monthly)`
      )
      .run({
        name: input.name,
        daily: input.dailyBudget ?? 0,
        monthly: input.monthlyBudget ?? 0,
      });

    const brand = getBrand(Number(result.lastInsertRowid));
    if (!brand) {
      throw new Error('Failed to retrieve brand after insert');
    }
    return brand;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError(`Brand '${input.name}' already exists`);
    }
    throw error;
  }
}

/**
 * Apply a partial update to a brand
 *
 * @returns Updated brand, or null if it does not exist
 * @throws ConflictError if renaming onto an existing name
 */
export function updateBrand(id: number, patch: Partial<BrandInput>): Brand | null {
  const current = getBrand(id);
  if (!current) {
    return null;
  }

  const next = {
    id,
    name: patch.name ?? current.name,
    daily: patch.dailyBudget ?? current.dailyBudget,
    monthly: patch.monthlyBudget ?? current.monthlyBudget,
  };

  try {
    getDb()
      .prepare<typeof next>(
        `UPDATE brands
         SET name = @name,
             daily_budget_cents = @daily,
             monthly_budget_cents = @monthly,
             updated_at = datetime('now')
         WHERE id = @id`
      )
      .run(next);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError(`Brand '${next.name}' already exists`);
    }
    throw error;
  }

  return getBrand(id);
}

/**
 * Delete a brand together with its campaigns, schedules and expenses
 */
export function deleteBrand(id: number): boolean {
  const result = getDb().prepare<[number]>('DELETE FROM brands WHERE id = ?').run(id);
  return result.changes > 0;
}

// ============================================
// CAMPAIGNS
// ============================================

export function getCampaign(id: number): Campaign | null {
  const row = getDb()
    .prepare<[number], CampaignRow>('SELECT * FROM campaigns WHERE id = ?')
    .get(id);

  return row ? mapCampaign(row) : null;
}

export function listCampaigns(brandId?: number): Campaign[] {
  const db = getDb();
  const rows = brandId === undefined
    ? db.prepare<[], CampaignRow>('SELECT * FROM campaigns ORDER BY id').all()
    : db.prepare<[number], CampaignRow>('SELECT * FROM campaigns WHERE brand_id = ? ORDER BY id').all(brandId);

  return rows.map(mapCampaign);
}

interface CampaignParams {
  name: string;
  daily: Cents;
  monthly: Cents;
  active: number;
  startDate: string | null;
  endDate: string | null;
}

/**
 * Create a campaign under an existing brand
 */
export function createCampaign(brandId: number, input: CampaignInput): Campaign {
  const params: CampaignParams & { brandId: number } = {
    brandId,
    name: input.name,
    daily: input.dailyBudget ?? 0,
    monthly: input.monthlyBudget ?? 0,
    active: input.active === false ? 0 : 1,
    startDate: input.startDate ?? null,
    endDate: input.endDate ?? null,
  };

  const result = getDb()
    .prepare<typeof params>(
      `INSERT INTO campaigns (brand_id, name, daily_budget_cents, monthly_budget_cents, active, start_date, end_date)
       VALUES (@brandId, @name, @daily, @monthly, @active, @startDate, @endDate)`
    )
    .run(params);

  const campaign = getCampaign(Number(result.lastInsertRowid));
  if (!campaign) {
    throw new Error('Failed to retrieve campaign after insert');
  }
  return campaign;
}

/**
 * Apply a partial update to a campaign. A null date clears that bound.
 *
 * @returns Updated campaign, or null if it does not exist
 */
export function updateCampaign(id: number, patch: Partial<CampaignInput>): Campaign | null {
  const current = getCampaign(id);
  if (!current) {
    return null;
  }

  const params: CampaignParams & { id: number } = {
    id,
    name: patch.name ?? current.name,
    daily: patch.dailyBudget ?? current.dailyBudget,
    monthly: patch.monthlyBudget ?? current.monthlyBudget,
    active: (patch.active ?? current.active) ? 1 : 0,
    startDate: patch.startDate === undefined ? current.startDate : patch.startDate,
    endDate: patch.endDate === undefined ? current.endDate : patch.endDate,
  };

  getDb()
    .prepare<typeof params>(
      `UPDATE campaigns
       SET name = @name,
           daily_budget_cents = @daily,
           monthly_budget_cents = @monthly,
           active = @active,
           start_date = @startDate,
           end_date = @endDate,
           updated_at = datetime('now')
       WHERE id = @id`
    )
    .run(params);

  return getCampaign(id);
}

/**
 * Delete a campaign together with its schedule and expenses
 */
export function deleteCampaign(id: number): boolean {
  const result = getDb().prepare<[number]>('DELETE FROM campaigns WHERE id = ?').run(id);
  return result.changes > 0;
}

// ============================================
// SCHEDULES
// ============================================

export function getSchedule(campaignId: number): Schedule | null {
  const row = getDb()
    .prepare<[number], ScheduleRow>('SELECT * FROM schedules WHERE campaign_id = ?')
    .get(campaignId);

  return row ? mapSchedule(row) : null;
}

/**
 * Create or replace the schedule of a campaign (one per campaign)
 */
export function setSchedule(campaignId: number, input: ScheduleInput): Schedule {
  getDb()
    .prepare<{ campaignId: number; startHour: number; endHour: number }>(
      `INSERT INTO schedules (campaign_id, start_hour, end_hour)
       VALUES (@campaignId, @startHour, @endHour)
       ON CONFLICT(campaign_id) DO UPDATE SET
         start_hour = excluded.start_hour,
         end_hour = excluded.end_hour`
    )
    .run({ campaignId, startHour: input.startHour, endHour: input.endHour });

  const schedule = getSchedule(campaignId);
  if (!schedule) {
    throw new Error('Failed to retrieve schedule after upsert');
  }
  return schedule;
}

export function deleteSchedule(campaignId: number): boolean {
  const result = getDb().prepare<[number]>('DELETE FROM schedules WHERE campaign_id = ?').run(campaignId);
  return result.changes > 0;
}

// ============================================
// EXPENSES
// ============================================

/**
 * Append an expense. Expenses are never updated.
 */
export function insertExpense(input: ExpenseInput): Expense {
  const result = getDb()
    .prepare<{ campaignId: number; amount: Cents; date: string; notes: string | null }>(
      `INSERT INTO expenses (campaign_id, amount_cents, date, notes)
       VALUES (@campaignId, @amount, @date, @notes)`
    )
    .run({
      campaignId: input.campaignId,
      amount: input.amount,
      date: input.date,
      notes: input.notes ?? null,
    });

  const row = getDb()
    .prepare<[number], ExpenseRow>('SELECT * FROM expenses WHERE id = ?')
    .get(Number(result.lastInsertRowid));
  if (!row) {
    throw new Error('Failed to retrieve expense after insert');
  }
  return mapExpense(row);
}

/**
 * List a campaign's expenses, optionally within an inclusive date range
 */
export function listExpenses(campaignId: number, range: DateRange = {}): Expense[] {
  return getDb()
    .prepare<{ campaignId: number; from: string | null; to: string | null }, ExpenseRow>(
      `SELECT * FROM expenses
       WHERE campaign_id = @campaignId
         AND (@from IS NULL OR date >= @from)
         AND (@to IS NULL OR date <= @to)
       ORDER BY date, id`
    )
    .all({ campaignId, from: range.from ?? null, to: range.to ?? null })
    .map(mapExpense);
}

// ============================================
// SPEND AGGREGATION
// ============================================

/**
 * Total spend across all campaigns of a brand within [from, to]
 *
 * @returns Total in cents, 0 when there are no expenses
 */
export function brandSpend(brandId: number, from: string, to: string): Cents {
  const row = getDb()
    .prepare<[number, string, string], { total: number }>(
      `SELECT COALESCE(SUM(e.amount_cents), 0) AS total
       FROM expenses e
       JOIN campaigns c ON c.id = e.campaign_id
       WHERE c.brand_id = ? AND e.date >= ? AND e.date <= ?`
    )
    .get(brandId, from, to);

  return row?.total ?? 0;
}

/**
 * Total spend of one campaign within [from, to]
 *
 * @returns Total in cents, 0 when there are no expenses
 */
export function campaignSpend(campaignId: number, from: string, to: string): Cents {
  const row = getDb()
    .prepare<[number, string, string], { total: number }>(
      `SELECT COALESCE(SUM(amount_cents), 0) AS total
       FROM expenses
       WHERE campaign_id = ? AND date >= ? AND date <= ?`
    )
    .get(campaignId, from, to);

  return row?.total ?? 0;
}

/**
 * Spend for the given day and for the month up to and including that day
 */
export function brandSpendTotals(brandId: number, dateISO: string): SpendTotals {
  return {
    today: brandSpend(brandId, dateISO, dateISO),
    month: brandSpend(brandId, monthStartISO(dateISO), dateISO),
  };
}

export function campaignSpendTotals(campaignId: number, dateISO: string): SpendTotals {
  return {
    today: campaignSpend(campaignId, dateISO, dateISO),
    month: campaignSpend(campaignId, monthStartISO(dateISO), dateISO),
  };
}

/**
 * Load everything the authorization engine needs for a campaign on a date
 *
 * @returns Snapshot, or null if the campaign does not exist
 */
export function loadSpendSnapshot(campaignId: number, dateISO: string): SpendSnapshot | null {
  const campaign = getCampaign(campaignId);
  if (!campaign) {
    return null;
  }

  const brand = getBrand(campaign.brandId);
  if (!brand) {
    return null;
  }

  const schedule = getSchedule(campaignId);

  return {
    brand: {
      id: brand.id,
      name: brand.name,
      dailyBudget: brand.dailyBudget,
      monthlyBudget: brand.monthlyBudget,
    },
    campaign: {
      id: campaign.id,
      brandId: campaign.brandId,
      name: campaign.name,
      dailyBudget: campaign.dailyBudget,
      monthlyBudget: campaign.monthlyBudget,
      active: campaign.active,
      startDate: campaign.startDate,
      endDate: campaign.endDate,
    },
    schedule: schedule ? { startHour: schedule.startHour, endHour: schedule.endHour } : null,
    brandSpent: brandSpendTotals(brand.id, dateISO),
    campaignSpent: campaignSpendTotals(campaign.id, dateISO),
  };
}
