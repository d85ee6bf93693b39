/**
 * Repository Tests
 *
 * Run against an in-memory SQLite database, migrated fresh for every test.
 */

import * as repo from '../src/db/repo';
import { closeDatabase, initDatabase } from '../src/db/sqlite';
import { ConflictError } from '../src/lib/errors';

describe('repository', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('brands', () => {
    it('should create a brand with unset caps by default', () => {
      const brand = repo.createBrand({ name: 'Acme' });

      expect(brand.name).toBe('Acme');
      expect(brand.dailyBudget).toBe(0);
      expect(brand.monthlyBudget).toBe(0);
      expect(repo.getBrand(brand.id)).toEqual(brand);
    });

    it('should reject a duplicate brand name', () => {
      repo.createBrand({ name: 'Acme' });

      expect(() => repo.createBrand({ name: 'Acme' })).toThrow(ConflictError);
    });

    it('should reject renaming onto an existing brand', () => {
      repo.createBrand({ name: 'Acme' });
      const other = repo.createBrand({ name: 'Globex' });

      expect(() => repo.updateBrand(other.id, { name: 'Acme' })).toThrow(ConflictError);
    });

    it('should keep fields missing from an update', () => {
      const brand = repo.createBrand({ name: 'Acme', dailyBudget: 10_000, monthlyBudget: 200_000 });

      const updated = repo.updateBrand(brand.id, { dailyBudget: 5_000 });

      expect(updated?.name).toBe('Acme');
      expect(updated?.dailyBudget).toBe(5_000);
      expect(updated?.monthlyBudget).toBe(200_000);
    });

    it('should return null when updating a missing brand', () => {
      expect(repo.updateBrand(999, { name: 'Nobody' })).toBeNull();
    });

    it('should list brands by name', () => {
      repo.createBrand({ name: 'Globex' });
      repo.createBrand({ name: 'Acme' });

      expect(repo.listBrands().map((b) => b.name)).toEqual(['Acme', 'Globex']);
    });
  });

  describe('campaigns', () => {
    it('should store active and window fields', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, {
        name: 'Launch',
        active: false,
        startDate: '2026-10-01',
        endDate: '2026-10-31',
      });

      expect(campaign).toMatchObject({
        brandId: brand.id,
        name: 'Launch',
        active: false,
        startDate: '2026-10-01',
        endDate: '2026-10-31',
        dailyBudget: 0,
        monthlyBudget: 0,
      });
    });

    it('should clear a date on null and keep it on undefined', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, {
        name: 'Launch',
        startDate: '2026-10-01',
        endDate: '2026-10-31',
      });

      const updated = repo.updateCampaign(campaign.id, { startDate: null });

      expect(updated?.startDate).toBeNull();
      expect(updated?.endDate).toBe('2026-10-31');
    });

    it('should filter campaigns by brand', () => {
      const acme = repo.createBrand({ name: 'Acme' });
      const globex = repo.createBrand({ name: 'Globex' });
      repo.createCampaign(acme.id, { name: 'A1' });
      repo.createCampaign(globex.id, { name: 'G1' });
      repo.createCampaign(acme.id, { name: 'A2' });

      expect(repo.listCampaigns(acme.id).map((c) => c.name)).toEqual(['A1', 'A2']);
      expect(repo.listCampaigns()).toHaveLength(3);
    });
  });

  describe('schedules', () => {
    it('should replace the schedule on a second set', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });

      repo.setSchedule(campaign.id, { startHour: 9, endHour: 17 });
      const replaced = repo.setSchedule(campaign.id, { startHour: 18, endHour: 24 });

      expect(replaced).toMatchObject({ campaignId: campaign.id, startHour: 18, endHour: 24 });
      expect(repo.getSchedule(campaign.id)).toEqual(replaced);
    });

    it('should refuse a schedule whose start is not before its end', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });

      expect(() => repo.setSchedule(campaign.id, { startHour: 10, endHour: 9 })).toThrow();
    });

    it('should report whether a schedule was removed', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });
      repo.setSchedule(campaign.id, { startHour: 9, endHour: 17 });

      expect(repo.deleteSchedule(campaign.id)).toBe(true);
      expect(repo.deleteSchedule(campaign.id)).toBe(false);
      expect(repo.getSchedule(campaign.id)).toBeNull();
    });
  });

  describe('spend aggregation', () => {
    it('should report zero for a campaign with no expenses', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });

      expect(repo.brandSpendTotals(brand.id, '2026-10-19')).toEqual({ today: 0, month: 0 });
      expect(repo.campaignSpendTotals(campaign.id, '2026-10-19')).toEqual({ today: 0, month: 0 });
    });

    it('should sum the day and the month to date, across campaigns for the brand', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const launch = repo.createCampaign(brand.id, { name: 'Launch' });
      const promo = repo.createCampaign(brand.id, { name: 'Promo' });

      repo.insertExpense({ campaignId: launch.id, amount: 1_000, date: '2026-09-30' });
      repo.insertExpense({ campaignId: launch.id, amount: 200, date: '2026-10-01' });
      repo.insertExpense({ campaignId: launch.id, amount: 300, date: '2026-10-19' });
      repo.insertExpense({ campaignId: launch.id, amount: 400, date: '2026-10-20' });
      repo.insertExpense({ campaignId: promo.id, amount: 50, date: '2026-10-19' });

      expect(repo.campaignSpendTotals(launch.id, '2026-10-19')).toEqual({ today: 300, month: 500 });
      expect(repo.brandSpendTotals(brand.id, '2026-10-19')).toEqual({ today: 350, month: 550 });
    });

    it('should not count another brand', () => {
      const acme = repo.createBrand({ name: 'Acme' });
      const globex = repo.createBrand({ name: 'Globex' });
      const campaign = repo.createCampaign(globex.id, { name: 'G1' });
      repo.insertExpense({ campaignId: campaign.id, amount: 900, date: '2026-10-19' });

      expect(repo.brandSpendTotals(acme.id, '2026-10-19')).toEqual({ today: 0, month: 0 });
    });

    it('should list expenses within an inclusive range', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });
      repo.insertExpense({ campaignId: campaign.id, amount: 100, date: '2026-10-01' });
      repo.insertExpense({ campaignId: campaign.id, amount: 200, date: '2026-10-10' });
      repo.insertExpense({ campaignId: campaign.id, amount: 300, date: '2026-10-20', notes: 'late' });

      const listed = repo.listExpenses(campaign.id, { from: '2026-10-10', to: '2026-10-20' });

      expect(listed.map((e) => e.amount)).toEqual([200, 300]);
      expect(listed[1].notes).toBe('late');
      expect(repo.listExpenses(campaign.id)).toHaveLength(3);
    });
  });

  describe('cascading deletes', () => {
    it('should remove campaigns, schedules and expenses with their brand', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });
      repo.setSchedule(campaign.id, { startHour: 9, endHour: 17 });
      repo.insertExpense({ campaignId: campaign.id, amount: 100, date: '2026-10-19' });

      expect(repo.deleteBrand(brand.id)).toBe(true);

      expect(repo.getBrand(brand.id)).toBeNull();
      expect(repo.getCampaign(campaign.id)).toBeNull();
      expect(repo.getSchedule(campaign.id)).toBeNull();
      expect(repo.listExpenses(campaign.id)).toEqual([]);
    });

    it('should remove the schedule and expenses with their campaign and keep the brand', () => {
      const brand = repo.createBrand({ name: 'Acme' });
      const campaign = repo.createCampaign(brand.id, { name: 'Launch' });
      repo.setSchedule(campaign.id, { startHour: 9, endHour: 17 });
      repo.insertExpense({ campaignId: campaign.id, amount: 100, date: '2026-10-19' });

      expect(repo.deleteCampaign(campaign.id)).toBe(true);

      expect(repo.getBrand(brand.id)).not.toBeNull();
      expect(repo.getSchedule(campaign.id)).toBeNull();
      expect(repo.brandSpendTotals(brand.id, '2026-10-19')).toEqual({ today: 0, month: 0 });
    });

    it('should report false for a missing row', () => {
      expect(repo.deleteBrand(42)).toBe(false);
      expect(repo.deleteCampaign(42)).toBe(false);
    });
  });

  describe('loadSpendSnapshot', () => {
    it('should assemble budgets, window, schedule and totals', () => {
      const brand = repo.createBrand({ name: 'Acme', dailyBudget: 10_000 });
      const campaign = repo.createCampaign(brand.id, {
        name: 'Launch',
        monthlyBudget: 50_000,
        endDate: '2026-12-31',
      });
      repo.setSchedule(campaign.id, { startHour: 9, endHour: 17 });
      repo.insertExpense({ campaignId: campaign.id, amount: 700, date: '2026-10-19' });

      expect(repo.loadSpendSnapshot(campaign.id, '2026-10-19')).toEqual({
        brand: { id: brand.id, name: 'Acme', dailyBudget: 10_000, monthlyBudget: 0 },
        campaign: {
          id: campaign.id,
          brandId: brand.id,
          name: 'Launch',
          dailyBudget: 0,
          monthlyBudget: 50_000,
          active: true,
          startDate: null,
          endDate: '2026-12-31',
        },
        schedule: { startHour: 9, endHour: 17 },
        brandSpent: { today: 700, month: 700 },
        campaignSpent: { today: 700, month: 700 },
      });
    });

    it('should return null for a missing campaign', () => {
      expect(repo.loadSpendSnapshot(42, '2026-10-19')).toBeNull();
    });
  });
});
