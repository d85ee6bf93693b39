/**
 * Spend Authorization Engine Tests
 */

import { authorize, Decision } from '../src/engine';
import { ValidationError } from '../src/lib/errors';
import { makeSnapshot, NOON } from './fixtures';

describe('authorize', () => {
  describe('decisions', () => {
    it('should allow spend under the brand daily cap and deny the amount that would cross it', () => {
      const fresh = makeSnapshot({ brand: { dailyBudget: 10_000 } });
      const first = authorize(fresh, 5_000, NOON);

      expect(first.decision).toBe(Decision.ALLOWED);
      expect(first.allowed).toBe(true);

      const afterFirst = makeSnapshot({
        brand: { dailyBudget: 10_000 },
        brandSpent: { today: 5_000, month: 5_000 },
        campaignSpent: { today: 5_000, month: 5_000 },
      });
      const second = authorize(afterFirst, 6_000, NOON);

      expect(second.decision).toBe(Decision.DENIED_BRAND_DAILY_CAP);
      expect(second.allowed).toBe(false);
      expect(second.headroom.brandDay).toEqual({
        unbounded: false,
        cap: 10_000,
        spent: 5_000,
        rawRemaining: 5_000,
        cappedRemaining: 5_000,
      });
    });

    it('should allow an amount that lands exactly on the cap', () => {
      const snapshot = makeSnapshot({
        brand: { dailyBudget: 10_000 },
        brandSpent: { today: 5_000, month: 5_000 },
      });

      expect(authorize(snapshot, 5_000, NOON).decision).toBe(Decision.ALLOWED);
    });

    it('should deny an inactive campaign whatever the amount or budgets', () => {
      const snapshot = makeSnapshot({ campaign: { active: false } });

      expect(authorize(snapshot, 1, NOON).decision).toBe(Decision.DENIED_INACTIVE);
      expect(authorize(snapshot, 1_000_000, NOON).decision).toBe(Decision.DENIED_INACTIVE);
    });

    it('should deny outside the schedule even with budget left', () => {
      const snapshot = makeSnapshot({
        brand: { dailyBudget: 100_000 },
        schedule: { startHour: 9, endHour: 17 },
      });

      expect(authorize(snapshot, 100, { date: '2026-10-19', hour: 8 }).decision).toBe(
        Decision.DENIED_OUT_OF_WINDOW
      );
      expect(authorize(snapshot, 100, { date: '2026-10-19', hour: 9 }).decision).toBe(Decision.ALLOWED);
      expect(authorize(snapshot, 100, { date: '2026-10-19', hour: 17 }).decision).toBe(
        Decision.DENIED_OUT_OF_WINDOW
      );
    });

    it('should deny outside the date range', () => {
      const snapshot = makeSnapshot({ campaign: { startDate: '2026-11-01', endDate: '2026-11-30' } });

      expect(authorize(snapshot, 100, NOON).decision).toBe(Decision.DENIED_OUT_OF_WINDOW);
    });

    it('should never deny on a zero cap at any spend level', () => {
      const snapshot = makeSnapshot({
        brandSpent: { today: 9_000_000, month: 90_000_000 },
        campaignSpent: { today: 9_000_000, month: 90_000_000 },
      });

      expect(authorize(snapshot, 5_000_000, NOON).decision).toBe(Decision.ALLOWED);
    });

    it('should enforce a campaign cap under an uncapped brand', () => {
      const snapshot = makeSnapshot({
        campaign: { dailyBudget: 2_000 },
        campaignSpent: { today: 1_500, month: 1_500 },
      });

      expect(authorize(snapshot, 600, NOON).decision).toBe(Decision.DENIED_CAMPAIGN_DAILY_CAP);
      expect(authorize(snapshot, 500, NOON).decision).toBe(Decision.ALLOWED);
    });

    it('should enforce the campaign daily cap under a generous brand cap', () => {
      const snapshot = makeSnapshot({
        brand: { dailyBudget: 100_000 },
        campaign: { dailyBudget: 2_000 },
        brandSpent: { today: 1_500, month: 1_500 },
        campaignSpent: { today: 1_500, month: 1_500 },
      });

      expect(authorize(snapshot, 1_000, NOON).decision).toBe(Decision.DENIED_CAMPAIGN_DAILY_CAP);
    });

    it('should enforce the campaign monthly cap', () => {
      const snapshot = makeSnapshot({
        campaign: { monthlyBudget: 10_000 },
        campaignSpent: { today: 0, month: 9_900 },
      });

      expect(authorize(snapshot, 101, NOON).decision).toBe(Decision.DENIED_CAMPAIGN_MONTHLY_CAP);
    });
  });

  describe('precedence', () => {
    it('should report inactive before out-of-window', () => {
      const snapshot = makeSnapshot({
        campaign: { active: false, startDate: '2020-01-01', endDate: '2020-01-31' },
      });

      expect(authorize(snapshot, 100, NOON).decision).toBe(Decision.DENIED_INACTIVE);
    });

    it('should report out-of-window before any cap', () => {
      const snapshot = makeSnapshot({
        brand: { dailyBudget: 100 },
        brandSpent: { today: 100, month: 100 },
        schedule: { startHour: 0, endHour: 1 },
      });

      expect(authorize(snapshot, 100, NOON).decision).toBe(Decision.DENIED_OUT_OF_WINDOW);
    });

    it('should report the brand daily cap when brand and campaign daily caps both fail', () => {
      const snapshot = makeSnapshot({
        brand: { dailyBudget: 1_000 },
        campaign: { dailyBudget: 500 },
        brandSpent: { today: 900, month: 900 },
        campaignSpent: { today: 400, month: 400 },
      });

      expect(authorize(snapshot, 200, NOON).decision).toBe(Decision.DENIED_BRAND_DAILY_CAP);
    });

    it('should report the brand monthly cap before the campaign daily cap', () => {
      const snapshot = makeSnapshot({
        brand: { monthlyBudget: 5_000 },
        campaign: { dailyBudget: 500 },
        brandSpent: { today: 0, month: 4_900 },
        campaignSpent: { today: 400, month: 400 },
      });

      expect(authorize(snapshot, 200, NOON).decision).toBe(Decision.DENIED_BRAND_MONTHLY_CAP);
    });

    it('should report the campaign daily cap before the campaign monthly cap', () => {
      const snapshot = makeSnapshot({
        campaign: { dailyBudget: 500, monthlyBudget: 1_000 },
        campaignSpent: { today: 400, month: 900 },
      });

      expect(authorize(snapshot, 200, NOON).decision).toBe(Decision.DENIED_CAMPAIGN_DAILY_CAP);
    });
  });

  it('should stay denied for every larger amount once an amount is denied', () => {
    const snapshot = makeSnapshot({
      brand: { dailyBudget: 10_000 },
      campaign: { monthlyBudget: 50_000 },
      brandSpent: { today: 3_000, month: 3_000 },
      campaignSpent: { today: 3_000, month: 45_000 },
    });

    let denied = false;
    for (let amount = 500; amount <= 10_000; amount += 500) {
      const { allowed } = authorize(snapshot, amount, NOON);
      if (denied) {
        expect(allowed).toBe(false);
      }
      denied = denied || !allowed;
    }
    expect(denied).toBe(true);
  });

  it('should report headroom for every scope on every decision', () => {
    const result = authorize(makeSnapshot({ campaign: { active: false } }), 100, NOON);

    expect(result.instant).toEqual(NOON);
    expect(result.headroom).toEqual({
      brandDay: { unbounded: true },
      brandMonth: { unbounded: true },
      campaignDay: { unbounded: true },
      campaignMonth: { unbounded: true },
    });
  });

  describe('invalid input', () => {
    it('should reject a zero, negative or fractional amount', () => {
      for (const amount of [0, -100, 12.5]) {
        expect(() => authorize(makeSnapshot(), amount, NOON)).toThrow(ValidationError);
      }
    });

    it('should reject a schedule whose start is not before its end', () => {
      const snapshot = makeSnapshot({ schedule: { startHour: 10, endHour: 10 } });

      expect(() => authorize(snapshot, 100, NOON)).toThrow(ValidationError);
    });

    it('should reject a campaign that does not belong to the brand', () => {
      const snapshot = makeSnapshot({ campaign: { brandId: 2 } });

      expect(() => authorize(snapshot, 100, NOON)).toThrow(ValidationError);
    });

    it('should reject an hour outside 0-23', () => {
      expect(() => authorize(makeSnapshot(), 100, { date: '2026-10-19', hour: 24 })).toThrow(ValidationError);
    });

    it('should reject negative budgets', () => {
      const snapshot = makeSnapshot({ brand: { dailyBudget: -1 } });

      expect(() => authorize(snapshot, 100, NOON)).toThrow(ValidationError);
    });
  });
});
