/**
 * Budget Ledger Tests
 */

import { evaluateLedger, remaining, wouldExceed } from '../src/engine';
import { makeSnapshot } from './fixtures';

describe('remaining', () => {
  it('should report a zero cap as unbounded, not as zero remaining', () => {
    expect(remaining(0, 0)).toEqual({ unbounded: true });
    expect(remaining(0, 123_456)).toEqual({ unbounded: true });
  });

  it('should report raw and capped remaining under a cap', () => {
    expect(remaining(10_000, 2_500)).toEqual({
      unbounded: false,
      cap: 10_000,
      spent: 2_500,
      rawRemaining: 7_500,
      cappedRemaining: 7_500,
    });
  });

  it('should keep the overrun in raw remaining and clamp capped remaining at zero', () => {
    expect(remaining(1_000, 1_500)).toEqual({
      unbounded: false,
      cap: 1_000,
      spent: 1_500,
      rawRemaining: -500,
      cappedRemaining: 0,
    });
  });

  it('should keep capped remaining equal to max(0, cap - spent)', () => {
    for (const cap of [1, 100, 10_000]) {
      for (const spent of [0, 1, 99, 100, 101, 20_000]) {
        const headroom = remaining(cap, spent);
        if (headroom.unbounded) {
          throw new Error('capped scope reported as unbounded');
        }
        expect(headroom.cappedRemaining).toBe(Math.max(0, cap - spent));
        expect(headroom.cappedRemaining).toBeGreaterThanOrEqual(0);
      }
    }
  });
});

describe('wouldExceed', () => {
  it('should never trip an unbounded scope', () => {
    expect(wouldExceed({ unbounded: true }, Number.MAX_SAFE_INTEGER)).toBe(false);
  });

  it('should allow spending exactly up to the cap', () => {
    const headroom = remaining(100, 50);

    expect(wouldExceed(headroom, 50)).toBe(false);
    expect(wouldExceed(headroom, 51)).toBe(true);
  });

  it('should trip any amount once the cap has been overrun', () => {
    expect(wouldExceed(remaining(100, 150), 1)).toBe(true);
  });
});

describe('evaluateLedger', () => {
  it('should pair brand totals with brand caps and campaign totals with campaign caps', () => {
    const report = evaluateLedger(
      makeSnapshot({
        brand: { dailyBudget: 10_000, monthlyBudget: 0 },
        campaign: { dailyBudget: 0, monthlyBudget: 50_000 },
        brandSpent: { today: 4_000, month: 30_000 },
        campaignSpent: { today: 1_000, month: 20_000 },
      })
    );

    expect(report.brandDay).toEqual({
      unbounded: false,
      cap: 10_000,
      spent: 4_000,
      rawRemaining: 6_000,
      cappedRemaining: 6_000,
    });
    expect(report.brandMonth).toEqual({ unbounded: true });
    expect(report.campaignDay).toEqual({ unbounded: true });
    expect(report.campaignMonth).toEqual({
      unbounded: false,
      cap: 50_000,
      spent: 20_000,
      rawRemaining: 30_000,
      cappedRemaining: 30_000,
    });
  });
});
