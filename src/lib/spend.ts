/**
 * Spend Service
 *
 * Runs the authorization engine against snapshots loaded from the database
 * and records expenses only after an ALLOWED decision. Recording re-reads the
 * aggregates and decides again inside one immediate transaction, so two
 * callers can never both consume the same headroom.
 */

import type { Logger } from 'pino';
import * as repo from '../db/repo';
import { getDb } from '../db/sqlite';
import {
  authorize,
  AuthorizationResult,
  evaluateLedger,
  isWithinDateRange,
  isWithinSchedule,
  isWithinWindow,
  LedgerReport,
  SpendSnapshot,
} from '../engine';
import { TIME_ZONE } from '../config';
import { LocalInstant, toLocalInstant } from './date';
import { NotFoundError } from './errors';
import type { Cents } from './money';
import { logger as rootLogger } from '../middleware/logging';
import { incExpenseRecorded, incSpendDecision } from '../metrics';
import type { Expense } from '../types';

export interface SpendServiceOptions {
  /** IANA zone defining the local date and hour (default: TIME_ZONE) */
  timeZone?: string;
  /** Clock used when no explicit moment is given */
  now?: () => Date;
  logger?: Logger;
}

export interface RecordResult {
  result: AuthorizationResult;
  /** The stored expense, null when the decision was a denial */
  expense: Expense | null;
}

export interface CampaignStatus {
  instant: LocalInstant;
  active: boolean;
  withinDateRange: boolean;
  withinSchedule: boolean;
  /** All three checks above */
  withinWindow: boolean;
  headroom: LedgerReport;
}

export class SpendService {
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: SpendServiceOptions = {}) {
    this.timeZone = options.timeZone ?? TIME_ZONE;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? rootLogger;
  }

  /**
   * Local date and hour of a moment (default: the service clock)
   */
  localInstant(at?: Date): LocalInstant {
    return toLocalInstant(at ?? this.now(), this.timeZone);
  }

  /**
   * Decide whether a campaign may spend an amount, without recording anything
   *
   * @throws NotFoundError if the campaign does not exist
   */
  evaluate(campaignId: number, amount: Cents, at?: Date, log: Logger = this.log): AuthorizationResult {
    const instant = this.localInstant(at);
    const result = authorize(this.snapshot(campaignId, instant.date), amount, instant);

    this.observe(campaignId, amount, result, 'evaluate', log);
    return result;
  }

  /**
   * Authorize and, when allowed, record an expense dated the local day of
   * the service clock
   *
   * @throws NotFoundError if the campaign does not exist
   */
  record(campaignId: number, amount: Cents, notes: string | null = null, log: Logger = this.log): RecordResult {
    const instant = this.localInstant();

    const run = getDb().transaction((): RecordResult => {
      const result = authorize(this.snapshot(campaignId, instant.date), amount, instant);
      if (!result.allowed) {
        return { result, expense: null };
      }

      const expense = repo.insertExpense({
        campaignId,
        amount,
        date: instant.date,
        notes,
      });
      return { result, expense };
    });

    // BEGIN IMMEDIATE takes the write lock before the aggregates are read
    const outcome = run.immediate();

    this.observe(campaignId, amount, outcome.result, 'record', log);
    if (outcome.expense) {
      incExpenseRecorded('spend');
      log.info({
        event: 'expense_recorded',
        campaignId,
        expenseId: outcome.expense.id,
        amountCents: amount,
        date: outcome.expense.date,
      });
    }

    return outcome;
  }

  /**
   * Window flags and headroom of a campaign at a moment
   *
   * @throws NotFoundError if the campaign does not exist
   */
  status(campaignId: number, at?: Date): CampaignStatus {
    const instant = this.localInstant(at);
    const snapshot = this.snapshot(campaignId, instant.date);

    return {
      instant,
      active: snapshot.campaign.active,
      withinDateRange: isWithinDateRange(snapshot.campaign, instant.date),
      withinSchedule: isWithinSchedule(snapshot.schedule, instant.hour),
      withinWindow: isWithinWindow(snapshot.campaign, snapshot.schedule, instant),
      headroom: evaluateLedger(snapshot),
    };
  }

  private snapshot(campaignId: number, dateISO: string): SpendSnapshot {
    const snapshot = repo.loadSpendSnapshot(campaignId, dateISO);
    if (!snapshot) {
      throw new NotFoundError(`Campaign ${campaignId} not found`);
    }
    return snapshot;
  }

  private observe(
    campaignId: number,
    amount: Cents,
    result: AuthorizationResult,
    mode: 'evaluate' | 'record',
    log: Logger
  ): void {
    incSpendDecision(result.decision, mode);

    log.info({
      event: 'spend_decision',
      mode,
      campaignId,
      amountCents: amount,
      decision: result.decision,
      localDate: result.instant.date,
      localHour: result.instant.hour,
    });
  }
}
