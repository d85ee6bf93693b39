/**
 * Window Evaluator
 *
 * Decides whether a local instant falls inside a campaign's active date range
 * and its dayparting hours. Dates are ISO strings, so lexical order is
 * calendar order.
 */

import type { LocalInstant } from '../lib/date';
import type { CampaignSnapshot, ScheduleSnapshot } from './snapshot';

type CampaignWindow = Pick<CampaignSnapshot, 'active' | 'startDate' | 'endDate'>;

/**
 * True if the date lies within [startDate, endDate]; an absent bound is open
 */
export function isWithinDateRange(campaign: CampaignWindow, date: string): boolean {
  if (campaign.startDate !== null && date < campaign.startDate) {
    return false;
  }
  if (campaign.endDate !== null && date > campaign.endDate) {
    return false;
  }
  return true;
}

/**
 * True if the hour lies within [startHour, endHour). No schedule means every
 * hour passes; there is no wraparound past midnight.
 */
export function isWithinSchedule(schedule: ScheduleSnapshot | null, hour: number): boolean {
  if (schedule === null) {
    return true;
  }
  return schedule.startHour <= hour && hour < schedule.endHour;
}

export function isWithinWindow(
  campaign: CampaignWindow,
  schedule: ScheduleSnapshot | null,
  instant: LocalInstant
): boolean {
  if (!campaign.active) {
    return false;
  }
  return isWithinDateRange(campaign, instant.date) && isWithinSchedule(schedule, instant.hour);
}
