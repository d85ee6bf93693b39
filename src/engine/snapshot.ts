/**
 * Spend Snapshot
 *
 * The already-materialized view of a campaign the engine decides over:
 * brand and campaign budgets, the campaign window, the optional schedule and
 * the aggregated spend for the evaluation day and month. All amounts are
 * integer cents.
 */

import { z } from 'zod';
import { isDateISO } from '../lib/date';
import { ValidationError } from '../lib/errors';

const centsSchema = z.number().int().nonnegative();

const idSchema = z.number().int().positive();

const dateSchema = z.string().refine(isDateISO, 'Expected a calendar date (YYYY-MM-DD)');

export const brandSnapshotSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1, 'Brand name must not be empty'),
  dailyBudget: centsSchema,
  monthlyBudget: centsSchema,
});

export const campaignSnapshotSchema = z.object({
  id: idSchema,
  brandId: idSchema,
  name: z.string(),
  dailyBudget: centsSchema,
  monthlyBudget: centsSchema,
  active: z.boolean(),
  startDate: dateSchema.nullable(),
  endDate: dateSchema.nullable(),
});

/**
 * Half-open hour interval [startHour, endHour); endHour 24 is end of day
 */
export const scheduleSnapshotSchema = z
  .object({
    startHour: z.number().int().min(0).max(23),
    endHour: z.number().int().min(1).max(24),
  })
  .refine((s) => s.startHour < s.endHour, {
    message: 'startHour must be before endHour',
    path: ['endHour'],
  });

export const spendTotalsSchema = z.object({
  today: centsSchema,
  month: centsSchema,
});

export const spendSnapshotSchema = z
  .object({
    brand: brandSnapshotSchema,
    campaign: campaignSnapshotSchema,
    schedule: scheduleSnapshotSchema.nullable(),
    brandSpent: spendTotalsSchema,
    campaignSpent: spendTotalsSchema,
  })
  .refine((s) => s.campaign.brandId === s.brand.id, {
    message: 'Campaign does not belong to the snapshot brand',
    path: ['campaign', 'brandId'],
  });

export const localInstantSchema = z.object({
  date: dateSchema,
  hour: z.number().int().min(0).max(23),
});

export const proposedAmountSchema = z
  .number()
  .int('Proposed amount must be whole cents')
  .positive('Proposed amount must be greater than 0');

export type BrandSnapshot = z.infer<typeof brandSnapshotSchema>;
export type CampaignSnapshot = z.infer<typeof campaignSnapshotSchema>;
export type ScheduleSnapshot = z.infer<typeof scheduleSnapshotSchema>;
export type SpendTotals = z.infer<typeof spendTotalsSchema>;
export type SpendSnapshot = z.infer<typeof spendSnapshotSchema>;

/**
 * Parse engine input, surfacing failures as ValidationError
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  message: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    );
  }
  return result.data;
}
