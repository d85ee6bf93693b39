import { z } from 'zod';
import { isDateISO } from './date';
import { parseMoney } from './money';

/**
 * Decimal amount (string or number, at most 2 fractional digits) -> cents
 */
const moneySchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const cents = parseMoney(value);
    if (cents === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Amount must be a non-negative decimal with at most 2 fractional digits',
      });
      return z.NEVER;
    }
    return cents;
  });

const positiveMoneySchema = moneySchema.refine((cents) => cents > 0, {
  message: 'Amount must be greater than 0',
});

/**
 * Calendar date in YYYY-MM-DD format
 */
const dateSchema = z
  .string()
  .refine(isDateISO, 'Date must be a calendar date in YYYY-MM-DD format');

const nameSchema = z
  .string()
  .trim()
  .min(1, 'Name must not be empty')
  .max(100, 'Name must not exceed 100 characters');

/**
 * Path parameter id
 */
export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

/**
 * Brand create schema
 */
export const BrandCreateSchema = z.object({
  name: nameSchema,
  daily_budget: moneySchema.optional(),
  monthly_budget: moneySchema.optional(),
});

/**
 * Brand update schema (all fields optional)
 */
export const BrandUpdateSchema = BrandCreateSchema.partial();

const campaignFields = {
  name: nameSchema,
  daily_budget: moneySchema.optional(),
  monthly_budget: moneySchema.optional(),
  active: z.boolean().optional(),
  // null clears a bound
  start_date: dateSchema.nullable().optional(),
  end_date: dateSchema.nullable().optional(),
};

/**
 * Campaign create schema
 */
export const CampaignCreateSchema = z.object(campaignFields).refine(
  (data) => !data.start_date || !data.end_date || data.start_date <= data.end_date,
  {
    message: 'start_date must not be after end_date',
    path: ['end_date'],
  }
);

/**
 * Campaign update schema; the date order is checked against the merged record
 */
export const CampaignUpdateSchema = z.object(campaignFields).partial();

/**
 * Campaign list query
 */
export const CampaignListQuerySchema = z.object({
  brand_id: z.coerce.number().int().positive().optional(),
});

/**
 * Schedule schema: half-open hour range [start_hour, end_hour)
 */
export const ScheduleSchema = z
  .object({
    start_hour: z.number().int().min(0).max(23).default(0),
    end_hour: z.number().int().min(1).max(24).default(24),
  })
  .refine((data) => data.start_hour < data.end_hour, {
    message: 'start_hour must be before end_hour',
    path: ['end_hour'],
  });

/**
 * Direct expense append (already-incurred spend)
 */
export const ExpenseCreateSchema = z.object({
  amount: positiveMoneySchema,
  date: dateSchema,
  notes: z.string().max(2000).nullable().optional(),
});

/**
 * Expense list query (inclusive range)
 */
export const ExpenseListQuerySchema = z.object({
  from: dateSchema.optional(),
  to: dateSchema.optional(),
});

/**
 * Moment to evaluate at; defaults to now
 */
const atSchema = z
  .string()
  .datetime({ offset: true, message: 'at must be an ISO 8601 timestamp' })
  .transform((value, ctx) => {
    // the format check admits offsets such as +99:99 that Date cannot resolve
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'at must be a valid point in time',
      });
      return z.NEVER;
    }
    return date;
  });

/**
 * Authorization request (no write)
 */
export const AuthorizeSchema = z.object({
  amount: positiveMoneySchema,
  at: atSchema.optional(),
});

/**
 * Authorize-and-record request; always evaluated at the server clock
 */
export const SpendSchema = z.object({
  amount: positiveMoneySchema,
  notes: z.string().max(2000).nullable().optional(),
});

/**
 * Status query
 */
export const StatusQuerySchema = z.object({
  at: atSchema.optional(),
});
