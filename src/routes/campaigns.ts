import { Router, Request, Response } from 'express';
import * as repo from '../db/repo';
import { asyncHandler, NotFoundError, ValidationError } from '../lib/errors';
import {
  CampaignListQuerySchema,
  CampaignUpdateSchema,
  ExpenseCreateSchema,
  ExpenseListQuerySchema,
  IdParamSchema,
  ScheduleSchema,
} from '../lib/schemas';
import { serializeCampaign, serializeExpense, serializeSchedule } from '../lib/serializers';
import type { SpendService } from '../lib/spend';
import { incExpenseRecorded } from '../metrics';
import { getLogger } from '../middleware/logging';
import type { Brand, Campaign } from '../types';

/**
 * Load a campaign with its brand or throw 404
 */
export function requireCampaign(id: number): { campaign: Campaign; brand: Brand } {
  const campaign = repo.getCampaign(id);
  const brand = campaign ? repo.getBrand(campaign.brandId) : null;
  if (!campaign || !brand) {
    throw new NotFoundError(`Campaign ${id} not found`);
  }
  return { campaign, brand };
}

/**
 * Campaign, schedule and expense administration
 */
export function createCampaignRoutes(spend: SpendService): Router {
  const router = Router();

  /**
   * GET /campaigns?brand_id=
   */
  router.get('/campaigns', asyncHandler(async (req: Request, res: Response) => {
    const query = CampaignListQuerySchema.parse(req.query);
    const brands = new Map(repo.listBrands().map((brand) => [brand.id, brand]));

    const campaigns = repo.listCampaigns(query.brand_id).flatMap((campaign) => {
      const brand = brands.get(campaign.brandId);
      return brand ? [serializeCampaign(campaign, brand)] : [];
    });

    res.json(campaigns);
  }));

  /**
   * GET /campaigns/:id
   * Includes the schedule and spent_today / spent_this_month
   */
  router.get('/campaigns/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const { campaign, brand } = requireCampaign(id);

    const today = spend.localInstant().date;
    res.json(serializeCampaign(campaign, brand, {
      schedule: repo.getSchedule(campaign.id),
      totals: repo.campaignSpendTotals(campaign.id, today),
    }));
  }));

  /**
   * PATCH /campaigns/:id
   * Body: { name?, daily_budget?, monthly_budget?, active?, start_date?, end_date? }
   */
  router.patch('/campaigns/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = CampaignUpdateSchema.parse(req.body);
    const { campaign: current, brand } = requireCampaign(id);

    const startDate = input.start_date === undefined ? current.startDate : input.start_date;
    const endDate = input.end_date === undefined ? current.endDate : input.end_date;
    if (startDate && endDate && startDate > endDate) {
      throw new ValidationError('start_date must not be after end_date', {
        start_date: startDate,
        end_date: endDate,
      });
    }

    const campaign = repo.updateCampaign(id, {
      name: input.name,
      dailyBudget: input.daily_budget,
      monthlyBudget: input.monthly_budget,
      active: input.active,
      startDate: input.start_date,
      endDate: input.end_date,
    });
    if (!campaign) {
      throw new NotFoundError(`Campaign ${id} not found`);
    }

    getLogger(req).info({ event: 'campaign_updated', campaignId: campaign.id });
    res.json(serializeCampaign(campaign, brand));
  }));

  /**
   * DELETE /campaigns/:id
   * Cascades to the schedule and expenses
   */
  router.delete('/campaigns/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);

    if (!repo.deleteCampaign(id)) {
      throw new NotFoundError(`Campaign ${id} not found`);
    }

    getLogger(req).info({ event: 'campaign_deleted', campaignId: id });
    res.status(204).end();
  }));

  /**
   * PUT /campaigns/:id/schedule
   * Body: { start_hour?, end_hour? } (defaults 0 and 24)
   */
  router.put('/campaigns/:id/schedule', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = ScheduleSchema.parse(req.body);
    const { campaign } = requireCampaign(id);

    const schedule = repo.setSchedule(campaign.id, {
      startHour: input.start_hour,
      endHour: input.end_hour,
    });

    getLogger(req).info({
      event: 'schedule_set',
      campaignId: campaign.id,
      startHour: schedule.startHour,
      endHour: schedule.endHour,
    });
    res.json(serializeSchedule(schedule, campaign));
  }));

  /**
   * GET /campaigns/:id/schedule
   */
  router.get('/campaigns/:id/schedule', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const { campaign } = requireCampaign(id);

    const schedule = repo.getSchedule(campaign.id);
    if (!schedule) {
      throw new NotFoundError(`Campaign ${id} has no schedule`);
    }

    res.json(serializeSchedule(schedule, campaign));
  }));

  /**
   * DELETE /campaigns/:id/schedule
   */
  router.delete('/campaigns/:id/schedule', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    requireCampaign(id);

    if (!repo.deleteSchedule(id)) {
      throw new NotFoundError(`Campaign ${id} has no schedule`);
    }

    res.status(204).end();
  }));

  /**
   * POST /campaigns/:id/expenses
   * Appends already-incurred spend without authorization
   *
   * Body: { amount, date, notes? }
   */
  router.post('/campaigns/:id/expenses', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = ExpenseCreateSchema.parse(req.body);
    const { campaign } = requireCampaign(id);

    const expense = repo.insertExpense({
      campaignId: campaign.id,
      amount: input.amount,
      date: input.date,
      notes: input.notes,
    });

    incExpenseRecorded('admin');
    getLogger(req).info({
      event: 'expense_recorded',
      source: 'admin',
      campaignId: campaign.id,
      expenseId: expense.id,
      amountCents: expense.amount,
      date: expense.date,
    });
    res.status(201).json(serializeExpense(expense, campaign));
  }));

  /**
   * GET /campaigns/:id/expenses?from=&to=
   */
  router.get('/campaigns/:id/expenses', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const query = ExpenseListQuerySchema.parse(req.query);
    const { campaign } = requireCampaign(id);

    const expenses = repo.listExpenses(campaign.id, { from: query.from, to: query.to });
    res.json(expenses.map((expense) => serializeExpense(expense, campaign)));
  }));

  return router;
}
