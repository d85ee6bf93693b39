import { Router, Request, Response } from 'express';
import * as repo from '../db/repo';
import { asyncHandler, NotFoundError } from '../lib/errors';
import { BrandCreateSchema, BrandUpdateSchema, CampaignCreateSchema, IdParamSchema } from '../lib/schemas';
import { serializeBrand, serializeCampaign } from '../lib/serializers';
import type { SpendService } from '../lib/spend';
import { getLogger } from '../middleware/logging';
import type { Brand } from '../types';

function requireBrand(id: number): Brand {
  const brand = repo.getBrand(id);
  if (!brand) {
    throw new NotFoundError(`Brand ${id} not found`);
  }
  return brand;
}

/**
 * Brand administration
 */
export function createBrandRoutes(spend: SpendService): Router {
  const router = Router();

  /**
   * POST /brands
   * Body: { name, daily_budget?, monthly_budget? }
   */
  router.post('/brands', asyncHandler(async (req: Request, res: Response) => {
    const input = BrandCreateSchema.parse(req.body);

    const brand = repo.createBrand({
      name: input.name,
      dailyBudget: input.daily_budget,
      monthlyBudget: input.monthly_budget,
    });

    getLogger(req).info({ event: 'brand_created', brandId: brand.id, name: brand.name });
    res.status(201).json(serializeBrand(brand));
  }));

  /**
   * GET /brands
   */
  router.get('/brands', asyncHandler(async (_req: Request, res: Response) => {
    res.json(repo.listBrands().map((brand) => serializeBrand(brand)));
  }));

  /**
   * GET /brands/:id
   * Includes spent_today / spent_this_month across all campaigns
   */
  router.get('/brands/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const brand = requireBrand(id);

    const today = spend.localInstant().date;
    res.json(serializeBrand(brand, repo.brandSpendTotals(brand.id, today)));
  }));

  /**
   * PATCH /brands/:id
   * Body: { name?, daily_budget?, monthly_budget? }
   */
  router.patch('/brands/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = BrandUpdateSchema.parse(req.body);

    const brand = repo.updateBrand(id, {
      name: input.name,
      dailyBudget: input.daily_budget,
      monthlyBudget: input.monthly_budget,
    });
    if (!brand) {
      throw new NotFoundError(`Brand ${id} not found`);
    }

    getLogger(req).info({ event: 'brand_updated', brandId: brand.id });
    res.json(serializeBrand(brand));
  }));

  /**
   * DELETE /brands/:id
   * Cascades to campaigns, schedules and expenses
   */
  router.delete('/brands/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);

    if (!repo.deleteBrand(id)) {
      throw new NotFoundError(`Brand ${id} not found`);
    }

    getLogger(req).info({ event: 'brand_deleted', brandId: id });
    res.status(204).end();
  }));

  /**
   * POST /brands/:id/campaigns
   * Body: { name, daily_budget?, monthly_budget?, active?, start_date?, end_date? }
   */
  router.post('/brands/:id/campaigns', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = CampaignCreateSchema.parse(req.body);
    const brand = requireBrand(id);

    const campaign = repo.createCampaign(brand.id, {
      name: input.name,
      dailyBudget: input.daily_budget,
      monthlyBudget: input.monthly_budget,
      active: input.active,
      startDate: input.start_date,
      endDate: input.end_date,
    });

    getLogger(req).info({ event: 'campaign_created', brandId: brand.id, campaignId: campaign.id });
    res.status(201).json(serializeCampaign(campaign, brand, { schedule: null }));
  }));

  return router;
}
