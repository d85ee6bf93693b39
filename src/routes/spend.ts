import { Router, Request, Response } from 'express';
import { asyncHandler } from '../lib/errors';
import { AuthorizeSchema, IdParamSchema, SpendSchema, StatusQuerySchema } from '../lib/schemas';
import { serializeAuthorization, serializeRecord, serializeStatus } from '../lib/serializers';
import type { SpendService } from '../lib/spend';
import { getLogger } from '../middleware/logging';
import { requireCampaign } from './campaigns';

/**
 * Spend authorization endpoints. Denials are answered as data with a
 * decision code, never as error statuses.
 */
export function createSpendRoutes(spend: SpendService): Router {
  const router = Router();

  /**
   * POST /campaigns/:id/authorize
   * Evaluate a proposed amount without recording it
   *
   * Body: { amount, at? }
   * Returns: { decision, allowed, local_date, local_hour, headroom }
   */
  router.post('/campaigns/:id/authorize', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = AuthorizeSchema.parse(req.body);

    const result = spend.evaluate(id, input.amount, input.at, getLogger(req));
    res.json(serializeAuthorization(result));
  }));

  /**
   * POST /campaigns/:id/spend
   * Authorize at the server clock and record the expense when allowed
   *
   * Body: { amount, notes? }
   * Returns: 201 with the expense when allowed, 200 with expense: null when denied
   */
  router.post('/campaigns/:id/spend', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const input = SpendSchema.parse(req.body);
    const { campaign } = requireCampaign(id);

    const outcome = spend.record(campaign.id, input.amount, input.notes ?? null, getLogger(req));
    res.status(outcome.expense ? 201 : 200).json(serializeRecord(outcome, campaign));
  }));

  /**
   * GET /campaigns/:id/status?at=
   * Window flags and headroom at a moment
   */
  router.get('/campaigns/:id/status', asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamSchema.parse(req.params);
    const query = StatusQuerySchema.parse(req.query);

    res.json(serializeStatus(spend.status(id, query.at)));
  }));

  return router;
}
