import express, { Express, Request, Response, NextFunction } from 'express';
import { errorHandler, notFoundHandler } from './lib/errors';
import { SpendService } from './lib/spend';
import { TIME_ZONE } from './config';
import { auth as defaultAuth } from './middleware/auth';
import { loggingMiddleware } from './middleware/logging';
import { getMetrics, incHttpRequest, observeHttpDuration } from './metrics';
import { createBrandRoutes } from './routes/brands';
import { createCampaignRoutes } from './routes/campaigns';
import { createSpendRoutes } from './routes/spend';

export interface AppOptions {
  spend?: SpendService;
  auth?: (req: Request, res: Response, next: NextFunction) => void;
}

/**
 * Create and configure Express application
 *
 * The database must be initialised (initDatabase) before requests arrive.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();
  const spend = options.spend ?? new SpendService();

  // Middleware
  app.use(express.json());

  // Structured logging middleware (adds req.id and req.log)
  app.use(loggingMiddleware);

  // Metrics middleware (track request duration and count)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - startTime) / 1000; // seconds
      const route = req.baseUrl + (req.route?.path ?? req.path);

      incHttpRequest(route, req.method, res.statusCode);
      observeHttpDuration(route, req.method, duration);
    });

    next();
  });

  // Metrics endpoint (no auth required for monitoring)
  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', 'text/plain');
      res.send(await getMetrics());
    } catch (error) {
      next(error);
    }
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Root endpoint with API documentation
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'campaign-budget-guard',
      version: '1.0.0',
      description: 'Budget tracking and spend authorization for advertising campaigns',
      authentication: {
        type: 'Bearer token',
        header: 'Authorization: Bearer <api-key>',
        note: 'Required on every endpoint except /, /health and /metrics when API_KEYS is set',
      },
      endpoints: {
        health: 'GET /health',
        metrics: 'GET /metrics',
        brands: 'POST|GET /brands, GET|PATCH|DELETE /brands/:id',
        campaigns: 'POST /brands/:id/campaigns, GET /campaigns, GET|PATCH|DELETE /campaigns/:id',
        schedule: 'PUT|GET|DELETE /campaigns/:id/schedule (body: { start_hour, end_hour })',
        expenses: 'POST|GET /campaigns/:id/expenses (body: { amount, date, notes? })',
        authorize: 'POST /campaigns/:id/authorize (body: { amount, at? })',
        spend: 'POST /campaigns/:id/spend (body: { amount, notes? })',
        status: 'GET /campaigns/:id/status?at=',
      },
      config: {
        time_zone: TIME_ZONE,
      },
    });
  });

  app.use(options.auth ?? defaultAuth);

  app.use('/', createBrandRoutes(spend));
  app.use('/', createCampaignRoutes(spend));
  app.use('/', createSpendRoutes(spend));

  // 404 handler (must come before error handler)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
