/**
 * Prometheus Metrics
 *
 * Provides application metrics for monitoring:
 * - HTTP request counters and duration histograms
 * - Spend authorization decisions
 * - Recorded expenses
 */

import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

/**
 * Prometheus registry
 */
export const register = new Registry();

collectDefaultMetrics({ register });

/**
 * HTTP request counter
 * Labels: route, method, status
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['route', 'method', 'status'],
  registers: [register],
});

/**
 * HTTP request duration histogram
 * Labels: route, method
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

/**
 * Spend decision counter
 * Labels: decision (ALLOWED / DENIED_*), mode (evaluate/record)
 */
export const spendDecisionsTotal = new Counter({
  name: 'spend_decisions_total',
  help: 'Total number of spend authorization decisions',
  labelNames: ['decision', 'mode'],
  registers: [register],
});

/**
 * Recorded expense counter
 * Labels: source (spend = authorized recording, admin = direct append)
 */
export const expensesRecordedTotal = new Counter({
  name: 'expenses_recorded_total',
  help: 'Total number of expenses recorded',
  labelNames: ['source'],
  registers: [register],
});

/**
 * Helper: Increment HTTP request counter
 */
export function incHttpRequest(route: string, method: string, status: number): void {
  httpRequestsTotal.inc({
    route: normalizeRoute(route),
    method,
    status: String(status),
  });
}

/**
 * Helper: Observe HTTP request duration
 */
export function observeHttpDuration(route: string, method: string, durationSeconds: number): void {
  httpRequestDuration.observe({
    route: normalizeRoute(route),
    method,
  }, durationSeconds);
}

/**
 * Helper: Increment spend decision counter
 */
export function incSpendDecision(decision: string, mode: 'evaluate' | 'record'): void {
  spendDecisionsTotal.inc({ decision, mode });
}

/**
 * Helper: Increment recorded expense counter
 */
export function incExpenseRecorded(source: 'spend' | 'admin'): void {
  expensesRecordedTotal.inc({ source });
}

/**
 * Normalize route path to remove dynamic segments
 * Example: /campaigns/42/spend -> /campaigns/:id/spend
 */
export function normalizeRoute(route: string): string {
  return route.replace(/\/\d+(?=\/|$)/g, '/:id');
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}
