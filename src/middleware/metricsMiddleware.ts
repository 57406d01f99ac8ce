/**
 * Metrics Middleware
 *
 * Records latency and status for every HTTP request, and serves the
 * collected figures on /metrics and /health.
 */

import { Request, Response, NextFunction } from 'express';
import { metrics } from '../utils/metrics';
import { logger } from '../utils/logger';

const SLOW_REQUEST_MS = 1000;

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const method = req.method;

  res.on('finish', () => {
    // Route is only known once the router has matched
    const route = extractRoutePattern(req);
    const latency = Date.now() - startTime;
    const statusCode = res.statusCode;

    metrics.recordRequest(route, latency, statusCode, method);

    if (latency > SLOW_REQUEST_MS) {
      logger.warn({ route, method, statusCode, latency }, 'Slow request detected');
    }
  });

  next();
}

/**
 * Normalized route: /api/parcels/12/packet-sent -> /api/parcels/:id/packet-sent
 */
export function extractRoutePattern(req: Request): string {
  const matched: unknown = req.route;
  if (typeof matched === 'object' && matched !== null && 'path' in matched && typeof matched.path === 'string') {
    return `${req.baseUrl || ''}${matched.path}`;
  }

  const path = req.originalUrl.split('?')[0] || req.path;
  return path.replace(/\/\d+/g, '/:id');
}

/**
 * GET /metrics
 * ?format=prometheus for text exposition, ?format=summary for per-route rows
 */
export function metricsEndpoint(req: Request, res: Response): void {
  const format = typeof req.query.format === 'string' ? req.query.format : 'json';
  const minRequests = parseInt(typeof req.query.minRequests === 'string' ? req.query.minRequests : '', 10) || 1;

  if (format === 'prometheus') {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.getPrometheusMetrics());
  } else if (format === 'summary') {
    res.json({
      timestamp: new Date().toISOString(),
      routes: metrics.getRouteSummary(minRequests),
    });
  } else {
    res.json(metrics.getSnapshot());
  }
}

export function healthEndpoint(_req: Request, res: Response): void {
  const snapshot = metrics.getSnapshot();
  const alerts = metrics.getAlertStatus();

  const isHealthy = !alerts.highErrorRate && !alerts.highMemory;

  res.status(isHealthy ? 200 : 503).json({
    status: isHealthy ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    uptime: snapshot.system.uptime,
    alerts: {
      highErrorRate: alerts.highErrorRate ? 'CRITICAL: Error rate > 5%' : 'OK',
      highMemory: alerts.highMemory ? 'WARNING: Memory > 500MB' : 'OK',
      slowQueries: alerts.slowQueries ? 'WARNING: Slow queries detected' : 'OK',
    },
    metrics: {
      totalRequests: snapshot.system.totalRequests,
      errorRate: `${snapshot.system.errorRate}%`,
      memoryMB: snapshot.system.memoryUsageMB,
      dbQueries: snapshot.database.queryCount,
      auditEntriesWritten: snapshot.ledger.auditEntriesWritten,
    },
  });
}

export default metricsMiddleware;
