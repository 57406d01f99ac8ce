/**
 * Metrics Collection Utility
 *
 * In-memory metrics for the ledger API: request latency buckets, error rates,
 * database query timing and the number of enforcement log entries written.
 * JSON-serializable for the /metrics endpoint, Prometheus text on request.
 */

import { logger } from './logger';

/**
 * Latency bucket definitions for histogram-style metrics
 * Buckets: <50ms, <100ms, <200ms, <500ms, >=500ms
 */
export const LATENCY_BUCKETS = [50, 100, 200, 500] as const;
export type LatencyBucket = typeof LATENCY_BUCKETS[number] | 'overflow';

/** Slow query threshold in milliseconds */
const SLOW_QUERY_MS = 100;

export interface RouteMetrics {
  requestCount: number;
  /** 4xx + 5xx */
  errorCount: number;
  latencyBuckets: Record<LatencyBucket, number>;
  totalLatency: number;
  /** ISO string */
  lastRequest: string | null;
  maxLatency: number;
}

export interface DbMetrics {
  queryCount: number;
  totalQueryTime: number;
  maxQueryTime: number;
  slowQueries: number;
  /** Per statement type: SELECT, INSERT, TRANSACTION, ... */
  byType: Record<string, number>;
}

export interface LedgerMetrics {
  auditEntriesWritten: number;
  rolledBackTransactions: number;
}

export interface SystemMetrics {
  startTime: string;
  uptime: number;
  totalRequests: number;
  totalErrors: number;
  errorRate: number;
  memoryUsageMB: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  system: SystemMetrics;
  routes: Record<string, RouteMetrics>;
  database: DbMetrics;
  ledger: LedgerMetrics;
}

export interface RouteSummary {
  route: string;
  requests: number;
  errors: number;
  errorRate: number;
  avgLatency: number;
  p95Latency: number;
}

class MetricsCollector {
  private routes: Map<string, RouteMetrics> = new Map();

  private dbMetrics: DbMetrics = MetricsCollector.emptyDbMetrics();

  private ledgerMetrics: LedgerMetrics = {
    auditEntriesWritten: 0,
    rolledBackTransactions: 0,
  };

  private readonly startTime: string = new Date().toISOString();

  /**
   * Record an HTTP request
   *
   * @param route - Route pattern (e.g., '/api/parcels/:id')
   */
  recordRequest(
    route: string,
    latencyMs: number,
    statusCode: number,
    method: string = 'GET'
  ): void {
    const isError = statusCode >= 400;
    const key = `${method}:${route}`;

    let metrics = this.routes.get(key);
    if (!metrics) {
      metrics = this.createEmptyRouteMetrics();
      this.routes.set(key, metrics);
    }

    metrics.requestCount++;
    metrics.totalLatency += latencyMs;
    metrics.lastRequest = new Date().toISOString();
    if (latencyMs > metrics.maxLatency) {
      metrics.maxLatency = latencyMs;
    }

    metrics.latencyBuckets[this.getLatencyBucket(latencyMs)]++;

    if (isError) {
      metrics.errorCount++;
      logger.debug({ route: key, statusCode, latencyMs }, 'Request error recorded');
    }
  }

  recordDbQuery(queryTimeMs: number, queryType: string = 'OTHER'): void {
    this.dbMetrics.queryCount++;
    this.dbMetrics.totalQueryTime += queryTimeMs;
    this.dbMetrics.byType[queryType] = (this.dbMetrics.byType[queryType] || 0) + 1;

    if (queryTimeMs > this.dbMetrics.maxQueryTime) {
      this.dbMetrics.maxQueryTime = queryTimeMs;
    }

    if (queryTimeMs > SLOW_QUERY_MS) {
      this.dbMetrics.slowQueries++;
      logger.warn({ queryTimeMs, queryType }, 'Slow database query detected');
    }
  }

  recordAuditEntry(): void {
    this.ledgerMetrics.auditEntriesWritten++;
  }

  recordRollback(): void {
    this.ledgerMetrics.rolledBackTransactions++;
  }

  getSnapshot(): MetricsSnapshot {
    const uptime = (Date.now() - new Date(this.startTime).getTime()) / 1000;

    let totalRequests = 0;
    let totalErrors = 0;
    for (const metrics of this.routes.values()) {
      totalRequests += metrics.requestCount;
      totalErrors += metrics.errorCount;
    }

    const errorRate = totalRequests > 0
      ? (totalErrors / totalRequests) * 100
      : 0;

    const memoryUsageMB = process.memoryUsage().heapUsed / 1024 / 1024;

    return {
      timestamp: new Date().toISOString(),
      system: {
        startTime: this.startTime,
        uptime: Math.floor(uptime),
        totalRequests,
        totalErrors,
        errorRate: Math.round(errorRate * 100) / 100,
        memoryUsageMB: Math.round(memoryUsageMB * 100) / 100,
      },
      routes: Object.fromEntries(this.routes.entries()),
      database: { ...this.dbMetrics, byType: { ...this.dbMetrics.byType } },
      ledger: { ...this.ledgerMetrics },
    };
  }

  /**
   * Per-route summary sorted by request count, busiest first
   */
  getRouteSummary(minRequests: number = 1): RouteSummary[] {
    const summary: RouteSummary[] = [];

    for (const [route, metrics] of this.routes.entries()) {
      if (metrics.requestCount < minRequests) continue;

      const avgLatency = metrics.requestCount > 0
        ? metrics.totalLatency / metrics.requestCount
        : 0;
      const errorRate = metrics.requestCount > 0
        ? (metrics.errorCount / metrics.requestCount) * 100
        : 0;

      summary.push({
        route,
        requests: metrics.requestCount,
        errors: metrics.errorCount,
        errorRate: Math.round(errorRate * 100) / 100,
        avgLatency: Math.round(avgLatency),
        p95Latency: this.calculateP95(metrics),
      });
    }

    return summary.sort((a, b) => b.requests - a.requests);
  }

  getAlertStatus(): {
    highErrorRate: boolean;
    highMemory: boolean;
    slowQueries: boolean;
  } {
    const snapshot = this.getSnapshot();

    return {
      highErrorRate: snapshot.system.errorRate > 5,
      highMemory: snapshot.system.memoryUsageMB > 500,
      slowQueries: snapshot.database.slowQueries > 5,
    };
  }

  getPrometheusMetrics(): string {
    const snapshot = this.getSnapshot();
    const lines: string[] = [];

    lines.push(`# HELP ledger_system_uptime_seconds Server uptime in seconds`);
    lines.push(`# TYPE ledger_system_uptime_seconds gauge`);
    lines.push(`ledger_system_uptime_seconds ${snapshot.system.uptime}`);

    lines.push(`# HELP ledger_system_error_rate Percentage of requests returning errors`);
    lines.push(`# TYPE ledger_system_error_rate gauge`);
    lines.push(`ledger_system_error_rate ${snapshot.system.errorRate}`);

    for (const [route, metrics] of Object.entries(snapshot.routes)) {
      const safeRoute = route.replace(/[^a-zA-Z0-9_:/]/g, '_');
      lines.push(`ledger_route_requests_total{route="${safeRoute}"} ${metrics.requestCount}`);
      lines.push(`ledger_route_errors_total{route="${safeRoute}"} ${metrics.errorCount}`);
    }

    lines.push(`# HELP ledger_db_queries_total Total database queries`);
    lines.push(`# TYPE ledger_db_queries_total counter`);
    lines.push(`ledger_db_queries_total ${snapshot.database.queryCount}`);

    lines.push(`# HELP ledger_audit_entries_total Enforcement log entries written`);
    lines.push(`# TYPE ledger_audit_entries_total counter`);
    lines.push(`ledger_audit_entries_total ${snapshot.ledger.auditEntriesWritten}`);

    lines.push(`# HELP ledger_rollbacks_total Transactions rolled back`);
    lines.push(`# TYPE ledger_rollbacks_total counter`);
    lines.push(`ledger_rollbacks_total ${snapshot.ledger.rolledBackTransactions}`);

    return lines.join('\n');
  }

  private static emptyDbMetrics(): DbMetrics {
    return {
      queryCount: 0,
      totalQueryTime: 0,
      maxQueryTime: 0,
      slowQueries: 0,
      byType: {},
    };
  }

  private createEmptyRouteMetrics(): RouteMetrics {
    return {
      requestCount: 0,
      errorCount: 0,
      latencyBuckets: {
        50: 0,
        100: 0,
        200: 0,
        500: 0,
        overflow: 0,
      },
      totalLatency: 0,
      lastRequest: null,
      maxLatency: 0,
    };
  }

  private getLatencyBucket(latencyMs: number): LatencyBucket {
    for (const bucket of LATENCY_BUCKETS) {
      if (latencyMs < bucket) return bucket;
    }
    return 'overflow';
  }

  /**
   * Approximate p95 from the bucket thresholds
   */
  private calculateP95(metrics: RouteMetrics): number {
    const total = metrics.requestCount;
    if (total === 0) return 0;

    const p95Index = Math.ceil(total * 0.95);
    let count = 0;

    for (const bucket of LATENCY_BUCKETS) {
      count += metrics.latencyBuckets[bucket];
      if (count >= p95Index) return bucket;
    }

    return 500;
  }
}

export const metrics = new MetricsCollector();
