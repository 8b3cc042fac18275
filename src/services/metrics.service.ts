/**
 * Prometheus Metrics Service
 *
 * Metrics:
 * - token_exchanges_total{purpose,outcome}: token exchanges (login / renewal)
 * - upstream_requests_total{operation,status_code}: calls to the remote API
 * - upstream_duration_seconds{operation}: remote call duration histogram
 * - local_api_requests_total{method,route,status_code}: local API requests
 * - local_api_duration_seconds{method,route,status_code}: local API duration histogram
 * - session_authenticated: 1 while a session exists
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export type TokenExchangePurpose = 'login' | 'renewal';

/**
 * Prometheus Metrics Registry
 */
export class MetricsService {
  private registry: Registry;

  // Counters
  public tokenExchangesTotal: Counter<'purpose' | 'outcome'>;
  public upstreamRequestsTotal: Counter<'operation' | 'status_code'>;
  public apiRequestsTotal: Counter<'method' | 'route' | 'status_code'>;

  // Histograms
  public upstreamDuration: Histogram<'operation'>;
  public apiDuration: Histogram<'method' | 'route' | 'status_code'>;

  // Gauges
  public sessionAuthenticated: Gauge;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'local-sites-proxy',
    });

    this.tokenExchangesTotal = new Counter({
      name: 'token_exchanges_total',
      help: 'Total number of client-credentials token exchanges',
      labelNames: ['purpose', 'outcome'] as const,
      registers: [this.registry],
    });

    this.upstreamRequestsTotal = new Counter({
      name: 'upstream_requests_total',
      help: 'Total number of requests sent to the remote API by status code',
      labelNames: ['operation', 'status_code'] as const,
      registers: [this.registry],
    });

    this.apiRequestsTotal = new Counter({
      name: 'local_api_requests_total',
      help: 'Total number of local API requests by status code',
      labelNames: ['method', 'route', 'status_code'] as const,
      registers: [this.registry],
    });

    this.upstreamDuration = new Histogram({
      name: 'upstream_duration_seconds',
      help: 'Remote API call duration in seconds',
      labelNames: ['operation'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30], // seconds
      registers: [this.registry],
    });

    this.apiDuration = new Histogram({
      name: 'local_api_duration_seconds',
      help: 'Local API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30], // seconds
      registers: [this.registry],
    });

    this.sessionAuthenticated = new Gauge({
      name: 'session_authenticated',
      help: '1 while an authenticated session exists, 0 otherwise',
      registers: [this.registry],
    });
  }

  /**
   * Records a token exchange
   */
  recordTokenExchange(purpose: TokenExchangePurpose, success: boolean) {
    this.tokenExchangesTotal.inc({ purpose, outcome: success ? 'SUCCESS' : 'FAILED' });
  }

  /**
   * Records an upstream call. Transport failures are recorded with status 0.
   */
  recordUpstreamRequest(operation: string, statusCode: number, durationSeconds: number) {
    this.upstreamRequestsTotal.inc({ operation, status_code: statusCode.toString() });
    this.upstreamDuration.observe({ operation }, durationSeconds);
  }

  /**
   * Records local API request
   */
  recordApiRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    this.apiRequestsTotal.inc({
      method,
      route,
      status_code: statusCode.toString()
    });
    this.apiDuration.observe({
      method,
      route,
      status_code: statusCode.toString()
    }, durationSeconds);
  }

  /**
   * Updates session gauge
   */
  setSessionAuthenticated(authenticated: boolean) {
    this.sessionAuthenticated.set(authenticated ? 1 : 0);
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
