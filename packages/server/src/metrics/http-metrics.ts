import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';

/**
 * Metrics registry and collectors for the HTTP surface
 */
export class HttpMetrics {
  public readonly registry: Registry;

  public readonly requestsTotal: Counter<'method' | 'route' | 'status'>;
  public readonly requestDuration: Histogram<'method' | 'route'>;
  public readonly requestsInFlight: Gauge;
  public readonly loginsTotal: Counter<'outcome'>;

  constructor(prefix = 'org_auth', options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: `${prefix}_` });
    }

    this.requestsTotal = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'Total HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.registry],
    });

    this.requestsInFlight = new Gauge({
      name: `${prefix}_http_requests_in_flight`,
      help: 'HTTP requests currently being served',
      registers: [this.registry],
    });

    this.loginsTotal = new Counter({
      name: `${prefix}_logins_total`,
      help: 'Completed login callbacks by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });
  }

  /**
   * Prometheus text exposition
   */
  async render(): Promise<{ contentType: string; body: string }> {
    return {
      contentType: this.registry.contentType,
      body: await this.registry.metrics(),
    };
  }
}

/**
 * Record count, duration and in-flight gauge for every request
 *
 * Labels use the matched route pattern so path parameters stay out of
 * label values.
 */
export function metricsMiddleware(metrics: HttpMetrics): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    metrics.requestsInFlight.inc();
    const stopTimer = metrics.requestDuration.startTimer();

    try {
      await next();
    } finally {
      const route = c.req.routePath;
      stopTimer({ method: c.req.method, route });
      metrics.requestsTotal.inc({ method: c.req.method, route, status: String(c.res.status) });
      metrics.requestsInFlight.dec();
    }
  };
}
