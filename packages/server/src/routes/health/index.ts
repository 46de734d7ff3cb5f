import { Hono } from 'hono';
import type {
  HealthResponse,
  LivenessResponse,
  ReadinessResponse,
  ComponentHealth,
} from '@org-auth/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { IIdentityStore } from '../../storage/interfaces/identity-store.js';
import type { HttpMetrics } from '../../metrics/http-metrics.js';
import { SERVICE_VERSION } from '../../config/constants.js';

export interface HealthRoutesOptions {
  store: Pick<IIdentityStore, 'ping'>;
  metrics?: HttpMetrics;
  startedAt?: number;
}

async function checkStore(store: Pick<IIdentityStore, 'ping'>): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    await store.ping();
    return { status: 'healthy', response_time_ms: Date.now() - start };
  } catch (error) {
    return {
      status: 'unhealthy',
      message: error instanceof Error ? error.message : 'Store ping failed',
      response_time_ms: Date.now() - start,
    };
  }
}

/**
 * Create health, readiness and metrics routes
 */
export function createHealthRoutes(options: HealthRoutesOptions): Hono<AuthEnv> {
  const { store, metrics, startedAt = Date.now() } = options;
  const app = new Hono<AuthEnv>();

  app.get('/health', async (c) => {
    const storeHealth = await checkStore(store);
    const body: HealthResponse = {
      status: storeHealth.status,
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      checks: { store: storeHealth },
    };
    return c.json(body, storeHealth.status === 'healthy' ? 200 : 503);
  });

  app.get('/live', (c) => {
    const body: LivenessResponse = { status: 'alive' };
    return c.json(body);
  });

  app.get('/ready', async (c) => {
    const storeHealth = await checkStore(store);
    const ready = storeHealth.status === 'healthy';
    const body: ReadinessResponse = { status: ready ? 'ready' : 'not_ready', ready };
    return c.json(body, ready ? 200 : 503);
  });

  if (metrics) {
    app.get('/metrics', async (c) => {
      const { contentType, body } = await metrics.render();
      return c.body(body, 200, { 'Content-Type': contentType });
    });
  }

  return app;
}
