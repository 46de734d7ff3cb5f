import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createPgStorage } from './storage/pg/index.js';
import { loadConfig, ConfigError, type Config } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { HttpMetrics } from './metrics/http-metrics.js';
import { OidcIdentityProvider } from './providers/oidc-provider.js';
import type { IStorage } from './storage/interfaces/index.js';

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      const logger = createLogger({ level: 'fatal' });
      logger.fatal({ issues: error.issues }, 'invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

// Load configuration
const config = loadConfigOrExit();
const logger = createLogger({ level: config.logging.level });

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  logger.info('using PostgreSQL identity store');
  storage = createPgStorage({
    connectionString: config.database.url,
    max: config.database.poolMax,
    statementTimeoutMs: config.database.statementTimeoutMs,
  });
} else {
  logger.warn('using in-memory identity store (no DATABASE_URL configured); data is lost on restart');
  storage = createMemoryStorage();
}

const app = createAuthServer({
  config,
  storage,
  identityProvider: new OidcIdentityProvider({ config: config.identityProvider }),
  logger,
  metrics: new HttpMetrics('org_auth', { collectDefaults: true }),
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info({ address: info.address, port: info.port }, 'auth service listening');
  }
);

function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server.close(() => {
    const closing = storage.close ? storage.close() : Promise.resolve();
    closing
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'storage close failed');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
