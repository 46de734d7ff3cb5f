import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestId } from 'hono/request-id';
import type { Logger } from 'pino';
import type { AuthEnv } from './types/hono.js';
import type { Config } from './config/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { IIdentityProvider } from './providers/identity-provider.js';
import { createLogger } from './logging/logger.js';
import { PinoSecurityEventSink, type SecurityEventSink } from './logging/security-events.js';
import { HttpMetrics, metricsMiddleware } from './metrics/http-metrics.js';
import { createErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { accessGate } from './middleware/bearer-auth.js';
import { TokenService } from './services/token-service.js';
import { IdentityService } from './services/identity-service.js';
import { LoginService } from './services/login-service.js';
import { AccessGate } from './services/access-gate.js';
import { Authorizer } from './services/authorization.js';
import { createTenantPolicy } from './services/tenant-policy.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createSecureRoutes } from './routes/secure/index.js';
import { createHealthRoutes } from './routes/health/index.js';

export interface AuthServerOptions {
  config: Config;
  storage: IStorage;
  identityProvider: IIdentityProvider;
  logger?: Logger;
  /**
   * Destination for security events (defaults to the logger)
   */
  events?: SecurityEventSink;
  metrics?: HttpMetrics;
}

/**
 * Create the authentication service application
 */
export function createAuthServer(options: AuthServerOptions): Hono<AuthEnv> {
  const { config, storage, identityProvider } = options;
  const logger = options.logger ?? createLogger({ level: config.logging.level });
  const events = options.events ?? new PinoSecurityEventSink(logger);
  const metrics = options.metrics ?? new HttpMetrics();

  const tokenService = new TokenService(config.auth);
  const identityService = new IdentityService({
    store: storage.identities,
    policy: createTenantPolicy(config.tenancy),
    tenancy: config.tenancy,
    events,
  });
  const loginService = new LoginService({
    identityProvider,
    attempts: storage.loginAttempts,
    identityService,
    tokenService,
    config: config.auth,
    events,
  });
  const gate = new AccessGate({
    tokenService,
    exemptPaths: config.auth.exemptPaths,
    events,
  });
  const authorizer = new Authorizer(events);

  const app = new Hono<AuthEnv>();

  // Global error handler
  app.onError(createErrorHandler(logger));

  app.use('*', requestId());
  app.use('*', securityHeaders(config.server.nodeEnv));
  app.use('*', requestLogger(logger));
  app.use('*', metricsMiddleware(metrics));

  if (config.server.enableCors) {
    app.use(
      '*',
      cors({
        origin: config.server.corsOrigin,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate', 'X-Request-Id'],
        maxAge: 86400,
      })
    );
  }

  // Login endpoints only
  app.use('/auth/*', rateLimiter(config.rateLimit));

  // Runs on every route; exempt paths pass without a token
  app.use('*', accessGate(gate));

  app.route('/', createHealthRoutes({ store: storage.identities, metrics }));

  app.route(
    '/auth',
    createAuthRoutes({ loginService, config: config.auth, metrics })
  );

  app.route(
    '/secure',
    createSecureRoutes({
      store: storage.identities,
      authorizer,
      events,
      ownerRole: config.tenancy.ownerRole,
    })
  );

  return app;
}
