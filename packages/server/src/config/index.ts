import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { GOOGLE_PROVIDER } from '../providers/google.js';
import type { LogLevel } from '../logging/logger.js';

type Env = Record<string, string | undefined>;

/**
 * Raised when configuration cannot be loaded. Fatal at startup.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: Env, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new ConfigError([`${envVar}_FILE points to a missing file: ${filePath}`]);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  return env[envVar];
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const signingSecret = z
  .string({ required_error: 'JWT_SECRET_KEY is required' })
  .refine((value) => Buffer.byteLength(value, 'utf8') >= constants.MIN_SIGNING_SECRET_BYTES, {
    message: `JWT_SECRET_KEY must be at least ${constants.MIN_SIGNING_SECRET_BYTES} bytes`,
  });

const configSchema = z.object({
  server: z.object({
    port: positiveInt.default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.string().default('development'),
    enableCors: booleanFlag.default('false'),
    corsOrigin: z.string().default('*'),
  }),
  database: z.object({
    url: z.string().url().optional(),
    poolMax: positiveInt.default(constants.DEFAULT_DB_POOL_MAX),
    statementTimeoutMs: positiveInt.default(constants.DEFAULT_DB_STATEMENT_TIMEOUT_MS),
  }),
  auth: z.object({
    signingSecret,
    algorithm: z.enum(constants.SUPPORTED_SIGNING_ALGORITHMS).default(constants.SIGNING_ALGORITHM_HS256),
    tokenTtl: positiveInt.default(constants.DEFAULT_SESSION_TOKEN_TTL),
    exemptPaths: z.array(z.string().startsWith('/')).default([...constants.DEFAULT_EXEMPT_PATHS]),
    stateTtl: positiveInt.default(constants.DEFAULT_LOGIN_STATE_TTL),
    stateCookieName: z.string().min(1).default(constants.DEFAULT_STATE_COOKIE_NAME),
    stateCookieSecret: signingSecret.optional(),
    secureCookies: booleanFlag.optional(),
  }),
  identityProvider: z.object({
    clientId: z.string({ required_error: 'GOOGLE_CLIENT_ID is required' }).min(1),
    clientSecret: z.string({ required_error: 'GOOGLE_CLIENT_SECRET is required' }).min(1),
    redirectUri: z.string({ required_error: 'GOOGLE_OAUTH_REDIRECT_URI is required' }).url(),
    authorizationEndpoint: z.string().url().default(GOOGLE_PROVIDER.authorizationEndpoint),
    tokenEndpoint: z.string().url().default(GOOGLE_PROVIDER.tokenEndpoint),
    userinfoEndpoint: z.string().url().default(GOOGLE_PROVIDER.userinfoEndpoint),
    jwksUri: z.string().url().default(GOOGLE_PROVIDER.jwksUri),
    issuer: z.string().min(1).default(GOOGLE_PROVIDER.issuer),
    scopes: z.array(z.string()).min(1).default([...GOOGLE_PROVIDER.defaultScopes]),
    timeoutMs: positiveInt.default(constants.DEFAULT_IDP_TIMEOUT_MS),
  }),
  tenancy: z.object({
    policy: z.enum(constants.SUPPORTED_TENANT_POLICIES).default(constants.TENANT_POLICY_PER_SIGNUP),
    singleTenantKey: z.string().min(1).default(constants.DEFAULT_SINGLE_TENANT_KEY),
    ownerRole: z.string().min(1).default(constants.DEFAULT_OWNER_ROLE),
    memberRole: z.string().min(1).default(constants.DEFAULT_MEMBER_ROLE),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  rateLimit: z.object({
    windowMs: positiveInt.default(constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
    maxRequests: positiveInt.default(constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
  }),
});

/**
 * Application configuration loaded from environment
 */
export interface Config {
  readonly server: {
    readonly port: number;
    readonly host: string;
    readonly nodeEnv: string;
    readonly enableCors: boolean;
    readonly corsOrigin: string;
  };
  readonly database: {
    readonly url?: string;
    readonly poolMax: number;
    readonly statementTimeoutMs: number;
  };
  readonly auth: AuthConfig;
  readonly identityProvider: IdentityProviderConfig;
  readonly tenancy: TenancyConfig;
  readonly logging: {
    readonly level: LogLevel;
  };
  readonly rateLimit: {
    readonly windowMs: number;
    readonly maxRequests: number;
  };
}

export interface AuthConfig {
  readonly signingSecret: string;
  readonly algorithm: (typeof constants.SUPPORTED_SIGNING_ALGORITHMS)[number];
  readonly tokenTtl: number; // seconds
  readonly exemptPaths: readonly string[];
  readonly stateTtl: number; // seconds
  readonly stateCookieName: string;
  readonly stateCookieSecret: string;
  readonly secureCookies: boolean;
}

export interface IdentityProviderConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  readonly authorizationEndpoint: string;
  readonly tokenEndpoint: string;
  readonly userinfoEndpoint: string;
  readonly jwksUri: string;
  readonly issuer: string;
  readonly scopes: readonly string[];
  readonly timeoutMs: number;
}

export interface TenancyConfig {
  readonly policy: (typeof constants.SUPPORTED_TENANT_POLICIES)[number];
  readonly singleTenantKey: string;
  readonly ownerRole: string;
  readonly memberRole: string;
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Load configuration from environment variables
 *
 * Throws ConfigError when a required value is missing or invalid, including
 * a signing secret shorter than 32 bytes.
 */
export function loadConfig(env: Env = process.env): Config {
  const raw = {
    server: {
      port: env['PORT'],
      host: env['HOST'],
      nodeEnv: env['NODE_ENV'],
      enableCors: env['ENABLE_CORS'],
      corsOrigin: env['CORS_ORIGIN'],
    },
    database: {
      url: env['DATABASE_URL'],
      poolMax: env['DATABASE_POOL_MAX'],
      statementTimeoutMs: env['DATABASE_STATEMENT_TIMEOUT_MS'],
    },
    auth: {
      signingSecret: readSecret(env, 'JWT_SECRET_KEY'),
      algorithm: env['JWT_ALGORITHM'],
      tokenTtl: env['JWT_EXPIRY_SECONDS'],
      exemptPaths: parseList(env['AUTH_EXEMPT_PATHS']),
      stateTtl: env['LOGIN_STATE_TTL_SECONDS'],
      stateCookieName: env['STATE_COOKIE_NAME'],
      stateCookieSecret: readSecret(env, 'STATE_COOKIE_SECRET'),
      secureCookies: env['COOKIE_SECURE'],
    },
    identityProvider: {
      clientId: env['GOOGLE_CLIENT_ID'],
      clientSecret: readSecret(env, 'GOOGLE_CLIENT_SECRET'),
      redirectUri: env['GOOGLE_OAUTH_REDIRECT_URI'],
      authorizationEndpoint: env['OAUTH_AUTHORIZATION_ENDPOINT'],
      tokenEndpoint: env['OAUTH_TOKEN_ENDPOINT'],
      userinfoEndpoint: env['OAUTH_USERINFO_ENDPOINT'],
      jwksUri: env['OAUTH_JWKS_URI'],
      issuer: env['OAUTH_ISSUER'],
      scopes: parseList(env['OAUTH_SCOPES']),
      timeoutMs: env['IDP_TIMEOUT_MS'],
    },
    tenancy: {
      policy: env['TENANT_POLICY'],
      singleTenantKey: env['SINGLE_TENANT_KEY'],
      ownerRole: env['OWNER_ROLE'],
      memberRole: env['MEMBER_ROLE'],
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
    rateLimit: {
      windowMs: env['RATE_LIMIT_WINDOW_MS'],
      maxRequests: env['RATE_LIMIT_MAX_REQUESTS'],
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { server, auth } = parsed.data;

  return deepFreeze({
    ...parsed.data,
    auth: {
      ...auth,
      stateCookieSecret: auth.stateCookieSecret ?? auth.signingSecret,
      secureCookies: auth.secureCookies ?? server.nodeEnv === 'production',
    },
  });
}

// Re-export constants
export { constants };
