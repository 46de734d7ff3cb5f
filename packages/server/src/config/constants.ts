/**
 * Service constants
 */

export const SERVICE_NAME = 'org-auth';
export const SERVICE_VERSION = '0.1.0';

// Session token signing (symmetric only)
export const SIGNING_ALGORITHM_HS256 = 'HS256' as const;
export const SIGNING_ALGORITHM_HS384 = 'HS384' as const;
export const SIGNING_ALGORITHM_HS512 = 'HS512' as const;

export const SUPPORTED_SIGNING_ALGORITHMS = [
  SIGNING_ALGORITHM_HS256,
  SIGNING_ALGORITHM_HS384,
  SIGNING_ALGORITHM_HS512,
] as const;

export const MIN_SIGNING_SECRET_BYTES = 32;

// Claims the token service owns; extensions may not use these names
export const RESERVED_CLAIMS = ['sub', 'tenant_id', 'email', 'roles', 'iat', 'exp'] as const;

// Default TTLs (in seconds)
export const DEFAULT_SESSION_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_LOGIN_STATE_TTL = 600; // 10 minutes

// Anti-forgery values (bytes of entropy)
export const LOGIN_STATE_LENGTH = 32;
export const LOGIN_NONCE_LENGTH = 16;
export const LOGIN_ATTEMPT_ID_LENGTH = 24;

export const DEFAULT_STATE_COOKIE_NAME = 'login_attempt';
export const STATE_COOKIE_PATH = '/auth';

// Roles assigned at first login
export const DEFAULT_OWNER_ROLE = 'owner';
export const DEFAULT_MEMBER_ROLE = 'member';

// Tenant resolution
export const TENANT_POLICY_PER_SIGNUP = 'per_signup' as const;
export const TENANT_POLICY_SINGLE = 'single' as const;
export const TENANT_POLICY_EMAIL_DOMAIN = 'email_domain' as const;

export const SUPPORTED_TENANT_POLICIES = [
  TENANT_POLICY_PER_SIGNUP,
  TENANT_POLICY_SINGLE,
  TENANT_POLICY_EMAIL_DOMAIN,
] as const;

export const DEFAULT_SINGLE_TENANT_KEY = 'default';

// Paths served without a session token
export const DEFAULT_EXEMPT_PATHS = [
  '/auth/login',
  '/auth/callback',
  '/health',
  '/live',
  '/ready',
  '/metrics',
  '/favicon.ico',
] as const;

// Upstream calls
export const DEFAULT_IDP_TIMEOUT_MS = 8000;
export const DEFAULT_DB_STATEMENT_TIMEOUT_MS = 8000;
export const DEFAULT_DB_POOL_MAX = 10;

// Rate limiting defaults (login endpoints)
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 10;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_RETRY_AFTER = 'Retry-After';

export const BEARER_PREFIX = 'Bearer ';
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Cache control for token and error responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
