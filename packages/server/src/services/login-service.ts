import { z } from 'zod';
import type { AuthConfig } from '../config/index.js';
import type { IIdentityProvider } from '../providers/identity-provider.js';
import type { IStateStore } from '../storage/interfaces/state-store.js';
import type { SecurityEventSink } from '../logging/security-events.js';
import type { LoginAttempt } from '../types/login.js';
import type { Tenant } from '../types/tenant.js';
import type { User, ExternalIdentity, ExternalIdentityAssertion } from '../types/user.js';
import type { IdentityService } from './identity-service.js';
import type { TokenService } from './token-service.js';
import { AuthError } from '../errors/auth-error.js';
import { ERROR_UPSTREAM_AUTH } from '../errors/error-codes.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { generateAttemptId, generateNonce, generateState } from '../crypto/random.js';

export interface LoginServiceOptions {
  identityProvider: IIdentityProvider;
  attempts: IStateStore<LoginAttempt>;
  identityService: IdentityService;
  tokenService: TokenService;
  config: Pick<AuthConfig, 'tokenTtl' | 'stateTtl'>;
  events: SecurityEventSink;
}

export interface LoginInitiation {
  redirectUrl: string;
  attemptId: string;
  expiresIn: number; // seconds
}

export interface CallbackInput {
  presentedState: string | undefined;
  code: string | undefined;
  storedAttempt: LoginAttempt | null;
  idpError?: string;
}

export interface LoginResult {
  token: string;
  expiresIn: number; // seconds
  user: User;
  tenant: Tenant;
  roles: string[];
  isNewUser: boolean;
}

const assertionSchema = z.object({
  subject: z.string().min(1),
  email: z.string().min(1),
  displayName: z.string().min(1),
  emailVerified: z.boolean().optional(),
});

/**
 * Login handshake: anti-forgery state out, session token back
 */
export class LoginService {
  private readonly identityProvider: IIdentityProvider;
  private readonly attempts: IStateStore<LoginAttempt>;
  private readonly identityService: IdentityService;
  private readonly tokenService: TokenService;
  private readonly config: Pick<AuthConfig, 'tokenTtl' | 'stateTtl'>;
  private readonly events: SecurityEventSink;

  constructor(options: LoginServiceOptions) {
    this.identityProvider = options.identityProvider;
    this.attempts = options.attempts;
    this.identityService = options.identityService;
    this.tokenService = options.tokenService;
    this.config = options.config;
    this.events = options.events;
  }

  /**
   * Start a login attempt: store fresh state and nonce, return the IdP URL
   */
  async initiateLogin(): Promise<LoginInitiation> {
    let attemptId: string;
    let attempt: LoginAttempt;
    try {
      attemptId = generateAttemptId();
      attempt = { state: generateState(), nonce: generateNonce(), createdAt: Date.now() };
    } catch (error) {
      throw AuthError.internalError('Random source unavailable', error);
    }

    try {
      await this.attempts.put(attemptId, attempt, this.config.stateTtl);
    } catch (error) {
      throw AuthError.storeUnavailable('Login attempt could not be stored', error);
    }

    return {
      redirectUrl: this.identityProvider.buildAuthorizationUrl(attempt.state, attempt.nonce),
      attemptId,
      expiresIn: this.config.stateTtl,
    };
  }

  /**
   * Read and remove a stored attempt; a second call returns null
   */
  async consumeAttempt(attemptId: string | undefined): Promise<LoginAttempt | null> {
    if (!attemptId) {
      return null;
    }

    try {
      return await this.attempts.take(attemptId);
    } catch (error) {
      throw AuthError.storeUnavailable('Login attempt could not be read', error);
    }
  }

  /**
   * Complete the handshake
   *
   * The state check runs before anything else; on mismatch neither the
   * identity provider nor the identity store is called.
   */
  async handleCallback(input: CallbackInput): Promise<LoginResult> {
    const { presentedState, code, storedAttempt, idpError } = input;

    if (!storedAttempt) {
      this.events.emit({ type: 'state_mismatch', reason: 'missing_stored' });
      throw AuthError.stateMismatch('No stored login attempt');
    }
    if (!presentedState) {
      this.events.emit({ type: 'state_mismatch', reason: 'missing_presented' });
      throw AuthError.stateMismatch('Callback carried no state');
    }
    if (!constantTimeCompare(presentedState, storedAttempt.state)) {
      this.events.emit({ type: 'state_mismatch', reason: 'mismatch' });
      throw AuthError.stateMismatch('Presented state does not match');
    }

    if (idpError) {
      throw AuthError.accessDenied(`Identity provider returned error: ${idpError}`);
    }
    if (!code) {
      throw AuthError.invalidRequest('Missing authorization code');
    }

    const assertion = await this.exchange(code);
    const identity = this.validateAssertion(assertion);

    if (assertion.nonce !== undefined && !constantTimeCompare(assertion.nonce, storedAttempt.nonce)) {
      this.events.emit({ type: 'state_mismatch', reason: 'mismatch' });
      throw AuthError.stateMismatch('Identity assertion nonce does not match');
    }

    const resolved = await this.identityService.resolve(identity);

    const token = await this.tokenService.issue(
      {
        sub: resolved.user.id,
        tenant_id: resolved.tenant.id,
        email: resolved.user.email,
        roles: resolved.roles,
      },
      this.config.tokenTtl,
      { name: resolved.user.displayName }
    );

    this.events.emit({
      type: 'login_succeeded',
      userId: resolved.user.id,
      tenantId: resolved.tenant.id,
      isNewUser: resolved.isNewUser,
    });

    return { token, expiresIn: this.config.tokenTtl, ...resolved };
  }

  private async exchange(code: string): Promise<ExternalIdentityAssertion> {
    try {
      return await this.identityProvider.exchangeCodeForIdentity(code);
    } catch (error) {
      const upstream =
        error instanceof AuthError && error.code === ERROR_UPSTREAM_AUTH
          ? error
          : AuthError.upstreamAuthError('Identity provider exchange failed', error);
      this.events.emit({ type: 'upstream_failure', detail: upstream.description });
      throw upstream;
    }
  }

  private validateAssertion(assertion: ExternalIdentityAssertion): ExternalIdentity {
    const parsed = assertionSchema.safeParse(assertion);
    if (!parsed.success) {
      const missing = parsed.error.issues.map((issue) => issue.path.join('.'));
      this.events.emit({ type: 'incomplete_identity', missing });
      throw AuthError.incompleteIdentity(`Identity assertion lacks: ${missing.join(', ')}`);
    }

    if (parsed.data.emailVerified === false) {
      this.events.emit({ type: 'incomplete_identity', missing: ['emailVerified'] });
      throw AuthError.incompleteIdentity('Identity provider has not verified the email');
    }

    const { subject, email, displayName } = parsed.data;
    return { subject, email, displayName };
  }
}
