/**
 * Uniqueness targets a store enforces
 */
export type UniqueTarget = 'external_subject' | 'email' | 'tenant_key';

/**
 * Raised by a store when a write would violate a uniqueness rule
 *
 * Identity resolution relies on this to settle concurrent first logins.
 */
export class UniqueConstraintError extends Error {
  public readonly target: UniqueTarget;

  constructor(target: UniqueTarget, options?: { cause?: unknown }) {
    super(`Unique constraint violated: ${target}`);
    this.name = 'UniqueConstraintError';
    this.target = target;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
