/**
 * Error codes visible to API callers.
 * Internal failure reasons are logged, never returned.
 */
export type PublicErrorCode =
  | 'unauthorized'
  | 'forbidden'
  | 'login_failed'
  | 'upstream_unavailable'
  | 'service_unavailable'
  | 'rate_limited'
  | 'server_error';

export interface ErrorResponse {
  error: PublicErrorCode;
  error_description: string;
}
