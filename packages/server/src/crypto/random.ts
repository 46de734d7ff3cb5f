import { randomBytes } from 'node:crypto';
import {
  LOGIN_STATE_LENGTH,
  LOGIN_NONCE_LENGTH,
  LOGIN_ATTEMPT_ID_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate the anti-forgery state for a login attempt
 */
export function generateState(length: number = LOGIN_STATE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate the OIDC nonce for a login attempt
 */
export function generateNonce(length: number = LOGIN_NONCE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate the key a login attempt is stored under (travels in the cookie)
 */
export function generateAttemptId(length: number = LOGIN_ATTEMPT_ID_LENGTH): string {
  return generateRandomBase64Url(length);
}
