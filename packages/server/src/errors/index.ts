export * from './error-codes.js';
export { AuthError } from './auth-error.js';
