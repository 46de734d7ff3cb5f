// Re-export all shared types
export * from './types/session.js';
export * from './types/identity.js';
export * from './types/error.js';
export * from './types/health.js';
