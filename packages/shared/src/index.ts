// Re-export all shared types
export * from './types/token.js';
export * from './types/auth.js';
export * from './types/two-factor.js';
export * from './types/email.js';
