export * from './common.js';
export * from './user.js';
export * from './app.js';
export * from './token.js';
export * from './magic-link.js';
export * from './hono.js';
