// Public API for embedding the service
export { createAuthServer, type AuthServerOptions } from './app.js';
export { createServices, connectStorage, connectNotifier, type Services } from './bootstrap.js';
export { createMemoryStorage, type MemoryStorage } from './storage/memory/index.js';
export { createPostgresStorage } from './storage/postgres/index.js';
export { createRedisEphemeralStore, RedisEphemeralStore } from './storage/redis/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './logging/index.js';
export * from './notifier/index.js';
export * from './services/index.js';
