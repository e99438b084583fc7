export { RedisEphemeralStore, createRedisEphemeralStore } from './ephemeral-store.js';
