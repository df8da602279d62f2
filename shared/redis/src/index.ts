export { configureRedis, disconnectRedis, RedisCache, type CacheStore } from "./cache.js";
