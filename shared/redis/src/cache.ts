import { Redis } from "ioredis";
import { logger } from "../../observability/src/logger.js";

/** The part of an ioredis client the cache talks to */
export interface CacheStore {
  readonly status: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
}

let sharedClient: Redis | null = null;

/**
 * Connect the process-wide client used by every RedisCache. Without a URL
 * caches stay in memory. Keys are namespaced under "soldmis:".
 */
export function configureRedis(url: string | undefined): void {
  if (!url || sharedClient) return;
  const client = new Redis(url, {
    keyPrefix: "soldmis:",
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => (times > 10 ? null : Math.min(times * 200, 5000)),
  });
  client.on("connect", () => logger.info("Redis connected"));
  client.on("error", (err: Error) => logger.warn(`Redis error: ${err.message}`));
  sharedClient = client;
}

export async function disconnectRedis(): Promise<void> {
  const client = sharedClient;
  sharedClient = null;
  if (client) await client.quit();
}

/**
 * JSON cache backed by Redis, falling back to a local TTL map while Redis is
 * not configured, not yet ready, or failing.
 */
export class RedisCache<T> {
  private readonly memCache = new Map<string, { value: T; expiresAt: number }>();

  constructor(
    private readonly prefix: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
    private readonly store: () => CacheStore | null = () => sharedClient
  ) {}

  private readyStore(): CacheStore | null {
    const store = this.store();
    return store && store.status === "ready" ? store : null;
  }

  private warn(op: string, key: string, err: unknown): void {
    logger.warn(`RedisCache.${op} failed for ${this.prefix}:${key}: ${err instanceof Error ? err.message : String(err)}`);
  }

  async get(key: string): Promise<T | null> {
    const store = this.readyStore();
    if (store) {
      try {
        const raw = await store.get(`${this.prefix}:${key}`);
        if (raw === null) return null;
        const parsed: T = JSON.parse(raw);
        return parsed;
      } catch (err) {
        this.warn("get", key, err);
      }
    }

    const entry = this.memCache.get(key);
    if (!entry) return null;
    if (this.now() > entry.expiresAt) {
      this.memCache.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: T): Promise<void> {
    const store = this.readyStore();
    if (store) {
      try {
        await store.set(`${this.prefix}:${key}`, JSON.stringify(value), "EX", this.ttlSeconds);
        return;
      } catch (err) {
        this.warn("set", key, err);
      }
    }

    this.memCache.set(key, { value, expiresAt: this.now() + this.ttlSeconds * 1000 });
  }
}
