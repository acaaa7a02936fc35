import { createClient } from "@redis/client";
import { logger } from "./utils/logger.js";

/**
 * Describes the Redis primitives we use in this application, to be able to mock
 * them in tests (so we don't need to actually hit Redis).
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setEx(key: string, seconds: number, value: string): Promise<string | null>;
  connect(): Promise<void>;
}

export class RedisClientImpl implements RedisClient {
  private redis;

  constructor(url: string) {
    this.redis = createClient({ url, password: process.env.REDIS_PASSWORD });
    this.redis.on("error", (error: Error) =>
      logger.error("Redis client error", error),
    );
  }

  async get(key: string): Promise<string | null> {
    return await this.redis.get(key);
  }

  async setEx(key: string, seconds: number, value: string): Promise<string | null> {
    return await this.redis.setEx(key, seconds, value);
  }

  async connect(): Promise<void> {
    await this.redis.connect();
  }
}

export class MockRedisClient implements RedisClient {
  private store = new Map<string, { value: string; ttl?: number }>();

  async get(key: string): Promise<string | null> {
    return this.store.get(key)?.value ?? null;
  }

  async setEx(key: string, seconds: number, value: string): Promise<string | null> {
    // Mock doesn't handle expiration, the TTL is kept for assertions
    this.store.set(key, { value, ttl: seconds });
    return "OK";
  }

  async connect(): Promise<void> {
    // No-op in mock
  }

  ttl(key: string): number | undefined {
    return this.store.get(key)?.ttl;
  }

  clear() {
    this.store.clear();
  }
}
