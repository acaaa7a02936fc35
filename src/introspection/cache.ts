import { createHash } from 'crypto';
import { RedisClient } from '../redis.js';
import { logger, redactToken } from '../utils/logger.js';
import {
  IntrospectionHandler,
  IntrospectionProvider,
  IntrospectionResult,
  introspectionSuccess,
} from './types.js';

export interface IntrospectionCacheOptions {
  ttlSeconds: number;
  keyPrefix?: string;
}

/**
 * Seconds until the `exp` claim of an introspection payload, if it has one.
 */
export function secondsUntilExpiry(payload: string, now: number = Date.now()): number | undefined {
  try {
    const parsed: unknown = JSON.parse(payload);
    if (typeof parsed === 'object' && parsed !== null && 'exp' in parsed && typeof parsed.exp === 'number') {
      return Math.floor(parsed.exp - now / 1000);
    }
  } catch {
    // Not JSON: no expiry information
  }
  return undefined;
}

/**
 * Caches successful introspections of another provider in Redis.
 *
 * Entries are keyed by a SHA-256 digest of the token and live for the
 * configured TTL, or until the token's `exp` if that comes first.
 * Rejections and transport failures are never cached.
 */
export class CachedIntrospectionProvider implements IntrospectionProvider {
  private readonly keyPrefix: string;

  constructor(
    private delegate: IntrospectionProvider,
    private redis: RedisClient,
    private options: IntrospectionCacheOptions,
  ) {
    this.keyPrefix = options.keyPrefix ?? 'introspection:';
  }

  cacheKey(token: string): string {
    return this.keyPrefix + createHash('sha256').update(token).digest('hex');
  }

  introspect(token: string, onComplete: IntrospectionHandler, signal?: AbortSignal): void {
    const key = this.cacheKey(token);

    void this.redis.get(key)
      .catch((error: unknown) => {
        logger.error('Introspection cache read failed', error instanceof Error ? error : undefined);
        return null;
      })
      .then((cached) => {
        if (cached !== null) {
          logger.debug('Introspection cache hit', { token: redactToken(token) });
          onComplete(introspectionSuccess(cached));
          return;
        }
        this.delegate.introspect(token, (result) => {
          this.store(key, result);
          onComplete(result);
        }, signal);
      })
      .catch((error: unknown) => {
        logger.error('Introspection completion handler failed', error instanceof Error ? error : undefined);
      });
  }

  private store(key: string, result: IntrospectionResult): void {
    if (!result.success || result.payload === undefined) {
      return;
    }

    const expiresIn = secondsUntilExpiry(result.payload);
    const ttl = expiresIn === undefined ? this.options.ttlSeconds : Math.min(expiresIn, this.options.ttlSeconds);
    if (ttl <= 0) {
      return;
    }

    void this.redis.setEx(key, ttl, result.payload).catch((error: unknown) => {
      logger.error('Introspection cache write failed', error instanceof Error ? error : undefined);
    });
  }
}
