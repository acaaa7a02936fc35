import { jest, describe, beforeEach, afterEach, it, expect } from '@jest/globals';
import { MockRedisClient } from '../redis.js';
import { CachedIntrospectionProvider, secondsUntilExpiry } from './cache.js';
import {
  IntrospectionProvider,
  IntrospectionResult,
  introspectionFailure,
  introspectionRejection,
  introspectionSuccess,
} from './types.js';

const PAYLOAD = '{"active":true,"client_id":"c1","scope":"read"}';

function introspectWith(provider: CachedIntrospectionProvider, token: string): Promise<IntrospectionResult> {
  return new Promise(resolve => provider.introspect(token, resolve));
}

describe('CachedIntrospectionProvider', () => {
  let mockRedis: MockRedisClient;
  let delegate: jest.Mock<IntrospectionProvider['introspect']>;
  let provider: CachedIntrospectionProvider;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    mockRedis = new MockRedisClient();
    delegate = jest.fn<IntrospectionProvider['introspect']>();
    provider = new CachedIntrospectionProvider({ introspect: delegate }, mockRedis, { ttlSeconds: 60 });
  });

  afterEach(() => {
    mockRedis.clear();
    jest.restoreAllMocks();
  });

  it('keys entries by a digest of the token', () => {
    const key = provider.cacheKey('secret-token');

    expect(key).toMatch(/^introspection:[0-9a-f]{64}$/);
    expect(key).not.toContain('secret-token');
    expect(provider.cacheKey('secret-token')).toBe(key);
  });

  it('asks the wrapped provider on a miss and caches the success', async () => {
    delegate.mockImplementation((token, onComplete) => onComplete(introspectionSuccess(PAYLOAD)));

    const result = await introspectWith(provider, 'abc');

    expect(result).toEqual({ success: true, payload: PAYLOAD });
    expect(delegate).toHaveBeenCalledTimes(1);
    expect(await mockRedis.get(provider.cacheKey('abc'))).toBe(PAYLOAD);
    expect(mockRedis.ttl(provider.cacheKey('abc'))).toBe(60);
  });

  it('answers from the cache on a hit', async () => {
    await mockRedis.setEx(provider.cacheKey('abc'), 60, PAYLOAD);

    const result = await introspectWith(provider, 'abc');

    expect(result).toEqual({ success: true, payload: PAYLOAD });
    expect(delegate).not.toHaveBeenCalled();
  });

  it('does not cache rejections or transport failures', async () => {
    delegate.mockImplementationOnce((token, onComplete) => onComplete(introspectionRejection('{"error":"invalid_token"}')));
    delegate.mockImplementationOnce((token, onComplete) => onComplete(introspectionFailure(new Error('timeout'))));

    const rejected = await introspectWith(provider, 'abc');
    const failed = await introspectWith(provider, 'abc');

    expect(rejected.success).toBe(false);
    expect(failed.transportError?.message).toBe('timeout');
    expect(await mockRedis.get(provider.cacheKey('abc'))).toBeNull();
    expect(delegate).toHaveBeenCalledTimes(2);
  });

  it('caps the TTL at the token expiry', async () => {
    const exp = Math.floor(Date.now() / 1000) + 30;
    const payload = JSON.stringify({ active: true, client_id: 'c1', exp });
    delegate.mockImplementation((token, onComplete) => onComplete(introspectionSuccess(payload)));

    await introspectWith(provider, 'abc');

    const ttl = mockRedis.ttl(provider.cacheKey('abc'));
    expect(ttl).toBeGreaterThanOrEqual(28);
    expect(ttl).toBeLessThanOrEqual(30);
  });

  it('does not cache a token that has already expired', async () => {
    const payload = JSON.stringify({ active: true, client_id: 'c1', exp: Math.floor(Date.now() / 1000) - 5 });
    delegate.mockImplementation((token, onComplete) => onComplete(introspectionSuccess(payload)));

    await introspectWith(provider, 'abc');

    expect(await mockRedis.get(provider.cacheKey('abc'))).toBeNull();
  });

  it('passes the cancellation signal to the wrapped provider', async () => {
    const abortController = new AbortController();
    delegate.mockImplementation((token, onComplete) => onComplete(introspectionSuccess(PAYLOAD)));

    await new Promise(resolve => provider.introspect('abc', resolve, abortController.signal));

    expect(delegate.mock.calls[0][2]).toBe(abortController.signal);
  });

  it('falls back to the wrapped provider when Redis fails', async () => {
    jest.spyOn(mockRedis, 'get').mockRejectedValue(new Error('connection lost'));
    delegate.mockImplementation((token, onComplete) => onComplete(introspectionSuccess(PAYLOAD)));

    const result = await introspectWith(provider, 'abc');

    expect(result).toEqual({ success: true, payload: PAYLOAD });
    expect(delegate).toHaveBeenCalledTimes(1);
  });
});

describe('secondsUntilExpiry', () => {
  it('computes the remaining lifetime from exp', () => {
    expect(secondsUntilExpiry('{"exp":1700000100}', 1700000000 * 1000)).toBe(100);
  });

  it('is undefined without a numeric exp', () => {
    expect(secondsUntilExpiry('{"active":true}')).toBeUndefined();
    expect(secondsUntilExpiry('{"exp":"soon"}')).toBeUndefined();
    expect(secondsUntilExpiry('not json')).toBeUndefined();
  });
});
