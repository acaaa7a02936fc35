import { jest, describe, beforeEach, afterEach, it, expect } from '@jest/globals';
import { HttpIntrospectionProvider, INACTIVE_TOKEN_PAYLOAD } from './http-provider.js';
import { IntrospectionResult } from './types.js';

const ENDPOINT = 'https://auth.example.com/oauth/introspect';

function introspectWith(provider: HttpIntrospectionProvider, token: string): Promise<IntrospectionResult> {
  return new Promise(resolve => provider.introspect(token, resolve));
}

describe('HttpIntrospectionProvider', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('posts the token as a form to the introspection endpoint', async () => {
    fetchMock.mockResolvedValue(new Response('{"active":true,"client_id":"c1"}', { status: 200 }));
    const provider = new HttpIntrospectionProvider({ endpoint: ENDPOINT });

    await introspectWith(provider, 'token with spaces');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('token=token+with+spaces&token_type_hint=access_token');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
      'Accept': 'application/json',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('authenticates with client credentials when configured', async () => {
    fetchMock.mockResolvedValue(new Response('{"active":true}', { status: 200 }));
    const provider = new HttpIntrospectionProvider({
      endpoint: ENDPOINT,
      clientId: 'gateway',
      clientSecret: 'test-secret',
    });

    await introspectWith(provider, 'abc');

    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toEqual(expect.objectContaining({
      Authorization: `Basic ${Buffer.from('gateway:test-secret').toString('base64')}`,
    }));
  });

  it('reports an active token as success with the raw body', async () => {
    const body = '{"active":true,"client_id":"c1","scope":"read"}';
    fetchMock.mockResolvedValue(new Response(body, { status: 200 }));

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result).toEqual({ success: true, payload: body });
  });

  it('passes a body that is not JSON through as success', async () => {
    fetchMock.mockResolvedValue(new Response('not json', { status: 200 }));

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result).toEqual({ success: true, payload: 'not json' });
  });

  it('reports an inactive token as a rejection', async () => {
    fetchMock.mockResolvedValue(new Response('{"active":false}', { status: 200 }));

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result).toEqual({ success: false, payload: INACTIVE_TOKEN_PAYLOAD });
    expect(result.transportError).toBeUndefined();
  });

  it('reports a 4xx response as a rejection carrying its body', async () => {
    const body = '{"error":"invalid_client"}';
    fetchMock.mockResolvedValue(new Response(body, { status: 401 }));

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result).toEqual({ success: false, payload: body });
  });

  it('reports a 5xx response as a transport failure', async () => {
    fetchMock.mockResolvedValue(new Response('upstream down', { status: 502 }));

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result.success).toBe(false);
    expect(result.transportError?.message).toBe('Introspection endpoint responded with 502');
  });

  it('reports a network error as a transport failure', async () => {
    const networkError = new TypeError('fetch failed');
    fetchMock.mockRejectedValue(networkError);

    const result = await introspectWith(new HttpIntrospectionProvider({ endpoint: ENDPOINT }), 'abc');

    expect(result).toEqual({ success: false, transportError: networkError });
  });

  it('cancels the request when the caller aborts', async () => {
    fetchMock.mockResolvedValue(new Response('{"active":true}', { status: 200 }));
    const abortController = new AbortController();
    const provider = new HttpIntrospectionProvider({ endpoint: ENDPOINT });

    await new Promise(resolve => provider.introspect('abc', resolve, abortController.signal));
    const signal = fetchMock.mock.calls[0][1]?.signal;
    expect(signal?.aborted).toBe(false);

    abortController.abort();

    expect(signal?.aborted).toBe(true);
  });

  it('completes exactly once', async () => {
    fetchMock.mockResolvedValue(new Response('{"active":true}', { status: 200 }));
    const onComplete = jest.fn<(result: IntrospectionResult) => void>();
    const provider = new HttpIntrospectionProvider({ endpoint: ENDPOINT });

    await new Promise<void>(resolve => {
      provider.introspect('abc', (result) => {
        onComplete(result);
        resolve();
      });
    });
    await new Promise(resolve => setImmediate(resolve));

    expect(onComplete).toHaveBeenCalledTimes(1);
  });
});
