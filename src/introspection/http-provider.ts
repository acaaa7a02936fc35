import { logger, redactToken } from '../utils/logger.js';
import {
  IntrospectionHandler,
  IntrospectionProvider,
  IntrospectionResult,
  introspectionFailure,
  introspectionRejection,
  introspectionSuccess,
} from './types.js';

export interface HttpIntrospectionOptions {
  /** Introspection endpoint of the authorization server */
  endpoint: string;
  /** Credentials the gateway authenticates with, sent as HTTP Basic */
  clientId?: string;
  clientSecret?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

export const INACTIVE_TOKEN_PAYLOAD = JSON.stringify({
  error: 'invalid_token',
  error_description: 'Token is not active'
});

function isInactive(body: string): boolean {
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === 'object' && parsed !== null && 'active' in parsed && parsed.active === false;
  } catch {
    // Unparseable bodies are passed on and reported by the policy
    return false;
  }
}

/**
 * Introspection provider that calls an authorization server's RFC 7662
 * endpoint over HTTP.
 *
 * 5xx responses, network errors and timeouts are reported as transport
 * failures; any other non-2xx response is the server's rejection of the token.
 */
export class HttpIntrospectionProvider implements IntrospectionProvider {
  private readonly timeoutMs: number;

  constructor(private options: HttpIntrospectionOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  introspect(token: string, onComplete: IntrospectionHandler, signal?: AbortSignal): void {
    void this.request(token, signal)
      .catch((error: unknown) => {
        logger.error('Failed to reach introspection endpoint', error instanceof Error ? error : undefined, {
          endpoint: this.options.endpoint,
          token: redactToken(token)
        });
        return introspectionFailure(error);
      })
      .then(onComplete)
      .catch((error: unknown) => {
        logger.error('Introspection completion handler failed', error instanceof Error ? error : undefined);
      });
  }

  async request(token: string, signal?: AbortSignal): Promise<IntrospectionResult> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      'Accept': 'application/json'
    };
    if (this.options.clientId) {
      const credentials = `${this.options.clientId}:${this.options.clientSecret ?? ''}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }

    const response = await fetch(this.options.endpoint, {
      method: 'POST',
      headers,
      body: new URLSearchParams({ token, token_type_hint: 'access_token' }).toString(),
      signal: signal
        ? AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)])
        : AbortSignal.timeout(this.timeoutMs)
    });
    const body = await response.text();

    if (response.status >= 500) {
      logger.error('Token introspection request failed', undefined, {
        status: response.status,
        statusText: response.statusText,
      });
      return introspectionFailure(new Error(`Introspection endpoint responded with ${response.status}`));
    }

    if (!response.ok) {
      logger.debug('Token rejected by introspection endpoint', {
        status: response.status,
        token: redactToken(token)
      });
      return introspectionRejection(body);
    }

    if (isInactive(body)) {
      logger.debug('Token is not active', { token: redactToken(token) });
      return introspectionRejection(INACTIVE_TOKEN_PAYLOAD);
    }

    return introspectionSuccess(body);
  }
}
