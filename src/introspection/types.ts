/**
 * Introspection contract - the only connection between the OAuth2 policy and
 * the authorization server.
 *
 * A provider exchanges an opaque access token for the authorization server's
 * verdict. Whatever transport it uses, it reports back through a completion
 * handler called exactly once.
 */

import { logger } from '../utils/logger.js';

/**
 * Outcome of one introspection call.
 *
 * - `success` true: the authorization server accepted the token, `payload`
 *   holds its raw introspection response.
 * - `success` false without `transportError`: the authorization server
 *   rejected the token, `payload` (if any) is its error body.
 * - `success` false with `transportError`: no authoritative answer was
 *   obtained (network error, timeout, server failure).
 */
export interface IntrospectionResult {
  success: boolean;
  payload?: string;
  transportError?: Error;
}

export type IntrospectionHandler = (result: IntrospectionResult) => void;

export interface IntrospectionProvider {
  /**
   * Starts introspection of `token`. `onComplete` must eventually be called
   * exactly once, and never synchronously throw back into the caller.
   * Once `signal` is aborted the provider may stop its work early.
   */
  introspect(token: string, onComplete: IntrospectionHandler, signal?: AbortSignal): void;
}

export function introspectionSuccess(payload: string): IntrospectionResult {
  return { success: true, payload };
}

export function introspectionRejection(payload?: string): IntrospectionResult {
  return { success: false, payload };
}

export function introspectionFailure(error: unknown): IntrospectionResult {
  return {
    success: false,
    transportError: error instanceof Error ? error : new Error(String(error))
  };
}

/**
 * Wraps a completion handler so that it runs at most once, and not at all
 * once `signal` is aborted. Late or repeated completions are logged and
 * dropped.
 */
export function singleShot(handler: IntrospectionHandler, signal?: AbortSignal): IntrospectionHandler {
  let settled = false;
  return (result) => {
    if (settled) {
      logger.warning('Introspection completed more than once, ignoring');
      return;
    }
    settled = true;
    if (signal?.aborted) {
      logger.debug('Request was cancelled before introspection completed');
      return;
    }
    handler(result);
  };
}
