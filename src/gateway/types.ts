import type { IntrospectionRegistry } from '../introspection/registry.js';
import type { HttpHeaders } from './headers.js';

/**
 * The inbound request as seen by a policy.
 */
export interface PolicyRequest {
  readonly id: string;
  readonly method: string;
  readonly path: string;
  readonly headers: HttpHeaders;
}

/**
 * The outbound response as seen by a policy. Headers added here are written
 * whether the chain proceeds or is rejected.
 */
export interface PolicyResponse {
  readonly headers: HttpHeaders;
}

/**
 * Outcome of a rejected chain. When a media type is given the message is
 * sent verbatim as the response body.
 */
export interface PolicyResult {
  statusCode: number;
  message?: string;
  mediaType?: string;
}

/**
 * Request-scoped state shared by the policies of one request.
 * The pipeline owns its lifetime; policies only read and write attributes.
 */
export interface ExecutionContext {
  readonly requestId: string;
  readonly resources: IntrospectionRegistry;
  /** Aborted when the client goes away before the response is complete. */
  readonly signal?: AbortSignal;
  getAttribute(name: string): unknown;
  setAttribute(name: string, value: unknown): void;
  attributes(): ReadonlyMap<string, unknown>;
}

/**
 * Continuation of the request pipeline. Exactly one of the two methods is
 * called per request.
 */
export interface PolicyChain {
  proceed(request: PolicyRequest, response: PolicyResponse): void;
  reject(result: PolicyResult): void;
}

export interface Policy {
  onRequest(request: PolicyRequest, response: PolicyResponse, context: ExecutionContext, chain: PolicyChain): void;
}

export const HttpStatusCode = {
  UNAUTHORIZED_401: 401,
  SERVICE_UNAVAILABLE_503: 503
} as const;

export const MediaType = {
  APPLICATION_JSON: 'application/json'
} as const;
