import { grantedScopes, readScopeClaim } from './scopes.js';

export const OAUTH_PAYLOAD_CLIENT_ID_NODE = 'client_id';
export const OAUTH_PAYLOAD_SCOPE_NODE = 'scope';

/**
 * The parts of an introspection response the policy relies on.
 */
export interface ParsedIntrospectionPayload {
  /** Empty when the response has no usable client_id */
  clientId: string;
  scopes: ReadonlySet<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Parses a raw introspection response. Returns undefined when it is not JSON;
 * JSON that is not an object parses to a payload without client_id or scopes.
 */
export function parseIntrospectionPayload(raw: string): ParsedIntrospectionPayload | undefined {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const claims = isRecord(document) ? document : {};
  const clientId = claims[OAUTH_PAYLOAD_CLIENT_ID_NODE];

  return {
    clientId: isScalar(clientId) ? String(clientId) : '',
    scopes: grantedScopes(readScopeClaim(claims[OAUTH_PAYLOAD_SCOPE_NODE])),
  };
}
