export const SCOPE_SEPARATOR = ' ';

/**
 * The `scope` member of an introspection response, as found on the wire.
 * RFC 7662 specifies a space-delimited string; some servers send an array.
 */
export type ScopeClaim =
  | { kind: 'list'; values: string[] }
  | { kind: 'delimited'; value: string }
  | { kind: 'absent' };

function textValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

export function readScopeClaim(value: unknown): ScopeClaim {
  if (Array.isArray(value)) {
    const values: string[] = [];
    for (const element of value) {
      const text = textValue(element);
      if (text !== undefined) {
        values.push(text);
      }
    }
    return { kind: 'list', values };
  }

  const text = textValue(value);
  return text === undefined ? { kind: 'absent' } : { kind: 'delimited', value: text };
}

export function grantedScopes(claim: ScopeClaim): ReadonlySet<string> {
  switch (claim.kind) {
    case 'list':
      return new Set(claim.values);
    case 'delimited':
      return new Set(claim.value.split(SCOPE_SEPARATOR).filter(scope => scope.length > 0));
    case 'absent':
      return new Set();
  }
}

/**
 * True when every required scope was granted. Matching is exact and
 * case-sensitive; order and duplicates do not matter. No requirement always
 * passes.
 */
export function hasRequiredScopes(
  payload: { readonly scopes: ReadonlySet<string> },
  requiredScopes: readonly string[] | undefined,
): boolean {
  if (!requiredScopes) {
    return true;
  }
  return requiredScopes.every(scope => payload.scopes.has(scope));
}
