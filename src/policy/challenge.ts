import { OAuthError } from '@modelcontextprotocol/sdk/server/auth/errors.js';

export const BEARER_AUTHORIZATION_TYPE = 'Bearer';

const escape = (s: string) => s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');

/**
 * As per https://tools.ietf.org/html/rfc6750#section-3:
 *
 *      HTTP/1.1 401 Unauthorized
 *      WWW-Authenticate: Bearer realm="example",
 *                        error="invalid_token",
 *                        error_description="The access token expired"
 */
export function bearerChallenge(realm: string, error: OAuthError): string {
  return `${BEARER_AUTHORIZATION_TYPE} realm="${escape(realm)}",` +
    ` error="${escape(error.errorCode)}",` +
    ` error_description="${escape(error.message)}"`;
}

/**
 * Challenge sent alongside the authorization server's own verdict, without an
 * error code of ours.
 */
export function realmChallenge(realm: string): string {
  return `${BEARER_AUTHORIZATION_TYPE} realm=${realm} `;
}
