export const DEFAULT_REALM = 'gravitee.io';

/**
 * Settings of one OAuth2 policy instance. Built once, shared by every request
 * the instance handles.
 */
export interface OAuth2PolicyConfiguration {
  /** Id of the introspection provider in the gateway's registry */
  readonly introspectionResourceId: string;
  readonly checkRequiredScopes: boolean;
  /** Scopes the token must carry. Absent means no requirement. */
  readonly requiredScopes?: readonly string[];
  /** Expose the raw introspection payload to later stages */
  readonly extractPayload: boolean;
  /** Realm announced in WWW-Authenticate challenges */
  readonly realm: string;
}

export type OAuth2PolicyConfigurationInput =
  Pick<OAuth2PolicyConfiguration, 'introspectionResourceId'> &
  Partial<Omit<OAuth2PolicyConfiguration, 'introspectionResourceId'>>;

export function createPolicyConfiguration(input: OAuth2PolicyConfigurationInput): OAuth2PolicyConfiguration {
  const introspectionResourceId = input.introspectionResourceId.trim();
  if (!introspectionResourceId) {
    throw new Error('introspectionResourceId must not be empty');
  }
  const realm = input.realm ?? DEFAULT_REALM;
  if (realm.includes('"')) {
    throw new Error('realm must not contain double quotes');
  }

  return Object.freeze({
    introspectionResourceId,
    checkRequiredScopes: input.checkRequiredScopes ?? false,
    requiredScopes: input.requiredScopes ? Object.freeze([...input.requiredScopes]) : undefined,
    extractPayload: input.extractPayload ?? false,
    realm,
  });
}
