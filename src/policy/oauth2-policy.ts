import {
  InsufficientScopeError,
  InvalidClientError,
  InvalidRequestError,
  OAuthError,
  ServerError,
  TemporarilyUnavailableError,
} from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { HttpHeaders } from '../gateway/headers.js';
import {
  ExecutionContext,
  HttpStatusCode,
  MediaType,
  Policy,
  PolicyChain,
  PolicyRequest,
  PolicyResponse,
} from '../gateway/types.js';
import { IntrospectionHandler, singleShot } from '../introspection/types.js';
import { logger } from '../utils/logger.js';
import { BEARER_AUTHORIZATION_TYPE, bearerChallenge, realmChallenge } from './challenge.js';
import { OAuth2PolicyConfiguration } from './configuration.js';
import { parseIntrospectionPayload } from './payload.js';
import { hasRequiredScopes } from './scopes.js';

const CONTEXT_ATTRIBUTE_PREFIX = 'oauth.';
export const CONTEXT_ATTRIBUTE_OAUTH_PAYLOAD = CONTEXT_ATTRIBUTE_PREFIX + 'payload';
export const CONTEXT_ATTRIBUTE_OAUTH_ACCESS_TOKEN = CONTEXT_ATTRIBUTE_PREFIX + 'access_token';
export const CONTEXT_ATTRIBUTE_CLIENT_ID = CONTEXT_ATTRIBUTE_PREFIX + 'client_id';

/**
 * Validates OAuth2 bearer tokens through token introspection.
 *
 * The policy holds no per-request state: the token, client id and payload
 * are written to the request's execution context, which later stages read.
 */
export class OAuth2Policy implements Policy {
  constructor(private readonly configuration: OAuth2PolicyConfiguration) {}

  onRequest(request: PolicyRequest, response: PolicyResponse, context: ExecutionContext, chain: PolicyChain): void {
    logger.debug('Read access_token from request', { requestId: request.id });

    const provider = context.resources.lookup(this.configuration.introspectionResourceId);
    if (!provider) {
      logger.error('No introspection provider registered', undefined, {
        resource: this.configuration.introspectionResourceId
      });
      chain.reject({
        statusCode: HttpStatusCode.UNAUTHORIZED_401,
        message: 'No OAuth authorization server has been configured'
      });
      return;
    }

    const authorizationHeaders = request.headers.getAll(HttpHeaders.AUTHORIZATION);
    if (authorizationHeaders.length === 0) {
      this.sendError(response, chain, new InvalidRequestError('No OAuth authorization header was supplied'));
      return;
    }

    const bearerHeader = authorizationHeaders.find(
      header => header.toLowerCase().startsWith(BEARER_AUTHORIZATION_TYPE.toLowerCase()),
    );
    if (bearerHeader === undefined) {
      this.sendError(response, chain, new InvalidRequestError('No OAuth authorization header was supplied'));
      return;
    }

    const accessToken = bearerHeader.substring(BEARER_AUTHORIZATION_TYPE.length).trim();
    if (!accessToken) {
      this.sendError(response, chain, new InvalidRequestError('No OAuth access token was supplied'));
      return;
    }

    // Recorded before introspection so later diagnostics see the presented token, valid or not
    context.setAttribute(CONTEXT_ATTRIBUTE_OAUTH_ACCESS_TOKEN, accessToken);

    provider.introspect(
      accessToken,
      singleShot(this.handleResponse(chain, request, response, context), context.signal),
      context.signal,
    );
  }

  handleResponse(
    chain: PolicyChain,
    request: PolicyRequest,
    response: PolicyResponse,
    context: ExecutionContext,
  ): IntrospectionHandler {
    return (result) => {
      if (!result.success) {
        response.headers.add(HttpHeaders.WWW_AUTHENTICATE, realmChallenge(this.configuration.realm));

        if (result.transportError) {
          logger.warning('Authorization server unavailable', {
            error: result.transportError.message
          });
          chain.reject({
            statusCode: HttpStatusCode.SERVICE_UNAVAILABLE_503,
            message: new TemporarilyUnavailableError(result.transportError.message).errorCode
          });
        } else {
          logger.debug('Access token rejected by authorization server');
          chain.reject({
            statusCode: HttpStatusCode.UNAUTHORIZED_401,
            message: result.payload,
            mediaType: MediaType.APPLICATION_JSON
          });
        }
        return;
      }

      const rawPayload = result.payload ?? '';
      const payload = parseIntrospectionPayload(rawPayload);
      if (!payload) {
        logger.error('Unable to parse introspection endpoint payload', undefined, { payload: rawPayload });
        this.sendError(response, chain, new ServerError('Invalid response from authorization server'));
        return;
      }

      const clientId = payload.clientId.trim();
      if (!clientId) {
        this.sendError(response, chain, new InvalidClientError('No client_id was supplied'));
        return;
      }

      context.setAttribute(CONTEXT_ATTRIBUTE_CLIENT_ID, payload.clientId);

      if (this.configuration.checkRequiredScopes
        && !hasRequiredScopes(payload, this.configuration.requiredScopes)) {
        logger.info('Access token lacks required scopes', {
          clientId,
          required: this.configuration.requiredScopes,
          granted: [...payload.scopes]
        });
        this.sendError(response, chain, new InsufficientScopeError(
          'The request requires higher privileges than provided by the access token.'));
        return;
      }

      if (this.configuration.extractPayload) {
        context.setAttribute(CONTEXT_ATTRIBUTE_OAUTH_PAYLOAD, rawPayload);
      }

      logger.debug('Access token validated', { clientId });
      chain.proceed(request, response);
    };
  }

  private sendError(response: PolicyResponse, chain: PolicyChain, error: OAuthError): void {
    response.headers.add(HttpHeaders.WWW_AUTHENTICATE, bearerChallenge(this.configuration.realm, error));
    chain.reject({ statusCode: HttpStatusCode.UNAUTHORIZED_401 });
  }
}
