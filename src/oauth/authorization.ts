/**
 * Authorization endpoint logic: validate an incoming request and record it as a
 * pending authorization awaiting the user's consent.
 */

import { logger } from '../utils/logger.js';
import { isRegisteredRedirectUri } from './client-registry.js';
import type { CredentialStore } from './credential-store.js';
import {
  InvalidClientError,
  InvalidRedirectUriError,
  InvalidRequestError,
  UnsupportedChallengeMethodError,
  UnsupportedResponseTypeError,
} from './errors.js';
import { generateOpaqueId, isSupportedChallengeMethod, isValidPkceValue } from './pkce.js';
import type { AuthorizationRequest, AuthorizationRequestParams, OAuthClient } from './types.js';

const MAX_ID_ATTEMPTS = 5;

export interface AuthorizationRequestHandlerOptions {
  requestLifetimeSecs: number;
  defaultScope: string;
}

export interface BegunAuthorization {
  requestId: string;
  client: OAuthClient;
  redirectUri: string;
  scope: string;
  expiresAt: number;
}

export class AuthorizationRequestHandler {
  constructor(
    private readonly store: CredentialStore,
    private readonly options: AuthorizationRequestHandlerOptions,
  ) {}

  /**
   * Validate an authorization request and store it pending consent.
   *
   * Every failure here is shown to the caller directly: until the redirect URI has
   * been matched against the client it cannot be trusted as a redirect target.
   */
  async beginAuthorization(params: AuthorizationRequestParams): Promise<BegunAuthorization> {
    const { client_id, redirect_uri, state, code_challenge, code_challenge_method, response_type } = params;

    if (!client_id) {
      throw new InvalidClientError('client_id is required');
    }

    const client = await this.store.getClient(client_id);
    if (!client) {
      throw new InvalidClientError(`unknown client_id: ${client_id}`);
    }

    if (!redirect_uri || !isRegisteredRedirectUri(client, redirect_uri)) {
      throw new InvalidRedirectUriError(`redirect_uri not registered for client ${client_id}`);
    }

    if (response_type !== undefined && response_type !== 'code') {
      throw new UnsupportedResponseTypeError(response_type);
    }

    if (!code_challenge) {
      throw new InvalidRequestError('code_challenge is required (PKCE)');
    }

    if (!isValidPkceValue(code_challenge)) {
      throw new InvalidRequestError('code_challenge is malformed');
    }

    if (!isSupportedChallengeMethod(code_challenge_method)) {
      throw new UnsupportedChallengeMethodError(code_challenge_method);
    }

    const scope = params.scope?.trim() || this.options.defaultScope;
    const now = Date.now();

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const request: AuthorizationRequest = {
        requestId: generateOpaqueId(),
        clientId: client.clientId,
        redirectUri: redirect_uri,
        state: state || undefined,
        codeChallenge: code_challenge,
        codeChallengeMethod: code_challenge_method,
        scope,
        requestedAt: now,
        expiresAt: now + this.options.requestLifetimeSecs * 1000,
      };

      if (await this.store.insertAuthorizationRequest(request)) {
        logger.debug({ clientId: client.clientId }, 'Stored pending authorization request');
        return {
          requestId: request.requestId,
          client,
          redirectUri: redirect_uri,
          scope,
          expiresAt: request.expiresAt,
        };
      }
    }

    throw new Error('Could not allocate a unique authorization request id');
  }
}
