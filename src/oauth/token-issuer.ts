/**
 * Authorization-code-for-access-token exchange (RFC 6749 §4.1.3 with RFC 7636 PKCE)
 */

import crypto from 'crypto';
import { logger } from '../utils/logger.js';
import { verifyClientSecret } from './client-registry.js';
import type { CredentialStore } from './credential-store.js';
import { InvalidClientError, InvalidGrantError } from './errors.js';
import { verifyCodeChallenge } from './pkce.js';
import type { AccessToken, AuthorizationCodeTokenRequest, TokenResponse } from './types.js';

const MAX_ID_ATTEMPTS = 5;

export interface TokenIssuerOptions {
  accessTokenLifetimeSecs: number;
}

/**
 * Generate a secure opaque access token
 */
function generateAccessToken(): string {
  return crypto.randomBytes(48).toString('base64url');
}

export class TokenIssuer {
  constructor(
    private readonly store: CredentialStore,
    private readonly options: TokenIssuerOptions,
  ) {}

  async exchange(request: AuthorizationCodeTokenRequest): Promise<TokenResponse> {
    const { code, client_id, client_secret, redirect_uri, code_verifier } = request;

    const authCode = await this.store.getAuthorizationCode(code);
    if (!authCode) {
      throw new InvalidGrantError('authorization code not found or expired');
    }
    if (authCode.consumed) {
      throw new InvalidGrantError('authorization code already used');
    }

    if (authCode.clientId !== client_id) {
      throw new InvalidClientError(`client_id ${client_id} does not match the code's client`);
    }

    const client = await this.store.getClient(client_id);
    if (!client) {
      throw new InvalidClientError(`unknown client_id: ${client_id}`);
    }

    if (client.clientType === 'confidential') {
      if (!client_secret || !client.clientSecretHash) {
        throw new InvalidClientError('client authentication required');
      }
      if (!verifyClientSecret(client_secret, client.clientSecretHash)) {
        throw new InvalidClientError('client secret mismatch');
      }
    }

    if (authCode.redirectUri !== redirect_uri) {
      throw new InvalidGrantError('redirect_uri does not match the authorization request');
    }

    if (!verifyCodeChallenge(code_verifier, authCode.codeChallenge, authCode.codeChallengeMethod)) {
      throw new InvalidGrantError('PKCE verification failed');
    }

    if (!(await this.store.consumeAuthorizationCode(code))) {
      throw new InvalidGrantError('authorization code already used');
    }

    const accessToken = await this.mintAccessToken(authCode.clientId, authCode.scope);

    logger.debug({ clientId: authCode.clientId }, 'Authorization code redeemed');

    return {
      access_token: accessToken.token,
      token_type: 'Bearer',
      expires_in: this.options.accessTokenLifetimeSecs,
      scope: accessToken.scope,
    };
  }

  private async mintAccessToken(clientId: string, scope: string): Promise<AccessToken> {
    const now = Date.now();

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const accessToken: AccessToken = {
        token: generateAccessToken(),
        clientId,
        scope,
        issuedAt: now,
        expiresAt: now + this.options.accessTokenLifetimeSecs * 1000,
      };

      if (await this.store.insertAccessToken(accessToken)) {
        return accessToken;
      }
    }

    throw new Error('Could not allocate a unique access token');
  }
}
