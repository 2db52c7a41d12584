/**
 * OAuth error taxonomy.
 *
 * Every error carries the coarse wire code and HTTP status that callers see, plus a
 * granular `reason` that is only ever written to the server log.
 */

import type { AuthorizationError, RegistrationError, TokenError } from './types.js';

export type OAuthErrorCode = TokenError | AuthorizationError | RegistrationError;

export class OAuthError extends Error {
  constructor(
    public readonly code: OAuthErrorCode,
    public readonly status: number,
    public readonly reason: string,
  ) {
    super(reason);
    this.name = this.constructor.name;
  }
}

/** Unknown client, or credentials that do not match the client. */
export class InvalidClientError extends OAuthError {
  constructor(reason = 'unknown client') {
    super('invalid_client', 401, reason);
  }
}

/** Redirect URI malformed, disallowed, or not registered for the client. */
export class InvalidRedirectUriError extends OAuthError {
  constructor(reason = 'redirect_uri not registered for this client') {
    super('invalid_redirect_uri', 400, reason);
  }
}

export class UnsupportedChallengeMethodError extends OAuthError {
  constructor(method: string | undefined) {
    super('invalid_request', 400, `unsupported code_challenge_method: ${method ?? '(missing)'}`);
  }
}

/** Stale, consumed or foreign authorization request id at approval time. */
export class UnknownRequestError extends OAuthError {
  constructor(reason = 'authorization request not found') {
    super('invalid_request', 400, reason);
  }
}

/** Bad, expired, reused or PKCE-mismatched code, or a redirect_uri mismatch at exchange. */
export class InvalidGrantError extends OAuthError {
  constructor(reason: string) {
    super('invalid_grant', 400, reason);
  }
}

export class InvalidRequestError extends OAuthError {
  constructor(reason: string) {
    super('invalid_request', 400, reason);
  }
}

export class UnsupportedResponseTypeError extends OAuthError {
  constructor(responseType: string) {
    super('unsupported_response_type', 400, `unsupported response_type: ${responseType}`);
  }
}

export class UnsupportedGrantTypeError extends OAuthError {
  constructor(grantType: string | undefined) {
    super('unsupported_grant_type', 400, `unsupported grant_type: ${grantType ?? '(missing)'}`);
  }
}

export class InvalidClientMetadataError extends OAuthError {
  constructor(reason: string) {
    super('invalid_client_metadata', 400, reason);
  }
}

// Fixed, non-revealing descriptions per wire code
const PUBLIC_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  invalid_request: 'The request is missing a required parameter or is otherwise malformed',
  invalid_client: 'Client authentication failed',
  invalid_grant: 'The authorization grant is invalid, expired, or has already been used',
  unauthorized_client: 'The client is not authorized to use this grant type',
  unsupported_grant_type: 'Only the authorization_code grant type is supported',
  unsupported_response_type: 'Only the "code" response type is supported',
  invalid_scope: 'The requested scope is invalid',
  access_denied: 'The resource owner denied the request',
  server_error: 'The authorization server encountered an unexpected error',
  temporarily_unavailable: 'The authorization server is temporarily unavailable',
  invalid_redirect_uri: 'The redirect URI is invalid or not registered for this client',
  invalid_client_metadata: 'The client metadata is invalid',
};

export function publicDescription(code: OAuthErrorCode): string {
  return PUBLIC_DESCRIPTIONS[code];
}
