/**
 * OAuth 2.1 Authorization Server Types
 */

export type ClientType = 'public' | 'confidential';

/**
 * Registered OAuth Client (RFC 7591)
 */
export interface OAuthClient {
  clientId: string;
  clientSecretHash?: string; // SHA-256 hex, confidential clients only
  clientName: string;
  clientType: ClientType;
  redirectUris: string[];
  tokenEndpointAuthMethod: TokenEndpointAuthMethod;
  registeredAt: number;
}

/**
 * Client registration request (RFC 7591)
 */
export interface ClientRegistrationRequest {
  client_name?: string;
  redirect_uris: string[];
  token_endpoint_auth_method?: TokenEndpointAuthMethod;
}

/**
 * Client registration response (RFC 7591)
 */
export interface ClientRegistrationResponse {
  client_id: string;
  client_secret?: string;
  client_name: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  response_types: ResponseType[];
  token_endpoint_auth_method: TokenEndpointAuthMethod;
  client_id_issued_at: number;
  client_secret_expires_at: number; // 0 = never expires
}

/**
 * Pending authorization, waiting for the user's consent decision
 */
export interface AuthorizationRequest {
  requestId: string;
  clientId: string;
  redirectUri: string;
  state?: string;
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  scope: string;
  requestedAt: number;
  expiresAt: number;
}

/**
 * Authorization Code with PKCE
 */
export interface AuthorizationCode {
  code: string;
  clientId: string;
  redirectUri: string;
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  scope: string;
  issuedAt: number;
  expiresAt: number;
  consumed: boolean;
}

/**
 * Opaque bearer access token
 */
export interface AccessToken {
  token: string;
  clientId: string;
  scope: string;
  issuedAt: number;
  expiresAt: number;
}

/**
 * Token Response (RFC 6749)
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  scope: string;
}

/**
 * Token Error Response (RFC 6749)
 */
export interface TokenErrorResponse {
  error: TokenError;
  error_description?: string;
}

/**
 * OAuth Authorization Server Metadata (RFC 8414)
 */
export interface AuthorizationServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  registration_endpoint?: string;
  response_types_supported: ResponseType[];
  response_modes_supported: ResponseMode[];
  grant_types_supported: GrantType[];
  token_endpoint_auth_methods_supported: TokenEndpointAuthMethod[];
  code_challenge_methods_supported: CodeChallengeMethod[];
  scopes_supported?: string[];
}

// Enums as string literal types

export type GrantType = 'authorization_code';
export type ResponseType = 'code';
export type ResponseMode = 'query';
export type TokenEndpointAuthMethod = 'none' | 'client_secret_post' | 'client_secret_basic';
export type CodeChallengeMethod = 'S256';
export type ConsentDecision = 'allow' | 'deny';

export const TOKEN_ENDPOINT_AUTH_METHODS: readonly TokenEndpointAuthMethod[] = [
  'none',
  'client_secret_post',
  'client_secret_basic',
];

export type TokenError =
  | 'invalid_request'
  | 'invalid_client'
  | 'invalid_grant'
  | 'unauthorized_client'
  | 'unsupported_grant_type'
  | 'invalid_scope'
  | 'server_error';

export type AuthorizationError =
  | 'invalid_request'
  | 'unauthorized_client'
  | 'access_denied'
  | 'unsupported_response_type'
  | 'invalid_scope'
  | 'server_error'
  | 'temporarily_unavailable';

export type RegistrationError =
  | 'invalid_redirect_uri'
  | 'invalid_client_metadata';

/**
 * Parameters of an incoming authorization request (GET /authorize)
 */
export interface AuthorizationRequestParams {
  response_type?: string;
  client_id?: string;
  redirect_uri?: string;
  scope?: string;
  state?: string;
  code_challenge?: string;
  code_challenge_method?: string;
}

/**
 * Token Request (authorization_code grant)
 */
export interface AuthorizationCodeTokenRequest {
  code: string;
  redirect_uri: string;
  client_id: string;
  client_secret?: string;
  code_verifier: string;
}
