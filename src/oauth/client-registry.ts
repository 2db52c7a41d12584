/**
 * OAuth Client Registry (RFC 7591 - Dynamic Client Registration)
 */

import crypto from 'crypto';
import { logger } from '../utils/logger.js';
import type { CredentialStore } from './credential-store.js';
import { InvalidClientMetadataError, InvalidRedirectUriError } from './errors.js';
import { generateOpaqueId } from './pkce.js';
import {
  TOKEN_ENDPOINT_AUTH_METHODS,
  type ClientRegistrationRequest,
  type ClientRegistrationResponse,
  type ClientType,
  type OAuthClient,
  type TokenEndpointAuthMethod,
} from './types.js';

const MAX_ID_ATTEMPTS = 5;
const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);
// Private-use URI schemes for native apps (RFC 8252 §7.1), e.g. com.example.app:
const PRIVATE_USE_SCHEME = /^[a-z][a-z0-9+\-]*\.[a-z0-9+\-.]+:$/;

export interface ClientRegistryOptions {
  /** Require https (except loopback) for web redirect URIs */
  requireHttps: boolean;
  /** Optional glob patterns every redirect URI must match */
  allowedRedirectPatterns?: string[];
}

/**
 * Generate a secure client ID
 */
function generateClientId(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Hash a client secret for storage
 */
export function hashClientSecret(secret: string): string {
  return crypto.createHash('sha256').update(secret).digest('hex');
}

/**
 * Verify a client secret against its hash
 */
export function verifyClientSecret(secret: string, hash: string): boolean {
  const inputHash = Buffer.from(hashClientSecret(secret));
  const storedHash = Buffer.from(hash);
  if (inputHash.length !== storedHash.length) {
    return false;
  }
  return crypto.timingSafeEqual(inputHash, storedHash);
}

/**
 * Check if a URL matches any of the given glob-like patterns.
 * `**` matches any characters including `/`, `*` matches any except `/`.
 */
export function matchesAnyPattern(url: string, patterns: string[]): boolean {
  return patterns.some((pattern) => {
    const regexStr = pattern
      .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
      .replace(/\*\*/g, '@@GLOBSTAR@@')
      .replace(/\*/g, '[^/]*')
      .replace(/@@GLOBSTAR@@/g, '.*');
    return new RegExp(`^${regexStr}$`).test(url);
  });
}

export function clientTypeFor(method: TokenEndpointAuthMethod): ClientType {
  return method === 'none' ? 'public' : 'confidential';
}

export class ClientRegistry {
  constructor(
    private readonly store: CredentialStore,
    private readonly options: ClientRegistryOptions,
  ) {}

  /**
   * Check a redirect URI's shape. Throws InvalidRedirectUriError with the reason.
   */
  validateRedirectUri(uri: string): void {
    let parsed: URL;
    try {
      parsed = new URL(uri);
    } catch {
      throw new InvalidRedirectUriError(`not an absolute URI: ${uri}`);
    }

    if (parsed.hash || uri.includes('#')) {
      throw new InvalidRedirectUriError(`fragment not allowed: ${uri}`);
    }

    const isWeb = parsed.protocol === 'https:' || parsed.protocol === 'http:';
    if (!isWeb && !PRIVATE_USE_SCHEME.test(parsed.protocol)) {
      throw new InvalidRedirectUriError(`scheme not allowed: ${parsed.protocol}`);
    }

    if (isWeb && this.options.requireHttps && parsed.protocol !== 'https:' && !LOOPBACK_HOSTS.has(parsed.hostname)) {
      throw new InvalidRedirectUriError(`https required: ${uri}`);
    }

    const patterns = this.options.allowedRedirectPatterns ?? [];
    if (patterns.length > 0 && !matchesAnyPattern(uri, patterns)) {
      throw new InvalidRedirectUriError(`not allowed by server policy: ${uri}`);
    }
  }

  /**
   * Register a new OAuth client. The plain secret is only ever returned here.
   */
  async register(request: ClientRegistrationRequest): Promise<ClientRegistrationResponse> {
    if (!Array.isArray(request.redirect_uris) || request.redirect_uris.length === 0) {
      throw new InvalidClientMetadataError('at least one redirect_uri is required');
    }

    for (const uri of request.redirect_uris) {
      if (typeof uri !== 'string') {
        throw new InvalidRedirectUriError('redirect_uris must be strings');
      }
      this.validateRedirectUri(uri);
    }

    const authMethod = request.token_endpoint_auth_method ?? 'none';
    if (!TOKEN_ENDPOINT_AUTH_METHODS.includes(authMethod)) {
      throw new InvalidClientMetadataError(`unsupported token_endpoint_auth_method: ${String(authMethod)}`);
    }

    const clientType = clientTypeFor(authMethod);
    const clientSecret = clientType === 'confidential' ? generateOpaqueId() : undefined;
    const redirectUris = [...new Set(request.redirect_uris)];

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const client: OAuthClient = {
        clientId: generateClientId(),
        clientSecretHash: clientSecret ? hashClientSecret(clientSecret) : undefined,
        clientName: request.client_name?.trim() || 'Unnamed client',
        clientType,
        redirectUris,
        tokenEndpointAuthMethod: authMethod,
        registeredAt: Date.now(),
      };

      if (!(await this.store.insertClient(client))) {
        logger.warn({ attempt }, 'Client ID collision, regenerating');
        continue;
      }

      logger.info({ clientId: client.clientId, clientType }, 'Registered new OAuth client');

      return {
        client_id: client.clientId,
        ...(clientSecret ? { client_secret: clientSecret } : {}),
        client_name: client.clientName,
        redirect_uris: client.redirectUris,
        grant_types: ['authorization_code'],
        response_types: ['code'],
        token_endpoint_auth_method: authMethod,
        client_id_issued_at: Math.floor(client.registeredAt / 1000),
        client_secret_expires_at: 0,
      };
    }

    throw new Error('Could not allocate a unique client_id');
  }
}

/**
 * Validate redirect URI against registered client. Exact match, no wildcards.
 */
export function isRegisteredRedirectUri(client: OAuthClient, redirectUri: string): boolean {
  return client.redirectUris.includes(redirectUri);
}
