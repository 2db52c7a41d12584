/**
 * Bearer token gate for the protected tool endpoint.
 *
 * Framework-free: takes the raw Authorization header value and returns an admit or
 * reject decision. Rejections never say why (missing, malformed, unknown and
 * expired all look the same).
 */

import type { CredentialStore } from './credential-store.js';

export interface TokenContext {
  clientId: string;
  scope: string;
  expiresAt: number;
}

export type GateDecision =
  | { admitted: true; context: TokenContext }
  | { admitted: false };

const BEARER_PATTERN = /^Bearer +([A-Za-z0-9\-._~+/]+=*) *$/i;

/**
 * Extract the Bearer credential from an Authorization header value
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export async function validateBearerToken(
  store: CredentialStore,
  authorizationHeader: string | undefined
): Promise<GateDecision> {
  const token = extractBearerToken(authorizationHeader);
  if (!token) {
    return { admitted: false };
  }

  const accessToken = await store.getAccessToken(token);
  if (!accessToken) {
    return { admitted: false };
  }

  return {
    admitted: true,
    context: {
      clientId: accessToken.clientId,
      scope: accessToken.scope,
      expiresAt: accessToken.expiresAt,
    },
  };
}
