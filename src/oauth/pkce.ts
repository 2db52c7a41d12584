import crypto from 'crypto';
import type { CodeChallengeMethod } from './types.js';

/**
 * PKCE (Proof Key for Code Exchange) implementation per RFC 7636
 */

// 43-128 characters from the unreserved URI set
const PKCE_VALUE_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

export function isValidPkceValue(value: string): boolean {
  return PKCE_VALUE_PATTERN.test(value);
}

/**
 * Generate a cryptographically random code verifier
 */
export function generateCodeVerifier(): string {
  // 48 bytes = 64 base64url characters
  return crypto.randomBytes(48).toString('base64url');
}

/**
 * BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return crypto
    .createHash('sha256')
    .update(codeVerifier, 'ascii')
    .digest('base64url');
}

export function isSupportedChallengeMethod(method: string | undefined): method is CodeChallengeMethod {
  return method === 'S256';
}

/**
 * Verify PKCE code challenge in constant time
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod
): boolean {
  if (!isSupportedChallengeMethod(method)) {
    return false;
  }

  const computed = Buffer.from(generateCodeChallenge(codeVerifier));
  const expected = Buffer.from(codeChallenge);

  if (computed.length !== expected.length) {
    return false;
  }

  return crypto.timingSafeEqual(computed, expected);
}

/**
 * Generate an opaque random identifier (codes, request ids, secrets)
 */
export function generateOpaqueId(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}
