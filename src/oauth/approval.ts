/**
 * Consent decision handling: turns a pending authorization request into an
 * authorization code (allow) or an access_denied redirect (deny).
 */

import { logger } from '../utils/logger.js';
import type { CredentialStore } from './credential-store.js';
import { InvalidRequestError, UnknownRequestError } from './errors.js';
import { generateOpaqueId } from './pkce.js';
import type { AuthorizationCode, ConsentDecision } from './types.js';

const MAX_ID_ATTEMPTS = 5;

export interface ApprovalHandlerOptions {
  codeLifetimeSecs: number;
}

export interface ApprovalResult {
  outcome: 'approved' | 'denied';
  clientId: string;
  redirectTo: string;
}

export function isConsentDecision(value: unknown): value is ConsentDecision {
  return value === 'allow' || value === 'deny';
}

/**
 * Append parameters to a redirect URI, keeping any query it already has.
 * `state` is echoed verbatim and never interpreted.
 */
export function buildRedirect(redirectUri: string, params: Record<string, string | undefined>): string {
  const url = new URL(redirectUri);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

export class ApprovalHandler {
  constructor(
    private readonly store: CredentialStore,
    private readonly options: ApprovalHandlerOptions,
  ) {}

  async approve(requestId: string, decision: unknown): Promise<ApprovalResult> {
    if (!isConsentDecision(decision)) {
      throw new InvalidRequestError(`unknown consent decision: ${String(decision)}`);
    }

    // Hand-off: once taken, the request id can never yield a second code
    const pending = await this.store.takeAuthorizationRequest(requestId);
    if (!pending) {
      throw new UnknownRequestError();
    }

    if (decision === 'deny') {
      logger.debug({ clientId: pending.clientId }, 'Authorization denied by user');
      return {
        outcome: 'denied',
        clientId: pending.clientId,
        redirectTo: buildRedirect(pending.redirectUri, {
          error: 'access_denied',
          state: pending.state,
        }),
      };
    }

    const now = Date.now();

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const authCode: AuthorizationCode = {
        code: generateOpaqueId(),
        clientId: pending.clientId,
        redirectUri: pending.redirectUri,
        codeChallenge: pending.codeChallenge,
        codeChallengeMethod: pending.codeChallengeMethod,
        scope: pending.scope,
        issuedAt: now,
        expiresAt: now + this.options.codeLifetimeSecs * 1000,
        consumed: false,
      };

      if (await this.store.insertAuthorizationCode(authCode)) {
        logger.debug({ clientId: pending.clientId }, 'Created authorization code');
        return {
          outcome: 'approved',
          clientId: pending.clientId,
          redirectTo: buildRedirect(pending.redirectUri, {
            code: authCode.code,
            state: pending.state,
          }),
        };
      }
    }

    throw new Error('Could not allocate a unique authorization code');
  }
}
