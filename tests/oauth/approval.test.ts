import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApprovalHandler, buildRedirect, isConsentDecision } from '../../src/oauth/approval.js';
import { MemoryCredentialStore } from '../../src/oauth/credential-store.js';
import { InvalidRequestError, UnknownRequestError } from '../../src/oauth/errors.js';
import type { AuthorizationRequest } from '../../src/oauth/types.js';

const NOW = 1_700_000_000_000;
const CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

function pendingRequest(overrides: Partial<AuthorizationRequest> = {}): AuthorizationRequest {
  return {
    requestId: 'req-1',
    clientId: 'client-1',
    redirectUri: 'http://localhost:8080/callback',
    state: 'xyz',
    codeChallenge: CHALLENGE,
    codeChallengeMethod: 'S256',
    scope: 'mcp:tools',
    requestedAt: NOW,
    expiresAt: NOW + 600_000,
    ...overrides,
  };
}

describe('approval', () => {
  describe('buildRedirect', () => {
    it('should keep an existing query and append parameters', () => {
      expect(buildRedirect('https://app.example.com/cb?tenant=a', { code: 'abc', state: 'xyz' })).toBe(
        'https://app.example.com/cb?tenant=a&code=abc&state=xyz'
      );
    });

    it('should skip undefined parameters', () => {
      expect(buildRedirect('http://localhost:8080/callback', { error: 'access_denied', state: undefined })).toBe(
        'http://localhost:8080/callback?error=access_denied'
      );
    });

    it('should encode state verbatim', () => {
      expect(buildRedirect('http://localhost/cb', { state: 'a b&c=d' })).toBe('http://localhost/cb?state=a+b%26c%3Dd');
    });
  });

  describe('isConsentDecision', () => {
    it('should accept only allow and deny', () => {
      expect(isConsentDecision('allow')).toBe(true);
      expect(isConsentDecision('deny')).toBe(true);
      expect(isConsentDecision('ALLOW')).toBe(false);
      expect(isConsentDecision(['allow'])).toBe(false);
      expect(isConsentDecision(undefined)).toBe(false);
    });
  });

  describe('ApprovalHandler', () => {
    let store: MemoryCredentialStore;
    let handler: ApprovalHandler;

    beforeEach(async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      store = new MemoryCredentialStore();
      handler = new ApprovalHandler(store, { codeLifetimeSecs: 60 });
      await store.insertAuthorizationRequest(pendingRequest());
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should mint a code bound to the pending request on allow', async () => {
      const result = await handler.approve('req-1', 'allow');

      expect(result.outcome).toBe('approved');
      expect(result.clientId).toBe('client-1');

      const redirect = new URL(result.redirectTo);
      expect(`${redirect.origin}${redirect.pathname}`).toBe('http://localhost:8080/callback');
      expect(redirect.searchParams.get('state')).toBe('xyz');

      const code = redirect.searchParams.get('code') ?? '';
      expect(await store.getAuthorizationCode(code)).toEqual({
        code,
        clientId: 'client-1',
        redirectUri: 'http://localhost:8080/callback',
        codeChallenge: CHALLENGE,
        codeChallengeMethod: 'S256',
        scope: 'mcp:tools',
        issuedAt: NOW,
        expiresAt: NOW + 60_000,
        consumed: false,
      });
    });

    it('should redirect with access_denied and mint nothing on deny', async () => {
      const result = await handler.approve('req-1', 'deny');

      expect(result).toEqual({
        outcome: 'denied',
        clientId: 'client-1',
        redirectTo: 'http://localhost:8080/callback?error=access_denied&state=xyz',
      });
      expect((await store.stats()).authorizationCodes).toBe(0);
    });

    it('should omit state from the redirect when the request had none', async () => {
      await store.insertAuthorizationRequest(pendingRequest({ requestId: 'req-2', state: undefined }));

      const result = await handler.approve('req-2', 'deny');
      expect(result.redirectTo).toBe('http://localhost:8080/callback?error=access_denied');
    });

    it('should accept each request id only once', async () => {
      await handler.approve('req-1', 'allow');
      await expect(handler.approve('req-1', 'allow')).rejects.toBeInstanceOf(UnknownRequestError);
      expect((await store.stats()).authorizationCodes).toBe(1);
    });

    it('should reject an unknown request id', async () => {
      await expect(handler.approve('req-missing', 'allow')).rejects.toBeInstanceOf(UnknownRequestError);
    });

    it('should reject an expired request', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW + 600_000);
      await expect(handler.approve('req-1', 'allow')).rejects.toBeInstanceOf(UnknownRequestError);
    });

    it('should leave the request pending on an invalid decision', async () => {
      await expect(handler.approve('req-1', 'maybe')).rejects.toBeInstanceOf(InvalidRequestError);

      const result = await handler.approve('req-1', 'allow');
      expect(result.outcome).toBe('approved');
    });
  });
});
