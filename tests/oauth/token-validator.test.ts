import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryCredentialStore } from '../../src/oauth/credential-store.js';
import { extractBearerToken, validateBearerToken } from '../../src/oauth/token-validator.js';

const NOW = 1_700_000_000_000;

describe('token-validator', () => {
  describe('extractBearerToken', () => {
    it('should extract the credential', () => {
      expect(extractBearerToken('Bearer abc.DEF-123_~+/==')).toBe('abc.DEF-123_~+/==');
    });

    it('should accept any casing of the scheme', () => {
      expect(extractBearerToken('bearer abc')).toBe('abc');
    });

    it.each([undefined, '', 'Bearer', 'Bearer ', 'Basic abc', 'Bearer a b', 'Bearer abc,def', 'abc'])(
      'should return null for %j',
      (header) => {
        expect(extractBearerToken(header)).toBeNull();
      }
    );
  });

  describe('validateBearerToken', () => {
    let store: MemoryCredentialStore;

    beforeEach(async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      store = new MemoryCredentialStore();
      await store.insertAccessToken({
        token: 'live-token',
        clientId: 'client-1',
        scope: 'mcp:tools',
        issuedAt: NOW,
        expiresAt: NOW + 3_600_000,
      });
      await store.insertAuthorizationCode({
        code: 'code-value',
        clientId: 'client-1',
        redirectUri: 'http://localhost/cb',
        codeChallenge: 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM',
        codeChallengeMethod: 'S256',
        scope: 'mcp:tools',
        issuedAt: NOW,
        expiresAt: NOW + 60_000,
        consumed: false,
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should admit a live token with its client and scope', async () => {
      expect(await validateBearerToken(store, 'Bearer live-token')).toEqual({
        admitted: true,
        context: { clientId: 'client-1', scope: 'mcp:tools', expiresAt: NOW + 3_600_000 },
      });
    });

    it('should reject a missing header', async () => {
      expect(await validateBearerToken(store, undefined)).toEqual({ admitted: false });
    });

    it('should reject an unknown token', async () => {
      expect(await validateBearerToken(store, 'Bearer other-token')).toEqual({ admitted: false });
    });

    it('should reject an authorization code presented as a token', async () => {
      expect(await validateBearerToken(store, 'Bearer code-value')).toEqual({ admitted: false });
    });

    it('should give the same decision on repeated validation until expiry', async () => {
      const first = await validateBearerToken(store, 'Bearer live-token');
      const second = await validateBearerToken(store, 'Bearer live-token');
      expect(second).toEqual(first);
      expect(first.admitted).toBe(true);

      vi.spyOn(Date, 'now').mockReturnValue(NOW + 3_600_000);
      expect(await validateBearerToken(store, 'Bearer live-token')).toEqual({ admitted: false });
      expect((await store.stats()).accessTokens).toBe(1);
    });

    it('should reject a token at its expiry instant', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW + 3_600_000);
      expect(await validateBearerToken(store, 'Bearer live-token')).toEqual({ admitted: false });
    });
  });
});
