import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthorizationRequestHandler } from '../../src/oauth/authorization.js';
import { ClientRegistry } from '../../src/oauth/client-registry.js';
import { MemoryCredentialStore } from '../../src/oauth/credential-store.js';
import {
  InvalidClientError,
  InvalidRedirectUriError,
  InvalidRequestError,
  OAuthError,
  UnsupportedChallengeMethodError,
  UnsupportedResponseTypeError,
} from '../../src/oauth/errors.js';
import { generateCodeChallenge, generateCodeVerifier } from '../../src/oauth/pkce.js';
import type { AuthorizationRequestParams } from '../../src/oauth/types.js';

const REDIRECT_URI = 'http://localhost:8080/callback';
const NOW = 1_700_000_000_000;

describe('AuthorizationRequestHandler', () => {
  let store: MemoryCredentialStore;
  let handler: AuthorizationRequestHandler;
  let clientId: string;
  let params: AuthorizationRequestParams;

  beforeEach(async () => {
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
    store = new MemoryCredentialStore();
    handler = new AuthorizationRequestHandler(store, { requestLifetimeSecs: 600, defaultScope: 'mcp:tools' });

    const registry = new ClientRegistry(store, { requireHttps: false });
    clientId = (await registry.register({ client_name: 'Test App', redirect_uris: [REDIRECT_URI] })).client_id;

    params = {
      response_type: 'code',
      client_id: clientId,
      redirect_uri: REDIRECT_URI,
      state: 'xyz',
      code_challenge: generateCodeChallenge(generateCodeVerifier()),
      code_challenge_method: 'S256',
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should store a pending request with the default scope', async () => {
    const begun = await handler.beginAuthorization(params);

    expect(begun.client.clientName).toBe('Test App');
    expect(begun.scope).toBe('mcp:tools');
    expect(begun.expiresAt).toBe(NOW + 600_000);

    const pending = await store.takeAuthorizationRequest(begun.requestId);
    expect(pending).toMatchObject({
      clientId,
      redirectUri: REDIRECT_URI,
      state: 'xyz',
      codeChallenge: params.code_challenge,
      codeChallengeMethod: 'S256',
      scope: 'mcp:tools',
    });
  });

  it('should keep a requested scope and accept a missing response_type', async () => {
    const begun = await handler.beginAuthorization({ ...params, response_type: undefined, scope: 'custom:scope' });
    expect(begun.scope).toBe('custom:scope');
  });

  it('should store no state when none was sent', async () => {
    const begun = await handler.beginAuthorization({ ...params, state: undefined });
    expect((await store.takeAuthorizationRequest(begun.requestId))?.state).toBeUndefined();
  });

  it('should issue a new request id every time', async () => {
    const first = await handler.beginAuthorization(params);
    const second = await handler.beginAuthorization(params);
    expect(second.requestId).not.toBe(first.requestId);
  });

  it.each<[string, Partial<AuthorizationRequestParams>, new (...args: never[]) => OAuthError]>([
    ['missing client_id', { client_id: undefined }, InvalidClientError],
    ['unknown client_id', { client_id: 'unknown-client' }, InvalidClientError],
    ['missing redirect_uri', { redirect_uri: undefined }, InvalidRedirectUriError],
    ['unregistered redirect_uri', { redirect_uri: 'http://localhost:8080/other' }, InvalidRedirectUriError],
    ['token response_type', { response_type: 'token' }, UnsupportedResponseTypeError],
    ['missing code_challenge', { code_challenge: undefined }, InvalidRequestError],
    ['short code_challenge', { code_challenge: 'abc' }, InvalidRequestError],
    ['plain challenge method', { code_challenge_method: 'plain' }, UnsupportedChallengeMethodError],
    ['missing challenge method', { code_challenge_method: undefined }, UnsupportedChallengeMethodError],
  ])('should reject %s and store nothing', async (_name, override, errorClass) => {
    await expect(handler.beginAuthorization({ ...params, ...override })).rejects.toBeInstanceOf(errorClass);
    expect((await store.stats()).authorizationRequests).toBe(0);
  });

  it('should check the client before the redirect URI', async () => {
    await expect(
      handler.beginAuthorization({ ...params, client_id: 'unknown-client', redirect_uri: 'http://evil.example.com/cb' })
    ).rejects.toBeInstanceOf(InvalidClientError);
  });
});
