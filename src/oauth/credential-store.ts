/**
 * Credential storage for clients, pending authorization requests, authorization
 * codes and access tokens.
 *
 * Expiry is enforced lazily at lookup time. Methods are async so that a shared
 * backend can stand in for the in-memory store; the in-memory implementation runs
 * each method in a single synchronous section, which is what makes insert-if-absent
 * and compare-and-set atomic.
 */

import { logger } from '../utils/logger.js';
import type { AccessToken, AuthorizationCode, AuthorizationRequest, OAuthClient } from './types.js';

export interface CredentialStoreStats {
  clients: number;
  authorizationRequests: number;
  authorizationCodes: number;
  accessTokens: number;
}

export interface CredentialStore {
  insertClient(client: OAuthClient): Promise<boolean>;
  getClient(clientId: string): Promise<OAuthClient | null>;

  insertAuthorizationRequest(request: AuthorizationRequest): Promise<boolean>;
  /** Atomically fetch and delete a pending request. */
  takeAuthorizationRequest(requestId: string): Promise<AuthorizationRequest | null>;

  insertAuthorizationCode(authCode: AuthorizationCode): Promise<boolean>;
  getAuthorizationCode(code: string): Promise<AuthorizationCode | null>;
  /** Compare-and-set `consumed` from false to true. */
  consumeAuthorizationCode(code: string): Promise<boolean>;

  insertAccessToken(accessToken: AccessToken): Promise<boolean>;
  getAccessToken(token: string): Promise<AccessToken | null>;

  /** Drop expired entries. Returns the number removed. */
  compact(): Promise<number>;
  stats(): Promise<CredentialStoreStats>;
}

// In-memory store (single instance, process lifetime)
export class MemoryCredentialStore implements CredentialStore {
  private clients = new Map<string, OAuthClient>();
  private requests = new Map<string, AuthorizationRequest>();
  private codes = new Map<string, AuthorizationCode>();
  private tokens = new Map<string, AccessToken>();

  async insertClient(client: OAuthClient): Promise<boolean> {
    if (this.clients.has(client.clientId)) {
      return false;
    }
    this.clients.set(client.clientId, client);
    return true;
  }

  async getClient(clientId: string): Promise<OAuthClient | null> {
    return this.clients.get(clientId) ?? null;
  }

  async insertAuthorizationRequest(request: AuthorizationRequest): Promise<boolean> {
    return insertIfAbsent(this.requests, request.requestId, request);
  }

  async takeAuthorizationRequest(requestId: string): Promise<AuthorizationRequest | null> {
    const request = getLive(this.requests, requestId);
    this.requests.delete(requestId);
    return request;
  }

  async insertAuthorizationCode(authCode: AuthorizationCode): Promise<boolean> {
    return insertIfAbsent(this.codes, authCode.code, { ...authCode });
  }

  async getAuthorizationCode(code: string): Promise<AuthorizationCode | null> {
    const authCode = getLive(this.codes, code);
    // Copy so callers cannot flip `consumed` behind the store's back
    return authCode ? { ...authCode } : null;
  }

  async consumeAuthorizationCode(code: string): Promise<boolean> {
    const authCode = getLive(this.codes, code);
    if (!authCode || authCode.consumed) {
      return false;
    }
    authCode.consumed = true;
    return true;
  }

  async insertAccessToken(accessToken: AccessToken): Promise<boolean> {
    return insertIfAbsent(this.tokens, accessToken.token, accessToken);
  }

  async getAccessToken(token: string): Promise<AccessToken | null> {
    return getLive(this.tokens, token);
  }

  async compact(): Promise<number> {
    const removed =
      dropExpired(this.requests) + dropExpired(this.codes) + dropExpired(this.tokens);

    if (removed > 0) {
      logger.debug({ removed }, 'Compacted credential store');
    }

    return removed;
  }

  async stats(): Promise<CredentialStoreStats> {
    return {
      clients: this.clients.size,
      authorizationRequests: this.requests.size,
      authorizationCodes: this.codes.size,
      accessTokens: this.tokens.size,
    };
  }
}

interface Expiring {
  expiresAt: number;
}

function isExpired(entry: Expiring, now = Date.now()): boolean {
  return now >= entry.expiresAt;
}

function getLive<T extends Expiring>(map: Map<string, T>, key: string): T | null {
  const entry = map.get(key);
  if (!entry || isExpired(entry)) {
    return null;
  }
  return entry;
}

function insertIfAbsent<T extends Expiring>(map: Map<string, T>, key: string, value: T): boolean {
  const existing = map.get(key);
  if (existing && !isExpired(existing)) {
    return false;
  }
  map.set(key, value);
  return true;
}

function dropExpired<T extends Expiring>(map: Map<string, T>): number {
  const now = Date.now();
  let removed = 0;
  for (const [key, entry] of map) {
    if (isExpired(entry, now)) {
      map.delete(key);
      removed++;
    }
  }
  return removed;
}

/** Anything else swept on the compaction timer, such as the MCP session registry */
export interface SessionCompactor {
  compact(): number;
}

/**
 * Periodically compact a store and, when given, the session registry.
 * The timer does not keep the process alive.
 */
export function startCompaction(
  store: CredentialStore,
  intervalSecs: number,
  sessions?: SessionCompactor
): () => void {
  if (intervalSecs <= 0) {
    return () => {};
  }

  const timer = setInterval(() => {
    const expiredSessions = sessions?.compact() ?? 0;
    if (expiredSessions > 0) {
      logger.debug({ removed: expiredSessions }, 'Compacted MCP sessions');
    }

    store.compact().catch((err: unknown) => {
      logger.error({ err }, 'Credential store compaction failed');
    });
  }, intervalSecs * 1000);
  timer.unref();

  return () => clearInterval(timer);
}
