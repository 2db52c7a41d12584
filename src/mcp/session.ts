import crypto from 'crypto';

export interface McpSession {
  id: string;
  /** OAuth client that opened the session; absent when the gate is disabled */
  clientId?: string;
  protocolVersion: string;
  clientInfo?: { name?: string; version?: string };
  createdAt: number;
  lastAccessedAt: number;
}

/**
 * In-memory registry of streaming MCP sessions, keyed by the Mcp-Session-Id header.
 * Idle sessions expire lazily on lookup and are swept by `compact()`.
 */
export class McpSessionManager {
  private sessions = new Map<string, McpSession>();

  constructor(private readonly idleSecs: number) {}

  /**
   * Generate a new session ID
   */
  generateSessionId(): string {
    return crypto.randomBytes(32).toString('hex');
  }

  createSession(initialData: Omit<McpSession, 'id' | 'createdAt' | 'lastAccessedAt'>): McpSession {
    const now = Date.now();
    let id = this.generateSessionId();
    while (this.sessions.has(id)) {
      id = this.generateSessionId();
    }

    const session: McpSession = {
      ...initialData,
      id,
      createdAt: now,
      lastAccessedAt: now,
    };

    this.sessions.set(id, session);
    return session;
  }

  /**
   * Get a session by ID and mark it as used
   */
  getSession(sessionId: string): McpSession | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    const now = Date.now();
    if (this.isIdle(session, now)) {
      this.sessions.delete(sessionId);
      return null;
    }

    session.lastAccessedAt = now;
    return session;
  }

  /**
   * Drop every idle session, including ones that are never looked up again
   */
  compact(): number {
    const now = Date.now();
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isIdle(session, now)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private isIdle(session: McpSession, now: number): boolean {
    return now - session.lastAccessedAt >= this.idleSecs * 1000;
  }

  get size(): number {
    return this.sessions.size;
  }
}
