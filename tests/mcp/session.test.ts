import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { McpSessionManager } from '../../src/mcp/session.js';

const NOW = 1_700_000_000_000;

describe('McpSessionManager', () => {
  let sessions: McpSessionManager;

  beforeEach(() => {
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
    sessions = new McpSessionManager(60);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create sessions with unique hex ids', () => {
    const a = sessions.createSession({ clientId: 'client-1', protocolVersion: '2025-06-18' });
    const b = sessions.createSession({ clientId: 'client-1', protocolVersion: '2025-06-18' });

    expect(a.id).toMatch(/^[0-9a-f]{64}$/);
    expect(b.id).not.toBe(a.id);
    expect(sessions.size).toBe(2);
  });

  it('should return a stored session and refresh its last access', () => {
    const created = sessions.createSession({ clientId: 'client-1', protocolVersion: '2025-06-18' });

    vi.spyOn(Date, 'now').mockReturnValue(NOW + 30_000);
    const found = sessions.getSession(created.id);

    expect(found?.clientId).toBe('client-1');
    expect(found?.createdAt).toBe(NOW);
    expect(found?.lastAccessedAt).toBe(NOW + 30_000);
  });

  it('should expire a session idle for the configured time', () => {
    const created = sessions.createSession({ protocolVersion: '2025-06-18' });

    vi.spyOn(Date, 'now').mockReturnValue(NOW + 60_000);

    expect(sessions.getSession(created.id)).toBeNull();
    expect(sessions.size).toBe(0);
  });

  it('should keep a session alive while it is used', () => {
    const created = sessions.createSession({ protocolVersion: '2025-06-18' });

    vi.spyOn(Date, 'now').mockReturnValue(NOW + 50_000);
    sessions.getSession(created.id);
    vi.spyOn(Date, 'now').mockReturnValue(NOW + 100_000);

    expect(sessions.getSession(created.id)).not.toBeNull();
  });

  it('should delete sessions', () => {
    const created = sessions.createSession({ protocolVersion: '2025-06-18' });

    expect(sessions.deleteSession(created.id)).toBe(true);
    expect(sessions.deleteSession(created.id)).toBe(false);
    expect(sessions.getSession(created.id)).toBeNull();
  });

  it('should sweep idle sessions that are never looked up again', () => {
    const short = new McpSessionManager(1);
    for (let i = 0; i < 1000; i++) {
      short.createSession({ clientId: 'client-1', protocolVersion: '2025-06-18' });
    }

    vi.spyOn(Date, 'now').mockReturnValue(NOW + 3_600_000);
    const fresh = short.createSession({ clientId: 'client-1', protocolVersion: '2025-06-18' });

    expect(short.compact()).toBe(1000);
    expect(short.size).toBe(1);
    expect(short.getSession(fresh.id)?.id).toBe(fresh.id);
  });

  it('should keep sessions used within the idle window when compacting', () => {
    const active = sessions.createSession({ protocolVersion: '2025-06-18' });
    const idle = sessions.createSession({ protocolVersion: '2025-06-18' });

    vi.spyOn(Date, 'now').mockReturnValue(NOW + 30_000);
    sessions.getSession(active.id);
    vi.spyOn(Date, 'now').mockReturnValue(NOW + 60_000);

    expect(sessions.compact()).toBe(1);
    expect(sessions.getSession(active.id)).not.toBeNull();
    expect(sessions.getSession(idle.id)).toBeNull();
  });
});
