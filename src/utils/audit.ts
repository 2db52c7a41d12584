/**
 * Structured audit logging for security-relevant events.
 * All events are logged at info level with a structured `event` field.
 */

import { logger } from './logger.js';

export type AuditEvent =
  | 'oauth.client_registered'
  | 'oauth.authorization_requested'
  | 'oauth.consent_granted'
  | 'oauth.consent_denied'
  | 'oauth.token_issued'
  | 'oauth.token_rejected'
  | 'mcp.session_created'
  | 'mcp.session_closed'
  | 'tool.executed';

interface AuditContext {
  event: AuditEvent;
  clientId?: string;
  sessionId?: string;
  ip?: string;
  toolName?: string;
  [key: string]: unknown;
}

/**
 * Log a structured audit event.
 */
export function audit(context: AuditContext, message: string): void {
  logger.info(context, `[AUDIT] ${message}`);
}
