/**
 * MCP Protocol Handler (Streamable HTTP)
 */

import { Router, type Request, type RequestHandler, type Response } from 'express';
import { audit } from '../utils/audit.js';
import {
  JsonRpcError,
  type McpRequestHandler,
  SUPPORTED_PROTOCOL_VERSIONS,
  initializeResult,
  isJsonRpcRequest,
  negotiateProtocolVersion,
} from './handler.js';
import type { McpSession, McpSessionManager } from './session.js';

export const SESSION_HEADER = 'mcp-session-id';

export interface McpRouterOptions {
  sessions: McpSessionManager;
  handler: McpRequestHandler;
  /** Bearer gate; omitted only when authentication is disabled for development */
  gate?: RequestHandler;
}

function sendJsonRpcError(
  res: Response,
  status: number,
  code: number,
  message: string,
  id: string | number | null = null
): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id,
  });
}

function parseClientInfo(value: unknown): McpSession['clientInfo'] {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const name: unknown = Reflect.get(value, 'name');
  const version: unknown = Reflect.get(value, 'version');
  return {
    name: typeof name === 'string' ? name : undefined,
    version: typeof version === 'string' ? version : undefined,
  };
}

/**
 * Resolve the session named by the request header. Sessions belong to the client
 * that opened them; a foreign session is reported as missing.
 */
function resolveSession(req: Request, res: Response, sessions: McpSessionManager): McpSession | null {
  const sessionId = req.headers[SESSION_HEADER];

  if (typeof sessionId !== 'string' || sessionId.length === 0) {
    sendJsonRpcError(res, 400, -32000, 'Bad Request: Mcp-Session-Id header is required');
    return null;
  }

  const session = sessions.getSession(sessionId);
  if (!session || session.clientId !== req.oauth?.clientId) {
    sendJsonRpcError(res, 404, -32001, 'Session not found');
    return null;
  }

  return session;
}

export function createMcpRouter(options: McpRouterOptions): Router {
  const { sessions, handler, gate } = options;
  const router = Router();

  if (gate) {
    router.use('/mcp', gate);
  }

  router.post('/mcp', async (req: Request, res: Response): Promise<void> => {
    const protocolVersion = req.headers['mcp-protocol-version'];

    // Allow missing for backwards compatibility
    if (typeof protocolVersion === 'string' && !SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion)) {
      sendJsonRpcError(res, 400, -32600, 'Unsupported protocol version');
      return;
    }

    const jsonRpc: unknown = req.body;

    if (!isJsonRpcRequest(jsonRpc)) {
      sendJsonRpcError(res, 400, -32600, 'Invalid request');
      return;
    }

    const id = jsonRpc.id ?? null;

    if (jsonRpc.method === 'initialize') {
      const session = sessions.createSession({
        clientId: req.oauth?.clientId,
        protocolVersion: negotiateProtocolVersion(jsonRpc.params?.['protocolVersion']),
        clientInfo: parseClientInfo(jsonRpc.params?.['clientInfo']),
      });

      audit(
        { event: 'mcp.session_created', sessionId: session.id, clientId: session.clientId, ip: req.ip },
        'MCP session created'
      );

      res.setHeader('Mcp-Session-Id', session.id);
      res.json({
        jsonrpc: '2.0',
        result: initializeResult(session.protocolVersion),
        id,
      });
      return;
    }

    const session = resolveSession(req, res, sessions);
    if (!session) {
      return;
    }

    try {
      const result = await handler.handle({ session, log: req.log, ip: req.ip }, jsonRpc);

      if (result === null) {
        // Notification - no response needed
        res.status(202).send();
        return;
      }

      res.json({
        jsonrpc: '2.0',
        result,
        id,
      });
    } catch (err) {
      if (err instanceof JsonRpcError) {
        sendJsonRpcError(res, 200, err.code, err.message, id);
        return;
      }

      req.log.error({ err, method: jsonRpc.method }, 'MCP request failed');
      sendJsonRpcError(res, 500, -32603, 'Internal server error', id);
    }
  });

  // Server-to-client stream for an existing session
  router.get('/mcp', (req: Request, res: Response): void => {
    const accept = req.headers['accept'] ?? '';

    if (!accept.includes('text/event-stream')) {
      res.status(405).json({ error: 'Method not allowed' });
      return;
    }

    const session = resolveSession(req, res, sessions);
    if (!session) {
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    // Initial event with an id for reconnection
    res.write(`id: ${Date.now()}\ndata: \n\n`);

    const keepAlive = setInterval(() => {
      res.write(': keepalive\n\n');
    }, 30000);

    req.on('close', () => {
      clearInterval(keepAlive);
    });
  });

  // MCP session termination
  router.delete('/mcp', (req: Request, res: Response): void => {
    const session = resolveSession(req, res, sessions);
    if (!session) {
      return;
    }

    sessions.deleteSession(session.id);
    audit(
      { event: 'mcp.session_closed', sessionId: session.id, clientId: session.clientId, ip: req.ip },
      'MCP session closed'
    );
    res.status(200).send();
  });

  return router;
}
