/**
 * JSON-RPC dispatch for an established MCP session. The payloads are passed to
 * the tool backend as-is; nothing here interprets tool arguments.
 */

import { ZodError } from 'zod';
import { audit } from '../utils/audit.js';
import type { Logger } from '../utils/logger.js';
import { allToolDefinitions, type ToolExecutor } from '../tools/index.js';
import type { McpSession } from './session.js';

export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-11-25', '2025-06-18', '2025-03-26', '2024-11-05'];

export const SERVER_INFO = {
  name: 'bash-mcp-server',
  version: '1.0.0',
};

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
  id?: string | number | null;
}

export class JsonRpcError extends Error {
  constructor(
    public readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export function isJsonRpcRequest(body: unknown): body is JsonRpcRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return false;
  }
  const candidate = body as Record<string, unknown>;
  return (
    candidate['jsonrpc'] === '2.0' &&
    typeof candidate['method'] === 'string' &&
    (candidate['params'] === undefined ||
      (typeof candidate['params'] === 'object' && candidate['params'] !== null))
  );
}

/**
 * Pick the client's protocol version if we support it, else our latest
 */
export function negotiateProtocolVersion(requested: unknown): string {
  return typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
    ? requested
    : SUPPORTED_PROTOCOL_VERSIONS[0] ?? '2025-06-18';
}

export function initializeResult(protocolVersion: string): object {
  return {
    protocolVersion,
    capabilities: {
      tools: { listChanged: false },
      resources: { subscribe: false, listChanged: false },
      prompts: { listChanged: false },
    },
    serverInfo: SERVER_INFO,
  };
}

export interface McpRequestContext {
  session: McpSession;
  log: Logger;
  ip?: string;
}

export class McpRequestHandler {
  constructor(private readonly tools: ToolExecutor) {}

  /**
   * Handle one request or notification. Resolves to null for notifications.
   */
  async handle(ctx: McpRequestContext, jsonRpc: JsonRpcRequest): Promise<unknown> {
    const { method, params } = jsonRpc;

    switch (method) {
      case 'notifications/initialized':
        ctx.log.info({ sessionId: ctx.session.id }, 'Client initialized');
        return null;

      case 'ping':
        return {};

      case 'tools/list':
        return { tools: allToolDefinitions };

      case 'tools/call':
        return this.callTool(ctx, params);

      case 'resources/list':
        return { resources: [] };

      case 'prompts/list':
        return { prompts: [] };

      default:
        if (method.startsWith('notifications/')) {
          return null;
        }
        throw new JsonRpcError(-32601, `Method not found: ${method}`);
    }
  }

  private async callTool(ctx: McpRequestContext, params?: Record<string, unknown>): Promise<object> {
    const toolName = params?.['name'];
    if (typeof toolName !== 'string' || toolName.length === 0) {
      throw new JsonRpcError(-32602, 'Tool name is required');
    }

    const rawArgs = params?.['arguments'];
    const toolArgs =
      typeof rawArgs === 'object' && rawArgs !== null && !Array.isArray(rawArgs)
        ? (rawArgs as Record<string, unknown>)
        : {};

    audit(
      {
        event: 'tool.executed',
        toolName,
        sessionId: ctx.session.id,
        clientId: ctx.session.clientId,
        ip: ctx.ip,
      },
      `Tool ${toolName} executed`
    );

    try {
      const result = await this.tools.execute(toolName, toolArgs);

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: false,
      };
    } catch (err) {
      const message =
        err instanceof ZodError
          ? `Invalid arguments: ${err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
          : err instanceof Error
            ? err.message
            : String(err);

      ctx.log.warn({ err, toolName }, 'Tool execution failed');

      return {
        content: [{ type: 'text', text: JSON.stringify({ error: message }) }],
        isError: true,
      };
    }
  }
}
