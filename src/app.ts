import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from './utils/config.js';
import { logger, createRequestLogger, type Logger } from './utils/logger.js';
import type { CredentialStore } from './oauth/credential-store.js';
import { requireBearerAuth } from './oauth/middleware.js';
import { METADATA_PATH, createOAuthRouter } from './oauth/routes.js';
import { McpRequestHandler, SERVER_INFO } from './mcp/handler.js';
import { createMcpRouter } from './mcp/routes.js';
import { McpSessionManager } from './mcp/session.js';
import { ToolExecutor, type CommandRunner } from './tools/index.js';
import { renderHomePage } from './views/home.js';

// =============================================================================
// Type augmentation
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
    }
  }
}

export interface AppDependencies {
  config: Config;
  store: CredentialStore;
  /** Replaces the bash runner, for tests */
  runner?: CommandRunner;
}

export interface AppInstance {
  app: Express;
  sessions: McpSessionManager;
}

const SENSITIVE_PATHS = ['/authorize', '/approve', '/token', '/register', '/mcp'];

export function createApp(deps: AppDependencies): AppInstance {
  const { config, store, runner } = deps;
  const app = express();

  // Trust proxy - required when running behind a reverse proxy
  // so rate limiting sees the client IP
  app.set('trust proxy', true);

  // ===========================================================================
  // Middleware
  // ===========================================================================

  // Security headers
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          // Consent and error pages carry their styles inline
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:'],
          connectSrc: ["'self'"],
          frameAncestors: ["'none'"],
          // The consent form's 302 goes to the client's redirect URI
          formAction: null,
        },
      },
      hsts: config.nodeEnv === 'production',
    })
  );

  // Permissions-Policy header (not built into Helmet v8)
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');
    next();
  });

  // Cache-Control for sensitive endpoints
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (SENSITIVE_PATHS.some((p) => req.path.startsWith(p))) {
      res.setHeader('Cache-Control', 'no-store');
      res.setHeader('Pragma', 'no-cache');
    }
    next();
  });

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    req.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    req.log = createRequestLogger(correlationId);
    next();
  });

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    req.log.info({ method: req.method, path: req.path }, 'Request received');

    res.on('finish', () => {
      req.log.info(
        { method: req.method, path: req.path, statusCode: res.statusCode, durationMs: Date.now() - startedAt },
        'Response sent'
      );
    });

    next();
  });

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    max: config.rateLimitMaxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
    validate: { trustProxy: false },
  });
  app.use(limiter);

  // Body parsing
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false })); // Token and consent forms

  // ===========================================================================
  // Landing page and health check
  // ===========================================================================

  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(renderHomePage(config.baseUrl));
  });

  app.get('/health', async (_req: Request, res: Response) => {
    const stats = await store.stats();

    res.json({
      status: 'healthy',
      version: SERVER_INFO.version,
      uptime: Math.floor(process.uptime()),
      store: stats,
    });
  });

  // ===========================================================================
  // OAuth 2.1 Authorization Server
  // ===========================================================================

  // Mount OAuth routes (/.well-known/*, /register, /authorize, /approve, /token)
  app.use(createOAuthRouter(store, config));

  // ===========================================================================
  // MCP endpoint
  // ===========================================================================

  app.use(
    '/mcp',
    cors({
      origin: config.nodeEnv === 'production' ? config.baseUrl : true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'MCP-Protocol-Version', 'Accept'],
      exposedHeaders: ['Mcp-Session-Id', 'WWW-Authenticate'],
    })
  );

  if (config.mcpAuthDisabled) {
    logger.warn('MCP_AUTH_DISABLED is set - /mcp accepts requests without a bearer token');
  }

  const sessions = new McpSessionManager(config.mcpSessionIdleSecs);
  const tools = new ToolExecutor(
    { defaultTimeoutMs: config.bashTimeoutMs, maxOutputBytes: config.bashMaxOutputBytes },
    runner
  );

  app.use(
    createMcpRouter({
      sessions,
      handler: new McpRequestHandler(tools),
      gate: config.mcpAuthDisabled
        ? undefined
        : requireBearerAuth(store, { metadataUrl: `${config.baseUrl}${METADATA_PATH}` }),
    })
  );

  // ===========================================================================
  // Error handling
  // ===========================================================================

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({
        jsonrpc: '2.0',
        error: { code: -32700, message: 'Parse error' },
        id: null,
      });
      return;
    }

    req.log.error({ err }, 'Unhandled error');

    res.status(500).json({
      error: 'Internal server error',
      correlationId: req.correlationId,
    });
  });

  return { app, sessions };
}
