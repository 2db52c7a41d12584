/**
 * OAuth 2.1 Authorization Server Routes
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { audit } from '../utils/audit.js';
import type { Config } from '../utils/config.js';
import { renderConsentPage, renderErrorPage } from '../views/consent.js';
import { ApprovalHandler } from './approval.js';
import { AuthorizationRequestHandler } from './authorization.js';
import { ClientRegistry } from './client-registry.js';
import type { CredentialStore } from './credential-store.js';
import {
  InvalidClientMetadataError,
  InvalidRequestError,
  OAuthError,
  UnsupportedGrantTypeError,
  publicDescription,
} from './errors.js';
import { TokenIssuer } from './token-issuer.js';
import {
  TOKEN_ENDPOINT_AUTH_METHODS,
  type AuthorizationServerMetadata,
  type TokenErrorResponse,
} from './types.js';

export const METADATA_PATH = '/.well-known/oauth-authorization-server';

export type OAuthRouterConfig = Pick<
  Config,
  | 'baseUrl'
  | 'nodeEnv'
  | 'oauthAccessTokenLifetimeSecs'
  | 'oauthAuthCodeLifetimeSecs'
  | 'oauthAuthRequestLifetimeSecs'
  | 'oauthDefaultScope'
  | 'oauthAllowDynamicRegistration'
  | 'oauthAllowedRedirectPatterns'
>;

const registrationSchema = z.object({
  client_name: z.string().max(200).optional(),
  redirect_uris: z.array(z.string()).min(1, 'at least one redirect_uri is required'),
  token_endpoint_auth_method: z.enum(['none', 'client_secret_post', 'client_secret_basic']).optional(),
});

/**
 * Read a single-valued string parameter. Repeated or structured values count as absent.
 */
function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parsePatterns(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
}

/**
 * Extract client credentials from request (Basic auth or body)
 */
function extractClientCredentials(req: Request): { clientId?: string; clientSecret?: string } {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Basic ')) {
    const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator < 0) {
      return {};
    }
    try {
      // RFC 6749 §2.3.1: both parts are form-urlencoded
      return {
        clientId: stringParam(decodeURIComponent(decoded.slice(0, separator))),
        clientSecret: stringParam(decodeURIComponent(decoded.slice(separator + 1))),
      };
    } catch {
      return {};
    }
  }

  return {
    clientId: stringParam(req.body?.client_id),
    clientSecret: stringParam(req.body?.client_secret),
  };
}

/**
 * Send token error response. Only the coarse code and a fixed description leave
 * the server; the granular reason is logged.
 */
function sendTokenError(req: Request, res: Response, err: OAuthError): void {
  req.log.warn({ error: err.code, reason: err.reason }, 'Token request rejected');

  const body: TokenErrorResponse = {
    error: tokenErrorCode(err),
    error_description: publicDescription(err.code),
  };

  res.status(err.status).json(body);
}

function tokenErrorCode(err: OAuthError): TokenErrorResponse['error'] {
  switch (err.code) {
    case 'invalid_client':
    case 'invalid_grant':
    case 'invalid_request':
    case 'unsupported_grant_type':
    case 'unauthorized_client':
    case 'invalid_scope':
      return err.code;
    default:
      return 'invalid_request';
  }
}

/**
 * Render an error page for failures that must not be redirected to the client.
 */
function sendErrorPage(req: Request, res: Response, err: OAuthError): void {
  req.log.warn({ error: err.code, reason: err.reason }, 'Authorization request rejected');
  res.status(err.status === 401 ? 400 : err.status).type('html').send(
    renderErrorPage({ error: err.code, description: publicDescription(err.code) })
  );
}

export function createOAuthRouter(store: CredentialStore, config: OAuthRouterConfig): Router {
  const registry = new ClientRegistry(store, {
    requireHttps: config.nodeEnv === 'production',
    allowedRedirectPatterns: parsePatterns(config.oauthAllowedRedirectPatterns),
  });
  const authorizations = new AuthorizationRequestHandler(store, {
    requestLifetimeSecs: config.oauthAuthRequestLifetimeSecs,
    defaultScope: config.oauthDefaultScope,
  });
  const approvals = new ApprovalHandler(store, {
    codeLifetimeSecs: config.oauthAuthCodeLifetimeSecs,
  });
  const tokens = new TokenIssuer(store, {
    accessTokenLifetimeSecs: config.oauthAccessTokenLifetimeSecs,
  });

  const router = Router();

  // Discovery, registration and token endpoints are called cross-origin by
  // browser-based MCP clients
  const publicCors = cors({ origin: '*', methods: ['GET', 'POST', 'OPTIONS'] });

  // ===========================================================================
  // OAuth 2.1 Server Metadata (RFC 8414)
  // ===========================================================================

  router.options(METADATA_PATH, publicCors);
  router.get(METADATA_PATH, publicCors, (_req: Request, res: Response) => {
    const metadata: AuthorizationServerMetadata = {
      issuer: config.baseUrl,
      authorization_endpoint: `${config.baseUrl}/authorize`,
      token_endpoint: `${config.baseUrl}/token`,
      registration_endpoint: config.oauthAllowDynamicRegistration
        ? `${config.baseUrl}/register`
        : undefined,
      response_types_supported: ['code'],
      response_modes_supported: ['query'],
      grant_types_supported: ['authorization_code'],
      token_endpoint_auth_methods_supported: [...TOKEN_ENDPOINT_AUTH_METHODS],
      code_challenge_methods_supported: ['S256'],
      scopes_supported: [config.oauthDefaultScope],
    };

    res.json(metadata);
  });

  // ===========================================================================
  // Dynamic Client Registration (RFC 7591)
  // ===========================================================================

  // Rate limit for client registration: 20 per hour per IP
  const dcrRateLimit = rateLimit({
    windowMs: 60 * 60 * 1000,
    max: 20,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'too_many_requests',
      error_description: 'Too many registration attempts. Try again later.',
    },
    validate: { trustProxy: false },
  });

  router.options('/register', publicCors);
  router.post('/register', publicCors, dcrRateLimit, async (req: Request, res: Response): Promise<void> => {
    if (!config.oauthAllowDynamicRegistration) {
      res.status(403).json({
        error: 'registration_not_supported',
        error_description: 'Dynamic client registration is disabled',
      });
      return;
    }

    try {
      const parsed = registrationSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidClientMetadataError(
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        );
      }

      const response = await registry.register(parsed.data);

      audit(
        {
          event: 'oauth.client_registered',
          clientId: response.client_id,
          clientName: response.client_name,
          authMethod: response.token_endpoint_auth_method,
          redirectUris: response.redirect_uris,
          ip: req.ip,
        },
        'New OAuth client registered'
      );

      res.setHeader('Cache-Control', 'no-store');
      res.status(201).json(response);
    } catch (err) {
      if (err instanceof OAuthError) {
        req.log.warn({ error: err.code, reason: err.reason }, 'Client registration rejected');
        res.status(400).json({
          error: err.code,
          error_description: err.reason,
        });
        return;
      }

      req.log.error({ err }, 'Client registration failed');
      res.status(500).json({
        error: 'server_error',
        error_description: publicDescription('server_error'),
      });
    }
  });

  // ===========================================================================
  // Authorization Endpoint (OAuth 2.1 with PKCE)
  // ===========================================================================

  router.get('/authorize', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const begun = await authorizations.beginAuthorization({
        response_type: stringParam(req.query['response_type']),
        client_id: stringParam(req.query['client_id']),
        redirect_uri: stringParam(req.query['redirect_uri']),
        scope: stringParam(req.query['scope']),
        state: stringParam(req.query['state']),
        code_challenge: stringParam(req.query['code_challenge']),
        code_challenge_method: stringParam(req.query['code_challenge_method']),
      });

      audit(
        { event: 'oauth.authorization_requested', clientId: begun.client.clientId, scope: begun.scope, ip: req.ip },
        'Authorization requested, awaiting consent'
      );

      res.type('html').send(
        renderConsentPage({
          requestId: begun.requestId,
          clientName: begun.client.clientName,
          clientId: begun.client.clientId,
          redirectUri: begun.redirectUri,
          scope: begun.scope,
        })
      );
    } catch (err) {
      if (err instanceof OAuthError) {
        sendErrorPage(req, res, err);
        return;
      }
      next(err);
    }
  });

  // ===========================================================================
  // Consent decision
  // ===========================================================================

  router.post('/approve', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const requestId = stringParam(req.body?.request_id);
      if (!requestId) {
        throw new InvalidRequestError('request_id is required');
      }

      const result = await approvals.approve(requestId, req.body?.decision);

      audit(
        {
          event: result.outcome === 'approved' ? 'oauth.consent_granted' : 'oauth.consent_denied',
          clientId: result.clientId,
          ip: req.ip,
        },
        result.outcome === 'approved' ? 'User approved authorization' : 'User denied authorization'
      );

      res.redirect(302, result.redirectTo);
    } catch (err) {
      if (err instanceof OAuthError) {
        sendErrorPage(req, res, err);
        return;
      }
      next(err);
    }
  });

  // ===========================================================================
  // Token Endpoint
  // ===========================================================================

  router.options('/token', publicCors);
  router.post('/token', publicCors, async (req: Request, res: Response): Promise<void> => {
    res.setHeader('Cache-Control', 'no-store');
    res.setHeader('Pragma', 'no-cache');

    try {
      const grantType = stringParam(req.body?.grant_type);
      if (grantType !== 'authorization_code') {
        throw new UnsupportedGrantTypeError(grantType);
      }

      const { clientId, clientSecret } = extractClientCredentials(req);
      const code = stringParam(req.body?.code);
      const redirectUri = stringParam(req.body?.redirect_uri);
      const codeVerifier = stringParam(req.body?.code_verifier);

      if (!clientId || !code || !redirectUri || !codeVerifier) {
        throw new InvalidRequestError('client_id, code, redirect_uri and code_verifier are required');
      }

      const response = await tokens.exchange({
        code,
        client_id: clientId,
        client_secret: clientSecret,
        redirect_uri: redirectUri,
        code_verifier: codeVerifier,
      });

      audit({ event: 'oauth.token_issued', clientId, scope: response.scope, ip: req.ip }, 'Access token issued');

      res.json(response);
    } catch (err) {
      if (err instanceof OAuthError) {
        sendTokenError(req, res, err);
        return;
      }

      req.log.error({ err }, 'Token exchange failed');
      res.status(500).json({
        error: 'server_error',
        error_description: publicDescription('server_error'),
      });
    }
  });

  return router;
}
