/**
 * OAuth 2.1 Bearer Token Middleware
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { audit } from '../utils/audit.js';
import type { CredentialStore } from './credential-store.js';
import { validateBearerToken, type TokenContext } from './token-validator.js';

/**
 * Extended request with OAuth info
 */
declare global {
  namespace Express {
    interface Request {
      oauth?: TokenContext;
    }
  }
}

export interface BearerAuthOptions {
  /** Discovery document advertised in WWW-Authenticate */
  metadataUrl: string;
}

/**
 * Build WWW-Authenticate header value pointing to our OAuth metadata.
 * Required by RFC 6750 and MCP authorization discovery so clients can discover the authorization server.
 */
export function wwwAuthenticateHeader(metadataUrl: string): string {
  return `Bearer resource_metadata="${metadataUrl}"`;
}

/**
 * Require Bearer token authentication
 *
 * Rejects with 401 unless the request carries a live access token. On success sets
 * req.oauth to the token's client and scope and passes the request on unmodified.
 */
export function requireBearerAuth(store: CredentialStore, options: BearerAuthOptions): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const decision = await validateBearerToken(store, req.headers.authorization);

      if (!decision.admitted) {
        audit(
          { event: 'oauth.token_rejected', ip: req.ip, hadCredential: Boolean(req.headers.authorization) },
          'Protected request rejected'
        );
        res.setHeader('WWW-Authenticate', wwwAuthenticateHeader(options.metadataUrl));
        res.status(401).json({
          error: 'invalid_token',
          error_description: 'Bearer token is missing, invalid or expired',
        });
        return;
      }

      req.oauth = decision.context;

      req.log.debug({ clientId: decision.context.clientId }, 'Bearer token authenticated');

      next();
    } catch (err) {
      next(err);
    }
  };
}
