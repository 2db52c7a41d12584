#!/usr/bin/env node

import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { MemoryCredentialStore, startCompaction } from './oauth/credential-store.js';
import { METADATA_PATH } from './oauth/routes.js';

// Startup checks
function runStartupChecks(): void {
  logger.info('Running startup checks...');

  if (config.nodeEnv === 'production' && config.mcpAuthDisabled) {
    // Config validation rejects this already, but double-check
    throw new Error('MCP_AUTH_DISABLED cannot be enabled in production');
  }

  if (config.mcpAuthDisabled) {
    logger.warn('Bearer authentication on /mcp is disabled - do not expose this server');
  }

  logger.warn('Using in-memory credential storage - registrations and tokens are lost on restart');

  logger.info('Startup checks passed');
}

// Start server
async function start(): Promise<void> {
  runStartupChecks();

  const store = new MemoryCredentialStore();
  const { app, sessions } = createApp({ config, store });
  const stopCompaction = startCompaction(store, config.oauthStoreCompactionIntervalSecs, sessions);

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      {
        host: config.host,
        port: config.port,
        baseUrl: config.baseUrl,
        nodeEnv: config.nodeEnv,
      },
      'bash-mcp-oauth-server started'
    );
    logger.info(`MCP endpoint: ${config.baseUrl}/mcp`);
    logger.info(`OAuth 2.1 metadata: ${config.baseUrl}${METADATA_PATH}`);
    logger.info(`Dynamic registration: ${config.oauthAllowDynamicRegistration ? 'enabled' : 'disabled'}`);
  });

  server.on('error', (err) => {
    logger.fatal({ err }, 'Server error');
    process.exit(1);
  });

  // Graceful shutdown
  const SHUTDOWN_TIMEOUT_MS = 30000;
  let shuttingDown = false;

  function gracefulShutdown(signal: string): void {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing gracefully');

    // Force exit after timeout
    const forceTimer = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    stopCompaction();
    server.close(() => {
      logger.info('Server closed');
      clearTimeout(forceTimer);
      process.exit(0);
    });
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
