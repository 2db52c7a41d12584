import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .string()
  .transform((val) => val === 'true' || val === '1')
  .pipe(z.boolean())
  .or(z.boolean());

const configSchema = z.object({
  // Server
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  baseUrl: z.string().url().optional(),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting
  rateLimitWindowMs: z.coerce.number().int().positive().default(60000),
  rateLimitMaxRequests: z.coerce.number().int().positive().default(100),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Skips the bearer gate in front of /mcp. Development only.
  mcpAuthDisabled: booleanFlag.default(false),
  mcpSessionIdleSecs: z.coerce.number().int().positive().default(3600),

  // OAuth authorization server
  oauthAccessTokenLifetimeSecs: z.coerce.number().int().positive().default(3600), // 1 hour
  oauthAuthCodeLifetimeSecs: z.coerce.number().int().positive().default(60), // 1 minute
  oauthAuthRequestLifetimeSecs: z.coerce.number().int().positive().default(600), // 10 minutes
  oauthStoreCompactionIntervalSecs: z.coerce.number().int().min(0).default(300),
  oauthDefaultScope: z.string().min(1).default('mcp:tools'),
  oauthAllowDynamicRegistration: booleanFlag.default(true),
  oauthAllowedRedirectPatterns: z.string().optional(), // Comma-separated URL patterns

  // Tool backend
  bashTimeoutMs: z.coerce.number().int().positive().default(30000),
  bashMaxOutputBytes: z.coerce.number().int().positive().default(1024 * 1024),
})
  .superRefine((data, ctx) => {
    if (data.nodeEnv === 'production') {
      if (data.mcpAuthDisabled) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['mcpAuthDisabled'],
          message: 'MCP_AUTH_DISABLED cannot be enabled in production',
        });
      }
      if (data.baseUrl && !data.baseUrl.startsWith('https://')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['baseUrl'],
          message: 'MCP_SERVER_BASE_URL must use HTTPS in production',
        });
      }
    }
  })
  .transform((data) => ({
    ...data,
    baseUrl: (data.baseUrl ?? `http://${data.host}:${data.port}`).replace(/\/+$/, ''),
  }));

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    host: env['HOST'],
    port: env['PORT'],
    baseUrl: env['MCP_SERVER_BASE_URL'],
    nodeEnv: env['NODE_ENV'],
    rateLimitWindowMs: env['RATE_LIMIT_WINDOW_MS'],
    rateLimitMaxRequests: env['RATE_LIMIT_MAX_REQUESTS'],
    logLevel: env['LOG_LEVEL'],
    mcpAuthDisabled: env['MCP_AUTH_DISABLED'],
    mcpSessionIdleSecs: env['MCP_SESSION_IDLE_SECS'],
    oauthAccessTokenLifetimeSecs: env['OAUTH_ACCESS_TOKEN_LIFETIME_SECS'],
    oauthAuthCodeLifetimeSecs: env['OAUTH_AUTH_CODE_LIFETIME_SECS'],
    oauthAuthRequestLifetimeSecs: env['OAUTH_AUTH_REQUEST_LIFETIME_SECS'],
    oauthStoreCompactionIntervalSecs: env['OAUTH_STORE_COMPACTION_INTERVAL_SECS'],
    oauthDefaultScope: env['OAUTH_DEFAULT_SCOPE'],
    oauthAllowDynamicRegistration: env['OAUTH_ALLOW_DYNAMIC_REGISTRATION'],
    oauthAllowedRedirectPatterns: env['OAUTH_ALLOWED_REDIRECT_PATTERNS'],
    bashTimeoutMs: env['BASH_TIMEOUT_MS'],
    bashMaxOutputBytes: env['BASH_MAX_OUTPUT_BYTES'],
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export const config = loadConfig();
