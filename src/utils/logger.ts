import pino from 'pino';
import { config } from './config.js';

// Secret patterns to redact from free-form strings
const SECRET_PATTERNS = [
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  /Basic\s+[A-Za-z0-9+/]+=*/gi,
  /access_token['":=\s]+['"]?[A-Za-z0-9\-_]+/gi,
  /client_secret['":=\s]+['"]?[A-Za-z0-9\-_]+/gi,
  /code_verifier['":=\s]+['"]?[A-Za-z0-9\-._~]+/gi,
  /([?&]code=)[A-Za-z0-9\-_]+/g,
];

// Keys whose values are never logged
const SECRET_KEYS = /token|secret|password|authorization|cookie|verifier|challenge/i;

export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of SECRET_PATTERNS) {
      result = result.replace(pattern, (_match: string, prefix?: string) =>
        typeof prefix === 'string' ? `${prefix}[REDACTED]` : '[REDACTED]'
      );
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  // Errors keep their prototype so pino's err serializer still applies
  if (obj instanceof Error) {
    return obj;
  }

  if (obj !== null && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SECRET_KEYS.test(key)) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}

const baseOptions: pino.LoggerOptions = {
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: () => ({}),
  },
  hooks: {
    logMethod(inputArgs, method) {
      const redactedArgs = inputArgs.map(redactSecrets) as Parameters<typeof method>;
      return method.apply(this, redactedArgs);
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const devOptions: pino.LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  },
};

export const logger = pino(
  config.nodeEnv === 'development' ? devOptions : baseOptions
);

// Create child logger with correlation ID
export function createRequestLogger(correlationId: string) {
  return logger.child({ correlationId });
}

export type Logger = typeof logger;
