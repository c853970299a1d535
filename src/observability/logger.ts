import pino, { type Logger, type LoggerOptions } from 'pino';

const DEFAULT_REDACT_PATHS = [
  'password',
  'token',
  'accessToken',
  'refreshToken',
  'secret',
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'credential',
  'credentials',
  'privateKey',
  'private_key',
  'publicKey',
  '*.password',
  '*.token',
  '*.secret',
  '*.apiKey',
  '*.authorization',
  '*.privateKey',
  'headers.authorization',
  'headers.cookie',
  'headers["x-api-key"]',
];

const SENSITIVE_PATTERNS = [
  { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[REDACTED_JWT]' },
  { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /:\/\/[^:/\s]+:[^@/\s]+@/g, replacement: '://[REDACTED]@' },
];

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  prettyPrint?: boolean;
  redactPaths?: string[];
  serviceName?: string;
  version?: string;
}

export function redactSensitiveStrings(value: unknown): unknown {
  if (typeof value === 'string') {
    let result = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  if (Array.isArray(value)) {
    return value.map(redactSensitiveStrings);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = redactSensitiveStrings(val);
    }
    return result;
  }

  return value;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = 'info',
    prettyPrint = false,
    redactPaths = [],
    serviceName = 'skills-arena',
    version = '0.1.0',
  } = config;

  const allRedactPaths = [...DEFAULT_REDACT_PATHS, ...redactPaths];

  const options: LoggerOptions = {
    level,
    name: serviceName,
    redact: {
      paths: allRedactPaths,
      censor: '[REDACTED]',
    },
    base: {
      service: serviceName,
      version,
      pid: process.pid,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
      log: (obj: Record<string, unknown>) => {
        const redacted: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(obj)) {
          redacted[key] = redactSensitiveStrings(val);
        }
        return redacted;
      },
    },
  };

  if (prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

let loggerInstance: Logger | null = null;
const moduleLoggers = new Map<string, Logger>();

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger({ level: readLevelFromEnv() });
  }
  return loggerInstance;
}

/**
 * Child logger bound to a module name. Children are rebuilt after
 * {@link initLogger} replaces the root logger.
 */
export function getModuleLogger(module: string): Logger {
  let child = moduleLoggers.get(module);
  if (!child) {
    child = getLogger().child({ module });
    moduleLoggers.set(module, child);
  }
  return child;
}

export function initLogger(config: LoggerConfig): Logger {
  loggerInstance = createLogger(config);
  moduleLoggers.clear();
  return loggerInstance;
}

function readLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
    case 'silent':
      return level;
    default:
      return 'info';
  }
}
