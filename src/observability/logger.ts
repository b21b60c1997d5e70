import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';

const DEFAULT_REDACT_PATHS = [
  'password',
  'passwordHash',
  'password_hash',
  'passphrase',
  'adminPassphrase',
  'secret',
  '*.password',
  '*.passwordHash',
  '*.password_hash',
  '*.passphrase',
  '*.adminPassphrase',
  '*.secret',
  'params[*].password',
];

const SENSITIVE_PATTERNS = [
  { pattern: /\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}/g, replacement: '[REDACTED_DIGEST]' },
];

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  prettyPrint?: boolean;
  redactPaths?: string[];
  serviceName?: string;
  version?: string;
  /** Write to this stream instead of stdout; ignored with prettyPrint */
  destination?: DestinationStream;
}

function redactSensitiveStrings(value: unknown): unknown {
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
    serviceName = 'recipe-store',
    version = '1.0.0',
    destination,
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
      log: (obj: Record<string, unknown>) => redactSensitiveStrings(obj) as Record<string, unknown>,
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

  return destination ? pino(options, destination) : pino(options);
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export function initLogger(config: LoggerConfig): Logger {
  loggerInstance = createLogger(config);
  return loggerInstance;
}
