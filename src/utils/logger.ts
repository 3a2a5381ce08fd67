/**
 * Logging utility (winston)
 * Structured console logging with secret redaction
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

const REDACTED = '[REDACTED]';

const SECRET_KEYS = new Set(['apikey', 'authorization', 'x-api-key-secret', 'keysecret']);

/**
 * Replace secret-bearing values anywhere in a metadata object
 */
export function redactSecrets(value: unknown, depth: number = 0): unknown {
  if (depth > 8 || value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => redactSecrets(entry, depth + 1));
  }

  if (value instanceof Error || value instanceof Date) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactSecrets(entry, depth + 1);
  }
  return result;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SECRET_KEYS.has(key.toLowerCase())) {
      info[key] = REDACTED;
    } else {
      info[key] = redactSecrets(info[key]);
    }
  }
  return info;
});

const consoleFormat = winston.format.printf((info) => {
  const { timestamp, level, message, ...meta } = info;
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
});

function resolveLevel(debug: boolean): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv === 'error' || fromEnv === 'warn' || fromEnv === 'info' || fromEnv === 'debug') {
    return fromEnv;
  }
  return debug ? 'debug' : 'info';
}

/**
 * Create a winston-backed logger writing to stderr
 */
export function createLogger(debug: boolean = false): winston.Logger {
  return winston.createLogger({
    level: resolveLevel(debug),
    format: winston.format.combine(
      redactFormat(),
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(winston.format.colorize(), consoleFormat),
      }),
    ],
  });
}

let instance: winston.Logger | null = null;

/**
 * Initialize the shared logger
 */
export function initLogger(debug: boolean = false): Logger {
  instance = createLogger(debug);
  return instance;
}

/**
 * Get the shared logger, creating it with defaults on first use
 */
export function getLogger(): Logger {
  if (!instance) {
    instance = createLogger(false);
  }
  return instance;
}
