import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Logs to console in development, file + console in production
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /Bearer\s+([A-Za-z0-9\-._~+/]+=*)/g,
];

const SECRET_KEYS = new Set([
  'password',
  'apiKey',
  'token',
  'secret',
  'accessToken',
  'refreshToken',
  'clientSecret',
  'credentialData',
  'authorization',
]);

/**
 * Redacts sensitive information from log messages and metadata
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    let redacted = value;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    });
    return redacted;
  }

  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }

  if (value instanceof Error) {
    return { name: value.name, message: redactSecrets(value.message), stack: value.stack };
  }

  if (value && typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SECRET_KEYS.has(key) ? '***REDACTED***' : redactSecrets(entry);
    }
    return redacted;
  }

  return value;
}

const redactFormat = winston.format((info) => {
  info.message = redactSecrets(info.message);
  for (const key of Object.keys(info)) {
    if (key !== 'level' && key !== 'message') {
      info[key] = SECRET_KEYS.has(key) ? '***REDACTED***' : redactSecrets(info[key]);
    }
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    silent: env.NODE_ENV === 'test',
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance, replaced by the entry points once env is validated
 */
export let logger: winston.Logger = createLogger({
  NODE_ENV: process.env.NODE_ENV === 'test' ? 'test' : 'development',
  LOG_LEVEL: 'info',
  LOG_FILE: undefined,
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
