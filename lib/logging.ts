/**
 * Structured logging for the migration engine
 *
 * Writes one JSON object per line to the console and, when configured,
 * to an append-only log file.
 */

import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
export type LogService = 'freshbooks' | 'zoho' | 'auth' | 'migration' | 'cli';

export interface LogContext {
  [key: string]: unknown;
}

export interface LoggingOptions {
  level?: LogThreshold;
  filePath?: string;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEYS = [
  'password',
  'access_token',
  'refresh_token',
  'client_secret',
  'authorization',
  'accesstoken',
  'refreshtoken',
];

function isThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Threshold named by LOG_LEVEL, if it names one
 */
export function envLogThreshold(): LogThreshold | undefined {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isThreshold(fromEnv) ? fromEnv : undefined;
}

function defaultThreshold(): LogThreshold {
  return envLogThreshold() ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
}

let threshold: LogThreshold = defaultThreshold();
let fileStream: WriteStream | null = null;

/**
 * Set the minimum level and optional file sink
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level) {
    threshold = options.level;
  }
  if (options.filePath) {
    if (fileStream) {
      fileStream.end();
    }
    mkdirSync(path.dirname(path.resolve(options.filePath)), { recursive: true });
    fileStream = createWriteStream(options.filePath, { flags: 'a', encoding: 'utf-8' });
  }
}

export function getLogThreshold(): LogThreshold {
  return threshold;
}

/**
 * Flush and close the file sink
 */
export function closeLogging(): Promise<void> {
  const stream = fileStream;
  fileStream = null;
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}

export function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Write one structured log entry
 */
export function writeLog(
  service: LogService,
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry = redactSensitiveData({
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...context,
  });
  const line = JSON.stringify(entry);

  if (fileStream) {
    fileStream.write(`${line}\n`);
  }

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Redact credential values from a log entry, recursing into objects and arrays
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactValue(value);
    }
  }

  return redacted;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'object' && value !== null) {
    return redactSensitiveData(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Generate correlation ID for request tracking
 */
export function generateCorrelationId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Logger bound to one service name
 */
export function createLogger(service: LogService): Logger {
  return {
    debug: (message, context) => writeLog(service, 'debug', message, context),
    info: (message, context) => writeLog(service, 'info', message, context),
    warn: (message, context) => writeLog(service, 'warn', message, context),
    error: (message, context) => writeLog(service, 'error', message, context),
  };
}

export function logApiRequest(
  logger: Logger,
  method: string,
  url: string,
  correlationId: string
): void {
  logger.debug('API request', { correlationId, method, url: stripQueryCredentials(url) });
}

export function logApiResponse(
  logger: Logger,
  method: string,
  url: string,
  statusCode: number,
  correlationId: string,
  durationMs: number
): void {
  logger.debug('API response', {
    correlationId,
    method,
    url: stripQueryCredentials(url),
    statusCode,
    durationMs,
  });
}

function stripQueryCredentials(url: string): string {
  return url.replace(/(refresh_token|client_secret|access_token)=[^&]*/g, '$1=[REDACTED]');
}
