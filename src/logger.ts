/**
 * Structured logging with winston.
 * Console output for interactive use, optional JSON file when LOG_FILE is set.
 */

import winston from 'winston';
import { config } from './config';

const { format, transports } = winston;

export interface LogMeta {
  [key: string]: unknown;
}

function toMeta(metaOrString?: LogMeta | string): LogMeta {
  if (typeof metaOrString === 'string') {
    return { detail: metaOrString };
  }
  return metaOrString ?? {};
}

const consoleFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
});

const logger = winston.createLogger({
  level: config.logLevel,
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
  ),
  transports: [
    // stderr keeps `ls --json` output clean
    new transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: consoleFormat,
    }),
  ],
});

if (config.logFile) {
  logger.add(new transports.File({
    filename: config.logFile,
    format: format.json(),
    maxsize: 5 * 1024 * 1024,
    maxFiles: 3,
  }));
}

/** Persisted `loggingEnabled` switches between verbose and errors-only. */
export function setLoggingEnabled(enabled: boolean): void {
  logger.level = enabled ? config.logLevel : 'error';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const log = {
  debug: (msg: string, meta: LogMeta | string = {}): void => { logger.debug(msg, toMeta(meta)); },
  info: (msg: string, meta: LogMeta | string = {}): void => { logger.info(msg, toMeta(meta)); },
  warn: (msg: string, meta: LogMeta | string = {}): void => { logger.warn(msg, toMeta(meta)); },
  error: (msg: string, meta: LogMeta | string = {}): void => { logger.error(msg, toMeta(meta)); },

  // Probes run constantly during scans, keep them at debug
  port: (action: string, meta: LogMeta | string = {}): void => { logger.debug(`[Port] ${action}`, toMeta(meta)); },
  process: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[Process] ${action}`, toMeta(meta)); },
  profile: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[Profile] ${action}`, toMeta(meta)); },
  state: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[State] ${action}`, toMeta(meta)); },
  autoConnect: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[AutoConnect] ${action}`, toMeta(meta)); },
  health: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[HealthCheck] ${action}`, toMeta(meta)); },
  api: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[API] ${action}`, toMeta(meta)); },
};

export { logger, log };
