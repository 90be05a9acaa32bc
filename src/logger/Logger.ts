import winston from 'winston';
import path from 'path';
import fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

// Config level names -> winston npm levels. winston has no trace, silly is its lowest.
export const LOG_LEVELS: Readonly<Record<LogLevel, string>> = Object.freeze({
  error: 'error',
  warn: 'warn',
  info: 'info',
  debug: 'debug',
  trace: 'silly',
});

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function resolveLogLevel(name: string | undefined, fallback: LogLevel = 'info'): string {
  const key = (name || '').trim().toLowerCase();
  return isLogLevel(key) ? LOG_LEVELS[key] : LOG_LEVELS[fallback];
}

const isTest = process.env.NODE_ENV === 'test';
const isProduction = process.env.NODE_ENV === 'production';

const logger = winston.createLogger({
  level: resolveLogLevel(process.env.LOG_LEVEL, 'debug'),
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'tidy-agent' },
});

if (!isProduction && !isTest) {
  logger.add(
    new winston.transports.Console({
      level: resolveLogLevel(process.env.LOG_TERM_LEVEL, 'debug'),
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    })
  );
}

export interface FileTransportOptions {
  dir: string;
  fileLevel: string;
  termLevel: string;
}

/**
 * Attaches the rotating file transport and applies the configured levels.
 * Called once by the daemon after configuration is loaded.
 */
export function configureLogger(options: FileTransportOptions): void {
  if (isTest) return;

  if (!fs.existsSync(options.dir)) {
    fs.mkdirSync(options.dir, { recursive: true });
  }

  const fileLevel = resolveLogLevel(options.fileLevel, 'warn');
  const termLevel = resolveLogLevel(options.termLevel, 'info');

  logger.add(
    new winston.transports.File({
      filename: process.env.LOG_FILE || path.join(options.dir, 'agent.log'),
      level: fileLevel,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  for (const transport of logger.transports) {
    if (transport instanceof winston.transports.Console) {
      transport.level = termLevel;
    }
  }

  // The logger itself must let through the most verbose of the two transports.
  const levels = winston.config.npm.levels;
  logger.level = levels[fileLevel] >= levels[termLevel] ? fileLevel : termLevel;
}

export default logger;
