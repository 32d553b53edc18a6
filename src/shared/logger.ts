import winston from 'winston';
import { defaultLogLevel } from './defaults.js';
import { isDev } from './env.js';

const { combine, timestamp, label, colorize, printf } = winston.format;

// Concise format for development
const devFormat = printf(({ level, message, timestamp: ts, ...metadata }) => {
  const formattedTime = new Date(String(ts)).toLocaleTimeString('en-US', { hour12: false });
  const meta = Object.keys(metadata).length ? ` ${JSON.stringify(metadata)}` : '';
  return `${formattedTime} ${level}: ${message}${meta}`;
});

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

// Single line per event for production, preview fields first
const prodFormat = printf(({ level, message, timestamp: ts, label: lbl, ...metadata }) => {
  const { previewId, reason, ...rest } = metadata;

  const parts: string[] = [];
  if (previewId) parts.push(`pid=${String(previewId).slice(0, 8)}`);
  if (reason) parts.push(`reason=${String(reason)}`);

  const restKeys = Object.keys(rest);
  if (restKeys.length > 0) {
    parts.push(restKeys.map((k) => `${k}=${formatValue(rest[k])}`).join(' '));
  }

  const meta = parts.length ? ` [${parts.join(' | ')}]` : '';
  return `${String(ts)} [${String(lbl)}] ${level.toUpperCase().padEnd(5)} ${message}${meta}`;
});

const dev = combine(colorize(), timestamp(), devFormat);

const prod = combine(label({ label: 'lapse' }), timestamp(), prodFormat);

function createLogger(level: string): winston.Logger {
  return winston.createLogger({
    format: isDev ? dev : prod,
    transports: [
      new winston.transports.Console({
        level,
        handleExceptions: true,
      }),
    ],
  });
}

const globalLogger = createLogger(defaultLogLevel);

/**
 * Change the level in place so loggers captured at module load follow it.
 */
export function setLevel(level: string): void {
  globalLogger.level = level;
  globalLogger.transports.forEach((transport) => {
    // eslint-disable-next-line no-param-reassign
    transport.level = level;
  });
}

export function logger(): winston.Logger {
  return globalLogger;
}
