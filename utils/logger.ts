// ./utils/logger.ts
import { config } from 'dotenv';
config(); // Ensure .env variables are loaded

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
let currentLevel = isLogLevel(envLevel) ? levels[envLevel] : levels.info;

/**
 * Changes the active level at runtime. Messages above it are dropped.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = levels[level];
}

const log = (level: LogLevel, ...args: unknown[]): void => {
  if (levels[level] <= currentLevel) {
    const timestamp = new Date().toISOString();
    console[level](`[${timestamp}] [${level.toUpperCase()}]`, ...args);
  }
};

export const logger: Logger = {
  error: (...args: unknown[]) => log('error', ...args),
  warn: (...args: unknown[]) => log('warn', ...args),
  info: (...args: unknown[]) => log('info', ...args),
  debug: (...args: unknown[]) => log('debug', ...args),
};

export default logger;
