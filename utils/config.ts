// utils/config.ts
import { config } from 'dotenv';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { isLogLevel, logger } from './logger';

import type { LogLevel } from './logger';

config();

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const DEFAULT_PORT = 8000;

export interface AppConfig {
  port: number;
  allowedOrigins: string;
  seedFile: string;
  staticDir: string;
  logLevel: LogLevel;
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_PORT;
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    logger.warn(`Invalid PORT "${value}", falling back to ${DEFAULT_PORT}.`);
    return DEFAULT_PORT;
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    port: parsePort(env.PORT),
    allowedOrigins: env.ALLOWED_ORIGINS || '*',
    seedFile: resolve(PROJECT_ROOT, env.ACTIVITIES_SEED_FILE || 'data/activities.json'),
    staticDir: resolve(PROJECT_ROOT, env.STATIC_DIR || 'static'),
    logLevel: isLogLevel(level) ? level : 'info',
  };
}
