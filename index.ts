// index.ts
import type { Server } from 'http';
import { createApp } from './app';
import { ActivityRegistry } from './services/activity-registry';
import { loadSeedFile } from './services/seed-loader';
import { loadConfig } from './utils/config';
import { logger, setLogLevel } from './utils/logger';

async function startServer(): Promise<Server> {
  const appConfig = loadConfig();
  setLogLevel(appConfig.logLevel);

  const seed = await loadSeedFile(appConfig.seedFile);
  const registry = new ActivityRegistry(seed);
  const app = createApp(registry, {
    allowedOrigins: appConfig.allowedOrigins,
    staticDir: appConfig.staticDir,
  });

  const server = app.listen(appConfig.port, () => {
    logger.info(`Server is running on http://localhost:${appConfig.port}`);
    logger.info(`Serving ${registry.size} activities.`);
    logger.info(`Allowed CORS origins: ${appConfig.allowedOrigins === '*' ? 'All (*)' : appConfig.allowedOrigins}`);
  });
  server.on('error', onServerError(appConfig.port));
  return server;
}

/**
 * Listener for listen-time failures such as EADDRINUSE: log and exit(1) like any other startup error.
 */
export function onServerError(
  port: number,
  exit: (code: number) => void = code => process.exit(code)
): (error: NodeJS.ErrnoException) => void {
  return error => {
    logger.error(`Server error on port ${port}${error.code ? ` (${error.code})` : ''}:`, error);
    exit(1);
  };
}

function shutdown(server: Server, signal: NodeJS.Signals): void {
  logger.info(`Server shutting down (${signal})...`);
  server.close(error => {
    if (error) {
      logger.error('Error while closing the server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

// Start the server if not in test mode
if (process.env.NODE_ENV !== 'test') {
  startServer()
    .then(server => {
      process.on('SIGINT', () => shutdown(server, 'SIGINT'));
      process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
    })
    .catch(error => {
      logger.error('Critical error during server startup. Server not started.', error);
      process.exit(1);
    });
}
