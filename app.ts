// app.ts
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createActivitiesRouter } from './routes/activities';
import { logger } from './utils/logger';
import { clientErrorStatus } from './utils/errors';
import type { ActivityRegistry } from './services/activity-registry';

export const LANDING_PAGE_PATH = '/static/index.html';

export interface AppOptions {
  allowedOrigins?: string;
  staticDir?: string;
}

type CorsOptions = {
  origin: string | ((origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => void);
};

function buildCorsOptions(allowedOrigins: string): CorsOptions {
  if (allowedOrigins === '*') {
    return { origin: '*' };
  }
  const originsArray = allowedOrigins.split(',').map(origin => origin.trim());
  return {
    origin: function (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
      if (!origin || originsArray.includes(origin) || originsArray.includes('*')) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    }
  };
}

export function createApp(registry: ActivityRegistry, options: AppOptions = {}): express.Express {
  const app = express();
  app.use(cors(buildCorsOptions(options.allowedOrigins ?? '*')));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.redirect(307, LANDING_PAGE_PATH);
  });

  if (options.staticDir) {
    app.use('/static', express.static(options.staticDir));
  }

  app.use('/activities', createActivitiesRouter(registry));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      const detail = err instanceof Error ? err.message : 'Bad request';
      logger.warn(`Rejected ${req.method} ${req.path} with ${status}: ${detail}`);
      res.status(status).json({ detail });
      return;
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}:`, err);
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}
