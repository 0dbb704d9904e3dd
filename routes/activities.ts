// routes/activities.ts
import { Router } from 'express';
import type { Request, Response } from 'express';
import { logger } from '../utils/logger';
import { detailFor, httpStatusFor, isRegistryError } from '../utils/errors';
import type { ActivityRegistry } from '../services/activity-registry';

type Mutation = 'signup' | 'unregister';

function readEmail(req: Request): string | null {
  const email = req.query.email;
  return typeof email === 'string' && email !== '' ? email : null;
}

function sendFailure(res: Response, error: unknown, route: string): void {
  if (isRegistryError(error)) {
    res.status(httpStatusFor(error.kind)).json({ detail: detailFor(error.kind) });
    return;
  }
  logger.error(`Error in ${route} endpoint:`, error);
  res.status(500).json({ detail: 'Internal server error' });
}

export function createActivitiesRouter(registry: ActivityRegistry): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(registry.listActivities());
  });

  const mutate = (action: Mutation) => async (req: Request, res: Response) => {
    const activityName = req.params.name;
    const email = readEmail(req);
    const route = `/activities/:name/${action}`;

    if (!email) {
      res.status(422).json({ detail: 'Missing required query parameter: email' });
      return;
    }

    try {
      if (action === 'signup') {
        await registry.signup(activityName, email);
        logger.info(`Signed up ${email} for ${activityName}.`);
        res.json({ message: `Signed up ${email} for ${activityName}` });
      } else {
        await registry.unregister(activityName, email);
        logger.info(`Unregistered ${email} from ${activityName}.`);
        res.json({ message: `Unregistered ${email} from ${activityName}` });
      }
    } catch (error) {
      sendFailure(res, error, route);
    }
  };

  router.post('/:name/signup', mutate('signup'));
  router.delete('/:name/unregister', mutate('unregister'));

  return router;
}
