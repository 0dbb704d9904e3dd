// services/activity-registry.ts
import pLimit from 'p-limit';
import { logger } from '../utils/logger';
import {
  ActivityNotFoundError,
  AlreadySignedUpError,
  NotSignedUpError
} from '../utils/errors';

import type { Activity, ActivityMap } from '../models/activity';

function cloneActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

/**
 * In-memory store of activities keyed by name.
 *
 * Reads return copies. Signup and unregister are funnelled through a single-slot
 * queue so every check-then-mutate step runs alone against the whole registry.
 */
export class ActivityRegistry {
  private readonly activities = new Map<string, Activity>();
  private readonly writeQueue = pLimit(1);

  constructor(seed: ActivityMap = {}) {
    for (const [name, activity] of Object.entries(seed)) {
      this.activities.set(name, cloneActivity(activity));
    }
  }

  get size(): number {
    return this.activities.size;
  }

  /**
   * Snapshot of every activity with its current participants.
   */
  listActivities(): ActivityMap {
    return Object.fromEntries(
      Array.from(this.activities, ([name, activity]): [string, Activity] => [name, cloneActivity(activity)])
    );
  }

  getActivity(name: string): Activity {
    const activity = this.activities.get(name);
    if (!activity) {
      throw new ActivityNotFoundError(name);
    }
    return cloneActivity(activity);
  }

  /**
   * Appends `email` to the activity's participants.
   * @throws ActivityNotFoundError when no activity has this name
   * @throws AlreadySignedUpError when the exact email is already listed
   */
  signup(name: string, email: string): Promise<void> {
    return this.writeQueue(() => {
      const activity = this.activities.get(name);
      if (!activity) {
        throw new ActivityNotFoundError(name, email);
      }
      if (activity.participants.includes(email)) {
        throw new AlreadySignedUpError(name, email);
      }
      activity.participants.push(email);
      logger.debug(`Registry: ${email} added to "${name}" (${activity.participants.length}/${activity.max_participants}).`);
    });
  }

  /**
   * Removes the single matching entry; the remaining participants keep their order.
   * @throws ActivityNotFoundError when no activity has this name
   * @throws NotSignedUpError when the email is not listed
   */
  unregister(name: string, email: string): Promise<void> {
    return this.writeQueue(() => {
      const activity = this.activities.get(name);
      if (!activity) {
        throw new ActivityNotFoundError(name, email);
      }
      const index = activity.participants.indexOf(email);
      if (index === -1) {
        throw new NotSignedUpError(name, email);
      }
      activity.participants.splice(index, 1);
      logger.debug(`Registry: ${email} removed from "${name}".`);
    });
  }
}
