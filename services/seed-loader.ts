// services/seed-loader.ts
import { readFile } from 'fs/promises';
import { logger } from '../utils/logger';
import { SeedError } from '../utils/errors';

import type { Activity, ActivityMap } from '../models/activity';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseActivity(name: string, raw: unknown): Activity {
  if (!isPlainObject(raw)) {
    throw new SeedError(`Activity "${name}" must be an object.`);
  }
  const { description, schedule, max_participants, participants } = raw;

  if (typeof description !== 'string') {
    throw new SeedError(`Activity "${name}": description must be a string.`);
  }
  if (typeof schedule !== 'string') {
    throw new SeedError(`Activity "${name}": schedule must be a string.`);
  }
  if (typeof max_participants !== 'number' || !Number.isInteger(max_participants) || max_participants < 1) {
    throw new SeedError(`Activity "${name}": max_participants must be a positive integer.`);
  }
  if (!Array.isArray(participants)) {
    throw new SeedError(`Activity "${name}": participants must be an array of strings.`);
  }

  const unique: string[] = [];
  for (const entry of participants) {
    if (typeof entry !== 'string') {
      throw new SeedError(`Activity "${name}": participants must be an array of strings.`);
    }
    if (unique.includes(entry)) {
      logger.warn(`Seed: dropping duplicate participant ${entry} in "${name}".`);
      continue;
    }
    unique.push(entry);
  }

  return { description, schedule, max_participants, participants: unique };
}

/**
 * Validates decoded fixture JSON into an ActivityMap.
 */
export function parseSeed(raw: unknown): ActivityMap {
  if (!isPlainObject(raw)) {
    throw new SeedError('Seed data must be an object keyed by activity name.');
  }
  // fromEntries defines own properties, so a "__proto__" key stays an activity
  return Object.fromEntries(
    Object.entries(raw).map(([name, value]): [string, Activity] => [name, parseActivity(name, value)])
  );
}

export async function loadSeedFile(path: string): Promise<ActivityMap> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SeedError(`Could not read seed file ${path}.`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SeedError(`Seed file ${path} is not valid JSON.`, { cause: error });
  }

  const activities = parseSeed(raw);
  logger.info(`Loaded ${Object.keys(activities).length} activities from ${path}.`);
  return activities;
}
