import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadSeedFile, parseSeed } from './seed-loader';
import { SeedError } from '../utils/errors';

const validActivity = {
  description: 'Learn strategies',
  schedule: 'Fridays',
  max_participants: 12,
  participants: ['a@e.edu'],
};

describe('parseSeed', () => {
  it('accepts a well-formed map', () => {
    expect(parseSeed({ 'Chess Club': validActivity })).toEqual({ 'Chess Club': validActivity });
  });

  it('accepts an empty map', () => {
    expect(parseSeed({})).toEqual({});
  });

  it('rejects a non-object root', () => {
    expect(() => parseSeed([validActivity])).toThrow(SeedError);
    expect(() => parseSeed(null)).toThrow('Seed data must be an object keyed by activity name.');
  });

  it('names the activity and field on a bad capacity', () => {
    expect(() => parseSeed({ Chess: { ...validActivity, max_participants: 0 } })).toThrow(
      'Activity "Chess": max_participants must be a positive integer.'
    );
    expect(() => parseSeed({ Chess: { ...validActivity, max_participants: 2.5 } })).toThrow(SeedError);
  });

  it('rejects non-string participants', () => {
    expect(() => parseSeed({ Chess: { ...validActivity, participants: ['a@e.edu', 7] } })).toThrow(
      'Activity "Chess": participants must be an array of strings.'
    );
  });

  it('rejects a missing description', () => {
    const { description: _omitted, ...rest } = validActivity;
    expect(() => parseSeed({ Chess: rest })).toThrow('Activity "Chess": description must be a string.');
  });

  it('drops duplicate participants, keeping the first occurrence', () => {
    const parsed = parseSeed({
      Chess: { ...validActivity, participants: ['a@e.edu', 'b@e.edu', 'a@e.edu'] },
    });
    expect(parsed.Chess.participants).toEqual(['a@e.edu', 'b@e.edu']);
  });

  it('keeps an activity named __proto__ as an own entry', () => {
    const parsed = parseSeed(JSON.parse(`{"__proto__": ${JSON.stringify(validActivity)}}`));
    expect(Object.keys(parsed)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(parsed, '__proto__')?.value).toEqual(validActivity);
  });

  it('ignores extra fields', () => {
    const parsed = parseSeed({ Chess: { ...validActivity, room: 'B12' } });
    expect(parsed.Chess).toEqual(validActivity);
  });
});

describe('loadSeedFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'activity-seed-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads activities from a JSON file', async () => {
    const path = join(dir, 'seed.json');
    await writeFile(path, JSON.stringify({ 'Chess Club': validActivity }));
    expect(await loadSeedFile(path)).toEqual({ 'Chess Club': validActivity });
  });

  it('wraps a missing file in SeedError', async () => {
    const path = join(dir, 'missing.json');
    await expect(loadSeedFile(path)).rejects.toThrow(`Could not read seed file ${path}.`);
  });

  it('wraps invalid JSON in SeedError', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');
    await expect(loadSeedFile(path)).rejects.toBeInstanceOf(SeedError);
  });
});
