// utils/errors.ts
export type RegistryErrorKind = 'NotFound' | 'AlreadyRegistered' | 'NotRegistered';

export abstract class RegistryError extends Error {
  abstract readonly kind: RegistryErrorKind;
  activityName: string;
  email: string | null;

  constructor(message: string, activityName: string, email: string | null) {
    super(message);
    this.name = new.target.name;
    this.activityName = activityName;
    this.email = email;
  }
}

export class ActivityNotFoundError extends RegistryError {
  readonly kind = 'NotFound';

  constructor(activityName: string, email: string | null = null) {
    super(`Activity "${activityName}" does not exist`, activityName, email);
  }
}

export class AlreadySignedUpError extends RegistryError {
  readonly kind = 'AlreadyRegistered';

  constructor(activityName: string, email: string) {
    super(`${email} is already a participant of "${activityName}"`, activityName, email);
  }
}

export class NotSignedUpError extends RegistryError {
  readonly kind = 'NotRegistered';

  constructor(activityName: string, email: string) {
    super(`${email} is not a participant of "${activityName}"`, activityName, email);
  }
}

// Thrown while loading the startup fixture; fatal at boot, never seen by request handlers.
export class SeedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SeedError';
  }
}

export function isRegistryError(value: unknown): value is RegistryError {
  return value instanceof RegistryError;
}

const statusByKind: Record<RegistryErrorKind, number> = {
  NotFound: 404,
  AlreadyRegistered: 400,
  NotRegistered: 400,
};

const detailByKind: Record<RegistryErrorKind, string> = {
  NotFound: 'Activity not found',
  AlreadyRegistered: 'Student is already signed up for this activity',
  NotRegistered: 'Student is not signed up for this activity',
};

export function httpStatusFor(kind: RegistryErrorKind): number {
  return statusByKind[kind];
}

export function detailFor(kind: RegistryErrorKind): string {
  return detailByKind[kind];
}

/**
 * Status of a client error raised by Express or its middleware (e.g. a param that fails to decode).
 * Returns null for anything that is not a 4xx.
 */
export function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  const { status } = error;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return null;
}
