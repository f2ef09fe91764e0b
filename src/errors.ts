import type { CycleResult } from './sync/types.js';

export class SyncError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends SyncError {}

export class StateCorruptError extends SyncError {}
export class StatePersistError extends SyncError {}

export class ClassifierAuthError extends SyncError {}
export class ClassifierRequestError extends SyncError {}
export class ClassifierTransientError extends SyncError {}

/** Not thrown: attached to a classification that fell back to the catch-all category. */
export class ClassificationDegraded extends SyncError {}

export class RemoteAuthError extends SyncError {}
export class RemoteNotFoundError extends SyncError {}
export class RemoteRequestError extends SyncError {}
export class RemoteTransientError extends SyncError {}

/** Thrown by the reconciler when a fatal error stops a cycle; carries the work done so far. */
export class CycleAbortedError extends SyncError {
  constructor(message: string, public readonly partial: CycleResult, cause?: unknown) {
    super(message, cause);
  }
}

const FATAL_CYCLE_ERRORS = [
  ClassifierAuthError,
  ClassifierRequestError,
  RemoteAuthError,
  RemoteNotFoundError,
  RemoteRequestError,
  RemoteTransientError,
] as const;

export function isFatalCycleError(err: unknown): err is SyncError {
  return FATAL_CYCLE_ERRORS.some((Class) => err instanceof Class);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Reads an HTTP status off SDK errors (`status` on OpenAI, `httpStatusCode` on Todoist). */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  for (const key of ['status', 'httpStatusCode'] as const) {
    if (key in err) {
      const value: unknown = Reflect.get(err, key);
      if (typeof value === 'number') return value;
    }
  }
  return undefined;
}
