import { describe, it, expect } from 'vitest';
import {
  SyncError,
  ConfigError,
  StateCorruptError,
  StatePersistError,
  ClassifierAuthError,
  ClassifierRequestError,
  ClassifierTransientError,
  ClassificationDegraded,
  RemoteAuthError,
  RemoteNotFoundError,
  RemoteRequestError,
  RemoteTransientError,
  CycleAbortedError,
  isFatalCycleError,
  describeError,
  httpStatusOf,
} from '../errors.js';
import { emptyCycleResult } from '../sync/types.js';

describe('Error hierarchy', () => {
  const errorClasses = [
    { Class: ConfigError, name: 'ConfigError' },
    { Class: StateCorruptError, name: 'StateCorruptError' },
    { Class: StatePersistError, name: 'StatePersistError' },
    { Class: ClassifierAuthError, name: 'ClassifierAuthError' },
    { Class: ClassifierRequestError, name: 'ClassifierRequestError' },
    { Class: ClassifierTransientError, name: 'ClassifierTransientError' },
    { Class: ClassificationDegraded, name: 'ClassificationDegraded' },
    { Class: RemoteAuthError, name: 'RemoteAuthError' },
    { Class: RemoteNotFoundError, name: 'RemoteNotFoundError' },
    { Class: RemoteRequestError, name: 'RemoteRequestError' },
    { Class: RemoteTransientError, name: 'RemoteTransientError' },
  ];

  for (const { Class, name } of errorClasses) {
    it(`${name} is instanceof SyncError and Error`, () => {
      const err = new Class('test message');
      expect(err).toBeInstanceOf(SyncError);
      expect(err).toBeInstanceOf(Error);
      expect(err.message).toBe('test message');
      expect(err.name).toBe(name);
    });

    it(`${name} preserves cause`, () => {
      const cause = new Error('root cause');
      const err = new Class('wrapper', cause);
      expect(err.cause).toBe(cause);
    });
  }

  it('CycleAbortedError carries the partial result', () => {
    const partial = { ...emptyCycleResult(), processed: 2, failed: 1 };
    const cause = new RemoteAuthError('bad token');
    const err = new CycleAbortedError('stopped', partial, cause);
    expect(err.name).toBe('CycleAbortedError');
    expect(err.partial.processed).toBe(2);
    expect(err.cause).toBe(cause);
  });
});

describe('isFatalCycleError', () => {
  it('treats auth and rejected requests as fatal', () => {
    expect(isFatalCycleError(new ClassifierAuthError('x'))).toBe(true);
    expect(isFatalCycleError(new ClassifierRequestError('x'))).toBe(true);
    expect(isFatalCycleError(new RemoteAuthError('x'))).toBe(true);
    expect(isFatalCycleError(new RemoteNotFoundError('x'))).toBe(true);
    expect(isFatalCycleError(new RemoteRequestError('x'))).toBe(true);
    expect(isFatalCycleError(new RemoteTransientError('x'))).toBe(true);
  });

  it('does not treat degraded classifications or plain errors as fatal', () => {
    expect(isFatalCycleError(new ClassificationDegraded('x'))).toBe(false);
    expect(isFatalCycleError(new ClassifierTransientError('x'))).toBe(false);
    expect(isFatalCycleError(new Error('x'))).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});

describe('httpStatusOf', () => {
  it('reads status and httpStatusCode', () => {
    expect(httpStatusOf(Object.assign(new Error('x'), { status: 429 }))).toBe(429);
    expect(httpStatusOf(Object.assign(new Error('x'), { httpStatusCode: 404 }))).toBe(404);
  });

  it('ignores non-numeric or missing statuses', () => {
    expect(httpStatusOf(Object.assign(new Error('x'), { status: '500' }))).toBeUndefined();
    expect(httpStatusOf(new Error('x'))).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
    expect(httpStatusOf('500')).toBeUndefined();
  });
});
