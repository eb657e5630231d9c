/**
 * Custom error types for the storage engine.
 *
 * Absence of a key or field is never an error; these cover type conflicts,
 * bad arguments, lock failures and bad configuration.
 */

import type { ValueKind } from './Types';

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class TypeMismatchError extends StorageError {
  readonly key: string;
  readonly expected: ValueKind;
  readonly actual: ValueKind;

  constructor(key: string, expected: ValueKind, actual: ValueKind) {
    super(`Key '${key}' holds a ${actual}, not a ${expected}`);
    this.name = 'TypeMismatchError';
    this.key = key;
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidArgumentError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised when the keyspace lock cannot be taken. Fails the current call only;
 * the lock is released and the store stays usable.
 */
export class LockError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'LockError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}
