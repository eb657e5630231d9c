import { LockError } from '../../common/Errors';

/**
 * Mutual exclusion around the key space.
 *
 * Engine operations are synchronous, so on a single event loop they already
 * run one at a time. The lock makes that a checked property: a critical
 * section that calls back into the engine (e.g. through an injected clock)
 * fails with LockError instead of observing a half-applied update.
 * The lock is always released, so a failed call leaves it usable.
 */
export class KeyspaceLock {
  private held: boolean = false;

  runExclusive<T>(section: () => T): T {
    if (this.held) {
      throw new LockError('Keyspace lock is already held: re-entrant access is not allowed');
    }

    this.held = true;
    try {
      return section();
    } finally {
      this.held = false;
    }
  }
}
