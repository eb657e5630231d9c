/**
 * Entry - a stored value plus its optional absolute expiration.
 *
 * expiresAt is epoch milliseconds; null means the entry never expires.
 */

import type { StoredValue } from '../../common/Types';

export class Entry {
  readonly value: StoredValue;
  private expiresAt: number | null;

  constructor(value: StoredValue, expiresAt: number | null = null) {
    this.value = value;
    this.expiresAt = expiresAt;
  }

  static withTtl(value: StoredValue, ttlSeconds: number, now: number): Entry {
    return new Entry(value, now + ttlSeconds * 1000);
  }

  getExpiresAt(): number | null {
    return this.expiresAt;
  }

  expireIn(ttlSeconds: number, now: number): void {
    this.expiresAt = now + ttlSeconds * 1000;
  }

  isExpired(now: number): boolean {
    return this.expiresAt !== null && now >= this.expiresAt;
  }

  /**
   * Whole seconds left, rounded up. A live entry never reports 0;
   * an expired one reports -1.
   */
  remainingTtl(now: number): number | null {
    if (this.expiresAt === null) {
      return null;
    }
    const remainingMs = this.expiresAt - now;
    if (remainingMs <= 0) {
      return -1;
    }
    return Math.max(1, Math.ceil(remainingMs / 1000));
  }
}
