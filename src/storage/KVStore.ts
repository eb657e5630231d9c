/**
 * KVStore - in-memory storage engine
 *
 * Holds the key -> Entry map and runs every operation inside the keyspace
 * lock. Expiration is lazy: reads treat an expired entry as absent and leave
 * it in place, so the next TTL lookup can still report it as expired. TTL
 * lookups, writes, deletes and the sweep that enumeration operations run
 * before reading the map remove it.
 */

import { Entry } from './entry/Entry';
import { KeyspaceLock } from './lock/KeyspaceLock';
import { matchesPattern } from './pattern/PatternMatcher';
import { InvalidArgumentError, TypeMismatchError } from '../common/Errors';
import { SERVER_VERSION } from '../common/Config';
import {
  createHashValue,
  createListValue,
  createStringValue,
} from '../common/Types';
import type {
  StoredValue,
  TtlStatus,
  ValueKind,
  ValueOfKind,
} from '../common/Types';
import type { Clock, IStorageEngine, KeyStats } from '../interfaces/Storage';

export interface KVStoreDependencies {
  clock?: Clock;
  lock?: KeyspaceLock;
}

// Per-entry bookkeeping: expiry (8 bytes) + map node and object headers (~40 bytes)
const ENTRY_OVERHEAD_BYTES = 48;

export class KVStore implements IStorageEngine {
  private readonly data: Map<string, Entry> = new Map();
  private readonly clock: Clock;
  private readonly lock: KeyspaceLock;
  private readonly startedAt: number;
  private operations: number = 0;

  /**
   * @param dependencies - Optional injected clock and lock (for testing)
   */
  constructor(dependencies?: KVStoreDependencies) {
    this.clock = dependencies?.clock ?? Date.now;
    this.lock = dependencies?.lock ?? new KeyspaceLock();
    this.startedAt = this.clock();
  }

  // ---------------------------------------------------------------------------
  // String family
  // ---------------------------------------------------------------------------

  set(key: string, value: string): void {
    assertKey(key);
    this.withLock(() => {
      this.data.set(key, new Entry(createStringValue(value)));
    });
  }

  /**
   * A ttl of 0 stores an entry that is already expired; the next operation
   * touching the key removes it.
   */
  setWithTtl(key: string, value: string, ttlSeconds: number): void {
    assertKey(key);
    assertTtl(ttlSeconds);
    this.withLock(() => {
      this.data.set(key, Entry.withTtl(createStringValue(value), ttlSeconds, this.clock()));
    });
  }

  get(key: string): string | null {
    assertKey(key);
    return this.withLock(() => this.readAs(key, 'string')?.value ?? null);
  }

  delete(key: string): StoredValue | null {
    assertKey(key);
    return this.withLock(() => {
      const entry = this.reapExpired(key);
      if (entry === null) {
        return null;
      }
      this.data.delete(key);
      return entry.value;
    });
  }

  exists(key: string): boolean {
    assertKey(key);
    return this.withLock(() => this.liveEntry(key) !== null);
  }

  ttl(key: string): number | null {
    const status = this.ttlStatus(key);
    switch (status.state) {
      case 'missing':
      case 'persistent':
        return null;
      case 'expired':
        return -1;
      case 'expiring':
        return status.seconds;
    }
  }

  /**
   * Unlike the other operations, an expired entry is reported here before
   * being removed, so a TTL lookup can tell "just expired" from "absent".
   */
  ttlStatus(key: string): TtlStatus {
    assertKey(key);
    return this.withLock((): TtlStatus => {
      const entry = this.data.get(key);
      if (entry === undefined) {
        return { state: 'missing' };
      }

      const remaining = entry.remainingTtl(this.clock());
      if (remaining === null) {
        return { state: 'persistent' };
      }
      if (remaining === -1) {
        this.data.delete(key);
        return { state: 'expired' };
      }
      return { state: 'expiring', seconds: remaining };
    });
  }

  expire(key: string, ttlSeconds: number): boolean {
    assertKey(key);
    assertTtl(ttlSeconds);
    return this.withLock(() => {
      const entry = this.liveEntry(key);
      if (entry === null) {
        return false;
      }
      entry.expireIn(ttlSeconds, this.clock());
      return true;
    });
  }

  // ---------------------------------------------------------------------------
  // Enumeration family
  // ---------------------------------------------------------------------------

  listKeys(): string[] {
    return this.withLock(() => {
      this.sweepExpired();
      return [...this.data.keys()].sort();
    });
  }

  keys(pattern: string): string[] {
    return this.withLock(() => {
      this.sweepExpired();
      return [...this.data.keys()].filter((key) => matchesPattern(key, pattern)).sort();
    });
  }

  count(): number {
    return this.withLock(() => {
      this.sweepExpired();
      return this.data.size;
    });
  }

  clear(): void {
    this.withLock(() => {
      this.data.clear();
    });
  }

  stats(): KeyStats {
    return this.withLock(() => this.collectStats());
  }

  info(): string {
    return this.withLock(() => {
      const stats = this.collectStats();
      const uptimeSeconds = Math.floor((this.clock() - this.startedAt) / 1000);

      return [
        '# Server',
        `emberkv_version:${SERVER_VERSION}`,
        `uptime_in_seconds:${uptimeSeconds}`,
        '',
        '# Memory',
        `used_memory_estimate:${stats.usedMemoryEstimate}`,
        '',
        '# Stats',
        `total_keys:${stats.totalKeys}`,
        `string_keys:${stats.keysByKind.string}`,
        `hash_keys:${stats.keysByKind.hash}`,
        `list_keys:${stats.keysByKind.list}`,
        `expiring_keys:${stats.expiringKeys}`,
        `total_commands_processed:${this.operations}`,
      ].join('\n');
    });
  }

  // ---------------------------------------------------------------------------
  // Hash family
  // ---------------------------------------------------------------------------

  hset(key: string, field: string, value: string): boolean {
    assertKey(key);
    assertField(field);
    return this.withLock(() => {
      const hash = this.writeAs(key, 'hash', createHashValue);
      const created = !hash.fields.has(field);
      hash.fields.set(field, value);
      return created;
    });
  }

  hget(key: string, field: string): string | null {
    assertKey(key);
    assertField(field);
    return this.withLock(() => this.readAs(key, 'hash')?.fields.get(field) ?? null);
  }

  hgetall(key: string): Map<string, string> {
    assertKey(key);
    return this.withLock(() => new Map(this.readAs(key, 'hash')?.fields));
  }

  hdel(key: string, field: string): boolean {
    assertKey(key);
    assertField(field);
    return this.withLock(() => this.readAs(key, 'hash')?.fields.delete(field) ?? false);
  }

  hexists(key: string, field: string): boolean {
    assertKey(key);
    assertField(field);
    return this.withLock(() => this.readAs(key, 'hash')?.fields.has(field) ?? false);
  }

  hlen(key: string): number {
    assertKey(key);
    return this.withLock(() => this.readAs(key, 'hash')?.fields.size ?? 0);
  }

  // ---------------------------------------------------------------------------
  // List family
  // ---------------------------------------------------------------------------

  lpush(key: string, value: string): number {
    assertKey(key);
    return this.withLock(() => {
      const list = this.writeAs(key, 'list', createListValue);
      list.items.unshift(value);
      return list.items.length;
    });
  }

  rpush(key: string, value: string): number {
    assertKey(key);
    return this.withLock(() => {
      const list = this.writeAs(key, 'list', createListValue);
      list.items.push(value);
      return list.items.length;
    });
  }

  lpop(key: string): string | null {
    assertKey(key);
    return this.withLock(() => this.readAs(key, 'list')?.items.shift() ?? null);
  }

  rpop(key: string): string | null {
    assertKey(key);
    return this.withLock(() => this.readAs(key, 'list')?.items.pop() ?? null);
  }

  llen(key: string): number {
    assertKey(key);
    return this.withLock(() => this.readAs(key, 'list')?.items.length ?? 0);
  }

  /**
   * Algorithm:
   *   start: negative -> max(0, len + start), else min(start, len)
   *   stop:  negative -> max(0, len + stop),  else min(stop, len - 1)
   *   start > stop (or an empty list) -> []
   */
  lrange(key: string, start: number, stop: number): string[] {
    assertKey(key);
    assertIndex('start', start);
    assertIndex('stop', stop);
    return this.withLock(() => {
      const items = this.readAs(key, 'list')?.items ?? [];
      const len = items.length;
      if (len === 0) {
        return [];
      }

      const from = start < 0 ? Math.max(0, len + start) : Math.min(start, len);
      const to = stop < 0 ? Math.max(0, len + stop) : Math.min(stop, len - 1);
      if (from > to) {
        return [];
      }
      return items.slice(from, to + 1);
    });
  }

  // ---------------------------------------------------------------------------
  // Internals (callers must hold the lock)
  // ---------------------------------------------------------------------------

  private withLock<T>(section: () => T): T {
    return this.lock.runExclusive(() => {
      this.operations++;
      return section();
    });
  }

  /**
   * Returns the entry for a live key. An expired entry reads as absent but
   * stays in the map until a TTL lookup, a write or a sweep removes it.
   */
  private liveEntry(key: string): Entry | null {
    const entry = this.data.get(key);
    if (entry === undefined || entry.isExpired(this.clock())) {
      return null;
    }
    return entry;
  }

  /**
   * Like liveEntry, but drops an expired entry from the map.
   */
  private reapExpired(key: string): Entry | null {
    const entry = this.liveEntry(key);
    if (entry === null) {
      this.data.delete(key);
    }
    return entry;
  }

  /**
   * Typed read: null for an absent key, TypeMismatchError for another variant.
   */
  private readAs<K extends ValueKind>(key: string, kind: K): ValueOfKind<K> | null {
    const entry = this.liveEntry(key);
    if (entry === null) {
      return null;
    }
    return narrowValue(key, entry.value, kind);
  }

  /**
   * Typed write: creates an empty container for an absent or expired key.
   */
  private writeAs<K extends ValueKind>(
    key: string,
    kind: K,
    create: () => ValueOfKind<K>
  ): ValueOfKind<K> {
    const entry = this.reapExpired(key);
    if (entry !== null) {
      return narrowValue(key, entry.value, kind);
    }
    const value = create();
    this.data.set(key, new Entry(value));
    return value;
  }

  private sweepExpired(): void {
    const now = this.clock();
    for (const [key, entry] of this.data) {
      if (entry.isExpired(now)) {
        this.data.delete(key);
      }
    }
  }

  private collectStats(): KeyStats {
    this.sweepExpired();

    const keysByKind: Record<ValueKind, number> = { string: 0, hash: 0, list: 0 };
    let expiringKeys = 0;
    let usedMemoryEstimate = 0;

    for (const [key, entry] of this.data) {
      keysByKind[entry.value.kind]++;
      if (entry.getExpiresAt() !== null) {
        expiringKeys++;
      }
      usedMemoryEstimate += Buffer.byteLength(key, 'utf8')
        + estimateValueSize(entry.value)
        + ENTRY_OVERHEAD_BYTES;
    }

    return {
      totalKeys: this.data.size,
      keysByKind,
      expiringKeys,
      usedMemoryEstimate,
    };
  }
}

function narrowValue<K extends ValueKind>(key: string, value: StoredValue, kind: K): ValueOfKind<K> {
  if (!isKind(value, kind)) {
    throw new TypeMismatchError(key, kind, value.kind);
  }
  return value;
}

function isKind<K extends ValueKind>(value: StoredValue, kind: K): value is ValueOfKind<K> {
  return value.kind === kind;
}

function estimateValueSize(value: StoredValue): number {
  switch (value.kind) {
    case 'string':
      return Buffer.byteLength(value.value, 'utf8');
    case 'hash': {
      let size = 0;
      for (const [field, fieldValue] of value.fields) {
        size += Buffer.byteLength(field, 'utf8') + Buffer.byteLength(fieldValue, 'utf8');
      }
      return size;
    }
    case 'list':
      return value.items.reduce((size, item) => size + Buffer.byteLength(item, 'utf8'), 0);
  }
}

function assertKey(key: string): void {
  if (key.length === 0) {
    throw new InvalidArgumentError('Invalid key: must be non-empty string');
  }
}

function assertField(field: string): void {
  if (field.length === 0) {
    throw new InvalidArgumentError('Invalid field: must be non-empty string');
  }
}

function assertTtl(ttlSeconds: number): void {
  if (!Number.isSafeInteger(ttlSeconds) || ttlSeconds < 0) {
    throw new InvalidArgumentError(`Invalid ttl: ${ttlSeconds}. Must be a non-negative integer`);
  }
}

function assertIndex(name: string, index: number): void {
  if (!Number.isSafeInteger(index)) {
    throw new InvalidArgumentError(`Invalid ${name}: ${index}. Must be an integer`);
  }
}
