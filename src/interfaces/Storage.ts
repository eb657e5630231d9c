import type { StoredValue, TtlStatus, ValueKind } from '../common/Types';

export type Clock = () => number;

export interface KeyStats {
  readonly totalKeys: number;
  readonly keysByKind: Readonly<Record<ValueKind, number>>;
  readonly expiringKeys: number;
  readonly usedMemoryEstimate: number;
}

export interface IStringCommands {
  set(key: string, value: string): void;
  setWithTtl(key: string, value: string, ttlSeconds: number): void;
  get(key: string): string | null;

  /**
   * Remove a key of any type.
   *
   * @returns the removed value, or null if the key was absent or expired
   */
  delete(key: string): StoredValue | null;
  exists(key: string): boolean;

  /**
   * @returns null when the key is absent or has no expiration, -1 when it
   * has just been observed expired, otherwise whole seconds left (>= 1)
   */
  ttl(key: string): number | null;
  ttlStatus(key: string): TtlStatus;
  expire(key: string, ttlSeconds: number): boolean;
}

export interface IKeyspaceCommands {
  listKeys(): string[];
  keys(pattern: string): string[];
  count(): number;
  clear(): void;
  info(): string;
  stats(): KeyStats;
}

export interface IHashCommands {
  hset(key: string, field: string, value: string): boolean;
  hget(key: string, field: string): string | null;
  hgetall(key: string): Map<string, string>;
  hdel(key: string, field: string): boolean;
  hexists(key: string, field: string): boolean;
  hlen(key: string): number;
}

export interface IListCommands {
  lpush(key: string, value: string): number;
  rpush(key: string, value: string): number;
  lpop(key: string): string | null;
  rpop(key: string): string | null;
  llen(key: string): number;

  /**
   * Inclusive range; negative indices count from the tail (-1 is the last item).
   */
  lrange(key: string, start: number, stop: number): string[];
}

export interface IStorageEngine
  extends IStringCommands, IKeyspaceCommands, IHashCommands, IListCommands {}
