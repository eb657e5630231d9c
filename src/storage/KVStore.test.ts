import { beforeEach, describe, expect, it } from 'vitest';
import { KVStore } from './KVStore';
import { InvalidArgumentError, LockError, TypeMismatchError } from '../common/Errors';

describe('KVStore', () => {
  let now: number;
  let store: KVStore;

  const advance = (ms: number): void => {
    now += ms;
  };

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new KVStore({ clock: () => now });
  });

  describe('string family', () => {
    it('returns exactly what was set', () => {
      store.set('key1', 'value1');
      store.set('spaced', 'hello world');
      store.set('empty', '');

      expect(store.get('key1')).toBe('value1');
      expect(store.get('spaced')).toBe('hello world');
      expect(store.get('empty')).toBe('');
    });

    it('returns null for a missing key', () => {
      expect(store.get('nonexistent')).toBeNull();
    });

    it('overwrites an existing value', () => {
      store.set('key', 'first');
      store.set('key', 'second');

      expect(store.get('key')).toBe('second');
      expect(store.count()).toBe(1);
    });

    it('drops a previous expiration on plain set', () => {
      store.setWithTtl('key', 'v1', 5);
      store.set('key', 'v2');

      expect(store.ttl('key')).toBeNull();
      advance(10_000);
      expect(store.get('key')).toBe('v2');
    });

    it('replaces a hash or list with a string on set', () => {
      store.hset('h', 'f', '1');
      store.set('h', 'plain');

      expect(store.get('h')).toBe('plain');
    });

    it('deletes idempotently and returns the removed value', () => {
      store.set('delete_key', 'delete_value');

      expect(store.delete('delete_key')).toEqual({ kind: 'string', value: 'delete_value' });
      expect(store.delete('delete_key')).toBeNull();
      expect(store.get('delete_key')).toBeNull();
    });

    it('deletes keys of any type', () => {
      store.hset('h', 'f', '1');
      store.rpush('l', 'a');
      store.rpush('l', 'b');

      expect(store.delete('h')).toEqual({ kind: 'hash', fields: new Map([['f', '1']]) });
      expect(store.delete('l')).toEqual({ kind: 'list', items: ['a', 'b'] });
      expect(store.count()).toBe(0);
    });

    it('reports existence', () => {
      store.set('exists_key', 'v');

      expect(store.exists('exists_key')).toBe(true);
      expect(store.exists('nonexistent')).toBe(false);
    });

    it('rejects empty keys', () => {
      expect(() => store.set('', 'v')).toThrow(InvalidArgumentError);
      expect(() => store.get('')).toThrow(InvalidArgumentError);
    });
  });

  describe('expiration', () => {
    it('reports a ttl within [1, ttl] right after setting it', () => {
      store.setWithTtl('ttl_key', 'ttl_value', 10);

      expect(store.ttl('ttl_key')).toBe(10);
      advance(2_500);
      expect(store.ttl('ttl_key')).toBe(8);
    });

    it('returns null from get once expired and still reports -1 from the next ttl', () => {
      store.setWithTtl('ttl_key', 'ttl_value', 1);
      expect(store.get('ttl_key')).toBe('ttl_value');

      advance(1_100);

      expect(store.get('ttl_key')).toBeNull();
      expect(store.ttl('ttl_key')).toBe(-1);
      expect(store.ttl('ttl_key')).toBeNull();
    });

    it('keeps an expired entry visible to ttl after exists and typed reads', () => {
      store.setWithTtl('s', 'v', 1);
      store.hset('h', 'f', 'v');
      store.expire('h', 1);
      store.rpush('l', 'a');
      store.expire('l', 1);
      advance(1_000);

      expect(store.exists('s')).toBe(false);
      expect(store.hget('h', 'f')).toBeNull();
      expect(store.lpop('l')).toBeNull();

      expect(store.ttlStatus('s')).toEqual({ state: 'expired' });
      expect(store.ttlStatus('h')).toEqual({ state: 'expired' });
      expect(store.ttlStatus('l')).toEqual({ state: 'expired' });
      expect(store.ttlStatus('s')).toEqual({ state: 'missing' });
    });

    it('removes an expired entry on delete and on write', () => {
      store.setWithTtl('d', 'v', 1);
      store.setWithTtl('w', 'v', 1);
      advance(1_000);

      expect(store.delete('d')).toBeNull();
      expect(store.ttl('d')).toBeNull();

      store.rpush('w', 'x');
      expect(store.ttl('w')).toBeNull();
      expect(store.lrange('w', 0, -1)).toEqual(['x']);
    });

    it('reports -1 from ttl on the first touch after expiry, then null', () => {
      store.setWithTtl('ttl_key', 'ttl_value', 1);
      advance(1_100);

      expect(store.ttl('ttl_key')).toBe(-1);
      expect(store.ttl('ttl_key')).toBeNull();
      expect(store.get('ttl_key')).toBeNull();
    });

    it('describes ttl state as a tagged status', () => {
      store.set('persistent', 'v');
      store.setWithTtl('expiring', 'v', 3);
      store.setWithTtl('gone', 'v', 0);

      expect(store.ttlStatus('missing')).toEqual({ state: 'missing' });
      expect(store.ttlStatus('persistent')).toEqual({ state: 'persistent' });
      expect(store.ttlStatus('expiring')).toEqual({ state: 'expiring', seconds: 3 });
      expect(store.ttlStatus('gone')).toEqual({ state: 'expired' });
      expect(store.ttlStatus('gone')).toEqual({ state: 'missing' });
    });

    it('treats a zero ttl as immediately expired', () => {
      store.setWithTtl('zero', 'v', 0);

      expect(store.exists('zero')).toBe(false);
      expect(store.count()).toBe(0);
    });

    it('expires a key after expire() and the scenario sleep', () => {
      store.set('a', '1');

      expect(store.expire('a', 1)).toBe(true);
      const ttl = store.ttl('a');
      expect(ttl).toBe(1);

      advance(1_100);
      expect(store.get('a')).toBeNull();
    });

    it('refreshes an existing expiration', () => {
      store.setWithTtl('key', 'v', 2);
      advance(1_500);

      expect(store.expire('key', 10)).toBe(true);
      advance(1_000);

      expect(store.get('key')).toBe('v');
      expect(store.ttl('key')).toBe(9);
    });

    it('returns false from expire for missing or expired keys', () => {
      store.setWithTtl('old', 'v', 1);
      advance(1_000);

      expect(store.expire('nonexistent', 5)).toBe(false);
      expect(store.expire('old', 5)).toBe(false);
      expect(store.exists('old')).toBe(false);
    });

    it('expires hashes and lists', () => {
      store.hset('temp_user', 'name', 'Alice');
      store.hset('temp_user', 'email', 'alice@example.com');
      store.lpush('temp_list', 'item1');
      store.lpush('temp_list', 'item2');
      expect(store.expire('temp_user', 1)).toBe(true);
      expect(store.expire('temp_list', 1)).toBe(true);

      expect(store.hlen('temp_user')).toBe(2);
      expect(store.llen('temp_list')).toBe(2);

      advance(1_100);

      expect(store.hexists('temp_user', 'name')).toBe(false);
      expect(store.hlen('temp_user')).toBe(0);
      expect(store.hgetall('temp_user').size).toBe(0);
      expect(store.llen('temp_list')).toBe(0);
      expect(store.lrange('temp_list', 0, -1)).toEqual([]);
      expect(store.lpop('temp_list')).toBeNull();
    });

    it('lets a write recreate an expired key with a different type', () => {
      store.setWithTtl('k', 'string', 1);
      advance(1_000);

      expect(store.hset('k', 'f', 'v')).toBe(true);
      expect(store.hget('k', 'f')).toBe('v');
      expect(store.ttl('k')).toBeNull();
    });

    it('rejects negative or fractional ttls', () => {
      store.set('k', 'v');

      expect(() => store.setWithTtl('k', 'v', -1)).toThrow(InvalidArgumentError);
      expect(() => store.expire('k', 1.5)).toThrow(InvalidArgumentError);
      expect(store.ttl('k')).toBeNull();
    });
  });

  describe('enumeration family', () => {
    it('lists all live keys in sorted order', () => {
      store.set('key2', 'v');
      store.set('key1', 'v');
      store.hset('key3', 'f', 'v');

      expect(store.listKeys()).toEqual(['key1', 'key2', 'key3']);
    });

    it('sweeps expired keys on enumeration', () => {
      store.setWithTtl('cleanup_key1', 'value1', 1);
      store.setWithTtl('cleanup_key2', 'value2', 1);
      store.set('cleanup_key3', 'value3');

      expect(store.count()).toBe(3);

      advance(1_100);

      expect(store.count()).toBe(1);
      expect(store.listKeys()).toEqual(['cleanup_key3']);
      expect(store.ttl('cleanup_key1')).toBeNull();
    });

    it('filters keys by pattern', () => {
      store.set('user:1', 'john');
      store.set('user:2', 'jane');
      store.set('product:1', 'laptop');

      expect(store.keys('user:*')).toEqual(['user:1', 'user:2']);
      expect(store.keys('*:1')).toEqual(['product:1', 'user:1']);
      expect(store.keys('*')).toHaveLength(3);
      expect(store.keys('nonexistent:*')).toEqual([]);
    });

    it('excludes expired keys from pattern results', () => {
      store.set('user:1', 'john');
      store.setWithTtl('user:2', 'jane', 1);
      advance(1_000);

      expect(store.keys('user:*')).toEqual(['user:1']);
    });

    it('counts keys and clears everything', () => {
      expect(store.count()).toBe(0);

      store.set('count_key1', 'value1');
      store.set('count_key2', 'value2');
      expect(store.count()).toBe(2);

      store.delete('count_key1');
      expect(store.count()).toBe(1);

      store.clear();
      expect(store.count()).toBe(0);
      expect(store.get('count_key2')).toBeNull();
    });

    it('summarises the keyspace in info', () => {
      store.set('key1', 'value1');
      store.hset('hash1', 'field1', 'value1');
      store.lpush('list1', 'item1');
      store.expire('list1', 60);
      advance(3_000);

      const info = store.info();
      const lines = info.split('\n');

      expect(lines).toContain('# Server');
      expect(lines).toContain('# Memory');
      expect(lines).toContain('# Stats');
      expect(lines).toContain('emberkv_version:1.0.0');
      expect(lines).toContain('uptime_in_seconds:3');
      expect(lines).toContain('total_keys:3');
      expect(lines).toContain('string_keys:1');
      expect(lines).toContain('hash_keys:1');
      expect(lines).toContain('list_keys:1');
      expect(lines).toContain('expiring_keys:1');
      // set, hset, lpush, expire, then info itself
      expect(lines).toContain('total_commands_processed:5');
    });

    it('estimates memory from key and value sizes', () => {
      store.set('ab', 'cde');

      // 2 key bytes + 3 value bytes + 48 overhead
      expect(store.stats().usedMemoryEstimate).toBe(53);
    });
  });

  describe('hash family', () => {
    it('creates and updates fields', () => {
      expect(store.hset('h', 'f', '1')).toBe(true);
      expect(store.hset('h', 'f', '2')).toBe(false);
      expect(store.hget('h', 'f')).toBe('2');
    });

    it('reads, counts and deletes fields', () => {
      store.hset('user:1', 'name', 'John');
      store.hset('user:1', 'name', 'Johnny');
      store.hset('user:1', 'age', '30');

      expect(store.hget('user:1', 'name')).toBe('Johnny');
      expect(store.hget('user:1', 'nonexistent')).toBeNull();
      expect(store.hgetall('user:1')).toEqual(new Map([['name', 'Johnny'], ['age', '30']]));
      expect(store.hexists('user:1', 'age')).toBe(true);
      expect(store.hlen('user:1')).toBe(2);

      expect(store.hdel('user:1', 'age')).toBe(true);
      expect(store.hdel('user:1', 'age')).toBe(false);
      expect(store.hlen('user:1')).toBe(1);
      expect(store.hexists('user:1', 'age')).toBe(false);
    });

    it('treats a missing key as an empty hash without creating it', () => {
      expect(store.hget('nonexistent', 'field')).toBeNull();
      expect(store.hgetall('nonexistent').size).toBe(0);
      expect(store.hexists('nonexistent', 'field')).toBe(false);
      expect(store.hdel('nonexistent', 'field')).toBe(false);
      expect(store.hlen('nonexistent')).toBe(0);
      expect(store.exists('nonexistent')).toBe(false);
    });

    it('returns a copy from hgetall', () => {
      store.hset('h', 'f', '1');

      store.hgetall('h').set('f', 'changed');

      expect(store.hget('h', 'f')).toBe('1');
    });

    it('keeps an emptied hash under its key', () => {
      store.hset('h', 'f', '1');
      store.hdel('h', 'f');

      expect(store.exists('h')).toBe(true);
      expect(store.hlen('h')).toBe(0);
    });

    it('rejects empty field names', () => {
      expect(() => store.hset('h', '', 'v')).toThrow(InvalidArgumentError);
    });
  });

  describe('list family', () => {
    it('pushes at both ends and reports the new length', () => {
      expect(store.lpush('mylist', 'first')).toBe(1);
      expect(store.rpush('mylist', 'last')).toBe(2);
      expect(store.lpush('mylist', 'very_first')).toBe(3);

      expect(store.llen('mylist')).toBe(3);
      expect(store.lrange('mylist', 0, -1)).toEqual(['very_first', 'first', 'last']);
    });

    it('pops from both ends', () => {
      store.rpush('mylist', 'a');
      store.rpush('mylist', 'b');
      store.rpush('mylist', 'c');

      expect(store.lpop('mylist')).toBe('a');
      expect(store.rpop('mylist')).toBe('c');
      expect(store.lpop('mylist')).toBe('b');
      expect(store.lpop('mylist')).toBeNull();
      expect(store.rpop('mylist')).toBeNull();
      expect(store.llen('mylist')).toBe(0);
      expect(store.exists('mylist')).toBe(true);
    });

    it('treats a missing key as an empty list', () => {
      expect(store.llen('nonexistent')).toBe(0);
      expect(store.lpop('nonexistent')).toBeNull();
      expect(store.rpop('nonexistent')).toBeNull();
      expect(store.lrange('nonexistent', 0, -1)).toEqual([]);
      expect(store.exists('nonexistent')).toBe(false);
    });

    describe('lrange', () => {
      beforeEach(() => {
        for (const item of ['a', 'b', 'c', 'd', 'e']) {
          store.rpush('l', item);
        }
      });

      it('returns inclusive slices', () => {
        expect(store.lrange('l', 0, 1)).toEqual(['a', 'b']);
        expect(store.lrange('l', 1, 3)).toEqual(['b', 'c', 'd']);
        expect(store.lrange('l', 2, 2)).toEqual(['c']);
      });

      it('counts negative indices from the tail', () => {
        expect(store.lrange('l', -2, -1)).toEqual(['d', 'e']);
        expect(store.lrange('l', 0, -2)).toEqual(['a', 'b', 'c', 'd']);
        expect(store.lrange('l', -3, 3)).toEqual(['c', 'd']);
      });

      it('clamps out-of-range bounds', () => {
        expect(store.lrange('l', 0, 100)).toEqual(['a', 'b', 'c', 'd', 'e']);
        expect(store.lrange('l', -100, 1)).toEqual(['a', 'b']);
        expect(store.lrange('l', -100, -100)).toEqual(['a']);
      });

      it('returns nothing when start passes stop', () => {
        expect(store.lrange('l', 3, 1)).toEqual([]);
        expect(store.lrange('l', 5, 10)).toEqual([]);
        expect(store.lrange('l', -1, -2)).toEqual([]);
      });

      it('rejects non-integer bounds', () => {
        expect(() => store.lrange('l', 0.5, 1)).toThrow(InvalidArgumentError);
      });
    });
  });

  describe('type isolation', () => {
    it('rejects string and list operations on a hash', () => {
      store.hset('h', 'f', 'v');

      expect(() => store.get('h')).toThrow(TypeMismatchError);
      expect(() => store.lpush('h', 'x')).toThrow(TypeMismatchError);
      expect(() => store.llen('h')).toThrow(TypeMismatchError);
      expect(store.hget('h', 'f')).toBe('v');
    });

    it('rejects hash and list operations on a string', () => {
      store.set('s', 'hello');

      expect(() => store.hset('s', 'f', 'v')).toThrow(TypeMismatchError);
      expect(() => store.hget('s', 'f')).toThrow(TypeMismatchError);
      expect(() => store.rpush('s', 'x')).toThrow(TypeMismatchError);
      expect(() => store.lrange('s', 0, -1)).toThrow(TypeMismatchError);
      expect(store.get('s')).toBe('hello');
    });

    it('rejects string and hash operations on a list', () => {
      store.rpush('l', 'x');

      expect(() => store.get('l')).toThrow(TypeMismatchError);
      expect(() => store.hgetall('l')).toThrow(TypeMismatchError);
      expect(store.llen('l')).toBe(1);
    });

    it('identifies the key and both variants', () => {
      store.set('s', 'hello');

      let caught: unknown;
      try {
        store.hset('s', 'f', 'v');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(TypeMismatchError);
      expect(caught).toMatchObject({ key: 's', expected: 'hash', actual: 'string' });
      expect(caught).toHaveProperty('message', "Key 's' holds a string, not a hash");
    });

    it('still allows delete, exists, expire and ttl on any type', () => {
      store.hset('h', 'f', 'v');

      expect(store.exists('h')).toBe(true);
      expect(store.expire('h', 5)).toBe(true);
      expect(store.ttl('h')).toBe(5);
      expect(store.delete('h')).not.toBeNull();
    });
  });

  describe('concurrency', () => {
    it('keeps every writer\'s value when clients interleave', async () => {
      const writers = Array.from({ length: 10 }, async (_, i) => {
        const key = `concurrent_key_${i}`;
        const value = `value_${i}`;
        await Promise.resolve();
        store.set(key, value);
        await new Promise((resolve) => setImmediate(resolve));
        return store.get(key) === value;
      });

      const results = await Promise.all(writers);

      expect(results.every(Boolean)).toBe(true);
      expect(store.count()).toBe(10);
      for (let i = 0; i < 10; i++) {
        expect(store.get(`concurrent_key_${i}`)).toBe(`value_${i}`);
      }
    });

    it('fails a re-entrant call with LockError and stays usable', () => {
      let reenter = false;
      const reentrant: KVStore = new KVStore({
        clock: () => {
          if (reenter) {
            reenter = false;
            reentrant.count();
          }
          return now;
        },
      });
      reentrant.set('k', 'v');

      reenter = true;
      expect(() => reentrant.get('k')).toThrow(LockError);

      expect(reentrant.get('k')).toBe('v');
      expect(reentrant.count()).toBe(1);
    });
  });
});
