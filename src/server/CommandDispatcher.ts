/**
 * CommandDispatcher - maps parsed commands onto storage engine calls
 *
 * Each command runs exactly one engine operation and renders its typed
 * result as a single response line. Storage errors become ERROR lines;
 * anything else propagates to the connection layer.
 */

import { StorageError } from '../common/Errors';
import type { IStorageEngine } from '../interfaces/Storage';
import { COMMAND_NAMES, parseCommand } from './TextProtocol';
import type { Command } from './TextProtocol';
import {
  renderError,
  renderHash,
  renderInfo,
  renderKeys,
  renderList,
  renderTtl,
  renderValue,
} from './ResponseFormatter';

export interface CommandReply {
  readonly line: string;
  readonly close: boolean;
}

export const WELCOME_LINE = 'Welcome to emberkv! Type HELP for a list of commands.';

export class CommandDispatcher {
  private readonly store: IStorageEngine;

  constructor(store: IStorageEngine) {
    this.store = store;
  }

  handleLine(line: string): CommandReply {
    const result = parseCommand(line);
    if (!result.ok) {
      return reply(renderError(result.error));
    }
    return this.execute(result.command);
  }

  execute(command: Command): CommandReply {
    try {
      return this.run(command);
    } catch (err) {
      if (err instanceof StorageError) {
        return reply(renderError(err.message));
      }
      throw err;
    }
  }

  private run(command: Command): CommandReply {
    const store = this.store;

    switch (command.type) {
      case 'SET': {
        const { key, value, ttlSeconds } = command;
        if (ttlSeconds === null) {
          store.set(key, value);
          return reply(`OK: Set '${key}' = '${value}'`);
        }
        store.setWithTtl(key, value, ttlSeconds);
        return reply(`OK: Set '${key}' = '${value}' (expires in ${ttlSeconds}s)`);
      }

      case 'GET': {
        const value = store.get(command.key);
        return reply(value === null
          ? `NULL: Key '${command.key}' not found`
          : `OK: '${command.key}' = ${value}`);
      }

      case 'DELETE': {
        const removed = store.delete(command.key);
        return reply(removed === null
          ? `NULL: Key '${command.key}' not found`
          : `OK: Deleted '${command.key}' (was ${renderValue(removed)})`);
      }

      case 'EXISTS':
        return reply(store.exists(command.key)
          ? `TRUE: Key '${command.key}' exists`
          : `FALSE: Key '${command.key}' does not exist`);

      case 'TTL':
        return reply(renderTtl(command.key, store.ttlStatus(command.key)));

      case 'EXPIRE':
        return reply(store.expire(command.key, command.ttlSeconds)
          ? `OK: '${command.key}' expires in ${command.ttlSeconds}s`
          : `NULL: Key '${command.key}' not found`);

      case 'LIST':
        return reply(renderKeys(store.listKeys(), 'No keys found'));

      case 'KEYS':
        return reply(renderKeys(store.keys(command.pattern), `No keys match '${command.pattern}'`));

      case 'COUNT':
        return reply(`OK: ${store.count()} entries`);

      case 'CLEAR':
        store.clear();
        return reply('OK: All entries cleared');

      case 'INFO':
        return reply(renderInfo(store.info()));

      case 'HSET': {
        const { key, field, value } = command;
        return reply(store.hset(key, field, value)
          ? `OK: Field '${field}' created in '${key}'`
          : `OK: Field '${field}' updated in '${key}'`);
      }

      case 'HGET': {
        const { key, field } = command;
        const value = store.hget(key, field);
        return reply(value === null
          ? `NULL: Field '${field}' not found in '${key}'`
          : `OK: '${field}' = ${value}`);
      }

      case 'HGETALL':
        return reply(`OK: ${renderHash(store.hgetall(command.key))}`);

      case 'HDEL': {
        const { key, field } = command;
        return reply(store.hdel(key, field)
          ? `OK: Field '${field}' deleted from '${key}'`
          : `NULL: Field '${field}' not found in '${key}'`);
      }

      case 'HEXISTS': {
        const { key, field } = command;
        return reply(store.hexists(key, field)
          ? `TRUE: Field '${field}' exists in '${key}'`
          : `FALSE: Field '${field}' does not exist in '${key}'`);
      }

      case 'HLEN':
        return reply(`OK: ${store.hlen(command.key)} fields`);

      case 'LPUSH':
      case 'RPUSH': {
        const { key, value } = command;
        const length = command.type === 'LPUSH' ? store.lpush(key, value) : store.rpush(key, value);
        return reply(`OK: List '${key}' length is ${length}`);
      }

      case 'LPOP':
      case 'RPOP': {
        const value = command.type === 'LPOP' ? store.lpop(command.key) : store.rpop(command.key);
        return reply(value === null ? `NULL: List '${command.key}' is empty` : `OK: ${value}`);
      }

      case 'LLEN':
        return reply(`OK: ${store.llen(command.key)} items`);

      case 'LRANGE':
        return reply(`OK: ${renderList(store.lrange(command.key, command.start, command.stop))}`);

      case 'PING':
        return reply('PONG');

      case 'HELP':
        return reply(`OK: Commands: ${COMMAND_NAMES.join(', ')}`);

      case 'QUIT':
        return { line: 'OK: Goodbye!', close: true };
    }
  }
}

function reply(line: string): CommandReply {
  return { line, close: false };
}
