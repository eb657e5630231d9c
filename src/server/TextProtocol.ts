/**
 * Line-oriented text protocol.
 *
 * One command per line. Tokens are separated by whitespace; a single- or
 * double-quoted section may contain spaces. The verb is case-insensitive and
 * maps onto a closed set of Command variants.
 */

export interface SetCommand {
  readonly type: 'SET';
  readonly key: string;
  readonly value: string;
  readonly ttlSeconds: number | null;
}

export interface KeyCommand {
  readonly type:
    | 'GET' | 'DELETE' | 'EXISTS' | 'TTL'
    | 'HGETALL' | 'HLEN'
    | 'LPOP' | 'RPOP' | 'LLEN';
  readonly key: string;
}

export interface ExpireCommand {
  readonly type: 'EXPIRE';
  readonly key: string;
  readonly ttlSeconds: number;
}

export interface KeysCommand {
  readonly type: 'KEYS';
  readonly pattern: string;
}

export interface FieldCommand {
  readonly type: 'HGET' | 'HDEL' | 'HEXISTS';
  readonly key: string;
  readonly field: string;
}

export interface HSetCommand {
  readonly type: 'HSET';
  readonly key: string;
  readonly field: string;
  readonly value: string;
}

export interface PushCommand {
  readonly type: 'LPUSH' | 'RPUSH';
  readonly key: string;
  readonly value: string;
}

export interface RangeCommand {
  readonly type: 'LRANGE';
  readonly key: string;
  readonly start: number;
  readonly stop: number;
}

export interface BareCommand {
  readonly type: 'LIST' | 'COUNT' | 'CLEAR' | 'INFO' | 'PING' | 'HELP' | 'QUIT';
}

export type Command =
  | SetCommand
  | KeyCommand
  | ExpireCommand
  | KeysCommand
  | FieldCommand
  | HSetCommand
  | PushCommand
  | RangeCommand
  | BareCommand;

export type CommandType = Command['type'];

export type ParseResult =
  | { readonly ok: true; readonly command: Command }
  | { readonly ok: false; readonly error: string };

export const COMMAND_NAMES: readonly CommandType[] = [
  'SET', 'GET', 'DELETE', 'EXISTS', 'TTL', 'EXPIRE',
  'LIST', 'KEYS', 'COUNT', 'CLEAR', 'INFO',
  'HSET', 'HGET', 'HGETALL', 'HDEL', 'HEXISTS', 'HLEN',
  'LPUSH', 'RPUSH', 'LPOP', 'RPOP', 'LLEN', 'LRANGE',
  'PING', 'HELP', 'QUIT',
];

const ALIASES: Readonly<Record<string, CommandType>> = {
  DEL: 'DELETE',
  EXIT: 'QUIT',
};

const USAGE: Readonly<Record<CommandType, string>> = {
  SET: 'key and value (SET key value [ttl])',
  GET: 'a key (GET key)',
  DELETE: 'a key (DELETE key)',
  EXISTS: 'a key (EXISTS key)',
  TTL: 'a key (TTL key)',
  EXPIRE: 'key and seconds (EXPIRE key seconds)',
  LIST: 'no arguments (LIST)',
  KEYS: 'a pattern (KEYS pattern)',
  COUNT: 'no arguments (COUNT)',
  CLEAR: 'no arguments (CLEAR)',
  INFO: 'no arguments (INFO)',
  HSET: 'key, field and value (HSET key field value)',
  HGET: 'key and field (HGET key field)',
  HGETALL: 'a key (HGETALL key)',
  HDEL: 'key and field (HDEL key field)',
  HEXISTS: 'key and field (HEXISTS key field)',
  HLEN: 'a key (HLEN key)',
  LPUSH: 'key and value (LPUSH key value)',
  RPUSH: 'key and value (RPUSH key value)',
  LPOP: 'a key (LPOP key)',
  RPOP: 'a key (RPOP key)',
  LLEN: 'a key (LLEN key)',
  LRANGE: 'key, start and stop (LRANGE key start stop)',
  PING: 'no arguments (PING)',
  HELP: 'no arguments (HELP)',
  QUIT: 'no arguments (QUIT)',
};

const NON_NEGATIVE_INTEGER = /^\d+$/;
const INTEGER = /^-?\d+$/;

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * Split a line into tokens, honouring single and double quotes.
 * Adjacent quoted and unquoted text joins into one token.
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: string | null = null;

  for (const char of line) {
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (quote !== null) {
    throw new ProtocolError('Unterminated quote');
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

export function parseCommand(line: string): ParseResult {
  let tokens: string[];
  try {
    tokens = tokenize(line);
  } catch (err) {
    if (err instanceof ProtocolError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }

  const [verb, ...args] = tokens;
  if (verb === undefined) {
    return { ok: false, error: 'Empty command' };
  }

  const type = resolveCommandType(verb);
  if (type === null) {
    return { ok: false, error: `Unknown command '${verb}'` };
  }

  try {
    return { ok: true, command: buildCommand(type, args) };
  } catch (err) {
    if (err instanceof ProtocolError) {
      return { ok: false, error: err.message };
    }
    throw err;
  }
}

function resolveCommandType(verb: string): CommandType | null {
  const upper = verb.toUpperCase();
  const alias = ALIASES[upper];
  if (alias !== undefined) {
    return alias;
  }
  return COMMAND_NAMES.find((name) => name === upper) ?? null;
}

function buildCommand(type: CommandType, tokens: string[]): Command {
  const args = new ArgReader(type, tokens);

  switch (type) {
    case 'SET': {
      const key = args.required(0);
      args.required(1);
      const rest = args.rest(1);
      const ttlToken = rest.length === 2 ? rest[1] : undefined;
      if (ttlToken !== undefined && NON_NEGATIVE_INTEGER.test(ttlToken)) {
        return { type, key, value: args.required(1), ttlSeconds: parseInt(ttlToken, 10) };
      }
      return { type, key, value: rest.join(' '), ttlSeconds: null };
    }

    case 'GET':
    case 'DELETE':
    case 'EXISTS':
    case 'TTL':
    case 'HGETALL':
    case 'HLEN':
    case 'LPOP':
    case 'RPOP':
    case 'LLEN':
      return { type, key: args.required(0) };

    case 'EXPIRE': {
      const key = args.required(0);
      return { type, key, ttlSeconds: parseInteger('seconds', args.required(1), NON_NEGATIVE_INTEGER) };
    }

    case 'KEYS':
      return { type, pattern: args.required(0) };

    case 'HGET':
    case 'HDEL':
    case 'HEXISTS':
      return { type, key: args.required(0), field: args.required(1) };

    case 'HSET': {
      const key = args.required(0);
      const field = args.required(1);
      args.required(2);
      return { type, key, field, value: args.rest(2).join(' ') };
    }

    case 'LPUSH':
    case 'RPUSH': {
      const key = args.required(0);
      args.required(1);
      return { type, key, value: args.rest(1).join(' ') };
    }

    case 'LRANGE': {
      const key = args.required(0);
      const start = args.required(1);
      const stop = args.required(2);
      return {
        type,
        key,
        start: parseInteger('start', start, INTEGER),
        stop: parseInteger('stop', stop, INTEGER),
      };
    }

    case 'LIST':
    case 'COUNT':
    case 'CLEAR':
    case 'INFO':
    case 'PING':
    case 'HELP':
    case 'QUIT':
      return { type };
  }
}

class ArgReader {
  private readonly type: CommandType;
  private readonly tokens: string[];

  constructor(type: CommandType, tokens: string[]) {
    this.type = type;
    this.tokens = tokens;
  }

  required(index: number): string {
    const token = this.tokens[index];
    if (token === undefined) {
      throw new ProtocolError(`${this.type} requires ${USAGE[this.type]}`);
    }
    return token;
  }

  rest(from: number): string[] {
    return this.tokens.slice(from);
  }
}

function parseInteger(what: string, token: string, pattern: RegExp): number {
  if (!pattern.test(token)) {
    const expected = pattern === NON_NEGATIVE_INTEGER ? 'a non-negative integer' : 'an integer';
    throw new ProtocolError(`Invalid ${what} '${token}': must be ${expected}`);
  }
  return parseInt(token, 10);
}
