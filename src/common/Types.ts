/**
 * Value model shared by the engine, the protocol layer and the HTTP API.
 * A key holds exactly one of these variants until it is deleted.
 */

export type ValueKind = 'string' | 'hash' | 'list';

export interface StringValue {
  readonly kind: 'string';
  value: string;
}

export interface HashValue {
  readonly kind: 'hash';
  readonly fields: Map<string, string>;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: string[];
}

export type StoredValue = StringValue | HashValue | ListValue;

export type ValueOfKind<K extends ValueKind> = Extract<StoredValue, { kind: K }>;

/**
 * What a TTL lookup observed. `expired` is reported at most once per entry:
 * the lookup that sees it also removes the entry.
 */
export type TtlStatus =
  | { readonly state: 'missing' }
  | { readonly state: 'persistent' }
  | { readonly state: 'expiring'; readonly seconds: number }
  | { readonly state: 'expired' };

export function createStringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function createHashValue(): HashValue {
  return { kind: 'hash', fields: new Map() };
}

export function createListValue(): ListValue {
  return { kind: 'list', items: [] };
}
