import type { StoredValue, TtlStatus } from '../common/Types';

export function renderValue(value: StoredValue): string {
  switch (value.kind) {
    case 'string':
      return `'${value.value}'`;
    case 'hash':
      return renderHash(value.fields);
    case 'list':
      return renderList(value.items);
  }
}

export function renderHash(fields: ReadonlyMap<string, string>): string {
  const pairs = [...fields].map(([field, value]) => `${field}=${value}`);
  return `{${pairs.join(', ')}}`;
}

export function renderList(items: readonly string[]): string {
  return `[${items.join(', ')}]`;
}

export function renderKeys(keys: readonly string[], emptyMessage: string): string {
  return keys.length === 0 ? `OK: ${emptyMessage}` : `OK: Keys: ${keys.join(', ')}`;
}

export function renderTtl(key: string, status: TtlStatus): string {
  switch (status.state) {
    case 'missing':
      return `NULL: Key '${key}' not found`;
    case 'persistent':
      return `OK: '${key}' has no expiration`;
    case 'expired':
      return `EXPIRED: '${key}' has expired`;
    case 'expiring':
      return `OK: '${key}' expires in ${status.seconds}s`;
  }
}

/**
 * INFO output flattened onto one line: section headers and blank lines are
 * dropped, the remaining `name:value` lines are joined with ", ".
 */
export function renderInfo(info: string): string {
  const lines = info
    .split('\n')
    .filter((line) => line.length > 0 && !line.startsWith('#'));
  return `OK: ${lines.join(', ')}`;
}

export function renderError(message: string): string {
  return `ERROR: ${message}`;
}
