export type QueryValue = string | number | boolean | bigint | readonly string[];

/** Query parameters keyed by wire name; `undefined` entries are left off the URL. */
export type QueryParams = Readonly<Record<string, QueryValue | undefined>>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export function joinList(values: readonly string[]): string {
  return values.join(',');
}

function encodeQueryValue(value: QueryValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return joinList(value);
}

export function toSearchParams(params: QueryParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, encodeQueryValue(value));
  }
  return search;
}

export function toQueryString(params: QueryParams): string {
  return toSearchParams(params).toString();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Drops `undefined` members from plain objects, recursively. `null` is kept: it
 * only appears in values the service sent us (e.g. an echoed quote).
 */
export function compact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => compact(item));
  }
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, member] of Object.entries(value)) {
    if (member === undefined) continue;
    out[key] = compact(member);
  }
  return out;
}

export function encodeJsonBody(body: object): string {
  return JSON.stringify(compact(body));
}
