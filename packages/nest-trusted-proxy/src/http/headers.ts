/** Header value shapes produced by Node's `IncomingMessage` and most adapters. */
export type HeaderValue = string | string[] | undefined;

/** Request headers keyed by name; lookups are case-insensitive. */
export type HeaderMap = Readonly<Record<string, HeaderValue>>;

/** First header that matched in an ordered lookup. */
export interface HeaderMatch<T> {
  name: string;
  value: T;
}

/** Minimal request surface read and mutated by the resolver glue. */
export interface RequestLike {
  headers?: Record<string, HeaderValue>;
  rawHeaders?: string[];
  socket?: { remoteAddress?: string; encrypted?: boolean };
  connection?: { remoteAddress?: string; encrypted?: boolean };
}

/** Case-insensitive header lookup; multi-valued headers yield their first value. */
export function getHeader(headers: HeaderMap | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }

  const lowered = name.toLowerCase();
  const key = Object.prototype.hasOwnProperty.call(headers, lowered)
    ? lowered
    : Object.keys(headers).find((k) => k.toLowerCase() === lowered);
  if (!key) {
    return undefined;
  }
  const value = headers[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Walks `names` in order and returns the first header that is present, non-empty and
 * for which `select` yields a value. Returns `null` when nothing matches.
 */
export function firstHeaderMatch<T>(
  headers: HeaderMap | undefined,
  names: readonly string[],
  select: (value: string, name: string) => T | undefined,
): HeaderMatch<T> | null {
  for (const name of names) {
    const raw = getHeader(headers, name);
    if (!raw || !raw.trim()) {
      continue;
    }

    const value = select(raw, name);
    if (value !== undefined) {
      return { name, value };
    }
  }
  return null;
}

/** First header in `names` order that is present and non-empty, whatever its value. */
export function firstPresentHeader(headers: HeaderMap | undefined, names: readonly string[]): HeaderMatch<string> | null {
  return firstHeaderMatch(headers, names, (value) => value);
}

/** Deletes the named headers from `headers` and `rawHeaders`; returns the names actually removed. */
export function removeHeaders(req: RequestLike, names: readonly string[]): string[] {
  const wanted = new Set(names.map((name) => name.toLowerCase()));
  const removed = new Set<string>();

  const headers = req.headers;
  if (headers) {
    for (const key of Object.keys(headers)) {
      const lowered = key.toLowerCase();
      if (wanted.has(lowered)) {
        delete headers[key];
        removed.add(lowered);
      }
    }
  }

  const raw = req.rawHeaders;
  if (Array.isArray(raw)) {
    const kept: string[] = [];
    for (let i = 0; i + 1 < raw.length; i += 2) {
      const lowered = raw[i].toLowerCase();
      if (wanted.has(lowered)) {
        removed.add(lowered);
        continue;
      }
      kept.push(raw[i], raw[i + 1]);
    }
    raw.splice(0, raw.length, ...kept);
  }

  return Array.from(removed);
}
