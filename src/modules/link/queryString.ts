import { MalformedLinkError } from '../../lib/errors';

export type QueryParams = Readonly<Record<string, string>>;

function decodeComponent(value: string, field: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    throw new MalformedLinkError({
      field,
      message: `cannot percent-decode "${value}"`,
    });
  }
}

/**
 * Splits a raw `a=1&b=2` query into decoded pairs. The first occurrence of a
 * repeated key wins and a key without `=` maps to an empty string.
 */
export function parseQueryString(rawQuery: string): QueryParams {
  const query = rawQuery.startsWith('?') ? rawQuery.slice(1) : rawQuery;
  const params = new Map<string, string>();

  for (const segment of query.split('&')) {
    if (segment.length === 0) continue;

    const separator = segment.indexOf('=');
    const rawKey = separator === -1 ? segment : segment.slice(0, separator);
    const rawValue = separator === -1 ? '' : segment.slice(separator + 1);

    const key = decodeComponent(rawKey, 'query');
    if (key.length === 0) {
      throw new MalformedLinkError({
        field: 'query',
        message: `parameter "${segment}" has an empty name`,
      });
    }

    const value = decodeComponent(rawValue, `query.${key}`);
    if (!params.has(key)) {
      params.set(key, value);
    }
  }

  return Object.freeze(Object.fromEntries(params));
}
