import type { ProxyConfigDocument } from './configDocument';

const INDENT = 2;

function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;

  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
  return Object.fromEntries(entries);
}

/**
 * Canonical text of the document: keys sorted at every depth, arrays in their
 * original order, two-space indent and a trailing newline.
 */
export function serialize(document: ProxyConfigDocument): string {
  return `${JSON.stringify(document, sortKeys, INDENT)}\n`;
}
