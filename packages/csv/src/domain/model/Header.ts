import { ConfigurationError } from '@sourcemux/core';

/** Reject a header that repeats a field name. Names are case-sensitive. */
export function validateHeader(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigurationError(`malformed header: duplicate entry "${name}" in header [${names.join(', ')}]`);
    }
    seen.add(name);
  }
}

/** Map each header name to its position. */
export function buildIndex(names: readonly string[]): ReadonlyMap<string, number> {
  return new Map(names.map((name, position) => [name, position] as const));
}

/** Whether `row` repeats `header` exactly: same length, same name at every position. */
export function matchesHeader(header: readonly string[], row: readonly string[]): boolean {
  return header.length === row.length && header.every((name, position) => row[position] === name);
}
