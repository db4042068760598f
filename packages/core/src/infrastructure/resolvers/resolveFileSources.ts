import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Source } from '../../domain/ports/Source.js';
import { ConfigurationError, describeCause } from '../../domain/errors/StreamErrors.js';
import { FileSource } from '../sources/FileSource.js';

/**
 * Resolve a file specification into one `FileSource` per matching file,
 * sorted lexicographically by path.
 *
 * Accepts a plain path, a `file:` URL (`file:///abs/path`, `file:/abs/path`),
 * or either with `*` / `?` wildcards in the last path segment.
 */
export async function resolveFileSources(spec: string): Promise<Source[]> {
  const path = normalizeFileSpec(spec);
  const pattern = basename(path);

  if (!hasWildcard(pattern)) {
    if (!(await isFile(path))) throw new ConfigurationError(`no files matched: "${path}"`);
    return [new FileSource(path)];
  }

  const directory = dirname(path);
  let names: string[];
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    const matcher = wildcardToRegExp(pattern);
    names = entries.filter((entry) => entry.isFile() && matcher.test(entry.name)).map((entry) => entry.name);
  } catch (error) {
    throw new ConfigurationError(`cannot list "${directory}": ${describeCause(error)}`, { cause: error });
  }

  if (names.length === 0) throw new ConfigurationError(`no files matched: "${path}"`);
  return names
    .map((name) => join(directory, name))
    .sort()
    .map((file) => new FileSource(file));
}

/** Convert a user-facing file specification into a filesystem path. */
export function normalizeFileSpec(spec: string): string {
  const trimmed = spec.trim();
  if (!/^file:/i.test(trimmed)) return trimmed;

  let path: string;
  try {
    path = fileURLToPath(new URL(trimmed));
  } catch (error) {
    throw new ConfigurationError(`invalid file URL "${trimmed}": ${describeCause(error)}`, { cause: error });
  }
  if (path === '' || path === '/') throw new ConfigurationError(`empty file URL: "${trimmed}"`);
  return path;
}

/** Translate a `*` / `?` wildcard pattern into an anchored regular expression. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`);
}

function hasWildcard(segment: string): boolean {
  return segment.includes('*') || segment.includes('?');
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw new ConfigurationError(`cannot stat "${path}": ${describeCause(error)}`, { cause: error });
  }
}
