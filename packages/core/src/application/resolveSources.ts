import type { Source } from '../domain/ports/Source.js';
import { ConfigurationError } from '../domain/errors/StreamErrors.js';
import { resolveFileSources } from '../infrastructure/resolvers/resolveFileSources.js';
import { resolveUrlSources } from '../infrastructure/resolvers/resolveUrlSources.js';

/** Turns a source specification into an ordered list of sources. */
export type SourceResolver = (spec: string) => Promise<Source[]>;

/** Scheme name (lower case, without `:`) to resolver. */
export type ResolverRegistry = ReadonlyMap<string, SourceResolver>;

/** Build an immutable registry from `[scheme, resolver]` pairs. Later pairs win. */
export function createResolverRegistry(
  entries: Iterable<readonly [string, SourceResolver]>,
): ResolverRegistry {
  const registry = new Map<string, SourceResolver>();
  for (const [scheme, resolver] of entries) {
    registry.set(scheme.toLowerCase(), resolver);
  }
  return registry;
}

/** Resolvers for local files and HTTP(S) URLs. */
export const defaultResolvers: ResolverRegistry = createResolverRegistry([
  ['file', resolveFileSources],
  ['http', resolveUrlSources],
  ['https', resolveUrlSources],
]);

/**
 * Detect the access scheme of a specification.
 *
 * Bare paths, Windows drive paths (`C:\data`) and UNC paths (`\\server\share`)
 * are `file`. Returns `null` when a `://` is present but no valid scheme precedes it.
 */
export function detectScheme(spec: string): string | null {
  const trimmed = spec.trim();
  if (/^[a-z]:([\\/]|$)/i.test(trimmed) || trimmed.startsWith('\\\\')) return 'file';
  if (/^file:/i.test(trimmed)) return 'file';
  if (!trimmed.includes('://')) return 'file';

  const match = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed);
  return match?.[1] ? match[1].toLowerCase() : null;
}

/**
 * Resolve a specification through an explicit scheme registry.
 *
 * @example
 * ```typescript
 * const sources = await resolveSources('file:///data/exports/*.csv');
 * const custom = await resolveSources('mem://fixtures', createResolverRegistry([['mem', loadFixtures]]));
 * ```
 */
export async function resolveSources(spec: string, resolvers: ResolverRegistry = defaultResolvers): Promise<Source[]> {
  const scheme = detectScheme(spec);
  if (scheme === null) throw new ConfigurationError(`unknown scheme for "${spec}"`);

  const resolver = resolvers.get(scheme);
  if (!resolver) throw new ConfigurationError(`no resolver registered for scheme "${scheme}" (spec "${spec}")`);

  return resolver(spec.trim());
}
