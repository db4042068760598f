import type { Source } from '../../domain/ports/Source.js';
import { UrlSource } from '../sources/UrlSource.js';

/** Resolve an `http:` or `https:` specification into a single `UrlSource`. */
export function resolveUrlSources(spec: string): Promise<Source[]> {
  return Promise.resolve([new UrlSource(spec)]);
}
