/**
 * Snapshot of which source is active and how many of its bytes have been
 * delivered to the consumer so far.
 */
export interface SourceMeta {
  /** Display name of the active source. Empty before any source is active. */
  readonly name: string;
  /** Bytes of the active source delivered so far. Resets to `0` when a new source begins. */
  readonly byteOffset: number;
  /** Zero-based position of the active source in the source list. `-1` before any source is active. */
  readonly sourceIndex: number;
}

/** The snapshot reported before the first source has been opened. */
export const NO_SOURCE: SourceMeta = Object.freeze({ name: '', byteOffset: 0, sourceIndex: -1 });

/** Create the boundary snapshot for a source that is about to stream. */
export function boundaryMeta(name: string, sourceIndex: number): SourceMeta {
  return { name, byteOffset: 0, sourceIndex };
}

/** Return a copy of `meta` advanced by `bytes`. */
export function advanceMeta(meta: SourceMeta, bytes: number): SourceMeta {
  return { ...meta, byteOffset: meta.byteOffset + bytes };
}

/**
 * Whether `next` describes a different source than `previous`: a changed
 * index or name, or an offset that went back to zero after being non-zero.
 */
export function isNewSource(previous: SourceMeta | null, next: SourceMeta): boolean {
  if (previous === null || previous.sourceIndex < 0) return true;
  if (next.sourceIndex !== previous.sourceIndex) return true;
  if (next.name !== previous.name) return true;
  return next.byteOffset === 0 && previous.byteOffset !== 0;
}
