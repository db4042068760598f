import type { SourceMeta } from '../model/SourceMeta.js';

/** Options for blocking stream operations. */
export interface WaitOptions {
  /** Aborting rejects the pending wait with `CancellationError`. It does not stop the producer. */
  readonly signal?: AbortSignal;
}

/**
 * A merged byte stream that also reports which source produced its bytes.
 *
 * Decoders depend on this port rather than on `StreamMultiplexer` so they can
 * be driven by any provenance-aware stream.
 */
export interface SourceAwareStream {
  /** Fill `buffer` with merged bytes. Resolves the count, or `null` at clean end-of-stream. */
  read(buffer: Uint8Array, options?: WaitOptions): Promise<number | null>;
  /** Release resources. Idempotent and non-blocking. */
  close(): void;
  /** Non-blocking snapshot of the most recently published source and offset. */
  current(): SourceMeta;
  /** Resolve the next source boundary, or `null` once every boundary has been observed. */
  awaitBoundary(signal?: AbortSignal): Promise<SourceMeta | null>;
}
