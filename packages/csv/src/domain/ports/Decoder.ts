import type { SourceAwareStream } from '@sourcemux/core';
import type { RecordIterator } from './RecordIterator.js';
import type { RecordView } from './RecordView.js';

/** Options accepted by `Decoder.decode()`. */
export interface DecodeOptions {
  /** Aborting closes the stream; the iterator then reports a `CancellationError`. */
  readonly signal?: AbortSignal;
}

/**
 * Port for turning a provenance-aware byte stream into records.
 *
 * Format-specific settings (delimiter, header handling) belong to the
 * decoder's constructor, not to `decode()`. The returned iterator owns the
 * stream and closes it on `close()`.
 */
export interface Decoder {
  decode(stream: SourceAwareStream, options?: DecodeOptions): Promise<RecordIterator>;
}

/** Convert one decoded record into a typed value. Throwing stops iteration with that error. */
export type Mapper<T> = (record: RecordView) => T;
