/** A chunk produced by a source. Strings are encoded as UTF-8. */
export type SourceChunk = Uint8Array | string;

/** A freshly opened byte stream. Ending iteration early releases the underlying handle. */
export type SourceStream = AsyncIterable<SourceChunk>;

/**
 * Port for a named, independently openable byte source (file, buffer, HTTP, stream).
 *
 * `open()` is invoked at most once per source per multiplex session. The
 * multiplexer opens sources strictly one at a time and releases each stream
 * before opening the next. Rejecting from `open()` is reported as an open
 * failure; throwing while iterating is reported as a read failure.
 */
export interface Source {
  /** Stable display name used in `SourceMeta` and error messages. */
  readonly name: string;
  /** Open a fresh byte stream. `signal` aborts when the consumer closes the multiplexer. */
  open(signal: AbortSignal): Promise<SourceStream>;
}
