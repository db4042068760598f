import type { SourceMeta } from '../model/SourceMeta.js';

/** Machine-readable error codes shared by the multiplexer and the decoders. */
export type StreamErrorCode = 'CONFIGURATION' | 'OPEN' | 'READ' | 'PARSE' | 'CANCELLED' | 'CLOSED' | 'MAPPING';

/** Base class for every error raised by sourcemux packages. */
export abstract class SourceMuxError extends Error {
  abstract readonly code: StreamErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid options, a duplicate header name, or no header obtainable from the stream. */
export class ConfigurationError extends SourceMuxError {
  readonly code = 'CONFIGURATION';
}

/** A source failed to open. Fatal for the whole multiplexed stream. */
export class OpenError extends SourceMuxError {
  readonly code = 'OPEN';
  readonly sourceName: string;

  constructor(sourceName: string, cause: unknown) {
    super(`open ${sourceName}: ${describeCause(cause)}`, { cause });
    this.sourceName = sourceName;
  }
}

/** A source failed mid-stream. Raised only after its already-read bytes were delivered. */
export class ReadError extends SourceMuxError {
  readonly code = 'READ';
  readonly sourceName: string;

  constructor(sourceName: string, cause: unknown) {
    super(`read ${sourceName}: ${describeCause(cause)}`, { cause });
    this.sourceName = sourceName;
  }
}

/** A malformed row, or a row whose field count does not match the canonical header. */
export class ParseError extends SourceMuxError {
  readonly code = 'PARSE';
  /** Provenance of the offending row, when known. */
  readonly meta: SourceMeta | undefined;

  constructor(message: string, meta?: SourceMeta) {
    super(meta && meta.sourceIndex >= 0 ? `parse ${meta.name}@${String(meta.byteOffset)}: ${message}` : `parse: ${message}`);
    this.meta = meta;
  }
}

/** A cancellation signal fired while the caller was blocked waiting. */
export class CancellationError extends SourceMuxError {
  readonly code = 'CANCELLED';

  constructor(message = 'operation cancelled', options?: ErrorOptions) {
    super(message, options);
  }
}

/** The stream was closed by its consumer. */
export class StreamClosedError extends SourceMuxError {
  readonly code = 'CLOSED';

  constructor(message = 'read on closed stream') {
    super(message);
  }
}

/** Render an unknown thrown value as a short message. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** Normalize an unknown thrown value into an `Error`. */
export function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}
