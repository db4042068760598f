import { StreamMultiplexer, type Source, type StreamMultiplexerOptions } from '@sourcemux/core';
import { CsvDecoder, type CsvDecoderOptions } from './CsvDecoder.js';
import type { RecordIterator } from './domain/ports/RecordIterator.js';

export interface DecodeSourcesOptions extends CsvDecoderOptions, StreamMultiplexerOptions {}

/**
 * Multiplex `sources` and decode the result in one call. The returned
 * iterator owns the multiplexer: closing it releases the open source.
 *
 * @example
 * ```typescript
 * const records = await decodeSources(resolveSources('./exports/*.csv'));
 * for await (const record of records) console.log(record.toObject());
 * ```
 */
export async function decodeSources(sources: readonly Source[], options?: DecodeSourcesOptions): Promise<RecordIterator> {
  const decoder = new CsvDecoder(options);
  const mux = new StreamMultiplexer(sources, { chunkSize: options?.chunkSize, signal: options?.signal });
  return decoder.decode(mux, { signal: options?.signal });
}
