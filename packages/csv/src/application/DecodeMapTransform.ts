import { SourceMuxError, toError, type SourceAwareStream } from '@sourcemux/core';
import type { DecodeOptions, Decoder, Mapper } from '../domain/ports/Decoder.js';
import type { RecordIterator } from '../domain/ports/RecordIterator.js';

/** A mapper threw while converting a record. The original error is the `cause`. */
export class MappingError extends SourceMuxError {
  readonly code = 'MAPPING';
  readonly recordIndex: number;

  constructor(recordIndex: number, cause: unknown) {
    super(`map record ${String(recordIndex)}: ${toError(cause).message}`, { cause });
    this.recordIndex = recordIndex;
  }
}

/** Forward-only iterator over mapped values. Mirrors `RecordIterator`. */
export class MappedIterator<T> implements AsyncIterable<T> {
  private readonly records: RecordIterator;
  private readonly mapper: Mapper<T>;
  private current: { readonly value: T } | null = null;
  private error: Error | null = null;
  private count = 0;

  constructor(records: RecordIterator, mapper: Mapper<T>) {
    this.records = records;
    this.mapper = mapper;
  }

  get header(): readonly string[] {
    return this.records.header;
  }

  async next(): Promise<boolean> {
    this.current = null;
    if (this.error) return false;
    if (!(await this.records.next())) return false;

    try {
      this.current = { value: this.mapper(this.records.record()) };
    } catch (error) {
      this.error = new MappingError(this.count, error);
      this.records.close();
      return false;
    }
    this.count++;
    return true;
  }

  /** The value produced by the last successful `next()`. Throws if there is none. */
  value(): T {
    if (this.current === null) {
      throw new Error('MappedIterator: value() called without a successful next()');
    }
    return this.current.value;
  }

  /** The mapper's error if it threw, otherwise the decoder's error. */
  err(): Error | null {
    return this.error ?? this.records.err();
  }

  close(): void {
    this.records.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    try {
      while (await this.next()) {
        yield this.value();
      }
      const error = this.err();
      if (error) throw error;
    } finally {
      this.close();
    }
  }
}

/**
 * Composes a `Decoder` with a per-record mapper.
 *
 * @example
 * ```typescript
 * const toUser = new DecodeMapTransform(new CsvDecoder());
 * const users = await toUser.transform(mux, (r) => ({ id: Number(r.byName('id')), name: r.byName('name') ?? '' }));
 * for await (const user of users) save(user);
 * ```
 */
export class DecodeMapTransform {
  private readonly decoder: Decoder;

  constructor(decoder: Decoder) {
    this.decoder = decoder;
  }

  async transform<T>(stream: SourceAwareStream, mapper: Mapper<T>, options?: DecodeOptions): Promise<MappedIterator<T>> {
    const records = await this.decoder.decode(stream, options);
    return new MappedIterator(records, mapper);
  }
}
