import {
  CancellationError,
  ConfigurationError,
  EventBus,
  toError,
  type EventHandler,
  type EventType,
  type SourceAwareStream,
  type SourceMeta,
  type WildcardHandler,
} from '@sourcemux/core';
import type { DecodeOptions, Decoder } from './domain/ports/Decoder.js';
import type { RecordIterator } from './domain/ports/RecordIterator.js';
import { validateHeader } from './domain/model/Header.js';
import { CsvRowReader, type Newline } from './infrastructure/parsers/CsvRowReader.js';
import { CsvRecordIterator } from './application/CsvRecordIterator.js';

/** Default number of bytes requested from the stream per read: 32 KiB. */
export const DEFAULT_BUFFER_SIZE = 32 * 1024;

export interface CsvDecoderOptions {
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
  /**
   * Canonical header. When omitted (or empty) the first row of the merged
   * stream is adopted as the header.
   */
  readonly header?: readonly string[];
  /**
   * Line terminator. Detected per source from its first line break when
   * omitted. `'\n'` and `'\r\n'` are always accepted together; `'\r'` alone
   * selects old-style CR-only input.
   */
  readonly newline?: Newline;
  /** Quote character. Default: `'"'`. */
  readonly quoteChar?: string;
  /** Strip leading whitespace from every field, before a quote opens it. Default: `true`. */
  readonly trimLeadingSpace?: boolean;
  /** Bytes requested from the stream per read. Default: `32768`. */
  readonly bufferSize?: number;
}

interface ResolvedOptions {
  readonly delimiter: string;
  readonly header: readonly string[] | undefined;
  readonly newline: Newline | undefined;
  readonly quoteChar: string;
  readonly trimLeadingSpace: boolean;
  readonly bufferSize: number;
}

function isSingleCharacter(value: string): boolean {
  return value.length === 1 && value !== '\r' && value !== '\n';
}

/**
 * Decodes a multi-source stream of delimiter-separated text into records,
 * discarding the header row each source repeats.
 *
 * @example
 * ```typescript
 * const decoder = new CsvDecoder({ delimiter: ';' });
 * decoder.on('header:skipped', (e) => console.log(`dropped header of ${e.sourceName}`));
 *
 * for await (const record of await decoder.decode(mux)) {
 *   console.log(record.meta.name, record.toObject());
 * }
 * ```
 */
export class CsvDecoder implements Decoder {
  private readonly options: ResolvedOptions;
  private readonly eventBus = new EventBus();

  constructor(options?: CsvDecoderOptions) {
    this.options = {
      delimiter: options?.delimiter ?? ',',
      header: options?.header && options.header.length > 0 ? [...options.header] : undefined,
      newline: options?.newline,
      quoteChar: options?.quoteChar ?? '"',
      trimLeadingSpace: options?.trimLeadingSpace ?? true,
      bufferSize: options?.bufferSize ?? DEFAULT_BUFFER_SIZE,
    };

    const { delimiter, quoteChar, bufferSize, header } = this.options;
    if (!isSingleCharacter(delimiter)) {
      throw new ConfigurationError(`delimiter must be a single character, got ${JSON.stringify(delimiter)}`);
    }
    if (!isSingleCharacter(quoteChar)) {
      throw new ConfigurationError(`quoteChar must be a single character, got ${JSON.stringify(quoteChar)}`);
    }
    if (delimiter === quoteChar) {
      throw new ConfigurationError('delimiter and quoteChar must differ');
    }
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new ConfigurationError(`bufferSize must be a positive integer, got ${String(bufferSize)}`);
    }
    if (header) validateHeader(header);
  }

  /**
   * Establish the canonical header and return an iterator over the records.
   * Rejects with `ConfigurationError` when no valid header can be obtained;
   * the stream is closed in that case.
   */
  async decode(stream: SourceAwareStream, options?: DecodeOptions): Promise<RecordIterator> {
    const signal = options?.signal;
    const onAbort = (): void => stream.close();
    const release = (): void => signal?.removeEventListener('abort', onAbort);
    if (signal?.aborted) stream.close();
    else signal?.addEventListener('abort', onAbort, { once: true });

    const rows = new CsvRowReader(stream, {
      delimiter: this.options.delimiter,
      quoteChar: this.options.quoteChar,
      newline: this.options.newline,
      trimLeadingSpace: this.options.trimLeadingSpace,
      bufferSize: this.options.bufferSize,
    });

    let header: readonly string[];
    let headerMeta: SourceMeta | null = null;
    try {
      if (this.options.header) {
        header = this.options.header;
      } else {
        const first = await rows.next(signal);
        if (first === null) throw new ConfigurationError('no header: the stream produced no rows');
        validateHeader(first.fields);
        header = first.fields;
        headerMeta = first.meta;
      }
    } catch (error) {
      release();
      stream.close();
      if (signal?.aborted && !(error instanceof CancellationError)) {
        throw new CancellationError('decode cancelled', { cause: signal.reason });
      }
      throw toError(error);
    }

    this.eventBus.emit({
      type: 'header:established',
      names: [...header],
      inferred: headerMeta !== null,
      timestamp: Date.now(),
    });

    return new CsvRecordIterator({ stream, rows, header, headerMeta, eventBus: this.eventBus, signal, release });
  }

  /** Subscribe to decoder events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all decoder events. */
  onAny(handler: WildcardHandler): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: WildcardHandler): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
