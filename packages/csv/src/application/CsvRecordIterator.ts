import {
  CancellationError,
  ParseError,
  isNewSource,
  toError,
  type EventBus,
  type SourceAwareStream,
  type SourceMeta,
} from '@sourcemux/core';
import type { RecordIterator } from '../domain/ports/RecordIterator.js';
import type { RecordView } from '../domain/ports/RecordView.js';
import { CsvRecord } from '../domain/model/CsvRecord.js';
import { buildIndex, matchesHeader } from '../domain/model/Header.js';
import type { CsvRow, CsvRowReader } from '../infrastructure/parsers/CsvRowReader.js';

/**
 * Classification state of a decode session.
 *
 * - `at-source-start`: the next row opens a source and may be a repeated header.
 * - `normal`: rows are served as they are read.
 * - `pending-serve`: a classified data row waits in the pushback slot.
 * - `exhausted` / `failed`: terminal.
 */
export type DecoderState = 'at-source-start' | 'normal' | 'pending-serve' | 'exhausted' | 'failed';

export interface CsvRecordIteratorInit {
  readonly stream: SourceAwareStream;
  readonly rows: CsvRowReader;
  readonly header: readonly string[];
  /** Meta of the row the header was inferred from, or `null` for a configured header. */
  readonly headerMeta: SourceMeta | null;
  readonly eventBus: EventBus;
  readonly signal?: AbortSignal;
  /** Runs once when the session ends: exhausted, failed or closed. */
  readonly release?: () => void;
}

/**
 * Record iterator that drops the copy of the canonical header found at the
 * start of each source while keeping every other row.
 *
 * The first row after a source boundary is read ahead and classified: an
 * exact copy of the header is discarded (and the next row is classified the
 * same way); anything else is real data and is parked in a one-slot pushback
 * buffer until the following `next()` serves it.
 */
export class CsvRecordIterator implements RecordIterator {
  readonly header: readonly string[];
  private readonly stream: SourceAwareStream;
  private readonly rows: CsvRowReader;
  private readonly index: ReadonlyMap<string, number>;
  private readonly eventBus: EventBus;
  private readonly signal: AbortSignal | undefined;
  private readonly release: () => void;
  private released = false;
  private state: DecoderState = 'normal';
  private pending: CsvRow | null = null;
  private current: CsvRecord | null = null;
  private lastMeta: SourceMeta | null;
  private error: Error | null = null;
  private recordCount = 0;
  private closed = false;

  constructor(init: CsvRecordIteratorInit) {
    this.stream = init.stream;
    this.rows = init.rows;
    this.header = [...init.header];
    this.index = buildIndex(this.header);
    this.lastMeta = init.headerMeta;
    this.eventBus = init.eventBus;
    this.signal = init.signal;
    this.release = init.release ?? (() => undefined);
  }

  /** Current classification state. */
  get decoderState(): DecoderState {
    return this.state;
  }

  async next(): Promise<boolean> {
    this.current = null;

    for (;;) {
      if (this.closed) return false;
      if (this.signal?.aborted && this.state !== 'exhausted' && this.state !== 'failed') {
        this.fail(this.signal.reason);
        return false;
      }

      switch (this.state) {
        case 'exhausted':
        case 'failed':
          return false;

        case 'pending-serve': {
          const row = this.pending;
          this.pending = null;
          this.state = 'normal';
          if (row === null) continue;
          this.serve(row);
          return true;
        }

        case 'at-source-start':
        case 'normal': {
          const atStart = this.state === 'at-source-start';
          const row = await this.readRow();
          if (row === null) return false;

          const classify = atStart || isNewSource(this.lastMeta, row.meta);
          this.lastMeta = row.meta;

          if (!classify) {
            this.serve(row);
            return true;
          }

          if (matchesHeader(this.header, row.fields)) {
            this.state = 'at-source-start';
            this.eventBus.emit({
              type: 'header:skipped',
              sourceName: row.meta.name,
              sourceIndex: row.meta.sourceIndex,
              timestamp: Date.now(),
            });
            continue;
          }

          this.pending = row;
          this.state = 'pending-serve';
          continue;
        }
      }
    }
  }

  record(): RecordView {
    if (this.current === null) {
      throw new Error('CsvRecordIterator: record() called without a successful next()');
    }
    return this.current;
  }

  err(): Error | null {
    return this.error;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = null;
    this.stream.close();
    this.end();
  }

  /** Yield every record, close the stream, and throw the terminal error if there is one. */
  async *[Symbol.asyncIterator](): AsyncGenerator<RecordView> {
    try {
      while (await this.next()) {
        yield this.record();
      }
      if (this.error) throw this.error;
    } finally {
      this.close();
    }
  }

  private serve(row: CsvRow): void {
    this.current = new CsvRecord(row.fields, this.header, this.index, row.meta);
    this.recordCount++;
  }

  /** Read one row and check it against the header, moving to a terminal state when there is none. */
  private async readRow(): Promise<CsvRow | null> {
    let row: CsvRow | null;
    try {
      row = await this.rows.next(this.signal);
    } catch (error) {
      if (this.closed) return null;
      this.fail(error);
      return null;
    }

    if (row === null) {
      this.state = 'exhausted';
      this.end();
      this.eventBus.emit({ type: 'decode:completed', recordCount: this.recordCount, timestamp: Date.now() });
      return null;
    }

    if (row.fields.length !== this.header.length) {
      this.fail(
        new ParseError(
          `wrong number of fields: got ${String(row.fields.length)}, header has ${String(this.header.length)}`,
          row.meta,
        ),
      );
      return null;
    }
    return row;
  }

  private end(): void {
    if (this.released) return;
    this.released = true;
    this.release();
  }

  private fail(cause: unknown): void {
    const signal = this.signal;
    const error =
      signal?.aborted && !(cause instanceof CancellationError)
        ? new CancellationError('decode cancelled', { cause: signal.reason })
        : toError(cause);

    this.state = 'failed';
    this.error = error;
    this.pending = null;
    this.end();
    this.eventBus.emit({
      type: 'decode:failed',
      recordCount: this.recordCount,
      error: error.message,
      timestamp: Date.now(),
    });
  }
}
