import type { RecordView } from './RecordView.js';

/**
 * Forward-only iterator over decoded records.
 *
 * `next()` resolves `false` both at clean end-of-stream and after a terminal
 * error; check `err()` to tell them apart.
 *
 * @example
 * ```typescript
 * const records = await decoder.decode(mux);
 * try {
 *   while (await records.next()) {
 *     const record = records.record();
 *     console.log(record.meta.name, record.byName('id'));
 *   }
 *   const error = records.err();
 *   if (error) throw error;
 * } finally {
 *   records.close();
 * }
 * ```
 */
export interface RecordIterator extends AsyncIterable<RecordView> {
  /** Canonical header every record is validated against. */
  readonly header: readonly string[];
  /** Advance to the next record. */
  next(): Promise<boolean>;
  /** The record served by the last successful `next()`. Throws if there is none. */
  record(): RecordView;
  /** The sticky terminal error, or `null` if iteration has not failed. */
  err(): Error | null;
  /** Close the underlying stream. Safe to call more than once. */
  close(): void;
}
