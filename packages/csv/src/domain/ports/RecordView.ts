import type { SourceMeta } from '@sourcemux/core';

/** Read-only access to one decoded record. */
export interface RecordView {
  /** Field at position `index`, or `undefined` when out of range. */
  byIndex(index: number): string | undefined;
  /** Field under header name `name`, or `undefined` when the name is unknown. */
  byName(name: string): string | undefined;
  /** Number of fields. */
  readonly length: number;
  /** Copy of the canonical header names. */
  names(): string[];
  /** Provenance captured when the record was classified. */
  readonly meta: SourceMeta;
  /** Header name to field value. */
  toObject(): Record<string, string>;
}
