import type { SourceMeta } from '@sourcemux/core';
import type { RecordView } from '../ports/RecordView.js';

/** `RecordView` over one CSV row. The name index is shared by every record of a session. */
export class CsvRecord implements RecordView {
  readonly meta: SourceMeta;
  private readonly fields: readonly string[];
  private readonly header: readonly string[];
  private readonly index: ReadonlyMap<string, number>;

  constructor(
    fields: readonly string[],
    header: readonly string[],
    index: ReadonlyMap<string, number>,
    meta: SourceMeta,
  ) {
    this.fields = fields;
    this.header = header;
    this.index = index;
    this.meta = meta;
  }

  get length(): number {
    return this.fields.length;
  }

  byIndex(index: number): string | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    return this.fields[index];
  }

  byName(name: string): string | undefined {
    const position = this.index.get(name);
    return position === undefined ? undefined : this.fields[position];
  }

  names(): string[] {
    return [...this.header];
  }

  toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    this.header.forEach((name, position) => {
      result[name] = this.fields[position] ?? '';
    });
    return result;
  }
}
