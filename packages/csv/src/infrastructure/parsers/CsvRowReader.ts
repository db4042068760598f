import Papa, { type Parser } from 'papaparse';
import { ParseError, type SourceAwareStream, type SourceMeta } from '@sourcemux/core';
import { CsvTextScanner } from './CsvTextScanner.js';

/** Line terminators the row reader understands. */
export type Newline = '\n' | '\r\n' | '\r';

/** One parsed row and the provenance of the bytes that completed it. */
export interface CsvRow {
  readonly fields: string[];
  readonly meta: SourceMeta;
}

export interface CsvRowReaderOptions {
  readonly delimiter: string;
  readonly quoteChar: string;
  /**
   * Fixed line terminator. Detected from the first line break of each source
   * when omitted. `\n` and `\r\n` are interchangeable.
   */
  readonly newline?: Newline;
  readonly trimLeadingSpace: boolean;
  /** Bytes requested from the stream per read. */
  readonly bufferSize: number;
}

interface ParserError {
  readonly code: string;
  readonly message: string;
  readonly row: number | undefined;
}

interface ParserOutput {
  readonly rows: string[][];
  readonly errors: ParserError[];
  readonly cursor: number;
}

/** Detect the line terminator from the first line break in `text`, if one is visible yet. */
export function detectNewline(text: string): Newline | undefined {
  const lf = text.indexOf('\n');
  const cr = text.indexOf('\r');
  if (cr !== -1 && (lf === -1 || cr < lf)) {
    if (cr + 1 >= text.length) return undefined;
    return text[cr + 1] === '\n' ? '\r\n' : '\r';
  }
  return lf === -1 ? undefined : '\n';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/** Narrow PapaParse's loosely typed result. */
function readParserOutput(result: unknown): ParserOutput {
  if (!isRecord(result) || !Array.isArray(result.data) || !Array.isArray(result.errors) || !isRecord(result.meta)) {
    throw new ParseError('unexpected parser output');
  }
  const cursor = result.meta.cursor;
  if (typeof cursor !== 'number') throw new ParseError('unexpected parser output');

  const rows = result.data.filter(isStringRow);
  const errors = result.errors.filter(isRecord).map((error) => ({
    code: typeof error.code === 'string' ? error.code : 'Unknown',
    message: typeof error.message === 'string' ? error.message : 'malformed row',
    row: typeof error.row === 'number' ? error.row : undefined,
  }));
  return { rows, errors, cursor };
}

/**
 * Pulls bytes from a `SourceAwareStream` and yields RFC 4180 rows parsed by
 * PapaParse, each tagged with the `SourceMeta` reported right after the read
 * that completed it.
 *
 * Text is decoded as UTF-8 per source and the line terminator is detected
 * per source. A row never spans two sources: text left over when a source
 * ends is flushed as that source's final row. Empty lines are skipped.
 */
export class CsvRowReader {
  private readonly stream: SourceAwareStream;
  private readonly options: CsvRowReaderOptions;
  private readonly buffer: Uint8Array;
  private readonly queue: CsvRow[] = [];
  private readonly scanner: CsvTextScanner;
  private readonly fixedNewline: Newline | undefined;
  private decoder = new TextDecoder('utf-8');
  private parser: Parser | null = null;
  private newline: Newline | undefined;
  private carry = '';
  private carryMeta: SourceMeta | null = null;
  private rowsParsed = 0;
  private failure: ParseError | null = null;
  private ended = false;

  constructor(stream: SourceAwareStream, options: CsvRowReaderOptions) {
    this.stream = stream;
    this.options = options;
    this.buffer = new Uint8Array(options.bufferSize);
    // CRLF is rewritten to LF before tokenizing, so only a bare CR needs its own parser.
    this.fixedNewline = options.newline === undefined || options.newline === '\r' ? options.newline : '\n';
    this.newline = this.fixedNewline;
    this.scanner = new CsvTextScanner({
      delimiter: options.delimiter,
      quoteChar: options.quoteChar,
      trimLeadingSpace: options.trimLeadingSpace,
      normalizeLineEndings: options.newline !== '\r',
    });
  }

  /** Resolve the next row, or `null` at clean end-of-stream. Stream and parse errors reject. */
  async next(signal?: AbortSignal): Promise<CsvRow | null> {
    for (;;) {
      const row = this.queue.shift();
      if (row) return row;
      if (this.failure) throw this.failure;
      if (this.ended) return null;
      await this.fill(signal);
    }
  }

  private async fill(signal?: AbortSignal): Promise<void> {
    const bytes = await this.stream.read(this.buffer, { signal });
    if (bytes === null) {
      this.flush();
      this.ended = true;
      return;
    }

    const meta = this.stream.current();
    if (this.carryMeta !== null && this.carryMeta.sourceIndex !== meta.sourceIndex) {
      this.flush();
      if (this.failure) return;
    }

    this.carry += this.scanner.feed(this.decoder.decode(this.buffer.subarray(0, bytes), { stream: true }));
    this.carryMeta = meta;
    this.parse(false);

    const bareQuote = this.scanner.failure;
    if (bareQuote !== null && this.failure === null) {
      // Rows completed before the offending one are already queued.
      this.failure = new ParseError(`${bareQuote} (row ${String(this.rowsParsed + 1)})`, meta);
      this.ended = true;
      this.carry = '';
    }
  }

  /** End of a source: parse whatever is left as its final row. */
  private flush(): void {
    if (this.carryMeta === null) return;
    this.carry += this.scanner.feed(this.decoder.decode());
    this.carry += this.scanner.end();
    this.parse(true);
    this.carry = '';
    this.carryMeta = null;
    this.decoder = new TextDecoder('utf-8');
    this.parser = null;
    this.newline = this.fixedNewline;
  }

  private parse(final: boolean): void {
    const meta = this.carryMeta;
    if (this.carry === '' || meta === null) return;

    const parser = this.resolveParser(final);
    if (parser === null) return;

    const output = readParserOutput(parser.parse(this.carry, 0, !final));
    // Errors on the still-incomplete last row are re-examined once more text arrives.
    const failure = output.errors.find((error) => final || (error.row !== undefined && error.row < output.rows.length));
    const complete = failure ? output.rows.slice(0, failure.row ?? output.rows.length) : output.rows;

    for (const fields of complete) {
      if (fields.length === 1 && fields[0] === '') continue;
      this.queue.push({ fields, meta });
    }

    if (failure) {
      const row = this.rowsParsed + complete.length + 1;
      // Rows before the malformed one are still served; the error follows them.
      this.failure = new ParseError(`${failure.code}: ${failure.message} (row ${String(row)})`, meta);
      this.ended = true;
      this.carry = '';
      return;
    }

    this.rowsParsed += output.rows.length;
    this.carry = final ? '' : this.carry.slice(output.cursor);
  }

  private resolveParser(final: boolean): Parser | null {
    if (this.parser) return this.parser;

    this.newline ??= detectNewline(this.carry);
    if (this.newline === undefined) {
      // No line break seen yet: either wait for more text or treat it all as one row.
      if (!final) return null;
      this.newline = '\n';
    }

    this.parser = new Papa.Parser({
      delimiter: this.options.delimiter,
      newline: this.newline,
      quoteChar: this.options.quoteChar,
    });
    return this.parser;
  }
}
