export interface CsvTextScannerOptions {
  readonly delimiter: string;
  readonly quoteChar: string;
  readonly trimLeadingSpace: boolean;
  /** Rewrite `\r\n` as `\n`, inside quoted fields too. */
  readonly normalizeLineEndings: boolean;
}

const SPACE = /\s/u;

/**
 * Incremental pass over decoded text that runs ahead of the tokenizer.
 *
 * It tracks field and quote state across chunks so it can drop leading
 * whitespace only where a field starts, letting a quote after the trimmed
 * space open a quoted field. A quote inside an unquoted field stops the
 * scan: `feed()` returns the text before it and `failure` is set.
 */
export class CsvTextScanner {
  private readonly options: CsvTextScannerOptions;
  private fieldStart = true;
  private quoted = false;
  private quotePending = false;
  private afterQuoted = false;
  private crPending = false;
  private bareQuote = false;

  constructor(options: CsvTextScannerOptions) {
    this.options = options;
  }

  /** Message describing the bare quote that stopped the scan, if any. */
  get failure(): string | null {
    return this.bareQuote ? `BareQuote: bare ${this.options.quoteChar} in non-quoted field` : null;
  }

  feed(text: string): string {
    let out = '';
    for (const ch of text) {
      if (this.bareQuote) break;

      if (this.options.normalizeLineEndings) {
        if (this.crPending) {
          this.crPending = false;
          if (ch === '\n') {
            out += this.step('\n');
            continue;
          }
          out += this.step('\r');
        }
        if (ch === '\r') {
          this.crPending = true;
          continue;
        }
      }
      out += this.step(ch);
    }
    return out;
  }

  /** End of a source: return any held-back text and start over for the next one. */
  end(): string {
    const out = this.crPending && !this.bareQuote ? this.step('\r') : '';
    this.fieldStart = true;
    this.quoted = false;
    this.quotePending = false;
    this.afterQuoted = false;
    this.crPending = false;
    return out;
  }

  private step(ch: string): string {
    const { delimiter, quoteChar, trimLeadingSpace } = this.options;

    if (this.quoted) {
      if (!this.quotePending) {
        if (ch === quoteChar) this.quotePending = true;
        return ch;
      }
      this.quotePending = false;
      if (ch === quoteChar) return ch;
      this.quoted = false;
      this.afterQuoted = true;
    }

    if (ch === delimiter || ch === '\n' || ch === '\r') {
      this.fieldStart = true;
      this.afterQuoted = false;
      return ch;
    }

    if (this.fieldStart) {
      if (trimLeadingSpace && SPACE.test(ch)) return '';
      this.fieldStart = false;
      if (ch === quoteChar) this.quoted = true;
      return ch;
    }

    // Text after a closing quote is left to the tokenizer to reject.
    if (ch === quoteChar && !this.afterQuoted) {
      this.bareQuote = true;
      return '';
    }
    return ch;
  }
}
