import { describe, it, expect } from 'vitest';
import { CsvTextScanner, type CsvTextScannerOptions } from '../../../src/infrastructure/parsers/CsvTextScanner.js';

const scanner = (options: Partial<CsvTextScannerOptions> = {}): CsvTextScanner =>
  new CsvTextScanner({
    delimiter: ',',
    quoteChar: '"',
    trimLeadingSpace: true,
    normalizeLineEndings: true,
    ...options,
  });

describe('CsvTextScanner', () => {
  it('should drop whitespace only where a field starts', () => {
    expect(scanner().feed('a,  b c,\t"x, y"\n  d')).toBe('a,b c,"x, y"\nd');
  });

  it('should keep whitespace inside quoted fields', () => {
    expect(scanner().feed('" x",  "a\n  b"')).toBe('" x","a\n  b"');
  });

  it('should pass escaped quotes through', () => {
    expect(scanner().feed('"say ""hi""",ok\n')).toBe('"say ""hi""",ok\n');
  });

  it('should rewrite CRLF as LF across feeds', () => {
    const text = scanner();

    expect(text.feed('a\r')).toBe('a');
    expect(text.feed('\nb\rc')).toBe('\nb\rc');
  });

  it('should hand back a held CR at the end of a source', () => {
    const text = scanner();

    expect(text.feed('a\r')).toBe('a');
    expect(text.end()).toBe('\r');
    expect(text.feed('  b')).toBe('b');
  });

  it('should leave CRLF alone when not normalizing', () => {
    expect(scanner({ normalizeLineEndings: false }).feed('a\r\nb')).toBe('a\r\nb');
  });

  it('should stop at a bare quote', () => {
    const text = scanner();

    expect(text.failure).toBeNull();
    expect(text.feed('1,a"b\n2')).toBe('1,a');
    expect(text.failure).toBe('BareQuote: bare " in non-quoted field');
    expect(text.feed('more')).toBe('');
  });

  it('should leave text after a closing quote to the tokenizer', () => {
    const text = scanner();

    expect(text.feed('"Bo"b"\n')).toBe('"Bo"b"\n');
    expect(text.failure).toBeNull();
  });

  it('should not trim when disabled', () => {
    const text = scanner({ trimLeadingSpace: false });

    expect(text.feed('a, b')).toBe('a, b');
    expect(text.feed(', "x"')).toBe(', ');
    expect(text.failure).toBe('BareQuote: bare " in non-quoted field');
  });
});
