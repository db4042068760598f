// Main entry points
export { CsvDecoder, DEFAULT_BUFFER_SIZE } from './CsvDecoder.js';
export type { CsvDecoderOptions } from './CsvDecoder.js';
export { decodeSources } from './decodeSources.js';
export type { DecodeSourcesOptions } from './decodeSources.js';

// Ports
export type { Decoder, DecodeOptions, Mapper } from './domain/ports/Decoder.js';
export type { RecordIterator } from './domain/ports/RecordIterator.js';
export type { RecordView } from './domain/ports/RecordView.js';

// Domain model
export { CsvRecord } from './domain/model/CsvRecord.js';
export { validateHeader, buildIndex, matchesHeader } from './domain/model/Header.js';

// Application
export { CsvRecordIterator } from './application/CsvRecordIterator.js';
export type { DecoderState, CsvRecordIteratorInit } from './application/CsvRecordIterator.js';
export { DecodeMapTransform, MappedIterator, MappingError } from './application/DecodeMapTransform.js';

// Infrastructure
export { CsvRowReader, detectNewline } from './infrastructure/parsers/CsvRowReader.js';
export type { CsvRow, CsvRowReaderOptions, Newline } from './infrastructure/parsers/CsvRowReader.js';
