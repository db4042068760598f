// Main entry point
export { StreamMultiplexer, DEFAULT_CHUNK_SIZE } from './StreamMultiplexer.js';
export type { StreamMultiplexerOptions } from './StreamMultiplexer.js';

// Domain model
export type { SourceMeta } from './domain/model/SourceMeta.js';
export { NO_SOURCE, boundaryMeta, advanceMeta, isNewSource } from './domain/model/SourceMeta.js';

// Errors
export type { StreamErrorCode } from './domain/errors/StreamErrors.js';
export {
  SourceMuxError,
  ConfigurationError,
  OpenError,
  ReadError,
  ParseError,
  CancellationError,
  StreamClosedError,
  describeCause,
  toError,
} from './domain/errors/StreamErrors.js';

// Ports (for custom implementations)
export type { Source, SourceChunk, SourceStream } from './domain/ports/Source.js';
export type { SourceAwareStream, WaitOptions } from './domain/ports/SourceAwareStream.js';

// Application internals (for @sourcemux/csv and other decoder packages)
export { EventBus } from './application/EventBus.js';
export type { EventHandler, WildcardHandler } from './application/EventBus.js';
export { ChunkPipe } from './application/ChunkPipe.js';
export { BoundaryMailbox } from './application/BoundaryMailbox.js';

// Source resolution
export { resolveSources, detectScheme, createResolverRegistry, defaultResolvers } from './application/resolveSources.js';
export type { SourceResolver, ResolverRegistry } from './application/resolveSources.js';
export { resolveFileSources, normalizeFileSpec, wildcardToRegExp } from './infrastructure/resolvers/resolveFileSources.js';
export { resolveUrlSources } from './infrastructure/resolvers/resolveUrlSources.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SourceOpenedEvent,
  SourceCompletedEvent,
  SourceFailedEvent,
  StreamCompletedEvent,
  StreamClosedEvent,
  StreamCancelledEvent,
  HeaderEstablishedEvent,
  HeaderSkippedEvent,
  DecodeCompletedEvent,
  DecodeFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources)
export { InMemorySource } from './infrastructure/sources/InMemorySource.js';
export type { InMemorySourceOptions } from './infrastructure/sources/InMemorySource.js';
export { FileSource } from './infrastructure/sources/FileSource.js';
export type { FileSourceOptions } from './infrastructure/sources/FileSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export { UrlSource } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions } from './infrastructure/sources/UrlSource.js';
