import type { Source, SourceChunk } from './domain/ports/Source.js';
import type { SourceAwareStream, WaitOptions } from './domain/ports/SourceAwareStream.js';
import type { SourceMeta } from './domain/model/SourceMeta.js';
import type { EventType } from './domain/events/DomainEvents.js';
import { NO_SOURCE, advanceMeta, boundaryMeta } from './domain/model/SourceMeta.js';
import {
  CancellationError,
  ConfigurationError,
  OpenError,
  ReadError,
  describeCause,
} from './domain/errors/StreamErrors.js';
import { ChunkPipe } from './application/ChunkPipe.js';
import { BoundaryMailbox } from './application/BoundaryMailbox.js';
import { EventBus, type EventHandler, type WildcardHandler } from './application/EventBus.js';

/** Default size of one handoff chunk: 32 KiB. */
export const DEFAULT_CHUNK_SIZE = 32 * 1024;

/** Configuration for a `StreamMultiplexer`. */
export interface StreamMultiplexerOptions {
  /** Largest chunk handed to the consumer at once, in bytes. Default: `32768`. */
  readonly chunkSize?: number;
  /**
   * External cancellation. Aborting stops the producer, releases the open
   * source, and makes every later `read()` reject with `CancellationError`.
   */
  readonly signal?: AbortSignal;
}

const encoder = new TextEncoder();

function toBytes(chunk: SourceChunk): Uint8Array {
  return typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

/**
 * Streams an ordered list of sources as one byte stream, opening them one at
 * a time and tracking which source produced each byte.
 *
 * A single background producer starts on construction. It opens each source
 * in list order, publishes a boundary (`byteOffset: 0`) before any of its
 * bytes, and hands bytes to the consumer through a one-chunk pipe, so it
 * never runs ahead of `read()` by more than one chunk and never holds more
 * than one source open.
 *
 * Failures are fatal for the whole stream: an open failure surfaces as
 * `OpenError`, a read failure as `ReadError` once every byte already obtained
 * from that source has been delivered.
 *
 * @example
 * ```typescript
 * const mux = new StreamMultiplexer([
 *   new InMemorySource('a.csv', 'id,name\n1,Ann\n'),
 *   new FileSource('/data/b.csv'),
 * ]);
 * const buffer = new Uint8Array(4096);
 * let bytes: number | null;
 * while ((bytes = await mux.read(buffer)) !== null) {
 *   handle(buffer.subarray(0, bytes), mux.current());
 * }
 * ```
 */
export class StreamMultiplexer implements SourceAwareStream, AsyncIterable<Uint8Array> {
  private readonly sources: readonly Source[];
  private readonly chunkSize: number;
  private readonly pipe: ChunkPipe;
  private readonly boundaries = new BoundaryMailbox<SourceMeta>();
  private readonly eventBus = new EventBus();
  private readonly controller = new AbortController();
  private readonly done: Promise<void>;
  private snapshot: SourceMeta = NO_SOURCE;
  private totalBytes = 0;
  private closed = false;
  private detachExternal: () => void = () => undefined;

  constructor(sources: readonly Source[], options?: StreamMultiplexerOptions) {
    const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
    }

    this.sources = [...sources];
    this.chunkSize = chunkSize;
    this.pipe = new ChunkPipe((bytes) => {
      this.snapshot = advanceMeta(this.snapshot, bytes);
      this.totalBytes += bytes;
    });

    const external = options?.signal;
    if (external) {
      if (external.aborted) {
        this.cancel(external);
      } else {
        const onAbort = (): void => this.cancel(external);
        external.addEventListener('abort', onAbort, { once: true });
        this.detachExternal = () => external.removeEventListener('abort', onAbort);
      }
    }

    this.done = this.pump();
  }

  /** Fill `buffer` with merged bytes. Resolves the count, or `null` once every source is exhausted. */
  read(buffer: Uint8Array, options?: WaitOptions): Promise<number | null> {
    return this.pipe.read(buffer, options?.signal);
  }

  /** Non-blocking snapshot of the active source and the bytes of it delivered so far. */
  current(): SourceMeta {
    return this.snapshot;
  }

  /**
   * Resolve the next source boundary. Boundaries coalesce: a late caller sees
   * only the latest one. Resolves `null` once the producer has finished.
   */
  awaitBoundary(signal?: AbortSignal): Promise<SourceMeta | null> {
    return this.boundaries.take(signal);
  }

  /**
   * Stop the producer and release the open source. Idempotent, and never
   * waits for the producer to notice.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.detachExternal();
    this.controller.abort();
    this.pipe.closeRead();
    this.boundaries.close();
    this.eventBus.emit({ type: 'stream:closed', bytesRead: this.totalBytes, timestamp: Date.now() });
  }

  /** Resolves once the producer has exited and released its last source. Never rejects. */
  finished(): Promise<void> {
    return this.done;
  }

  /** Iterate the merged stream as byte chunks of at most `chunkSize` bytes. */
  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (;;) {
      const buffer = new Uint8Array(this.chunkSize);
      const bytes = await this.read(buffer);
      if (bytes === null) return;
      yield buffer.subarray(0, bytes);
    }
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events. */
  onAny(handler: WildcardHandler): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `onAny()`. */
  offAny(handler: WildcardHandler): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  private cancel(signal: AbortSignal): void {
    if (this.stopped) return;
    this.controller.abort();
    this.pipe.closeWrite(new CancellationError('multiplexer cancelled', { cause: signal.reason }));
    this.boundaries.close();
    this.eventBus.emit({ type: 'stream:cancelled', bytesRead: this.totalBytes, timestamp: Date.now() });
  }

  private async pump(): Promise<void> {
    try {
      for (const [index, source] of this.sources.entries()) {
        if (this.stopped) return;
        if (!(await this.stream(source, index))) return;
      }
      this.pipe.closeWrite();
      this.eventBus.emit({
        type: 'stream:completed',
        sourceCount: this.sources.length,
        bytesRead: this.totalBytes,
        timestamp: Date.now(),
      });
    } finally {
      this.detachExternal();
      this.boundaries.close();
    }
  }

  /** Open one source and forward all of its bytes. Resolves `false` when the stream must stop. */
  private async stream(source: Source, index: number): Promise<boolean> {
    let iterator: AsyncIterator<SourceChunk>;
    try {
      const opened = await source.open(this.controller.signal);
      iterator = opened[Symbol.asyncIterator]();
    } catch (error) {
      if (!this.stopped) this.fail(new OpenError(source.name, error), source, index, 'open');
      return false;
    }

    if (this.stopped) {
      await this.release(iterator, source, index);
      return false;
    }

    this.snapshot = boundaryMeta(source.name, index);
    this.boundaries.publish(this.snapshot);
    this.eventBus.emit({ type: 'source:opened', sourceName: source.name, sourceIndex: index, timestamp: Date.now() });

    for (;;) {
      let result: IteratorResult<SourceChunk>;
      try {
        result = await iterator.next();
      } catch (error) {
        // Bytes obtained before the failure were already drained by the consumer.
        if (!this.stopped) this.fail(new ReadError(source.name, error), source, index, 'read');
        return false;
      }

      if (result.done) {
        this.eventBus.emit({
          type: 'source:completed',
          sourceName: source.name,
          sourceIndex: index,
          bytesRead: this.snapshot.byteOffset,
          timestamp: Date.now(),
        });
        return true;
      }

      if (!(await this.forward(toBytes(result.value)))) {
        await this.release(iterator, source, index);
        return false;
      }
    }
  }

  private async forward(bytes: Uint8Array): Promise<boolean> {
    for (let start = 0; start < bytes.length; start += this.chunkSize) {
      if (!(await this.pipe.write(bytes.subarray(start, start + this.chunkSize)))) return false;
    }
    return true;
  }

  private async release(iterator: AsyncIterator<SourceChunk>, source: Source, index: number): Promise<void> {
    try {
      await iterator.return?.();
    } catch (error) {
      this.emitFailure(source, index, 'release', error);
    }
  }

  private fail(error: OpenError | ReadError, source: Source, index: number, phase: 'open' | 'read'): void {
    this.pipe.closeWrite(error);
    this.emitFailure(source, index, phase, error.cause);
  }

  private emitFailure(source: Source, index: number, phase: 'open' | 'read' | 'release', cause: unknown): void {
    this.eventBus.emit({
      type: 'source:failed',
      sourceName: source.name,
      sourceIndex: index,
      phase,
      error: describeCause(cause),
      timestamp: Date.now(),
    });
  }
}
