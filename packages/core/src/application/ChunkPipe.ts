import { CancellationError, StreamClosedError } from '../domain/errors/StreamErrors.js';

interface PendingRead {
  readonly buffer: Uint8Array;
  readonly resolve: (bytes: number | null) => void;
  readonly reject: (error: Error) => void;
  readonly detach: () => void;
}

/** Build the error a read rejects with when its signal aborts. */
export function cancelledBy(signal: AbortSignal, what: string): CancellationError {
  return new CancellationError(`${what} cancelled`, { cause: signal.reason });
}

/**
 * Synchronous single-chunk handoff between one producer and one consumer.
 *
 * `write()` parks a chunk and resolves once the consumer has drained it, so
 * at most one chunk is buffered at any time. `onConsumed` runs synchronously
 * inside `read()` for every byte count handed out, before the producer is
 * released.
 *
 * Either side may close. Closing the read side refuses pending and future
 * writes (`write()` resolves `false`). Closing the write side with an error
 * makes that error the sticky result of every later read.
 */
export class ChunkPipe {
  private readonly onConsumed: (bytes: number) => void;
  private chunk: Uint8Array | null = null;
  private releaseWriter: ((accepted: boolean) => void) | null = null;
  private pendingRead: PendingRead | null = null;
  private writeClosed = false;
  private writeError: Error | null = null;
  private readClosed = false;

  constructor(onConsumed?: (bytes: number) => void) {
    this.onConsumed = onConsumed ?? (() => undefined);
  }

  /** Hand one chunk to the consumer. Resolves `true` once drained, `false` if the pipe closed first. */
  write(chunk: Uint8Array): Promise<boolean> {
    if (this.readClosed || this.writeClosed) return Promise.resolve(false);
    if (this.releaseWriter !== null) {
      return Promise.reject(new Error('ChunkPipe: write while a previous chunk is still pending'));
    }
    if (chunk.length === 0) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      this.chunk = chunk;
      this.releaseWriter = resolve;

      const waiting = this.pendingRead;
      if (waiting) {
        this.pendingRead = null;
        waiting.detach();
        waiting.resolve(this.take(waiting.buffer));
      }
    });
  }

  /**
   * Copy up to `buffer.length` bytes of the parked chunk into `buffer`.
   * Resolves `null` at clean end-of-stream.
   */
  read(buffer: Uint8Array, signal?: AbortSignal): Promise<number | null> {
    if (this.readClosed) return Promise.reject(new StreamClosedError());
    if (this.pendingRead !== null) {
      return Promise.reject(new Error('ChunkPipe: concurrent reads are not supported'));
    }
    if (buffer.length === 0) return Promise.resolve(0);

    if (this.chunk !== null) return Promise.resolve(this.take(buffer));
    if (this.writeClosed) {
      return this.writeError ? Promise.reject(this.writeError) : Promise.resolve(null);
    }
    if (signal?.aborted) return Promise.reject(cancelledBy(signal, 'read'));

    return new Promise<number | null>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.pendingRead === entry) this.pendingRead = null;
        if (signal) reject(cancelledBy(signal, 'read'));
      };
      const entry: PendingRead = {
        buffer,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pendingRead = entry;
    });
  }

  /** Signal end-of-stream to the consumer, optionally with a terminal error. Only the first call counts. */
  closeWrite(error?: Error): void {
    if (this.writeClosed) return;
    this.writeClosed = true;
    this.writeError = error ?? null;

    if (error) {
      this.chunk = null;
      this.release(false);
    }

    const waiting = this.pendingRead;
    if (waiting) {
      this.pendingRead = null;
      waiting.detach();
      if (error) waiting.reject(error);
      else waiting.resolve(null);
    }
  }

  /** Close the consumer side. Idempotent; never waits for the producer. */
  closeRead(): void {
    if (this.readClosed) return;
    this.readClosed = true;
    this.chunk = null;
    this.release(false);

    const waiting = this.pendingRead;
    if (waiting) {
      this.pendingRead = null;
      waiting.detach();
      waiting.reject(new StreamClosedError());
    }
  }

  private take(buffer: Uint8Array): number {
    const chunk = this.chunk;
    if (chunk === null) return 0;

    const bytes = Math.min(buffer.length, chunk.length);
    buffer.set(chunk.subarray(0, bytes));
    this.chunk = bytes < chunk.length ? chunk.subarray(bytes) : null;
    this.onConsumed(bytes);
    if (this.chunk === null) this.release(true);
    return bytes;
  }

  private release(accepted: boolean): void {
    const release = this.releaseWriter;
    if (release === null) return;
    this.releaseWriter = null;
    release(accepted);
  }
}
