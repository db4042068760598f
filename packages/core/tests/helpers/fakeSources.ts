import type { Source, SourceStream } from '../../src/domain/ports/Source.js';

/** Counts open handles across every `TrackedSource` sharing it. */
export class OpenTracker {
  open = 0;
  maxOpen = 0;
  readonly opened: string[] = [];
  readonly released: string[] = [];

  enter(name: string): void {
    this.open++;
    this.maxOpen = Math.max(this.maxOpen, this.open);
    this.opened.push(name);
  }

  leave(name: string): void {
    this.open--;
    this.released.push(name);
  }
}

export interface TrackedSourceOptions {
  /** Reject `open()` with this error. */
  readonly openError?: Error;
  /** Throw this error after every chunk has been yielded. */
  readonly readError?: Error;
}

/** In-memory source that records when it is opened and released. */
export class TrackedSource implements Source {
  readonly name: string;
  private readonly chunks: readonly string[];
  private readonly tracker: OpenTracker;
  private readonly options: TrackedSourceOptions;

  constructor(name: string, chunks: readonly string[], tracker: OpenTracker, options: TrackedSourceOptions = {}) {
    this.name = name;
    this.chunks = chunks;
    this.tracker = tracker;
    this.options = options;
  }

  open(): Promise<SourceStream> {
    if (this.options.openError) return Promise.reject(this.options.openError);
    this.tracker.enter(this.name);
    return Promise.resolve(this.stream());
  }

  private async *stream(): AsyncGenerator<Uint8Array> {
    try {
      for (const chunk of this.chunks) {
        yield await Promise.resolve(new TextEncoder().encode(chunk));
      }
      if (this.options.readError) throw this.options.readError;
    } finally {
      this.tracker.leave(this.name);
    }
  }
}

/** Drain a stream-like reader into a string. */
export async function readAll(
  stream: { read(buffer: Uint8Array): Promise<number | null> },
  bufferSize = 64,
): Promise<string> {
  const decoder = new TextDecoder();
  const buffer = new Uint8Array(bufferSize);
  let text = '';
  let count: number | null;
  while ((count = await stream.read(buffer)) !== null) {
    text += decoder.decode(buffer.subarray(0, count), { stream: true });
  }
  return text + decoder.decode();
}
