import type { Source, SourceStream } from '../../domain/ports/Source.js';

export interface InMemorySourceOptions {
  /** Split the data into chunks of this many bytes. Default: one chunk. */
  readonly chunkSize?: number;
}

/**
 * Source backed by bytes held in memory. Handy for tests and synthetic
 * pipelines where writing temporary files is unnecessary.
 */
export class InMemorySource implements Source {
  readonly name: string;
  private readonly data: Uint8Array;
  private readonly chunkSize: number;

  constructor(name: string, data: string | Uint8Array, options?: InMemorySourceOptions) {
    this.name = name;
    this.data = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    this.chunkSize = options?.chunkSize ?? Math.max(this.data.length, 1);
  }

  /** Size of the data in bytes. */
  get size(): number {
    return this.data.length;
  }

  open(_signal?: AbortSignal): Promise<SourceStream> {
    return Promise.resolve(this.chunks());
  }

  private async *chunks(): AsyncGenerator<Uint8Array> {
    for (let start = 0; start < this.data.length; start += this.chunkSize) {
      yield await Promise.resolve(this.data.subarray(start, start + this.chunkSize));
    }
  }
}
