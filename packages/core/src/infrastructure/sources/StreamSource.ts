import type { Source, SourceChunk, SourceStream } from '../../domain/ports/Source.js';
import { readableStreamChunks } from './readableStreamChunks.js';

/** Source that wraps an `AsyncIterable` or `ReadableStream`. Ideal for uploads and pipes. Single use. */
export class StreamSource implements Source {
  readonly name: string;
  private readonly stream: AsyncIterable<SourceChunk> | ReadableStream<SourceChunk>;
  private consumed = false;

  constructor(name: string, stream: AsyncIterable<SourceChunk> | ReadableStream<SourceChunk>) {
    this.name = name;
    this.stream = stream;
  }

  open(_signal?: AbortSignal): Promise<SourceStream> {
    if (this.consumed) {
      return Promise.reject(
        new Error('StreamSource: stream has already been consumed. Streams can only be read once.'),
      );
    }
    this.consumed = true;

    const stream = this.stream;
    return Promise.resolve('getReader' in stream ? readableStreamChunks(stream) : stream);
  }
}
