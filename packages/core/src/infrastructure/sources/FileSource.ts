import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import type { Source, SourceStream } from '../../domain/ports/Source.js';

export interface FileSourceOptions {
  /** Display name. Default: the file path. */
  readonly name?: string;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Source that streams a local file. The file is opened eagerly so a missing
 * or unreadable file fails the open rather than the first read. Node.js only.
 */
export class FileSource implements Source {
  readonly name: string;
  readonly path: string;
  private readonly highWaterMark: number;

  constructor(path: string, options?: FileSourceOptions) {
    this.path = path;
    this.name = options?.name ?? path;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async open(signal: AbortSignal): Promise<SourceStream> {
    const handle = await open(this.path, 'r');
    // The stream owns the handle from here on and closes it when it ends or is destroyed.
    return createReadStream(this.path, { fd: handle, highWaterMark: this.highWaterMark, signal });
  }
}
