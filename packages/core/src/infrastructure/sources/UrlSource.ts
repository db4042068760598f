import type { Source, SourceChunk, SourceStream } from '../../domain/ports/Source.js';
import { readableStreamChunks } from './readableStreamChunks.js';

export interface UrlSourceOptions {
  /** Custom HTTP headers to send with the request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Time allowed for the response headers to arrive, in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
  /** Display name. Default: the URL. */
  readonly name?: string;
}

/**
 * Source that streams an HTTP response body using the Fetch API.
 *
 * A non-2xx status fails the open. Requires a runtime with global `fetch`
 * (Node.js >= 18).
 */
export class UrlSource implements Source {
  readonly name: string;
  readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;

  constructor(url: string, options?: UrlSourceOptions) {
    this.url = url;
    this.name = options?.name ?? url;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30000;
  }

  async open(signal: AbortSignal): Promise<SourceStream> {
    const controller = new AbortController();
    const abort = (): void => controller.abort(signal.reason);
    const detach = (): void => signal.removeEventListener('abort', abort);

    // Attached until the body is released, so closing the multiplexer also aborts an in-flight body.
    if (signal.aborted) abort();
    else signal.addEventListener('abort', abort, { once: true });

    try {
      const response = await this.fetchWithTimeout(controller);
      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`HTTP ${String(response.status)} ${response.statusText}`);
      }
      return body(response, detach);
    } catch (error) {
      detach();
      throw error;
    }
  }

  private async fetchWithTimeout(controller: AbortController): Promise<Response> {
    const timeoutId = setTimeout(() => {
      controller.abort(new Error(`timed out after ${String(this.timeout)}ms`));
    }, this.timeout);

    try {
      return await fetch(this.url, {
        headers: { ...this.headers },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function* body(response: Response, detach: () => void): AsyncGenerator<SourceChunk> {
  try {
    if (response.body) {
      yield* readableStreamChunks(response.body);
    } else {
      yield await response.text();
    }
  } finally {
    detach();
  }
}
