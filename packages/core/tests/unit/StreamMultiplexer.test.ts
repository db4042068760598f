import { describe, it, expect, vi } from 'vitest';
import { StreamMultiplexer } from '../../src/StreamMultiplexer.js';
import { InMemorySource } from '../../src/infrastructure/sources/InMemorySource.js';
import {
  CancellationError,
  ConfigurationError,
  OpenError,
  ReadError,
  StreamClosedError,
} from '../../src/domain/errors/StreamErrors.js';
import { NO_SOURCE } from '../../src/domain/model/SourceMeta.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { OpenTracker, TrackedSource, readAll } from '../helpers/fakeSources.js';

const decode = (buffer: Uint8Array, count: number | null): string =>
  new TextDecoder().decode(buffer.subarray(0, count ?? 0));

describe('StreamMultiplexer', () => {
  describe('reading', () => {
    it('should concatenate sources in list order', async () => {
      const mux = new StreamMultiplexer([
        new InMemorySource('a', 'alpha\n'),
        new InMemorySource('b', 'beta\n'),
        new InMemorySource('c', 'gamma\n'),
      ]);

      expect(await readAll(mux)).toBe('alpha\nbeta\ngamma\n');
    });

    it('should resolve null immediately for an empty source list', async () => {
      const mux = new StreamMultiplexer([]);

      expect(await mux.read(new Uint8Array(8))).toBeNull();
      expect(await mux.awaitBoundary()).toBeNull();
      expect(mux.current()).toEqual(NO_SOURCE);
    });

    it('should skip empty sources', async () => {
      const mux = new StreamMultiplexer([
        new InMemorySource('a', ''),
        new InMemorySource('b', 'x'),
        new InMemorySource('c', ''),
      ]);

      expect(await readAll(mux)).toBe('x');
    });

    it('should never hand out more than chunkSize bytes per read', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'abcdefgh')], { chunkSize: 3 });
      const buffer = new Uint8Array(16);

      expect(await mux.read(buffer)).toBe(3);
      expect(decode(buffer, 3)).toBe('abc');
      expect(await mux.read(buffer)).toBe(3);
      expect(await mux.read(buffer)).toBe(2);
      expect(decode(buffer, 2)).toBe('gh');
      expect(await mux.read(buffer)).toBeNull();
    });

    it('should accept string chunks from a source', async () => {
      const mux = new StreamMultiplexer([
        {
          name: 'text',
          open: () =>
            Promise.resolve(
              (async function* () {
                yield await Promise.resolve('héllo');
              })(),
            ),
        },
      ]);

      expect(await readAll(mux)).toBe('héllo');
    });

    it('should iterate the merged stream as byte chunks', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'ab'), new InMemorySource('b', 'cd')]);
      const chunks: string[] = [];

      for await (const chunk of mux) {
        chunks.push(new TextDecoder().decode(chunk));
      }

      expect(chunks).toEqual(['ab', 'cd']);
    });

    it('should reject a non-positive chunkSize', () => {
      expect(() => new StreamMultiplexer([], { chunkSize: 0 })).toThrow(ConfigurationError);
      expect(() => new StreamMultiplexer([], { chunkSize: 1.5 })).toThrow(ConfigurationError);
    });
  });

  describe('provenance', () => {
    it('should report the source and offset of the bytes just read', async () => {
      const mux = new StreamMultiplexer([
        new InMemorySource('a.csv', 'abcdef', { chunkSize: 4 }),
        new InMemorySource('b.csv', 'xyz'),
      ]);
      const buffer = new Uint8Array(16);

      expect(await mux.read(buffer)).toBe(4);
      expect(mux.current()).toEqual({ name: 'a.csv', byteOffset: 4, sourceIndex: 0 });

      expect(await mux.read(buffer)).toBe(2);
      expect(mux.current()).toEqual({ name: 'a.csv', byteOffset: 6, sourceIndex: 0 });

      expect(await mux.read(buffer)).toBe(3);
      expect(mux.current()).toEqual({ name: 'b.csv', byteOffset: 3, sourceIndex: 1 });
    });

    it('should report the boundary of a source before its bytes', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'AA'), new InMemorySource('b', 'BB')]);
      const buffer = new Uint8Array(16);

      expect(await mux.awaitBoundary()).toEqual({ name: 'a', byteOffset: 0, sourceIndex: 0 });
      expect(await mux.read(buffer)).toBe(2);

      const boundary = mux.awaitBoundary();
      const read = mux.read(buffer);

      expect(await boundary).toEqual({ name: 'b', byteOffset: 0, sourceIndex: 1 });
      expect(await read).toBe(2);
      expect(decode(buffer, 2)).toBe('BB');
    });

    it('should publish the next boundary once a source is read to its end', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'AAAAA'), new InMemorySource('b', 'BB')]);
      const buffer = new Uint8Array(16);

      expect(await mux.awaitBoundary()).toEqual({ name: 'a', byteOffset: 0, sourceIndex: 0 });
      expect(await mux.read(buffer)).toBe(5);
      expect(mux.current()).toEqual({ name: 'a', byteOffset: 5, sourceIndex: 0 });

      expect(await mux.awaitBoundary()).toEqual({ name: 'b', byteOffset: 0, sourceIndex: 1 });
      expect(mux.current()).toEqual({ name: 'b', byteOffset: 0, sourceIndex: 1 });
      expect(await mux.read(buffer)).toBe(2);
      expect(await mux.awaitBoundary()).toBeNull();
    });

    it('should coalesce boundaries nobody waited for', async () => {
      const mux = new StreamMultiplexer([
        new InMemorySource('a', 'A'),
        new InMemorySource('b', ''),
        new InMemorySource('c', 'C'),
      ]);
      const buffer = new Uint8Array(16);

      await mux.read(buffer);
      await mux.read(buffer);

      expect(await mux.awaitBoundary()).toEqual({ name: 'c', byteOffset: 0, sourceIndex: 2 });
    });

    it('should tell apart two sources sharing a name', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('same', 'A'), new InMemorySource('same', 'B')]);
      const buffer = new Uint8Array(16);

      await mux.read(buffer);
      expect(mux.current().sourceIndex).toBe(0);
      await mux.read(buffer);
      expect(mux.current()).toEqual({ name: 'same', byteOffset: 1, sourceIndex: 1 });
    });
  });

  describe('failures', () => {
    it('should fail with OpenError and never open later sources', async () => {
      const tracker = new OpenTracker();
      const mux = new StreamMultiplexer([
        new TrackedSource('a', ['ok'], tracker),
        new TrackedSource('b', [], tracker, { openError: new Error('permission denied') }),
        new TrackedSource('c', ['never'], tracker),
      ]);
      const buffer = new Uint8Array(16);

      expect(await mux.read(buffer)).toBe(2);
      const failure = mux.read(buffer);

      await expect(failure).rejects.toBeInstanceOf(OpenError);
      await expect(failure).rejects.toThrow('open b: permission denied');
      await expect(mux.read(buffer)).rejects.toBeInstanceOf(OpenError);
      await mux.finished();
      expect(tracker.opened).toEqual(['a']);
    });

    it('should deliver bytes read before a failure, then ReadError', async () => {
      const tracker = new OpenTracker();
      const mux = new StreamMultiplexer([
        new TrackedSource('a', ['one', 'two'], tracker, { readError: new Error('connection reset') }),
      ]);
      const buffer = new Uint8Array(16);

      expect(await mux.read(buffer)).toBe(3);
      expect(decode(buffer, 3)).toBe('one');
      expect(await mux.read(buffer)).toBe(3);
      expect(decode(buffer, 3)).toBe('two');

      const failure = mux.read(buffer);
      await expect(failure).rejects.toBeInstanceOf(ReadError);
      await expect(failure).rejects.toThrow('read a: connection reset');
    });

    it('should expose the original error as the cause', async () => {
      const cause = new Error('ENOENT');
      const mux = new StreamMultiplexer([
        { name: 'missing', open: () => Promise.reject(cause) },
      ]);

      const error: unknown = await mux.read(new Uint8Array(4)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OpenError);
      expect(error instanceof OpenError && error.cause).toBe(cause);
      expect(error instanceof OpenError && error.sourceName).toBe('missing');
    });
  });

  describe('resources', () => {
    it('should hold at most one source open at a time', async () => {
      const tracker = new OpenTracker();
      const mux = new StreamMultiplexer([
        new TrackedSource('a', ['1', '2'], tracker),
        new TrackedSource('b', ['3'], tracker),
        new TrackedSource('c', ['4', '5'], tracker),
      ]);

      expect(await readAll(mux)).toBe('12345');
      await mux.finished();

      expect(tracker.maxOpen).toBe(1);
      expect(tracker.opened).toEqual(['a', 'b', 'c']);
      expect(tracker.released).toEqual(['a', 'b', 'c']);
    });

    it('should release the open source on close', async () => {
      const tracker = new OpenTracker();
      const mux = new StreamMultiplexer([
        new TrackedSource('a', ['1', '2', '3'], tracker),
        new TrackedSource('b', ['4'], tracker),
      ]);

      await mux.read(new Uint8Array(8));
      mux.close();
      await mux.finished();

      expect(tracker.open).toBe(0);
      expect(tracker.opened).toEqual(['a']);
    });
  });

  describe('close', () => {
    it('should be idempotent and make later reads fail', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'abc')]);
      const closed = vi.fn();
      mux.on('stream:closed', closed);

      mux.close();
      mux.close();

      expect(closed).toHaveBeenCalledOnce();
      await expect(mux.read(new Uint8Array(4))).rejects.toBeInstanceOf(StreamClosedError);
      expect(await mux.awaitBoundary()).toBeNull();
    });

    it('should fail a read that is waiting when close is called', async () => {
      const mux = new StreamMultiplexer([
        {
          name: 'slow',
          open: () => new Promise(() => undefined),
        },
      ]);

      const pending = mux.read(new Uint8Array(4));
      mux.close();

      await expect(pending).rejects.toBeInstanceOf(StreamClosedError);
    });
  });

  describe('cancellation', () => {
    it('should fail reads with CancellationError once the signal aborts', async () => {
      const controller = new AbortController();
      const mux = new StreamMultiplexer([new InMemorySource('a', 'abc')], { signal: controller.signal });
      const cancelled = vi.fn();
      mux.on('stream:cancelled', cancelled);

      controller.abort();

      await expect(mux.read(new Uint8Array(4))).rejects.toBeInstanceOf(CancellationError);
      expect(cancelled).toHaveBeenCalledOnce();
    });

    it('should start cancelled with an already aborted signal', async () => {
      const mux = new StreamMultiplexer([new InMemorySource('a', 'abc')], { signal: AbortSignal.abort() });

      await expect(mux.read(new Uint8Array(4))).rejects.toBeInstanceOf(CancellationError);
    });

    it('should detach from the signal once the stream ends or closes', async () => {
      const finished = new AbortController();
      const finishedRemove = vi.spyOn(finished.signal, 'removeEventListener');
      const drained = new StreamMultiplexer([new InMemorySource('a', 'abc')], { signal: finished.signal });

      await readAll(drained);
      await drained.finished();
      expect(finishedRemove).toHaveBeenCalledWith('abort', expect.any(Function));

      const closing = new AbortController();
      const closingRemove = vi.spyOn(closing.signal, 'removeEventListener');
      const closed = new StreamMultiplexer([new InMemorySource('a', 'abc')], { signal: closing.signal });

      closed.close();
      expect(closingRemove).toHaveBeenCalledWith('abort', expect.any(Function));
    });

    it('should fail a waiting read with CancellationError when its own signal aborts', async () => {
      const mux = new StreamMultiplexer([{ name: 'slow', open: () => new Promise(() => undefined) }]);
      const controller = new AbortController();

      const pending = mux.read(new Uint8Array(4), { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancellationError);
      mux.close();
    });
  });

  describe('events', () => {
    it('should emit lifecycle events in order', async () => {
      const events: DomainEvent[] = [];
      const mux = new StreamMultiplexer([new InMemorySource('a', 'xy'), new InMemorySource('b', 'z')]);
      mux.onAny((event) => events.push(event));

      await readAll(mux);
      await mux.finished();

      expect(events.map((event) => event.type)).toEqual([
        'source:opened',
        'source:completed',
        'source:opened',
        'source:completed',
        'stream:completed',
      ]);
      expect(events[1]).toMatchObject({ sourceName: 'a', bytesRead: 2 });
      expect(events[4]).toMatchObject({ sourceCount: 2, bytesRead: 3 });
    });

    it('should report an open failure with its phase', async () => {
      const failed = vi.fn();
      const mux = new StreamMultiplexer([{ name: 'bad', open: () => Promise.reject(new Error('nope')) }]);
      mux.on('source:failed', failed);

      await expect(mux.read(new Uint8Array(4))).rejects.toBeInstanceOf(OpenError);

      expect(failed).toHaveBeenCalledWith(
        expect.objectContaining({ sourceName: 'bad', sourceIndex: 0, phase: 'open', error: 'nope' }),
      );
    });
  });
});
