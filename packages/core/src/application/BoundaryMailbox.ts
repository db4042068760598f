import { cancelledBy } from './ChunkPipe.js';

interface Waiter<T> {
  readonly resolve: (value: T | null) => void;
  readonly detach: () => void;
}

/**
 * Single-slot, overwrite-on-full notification channel.
 *
 * `publish()` never blocks: it hands the value to a waiting taker, or
 * replaces whatever unread value sits in the slot. A late taker therefore
 * sees only the latest value. `close()` drains the slot; every later
 * `take()` resolves `null` immediately.
 */
export class BoundaryMailbox<T> {
  private slot: { readonly value: T } | null = null;
  private waiter: Waiter<T> | null = null;
  private closed = false;

  publish(value: T): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.detach();
      waiter.resolve(value);
      return;
    }
    this.slot = { value };
  }

  take(signal?: AbortSignal): Promise<T | null> {
    const slot = this.slot;
    if (slot) {
      this.slot = null;
      return Promise.resolve(slot.value);
    }
    if (this.closed) return Promise.resolve(null);
    if (signal?.aborted) return Promise.reject(cancelledBy(signal, 'boundary wait'));
    if (this.waiter !== null) {
      return Promise.reject(new Error('BoundaryMailbox: concurrent takers are not supported'));
    }

    return new Promise<T | null>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.waiter === waiter) this.waiter = null;
        if (signal) reject(cancelledBy(signal, 'boundary wait'));
      };
      const waiter: Waiter<T> = {
        resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = waiter;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.slot = null;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.detach();
      waiter.resolve(null);
    }
  }
}
