/**
 * RequestDeduplicator
 * Collapses concurrent reads with the same key onto one network call.
 * Only ever used for idempotent reads.
 */

import { RequestCancelledError } from '../client/errors';

interface PendingRequest {
  key: string;
  promise: Promise<unknown>;
  controller: AbortController;
  waiters: number;
}

export type DedupeFactory<T> = (signal: AbortSignal) => Promise<T>;

export class RequestDeduplicator {
  private pending = new Map<string, PendingRequest>();

  /**
   * Joins the in-flight request for `key`, or starts one with `factory`.
   * Aborting `signal` rejects only this caller; the shared call is aborted
   * once every waiter has gone.
   */
  dedupe<T>(key: string, factory: DedupeFactory<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError());
    }

    let entry = this.pending.get(key);
    if (!entry) {
      entry = this.start(key, factory);
    }

    return this.join<T>(entry, signal);
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Aborts every in-flight call.
   */
  cancelAll(): void {
    for (const entry of this.pending.values()) {
      entry.controller.abort();
    }
    this.pending.clear();
  }

  clear(): void {
    this.pending.clear();
  }

  private start<T>(key: string, factory: DedupeFactory<T>): PendingRequest {
    const controller = new AbortController();
    const run = async (): Promise<T> => factory(controller.signal);

    const entry: PendingRequest = {
      key,
      promise: Promise.resolve(),
      controller,
      waiters: 0,
    };

    entry.promise = run().finally(() => {
      if (this.pending.get(key) === entry) {
        this.pending.delete(key);
      }
    });

    this.pending.set(key, entry);
    return entry;
  }

  private join<T>(entry: PendingRequest, signal?: AbortSignal): Promise<T> {
    entry.waiters += 1;
    const shared = entry.promise as Promise<T>;

    return new Promise<T>((resolve, reject) => {
      let done = false;

      const onAbort = () => {
        if (done) return;
        done = true;
        this.leave(entry);
        reject(new RequestCancelledError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      shared.then(
        (value) => {
          signal?.removeEventListener('abort', onAbort);
          if (done) return;
          done = true;
          resolve(value);
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          if (done) return;
          done = true;
          reject(error);
        },
      );
    });
  }

  private leave(entry: PendingRequest): void {
    entry.waiters -= 1;
    if (entry.waiters > 0) return;
    // the next caller for this key starts a fresh request
    if (this.pending.get(entry.key) === entry) {
      this.pending.delete(entry.key);
    }
    entry.controller.abort();
  }
}
