import { describe, it, expect, vi } from 'vitest';
import { RequestDeduplicator } from './RequestDeduplicator';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestDeduplicator', () => {
  it('should deduplicate concurrent requests with same key', async () => {
    const dedup = new RequestDeduplicator();
    let calls = 0;

    const task = () =>
      dedup.dedupe('key', async () => {
        calls += 1;
        await new Promise((resolve) => setTimeout(resolve, 10));
        return 'ok';
      });

    const [a, b] = await Promise.all([task(), task()]);
    expect(a).toBe('ok');
    expect(b).toBe('ok');
    expect(calls).toBe(1);
  });

  it('should allow new request after completion', async () => {
    const dedup = new RequestDeduplicator();
    let calls = 0;

    await dedup.dedupe('key', async () => {
      calls += 1;
      return 'first';
    });

    const second = await dedup.dedupe('key', async () => {
      calls += 1;
      return 'second';
    });

    expect(second).toBe('second');
    expect(calls).toBe(2);
  });

  it('should remove the registration when the request fails', async () => {
    const dedup = new RequestDeduplicator();

    await expect(
      dedup.dedupe('key', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(dedup.has('key')).toBe(false);
  });

  it('should turn a synchronous factory throw into a rejection', async () => {
    const dedup = new RequestDeduplicator();
    const factory = (): Promise<string> => {
      throw new Error('sync');
    };

    await expect(dedup.dedupe('key', factory)).rejects.toThrow('sync');
    expect(dedup.size).toBe(0);
  });

  it('should reject only the caller that cancelled', async () => {
    const dedup = new RequestDeduplicator();
    const gate = deferred<string>();
    const factory = vi.fn((_signal: AbortSignal) => gate.promise);
    const controller = new AbortController();

    const first = dedup.dedupe('key', factory, controller.signal);
    const second = dedup.dedupe('key', factory);

    controller.abort();
    await expect(first).rejects.toMatchObject({ name: 'AbortError' });

    const sharedSignal = factory.mock.calls[0][0];
    expect(sharedSignal.aborted).toBe(false);

    gate.resolve('value');
    await expect(second).resolves.toBe('value');
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('should abort the shared call once every waiter cancelled', async () => {
    const dedup = new RequestDeduplicator();
    const gate = deferred<string>();
    const factory = vi.fn((_signal: AbortSignal) => gate.promise);
    const a = new AbortController();
    const b = new AbortController();

    const first = dedup.dedupe('key', factory, a.signal);
    const second = dedup.dedupe('key', factory, b.signal);

    a.abort();
    b.abort();

    await expect(first).rejects.toMatchObject({ name: 'AbortError' });
    await expect(second).rejects.toMatchObject({ name: 'AbortError' });
    expect(factory.mock.calls[0][0].aborted).toBe(true);
    expect(dedup.has('key')).toBe(false);

    gate.reject(new Error('aborted'));
  });

  it('should start a fresh call for a key whose waiters all cancelled', async () => {
    const dedup = new RequestDeduplicator();
    const gate = deferred<string>();
    let calls = 0;
    const factory = vi.fn((_signal: AbortSignal) => {
      calls += 1;
      return calls === 1 ? gate.promise : Promise.resolve('fresh');
    });
    const controller = new AbortController();

    const cancelled = dedup.dedupe('key', factory, controller.signal);
    controller.abort();
    const next = dedup.dedupe('key', factory);

    await expect(cancelled).rejects.toMatchObject({ name: 'AbortError' });
    await expect(next).resolves.toBe('fresh');
    expect(factory).toHaveBeenCalledTimes(2);

    gate.reject(new Error('aborted'));
    await vi.waitFor(() => expect(dedup.has('key')).toBe(false));
  });
});
