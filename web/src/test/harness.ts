/**
 * Test wiring: in-memory storage, a scripted fetch and no-op backoff.
 */

import { vi } from 'vitest';
import { DEFAULT_CLIENT_CONFIG, type ClientConfig } from '../config';
import { ResponseCache } from '../cache/ResponseCache';
import { RequestDeduplicator } from '../cache/RequestDeduplicator';
import { MemoryStorage } from '../client/storage';
import { DomainError } from '../client/errors';
import { OfflineQueue } from '../client/OfflineQueue';
import { TokenStore } from '../client/authTokens';
import { ConnectivityMonitor } from '../client/ConnectivityMonitor';
import { EventBus } from '../client/EventBus';
import { TransportClient, type FetchInit, type FetchResponseLike } from '../client/TransportClient';
import { InvalidationService } from '../cache/InvalidationService';
import { FeedbackService } from '../services/feedbackService';
import { MemberService } from '../services/memberService';

function toArrayBuffer(text: string): ArrayBuffer {
  const encoded = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(encoded.byteLength);
  new Uint8Array(buffer).set(encoded);
  return buffer;
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): FetchResponseLike {
  const lower = Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: `status ${status}`,
    headers: { get: (name: string) => lower[name.toLowerCase()] ?? null },
    json: async () => body,
    arrayBuffer: async () => toArrayBuffer(JSON.stringify(body)),
  };
}

export function bytesResponse(text: string, contentType: string): FetchResponseLike {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: { get: (name: string) => (name.toLowerCase() === 'content-type' ? contentType : null) },
    json: async () => {
      throw new SyntaxError('not json');
    },
    arrayBuffer: async () => toArrayBuffer(text),
  };
}

/**
 * A fetch that never settles until its signal aborts.
 */
export function hangingFetch() {
  return (_url: string, init: FetchInit) =>
    new Promise<FetchResponseLike>((_resolve, reject) => {
      init.signal.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
    });
}

export type FetchMock = ReturnType<typeof createFetchMock>;

export function createFetchMock() {
  return vi.fn(async (_url: string, _init: FetchInit): Promise<FetchResponseLike> => jsonResponse(200, {}));
}

export interface HarnessOptions {
  online?: boolean;
  config?: Partial<ClientConfig>;
  refreshToken?: () => Promise<string | null>;
}

export function createHarness(options: HarnessOptions = {}) {
  const config: ClientConfig = { ...DEFAULT_CLIENT_CONFIG, baseUrl: 'https://gateway.test', ...options.config };
  const storage = new MemoryStorage();
  const fetchMock = createFetchMock();
  const cache = new ResponseCache({ ttlMs: config.cacheTtlMs, storage });
  const deduplicator = new RequestDeduplicator();
  const queue = new OfflineQueue({ storage, maxAgeMs: config.offlineMaxAgeMs });
  const tokens = new TokenStore(storage, config.authTokenKey);
  const connectivity = new ConnectivityMonitor({ initialOnline: options.online ?? true });
  const events = new EventBus();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);

  const transport = new TransportClient({
    config,
    cache,
    deduplicator,
    queue,
    tokens,
    connectivity,
    events,
    fetch: fetchMock,
    sleep,
    refreshToken: options.refreshToken,
  });

  return { config, storage, fetchMock, cache, deduplicator, queue, tokens, connectivity, events, sleep, transport };
}

export const FIXED_NOW = new Date('2026-03-02T10:00:00.000Z');

/**
 * Transport harness plus both entity services on a fixed clock.
 */
export function createServiceHarness(options: HarnessOptions = {}) {
  const harness = createHarness(options);
  const invalidation = new InvalidationService(harness.cache);
  const deps = { transport: harness.transport, invalidation, config: harness.config, now: () => FIXED_NOW };
  return { ...harness, invalidation, feedback: new FeedbackService(deps), members: new MemberService(deps) };
}

/**
 * Unsigned JWT with the given expiry (seconds since epoch).
 */
export function makeToken(exp: number, sub = 'user-1'): string {
  const encode = (value: unknown) =>
    btoa(JSON.stringify(value)).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
  return `${encode({ alg: 'none', typ: 'JWT' })}.${encode({ sub, exp })}.signature`;
}

export function identity(raw: unknown): unknown {
  return raw;
}

/**
 * Resolves with the DomainError a promise rejects with.
 */
export async function failure(promise: Promise<unknown>): Promise<DomainError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof DomainError)) throw new Error('expected a DomainError');
  return error;
}
