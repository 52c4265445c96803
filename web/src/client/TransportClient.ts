/**
 * TransportClient
 * Single point of outbound HTTP. Reads go through cache, dedup and retry;
 * mutations are sent once (or queued while offline) and invalidate the
 * cache prefixes they make stale.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ClientConfig } from '../config';
import { ResponseCache, type ParamValue } from '../cache/ResponseCache';
import type { RequestDeduplicator } from '../cache/RequestDeduplicator';
import { createLogger, type Logger } from '../utils/logger';
import type { TokenStore } from './authTokens';
import type { ConnectivityMonitor } from './ConnectivityMonitor';
import type { EventBus, ClientEventMap } from './EventBus';
import {
  classify,
  DomainError,
  ErrorKind,
  HttpResponseError,
  RequestCancelledError,
  RequestTimeoutError,
  type HeaderReader,
} from './errors';
import type { DrainResult, MutationMethod, OfflineQueue, QueuedOperation, RequestSpec } from './OfflineQueue';
import { RequestMetrics, type RequestMetricsSnapshot } from './RequestMetrics';
import { withRetry, type Sleep } from './RetryController';

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | MutationMethod;

export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/**
 * The part of a fetch `Response` the transport reads.
 */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: HeaderReader;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export type Params = Record<string, ParamValue>;

export type TransportConfig = Pick<
  ClientConfig,
  'baseUrl' | 'requestTimeoutMs' | 'retryCount' | 'retryBaseDelayMs' | 'clientVersion' | 'clientPlatform'
>;

export interface TransportClientOptions {
  config: TransportConfig;
  cache: ResponseCache;
  deduplicator: RequestDeduplicator;
  queue: OfflineQueue;
  tokens: TokenStore;
  connectivity: ConnectivityMonitor;
  events: EventBus<ClientEventMap>;
  metrics?: RequestMetrics;
  fetch?: FetchLike;
  sleep?: Sleep;
  /** Obtains a new bearer token after a 401; null means refresh failed */
  refreshToken?: () => Promise<string | null>;
  logger?: Logger;
}

export interface RequestOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface GetOptions<T> extends RequestOptions {
  params?: Params;
  decode: (raw: unknown) => T;
  /** Skip the cached copy and revalidate with If-None-Match */
  forceRefresh?: boolean;
  /** Neither read nor fill the cache */
  skipCache?: boolean;
}

export interface MutationOptions<T> extends RequestOptions {
  body?: unknown;
  params?: Params;
  decode: (raw: unknown) => T;
  /** Cache prefixes dropped after success */
  invalidate?: string[];
  /** Path whose cache entry is filled with the decoded response */
  cacheAs?: (data: T) => string;
  /** Use the full retry budget; only for requests safe to repeat */
  idempotent?: boolean;
  /** Queue while offline (default true) */
  queueable?: boolean;
}

export interface BytesOptions extends RequestOptions {
  params?: Params;
  accept?: string;
}

export interface BinaryPayload {
  bytes: Uint8Array;
  contentType: string | null;
}

interface SendInit extends RequestOptions {
  params?: Params;
  body?: unknown;
  correlationId: string;
  ifNoneMatch?: string;
}

interface SendResult<R> {
  status: number;
  body: R;
  headers: HeaderReader;
}

type ResponseReader<R> = (response: FetchResponseLike) => Promise<R>;

const readJsonBody: ResponseReader<unknown> = async (response) =>
  response.status === 204 || response.status === 304 ? undefined : response.json();

const readBytesBody: ResponseReader<Uint8Array> = async (response) => new Uint8Array(await response.arrayBuffer());

async function readErrorBody(response: FetchResponseLike): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}

/**
 * Appends params as a query string; arrays repeat their key.
 */
export function buildQuery(params: Params = {}): string {
  const search = new URLSearchParams();
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value === null || value === undefined || value === '') continue;
    const values: readonly unknown[] = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item === null || item === undefined) continue;
      search.append(key, item instanceof Date ? item.toISOString() : typeof item === 'object' ? JSON.stringify(item) : String(item));
    }
  }
  return search.toString();
}

function withQuery(path: string, params?: Params): string {
  const query = buildQuery(params);
  if (!query) return path;
  return `${path}${path.includes('?') ? '&' : '?'}${query}`;
}

// ============================================================================
// Transport Client
// ============================================================================

export class TransportClient {
  private config: TransportConfig;
  private cache: ResponseCache;
  private deduplicator: RequestDeduplicator;
  private queue: OfflineQueue;
  private tokens: TokenStore;
  private connectivity: ConnectivityMonitor;
  private events: EventBus<ClientEventMap>;
  private metrics: RequestMetrics;
  private fetchImpl: FetchLike;
  private sleep?: Sleep;
  private refreshToken?: () => Promise<string | null>;
  private logger: Logger;
  private refreshing: Promise<string | null> | null = null;
  private active = new Set<AbortController>();

  constructor(options: TransportClientOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.deduplicator = options.deduplicator;
    this.queue = options.queue;
    this.tokens = options.tokens;
    this.connectivity = options.connectivity;
    this.events = options.events;
    this.metrics = options.metrics ?? new RequestMetrics();
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep;
    this.refreshToken = options.refreshToken;
    this.logger = options.logger ?? createLogger('TransportClient');
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Cache, then the in-flight request for the same key, then the network
   * with retries. The raw payload is cached; `decode` runs on every read.
   */
  async get<T>(path: string, options: GetOptions<T>): Promise<T> {
    const correlationId = uuidv4();
    const key = ResponseCache.generateCacheKey(path, options.params);

    try {
      if (!options.forceRefresh && !options.skipCache) {
        const cached = this.cache.get(key);
        if (cached !== undefined) {
          this.logger.debug('Cache hit', key);
          return options.decode(cached);
        }
      }

      if (!this.connectivity.isOnline()) {
        throw new DomainError({ kind: ErrorKind.NETWORK_OFFLINE, correlationId });
      }

      const raw = await this.deduplicator.dedupe(
        `GET ${key}`,
        (signal) => this.fetchForCache(path, key, options, correlationId, signal),
        options.signal,
      );
      return options.decode(raw);
    } catch (error) {
      throw this.classify(error, correlationId);
    }
  }

  /**
   * Export path: no cache, no dedup, a longer deadline and a byte body.
   */
  async getBytes(path: string, options: BytesOptions = {}): Promise<BinaryPayload> {
    const correlationId = uuidv4();
    try {
      if (!this.connectivity.isOnline()) {
        throw new DomainError({ kind: ErrorKind.NETWORK_OFFLINE, correlationId });
      }
      const headers = options.accept ? { ...options.headers, Accept: options.accept } : options.headers;
      const result = await this.withRetry(
        () =>
          this.authorized(
            () =>
              this.send(
                'GET',
                path,
                {
                  params: options.params,
                  headers,
                  signal: options.signal,
                  timeoutMs: options.timeoutMs ?? this.config.requestTimeoutMs * 3,
                  correlationId,
                },
                readBytesBody,
              ),
            correlationId,
          ),
        correlationId,
        this.config.retryCount,
        options.signal,
      );
      return { bytes: result.body, contentType: result.headers.get('content-type') };
    } catch (error) {
      throw this.classify(error, correlationId);
    }
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  async mutate<T>(method: MutationMethod, path: string, options: MutationOptions<T>): Promise<T> {
    const correlationId = uuidv4();
    const queueable = options.queueable !== false;
    const request: RequestSpec = {
      method,
      path: withQuery(path, options.params),
      body: options.body,
      headers: options.headers,
      invalidate: options.invalidate,
    };

    if (!this.connectivity.isOnline() && queueable) {
      throw this.enqueueOffline(request, correlationId);
    }

    try {
      const result = await this.withRetry(
        () =>
          this.authorized(
            () =>
              this.send(
                method,
                path,
                {
                  params: options.params,
                  body: options.body,
                  headers: options.headers,
                  signal: options.signal,
                  timeoutMs: options.timeoutMs,
                  correlationId,
                },
                readJsonBody,
              ),
            correlationId,
          ),
        correlationId,
        options.idempotent ? this.config.retryCount : 1,
        options.signal,
      );

      this.invalidatePrefixes(options.invalidate);
      const data = options.decode(result.body);
      if (options.cacheAs) {
        const key = ResponseCache.generateCacheKey(options.cacheAs(data));
        this.cache.set(key, result.body, result.headers.get('etag') ?? undefined);
      }
      return data;
    } catch (raw) {
      const error = this.classify(raw, correlationId);
      // no response and the browser has since gone offline
      if (
        queueable &&
        !this.connectivity.isOnline() &&
        error.httpStatus === undefined &&
        error.kind !== ErrorKind.CANCELLED
      ) {
        throw this.enqueueOffline(request, correlationId);
      }
      throw error;
    }
  }

  post<T>(path: string, options: MutationOptions<T>): Promise<T> {
    return this.mutate('POST', path, options);
  }

  put<T>(path: string, options: MutationOptions<T>): Promise<T> {
    return this.mutate('PUT', path, options);
  }

  patch<T>(path: string, options: MutationOptions<T>): Promise<T> {
    return this.mutate('PATCH', path, options);
  }

  delete<T>(path: string, options: MutationOptions<T>): Promise<T> {
    return this.mutate('DELETE', path, options);
  }

  // ==========================================================================
  // Offline replay
  // ==========================================================================

  /**
   * Sends a queued mutation once with its original correlation id. Raw
   * failures are left for the queue to classify.
   */
  async replay(operation: QueuedOperation): Promise<void> {
    const { method, path, body, headers, invalidate } = operation.request;
    const correlationId = operation.correlationId ?? uuidv4();
    await this.authorized(() => this.send(method, path, { body, headers, correlationId }, readJsonBody), correlationId);
    this.invalidatePrefixes(invalidate);
  }

  async drainOfflineQueue(): Promise<DrainResult> {
    if (!this.connectivity.isOnline()) {
      return { replayed: 0, discarded: 0, remaining: this.queue.size() };
    }
    const result = await this.queue.drain((operation) => this.replay(operation));
    if (result.replayed > 0 || result.discarded > 0) {
      this.logger.info('Offline queue drained', result);
    }
    return result;
  }

  // ==========================================================================
  // Cache access
  // ==========================================================================

  peek(path: string, params?: Params): unknown {
    return this.cache.peek(ResponseCache.generateCacheKey(path, params));
  }

  prime(path: string, data: unknown, params?: Params): void {
    this.cache.set(ResponseCache.generateCacheKey(path, params), data);
  }

  invalidate(prefix?: string): number {
    return this.cache.invalidate(prefix);
  }

  invalidatePrefixes(prefixes: readonly string[] = []): number {
    return prefixes.reduce((count, prefix) => count + this.cache.invalidate(prefix), 0);
  }

  isOnline(): boolean {
    return this.connectivity.isOnline();
  }

  /**
   * Aborts every request in flight.
   */
  cancelAll(): void {
    this.deduplicator.cancelAll();
    for (const controller of this.active) {
      controller.abort();
    }
    this.active.clear();
  }

  getMetrics(): RequestMetricsSnapshot {
    return this.metrics.getSnapshot();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async fetchForCache<T>(
    path: string,
    key: string,
    options: GetOptions<T>,
    correlationId: string,
    signal: AbortSignal,
  ): Promise<unknown> {
    const previous = options.forceRefresh && !options.skipCache ? this.cache.peekEntry(key) : undefined;

    const result = await this.withRetry(
      () =>
        this.authorized(
          () =>
            this.send(
              'GET',
              path,
              {
                params: options.params,
                headers: options.headers,
                signal,
                timeoutMs: options.timeoutMs,
                correlationId,
                ifNoneMatch: previous?.etag,
              },
              readJsonBody,
            ),
          correlationId,
        ),
      correlationId,
      this.config.retryCount,
      signal,
    );

    const etag = result.headers.get('etag') ?? undefined;
    if (result.status === 304 && previous) {
      if (!options.skipCache) this.cache.set(key, previous.data, etag ?? previous.etag);
      return previous.data;
    }

    if (!options.skipCache) this.cache.set(key, result.body, etag);
    return result.body;
  }

  private withRetry<R>(
    operation: () => Promise<R>,
    correlationId: string,
    maxAttempts: number,
    signal?: AbortSignal,
  ): Promise<R> {
    return withRetry(operation, (raw) => this.classify(raw, correlationId), maxAttempts, {
      baseDelayMs: this.config.retryBaseDelayMs,
      signal,
      sleep: this.sleep,
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn(`Retrying after ${error.kind} (attempt ${attempt}, ${delayMs}ms)`, { correlationId });
      },
    });
  }

  /**
   * On a 401: one shared token refresh, then a single replay. When that is
   * not possible, credentials are cleared and `auth-required` is published.
   */
  private async authorized<R>(attempt: () => Promise<R>, correlationId: string): Promise<R> {
    try {
      return await attempt();
    } catch (raw) {
      if (!(raw instanceof HttpResponseError) || raw.status !== 401) throw raw;

      const token = await this.refreshOnce();
      if (!token) {
        this.signalAuthRequired(this.refreshToken ? 'refresh-failed' : 'refresh-unavailable', correlationId);
        throw raw;
      }

      try {
        return await attempt();
      } catch (retryRaw) {
        if (retryRaw instanceof HttpResponseError && retryRaw.status === 401) {
          this.signalAuthRequired('refresh-failed', correlationId);
        }
        throw retryRaw;
      }
    }
  }

  private refreshOnce(): Promise<string | null> {
    const refresh = this.refreshToken;
    if (!refresh) return Promise.resolve(null);

    if (!this.refreshing) {
      this.refreshing = (async () => {
        try {
          const token = await refresh();
          if (token) this.tokens.setToken(token);
          return token;
        } catch (error) {
          this.logger.warn('Token refresh failed', error);
          return null;
        }
      })().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private signalAuthRequired(reason: 'refresh-failed' | 'refresh-unavailable', correlationId: string): void {
    this.tokens.clear();
    this.cache.invalidate();
    this.events.publish('auth-required', { reason, correlationId });
  }

  /**
   * One network attempt. Resolves for 2xx and 304; every other status
   * rejects with an HttpResponseError.
   */
  private async send<R>(method: HttpMethod, path: string, init: SendInit, read: ResponseReader<R>): Promise<SendResult<R>> {
    if (init.signal?.aborted) throw new RequestCancelledError();

    const url = `${this.config.baseUrl}${withQuery(path, init.params)}`;
    const timeoutMs = init.timeoutMs ?? this.config.requestTimeoutMs;
    const headers = this.buildHeaders(init);
    const body = init.body === undefined ? undefined : JSON.stringify(init.body);
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    init.signal?.addEventListener('abort', onAbort, { once: true });
    this.active.add(controller);

    const endpoint = path.split('?')[0];
    const startedAt = Date.now();
    const end = this.metrics.begin();
    this.logger.debug(`${method} ${url}`, { correlationId: init.correlationId, requestId: headers['X-Request-ID'] });

    try {
      const response = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });

      if (!response.ok && response.status !== 304) {
        const errorBody = await readErrorBody(response);
        throw new HttpResponseError(response.status, response.statusText, errorBody, response.headers);
      }

      const result: SendResult<R> = { status: response.status, body: await read(response), headers: response.headers };
      this.metrics.record(endpoint, Date.now() - startedAt, true);
      return result;
    } catch (error) {
      this.metrics.record(endpoint, Date.now() - startedAt, false);
      if (error instanceof HttpResponseError) throw error;
      if (timedOut) throw new RequestTimeoutError(timeoutMs);
      if (controller.signal.aborted) throw new RequestCancelledError();
      throw error;
    } finally {
      clearTimeout(timer);
      init.signal?.removeEventListener('abort', onAbort);
      this.active.delete(controller);
      end();
    }
  }

  private buildHeaders(init: SendInit): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Correlation-ID': init.correlationId,
      'X-Request-ID': uuidv4(),
      'X-Request-Timestamp': new Date().toISOString(),
      'X-Client-Version': this.config.clientVersion,
      'X-Client-Platform': this.config.clientPlatform,
      ...init.headers,
    };

    const token = this.tokens.getToken();
    if (token) headers.Authorization = `Bearer ${token}`;
    if (init.ifNoneMatch) headers['If-None-Match'] = init.ifNoneMatch;
    return headers;
  }

  private enqueueOffline(request: RequestSpec, correlationId: string): DomainError {
    const operation = this.queue.enqueue(request, correlationId);
    return new DomainError({
      kind: ErrorKind.QUEUED_OFFLINE,
      details: { operationId: operation.id, method: request.method, path: request.path },
      correlationId,
    });
  }

  private classify(raw: unknown, correlationId: string): DomainError {
    return classify(raw, { correlationId, online: this.connectivity.isOnline() });
  }
}
