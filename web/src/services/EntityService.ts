/**
 * EntityService
 * Typed CRUD, search, bulk and export operations over one entity root.
 * Subclasses supply decoding, validation and payload mapping; this class
 * owns cache invalidation, optimistic updates of the local collection and
 * error normalisation.
 */

import { format as formatDate } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { ClientConfig } from '../config';
import type { InvalidationService } from '../cache/InvalidationService';
import { classify, DomainError, ErrorKind, type FieldError } from '../client/errors';
import type { ClientEventMap, EntityEvent, EventBus } from '../client/EventBus';
import type { Params, RequestOptions, TransportClient } from '../client/TransportClient';
import { LocalCollection } from '../state/LocalCollection';
import { beginOptimistic, insertChange, patchChange, removeChange } from '../state/optimistic';
import {
  EXPORT_FORMATS,
  type BulkItemFailure,
  type BulkProgress,
  type BulkResult,
  type ExportFormat,
  type ExportResult,
  type ListParams,
  type ListResponse,
  type SearchQuery,
  type Versioned,
} from '../types/common';
import { createLogger, type Logger } from '../utils/logger';
import { asRecord, decodeList, isRecord, readNumber } from './decode';
import { isOneOf, sanitizeText, validationError } from './validation';

// ============================================================================
// Types
// ============================================================================

export interface EntityServiceDeps<T extends Versioned> {
  transport: TransportClient;
  invalidation: InvalidationService;
  collection?: LocalCollection<T>;
  config?: Partial<Pick<ClientConfig, 'bulkBatchSize' | 'exportLimit'>>;
  logger?: Logger;
  now?: () => Date;
}

export interface ReadOptions {
  signal?: AbortSignal;
  /** Revalidate instead of answering from the cache */
  forceRefresh?: boolean;
}

export interface UpdateOptions extends RequestOptions {
  /** Version the caller last saw; a different cached version fails fast */
  version?: number;
}

export interface BulkOptions {
  batchSize?: number;
  signal?: AbortSignal;
  onProgress?: (progress: BulkProgress) => void;
}

export interface ExportOptions {
  fields?: string[];
  signal?: AbortSignal;
}

interface BulkBatchResponse<T> {
  successful: T[];
  failed: Array<{ index: number; error: string }>;
}

interface PendingItem<C> {
  index: number;
  input: C;
}

const DEFAULT_SEARCH_LIMIT = 20;

/**
 * Drops undefined fields so they are not sent as explicit nulls.
 */
export function compactPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const compacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) compacted[key] = value;
  }
  return compacted;
}

/**
 * Empty lists are left out of the query.
 */
export function listParam<V>(values?: readonly V[]): readonly V[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

// ============================================================================
// Service
// ============================================================================

export abstract class EntityService<T extends Versioned, C, U, F extends ListParams, S> {
  readonly name: string;
  readonly root: string;
  readonly collection: LocalCollection<T>;

  protected transport: TransportClient;
  protected invalidation: InvalidationService;
  protected logger: Logger;
  protected now: () => Date;
  private bulkBatchSize: number;
  private exportLimit: number;

  /**
   * `related` are extra cache prefixes any write of this entity makes stale.
   */
  constructor(name: string, root: string, deps: EntityServiceDeps<T>, related: string[] = []) {
    this.name = name;
    this.root = root;
    this.transport = deps.transport;
    this.invalidation = deps.invalidation;
    this.collection = deps.collection ?? new LocalCollection<T>();
    this.logger = deps.logger ?? createLogger(`${name}Service`);
    this.now = deps.now ?? (() => new Date());
    this.bulkBatchSize = Math.max(1, deps.config?.bulkBatchSize ?? 100);
    this.exportLimit = deps.config?.exportLimit ?? 10_000;
    this.invalidation.register(name, root, related);
  }

  // ==========================================================================
  // Entity specifics
  // ==========================================================================

  protected abstract decode(raw: unknown): T;
  protected abstract decodeStats(raw: unknown): S;
  protected abstract validateCreate(input: C): FieldError[];
  protected abstract validateUpdate(patch: U): FieldError[];
  protected abstract toCreatePayload(input: C): Record<string, unknown>;
  protected abstract toUpdatePayload(patch: U): Record<string, unknown>;
  protected abstract filterToParams(filter: F): Params;
  /** Record shown while a create is in flight */
  protected abstract placeholder(input: C, tempId: string, now: Date): T;
  protected abstract applyPatch(current: T, patch: U): T;

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getById(id: string, options: ReadOptions = {}): Promise<T> {
    try {
      const record = await this.transport.get(this.recordPath(id), {
        decode: (raw) => this.decode(raw),
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
      const held = this.collection.get(id);
      if (held && !held.optimistic) this.collection.upsert(record);
      return record;
    } catch (error) {
      throw this.fail(error, 'getById');
    }
  }

  /**
   * Replaces the local collection with the returned page.
   */
  async list(filter: F, options: ReadOptions = {}): Promise<ListResponse<T>> {
    try {
      const page = await this.transport.get(this.root, {
        params: this.filterToParams(filter),
        decode: (raw) => decodeList(raw, (item) => this.decode(item)),
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
      this.collection.replaceAll(page.items);
      return page;
    } catch (error) {
      throw this.fail(error, 'list');
    }
  }

  async search(query: SearchQuery, options: ReadOptions = {}): Promise<ListResponse<T>> {
    try {
      const q = sanitizeText(query.query);
      if (!q) throw validationError([{ field: 'query', message: 'Search query is required' }]);
      return await this.transport.get(`${this.root}/search`, {
        params: {
          q,
          tags: query.tags?.length ? query.tags.join(',') : undefined,
          page: query.page ?? 1,
          limit: query.limit ?? DEFAULT_SEARCH_LIMIT,
        },
        decode: (raw) => decodeList(raw, (item) => this.decode(item)),
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
    } catch (error) {
      throw this.fail(error, 'search');
    }
  }

  async getStatistics(filter: F, options: ReadOptions = {}): Promise<S> {
    try {
      return await this.transport.get(`${this.root}/stats`, {
        params: this.filterToParams(filter),
        decode: (raw) => this.decodeStats(raw),
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
    } catch (error) {
      throw this.fail(error, 'getStatistics');
    }
  }

  /**
   * Bypasses the cache; the caller persists the returned bytes.
   */
  async export(filter: F, format: ExportFormat, options: ExportOptions = {}): Promise<ExportResult> {
    try {
      if (!isOneOf(format, EXPORT_FORMATS)) {
        throw validationError([{ field: 'format', message: `Unsupported export format: ${String(format)}` }]);
      }
      const payload = await this.transport.getBytes(`${this.root}/export`, {
        params: {
          ...this.filterToParams(filter),
          format,
          fields: options.fields?.length ? options.fields.join(',') : undefined,
          limit: this.exportLimit,
        },
        accept: format === 'csv' ? 'text/csv' : 'application/json',
        signal: options.signal,
      });
      return {
        bytes: payload.bytes,
        format,
        contentType: payload.contentType,
        filename: `${this.name}-export-${formatDate(this.now(), 'yyyyMMdd-HHmmss')}.${format}`,
      };
    } catch (error) {
      throw this.fail(error, 'export');
    }
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Validates, shows a placeholder, then swaps it for the saved record.
   * The saved record is cached under its own path.
   */
  async create(input: C, options: RequestOptions = {}): Promise<T> {
    try {
      this.assertValid(this.validateCreate(input));
    } catch (error) {
      throw this.fail(error, 'create');
    }

    const tempId = `tmp-${uuidv4()}`;
    const transaction = beginOptimistic(this.collection, insertChange(this.placeholder(input, tempId, this.now())));

    try {
      const saved = await this.transport.post(this.root, {
        ...options,
        body: this.toCreatePayload(input),
        decode: (raw) => this.decode(raw),
        invalidate: this.invalidation.prefixesFor(this.name),
        cacheAs: (record) => this.recordPath(record.id),
      });
      transaction.commit(saved);
      return saved;
    } catch (error) {
      transaction.rollback();
      throw this.fail(error, 'create');
    }
  }

  async update(id: string, patch: U, options: UpdateOptions = {}): Promise<T> {
    const { version, ...request } = options;
    try {
      this.assertValid(this.validateUpdate(patch));
      if (version !== undefined) this.assertVersion(id, version);
    } catch (error) {
      throw this.fail(error, 'update');
    }

    const transaction = beginOptimistic(
      this.collection,
      patchChange<T>(id, (held) => this.applyPatch(held, patch)),
    );

    try {
      const body = this.toUpdatePayload(patch);
      const saved = await this.transport.patch(this.recordPath(id), {
        ...request,
        body: version === undefined ? body : { ...body, version },
        headers: version === undefined ? request.headers : { ...request.headers, 'If-Match': `"${version}"` },
        decode: (raw) => this.decode(raw),
        invalidate: this.invalidation.prefixesFor(this.name, id),
        cacheAs: () => this.recordPath(id),
      });
      transaction.commit(saved);
      return saved;
    } catch (error) {
      transaction.rollback();
      throw this.fail(error, 'update');
    }
  }

  /**
   * Soft delete on the server; locally the record is removed at once and
   * restored if the call fails.
   */
  async delete(id: string, options: RequestOptions = {}): Promise<void> {
    const transaction = beginOptimistic(this.collection, removeChange<T>(id));

    try {
      await this.transport.delete(this.recordPath(id), {
        ...options,
        decode: () => undefined,
        invalidate: this.invalidation.prefixesFor(this.name, id),
      });
      transaction.commit(undefined);
    } catch (error) {
      transaction.rollback();
      throw this.fail(error, 'delete');
    }
  }

  /**
   * Sequential batches. A failing batch marks its items failed and the
   * next batch still runs; items failing validation are never sent.
   * Never throws.
   */
  async bulkCreate(items: readonly C[], options: BulkOptions = {}): Promise<BulkResult<T>> {
    const total = items.length;
    const successful: T[] = [];
    const failed: BulkItemFailure[] = [];
    const pending: PendingItem<C>[] = [];

    items.forEach((input, index) => {
      const errors = this.validateCreate(input);
      if (errors.length > 0) {
        failed.push({ index, kind: ErrorKind.VALIDATION, error: errors.map((e) => e.message).join(', ') });
      } else {
        pending.push({ index, input });
      }
    });

    const batchSize = Math.max(1, options.batchSize ?? this.bulkBatchSize);
    let processed = failed.length;
    const report = () =>
      options.onProgress?.({ processed, total, succeeded: successful.length, failed: failed.length });
    report();

    for (let start = 0; start < pending.length; start += batchSize) {
      const batch = pending.slice(start, start + batchSize);

      if (options.signal?.aborted) {
        for (const item of pending.slice(start)) {
          failed.push({ index: item.index, kind: ErrorKind.CANCELLED, error: 'The request was cancelled.' });
        }
        processed = total;
        report();
        break;
      }

      try {
        const response = await this.transport.post(`${this.root}/bulk`, {
          body: { items: batch.map((item) => this.toCreatePayload(item.input)) },
          decode: (raw) => this.decodeBulkResponse(raw),
          invalidate: this.invalidation.prefixesFor(this.name),
          queueable: false,
          signal: options.signal,
        });
        successful.push(...response.successful);
        for (const failure of response.failed) {
          const item = batch[failure.index];
          if (item) failed.push({ index: item.index, kind: ErrorKind.VALIDATION, error: failure.error });
        }
      } catch (raw) {
        const error = classify(raw);
        this.logger.warn(`Bulk batch ${start / batchSize + 1} failed: ${error.kind}`, error.correlationId);
        for (const item of batch) {
          failed.push({ index: item.index, kind: error.kind, error: error.message });
        }
      }

      processed += batch.length;
      report();
    }

    failed.sort((a, b) => a.index - b.index);
    return { successful, failed, total };
  }

  // ==========================================================================
  // Realtime
  // ==========================================================================

  /**
   * Reconciles the local collection from pushed events of this entity.
   * Returns the unsubscribe function.
   */
  attachRealtime(bus: EventBus<ClientEventMap>): () => void {
    const onUpsert = (event: EntityEvent) => {
      if (event.entity !== this.name || event.data === undefined) return;
      try {
        const record = this.decode(event.data);
        const held = this.collection.get(record.id);
        if (held?.optimistic) return;
        if (event.action === 'updated' && !held) return;
        this.collection.upsert(record);
      } catch (error) {
        this.logger.warn(`Ignoring undecodable ${event.entity}:${event.action} payload`, error);
      }
    };
    const onDelete = (event: EntityEvent) => {
      if (event.entity !== this.name || !event.id) return;
      this.collection.remove(event.id);
    };

    const unsubscribers = [
      bus.subscribe('created', onUpsert),
      bus.subscribe('updated', onUpsert),
      bus.subscribe('deleted', onDelete),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  /**
   * Drops every cached read of this entity.
   */
  invalidateCache(): number {
    return this.invalidation.onChange(this.name, 'bulk-operation');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  protected recordPath(id: string): string {
    return `${this.root}/${encodeURIComponent(id)}`;
  }

  /**
   * Version of the cached record, else of the confirmed local copy.
   */
  protected currentVersion(id: string): number | undefined {
    const cached = this.transport.peek(this.recordPath(id));
    if (isRecord(cached) && typeof cached.version === 'number') return cached.version;
    const held = this.collection.get(id);
    return held && !held.optimistic ? held.value.version : undefined;
  }

  private assertVersion(id: string, expected: number): void {
    const current = this.currentVersion(id);
    if (current === undefined || current === expected) return;
    throw new DomainError({
      kind: ErrorKind.CONFLICT,
      code: 'VERSION_MISMATCH',
      details: { id, expectedVersion: expected, currentVersion: current },
    });
  }

  private assertValid(errors: FieldError[]): void {
    if (errors.length > 0) throw validationError(errors);
  }

  private decodeBulkResponse(raw: unknown): BulkBatchResponse<T> {
    const record = asRecord(raw, 'bulk response');
    const successful = Array.isArray(record.successful) ? record.successful.map((item) => this.decode(item)) : [];
    const failed = Array.isArray(record.failed)
      ? record.failed.filter(isRecord).map((entry) => ({
          index: readNumber(entry, 'index'),
          error: typeof entry.error === 'string' ? entry.error : 'Item was rejected',
        }))
      : [];
    return { successful, failed };
  }

  /**
   * Normalises any failure to a DomainError; cancellations stay quiet.
   */
  protected fail(raw: unknown, operation: string): DomainError {
    const error = classify(raw);
    if (error.kind !== ErrorKind.CANCELLED && error.kind !== ErrorKind.QUEUED_OFFLINE) {
      this.logger.warn(`${operation} failed: ${error.kind}`, error.correlationId || error.message);
    }
    return error;
  }
}
