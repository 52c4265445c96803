/**
 * OfflineQueue
 * Durable FIFO of mutations captured while offline, replayed in order
 * once connectivity returns.
 */

import { v4 as uuidv4 } from 'uuid';
import { classify as defaultClassify, ErrorKind, type Classifier, type DomainError } from './errors';
import { readJson, writeJson, type KeyValueStorage } from './storage';
import { createLogger, type Logger } from '../utils/logger';

export const OFFLINE_QUEUE_KEY = 'api_request_queue';
export const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export type MutationMethod = 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestSpec {
  method: MutationMethod;
  /** Path relative to the gateway origin, query string included */
  path: string;
  body?: unknown;
  headers?: Record<string, string>;
  /** Cache prefixes to drop once the replay succeeds */
  invalidate?: string[];
}

export interface QueuedOperation {
  id: string;
  request: RequestSpec;
  enqueuedAt: number;
  retryCount: number;
  correlationId?: string;
}

export interface DrainResult {
  replayed: number;
  discarded: number;
  /** Entries left in the queue after this drain */
  remaining: number;
  /** Set when a transient failure halted the drain */
  haltedBy?: DomainError;
}

export type ReplayFn = (operation: QueuedOperation) => Promise<void>;
export type QueueListener = (operations: readonly QueuedOperation[]) => void;

export interface OfflineQueueOptions {
  storage: KeyValueStorage;
  storageKey?: string;
  maxAgeMs?: number;
  classify?: Classifier;
  logger?: Logger;
}

const PERMANENT_FAILURES: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.VALIDATION,
  ErrorKind.FORBIDDEN,
  ErrorKind.NOT_FOUND,
  ErrorKind.CONFLICT,
]);

const METHODS: readonly string[] = ['POST', 'PUT', 'PATCH', 'DELETE'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isRequestSpec(value: unknown): value is RequestSpec {
  return isRecord(value) && typeof value.method === 'string' && METHODS.includes(value.method) && typeof value.path === 'string';
}

function isQueuedOperation(value: unknown): value is QueuedOperation {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.enqueuedAt === 'number' &&
    typeof value.retryCount === 'number' &&
    isRequestSpec(value.request)
  );
}

function isQueueSnapshot(value: unknown): value is QueuedOperation[] {
  return Array.isArray(value) && value.every(isQueuedOperation);
}

export class OfflineQueue {
  private storage: KeyValueStorage;
  private storageKey: string;
  private maxAgeMs: number;
  private classify: Classifier;
  private logger: Logger;
  private operations: QueuedOperation[] = [];
  private listeners = new Set<QueueListener>();
  private draining: Promise<DrainResult> | null = null;

  constructor(options: OfflineQueueOptions) {
    this.storage = options.storage;
    this.storageKey = options.storageKey ?? OFFLINE_QUEUE_KEY;
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
    this.classify = options.classify ?? ((raw) => defaultClassify(raw));
    this.logger = options.logger ?? createLogger('OfflineQueue');
    this.reload();
  }

  /**
   * Appends the request; the queue is persisted before this returns.
   */
  enqueue(request: RequestSpec, correlationId?: string): QueuedOperation {
    const operation: QueuedOperation = {
      id: uuidv4(),
      request,
      enqueuedAt: Date.now(),
      retryCount: 0,
      correlationId,
    };
    this.operations.push(operation);
    this.persist();
    this.logger.info(`Queued ${request.method} ${request.path}`, { id: operation.id, size: this.operations.length });
    return operation;
  }

  list(): readonly QueuedOperation[] {
    return this.operations.map((operation) => ({ ...operation, request: { ...operation.request } }));
  }

  size(): number {
    return this.operations.length;
  }

  isDraining(): boolean {
    return this.draining !== null;
  }

  remove(id: string): boolean {
    const before = this.operations.length;
    this.operations = this.operations.filter((operation) => operation.id !== id);
    if (this.operations.length === before) return false;
    this.persist();
    return true;
  }

  clear(): void {
    this.operations = [];
    this.persist();
  }

  /**
   * Replaces the in-memory queue with the persisted snapshot.
   */
  reload(): void {
    this.operations = readJson(this.storage, this.storageKey, isQueueSnapshot, this.logger) ?? [];
    this.notify();
  }

  subscribe(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Replays entries strictly in FIFO order. A concurrent call receives the
   * drain already running.
   */
  drain(replay: ReplayFn): Promise<DrainResult> {
    if (this.draining) return this.draining;

    this.draining = this.run(replay).finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  private async run(replay: ReplayFn): Promise<DrainResult> {
    const result: DrainResult = { replayed: 0, discarded: 0, remaining: 0 };

    while (this.operations.length > 0) {
      const operation = this.operations[0];

      if (this.isStale(operation)) {
        this.discard(operation, 'stale');
        result.discarded += 1;
        continue;
      }

      try {
        await replay(operation);
        this.drop(operation.id);
        result.replayed += 1;
      } catch (raw) {
        const error = this.classify(raw);

        if (PERMANENT_FAILURES.has(error.kind) || this.isStale(operation)) {
          this.discard(operation, error.kind);
          result.discarded += 1;
          continue;
        }

        this.bumpRetry(operation.id);
        result.haltedBy = error;
        this.logger.warn(`Replay of ${operation.request.method} ${operation.request.path} failed, will retry`, error.kind);
        break;
      }
    }

    result.remaining = this.operations.length;
    return result;
  }

  private isStale(operation: QueuedOperation): boolean {
    return Date.now() - operation.enqueuedAt > this.maxAgeMs;
  }

  private discard(operation: QueuedOperation, reason: string): void {
    this.drop(operation.id);
    this.logger.warn(`Discarded ${operation.request.method} ${operation.request.path} (${reason})`, {
      id: operation.id,
      correlationId: operation.correlationId,
    });
  }

  private drop(id: string): void {
    this.operations = this.operations.filter((operation) => operation.id !== id);
    this.persist();
  }

  private bumpRetry(id: string): void {
    this.operations = this.operations.map((operation) =>
      operation.id === id ? { ...operation, retryCount: operation.retryCount + 1 } : operation,
    );
    this.persist();
  }

  private persist(): void {
    writeJson(this.storage, this.storageKey, this.operations, this.logger);
    this.notify();
  }

  private notify(): void {
    const snapshot = this.list();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error('Queue listener failed', error);
      }
    }
  }
}
