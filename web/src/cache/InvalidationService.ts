/**
 * InvalidationService
 * Maps entity change events onto the cache prefixes they make stale.
 */

import type { ResponseCache } from './ResponseCache';
import { createLogger, type Logger } from '../utils/logger';

export type EntityChange = 'created' | 'updated' | 'deleted' | 'bulk-operation';

interface RegisteredRoot {
  root: string;
  related: string[];
}

export class InvalidationService {
  private cache: ResponseCache;
  private logger: Logger;
  private roots = new Map<string, RegisteredRoot>();

  constructor(cache: ResponseCache, logger: Logger = createLogger('InvalidationService')) {
    this.cache = cache;
    this.logger = logger;
  }

  /**
   * `related` are extra prefixes under the root (e.g. per-member listings)
   * that any write of the entity makes stale.
   */
  register(entity: string, root: string, related: string[] = []): void {
    this.roots.set(entity, { root, related });
  }

  entities(): string[] {
    return Array.from(this.roots.keys());
  }

  /**
   * Collection, statistics and search reads of an entity, plus the single
   * record when an id is given.
   */
  prefixesFor(entity: string, id?: string): string[] {
    const registered = this.roots.get(entity);
    if (!registered) return [];
    const { root, related } = registered;
    const prefixes = [`${root}?`, `${root}/stats?`, `${root}/search?`, ...related];
    if (id) prefixes.push(`${root}/${encodeURIComponent(id)}?`);
    return prefixes;
  }

  invalidatePrefixes(prefixes: readonly string[]): number {
    return prefixes.reduce((count, prefix) => count + this.cache.invalidate(prefix), 0);
  }

  onChange(entity: string, change: EntityChange, id?: string): number {
    const removed = this.invalidatePrefixes(this.prefixesFor(entity, change === 'bulk-operation' ? undefined : id));
    this.logger.debug(`${entity}:${change} invalidated ${removed} entries`, id);
    return removed;
  }

  /**
   * Everything under every registered root.
   */
  onReconnect(): number {
    let removed = 0;
    for (const { root } of this.roots.values()) {
      removed += this.cache.invalidate(root);
    }
    return removed;
  }

  onManualClear(): number {
    return this.cache.invalidate();
  }
}
