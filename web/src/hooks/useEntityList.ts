import { useCallback, useEffect, useRef, useState } from 'react';
import { stableStringify } from '../cache/ResponseCache';
import { classify, ErrorKind, type DomainError } from '../client/errors';
import type { CollectionSnapshot, Identified, LocalCollection } from '../state/LocalCollection';
import type { ListResponse } from '../types/common';

/**
 * Anything with a cached `list` that fills a local collection; both entity
 * services qualify.
 */
export interface ListSource<T extends Identified, F> {
  readonly collection: LocalCollection<T>;
  list(filter: F, options?: { signal?: AbortSignal; forceRefresh?: boolean }): Promise<ListResponse<T>>;
}

export interface EntityListOptions {
  /** Revalidation interval in ms, usually `config.autoRefreshIntervalMs`; 0 disables it */
  autoRefreshIntervalMs?: number;
  enabled?: boolean;
}

export interface EntityListState<T> {
  items: T[];
  /** Ids of records still waiting for the server */
  pendingIds: string[];
  total: number;
  page: number;
  limit: number;
  loading: boolean;
  error: DomainError | null;
}

function toItems<T extends Identified>(records: CollectionSnapshot<T>): Pick<EntityListState<T>, 'items' | 'pendingIds'> {
  return {
    items: records.map((record) => record.value),
    pendingIds: records.filter((record) => record.optimistic).map((record) => record.value.id),
  };
}

export function useEntityList<T extends Identified, F>(
  source: ListSource<T, F>,
  filter: F,
  options: EntityListOptions = {},
) {
  const { autoRefreshIntervalMs = 0, enabled = true } = options;
  const [state, setState] = useState<EntityListState<T>>(() => ({
    ...toItems(source.collection.snapshot()),
    total: 0,
    page: 1,
    limit: 0,
    loading: enabled,
    error: null,
  }));

  const controllerRef = useRef<AbortController | null>(null);
  const filterRef = useRef(filter);
  filterRef.current = filter;
  const filterKey = stableStringify(filter);

  // a new load supersedes (and cancels) the one in flight
  const load = useCallback(
    (forceRefresh: boolean) => {
      controllerRef.current?.abort();
      const controller = new AbortController();
      controllerRef.current = controller;
      setState((prev) => ({ ...prev, loading: true, error: null }));

      source.list(filterRef.current, { signal: controller.signal, forceRefresh }).then(
        (page) => {
          if (controllerRef.current !== controller) return;
          controllerRef.current = null;
          setState((prev) => ({ ...prev, total: page.total, page: page.page, limit: page.limit, loading: false }));
        },
        (raw: unknown) => {
          const error = classify(raw);
          if (error.kind === ErrorKind.CANCELLED || controllerRef.current !== controller) return;
          controllerRef.current = null;
          setState((prev) => ({ ...prev, loading: false, error }));
        },
      );
    },
    [source],
  );

  useEffect(() => {
    const sync = (records: CollectionSnapshot<T>) => setState((prev) => ({ ...prev, ...toItems(records) }));
    sync(source.collection.snapshot());
    return source.collection.subscribe(sync);
  }, [source]);

  useEffect(() => {
    if (!enabled) return undefined;
    load(false);
    return () => {
      controllerRef.current?.abort();
      controllerRef.current = null;
    };
  }, [load, filterKey, enabled]);

  useEffect(() => {
    if (!enabled || autoRefreshIntervalMs <= 0) return undefined;
    const timer = setInterval(() => load(true), autoRefreshIntervalMs);
    return () => clearInterval(timer);
  }, [load, enabled, autoRefreshIntervalMs]);

  const refresh = useCallback(() => load(true), [load]);

  return { ...state, refresh };
}
