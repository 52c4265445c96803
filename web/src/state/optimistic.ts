/**
 * Optimistic transactions over a LocalCollection.
 *
 * `beginOptimistic` applies the change at once; `commit` reconciles with
 * the server result, `rollback` undoes only this transaction's own change
 * so edits that landed meanwhile survive.
 */

import type { Identified, LocalCollection } from './LocalCollection';

export type OptimisticState = 'pending' | 'committed' | 'rolled-back';

export interface OptimisticChange<T extends Identified, R> {
  apply(collection: LocalCollection<T>): void;
  reconcile(collection: LocalCollection<T>, result: R): void;
  undo(collection: LocalCollection<T>): void;
}

export interface OptimisticTransaction<R> {
  commit(result: R): void;
  rollback(): void;
  readonly state: OptimisticState;
}

export function beginOptimistic<T extends Identified, R>(
  target: LocalCollection<T>,
  change: OptimisticChange<T, R>,
): OptimisticTransaction<R> {
  let state: OptimisticState = 'pending';

  change.apply(target);

  const settle = (next: OptimisticState) => {
    if (state !== 'pending') {
      throw new Error(`Optimistic transaction already ${state}`);
    }
    state = next;
  };

  return {
    commit(result: R) {
      settle('committed');
      change.reconcile(target, result);
    },
    rollback() {
      settle('rolled-back');
      change.undo(target);
    },
    get state() {
      return state;
    },
  };
}

// ============================================================================
// Common changes
// ============================================================================

/**
 * Shows `placeholder` under its temporary id until the saved record replaces it.
 */
export function insertChange<T extends Identified>(placeholder: T): OptimisticChange<T, T> {
  return {
    apply: (collection) => collection.upsert(placeholder, true),
    reconcile: (collection, saved) => collection.replace(placeholder.id, saved),
    undo: (collection) => {
      collection.remove(placeholder.id);
    },
  };
}

/**
 * Swaps the held record for `patch(held)`. Undo puts the prior record back
 * only while the held copy is still this change's placeholder.
 */
export function patchChange<T extends Identified>(id: string, patch: (held: T) => T): OptimisticChange<T, T> {
  let prior: { value: T; optimistic: boolean } | undefined;
  let placeholder: T | undefined;

  return {
    apply: (collection) => {
      prior = collection.get(id);
      if (!prior) return;
      placeholder = patch(prior.value);
      collection.upsert(placeholder, true);
    },
    reconcile: (collection, saved) => {
      if (collection.get(id)) collection.upsert(saved);
    },
    undo: (collection) => {
      if (!prior || placeholder === undefined) return;
      if (collection.get(id)?.value === placeholder) collection.upsert(prior.value, prior.optimistic);
    },
  };
}

/**
 * Removes the record; undo re-inserts it at its old position unless the id
 * is back already.
 */
export function removeChange<T extends Identified>(id: string): OptimisticChange<T, void> {
  let removed: { value: T; optimistic: boolean } | undefined;
  let index = -1;

  return {
    apply: (collection) => {
      index = collection.indexOf(id);
      removed = collection.get(id);
      collection.remove(id);
    },
    reconcile: () => undefined,
    undo: (collection) => {
      if (!removed || collection.get(id)) return;
      collection.insertAt(index, removed.value, removed.optimistic);
    },
  };
}
