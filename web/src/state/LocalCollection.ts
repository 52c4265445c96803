/**
 * LocalCollection
 * Records currently held by the client, in display order. Placeholders
 * written ahead of the server are tagged `optimistic`.
 */

export interface Identified {
  id: string;
}

export interface HeldRecord<T> {
  value: T;
  optimistic: boolean;
}

export type CollectionSnapshot<T> = ReadonlyArray<HeldRecord<T>>;

export type CollectionListener<T> = (records: CollectionSnapshot<T>) => void;

export class LocalCollection<T extends Identified> {
  private records: HeldRecord<T>[] = [];
  private listeners = new Set<CollectionListener<T>>();

  snapshot(): CollectionSnapshot<T> {
    return this.records.slice();
  }

  replaceAll(values: readonly T[]): void {
    this.records = values.map((value) => ({ value, optimistic: false }));
    this.notify();
  }

  /**
   * Replaces the record with the same id in place, or prepends it.
   */
  upsert(value: T, optimistic = false): void {
    const index = this.records.findIndex((record) => record.value.id === value.id);
    const next: HeldRecord<T> = { value, optimistic };
    if (index === -1) {
      this.records = [next, ...this.records];
    } else {
      this.records = this.records.map((record, i) => (i === index ? next : record));
    }
    this.notify();
  }

  /**
   * Swaps a placeholder (by its temporary id) for the confirmed record.
   */
  replace(id: string, value: T): void {
    const index = this.records.findIndex((record) => record.value.id === id);
    if (index === -1) {
      this.upsert(value);
      return;
    }
    this.records = this.records
      .filter((record, i) => i === index || record.value.id !== value.id)
      .map((record) => (record.value.id === id ? { value, optimistic: false } : record));
    this.notify();
  }

  remove(id: string): boolean {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.value.id !== id);
    if (this.records.length === before) return false;
    this.notify();
    return true;
  }

  /**
   * Inserts at `index`, clamped to the current length.
   */
  insertAt(index: number, value: T, optimistic = false): void {
    const at = Math.max(0, Math.min(index, this.records.length));
    const rest = this.records.filter((record) => record.value.id !== value.id);
    this.records = [...rest.slice(0, at), { value, optimistic }, ...rest.slice(at)];
    this.notify();
  }

  indexOf(id: string): number {
    return this.records.findIndex((record) => record.value.id === id);
  }

  get(id: string): HeldRecord<T> | undefined {
    return this.records.find((record) => record.value.id === id);
  }

  values(): T[] {
    return this.records.map((record) => record.value);
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
    this.notify();
  }

  subscribe(listener: CollectionListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
