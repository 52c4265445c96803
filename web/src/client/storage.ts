/**
 * Key-value storage
 * Browser-style synchronous storage area (satisfied by `localStorage`)
 * plus an in-memory implementation for non-browser hosts and tests.
 */

import type { Logger } from '../utils/logger';

export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }

  get size(): number {
    return this.items.size;
  }
}

export function resolveStorage(): KeyValueStorage {
  try {
    return typeof localStorage !== 'undefined' ? localStorage : new MemoryStorage();
  } catch {
    // access to localStorage throws when storage is disabled
    return new MemoryStorage();
  }
}

export function readJson<T>(
  storage: KeyValueStorage,
  key: string,
  guard: (value: unknown) => value is T,
  logger?: Logger,
): T | undefined {
  try {
    const stored = storage.getItem(key);
    if (stored === null) return undefined;
    const parsed: unknown = JSON.parse(stored);
    if (guard(parsed)) return parsed;
    logger?.warn(`Ignoring malformed value under "${key}"`);
    return undefined;
  } catch (error) {
    logger?.error(`Failed to read "${key}" from storage`, error);
    return undefined;
  }
}

/**
 * Returns false when the value could not be written (quota, serialization).
 */
export function writeJson(storage: KeyValueStorage, key: string, value: unknown, logger?: Logger): boolean {
  try {
    storage.setItem(key, JSON.stringify(value));
    return true;
  } catch (error) {
    logger?.error(`Failed to write "${key}" to storage`, error);
    return false;
  }
}
