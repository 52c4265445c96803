/**
 * Wire decoding helpers
 * Narrow untyped JSON payloads into typed records. A payload that does not
 * match throws DecodeError, which the facades classify as UNKNOWN.
 */

import { isValid, parseISO } from 'date-fns';
import type { ListResponse } from '../types/common';

export type WireRecord = Record<string, unknown>;

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, what: string): WireRecord {
  if (!isRecord(value)) throw new DecodeError(`Expected ${what} to be an object`);
  return value;
}

export function readString(record: WireRecord, key: string): string {
  const value = record[key];
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') throw new DecodeError(`Missing string field "${key}"`);
  return value;
}

export function readOptionalString(record: WireRecord, key: string): string | undefined {
  const value = record[key];
  if (value === null || value === undefined) return undefined;
  return readString(record, key);
}

export function readNumber(record: WireRecord, key: string, fallback?: number): number {
  const value = record[key];
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isFinite(parsed)) return parsed;
  if (fallback !== undefined && (value === null || value === undefined)) return fallback;
  throw new DecodeError(`Missing numeric field "${key}"`);
}

export function readOptionalNumber(record: WireRecord, key: string): number | undefined {
  const value = record[key];
  if (value === null || value === undefined) return undefined;
  return readNumber(record, key);
}

export function readBoolean(record: WireRecord, key: string, fallback: boolean): boolean {
  const value = record[key];
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Narrows to one of `allowed`; a missing value takes `fallback` when given.
 */
export function readEnum<V extends string>(record: WireRecord, key: string, allowed: readonly V[], fallback?: V): V {
  const value = record[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match !== undefined) return match;
  if (fallback !== undefined && (value === null || value === undefined)) return fallback;
  throw new DecodeError(`Unexpected value for "${key}": ${String(value)}`);
}

export function readDate(record: WireRecord, key: string): Date {
  const value = record[key];
  const date = typeof value === 'string' ? parseISO(value) : undefined;
  if (!date || !isValid(date)) throw new DecodeError(`Invalid date field "${key}"`);
  return date;
}

export function readOptionalDate(record: WireRecord, key: string): Date | undefined {
  const value = record[key];
  if (value === null || value === undefined || value === '') return undefined;
  return readDate(record, key);
}

export function readStringArray(record: WireRecord, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * `{label: count}` maps from statistics payloads; non-numeric counts are dropped.
 */
export function readCountMap(record: WireRecord, key: string): Record<string, number> {
  const value = record[key];
  const counts: Record<string, number> = {};
  if (!isRecord(value)) return counts;
  for (const [label, count] of Object.entries(value)) {
    if (typeof count === 'number' && Number.isFinite(count)) counts[label] = count;
  }
  return counts;
}

/**
 * Decodes `{items, total, page, limit, pages?}`. A bare array is accepted
 * as a single page.
 */
export function decodeList<T>(raw: unknown, decodeItem: (item: unknown) => T): ListResponse<T> {
  if (Array.isArray(raw)) {
    const items = raw.map(decodeItem);
    return { items, total: items.length, page: 1, limit: items.length };
  }

  const record = asRecord(raw, 'list response');
  const rawItems = record.items;
  if (!Array.isArray(rawItems)) throw new DecodeError('List response has no items array');
  const items = rawItems.map(decodeItem);
  return {
    items,
    total: readNumber(record, 'total', items.length),
    page: readNumber(record, 'page', 1),
    limit: readNumber(record, 'limit', items.length),
    pages: readOptionalNumber(record, 'pages'),
  };
}
