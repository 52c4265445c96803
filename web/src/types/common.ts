import type { ErrorKind } from '../client/errors';

export interface Versioned {
  id: string;
  version: number;
}

export interface ListParams {
  page?: number;
  limit?: number;
  sort_by?: string;
  sort_direction?: 'asc' | 'desc';
}

export interface ListResponse<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  pages?: number;
}

export interface SearchQuery {
  query: string;
  tags?: string[];
  page?: number;
  limit?: number;
}

export interface SearchResponse<T> extends ListResponse<T> {
  /** Highlighted fragments per record id */
  highlights?: Record<string, string[]>;
}

export interface BulkItemFailure {
  /** Position in the caller's input */
  index: number;
  kind: ErrorKind;
  error: string;
}

export interface BulkResult<T> {
  successful: T[];
  failed: BulkItemFailure[];
  total: number;
}

export interface BulkProgress {
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export const EXPORT_FORMATS = ['json', 'csv'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportResult {
  bytes: Uint8Array;
  format: ExportFormat;
  filename: string;
  contentType: string | null;
}
