/**
 * Error classification
 * Maps transport / HTTP failures onto the closed DomainError taxonomy.
 */

export const ErrorKind = {
  VALIDATION: 'VALIDATION',
  AUTH_REQUIRED: 'AUTH_REQUIRED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  RATE_LIMITED: 'RATE_LIMITED',
  SERVER_ERROR: 'SERVER_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  NETWORK_OFFLINE: 'NETWORK_OFFLINE',
  TIMEOUT: 'TIMEOUT',
  CANCELLED: 'CANCELLED',
  QUEUED_OFFLINE: 'QUEUED_OFFLINE',
  MAX_RETRIES_EXCEEDED: 'MAX_RETRIES_EXCEEDED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface FieldError {
  field: string;
  message: string;
}

export interface DomainErrorInit {
  kind: ErrorKind;
  message?: string;
  httpStatus?: number;
  code?: string;
  details?: Record<string, unknown>;
  fieldErrors?: FieldError[];
  retryAfterMs?: number;
  correlationId?: string;
  occurredAt?: number;
  cause?: unknown;
}

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  VALIDATION: 'Invalid request. Please check your input.',
  AUTH_REQUIRED: 'Authentication required. Please log in.',
  FORBIDDEN: 'You do not have permission to perform this action.',
  NOT_FOUND: 'The requested resource was not found.',
  CONFLICT: 'The resource was modified by someone else. Please refresh and try again.',
  RATE_LIMITED: 'Too many requests. Please try again later.',
  SERVER_ERROR: 'The server is temporarily unavailable. Please try again later.',
  NETWORK_ERROR: 'Network error. Please check your connection.',
  NETWORK_OFFLINE: 'No internet connection. Please check your network.',
  TIMEOUT: 'Request timeout. Please try again.',
  CANCELLED: 'The request was cancelled.',
  QUEUED_OFFLINE: 'You are offline. The change was saved and will be sent when the connection returns.',
  MAX_RETRIES_EXCEEDED: 'The request failed after several attempts. Please try again later.',
  UNKNOWN: 'An unexpected error occurred.',
};

export function defaultMessageFor(kind: ErrorKind): string {
  return DEFAULT_MESSAGES[kind];
}

export class DomainError extends Error {
  readonly kind: ErrorKind;
  readonly httpStatus?: number;
  readonly code: string;
  readonly details?: Readonly<Record<string, unknown>>;
  readonly fieldErrors: readonly FieldError[];
  readonly retryAfterMs?: number;
  readonly correlationId: string;
  readonly occurredAt: number;

  constructor(init: DomainErrorInit) {
    super(init.message || defaultMessageFor(init.kind), { cause: init.cause });
    this.name = 'DomainError';
    this.kind = init.kind;
    this.httpStatus = init.httpStatus;
    this.code = init.code ?? (init.httpStatus ? `HTTP_${init.httpStatus}` : init.kind);
    this.details = init.details;
    this.fieldErrors = init.fieldErrors ?? [];
    this.retryAfterMs = init.retryAfterMs;
    this.correlationId = init.correlationId ?? '';
    this.occurredAt = init.occurredAt ?? Date.now();
    Object.setPrototypeOf(this, DomainError.prototype);
  }

  /** Copy with a correlation id, used when the id is only known after classification. */
  withCorrelationId(correlationId: string): DomainError {
    if (this.correlationId === correlationId) return this;
    return new DomainError({ ...this.toInit(), correlationId });
  }

  toInit(): DomainErrorInit {
    return {
      kind: this.kind,
      message: this.message,
      httpStatus: this.httpStatus,
      code: this.code,
      details: this.details ? { ...this.details } : undefined,
      fieldErrors: [...this.fieldErrors],
      retryAfterMs: this.retryAfterMs,
      correlationId: this.correlationId,
      occurredAt: this.occurredAt,
      cause: this.cause,
    };
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

// ============================================================================
// Raw failures raised by the transport before classification
// ============================================================================

export type HeaderReader = { get(name: string): string | null };

export class HttpResponseError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: unknown;
  readonly headers: HeaderReader;

  constructor(status: number, statusText: string, body: unknown, headers: HeaderReader) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpResponseError';
    this.status = status;
    this.statusText = statusText;
    this.body = body;
    this.headers = headers;
  }
}

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request exceeded its ${timeoutMs}ms deadline`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RequestCancelledError extends Error {
  constructor(message = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

// ============================================================================
// Classification
// ============================================================================

export interface ClassifyContext {
  correlationId?: string;
  /** Connectivity as reported by the browser when the failure happened */
  online?: boolean;
  now?: number;
}

export type Classifier = (raw: unknown) => DomainError;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorName(raw: unknown): string | undefined {
  if (raw instanceof Error) return raw.name;
  if (isRecord(raw) && typeof raw.name === 'string') return raw.name;
  return undefined;
}

function serverMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    const text = body.trim();
    return text && text.length <= 500 && !text.startsWith('<') ? text : undefined;
  }
  if (!isRecord(body)) return undefined;
  for (const key of ['message', 'detail', 'error']) {
    const value = body[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
}

/**
 * Field errors as sent by the services: either `errors: [{field, message}]`
 * or a FastAPI style `detail: [{loc: [..., field], msg}]`.
 */
export function extractFieldErrors(body: unknown): FieldError[] {
  if (!isRecord(body)) return [];
  const result: FieldError[] = [];

  const errors = body.errors;
  if (Array.isArray(errors)) {
    for (const item of errors) {
      if (isRecord(item) && typeof item.field === 'string') {
        result.push({ field: item.field, message: typeof item.message === 'string' ? item.message : 'Invalid value' });
      }
    }
  }

  const detail = body.detail;
  if (Array.isArray(detail)) {
    for (const item of detail) {
      if (!isRecord(item) || !Array.isArray(item.loc)) continue;
      const loc = item.loc.filter((part): part is string | number => typeof part === 'string' || typeof part === 'number');
      const field = loc.filter((part) => part !== 'body').join('.');
      if (!field) continue;
      result.push({ field, message: typeof item.msg === 'string' ? item.msg : 'Invalid value' });
    }
  }

  return result;
}

/**
 * Parses a Retry-After header: delta seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function kindForStatus(status: number, fieldErrors: FieldError[]): ErrorKind {
  if (status === 400 || status === 422) return ErrorKind.VALIDATION;
  if (status === 401) return ErrorKind.AUTH_REQUIRED;
  if (status === 403) return ErrorKind.FORBIDDEN;
  if (status === 404 || status === 410) return ErrorKind.NOT_FOUND;
  if (status === 408) return ErrorKind.TIMEOUT;
  if (status === 409) return ErrorKind.CONFLICT;
  if (status === 429) return ErrorKind.RATE_LIMITED;
  if (status >= 500) return ErrorKind.SERVER_ERROR;
  if (status >= 400 && fieldErrors.length > 0) return ErrorKind.VALIDATION;
  return ErrorKind.UNKNOWN;
}

/**
 * Pure and total: every raw failure maps to exactly one kind.
 */
export function classify(raw: unknown, context: ClassifyContext = {}): DomainError {
  const correlationId = context.correlationId;
  const occurredAt = context.now ?? Date.now();

  if (raw instanceof DomainError) {
    return correlationId && !raw.correlationId ? raw.withCorrelationId(correlationId) : raw;
  }

  if (raw instanceof HttpResponseError) {
    const fieldErrors = extractFieldErrors(raw.body);
    const kind = kindForStatus(raw.status, fieldErrors);
    const bodyCode = isRecord(raw.body) && typeof raw.body.code === 'string' ? raw.body.code : undefined;
    return new DomainError({
      kind,
      message: serverMessage(raw.body) ?? (kind === ErrorKind.UNKNOWN ? raw.message : undefined),
      httpStatus: raw.status,
      code: bodyCode ?? `HTTP_${raw.status}`,
      details: isRecord(raw.body) ? raw.body : undefined,
      fieldErrors,
      retryAfterMs: kind === ErrorKind.RATE_LIMITED ? parseRetryAfter(raw.headers.get('retry-after'), occurredAt) : undefined,
      correlationId,
      occurredAt,
      cause: raw,
    });
  }

  const name = errorName(raw);

  if (raw instanceof RequestTimeoutError || name === 'TimeoutError') {
    return new DomainError({ kind: ErrorKind.TIMEOUT, correlationId, occurredAt, cause: raw });
  }

  if (raw instanceof RequestCancelledError || name === 'AbortError') {
    return new DomainError({ kind: ErrorKind.CANCELLED, correlationId, occurredAt, cause: raw });
  }

  // fetch rejects with a TypeError when no response was received
  if (raw instanceof TypeError) {
    const kind = context.online === false ? ErrorKind.NETWORK_OFFLINE : ErrorKind.NETWORK_ERROR;
    return new DomainError({ kind, correlationId, occurredAt, cause: raw });
  }

  const message =
    raw instanceof Error ? raw.message : typeof raw === 'string' ? raw : isRecord(raw) ? serverMessage(raw) : undefined;

  return new DomainError({
    kind: ErrorKind.UNKNOWN,
    message: message || undefined,
    correlationId,
    occurredAt,
    cause: raw,
  });
}

export function isCancellation(error: unknown): boolean {
  return classify(error).kind === ErrorKind.CANCELLED;
}
