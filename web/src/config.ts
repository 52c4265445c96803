/**
 * Client configuration
 * Environment-style options (Vite `VITE_*` keys) with documented defaults.
 */

export interface ClientConfig {
  /** Gateway origin prepended to every request path */
  baseUrl: string;
  /** Prefix of the entity roots, e.g. `/api/v1` */
  apiPrefix: string;
  /** Per-attempt deadline in ms */
  requestTimeoutMs: number;
  /** Response Cache TTL in ms */
  cacheTtlMs: number;
  /** Response Cache byte quota, 0 disables the quota */
  cacheQuotaBytes: number;
  /** Max attempts for idempotent requests */
  retryCount: number;
  /** Backoff base in ms */
  retryBaseDelayMs: number;
  /** Batch size used by bulkCreate */
  bulkBatchSize: number;
  /** `limit` sent with export requests */
  exportLimit: number;
  /** Polling interval used by list hooks, 0 disables polling */
  autoRefreshIntervalMs: number;
  /** Queued mutations older than this are discarded */
  offlineMaxAgeMs: number;
  clientVersion: string;
  clientPlatform: string;
  authTokenKey: string;
  /** Push channel URL; the realtime bridge is only created when set */
  realtimeUrl?: string;
  enableLogging: boolean;
}

export type EnvRecord = Record<string, string | boolean | undefined>;

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  baseUrl: 'http://localhost:8000',
  apiPrefix: '/api/v1',
  requestTimeoutMs: 30_000,
  cacheTtlMs: 5 * 60 * 1000,
  cacheQuotaBytes: 0,
  retryCount: 3,
  retryBaseDelayMs: 1000,
  bulkBatchSize: 100,
  exportLimit: 10_000,
  autoRefreshIntervalMs: 60_000,
  offlineMaxAgeMs: 24 * 60 * 60 * 1000,
  clientVersion: '1.0.0',
  clientPlatform: 'web',
  authTokenKey: 'auth_token',
  enableLogging: false,
};

function readInt(env: EnvRecord, key: string, fallback: number): number {
  const raw = env[key];
  if (typeof raw !== 'string' || raw.trim() === '') return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function readString(env: EnvRecord, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readFlag(env: EnvRecord, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (typeof raw === 'boolean') return raw;
  if (typeof raw !== 'string') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Builds a config from an env record, usually `import.meta.env`.
 * Missing, unparseable or negative numbers keep their default.
 */
export function loadClientConfig(env: EnvRecord = {}, overrides: Partial<ClientConfig> = {}): ClientConfig {
  const d = DEFAULT_CLIENT_CONFIG;
  const fromEnv: ClientConfig = {
    baseUrl: (readString(env, 'VITE_API_GATEWAY_URL') ?? d.baseUrl).replace(/\/+$/, ''),
    apiPrefix: readString(env, 'VITE_API_PREFIX') ?? d.apiPrefix,
    requestTimeoutMs: readInt(env, 'VITE_API_TIMEOUT', d.requestTimeoutMs),
    cacheTtlMs: readInt(env, 'VITE_API_CACHE_TTL', d.cacheTtlMs),
    cacheQuotaBytes: readInt(env, 'VITE_API_CACHE_QUOTA', d.cacheQuotaBytes),
    retryCount: Math.max(1, readInt(env, 'VITE_API_RETRY_COUNT', d.retryCount)),
    retryBaseDelayMs: readInt(env, 'VITE_API_RETRY_DELAY', d.retryBaseDelayMs),
    bulkBatchSize: Math.max(1, readInt(env, 'VITE_BULK_BATCH_SIZE', d.bulkBatchSize)),
    exportLimit: readInt(env, 'VITE_EXPORT_LIMIT', d.exportLimit),
    autoRefreshIntervalMs: readInt(env, 'VITE_AUTO_REFRESH_INTERVAL', d.autoRefreshIntervalMs),
    offlineMaxAgeMs: d.offlineMaxAgeMs,
    clientVersion: readString(env, 'VITE_APP_VERSION') ?? d.clientVersion,
    clientPlatform: d.clientPlatform,
    authTokenKey: readString(env, 'VITE_AUTH_TOKEN_KEY') ?? d.authTokenKey,
    realtimeUrl: readString(env, 'VITE_WS_URL'),
    enableLogging: readFlag(env, 'VITE_ENABLE_LOGGING', d.enableLogging),
  };
  return { ...fromEnv, ...overrides };
}
