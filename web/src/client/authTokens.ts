/**
 * Bearer token persistence with JWT expiry checks.
 */

import type { KeyValueStorage } from './storage';
import { createLogger, type Logger } from '../utils/logger';

export const EXPIRY_BUFFER_MS = 60_000;

export interface JwtPayload {
  exp?: number;
  sub?: string;
  [claim: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes the payload segment of a JWT; undefined when it is not one.
 */
export function parseJwt(token: string): JwtPayload | undefined {
  const segment = token.split('.')[1];
  if (!segment) return undefined;
  try {
    const base64 = segment.replace(/-/g, '+').replace(/_/g, '/');
    const binary = atob(base64.padEnd(base64.length + ((4 - (base64.length % 4)) % 4), '='));
    const json = decodeURIComponent(
      binary
        .split('')
        .map((c) => '%' + ('00' + c.charCodeAt(0).toString(16)).slice(-2))
        .join(''),
    );
    const payload: unknown = JSON.parse(json);
    if (!isRecord(payload)) return undefined;
    const exp = payload.exp;
    return { ...payload, exp: typeof exp === 'number' ? exp : undefined };
  } catch {
    return undefined;
  }
}

/**
 * Tokens without a readable `exp` count as expired. A one minute buffer
 * avoids sending a token that lapses in flight.
 */
export function isTokenExpired(token: string, now: number = Date.now(), bufferMs: number = EXPIRY_BUFFER_MS): boolean {
  const exp = parseJwt(token)?.exp;
  if (exp === undefined) return true;
  return now >= exp * 1000 - bufferMs;
}

export class TokenStore {
  private storage: KeyValueStorage;
  private key: string;
  private logger: Logger;

  constructor(storage: KeyValueStorage, key = 'auth_token', logger: Logger = createLogger('TokenStore')) {
    this.storage = storage;
    this.key = key;
    this.logger = logger;
  }

  /**
   * Current token, or null. Expired tokens are removed on read.
   */
  getToken(): string | null {
    const token = this.storage.getItem(this.key);
    if (!token) return null;
    if (isTokenExpired(token)) {
      this.logger.info('Stored token expired, removing it');
      this.clear();
      return null;
    }
    return token;
  }

  setToken(token: string): void {
    this.storage.setItem(this.key, token);
  }

  clear(): void {
    this.storage.removeItem(this.key);
  }
}
