/**
 * RealtimeBridge
 * Listens on the push channel, invalidates the cache prefixes an entity
 * change makes stale and republishes the change on the event bus.
 * Drops are logged and retried with capped exponential backoff; they are
 * never surfaced as errors.
 */

import type { EntityChange, InvalidationService } from '../cache/InvalidationService';
import { createLogger, type Logger } from '../utils/logger';
import type { TokenStore } from './authTokens';
import type { ClientEventMap, EntityEvent, EventBus } from './EventBus';

// ============================================================================
// Types
// ============================================================================

export interface RealtimeHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(): void;
  onError(error: unknown): void;
}

export interface RealtimeSocket {
  close(): void;
}

export type RealtimeConnector = (url: string, handlers: RealtimeHandlers) => RealtimeSocket;

export interface RealtimeBridgeOptions {
  url: string;
  invalidation: InvalidationService;
  events: EventBus<ClientEventMap>;
  tokens?: TokenStore;
  connector?: RealtimeConnector;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Gives up after this many consecutive failed reconnects */
  maxReconnectAttempts?: number;
  logger?: Logger;
}

const ENTITY_CHANGES: readonly EntityChange[] = ['created', 'updated', 'deleted', 'bulk-operation'];

export const DEFAULT_RECONNECT_BASE_MS = 1000;
export const MAX_RECONNECT_DELAY_MS = 30_000;

/**
 * Delay before reconnect attempt `attempt` (0-based).
 */
export function reconnectDelay(
  attempt: number,
  baseDelayMs: number = DEFAULT_RECONNECT_BASE_MS,
  maxDelayMs: number = MAX_RECONNECT_DELAY_MS,
): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Parses `{"type": "<entity>:<action>", "id"?, "data"?}`; anything else is null.
 */
export function parseRealtimeMessage(data: string): EntityEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const type: unknown = Reflect.get(parsed, 'type');
  if (typeof type !== 'string') return null;
  const separator = type.lastIndexOf(':');
  if (separator <= 0) return null;

  const entity = type.slice(0, separator);
  const action = ENTITY_CHANGES.find((change) => change === type.slice(separator + 1));
  if (!action) return null;

  const id: unknown = Reflect.get(parsed, 'id');
  return {
    entity,
    action,
    id: typeof id === 'string' || typeof id === 'number' ? String(id) : undefined,
    data: Reflect.get(parsed, 'data'),
  };
}

export const webSocketConnector: RealtimeConnector = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.onopen = () => handlers.onOpen();
  socket.onmessage = (event: MessageEvent) => handlers.onMessage(typeof event.data === 'string' ? event.data : '');
  socket.onclose = () => handlers.onClose();
  socket.onerror = (event) => handlers.onError(event);
  return { close: () => socket.close() };
};

// ============================================================================
// Bridge
// ============================================================================

export class RealtimeBridge {
  private url: string;
  private invalidation: InvalidationService;
  private events: EventBus<ClientEventMap>;
  private tokens?: TokenStore;
  private connector: RealtimeConnector;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private maxReconnectAttempts: number;
  private logger: Logger;

  private socket: RealtimeSocket | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private attempts = 0;
  private connected = false;
  private hasConnected = false;
  private running = false;
  /** Bumped per socket; events from older sockets are ignored */
  private generation = 0;

  constructor(options: RealtimeBridgeOptions) {
    this.url = options.url;
    this.invalidation = options.invalidation;
    this.events = options.events;
    this.tokens = options.tokens;
    this.connector = options.connector ?? webSocketConnector;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RECONNECT_BASE_MS;
    this.maxDelayMs = options.maxDelayMs ?? MAX_RECONNECT_DELAY_MS;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? Number.POSITIVE_INFINITY;
    this.logger = options.logger ?? createLogger('RealtimeBridge');
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.attempts = 0;
    this.open();
  }

  stop(): void {
    this.running = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const socket = this.socket;
    this.socket = null;
    this.setConnected(false);
    socket?.close();
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Invalidates, then republishes one change.
   */
  dispatch(event: EntityEvent): void {
    this.invalidation.onChange(event.entity, event.action, event.id);
    this.events.publish(event.action, event);
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  private open(): void {
    const token = this.tokens?.getToken();
    const url = token ? `${this.url}${this.url.includes('?') ? '&' : '?'}token=${encodeURIComponent(token)}` : this.url;

    this.generation += 1;
    const generation = this.generation;
    const current = () => generation === this.generation;

    try {
      this.socket = this.connector(url, {
        onOpen: () => {
          if (current()) this.handleOpen();
        },
        onMessage: (data) => {
          if (current()) this.handleMessage(data);
        },
        onClose: () => {
          if (current()) this.handleClose();
        },
        onError: (error) => {
          if (current()) this.logger.warn('Channel error', error);
        },
      });
    } catch (error) {
      this.logger.warn('Could not open channel', error);
      this.socket = null;
      this.scheduleReconnect();
    }
  }

  private handleOpen(): void {
    const reconnected = this.hasConnected;
    this.attempts = 0;
    this.hasConnected = true;
    this.setConnected(true);

    // changes pushed while disconnected were missed
    if (reconnected) {
      const removed = this.invalidation.onReconnect();
      this.logger.info(`Reconnected, invalidated ${removed} entries`);
    }
  }

  private handleMessage(data: string): void {
    const event = parseRealtimeMessage(data);
    if (!event) {
      this.logger.warn('Ignoring malformed message', data);
      return;
    }
    this.dispatch(event);
  }

  private handleClose(): void {
    this.socket = null;
    this.setConnected(false);
    if (!this.running) return;
    this.logger.warn('Channel dropped');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.running || this.timer) return;
    if (this.attempts >= this.maxReconnectAttempts) {
      this.logger.warn(`Giving up after ${this.attempts} reconnect attempts`);
      return;
    }

    const delay = reconnectDelay(this.attempts, this.baseDelayMs, this.maxDelayMs);
    this.attempts += 1;
    this.logger.debug(`Reconnecting in ${delay}ms (attempt ${this.attempts})`);
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.running) this.open();
    }, delay);
  }

  private setConnected(connected: boolean): void {
    if (this.connected === connected) return;
    this.connected = connected;
    this.events.publish('connection-change', { channel: 'realtime', connected });
  }
}
