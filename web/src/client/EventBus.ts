/**
 * EventBus
 * Typed publish/subscribe used for entity change notifications and
 * app-wide signals (auth required, queue size, connection state).
 */

import { createLogger, type Logger } from '../utils/logger';
import type { EntityChange } from '../cache/InvalidationService';

// ============================================================================
// Events
// ============================================================================

export interface EntityEvent {
  /** Entity name as registered with the bridge, e.g. `feedback` */
  entity: string;
  action: EntityChange;
  id?: string;
  /** Raw record sent with the push message, if any */
  data?: unknown;
}

export interface AuthRequiredEvent {
  reason: 'refresh-failed' | 'refresh-unavailable';
  correlationId?: string;
}

export interface QueueChangeEvent {
  size: number;
}

export interface ConnectionChangeEvent {
  channel: 'network' | 'realtime';
  connected: boolean;
}

export interface ClientEventMap {
  created: EntityEvent;
  updated: EntityEvent;
  deleted: EntityEvent;
  'bulk-operation': EntityEvent;
  'auth-required': AuthRequiredEvent;
  'queue-change': QueueChangeEvent;
  'connection-change': ConnectionChangeEvent;
}

export type EventHandler<P> = (payload: P) => void;

type HandlerMap<M> = { [K in keyof M]?: Set<EventHandler<M[K]>> };

// ============================================================================
// Bus
// ============================================================================

export class EventBus<M = ClientEventMap> {
  private handlers: HandlerMap<M> = {};
  private logger: Logger;

  constructor(logger: Logger = createLogger('EventBus')) {
    this.logger = logger;
  }

  /**
   * Registering the same handler twice for one type is ignored.
   */
  subscribe<K extends keyof M>(type: K, handler: EventHandler<M[K]>): () => void {
    let set: Set<EventHandler<M[K]>> | undefined = this.handlers[type];
    if (!set) {
      set = new Set<EventHandler<M[K]>>();
      this.handlers[type] = set;
    }

    if (set.has(handler)) {
      this.logger.warn(`Handler already subscribed to "${String(type)}"`);
    } else {
      set.add(handler);
    }

    const registered = set;
    return () => {
      registered.delete(handler);
    };
  }

  publish<K extends keyof M>(type: K, payload: M[K]): void {
    const set = this.handlers[type];
    if (!set) return;
    for (const handler of Array.from(set)) {
      try {
        handler(payload);
      } catch (error) {
        this.logger.error(`Error in ${String(type)} handler`, error);
      }
    }
  }

  listenerCount<K extends keyof M>(type: K): number {
    return this.handlers[type]?.size ?? 0;
  }

  clear(): void {
    this.handlers = {};
  }
}
