/**
 * Connectivity Monitor
 *
 * Tracks browser online/offline state and signals each offline -> online
 * transition exactly once.
 */

import { createLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type ConnectivityListener = (online: boolean) => void;
export type ReconnectListener = () => void;

/**
 * Where online/offline events come from (`window` in browsers)
 */
export interface ConnectivityTarget {
  addEventListener(type: 'online' | 'offline', listener: () => void): void;
  removeEventListener(type: 'online' | 'offline', listener: () => void): void;
}

export interface ConnectivityMonitorOptions {
  /** Defaults to `navigator.onLine`, or true where there is no navigator */
  initialOnline?: boolean;
  /** Defaults to `window` when present */
  target?: ConnectivityTarget;
  logger?: Logger;
}

function detectOnline(): boolean {
  return typeof navigator !== 'undefined' && typeof navigator.onLine === 'boolean' ? navigator.onLine : true;
}

function detectTarget(): ConnectivityTarget | undefined {
  return typeof window !== 'undefined' ? window : undefined;
}

// ============================================================================
// Connectivity Monitor
// ============================================================================

export class ConnectivityMonitor {
  private online: boolean;
  private target?: ConnectivityTarget;
  private logger: Logger;
  private started = false;
  private changeListeners = new Set<ConnectivityListener>();
  private reconnectListeners = new Set<ReconnectListener>();
  private boundOnline: () => void;
  private boundOffline: () => void;

  constructor(options: ConnectivityMonitorOptions = {}) {
    this.online = options.initialOnline ?? detectOnline();
    this.target = options.target ?? detectTarget();
    this.logger = options.logger ?? createLogger('ConnectivityMonitor');

    this.boundOnline = () => this.setOnline(true);
    this.boundOffline = () => this.setOnline(false);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.started || !this.target) return;
    this.target.addEventListener('online', this.boundOnline);
    this.target.addEventListener('offline', this.boundOffline);
    this.started = true;
  }

  stop(): void {
    if (!this.started || !this.target) return;
    this.target.removeEventListener('online', this.boundOnline);
    this.target.removeEventListener('offline', this.boundOffline);
    this.started = false;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  isOnline(): boolean {
    return this.online;
  }

  setOnline(online: boolean): void {
    if (online === this.online) return;
    this.online = online;
    this.logger.info(online ? 'Back online' : 'Went offline');

    this.emit(this.changeListeners, (listener) => listener(online));
    if (online) {
      this.emit(this.reconnectListeners, (listener) => listener());
    }
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  onChange(listener: ConnectivityListener): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  /**
   * Fires once per offline -> online transition.
   */
  onReconnect(listener: ReconnectListener): () => void {
    this.reconnectListeners.add(listener);
    return () => {
      this.reconnectListeners.delete(listener);
    };
  }

  private emit<L>(listeners: Set<L>, call: (listener: L) => void): void {
    for (const listener of listeners) {
      try {
        call(listener);
      } catch (error) {
        this.logger.error('Connectivity listener failed', error);
      }
    }
  }
}
