/**
 * Data-access context
 * Builds every stateful object of the data layer once and wires them
 * together: cache, dedup, offline queue, transport, entity services and the
 * optional realtime bridge. Create one at application start and call
 * `dispose()` on unmount; `logout()` ends a session, `login()` starts the next.
 */

import { loadClientConfig, type ClientConfig, type EnvRecord } from './config';
import { InvalidationService } from './cache/InvalidationService';
import { RequestDeduplicator } from './cache/RequestDeduplicator';
import { ResponseCache } from './cache/ResponseCache';
import { TokenStore } from './client/authTokens';
import { ConnectivityMonitor, type ConnectivityTarget } from './client/ConnectivityMonitor';
import { EventBus, type ClientEventMap } from './client/EventBus';
import type { DomainError } from './client/errors';
import { OfflineQueue } from './client/OfflineQueue';
import { RealtimeBridge, type RealtimeConnector } from './client/RealtimeBridge';
import { RequestMetrics } from './client/RequestMetrics';
import { abortableSleep, computeDelay, type Sleep } from './client/RetryController';
import { resolveStorage, type KeyValueStorage } from './client/storage';
import { TransportClient, type FetchLike } from './client/TransportClient';
import { FeedbackService } from './services/feedbackService';
import { MemberService } from './services/memberService';
import { createLogger, type Logger } from './utils/logger';

export interface DataAccessContextOptions {
  /** Usually `import.meta.env` */
  env?: EnvRecord;
  config?: Partial<ClientConfig>;
  storage?: KeyValueStorage;
  fetch?: FetchLike;
  sleep?: Sleep;
  refreshToken?: () => Promise<string | null>;
  /** Push channel factory; defaults to the browser WebSocket */
  connector?: RealtimeConnector;
  connectivityTarget?: ConnectivityTarget;
  initialOnline?: boolean;
}

export interface DataAccessContext {
  config: ClientConfig;
  logger: Logger;
  storage: KeyValueStorage;
  cache: ResponseCache;
  deduplicator: RequestDeduplicator;
  queue: OfflineQueue;
  tokens: TokenStore;
  connectivity: ConnectivityMonitor;
  events: EventBus<ClientEventMap>;
  metrics: RequestMetrics;
  transport: TransportClient;
  invalidation: InvalidationService;
  feedback: FeedbackService;
  members: MemberService;
  /** Null when no realtime URL is configured */
  realtime: RealtimeBridge | null;
  dispose(): void;
  /** Stores the bearer token and reopens the realtime channel */
  login(token: string): void;
  /** Clears credentials, caches and the queue; the realtime channel stays closed until `login` */
  logout(): void;
}

export function createDataAccessContext(options: DataAccessContextOptions = {}): DataAccessContext {
  const config = loadClientConfig(options.env, options.config);
  const logger = createLogger('DataAccess', config.enableLogging);
  const storage = options.storage ?? resolveStorage();

  const cache = new ResponseCache({
    ttlMs: config.cacheTtlMs,
    maxBytes: config.cacheQuotaBytes,
    storage,
    logger: logger.child('ResponseCache'),
  });
  const deduplicator = new RequestDeduplicator();
  const queue = new OfflineQueue({ storage, maxAgeMs: config.offlineMaxAgeMs, logger: logger.child('OfflineQueue') });
  const tokens = new TokenStore(storage, config.authTokenKey, logger.child('TokenStore'));
  const connectivity = new ConnectivityMonitor({
    initialOnline: options.initialOnline,
    target: options.connectivityTarget,
    logger: logger.child('ConnectivityMonitor'),
  });
  const events = new EventBus<ClientEventMap>(logger.child('EventBus'));
  const metrics = new RequestMetrics();

  const transport = new TransportClient({
    config,
    cache,
    deduplicator,
    queue,
    tokens,
    connectivity,
    events,
    metrics,
    fetch: options.fetch,
    sleep: options.sleep,
    refreshToken: options.refreshToken,
    logger: logger.child('TransportClient'),
  });

  const invalidation = new InvalidationService(cache, logger.child('InvalidationService'));
  const feedback = new FeedbackService(
    { transport, invalidation, config, logger: logger.child('FeedbackService') },
    config.apiPrefix,
  );
  const members = new MemberService(
    { transport, invalidation, config, logger: logger.child('MemberService') },
    config.apiPrefix,
  );

  const realtime = config.realtimeUrl
    ? new RealtimeBridge({
        url: config.realtimeUrl,
        invalidation,
        events,
        tokens,
        connector: options.connector,
        logger: logger.child('RealtimeBridge'),
      })
    : null;

  const restored = cache.restore();
  if (restored > 0) logger.debug(`Restored ${restored} cached responses`);

  const sleep = options.sleep ?? abortableSleep;
  let disposed = false;
  let drainRetry: AbortController | null = null;
  let drainAttempts = 0;

  const cancelDrainRetry = () => {
    drainRetry?.abort();
    drainRetry = null;
    drainAttempts = 0;
  };

  // a halted drain is retried with backoff while the connection stays up
  const retryDrain = (cause: DomainError) => {
    if (drainRetry || disposed) return;
    if (drainAttempts >= config.retryCount) {
      logger.warn(`Offline queue replay halted after ${drainAttempts} retries`, cause.kind);
      drainAttempts = 0;
      return;
    }
    drainAttempts += 1;
    const delay = computeDelay(drainAttempts, config.retryBaseDelayMs, cause);
    const controller = new AbortController();
    drainRetry = controller;
    logger.debug(`Retrying offline queue in ${delay}ms`);
    sleep(delay, controller.signal).then(
      () => {
        if (drainRetry !== controller) return;
        drainRetry = null;
        drain();
      },
      (error: unknown) => {
        logger.debug('Offline queue retry cancelled', error);
      },
    );
  };

  const drain = () => {
    transport.drainOfflineQueue().then(
      (result) => {
        if (result.haltedBy && result.remaining > 0) {
          retryDrain(result.haltedBy);
        } else {
          drainAttempts = 0;
        }
      },
      (error: unknown) => {
        logger.error('Offline queue drain failed', error);
      },
    );
  };

  const teardown = [
    queue.subscribe((operations) => events.publish('queue-change', { size: operations.length })),
    connectivity.onChange((online) => events.publish('connection-change', { channel: 'network', connected: online })),
    connectivity.onReconnect(() => {
      invalidation.onReconnect();
      cancelDrainRetry();
      drain();
    }),
    feedback.attachRealtime(events),
    members.attachRealtime(events),
  ];

  connectivity.start();
  realtime?.start();
  if (connectivity.isOnline() && queue.size() > 0) drain();

  return {
    config,
    logger,
    storage,
    cache,
    deduplicator,
    queue,
    tokens,
    connectivity,
    events,
    metrics,
    transport,
    invalidation,
    feedback,
    members,
    realtime,

    dispose() {
      if (disposed) return;
      disposed = true;
      cancelDrainRetry();
      realtime?.stop();
      connectivity.stop();
      transport.cancelAll();
      teardown.forEach((unsubscribe) => unsubscribe());
      cache.persist();
      events.clear();
    },

    login(token: string) {
      tokens.setToken(token);
      if (!disposed) realtime?.start();
    },

    logout() {
      transport.cancelAll();
      tokens.clear();
      invalidation.onManualClear();
      cache.clearBackup();
      cancelDrainRetry();
      queue.clear();
      feedback.collection.clear();
      members.collection.clear();
      realtime?.stop();
    },
  };
}
