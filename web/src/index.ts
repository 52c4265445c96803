/**
 * Public entry of the feedback and member data-access layer
 */

export { createDataAccessContext, type DataAccessContext, type DataAccessContextOptions } from './context';
export { loadClientConfig, DEFAULT_CLIENT_CONFIG, type ClientConfig, type EnvRecord } from './config';
export { createLogger, type Logger } from './utils/logger';

export * from './cache';

export {
  DomainError,
  ErrorKind,
  classify,
  isDomainError,
  isCancellation,
  defaultMessageFor,
  type FieldError,
} from './client/errors';
export { TransportClient, buildQuery, type FetchLike, type RequestOptions, type GetOptions, type MutationOptions } from './client/TransportClient';
export { OfflineQueue, type QueuedOperation, type DrainResult, type RequestSpec } from './client/OfflineQueue';
export { ConnectivityMonitor, type ConnectivityTarget } from './client/ConnectivityMonitor';
export { TokenStore, parseJwt, isTokenExpired } from './client/authTokens';
export {
  EventBus,
  type ClientEventMap,
  type EntityEvent,
  type QueueChangeEvent,
  type ConnectionChangeEvent,
  type AuthRequiredEvent,
} from './client/EventBus';
export { RealtimeBridge, webSocketConnector, type RealtimeConnector, type RealtimeHandlers } from './client/RealtimeBridge';
export { RequestMetrics, type RequestMetricsSnapshot } from './client/RequestMetrics';
export { MemoryStorage, resolveStorage, type KeyValueStorage } from './client/storage';

export { LocalCollection, type CollectionSnapshot, type HeldRecord } from './state/LocalCollection';

export { EntityService, type ReadOptions, type UpdateOptions, type BulkOptions, type ExportOptions } from './services/EntityService';
export { FeedbackService, decodeFeedback, decodeFeedbackStats, FEEDBACK_ENTITY } from './services/feedbackService';
export { MemberService, decodeMember, decodeMemberStats, canTransition, MEMBER_ENTITY } from './services/memberService';

export * from './types/common';
export * from './types/feedback';
export * from './types/member';

export { useEntityList, type ListSource, type EntityListOptions, type EntityListState } from './hooks/useEntityList';
export { usePendingSync, type PendingSyncState } from './hooks/usePendingSync';
