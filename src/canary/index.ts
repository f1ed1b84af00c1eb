/**
 * Canary Deployment System - Traffic-split canaries with quality gates and
 * automatic rollback
 *
 * @module canary
 * @packageDocumentation
 */

// Core orchestration
export {
  CanaryManager,
  DEFAULT_CANARY_CONFIG,
  EXPIRY_REASON,
  LIVE_STATES,
  TERMINAL_STATES,
  latestVerdictEntry,
  type CanaryManagerConfig,
  type CanaryManagerDeps,
  type CanaryManagerEvents,
  type CreateDeploymentOptions,
  type RollbackInfo,
} from './canary-manager.js';

// Traffic routing
export {
  CanaryRouter,
  type ActiveCanary,
  type CanaryRouteSource,
  type CanaryRouterConfig,
  type RouteChange,
  type RouteNotifier,
  type RoutingDecision,
  type RoutingStats,
} from './canary-router.js';

// Persistence
export {
  InMemoryDeploymentStore,
  type DeploymentRecordStore,
} from './deployment-store.js';
export {
  FileDeploymentStore,
  FileLockProvider,
  type FileLockOptions,
} from './file-deployment-store.js';
export { KeyedMutex, type LockProvider } from './keyed-mutex.js';

// Alerting
export {
  WebhookRollbackNotifier,
  type CanaryAlert,
  type CanaryAlertType,
  type WebhookNotifierConfig,
} from './rollback-notifier.js';
