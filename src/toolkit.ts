/**
 * Toolkit Factory
 *
 * Creates and wires the registry, metrics, quality gates, deployment
 * manager, router and alerting from runtime configuration. Any collaborator
 * can be injected, which is how tests run the whole system in memory.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { CanaryError } from './api/errors.js';
import { CanaryManager } from './canary/canary-manager.js';
import { CanaryRouter } from './canary/canary-router.js';
import type { DeploymentRecordStore } from './canary/deployment-store.js';
import { FileDeploymentStore, FileLockProvider } from './canary/file-deployment-store.js';
import { KeyedMutex, type LockProvider } from './canary/keyed-mutex.js';
import { WebhookRollbackNotifier } from './canary/rollback-notifier.js';
import { toManagerConfig, toQualityGateConfig } from './config/loader.js';
import { InMemoryMetricsStore } from './metrics/in-memory-metrics-store.js';
import type { MetricsAccessor, MetricsRecorder } from './metrics/metrics-accessor.js';
import { PrometheusMetricsAccessor } from './metrics/prometheus-accessor.js';
import { QualityGateEvaluator } from './quality/quality-gate.js';
import { AgentSpecStore } from './registry/agent-spec-store.js';
import { FileAgentSpecSource, type AgentSpecSource } from './registry/spec-sources.js';
import type { CanaryRuntimeConfig } from './types/schemas/config.js';

/**
 * Overrides for the collaborators the configuration would otherwise create
 */
export interface ToolkitOptions {
  /** Directory relative config paths resolve against (default: cwd) */
  baseDir?: string;
  logger?: Logger;
  specSource?: AgentSpecSource;
  metrics?: MetricsAccessor;
  recorder?: MetricsRecorder;
  records?: DeploymentRecordStore;
  locks?: LockProvider;
  clock?: () => number;
  idGenerator?: () => string;
  fetch?: typeof fetch;
}

/**
 * Wired components, returned for use and lifecycle management
 */
export interface Toolkit {
  config: CanaryRuntimeConfig;
  specs: AgentSpecStore;
  metrics: MetricsAccessor;
  records: DeploymentRecordStore;
  quality: QualityGateEvaluator;
  manager: CanaryManager;
  router: CanaryRouter;
  notifier?: WebhookRollbackNotifier;
  logger?: Logger;

  /** Stop timers and wait for alerts in flight */
  shutdown(): Promise<void>;
}

function createMetrics(
  config: CanaryRuntimeConfig,
  options: ToolkitOptions
): { metrics: MetricsAccessor; recorder?: MetricsRecorder } {
  if (options.metrics) {
    return { metrics: options.metrics, recorder: options.recorder };
  }

  if (config.metrics.source === 'memory') {
    const store = new InMemoryMetricsStore({ clock: options.clock }, options.logger);
    return { metrics: store, recorder: options.recorder ?? store };
  }

  const baseUrl = config.metrics.prometheus_url;
  if (!baseUrl) {
    throw new CanaryError('ConfigurationError', 'metrics.prometheus_url is required when source is prometheus');
  }

  return {
    metrics: new PrometheusMetricsAccessor(
      { baseUrl, timeoutMs: config.metrics.query_timeout_ms, fetch: options.fetch },
      options.logger
    ),
    recorder: options.recorder,
  };
}

/**
 * Create every component from configuration
 *
 * @example
 * ```typescript
 * const toolkit = createToolkit(loadConfig());
 * const record = await toolkit.manager.create('spirit-a', { model: 'model-v2' });
 * ```
 */
export function createToolkit(config: CanaryRuntimeConfig, options: ToolkitOptions = {}): Toolkit {
  const { logger } = options;
  const baseDir = options.baseDir ?? process.cwd();
  const stateDir = path.resolve(baseDir, config.deployments.state_dir);

  const specs = new AgentSpecStore(
    options.specSource ??
      new FileAgentSpecSource(path.resolve(baseDir, config.agents.spec_dir), logger),
    logger
  );

  const { metrics, recorder } = createMetrics(config, options);
  const records = options.records ?? new FileDeploymentStore(stateDir, logger);
  const locks =
    options.locks ??
    (records instanceof FileDeploymentStore
      ? new FileLockProvider(path.join(stateDir, '.locks'), {}, logger)
      : new KeyedMutex());
  const quality = new QualityGateEvaluator(toQualityGateConfig(config));

  const manager = new CanaryManager(
    {
      specs,
      metrics,
      records,
      quality,
      locks,
      clock: options.clock,
      idGenerator: options.idGenerator,
    },
    toManagerConfig(config),
    logger
  );

  const router = new CanaryRouter(
    manager,
    { strategy: config.router.strategy, cacheSize: config.router.cache_size },
    recorder,
    logger
  );
  manager.attachRouter(router);

  let notifier: WebhookRollbackNotifier | undefined;
  if (config.alerts.webhook_url) {
    notifier = new WebhookRollbackNotifier(
      { webhookUrl: config.alerts.webhook_url, fetch: options.fetch },
      logger
    );
    notifier.attach(manager);
  }

  return {
    config,
    specs,
    metrics,
    records,
    quality,
    manager,
    router,
    notifier,
    logger,
    async shutdown() {
      manager.shutdown();
      await notifier?.flush();
    },
  };
}
