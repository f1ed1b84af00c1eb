/**
 * Agent Metrics - Query and record per-variant request outcomes
 *
 * @module metrics
 * @packageDocumentation
 */

export {
  describeWindow,
  type MetricsAccessor,
  type MetricsRecorder,
} from './metrics-accessor.js';

export {
  InMemoryMetricsStore,
  type InMemoryMetricsStoreConfig,
} from './in-memory-metrics-store.js';

export {
  PrometheusMetricsAccessor,
  type PrometheusAccessorConfig,
} from './prometheus-accessor.js';
