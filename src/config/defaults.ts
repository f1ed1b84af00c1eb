/**
 * Default Configuration Constants
 *
 * All magic numbers and hardcoded values centralized here for easy tuning.
 * Every value can be overridden from config/canary.yaml.
 */

import type { CanaryRuntimeConfig } from '../types/schemas/config.js';

/**
 * Deployment Defaults
 */
export const DEPLOYMENTS = {
  /** Share of traffic a new canary receives (%) */
  DEFAULT_TRAFFIC_SPLIT_PERCENT: 10,

  /** Lifetime of a canary before the expiry sweep retires it (minutes) */
  DEFAULT_DURATION_MINUTES: 240, // 4 hours

  /** Canary requests required before an automated verdict */
  DEFAULT_MIN_SAMPLE_SIZE: 50,
} as const;

/**
 * Evaluation Defaults
 */
export const EVALUATION = {
  /** Metrics window queried per evaluation (seconds) */
  WINDOW_SECONDS: 3_600, // 1 hour

  /** Repeated evaluations of an unchanged snapshot inside this window are not logged again (ms) */
  DEDUP_WINDOW_MS: 30_000, // 30 seconds

  /** Maximum age of the passing verdict a traffic-split change relies on (ms) */
  RAMP_FRESHNESS_MS: 300_000, // 5 minutes

  /** Allowed canary success-rate drop below baseline (absolute) */
  DEFAULT_SUCCESS_RATE_TOLERANCE: 0.02,

  /** Allowed canary/baseline P95 latency ratio */
  DEFAULT_LATENCY_REGRESSION_RATIO: 1.5,
} as const;

/**
 * Expiry Sweep
 */
export const EXPIRY = {
  /** Period of the optional expiry timer (ms) */
  SWEEP_INTERVAL_MS: 60_000, // 1 minute
} as const;

/**
 * Agent Readiness
 */
export const READINESS = {
  /** Latency targets above this are flagged as a warning (ms) */
  HIGH_LATENCY_TARGET_MS: 10_000,
} as const;

/**
 * Router
 */
export const ROUTER = {
  /** Cached routing decisions per router */
  CACHE_SIZE: 10_000,
} as const;

/**
 * Complete configuration used when no file overrides a value
 */
export const DEFAULT_CONFIG: CanaryRuntimeConfig = {
  agents: {
    spec_dir: 'agents',
  },
  deployments: {
    state_dir: 'config/deployments',
    default_traffic_split_percent: DEPLOYMENTS.DEFAULT_TRAFFIC_SPLIT_PERCENT,
    default_duration_minutes: DEPLOYMENTS.DEFAULT_DURATION_MINUTES,
    default_min_sample_size: DEPLOYMENTS.DEFAULT_MIN_SAMPLE_SIZE,
  },
  evaluation: {
    window_seconds: EVALUATION.WINDOW_SECONDS,
    dedup_window_ms: EVALUATION.DEDUP_WINDOW_MS,
    ramp_freshness_ms: EVALUATION.RAMP_FRESHNESS_MS,
    default_success_rate_tolerance: EVALUATION.DEFAULT_SUCCESS_RATE_TOLERANCE,
    default_latency_regression_ratio: EVALUATION.DEFAULT_LATENCY_REGRESSION_RATIO,
  },
  expiry: {
    sweep_interval_ms: EXPIRY.SWEEP_INTERVAL_MS,
  },
  metrics: {
    source: 'prometheus',
    prometheus_url: 'http://localhost:9090',
    query_timeout_ms: 5_000,
  },
  router: {
    strategy: 'hash',
    cache_size: ROUTER.CACHE_SIZE,
  },
  alerts: {},
  logging: {
    level: 'info',
  },
};
