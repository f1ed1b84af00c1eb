/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating canary.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const AgentsConfigSchema = z.object({
  spec_dir: z.string().min(1, 'Spec directory cannot be empty'),
});

export const DeploymentsConfigSchema = z.object({
  state_dir: z.string().min(1, 'State directory cannot be empty'),
  default_traffic_split_percent: z
    .number()
    .int('must be an integer')
    .min(1, 'must be >= 1')
    .max(100, 'must be <= 100'),
  default_duration_minutes: z.number().min(0, 'must be >= 0'),
  default_min_sample_size: z.number().int('must be an integer').min(0, 'must be >= 0'),
});

export const EvaluationConfigSchema = z.object({
  window_seconds: z.number().int().positive('must be positive'),
  dedup_window_ms: z.number().int().min(0, 'must be >= 0'),
  ramp_freshness_ms: z.number().int().positive('must be positive'),
  default_success_rate_tolerance: z.number().min(0, 'must be >= 0').max(1, 'must be <= 1'),
  default_latency_regression_ratio: z.number().min(1, 'must be >= 1'),
});

export const ExpiryConfigSchema = z.object({
  sweep_interval_ms: z.number().int().positive('must be positive'),
});

export const MetricsConfigSchema = z
  .object({
    source: z.enum(['prometheus', 'memory'], {
      errorMap: () => ({ message: 'Metrics source must be one of: prometheus, memory' }),
    }),
    prometheus_url: z.string().url('must be a URL').optional(),
    query_timeout_ms: z.number().int().positive('must be positive'),
  })
  .refine((data) => data.source !== 'prometheus' || data.prometheus_url !== undefined, {
    message: 'is required when source is prometheus',
    path: ['prometheus_url'],
  });

export const RouterConfigSchema = z.object({
  strategy: z.enum(['hash', 'random'], {
    errorMap: () => ({ message: 'Router strategy must be one of: hash, random' }),
  }),
  cache_size: z.number().int().positive('must be positive'),
});

export const AlertsConfigSchema = z.object({
  webhook_url: z.string().url('must be a URL').optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Runtime configuration. Unknown top-level keys (including the
 * `environments` block, which the loader merges before validation) are
 * stripped.
 */
export const CanaryConfigSchema = z.object({
  agents: AgentsConfigSchema,
  deployments: DeploymentsConfigSchema,
  evaluation: EvaluationConfigSchema,
  expiry: ExpiryConfigSchema,
  metrics: MetricsConfigSchema,
  router: RouterConfigSchema,
  alerts: AlertsConfigSchema,
  logging: LoggingConfigSchema,
});

export type CanaryRuntimeConfig = z.infer<typeof CanaryConfigSchema>;
