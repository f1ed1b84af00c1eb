/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { CanaryError, errnoCode, zodIssuesToViolations } from '../api/errors.js';
import { CanaryConfigSchema, type CanaryRuntimeConfig } from '../types/schemas/config.js';
import type { CanaryManagerConfig } from '../canary/canary-manager.js';
import type { QualityGateConfig } from '../quality/quality-gate.js';
import { deepMerge, isRecord } from '../utils/object-helpers.js';
import { DEFAULT_CONFIG } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * Path precedence: explicit argument, CANARY_CONFIG, then
 * config/canary.yaml in the package root. Values missing from the file
 * fall back to {@link DEFAULT_CONFIG}; a missing default file yields the
 * defaults alone, a missing explicit file is an error.
 */
export function loadConfig(configPath?: string, environment?: Environment): CanaryRuntimeConfig {
  const explicitPath = configPath ?? process.env.CANARY_CONFIG;
  const finalPath = explicitPath ?? join(findPackageRoot(), 'config', 'canary.yaml');

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' && explicitPath === undefined) {
      return validateConfig(DEFAULT_CONFIG);
    }
    if (errnoCode(error) === 'ENOENT') {
      throw new CanaryError('ConfigurationError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    throw new CanaryError('ConfigurationError', `Failed to read configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fileContents) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CanaryError('ConfigurationError', `Invalid YAML in ${finalPath}: ${reason}`, {
      path: finalPath,
    });
  }

  if (!isRecord(parsed)) {
    throw new CanaryError('ConfigurationError', `Configuration root must be a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  // Apply environment-specific overrides
  const { environments, ...base } = parsed;
  let merged = deepMerge(DEFAULT_CONFIG, base);
  const override = isRecord(environments) ? environments[resolveEnvironment(environment)] : undefined;
  if (isRecord(override)) {
    merged = deepMerge(merged, override);
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 *
 * @throws CanaryError(ConfigurationError) listing every invalid field
 */
export function validateConfig(config: unknown): CanaryRuntimeConfig {
  const parseResult = CanaryConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const violations = zodIssuesToViolations(parseResult.error);
    const errors = violations.map((v) => `${v.field} ${v.message}`);

    throw new CanaryError(
      'ConfigurationError',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { violations }
    );
  }

  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: CanaryRuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): CanaryRuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): CanaryRuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML deployment/evaluation settings (snake_case) to the
 * manager's configuration (camelCase)
 */
export function toManagerConfig(config: CanaryRuntimeConfig): CanaryManagerConfig {
  return {
    defaultTrafficSplitPercent: config.deployments.default_traffic_split_percent,
    defaultDurationMs: config.deployments.default_duration_minutes * 60_000,
    defaultMinSampleSize: config.deployments.default_min_sample_size,
    evaluationWindowSeconds: config.evaluation.window_seconds,
    dedupWindowMs: config.evaluation.dedup_window_ms,
    rampFreshnessMs: config.evaluation.ramp_freshness_ms,
    expirySweepIntervalMs: config.expiry.sweep_interval_ms,
  };
}

/**
 * Baseline-comparison defaults for agents that do not set their own
 */
export function toQualityGateConfig(config: CanaryRuntimeConfig): QualityGateConfig {
  return {
    defaultSuccessRateTolerance: config.evaluation.default_success_rate_tolerance,
    defaultLatencyRegressionRatio: config.evaluation.default_latency_regression_ratio,
  };
}
