import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  toManagerConfig,
  toQualityGateConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { CanaryError } from '../../../src/api/errors.js';

describe('Config Loader', () => {
  let testConfigDir: string;
  let savedConfigEnv: string | undefined;

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'canary-config-'));
    savedConfigEnv = process.env.CANARY_CONFIG;
    delete process.env.CANARY_CONFIG;
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    if (savedConfigEnv === undefined) {
      delete process.env.CANARY_CONFIG;
    } else {
      process.env.CANARY_CONFIG = savedConfigEnv;
    }
    resetConfig();
  });

  function writeConfig(content: unknown, name = 'canary.yaml'): string {
    const configPath = join(testConfigDir, name);
    writeFileSync(configPath, typeof content === 'string' ? content : yaml.dump(content));
    return configPath;
  }

  describe('loadConfig', () => {
    it('should load the packaged configuration', () => {
      const config = loadConfig(undefined, 'production');

      expect(config.deployments.default_traffic_split_percent).toBe(10);
      expect(config.deployments.default_duration_minutes).toBe(240);
      expect(config.evaluation.dedup_window_ms).toBe(30000);
      expect(config.metrics.source).toBe('prometheus');
      expect(config.logging.level).toBe('info');
    });

    it('should apply environment overrides', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.metrics.source).toBe('memory');
      expect(config.logging.level).toBe('silent');
    });

    it('should fill missing values from defaults', () => {
      const configPath = writeConfig({ deployments: { default_min_sample_size: 5 } });

      const config = loadConfig(configPath, 'production');

      expect(config.deployments.default_min_sample_size).toBe(5);
      expect(config.deployments.default_traffic_split_percent).toBe(10);
      expect(config.router).toEqual(DEFAULT_CONFIG.router);
    });

    it('should treat an empty file as defaults', () => {
      const configPath = writeConfig('');

      expect(loadConfig(configPath, 'production')).toEqual(DEFAULT_CONFIG);
    });

    it('should honor CANARY_CONFIG', () => {
      process.env.CANARY_CONFIG = writeConfig({ agents: { spec_dir: 'specs' } });

      expect(loadConfig(undefined, 'production').agents.spec_dir).toBe('specs');
    });

    it('should reject a missing explicit file', () => {
      const missing = join(testConfigDir, 'missing.yaml');

      expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
    });

    it('should reject malformed YAML', () => {
      const configPath = writeConfig('agents: [unclosed');

      expect(() => loadConfig(configPath)).toThrow(CanaryError);
      expect(() => loadConfig(configPath)).toThrow(/Invalid YAML/);
    });

    it('should reject a non-mapping root', () => {
      const configPath = writeConfig('- one\n- two\n');

      expect(() => loadConfig(configPath)).toThrow(
        `Configuration root must be a mapping: ${configPath}`
      );
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('should list invalid fields', () => {
      const invalid = {
        ...DEFAULT_CONFIG,
        deployments: { ...DEFAULT_CONFIG.deployments, default_traffic_split_percent: 0 },
      };

      try {
        validateConfig(invalid);
        expect.unreachable('validateConfig should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(CanaryError);
        if (!(error instanceof CanaryError)) return;
        expect(error.code).toBe('ConfigurationError');
        expect(error.message).toBe(
          'Configuration validation failed:\ndeployments.default_traffic_split_percent must be >= 1'
        );
      }
    });

    it('should require a Prometheus URL for the prometheus source', () => {
      const invalid = {
        ...DEFAULT_CONFIG,
        metrics: { source: 'prometheus', query_timeout_ms: 5000 },
      };

      expect(() => validateConfig(invalid)).toThrow(
        'metrics.prometheus_url is required when source is prometheus'
      );
    });
  });

  describe('global configuration', () => {
    it('should cache the initialized configuration', () => {
      const configPath = writeConfig({ agents: { spec_dir: 'cached' } });

      const initialized = initializeConfig(configPath, 'production');

      expect(getConfig()).toBe(initialized);
      expect(getConfig().agents.spec_dir).toBe('cached');
    });
  });

  describe('conversions', () => {
    it('should convert to manager configuration', () => {
      expect(toManagerConfig(DEFAULT_CONFIG)).toEqual({
        defaultTrafficSplitPercent: 10,
        defaultDurationMs: 14_400_000,
        defaultMinSampleSize: 50,
        evaluationWindowSeconds: 3600,
        dedupWindowMs: 30_000,
        rampFreshnessMs: 300_000,
        expirySweepIntervalMs: 60_000,
      });
    });

    it('should convert to quality gate configuration', () => {
      expect(toQualityGateConfig(DEFAULT_CONFIG)).toEqual({
        defaultSuccessRateTolerance: 0.02,
        defaultLatencyRegressionRatio: 1.5,
      });
    });
  });
});
