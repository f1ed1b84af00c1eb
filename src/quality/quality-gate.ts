/**
 * Quality Gate Evaluator - SLO checks for agent configurations
 *
 * Features:
 * - Absolute checks: success rate, P95 latency, hourly cost, security flags
 * - Canary-vs-baseline regression checks
 * - Every violation reported; no short-circuiting
 *
 * Pure and deterministic: no I/O, no clock.
 *
 * @module quality/quality-gate
 */

import { scanSecurityFlags } from '../registry/security-scanner.js';
import type { AgentSpec } from '../types/schemas/agent-spec.js';
import type {
  QualityVerdict,
  QualityViolation,
  QualityViolationCode,
} from '../types/schemas/deployment.js';
import type { MetricsSnapshot } from '../types/metrics.js';
import { formatPercent, safeDivide } from '../utils/math-helpers.js';

/**
 * Defaults for agents whose spec sets no regression tolerances
 */
export interface QualityGateConfig {
  /** Allowed canary success-rate drop below baseline (absolute, 0-1) */
  defaultSuccessRateTolerance: number;

  /** Allowed canary/baseline P95 latency ratio */
  defaultLatencyRegressionRatio: number;
}

export const DEFAULT_QUALITY_GATE_CONFIG: QualityGateConfig = {
  defaultSuccessRateTolerance: 0.02,
  defaultLatencyRegressionRatio: 1.5,
};

const INSUFFICIENT_DATA_REASON = 'Insufficient data: no requests observed in the window';

function violation(code: QualityViolationCode, message: string): QualityViolation {
  return { code, message };
}

function toVerdict(
  violations: QualityViolation[],
  sampleSize: number,
  insufficientData = false
): QualityVerdict {
  const reasons = violations.map((v) => `${v.code}: ${v.message}`);
  if (insufficientData) {
    reasons.push(INSUFFICIENT_DATA_REASON);
  }

  const verdict: QualityVerdict = {
    passed: violations.length === 0 && !insufficientData,
    reasons,
    sampleSize,
    violations,
  };
  if (insufficientData) {
    verdict.insufficientData = true;
  }
  return verdict;
}

/**
 * Quality Gate Evaluator
 */
export class QualityGateEvaluator {
  private readonly config: QualityGateConfig;

  constructor(config: Partial<QualityGateConfig> = {}) {
    this.config = { ...DEFAULT_QUALITY_GATE_CONFIG, ...config };
  }

  /**
   * Check a snapshot against a spec's absolute thresholds and security flags
   *
   * A zero-sample snapshot never passes: the metric checks are skipped and
   * the verdict is marked `insufficientData`.
   */
  evaluate(spec: AgentSpec, snapshot: MetricsSnapshot): QualityVerdict {
    const insufficientData = snapshot.count === 0;
    const violations = insufficientData ? [] : this.checkThresholds(spec, snapshot);
    violations.push(...this.checkSecurity(spec));

    return toVerdict(violations, snapshot.count, insufficientData);
  }

  /**
   * Absolute checks on the canary plus regression checks against baseline
   *
   * The baseline comparison is skipped when the baseline has no samples.
   */
  evaluateCanary(
    spec: AgentSpec,
    canary: MetricsSnapshot,
    baseline: MetricsSnapshot
  ): QualityVerdict {
    const verdict = this.evaluate(spec, canary);
    if (verdict.insufficientData) {
      return verdict;
    }

    const violations = [...verdict.violations, ...this.compareToBaseline(spec, canary, baseline)];
    return toVerdict(violations, canary.count);
  }

  /**
   * Static checks only (no metrics): security flags
   */
  evaluateStatic(spec: AgentSpec): QualityVerdict {
    return toVerdict(this.checkSecurity(spec), 0);
  }

  /**
   * Relative degradation of canary against baseline
   */
  compareToBaseline(
    spec: AgentSpec,
    canary: MetricsSnapshot,
    baseline: MetricsSnapshot
  ): QualityViolation[] {
    if (baseline.count === 0 || canary.count === 0) {
      return [];
    }

    const violations: QualityViolation[] = [];
    const tolerance =
      spec.sloThresholds.maxSuccessRateRegression ?? this.config.defaultSuccessRateTolerance;
    const latencyRatio =
      spec.sloThresholds.maxLatencyRegressionRatio ?? this.config.defaultLatencyRegressionRatio;

    const drop = baseline.successRate - canary.successRate;
    if (drop > tolerance) {
      violations.push(
        violation(
          'SuccessRateViolation',
          `Success rate ${formatPercent(canary.successRate)} is ${formatPercent(drop)} below baseline ${formatPercent(baseline.successRate)} (tolerance ${formatPercent(tolerance)})`
        )
      );
    }

    if (baseline.p95LatencyMs > 0 && canary.p95LatencyMs > baseline.p95LatencyMs * latencyRatio) {
      violations.push(
        violation(
          'LatencySLOViolation',
          `P95 latency ${canary.p95LatencyMs.toFixed(0)}ms exceeds ${latencyRatio}x baseline ${baseline.p95LatencyMs.toFixed(0)}ms`
        )
      );
    }

    return violations;
  }

  private checkThresholds(spec: AgentSpec, snapshot: MetricsSnapshot): QualityViolation[] {
    const { minSuccessRate, maxLatencyP95Ms, maxCostCentsPerHour } = spec.sloThresholds;
    const violations: QualityViolation[] = [];

    if (snapshot.successRate < minSuccessRate) {
      violations.push(
        violation(
          'SuccessRateViolation',
          `Success rate ${formatPercent(snapshot.successRate)} below minimum ${formatPercent(minSuccessRate)}`
        )
      );
    }

    if (snapshot.p95LatencyMs > maxLatencyP95Ms) {
      violations.push(
        violation(
          'LatencySLOViolation',
          `P95 latency ${snapshot.p95LatencyMs.toFixed(0)}ms exceeds maximum ${maxLatencyP95Ms}ms`
        )
      );
    }

    const hourlyCost = safeDivide(
      snapshot.costCentsTotal,
      snapshot.windowSeconds / 3600,
      snapshot.costCentsTotal
    );
    if (hourlyCost > maxCostCentsPerHour) {
      violations.push(
        violation(
          'CostThresholdViolation',
          `Cost rate ${hourlyCost.toFixed(2)} cents/hour exceeds maximum ${maxCostCentsPerHour} cents/hour`
        )
      );
    }

    return violations;
  }

  private checkSecurity(spec: AgentSpec): QualityViolation[] {
    return scanSecurityFlags(spec).map((finding) =>
      violation('SecurityViolation', `${finding.flag} violated at ${finding.path}: ${finding.detail}`)
    );
  }
}

/**
 * Run the gates for one snapshot with default settings
 */
export function runQualityGates(spec: AgentSpec, snapshot: MetricsSnapshot): QualityVerdict {
  return new QualityGateEvaluator().evaluate(spec, snapshot);
}
