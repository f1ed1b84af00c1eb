/**
 * Quality Gates - SLO and security checks for agent configurations
 *
 * @module quality
 * @packageDocumentation
 */

export {
  QualityGateEvaluator,
  DEFAULT_QUALITY_GATE_CONFIG,
  runQualityGates,
  type QualityGateConfig,
} from './quality-gate.js';
