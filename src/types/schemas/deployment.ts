/**
 * Deployment Record Schemas
 *
 * Records are persisted as plain YAML documents, one per deployment id, so
 * they are re-validated whenever a store reads them back.
 *
 * @module schemas/deployment
 */

import { z } from 'zod';
import { AgentSpecSchema } from './agent-spec.js';
import {
  IsoTimestamp,
  NonEmptyString,
  NonNegativeInteger,
  TrafficSplitPercent,
} from './common.js';

export const DEPLOYMENT_STATES = [
  'PENDING',
  'ACTIVE',
  'PROMOTING',
  'PROMOTED',
  'ROLLING_BACK',
  'ROLLED_BACK',
  'EXPIRED',
] as const;

export const DeploymentStateSchema = z.enum(DEPLOYMENT_STATES, {
  errorMap: () => ({ message: `State must be one of: ${DEPLOYMENT_STATES.join(', ')}` }),
});

export const QUALITY_VIOLATION_CODES = [
  'SuccessRateViolation',
  'LatencySLOViolation',
  'CostThresholdViolation',
  'SecurityViolation',
] as const;

export const QualityViolationSchema = z.object({
  code: z.enum(QUALITY_VIOLATION_CODES),
  message: z.string(),
});

export const QualityVerdictSchema = z.object({
  passed: z.boolean(),
  reasons: z.array(z.string()),
  sampleSize: NonNegativeInteger,
  violations: z.array(QualityViolationSchema),
  insufficientData: z.boolean().optional(),
});

/**
 * `pass`/`fail` come from evaluations, `deferred` from an evaluation that
 * lacked samples, `transition` from every state or traffic-split change.
 */
export const DecisionKindSchema = z.enum(['pass', 'fail', 'deferred', 'transition']);

export const DecisionLogEntrySchema = z.object({
  timestamp: IsoTimestamp,
  verdict: DecisionKindSchema,
  reason: z.string(),
  state: DeploymentStateSchema,
  sampleSize: NonNegativeInteger.optional(),
});

export const EvaluationStampSchema = z.object({
  at: IsoTimestamp,
  fingerprint: z.string(),
  verdict: QualityVerdictSchema,
});

export const DeploymentRecordSchema = z.object({
  id: NonEmptyString,
  agentName: NonEmptyString,
  state: DeploymentStateSchema,
  revision: NonNegativeInteger,
  canaryConfig: AgentSpecSchema,
  baselineSpec: AgentSpecSchema,
  baselineHash: z.string(),
  canaryHash: z.string(),
  trafficSplitPercent: TrafficSplitPercent,
  minSampleSize: NonNegativeInteger,
  createdAt: IsoTimestamp,
  expiresAt: IsoTimestamp,
  updatedAt: IsoTimestamp,
  promotedAt: IsoTimestamp.optional(),
  rolledBackAt: IsoTimestamp.optional(),
  expiredAt: IsoTimestamp.optional(),
  lastEvaluation: EvaluationStampSchema.optional(),
  decisionLog: z.array(DecisionLogEntrySchema),
});

export type DeploymentState = z.infer<typeof DeploymentStateSchema>;
export type QualityViolationCode = (typeof QUALITY_VIOLATION_CODES)[number];
export type QualityViolation = z.infer<typeof QualityViolationSchema>;
export type QualityVerdict = z.infer<typeof QualityVerdictSchema>;
export type DecisionKind = z.infer<typeof DecisionKindSchema>;
export type DecisionLogEntry = z.infer<typeof DecisionLogEntrySchema>;
export type EvaluationStamp = z.infer<typeof EvaluationStampSchema>;
export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>;
