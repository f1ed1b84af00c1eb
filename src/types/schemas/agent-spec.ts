/**
 * Agent Specification Schemas
 *
 * Zod schemas for the agent spec files read by the registry. Parsing an
 * agent spec with {@link AgentSpecSchema} reports every violated field at
 * once so an operator can fix a spec in one pass.
 *
 * @module schemas/agent-spec
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeNumber, UnitInterval } from './common.js';

/**
 * Agent names double as file names and metric label values.
 */
export const AGENT_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/**
 * Spec versions use x.y.z.
 */
export const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

/**
 * Security flags every agent spec must declare as `true`.
 *
 * Each one is also checked statically against the spec content by the
 * quality gate (see `registry/security-scanner.ts`).
 */
export const KNOWN_SECURITY_FLAGS = ['noHardcodedSecrets', 'noInsecureEndpoints'] as const;

export type KnownSecurityFlag = (typeof KNOWN_SECURITY_FLAGS)[number];

const requiredFlag = z.literal(true, {
  errorMap: (issue) => ({
    message:
      issue.code === 'invalid_literal' && issue.received === undefined
        ? 'Security flag must be set'
        : 'Security flag must be true',
  }),
});

/**
 * SLO thresholds for an agent
 */
export const SloThresholdsSchema = z.object({
  maxLatencyP95Ms: z.number().positive('Latency threshold must be greater than 0'),
  minSuccessRate: UnitInterval,
  maxCostCentsPerHour: NonNegativeNumber,
  /** Allowed drop of canary success rate below baseline (absolute, 0-1) */
  maxSuccessRateRegression: UnitInterval.optional(),
  /** Allowed canary/baseline P95 ratio */
  maxLatencyRegressionRatio: z.number().min(1, 'Must be at least 1').optional(),
});

/**
 * Declared security flags. Known flags are mandatory; any extra flag an
 * operator declares must also be true.
 */
export const SecurityFlagsSchema = z
  .object({
    noHardcodedSecrets: requiredFlag,
    noInsecureEndpoints: requiredFlag,
  })
  .catchall(requiredFlag);

/**
 * Agent specification
 */
export const AgentSpecSchema = z.object({
  name: NonEmptyString.regex(
    AGENT_NAME_PATTERN,
    'Name must be lowercase letters, digits, ".", "_" or "-"'
  ),
  version: z.string().regex(SEMVER_PATTERN, 'Version must use the x.y.z format'),
  provider: NonEmptyString,
  model: NonEmptyString,
  purpose: z.string().optional(),
  deprecated: z.boolean().optional(),
  sloThresholds: SloThresholdsSchema,
  securityFlags: SecurityFlagsSchema,
  settings: z.record(z.string(), z.unknown()).optional(),
});

export type SloThresholds = z.infer<typeof SloThresholdsSchema>;
export type SecurityFlags = z.infer<typeof SecurityFlagsSchema>;
export type AgentSpec = z.infer<typeof AgentSpecSchema>;
