/**
 * Agent Spec Store - Load, validate and expose agent specifications
 *
 * Features:
 * - Validation on every read (external edits are caught immediately)
 * - Every violated field reported at once
 * - Canary config merging against a baseline spec
 * - Content hashing for change detection
 * - Deployment readiness reports
 *
 * @module registry/agent-spec-store
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import {
  SchemaViolationError,
  notFound,
  zodIssuesToViolations,
  type FieldViolation,
} from '../api/errors.js';
import { READINESS } from '../config/defaults.js';
import { AgentSpecSchema, type AgentSpec } from '../types/schemas/agent-spec.js';
import type { QualityVerdict } from '../types/schemas/deployment.js';
import { deepMerge, isRecord } from '../utils/object-helpers.js';
import type { AgentSpecSource } from './spec-sources.js';

/**
 * Validation outcome for one stored agent
 */
export interface AgentValidationResult {
  name: string;
  location?: string;
  verdict: QualityVerdict;
}

/**
 * Deployment readiness report
 */
export interface ReadinessReport {
  agent: string;
  version?: string;
  ready: boolean;
  blockers: string[];
  warnings: string[];
}

function violationsOf(raw: unknown): FieldViolation[] {
  const result = AgentSpecSchema.safeParse(raw);
  return result.success ? [] : zodIssuesToViolations(result.error);
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeysDeep(value[key])])
    );
  }
  return value;
}

/**
 * Agent Spec Store - read-through over an {@link AgentSpecSource}
 */
export class AgentSpecStore {
  private readonly source: AgentSpecSource;
  private readonly logger?: Logger;

  constructor(source: AgentSpecSource, logger?: Logger) {
    this.source = source;
    this.logger = logger;
  }

  /**
   * Validate raw spec content
   *
   * @returns Verdict whose reasons name every violated field
   */
  validate(raw: unknown): QualityVerdict {
    const reasons = violationsOf(raw).map((v) => `${v.field}: ${v.message}`);
    return {
      passed: reasons.length === 0,
      reasons,
      sampleSize: 0,
      violations: [],
    };
  }

  /**
   * Parse raw content into a spec or throw listing every violated field
   *
   * @param raw - Unvalidated content
   * @param subject - What is being validated, for the error message
   * @param expectedName - Name the spec must carry, if known
   */
  assertValid(raw: unknown, subject: string, expectedName?: string): AgentSpec {
    const result = AgentSpecSchema.safeParse(raw);
    const violations = result.success ? [] : zodIssuesToViolations(result.error);

    if (expectedName !== undefined && isRecord(raw) && raw.name !== expectedName) {
      if (!violations.some((v) => v.field === 'name')) {
        violations.push({ field: 'name', message: `Must be "${expectedName}"` });
      }
    }

    if (!result.success || violations.length > 0) {
      throw new SchemaViolationError(subject, violations);
    }

    return result.data;
  }

  /**
   * Get a validated spec by agent name
   *
   * @throws CanaryError(NotFound) for unknown agents
   * @throws SchemaViolationError when the stored spec is invalid
   */
  async get(name: string): Promise<AgentSpec> {
    const raw = await this.source.read(name);
    if (!raw) {
      throw notFound('agent', name);
    }

    return this.assertValid(raw.content, `agent spec ${name} (${raw.location})`, name);
  }

  /**
   * List valid specs, ordered by name
   *
   * Invalid specs are skipped and logged; use {@link validateAll} to see them.
   */
  async list(): Promise<AgentSpec[]> {
    const names = (await this.source.listNames()).sort();
    const specs: AgentSpec[] = [];

    for (const name of names) {
      try {
        specs.push(await this.get(name));
      } catch (error) {
        if (error instanceof SchemaViolationError) {
          this.logger?.warn(
            { agent: name, violations: error.violations },
            'Skipping invalid agent spec'
          );
          continue;
        }
        throw error;
      }
    }

    return specs;
  }

  /**
   * Validate every stored spec, ordered by name
   */
  async validateAll(): Promise<AgentValidationResult[]> {
    const names = (await this.source.listNames()).sort();
    const results: AgentValidationResult[] = [];

    for (const name of names) {
      const raw = await this.source.read(name);
      const verdict = this.validate(raw?.content);
      if (raw && isRecord(raw.content) && raw.content.name !== name) {
        verdict.reasons.push(`name: Must be "${name}"`);
        verdict.passed = false;
      }
      results.push({ name, location: raw?.location, verdict });
    }

    return results;
  }

  /**
   * Merge a (possibly partial) canary config over a baseline and validate
   * the result
   *
   * @throws SchemaViolationError listing every violated field of the merged spec
   */
  mergeConfig(baseline: AgentSpec, canaryConfig: unknown): AgentSpec {
    const subject = `canary config for ${baseline.name}`;
    if (!isRecord(canaryConfig)) {
      throw new SchemaViolationError(subject, [
        { field: 'root', message: 'Canary config must be a mapping' },
      ]);
    }

    return this.assertValid(deepMerge(baseline, canaryConfig), subject, baseline.name);
  }

  /**
   * Persist a configuration as the agent's baseline of record
   */
  async saveBaseline(spec: AgentSpec): Promise<void> {
    const valid = this.assertValid(spec, `baseline for ${spec.name}`, spec.name);
    await this.source.write(valid.name, valid);
    this.logger?.info({ agent: valid.name, version: valid.version }, 'Baseline spec updated');
  }

  /**
   * Short content hash of a spec (key order does not matter)
   */
  hash(spec: AgentSpec): string {
    return createHash('sha256')
      .update(JSON.stringify(sortKeysDeep(spec)))
      .digest('hex')
      .slice(0, 12);
  }

  /**
   * Deployment readiness: validation failures block, risky settings warn
   */
  async readiness(name: string): Promise<ReadinessReport> {
    const raw = await this.source.read(name);
    if (!raw) {
      throw notFound('agent', name);
    }

    const report: ReadinessReport = {
      agent: name,
      ready: true,
      blockers: [],
      warnings: [],
    };

    let spec: AgentSpec;
    try {
      spec = this.assertValid(raw.content, `agent spec ${name}`, name);
    } catch (error) {
      if (error instanceof SchemaViolationError) {
        report.ready = false;
        report.blockers = error.violations.map((v) => `${v.field}: ${v.message}`);
        return report;
      }
      throw error;
    }

    report.version = spec.version;

    if (spec.sloThresholds.maxLatencyP95Ms > READINESS.HIGH_LATENCY_TARGET_MS) {
      report.warnings.push(
        `High latency target (${spec.sloThresholds.maxLatencyP95Ms}ms > ${READINESS.HIGH_LATENCY_TARGET_MS}ms)`
      );
    }

    if (spec.deprecated) {
      report.warnings.push('Agent is marked as deprecated');
    }

    return report;
  }
}
