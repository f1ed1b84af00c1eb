/**
 * Canary Manager - Orchestrates the canary deployment lifecycle
 *
 * Features:
 * - One live canary per agent, enforced under a per-agent lock
 * - Automated quality-gate evaluation with automatic rollback on failure
 * - Promotion gating on the latest verdict
 * - Expiry sweep for unattended deployments
 * - Append-only decision log on every record
 * - Lifecycle events for alerting collaborators
 *
 * States: PENDING → ACTIVE → (PROMOTING → PROMOTED | ROLLING_BACK →
 * ROLLED_BACK | EXPIRED). PROMOTING may also roll back.
 *
 * @module canary/canary-manager
 */

import { randomBytes } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  CanaryError,
  InsufficientSamplesError,
  SchemaViolationError,
  notFound,
  schemaViolationFromZod,
} from '../api/errors.js';
import { DEPLOYMENTS, EVALUATION, EXPIRY } from '../config/defaults.js';
import type { MetricsAccessor } from '../metrics/metrics-accessor.js';
import { QualityGateEvaluator } from '../quality/quality-gate.js';
import type { AgentSpecStore } from '../registry/agent-spec-store.js';
import { scanSecurityFlags } from '../registry/security-scanner.js';
import type { MetricsSnapshot, MetricsWindow } from '../types/metrics.js';
import type { AgentSpec } from '../types/schemas/agent-spec.js';
import { NonNegativeInteger, TrafficSplitPercent } from '../types/schemas/common.js';
import type {
  DecisionLogEntry,
  DeploymentRecord,
  DeploymentState,
  QualityVerdict,
} from '../types/schemas/deployment.js';
import type { ActiveCanary, RouteChange, RouteNotifier } from './canary-router.js';
import type { DeploymentRecordStore } from './deployment-store.js';
import { KeyedMutex, type LockProvider } from './keyed-mutex.js';

/**
 * Canary Manager configuration
 */
export interface CanaryManagerConfig {
  /** Split for new canaries when the caller gives none (%) */
  defaultTrafficSplitPercent: number;

  /** Lifetime of a canary when the caller gives none (ms) */
  defaultDurationMs: number;

  /** Canary samples required before a verdict */
  defaultMinSampleSize: number;

  /** Longest metrics window queried per evaluation (seconds) */
  evaluationWindowSeconds: number;

  /** Repeat evaluations of an unchanged snapshot inside this window are not logged (ms) */
  dedupWindowMs: number;

  /** Maximum age of the passing verdict a traffic-split change relies on (ms) */
  rampFreshnessMs: number;

  /** Expiry timer period (ms) */
  expirySweepIntervalMs: number;
}

/**
 * Default configuration
 */
export const DEFAULT_CANARY_CONFIG: CanaryManagerConfig = {
  defaultTrafficSplitPercent: DEPLOYMENTS.DEFAULT_TRAFFIC_SPLIT_PERCENT,
  defaultDurationMs: DEPLOYMENTS.DEFAULT_DURATION_MINUTES * 60_000,
  defaultMinSampleSize: DEPLOYMENTS.DEFAULT_MIN_SAMPLE_SIZE,
  evaluationWindowSeconds: EVALUATION.WINDOW_SECONDS,
  dedupWindowMs: EVALUATION.DEDUP_WINDOW_MS,
  rampFreshnessMs: EVALUATION.RAMP_FRESHNESS_MS,
  expirySweepIntervalMs: EXPIRY.SWEEP_INTERVAL_MS,
};

/**
 * Collaborators of the manager
 */
export interface CanaryManagerDeps {
  specs: AgentSpecStore;
  metrics: MetricsAccessor;
  records: DeploymentRecordStore;

  /** Quality gates (default: evaluator with default tolerances) */
  quality?: QualityGateEvaluator;

  /** Per-agent locking (default: in-process {@link KeyedMutex}) */
  locks?: LockProvider;

  /** Time source, ms since epoch (default: Date.now) */
  clock?: () => number;

  /** Deployment id source (default: 12 random hex chars) */
  idGenerator?: () => string;
}

export interface CreateDeploymentOptions {
  trafficSplitPercent?: number;
  durationMs?: number;
  minSampleSize?: number;
}

export interface RollbackInfo {
  reason: string;
  automatic: boolean;
}

/**
 * Manager events
 */
export interface CanaryManagerEvents {
  deploymentCreated: (record: DeploymentRecord) => void;
  verdict: (record: DeploymentRecord, verdict: QualityVerdict) => void;
  trafficSplitChanged: (record: DeploymentRecord, previousPercent: number) => void;
  promoted: (record: DeploymentRecord) => void;
  rolledBack: (record: DeploymentRecord, info: RollbackInfo) => void;
  expired: (record: DeploymentRecord) => void;
}

/** States in which a deployment holds its agent's canary slot */
export const LIVE_STATES: ReadonlySet<DeploymentState> = new Set<DeploymentState>([
  'PENDING',
  'ACTIVE',
  'PROMOTING',
  'ROLLING_BACK',
]);

export const TERMINAL_STATES: ReadonlySet<DeploymentState> = new Set<DeploymentState>([
  'PROMOTED',
  'ROLLED_BACK',
  'EXPIRED',
]);

export const EXPIRY_REASON = 'duration elapsed without manual action';

const MAX_ID_ATTEMPTS = 5;

const CreateOptionsSchema = z.object({
  trafficSplitPercent: TrafficSplitPercent,
  durationMs: z.number().finite('Duration must be finite').min(0, 'Duration cannot be negative'),
  minSampleSize: NonNegativeInteger,
});

function defaultIdGenerator(): string {
  return randomBytes(6).toString('hex');
}

/**
 * Fingerprint of the observed data (window length excluded: it grows with
 * the deployment's age while the data may not)
 */
function fingerprintOf(canary: MetricsSnapshot, baseline: MetricsSnapshot): string {
  const observed = (s: MetricsSnapshot) => [s.count, s.successRate, s.p95LatencyMs, s.costCentsTotal];
  return JSON.stringify({ canary: observed(canary), baseline: observed(baseline) });
}

/**
 * The spec a canary is judged by: its own content under the SLO thresholds
 * and tolerances pinned from the baseline at creation
 */
function gateSpecOf(record: DeploymentRecord): AgentSpec {
  return { ...record.canaryConfig, sloThresholds: record.baselineSpec.sloThresholds };
}

function lastEntry(record: DeploymentRecord): DecisionLogEntry | undefined {
  return record.decisionLog[record.decisionLog.length - 1];
}

/**
 * Most recent pass/fail entry of the decision log
 */
export function latestVerdictEntry(record: DeploymentRecord): DecisionLogEntry | undefined {
  for (let i = record.decisionLog.length - 1; i >= 0; i--) {
    const entry = record.decisionLog[i];
    if (entry.verdict === 'pass' || entry.verdict === 'fail') {
      return entry;
    }
  }
  return undefined;
}

/**
 * Canary Manager - the deployment state machine
 */
export class CanaryManager extends EventEmitter<CanaryManagerEvents> {
  private readonly config: CanaryManagerConfig;
  private readonly specs: AgentSpecStore;
  private readonly metrics: MetricsAccessor;
  private readonly records: DeploymentRecordStore;
  private readonly quality: QualityGateEvaluator;
  private readonly locks: LockProvider;
  private readonly clock: () => number;
  private readonly idGenerator: () => string;
  private readonly logger?: Logger;

  private readonly routers = new Set<RouteNotifier>();
  private expiryTimer?: NodeJS.Timeout;

  /**
   * Create a new CanaryManager
   *
   * @param deps - Spec store, metrics, record store and optional overrides
   * @param config - Partial configuration merged over {@link DEFAULT_CANARY_CONFIG}
   * @param logger - Optional logger
   */
  constructor(deps: CanaryManagerDeps, config: Partial<CanaryManagerConfig> = {}, logger?: Logger) {
    super();
    this.config = { ...DEFAULT_CANARY_CONFIG, ...config };
    this.specs = deps.specs;
    this.metrics = deps.metrics;
    this.records = deps.records;
    this.quality = deps.quality ?? new QualityGateEvaluator();
    this.locks = deps.locks ?? new KeyedMutex();
    this.clock = deps.clock ?? Date.now;
    this.idGenerator = deps.idGenerator ?? defaultIdGenerator;
    this.logger = logger;
  }

  /**
   * Start a canary for an agent
   *
   * The canary config may be partial; it is merged over the agent's
   * baseline spec and the merged spec must validate.
   *
   * @throws SchemaViolationError for invalid options, config or security findings
   * @throws CanaryError(NotFound) for unknown agents
   * @throws CanaryError(ConflictError) when the agent already has a live deployment
   */
  async create(
    agentName: string,
    canaryConfig: unknown,
    options: CreateDeploymentOptions = {}
  ): Promise<DeploymentRecord> {
    const parsed = CreateOptionsSchema.safeParse({
      trafficSplitPercent: options.trafficSplitPercent ?? this.config.defaultTrafficSplitPercent,
      durationMs: options.durationMs ?? this.config.defaultDurationMs,
      minSampleSize: options.minSampleSize ?? this.config.defaultMinSampleSize,
    });
    if (!parsed.success) {
      throw schemaViolationFromZod(parsed.error, `deployment options for ${agentName}`);
    }
    const { trafficSplitPercent, durationMs, minSampleSize } = parsed.data;

    return this.locks.runExclusive(agentName, async () => {
      const baseline = await this.specs.get(agentName);

      const live = (await this.records.list()).find(
        (record) => record.agentName === agentName && LIVE_STATES.has(record.state)
      );
      if (live) {
        throw new CanaryError(
          'ConflictError',
          `Agent ${agentName} already has a ${live.state} deployment: ${live.id}`,
          { agentName, deploymentId: live.id, state: live.state }
        );
      }

      const merged = this.specs.mergeConfig(baseline, canaryConfig);
      const findings = scanSecurityFlags(merged);
      if (findings.length > 0) {
        throw new SchemaViolationError(
          `canary config for ${agentName}`,
          findings.map((finding) => ({
            field: `securityFlags.${finding.flag}`,
            message: `${finding.detail} at ${finding.path}`,
          }))
        );
      }

      const now = this.clock();
      const createdAt = new Date(now).toISOString();
      const pending: DeploymentRecord = {
        id: await this.newId(),
        agentName,
        state: 'PENDING',
        revision: 0,
        canaryConfig: merged,
        baselineSpec: baseline,
        baselineHash: this.specs.hash(baseline),
        canaryHash: this.specs.hash(merged),
        trafficSplitPercent,
        minSampleSize,
        createdAt,
        expiresAt: new Date(now + durationMs).toISOString(),
        updatedAt: createdAt,
        decisionLog: [
          {
            timestamp: createdAt,
            verdict: 'transition',
            reason: `Created with ${trafficSplitPercent}% traffic split`,
            state: 'PENDING',
          },
        ],
      };

      await this.records.insert(pending);
      const active = await this.transition(pending, 'ACTIVE', 'Canary serving traffic');

      this.notifyRouters({
        agentName,
        activeCanaryId: active.id,
        trafficSplitPercent: active.trafficSplitPercent,
      });

      this.logger?.info(
        {
          deploymentId: active.id,
          agentName,
          trafficSplitPercent,
          expiresAt: active.expiresAt,
        },
        'Canary deployment created'
      );
      this.emit('deploymentCreated', active);

      return active;
    });
  }

  /**
   * Evaluate a canary against its quality gates and its baseline
   *
   * A failing verdict rolls the deployment back before this returns.
   *
   * @throws CanaryError(NotFound) for unknown or terminal deployments
   * @throws InsufficientSamplesError when the canary has too few samples
   * @throws CanaryError(InvalidState) once past `expiresAt` (the deployment is expired first)
   */
  async evaluate(id: string): Promise<QualityVerdict> {
    const { agentName } = await this.requireRecord(id);

    return this.locks.runExclusive(agentName, async () => {
      const record = await this.requireRecord(id);
      if (TERMINAL_STATES.has(record.state)) {
        throw new CanaryError('NotFound', `Deployment ${id} is ${record.state}; nothing to evaluate`, {
          kind: 'deployment',
          key: id,
          state: record.state,
        });
      }
      this.assertState(record, ['ACTIVE'], 'evaluate');
      await this.refuseIfExpired(record, 'evaluate');

      const now = this.clock();
      const window = this.windowFor(record, now);
      const canary = await this.metrics.query(record.agentName, 'canary', window);

      const required = Math.max(record.minSampleSize, 1);
      if (canary.count < required) {
        await this.recordDeferral(record, canary.count, required, now);
        throw new InsufficientSamplesError(id, canary.count, required);
      }

      const baseline = await this.metrics.query(record.agentName, 'baseline', window);
      const fingerprint = fingerprintOf(canary, baseline);
      const previous = record.lastEvaluation;
      if (
        previous &&
        previous.fingerprint === fingerprint &&
        now - Date.parse(previous.at) < this.config.dedupWindowMs
      ) {
        this.logger?.debug({ deploymentId: id }, 'Unchanged metrics; reusing previous verdict');
        return previous.verdict;
      }

      const verdict = this.quality.evaluateCanary(gateSpecOf(record), canary, baseline);
      const at = new Date(now).toISOString();
      const evaluated = await this.persist(record, {
        ...record,
        lastEvaluation: { at, fingerprint, verdict },
        decisionLog: [
          ...record.decisionLog,
          {
            timestamp: at,
            verdict: verdict.passed ? 'pass' : 'fail',
            reason: verdict.passed
              ? `Quality gates passed with ${canary.count} canary samples`
              : verdict.reasons.join('; '),
            state: record.state,
            sampleSize: canary.count,
          },
        ],
      });

      this.logger?.info(
        { deploymentId: id, passed: verdict.passed, sampleSize: verdict.sampleSize },
        'Canary evaluated'
      );
      this.emit('verdict', evaluated, verdict);

      if (!verdict.passed) {
        await this.rollbackLocked(evaluated, `Automated rollback: ${verdict.reasons.join('; ')}`, true);
      }

      return verdict;
    });
  }

  /**
   * Make the canary config the agent's baseline of record
   *
   * If saving the baseline fails the deployment stays PROMOTING until it
   * is rolled back.
   *
   * @throws CanaryError(InvalidState) unless ACTIVE, unexpired, with no failing latest verdict
   */
  async promote(id: string): Promise<DeploymentRecord> {
    const { agentName } = await this.requireRecord(id);

    return this.locks.runExclusive(agentName, async () => {
      const record = await this.requireRecord(id);
      this.assertState(record, ['ACTIVE'], 'promote');
      await this.refuseIfExpired(record, 'promote');

      const latest = latestVerdictEntry(record);
      if (latest?.verdict === 'fail') {
        throw new CanaryError(
          'InvalidState',
          `Deployment ${id} cannot be promoted: latest evaluation failed (${latest.reason}); roll back or re-evaluate first`,
          { id, state: record.state }
        );
      }

      const promoting = await this.transition(record, 'PROMOTING', 'Promotion started');
      try {
        await this.specs.saveBaseline(promoting.canaryConfig);
      } catch (error) {
        this.logger?.error({ err: error, deploymentId: id }, 'Baseline save failed; deployment left PROMOTING');
        throw error;
      }

      const promoted = await this.transition(
        promoting,
        'PROMOTED',
        `Canary config ${promoting.canaryHash} is the new baseline`,
        { promotedAt: new Date(this.clock()).toISOString() }
      );

      this.notifyRouters({ agentName: promoted.agentName, trafficSplitPercent: 0 });
      this.logger?.info({ deploymentId: id, agentName: promoted.agentName }, 'Canary promoted');
      this.emit('promoted', promoted);

      return promoted;
    });
  }

  /**
   * Stop a canary; the baseline config is left untouched
   *
   * @throws CanaryError(InvalidState) unless ACTIVE or PROMOTING
   */
  async rollback(id: string, reason = 'Manual rollback'): Promise<DeploymentRecord> {
    const { agentName } = await this.requireRecord(id);

    return this.locks.runExclusive(agentName, async () => {
      const record = await this.requireRecord(id);
      return this.rollbackLocked(record, reason, false);
    });
  }

  private async rollbackLocked(
    record: DeploymentRecord,
    reason: string,
    automatic: boolean
  ): Promise<DeploymentRecord> {
    this.assertState(record, ['ACTIVE', 'PROMOTING'], 'roll back');

    const rollingBack = await this.transition(record, 'ROLLING_BACK', reason);
    const rolledBack = await this.transition(rollingBack, 'ROLLED_BACK', 'Baseline config unchanged', {
      rolledBackAt: new Date(this.clock()).toISOString(),
    });

    this.notifyRouters({ agentName: rolledBack.agentName, trafficSplitPercent: 0 });
    this.logger?.warn(
      { deploymentId: rolledBack.id, agentName: rolledBack.agentName, reason, automatic },
      'Canary rolled back'
    );
    this.emit('rolledBack', rolledBack, { reason, automatic });

    return rolledBack;
  }

  /**
   * Change the share of traffic an ACTIVE canary receives
   *
   * Any change needs a passing evaluation no older than `rampFreshnessMs`.
   *
   * @throws SchemaViolationError for a split outside 1-100
   * @throws CanaryError(InvalidState) when not ACTIVE, expired, or without a fresh passing verdict
   */
  async setTrafficSplit(id: string, trafficSplitPercent: number): Promise<DeploymentRecord> {
    const parsed = TrafficSplitPercent.safeParse(trafficSplitPercent);
    if (!parsed.success) {
      throw new SchemaViolationError(`traffic split for ${id}`, [
        { field: 'trafficSplitPercent', message: parsed.error.issues[0]?.message ?? 'Invalid value' },
      ]);
    }

    const { agentName } = await this.requireRecord(id);

    return this.locks.runExclusive(agentName, async () => {
      const record = await this.requireRecord(id);
      this.assertState(record, ['ACTIVE'], 'change the traffic split of');
      await this.refuseIfExpired(record, 'change the traffic split of');

      const previousPercent = record.trafficSplitPercent;
      if (parsed.data === previousPercent) {
        return record;
      }

      const now = this.clock();
      const last = record.lastEvaluation;
      if (!last || !last.verdict.passed || now - Date.parse(last.at) > this.config.rampFreshnessMs) {
        throw new CanaryError(
          'InvalidState',
          `Deployment ${id} needs a passing evaluation from the last ${Math.round(this.config.rampFreshnessMs / 1000)}s before its traffic split can change`,
          { id, lastEvaluatedAt: last?.at }
        );
      }

      const timestamp = new Date(now).toISOString();
      const updated = await this.persist(record, {
        ...record,
        trafficSplitPercent: parsed.data,
        decisionLog: [
          ...record.decisionLog,
          {
            timestamp,
            verdict: 'transition',
            reason: `Traffic split ${previousPercent}% -> ${parsed.data}%`,
            state: record.state,
          },
        ],
      });

      this.notifyRouters({
        agentName: updated.agentName,
        activeCanaryId: updated.id,
        trafficSplitPercent: updated.trafficSplitPercent,
      });
      this.logger?.info(
        { deploymentId: id, from: previousPercent, to: updated.trafficSplitPercent },
        'Traffic split changed'
      );
      this.emit('trafficSplitChanged', updated, previousPercent);

      return updated;
    });
  }

  /**
   * Expire every ACTIVE deployment past its `expiresAt`
   *
   * @returns Deployments transitioned by this call
   */
  async checkExpired(): Promise<DeploymentRecord[]> {
    const candidates = (await this.records.list()).filter(
      (record) => record.state === 'ACTIVE' && Date.parse(record.expiresAt) <= this.clock()
    );

    const expired: DeploymentRecord[] = [];
    for (const candidate of candidates) {
      const record = await this.locks.runExclusive(candidate.agentName, async () => {
        const current = await this.records.get(candidate.id);
        const now = this.clock();
        if (!current || current.state !== 'ACTIVE' || Date.parse(current.expiresAt) > now) {
          return undefined;
        }
        return this.expireLocked(current, now);
      });

      if (record) {
        expired.push(record);
      }
    }

    if (expired.length > 0) {
      this.logger?.warn(
        { deploymentIds: expired.map((record) => record.id) },
        'Expired unattended canary deployments'
      );
    }

    return expired;
  }

  /**
   * Deployments, newest first
   */
  async list(filterState?: DeploymentState): Promise<DeploymentRecord[]> {
    const records = await this.records.list();
    return records
      .filter((record) => filterState === undefined || record.state === filterState)
      .sort(
        (a, b) =>
          Date.parse(b.createdAt) - Date.parse(a.createdAt) || b.id.localeCompare(a.id)
      );
  }

  /**
   * @throws CanaryError(NotFound) for unknown ids
   */
  async get(id: string): Promise<DeploymentRecord> {
    return this.requireRecord(id);
  }

  /**
   * Router pull contract
   */
  async getActiveCanary(agentName: string): Promise<ActiveCanary | undefined> {
    const record = (await this.records.list()).find(
      (candidate) => candidate.agentName === agentName && candidate.state === 'ACTIVE'
    );
    if (!record) {
      return undefined;
    }

    return {
      activeCanaryId: record.id,
      agentName: record.agentName,
      trafficSplitPercent: record.trafficSplitPercent,
      canaryConfig: record.canaryConfig,
    };
  }

  /**
   * Register a router for push notifications
   *
   * @returns Function that unregisters it
   */
  attachRouter(router: RouteNotifier): () => void {
    this.routers.add(router);
    return () => {
      this.routers.delete(router);
    };
  }

  /**
   * Run {@link checkExpired} every `expirySweepIntervalMs`
   */
  startExpirySweep(): void {
    if (this.expiryTimer) {
      this.logger?.warn('Expiry sweep already running');
      return;
    }

    this.expiryTimer = setInterval(() => {
      void this.runExpirySweep();
    }, this.config.expirySweepIntervalMs);
    this.expiryTimer.unref();

    this.logger?.info({ intervalMs: this.config.expirySweepIntervalMs }, 'Expiry sweep started');
  }

  private async runExpirySweep(): Promise<void> {
    try {
      await this.checkExpired();
    } catch (error) {
      this.logger?.error({ error }, 'Expiry sweep failed');
    }
  }

  /**
   * Stop the expiry sweep
   */
  shutdown(): void {
    if (this.expiryTimer) {
      clearInterval(this.expiryTimer);
      this.expiryTimer = undefined;
    }

    this.logger?.info('Canary manager shutdown');
  }

  getConfig(): Readonly<CanaryManagerConfig> {
    return { ...this.config };
  }

  private async requireRecord(id: string): Promise<DeploymentRecord> {
    const record = await this.records.get(id);
    if (!record) {
      throw notFound('deployment', id);
    }
    return record;
  }

  private async expireLocked(record: DeploymentRecord, now: number): Promise<DeploymentRecord> {
    const expired = await this.transition(record, 'EXPIRED', EXPIRY_REASON, {
      expiredAt: new Date(now).toISOString(),
    });
    this.notifyRouters({ agentName: expired.agentName, trafficSplitPercent: 0 });
    this.emit('expired', expired);
    return expired;
  }

  /**
   * Expire an ACTIVE deployment past its `expiresAt` (whether or not the
   * sweep has run) and refuse the operation
   */
  private async refuseIfExpired(record: DeploymentRecord, action: string): Promise<void> {
    const now = this.clock();
    if (Date.parse(record.expiresAt) > now) {
      return;
    }

    await this.expireLocked(record, now);
    this.logger?.warn(
      { deploymentId: record.id, agentName: record.agentName, action },
      'Canary expired before the requested action'
    );
    throw new CanaryError(
      'InvalidState',
      `Cannot ${action} deployment ${record.id}: it expired at ${record.expiresAt}`,
      { id: record.id, state: 'EXPIRED', expiresAt: record.expiresAt }
    );
  }

  private assertState(
    record: DeploymentRecord,
    allowed: readonly DeploymentState[],
    action: string
  ): void {
    if (!allowed.includes(record.state)) {
      throw new CanaryError(
        'InvalidState',
        `Cannot ${action} deployment ${record.id} in state ${record.state} (allowed: ${allowed.join(', ')})`,
        { id: record.id, state: record.state, allowed: [...allowed] }
      );
    }
  }

  private windowFor(record: DeploymentRecord, now: number): MetricsWindow {
    const elapsedSeconds = Math.ceil((now - Date.parse(record.createdAt)) / 1000);
    return {
      kind: 'duration',
      seconds: Math.min(this.config.evaluationWindowSeconds, Math.max(1, elapsedSeconds)),
    };
  }

  /**
   * Log a deferred evaluation, once per sample count within the dedup window
   */
  private async recordDeferral(
    record: DeploymentRecord,
    observed: number,
    required: number,
    now: number
  ): Promise<void> {
    const last = lastEntry(record);
    if (
      last &&
      last.verdict === 'deferred' &&
      last.sampleSize === observed &&
      now - Date.parse(last.timestamp) < this.config.dedupWindowMs
    ) {
      return;
    }

    await this.persist(record, {
      ...record,
      decisionLog: [
        ...record.decisionLog,
        {
          timestamp: new Date(now).toISOString(),
          verdict: 'deferred',
          reason: `Insufficient samples: ${observed} of ${required} canary requests`,
          state: record.state,
          sampleSize: observed,
        },
      ],
    });

    this.logger?.info({ deploymentId: record.id, observed, required }, 'Evaluation deferred');
  }

  private async transition(
    record: DeploymentRecord,
    to: DeploymentState,
    reason: string,
    fields: Partial<DeploymentRecord> = {}
  ): Promise<DeploymentRecord> {
    const timestamp = new Date(this.clock()).toISOString();
    return this.persist(record, {
      ...record,
      ...fields,
      state: to,
      decisionLog: [...record.decisionLog, { timestamp, verdict: 'transition', reason, state: to }],
    });
  }

  /**
   * Compare-and-swap write of the next revision of a record
   */
  private async persist(
    previous: DeploymentRecord,
    next: DeploymentRecord
  ): Promise<DeploymentRecord> {
    const saved: DeploymentRecord = {
      ...next,
      revision: previous.revision + 1,
      updatedAt: new Date(this.clock()).toISOString(),
    };
    await this.records.put(saved, previous.revision);
    return saved;
  }

  private notifyRouters(change: RouteChange): void {
    for (const router of this.routers) {
      try {
        router.notify(change);
      } catch (error) {
        this.logger?.warn({ error, agentName: change.agentName }, 'Router notification failed');
      }
    }
  }

  private async newId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.idGenerator();
      if (!(await this.records.get(id))) {
        return id;
      }
    }
    throw new CanaryError('ConflictError', 'Could not allocate a unique deployment id', {
      attempts: MAX_ID_ATTEMPTS,
    });
  }
}
