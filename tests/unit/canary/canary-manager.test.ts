/**
 * Unit tests for CanaryManager
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CanaryError, InsufficientSamplesError, SchemaViolationError } from '@/api/errors.js';
import {
  EXPIRY_REASON,
  latestVerdictEntry,
  type RollbackInfo,
} from '@/canary/canary-manager.js';
import type { RouteChange } from '@/canary/canary-router.js';
import { InMemoryAgentSpecSource } from '@/registry/spec-sources.js';
import type { DeploymentRecord, QualityVerdict } from '@/types/schemas/deployment.js';
import {
  T0,
  createTestSystem,
  makeRecord,
  makeSpec,
  recordOutcomes,
} from '../../helpers/fixtures.js';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

const iso = (ms: number): string => new Date(ms).toISOString();

class ReadOnlySource extends InMemoryAgentSpecSource {
  async write(): Promise<void> {
    throw new Error('spec directory is read-only');
  }
}

describe('CanaryManager', () => {
  let system: ReturnType<typeof createTestSystem>;

  beforeEach(() => {
    system = createTestSystem({
      specs: [makeSpec(), makeSpec({ name: 'spirit-b', provider: 'ollama', model: 'llama3' })],
    });
  });

  /** Canary and baseline traffic recorded one minute after creation */
  function observe(canary: number, canarySuccessRate = 1, baseline = 100): void {
    system.clock.advance(60_000);
    recordOutcomes(system.metrics, 'spirit-a', 'canary', canary, {
      successRate: canarySuccessRate,
    });
    recordOutcomes(system.metrics, 'spirit-a', 'baseline', baseline);
  }

  describe('create', () => {
    it('should create an ACTIVE deployment with defaults', async () => {
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });

      expect(record).toMatchObject({
        id: 'dep-1',
        agentName: 'spirit-a',
        state: 'ACTIVE',
        revision: 1,
        trafficSplitPercent: 10,
        minSampleSize: 50,
        createdAt: iso(T0),
        expiresAt: iso(T0 + 240 * 60_000),
        baselineSpec: makeSpec(),
        baselineHash: system.specs.hash(makeSpec()),
        canaryHash: system.specs.hash(makeSpec({ model: 'model-v2' })),
      });
      expect(record.canaryConfig).toEqual(makeSpec({ model: 'model-v2' }));
      expect(record.decisionLog).toEqual([
        {
          timestamp: iso(T0),
          verdict: 'transition',
          reason: 'Created with 10% traffic split',
          state: 'PENDING',
        },
        { timestamp: iso(T0), verdict: 'transition', reason: 'Canary serving traffic', state: 'ACTIVE' },
      ]);
      await expect(system.records.get('dep-1')).resolves.toEqual(record);
    });

    it('should accept explicit options', async () => {
      const record = await system.manager.create(
        'spirit-a',
        {},
        { trafficSplitPercent: 25, durationMs: 60_000, minSampleSize: 5 }
      );

      expect(record.trafficSplitPercent).toBe(25);
      expect(record.minSampleSize).toBe(5);
      expect(record.expiresAt).toBe(iso(T0 + 60_000));
    });

    it('should validate options', async () => {
      const error = await captureError(
        system.manager.create('spirit-a', {}, { trafficSplitPercent: 0, durationMs: -1 })
      );

      expect(error).toBeInstanceOf(SchemaViolationError);
      expect(error).toMatchObject({
        subject: 'deployment options for spirit-a',
        violations: [
          { field: 'trafficSplitPercent', message: 'Traffic split must be at least 1%' },
          { field: 'durationMs', message: 'Duration cannot be negative' },
        ],
      });
    });

    it('should reject unknown agents', async () => {
      await expect(system.manager.create('ghost', {})).rejects.toMatchObject({
        code: 'NotFound',
        message: 'Unknown agent: ghost',
      });
    });

    it('should allow one live deployment per agent', async () => {
      const first = await system.manager.create('spirit-a', {});

      await expect(system.manager.create('spirit-a', {})).rejects.toMatchObject({
        code: 'ConflictError',
        message: `Agent spirit-a already has a ACTIVE deployment: ${first.id}`,
      });
      await expect(system.manager.create('spirit-b', {})).resolves.toMatchObject({
        agentName: 'spirit-b',
      });
    });

    it('should allow a new deployment once the previous one is terminal', async () => {
      const first = await system.manager.create('spirit-a', {});
      await system.manager.rollback(first.id);

      await expect(system.manager.create('spirit-a', {})).resolves.toMatchObject({ id: 'dep-2' });
    });

    it('should reject invalid canary configs without storing anything', async () => {
      const error = await captureError(
        system.manager.create('spirit-a', { sloThresholds: { minSuccessRate: 3 } })
      );

      expect(error).toBeInstanceOf(SchemaViolationError);
      await expect(system.records.list()).resolves.toEqual([]);
    });

    it('should reject canary configs that break security flags', async () => {
      const error = await captureError(
        system.manager.create('spirit-a', { settings: { apiKey: 'test-secret' } })
      );

      expect(error).toMatchObject({
        code: 'SchemaViolation',
        subject: 'canary config for spirit-a',
        violations: [
          {
            field: 'securityFlags.noHardcodedSecrets',
            message: 'literal credential in "apiKey" (use an environment reference) at settings.apiKey',
          },
        ],
      });
      await expect(system.records.list()).resolves.toEqual([]);
    });

    it('should give up when no unique id can be allocated', async () => {
      const fixed = createTestSystem({
        specs: [makeSpec(), makeSpec({ name: 'spirit-b' })],
        idGenerator: () => 'same',
      });
      await fixed.manager.create('spirit-a', {});

      await expect(fixed.manager.create('spirit-b', {})).rejects.toMatchObject({
        code: 'ConflictError',
        message: 'Could not allocate a unique deployment id',
      });
    });

    it('should emit deploymentCreated', async () => {
      const created = vi.fn<(record: DeploymentRecord) => void>();
      system.manager.on('deploymentCreated', created);

      const record = await system.manager.create('spirit-a', {});

      expect(created).toHaveBeenCalledWith(record);
    });
  });

  describe('evaluate', () => {
    it('should defer without enough canary samples', async () => {
      const record = await system.manager.create('spirit-a', {});
      observe(10);

      const error = await captureError(system.manager.evaluate(record.id));

      expect(error).toBeInstanceOf(InsufficientSamplesError);
      expect(error).toMatchObject({ observed: 10, required: 50 });
      const stored = await system.manager.get(record.id);
      expect(stored.state).toBe('ACTIVE');
      expect(stored.decisionLog.at(-1)).toEqual({
        timestamp: iso(T0 + 60_000),
        verdict: 'deferred',
        reason: 'Insufficient samples: 10 of 50 canary requests',
        state: 'ACTIVE',
        sampleSize: 10,
      });
    });

    it('should log a repeated deferral only after the dedup window', async () => {
      const record = await system.manager.create('spirit-a', {});
      observe(10);

      await captureError(system.manager.evaluate(record.id));
      await captureError(system.manager.evaluate(record.id));
      expect((await system.manager.get(record.id)).decisionLog).toHaveLength(3);

      system.clock.advance(31_000);
      await captureError(system.manager.evaluate(record.id));
      expect((await system.manager.get(record.id)).decisionLog).toHaveLength(4);
    });

    it('should require at least one sample even with minSampleSize 0', async () => {
      const record = await system.manager.create('spirit-a', {}, { minSampleSize: 0 });
      system.clock.advance(60_000);

      await expect(system.manager.evaluate(record.id)).rejects.toMatchObject({
        code: 'InsufficientSamples',
        required: 1,
      });
    });

    it('should record a passing verdict', async () => {
      const verdicts = vi.fn<(record: DeploymentRecord, verdict: QualityVerdict) => void>();
      system.manager.on('verdict', verdicts);
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });
      observe(50);

      const verdict = await system.manager.evaluate(record.id);

      expect(verdict).toEqual({ passed: true, reasons: [], sampleSize: 50, violations: [] });
      const stored = await system.manager.get(record.id);
      expect(stored.state).toBe('ACTIVE');
      expect(stored.lastEvaluation?.at).toBe(iso(T0 + 60_000));
      expect(stored.decisionLog.at(-1)).toEqual({
        timestamp: iso(T0 + 60_000),
        verdict: 'pass',
        reason: 'Quality gates passed with 50 canary samples',
        state: 'ACTIVE',
        sampleSize: 50,
      });
      expect(verdicts).toHaveBeenCalledWith(stored, verdict);
    });

    it('should roll back automatically on a failing verdict', async () => {
      const rolledBack = vi.fn<(record: DeploymentRecord, info: RollbackInfo) => void>();
      system.manager.on('rolledBack', rolledBack);
      const record = await system.manager.create('spirit-a', {});
      observe(50, 0.8);

      const verdict = await system.manager.evaluate(record.id);

      const reasons = [
        'SuccessRateViolation: Success rate 80.00% below minimum 95.00%',
        'SuccessRateViolation: Success rate 80.00% is 20.00% below baseline 100.00% (tolerance 2.00%)',
      ];
      expect(verdict.passed).toBe(false);
      expect(verdict.reasons).toEqual(reasons);

      const stored = await system.manager.get(record.id);
      expect(stored.state).toBe('ROLLED_BACK');
      expect(stored.rolledBackAt).toBe(iso(T0 + 60_000));
      expect(stored.decisionLog.slice(-3).map((e) => [e.verdict, e.state, e.reason])).toEqual([
        ['fail', 'ACTIVE', reasons.join('; ')],
        ['transition', 'ROLLING_BACK', `Automated rollback: ${reasons.join('; ')}`],
        ['transition', 'ROLLED_BACK', 'Baseline config unchanged'],
      ]);
      expect(rolledBack).toHaveBeenCalledWith(stored, {
        reason: `Automated rollback: ${reasons.join('; ')}`,
        automatic: true,
      });
      await expect(system.specs.get('spirit-a')).resolves.toEqual(makeSpec());
    });

    it('should gate on the baseline thresholds whatever the canary config sets', async () => {
      const record = await system.manager.create('spirit-a', {
        sloThresholds: {
          minSuccessRate: 0.5,
          maxLatencyP95Ms: 2000,
          maxCostCentsPerHour: 100,
          maxSuccessRateRegression: 1,
        },
      });
      expect(record.canaryConfig.sloThresholds.minSuccessRate).toBe(0.5);
      observe(50, 0.8);

      const verdict = await system.manager.evaluate(record.id);

      expect(verdict.passed).toBe(false);
      expect(verdict.reasons).toEqual([
        'SuccessRateViolation: Success rate 80.00% below minimum 95.00%',
        'SuccessRateViolation: Success rate 80.00% is 20.00% below baseline 100.00% (tolerance 2.00%)',
      ]);
      expect((await system.manager.get(record.id)).state).toBe('ROLLED_BACK');
      await expect(system.specs.get('spirit-a')).resolves.toEqual(makeSpec());
    });

    it('should reuse the verdict for unchanged metrics', async () => {
      const record = await system.manager.create('spirit-a', {});
      observe(50);

      const first = await system.manager.evaluate(record.id);
      const logLength = (await system.manager.get(record.id)).decisionLog.length;
      system.clock.advance(10_000);
      const second = await system.manager.evaluate(record.id);

      expect(second).toEqual(first);
      expect((await system.manager.get(record.id)).decisionLog).toHaveLength(logLength);

      system.clock.advance(30_000);
      await system.manager.evaluate(record.id);
      expect((await system.manager.get(record.id)).decisionLog).toHaveLength(logLength + 1);
    });

    it('should treat terminal deployments as not found', async () => {
      const record = await system.manager.create('spirit-a', {});
      await system.manager.rollback(record.id);

      await expect(system.manager.evaluate(record.id)).rejects.toMatchObject({
        code: 'NotFound',
        message: `Deployment ${record.id} is ROLLED_BACK; nothing to evaluate`,
      });
    });

    it('should reject unknown ids', async () => {
      await expect(system.manager.evaluate('nope')).rejects.toMatchObject({
        code: 'NotFound',
        message: 'Unknown deployment: nope',
      });
    });
  });

  describe('promote', () => {
    it('should make the canary config the baseline', async () => {
      const promoted = vi.fn<(record: DeploymentRecord) => void>();
      system.manager.on('promoted', promoted);
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });
      observe(50);
      await system.manager.evaluate(record.id);

      const result = await system.manager.promote(record.id);

      expect(result.state).toBe('PROMOTED');
      expect(result.promotedAt).toBe(iso(T0 + 60_000));
      expect(result.decisionLog.slice(-2).map((e) => [e.state, e.reason])).toEqual([
        ['PROMOTING', 'Promotion started'],
        ['PROMOTED', `Canary config ${record.canaryHash} is the new baseline`],
      ]);
      await expect(system.specs.get('spirit-a')).resolves.toEqual(record.canaryConfig);
      expect(promoted).toHaveBeenCalledWith(result);
    });

    it('should promote an ACTIVE deployment that was never evaluated', async () => {
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });

      await expect(system.manager.promote(record.id)).resolves.toMatchObject({ state: 'PROMOTED' });
    });

    it('should refuse promotion after a failing latest verdict', async () => {
      await system.records.insert(
        makeRecord({
          decisionLog: [
            ...makeRecord().decisionLog,
            {
              timestamp: iso(T0),
              verdict: 'fail',
              reason: 'LatencySLOViolation: too slow',
              state: 'ACTIVE',
              sampleSize: 60,
            },
          ],
        })
      );

      await expect(system.manager.promote('dep-1')).rejects.toMatchObject({
        code: 'InvalidState',
        message:
          'Deployment dep-1 cannot be promoted: latest evaluation failed (LatencySLOViolation: too slow); roll back or re-evaluate first',
      });
    });

    it('should refuse promotion outside ACTIVE', async () => {
      const record = await system.manager.create('spirit-a', {});
      await system.manager.rollback(record.id);

      await expect(system.manager.promote(record.id)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Cannot promote deployment ${record.id} in state ROLLED_BACK (allowed: ACTIVE)`,
      });
    });

    it('should let exactly one of a racing promote and rollback win', async () => {
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });

      const results = await Promise.allSettled([
        system.manager.promote(record.id),
        system.manager.rollback(record.id),
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.flatMap((result) =>
        result.status === 'rejected' ? [result.reason] : []
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(CanaryError);
      expect(rejected[0]).toMatchObject({ code: 'InvalidState' });

      const stored = await system.manager.get(record.id);
      const terminal = stored.decisionLog.filter(
        (entry) => entry.state === 'PROMOTED' || entry.state === 'ROLLED_BACK'
      );
      expect(terminal).toHaveLength(1);
      expect(stored.state).toBe(terminal[0]?.state);
    });

    it('should leave the deployment PROMOTING when the baseline cannot be saved', async () => {
      const failing = createTestSystem({
        source: new ReadOnlySource({ 'spirit-a': makeSpec() }),
      });
      const record = await failing.manager.create('spirit-a', { model: 'model-v2' });

      await expect(failing.manager.promote(record.id)).rejects.toThrow('spec directory is read-only');
      expect((await failing.manager.get(record.id)).state).toBe('PROMOTING');

      await expect(failing.manager.evaluate(record.id)).rejects.toMatchObject({
        code: 'InvalidState',
      });
      await expect(failing.manager.rollback(record.id)).resolves.toMatchObject({
        state: 'ROLLED_BACK',
      });
      await expect(failing.specs.get('spirit-a')).resolves.toEqual(makeSpec());
    });
  });

  describe('rollback', () => {
    it('should stop the canary and keep the baseline', async () => {
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });
      system.clock.advance(5_000);

      const result = await system.manager.rollback(record.id);

      expect(result.state).toBe('ROLLED_BACK');
      expect(result.rolledBackAt).toBe(iso(T0 + 5_000));
      expect(result.decisionLog.slice(-2).map((e) => [e.state, e.reason])).toEqual([
        ['ROLLING_BACK', 'Manual rollback'],
        ['ROLLED_BACK', 'Baseline config unchanged'],
      ]);
      await expect(system.specs.get('spirit-a')).resolves.toEqual(makeSpec());
    });

    it('should refuse to roll back twice', async () => {
      const record = await system.manager.create('spirit-a', {});
      await system.manager.rollback(record.id, 'first');

      await expect(system.manager.rollback(record.id)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Cannot roll back deployment ${record.id} in state ROLLED_BACK (allowed: ACTIVE, PROMOTING)`,
      });
    });
  });

  describe('setTrafficSplit', () => {
    it('should validate the split before anything else', async () => {
      const error = await captureError(system.manager.setTrafficSplit('nope', 150));

      expect(error).toBeInstanceOf(SchemaViolationError);
      expect(error).toMatchObject({
        violations: [{ field: 'trafficSplitPercent', message: 'Traffic split cannot exceed 100%' }],
      });
    });

    it('should require a fresh passing evaluation', async () => {
      const record = await system.manager.create('spirit-a', {});

      await expect(system.manager.setTrafficSplit(record.id, 50)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Deployment ${record.id} needs a passing evaluation from the last 300s before its traffic split can change`,
      });
    });

    it('should ramp after a passing evaluation', async () => {
      const changed = vi.fn<(record: DeploymentRecord, previousPercent: number) => void>();
      system.manager.on('trafficSplitChanged', changed);
      const record = await system.manager.create('spirit-a', {});
      observe(50);
      await system.manager.evaluate(record.id);

      const ramped = await system.manager.setTrafficSplit(record.id, 50);

      expect(ramped.trafficSplitPercent).toBe(50);
      expect(ramped.decisionLog.at(-1)).toMatchObject({
        verdict: 'transition',
        reason: 'Traffic split 10% -> 50%',
        state: 'ACTIVE',
      });
      expect(changed).toHaveBeenCalledWith(ramped, 10);
    });

    it('should refuse a stale evaluation', async () => {
      const record = await system.manager.create('spirit-a', {});
      observe(50);
      await system.manager.evaluate(record.id);
      system.clock.advance(300_001);

      await expect(system.manager.setTrafficSplit(record.id, 50)).rejects.toMatchObject({
        code: 'InvalidState',
      });
    });

    it('should treat the current split as a no-op', async () => {
      const record = await system.manager.create('spirit-a', {});

      const unchanged = await system.manager.setTrafficSplit(record.id, 10);

      expect(unchanged).toEqual(record);
    });
  });

  describe('expiry enforcement', () => {
    const expiredAt = iso(T0 + 120_000);

    async function createExpired(): Promise<DeploymentRecord> {
      const record = await system.manager.create(
        'spirit-a',
        { model: 'model-v2' },
        { durationMs: 120_000 }
      );
      observe(50);
      await system.manager.evaluate(record.id);
      system.clock.advance(3_600_000);
      return record;
    }

    it('should expire instead of promoting after the duration', async () => {
      const expired = vi.fn<(record: DeploymentRecord) => void>();
      const changes: RouteChange[] = [];
      system.manager.on('expired', expired);
      system.manager.attachRouter({ notify: (change) => changes.push(change) });
      const record = await createExpired();

      await expect(system.manager.promote(record.id)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Cannot promote deployment ${record.id}: it expired at ${expiredAt}`,
      });

      const stored = await system.manager.get(record.id);
      expect(stored.state).toBe('EXPIRED');
      expect(stored.expiredAt).toBe(iso(T0 + 3_660_000));
      expect(stored.decisionLog.at(-1)?.reason).toBe(EXPIRY_REASON);
      expect(expired).toHaveBeenCalledWith(stored);
      expect(changes.at(-1)).toEqual({ agentName: 'spirit-a', trafficSplitPercent: 0 });
      await expect(system.specs.get('spirit-a')).resolves.toEqual(makeSpec());
    });

    it('should expire instead of evaluating after the duration', async () => {
      const record = await createExpired();

      await expect(system.manager.evaluate(record.id)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Cannot evaluate deployment ${record.id}: it expired at ${expiredAt}`,
      });
      expect((await system.manager.get(record.id)).state).toBe('EXPIRED');
    });

    it('should expire instead of ramping after the duration', async () => {
      const record = await createExpired();

      await expect(system.manager.setTrafficSplit(record.id, 50)).rejects.toMatchObject({
        code: 'InvalidState',
        message: `Cannot change the traffic split of deployment ${record.id}: it expired at ${expiredAt}`,
      });
      const stored = await system.manager.get(record.id);
      expect(stored.state).toBe('EXPIRED');
      expect(stored.trafficSplitPercent).toBe(10);
    });

    it('should leave nothing for the sweep once expired on access', async () => {
      const record = await createExpired();
      await captureError(system.manager.promote(record.id));

      await expect(system.manager.checkExpired()).resolves.toEqual([]);
    });
  });

  describe('checkExpired', () => {
    it('should expire ACTIVE deployments past their duration', async () => {
      const expired = vi.fn<(record: DeploymentRecord) => void>();
      system.manager.on('expired', expired);
      const record = await system.manager.create('spirit-a', {}, { durationMs: 60_000 });

      system.clock.advance(59_999);
      await expect(system.manager.checkExpired()).resolves.toEqual([]);

      system.clock.advance(1);
      const [result] = await system.manager.checkExpired();

      expect(result.id).toBe(record.id);
      expect(result.state).toBe('EXPIRED');
      expect(result.expiredAt).toBe(iso(T0 + 60_000));
      expect(result.decisionLog.at(-1)?.reason).toBe(EXPIRY_REASON);
      expect(expired).toHaveBeenCalledTimes(1);
      await expect(system.manager.checkExpired()).resolves.toEqual([]);
    });

    it('should leave terminal deployments alone', async () => {
      const record = await system.manager.create('spirit-a', {}, { durationMs: 0 });
      await system.manager.rollback(record.id);

      await expect(system.manager.checkExpired()).resolves.toEqual([]);
      expect((await system.manager.get(record.id)).state).toBe('ROLLED_BACK');
    });

    it('should run on the expiry sweep timer', async () => {
      vi.useFakeTimers();
      try {
        const swept = createTestSystem({ config: { expirySweepIntervalMs: 1_000 } });
        const record = await swept.manager.create('spirit-a', {}, { durationMs: 0 });
        const expired = new Promise<DeploymentRecord>((resolve) => {
          swept.manager.once('expired', resolve);
        });

        swept.manager.startExpirySweep();
        vi.advanceTimersByTime(1_000);

        await expect(expired).resolves.toMatchObject({ id: record.id, state: 'EXPIRED' });
        swept.manager.shutdown();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe('queries', () => {
    it('should list newest first with an optional state filter', async () => {
      const a = await system.manager.create('spirit-a', {});
      system.clock.advance(1_000);
      const b = await system.manager.create('spirit-b', {});
      await system.manager.rollback(a.id);

      expect((await system.manager.list()).map((r) => r.id)).toEqual([b.id, a.id]);
      expect((await system.manager.list('ROLLED_BACK')).map((r) => r.id)).toEqual([a.id]);
    });

    it('should expose the live canary to routers', async () => {
      const record = await system.manager.create('spirit-a', { model: 'model-v2' });

      await expect(system.manager.getActiveCanary('spirit-a')).resolves.toEqual({
        activeCanaryId: record.id,
        agentName: 'spirit-a',
        trafficSplitPercent: 10,
        canaryConfig: record.canaryConfig,
      });
      await expect(system.manager.getActiveCanary('spirit-b')).resolves.toBeUndefined();
    });

    it('should notify attached routers of changes', async () => {
      const changes: RouteChange[] = [];
      const detach = system.manager.attachRouter({ notify: (change) => changes.push(change) });
      system.manager.attachRouter({
        notify: () => {
          throw new Error('router offline');
        },
      });

      const record = await system.manager.create('spirit-a', {});
      await system.manager.rollback(record.id);
      detach();
      await system.manager.create('spirit-a', {});

      expect(changes).toEqual([
        { agentName: 'spirit-a', activeCanaryId: record.id, trafficSplitPercent: 10 },
        { agentName: 'spirit-a', trafficSplitPercent: 0 },
      ]);
    });

    it('should find the latest verdict entry', () => {
      const record = makeRecord({
        decisionLog: [
          { timestamp: iso(T0), verdict: 'fail', reason: 'old', state: 'ACTIVE' },
          { timestamp: iso(T0), verdict: 'pass', reason: 'new', state: 'ACTIVE' },
          { timestamp: iso(T0), verdict: 'deferred', reason: 'later', state: 'ACTIVE' },
        ],
      });

      expect(latestVerdictEntry(record)?.reason).toBe('new');
      expect(latestVerdictEntry(makeRecord())).toBeUndefined();
    });

    it('should expose a copy of its configuration', () => {
      expect(system.manager.getConfig()).toMatchObject({
        defaultTrafficSplitPercent: 10,
        dedupWindowMs: 30_000,
      });
    });
  });
});

describe('CanaryManager errors', () => {
  it('should surface CanaryError instances', async () => {
    const { manager } = createTestSystem();

    await expect(manager.get('missing')).rejects.toBeInstanceOf(CanaryError);
  });
});
