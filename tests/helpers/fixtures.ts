/**
 * Shared test fixtures: specs, a controllable clock, and an in-memory system
 */

import { pino } from 'pino';
import { CanaryManager, type CanaryManagerConfig } from '@/canary/canary-manager.js';
import type { LockProvider } from '@/canary/keyed-mutex.js';
import { InMemoryDeploymentStore } from '@/canary/deployment-store.js';
import { InMemoryMetricsStore } from '@/metrics/in-memory-metrics-store.js';
import type { MetricsRecorder } from '@/metrics/metrics-accessor.js';
import { AgentSpecStore } from '@/registry/agent-spec-store.js';
import { InMemoryAgentSpecSource, type AgentSpecSource } from '@/registry/spec-sources.js';
import type { Variant } from '@/types/metrics.js';
import type { AgentSpec } from '@/types/schemas/agent-spec.js';
import type { DeploymentRecord } from '@/types/schemas/deployment.js';

export const silentLogger = pino({ level: 'silent' });

export const T0 = Date.parse('2026-01-15T12:00:00.000Z');

export function makeSpec(overrides: Partial<AgentSpec> = {}): AgentSpec {
  return {
    name: 'spirit-a',
    version: '1.0.0',
    provider: 'anthropic',
    model: 'model-v1',
    sloThresholds: {
      maxLatencyP95Ms: 2000,
      minSuccessRate: 0.95,
      maxCostCentsPerHour: 100,
    },
    securityFlags: {
      noHardcodedSecrets: true,
      noInsecureEndpoints: true,
    },
    ...overrides,
  };
}

export class FakeClock {
  private current: number;

  constructor(start = T0) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface OutcomeShape {
  successRate?: number;
  latencyMs?: number;
  costCents?: number;
}

/**
 * Record `count` outcomes: the first round(count * successRate) succeed
 */
export function recordOutcomes(
  recorder: MetricsRecorder,
  agentName: string,
  variant: Variant,
  count: number,
  shape: OutcomeShape = {}
): void {
  const successes = Math.round(count * (shape.successRate ?? 1));
  for (let i = 0; i < count; i++) {
    recorder.record(agentName, variant, {
      latencyMs: shape.latencyMs ?? 100,
      success: i < successes,
      costCents: shape.costCents,
    });
  }
}

export function makeRecord(overrides: Partial<DeploymentRecord> = {}): DeploymentRecord {
  const createdAt = new Date(T0).toISOString();
  return {
    id: 'dep-1',
    agentName: 'spirit-a',
    state: 'ACTIVE',
    revision: 1,
    canaryConfig: makeSpec({ model: 'model-v2' }),
    baselineSpec: makeSpec(),
    baselineHash: 'aaaaaaaaaaaa',
    canaryHash: 'bbbbbbbbbbbb',
    trafficSplitPercent: 10,
    minSampleSize: 50,
    createdAt,
    expiresAt: new Date(T0 + 4 * 60 * 60 * 1000).toISOString(),
    updatedAt: createdAt,
    decisionLog: [
      {
        timestamp: createdAt,
        verdict: 'transition',
        reason: 'Canary serving traffic',
        state: 'ACTIVE',
      },
    ],
    ...overrides,
  };
}

/**
 * Sequential ids: dep-1, dep-2, ...
 */
export function sequentialIds(prefix = 'dep'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export interface TestSystemOptions {
  specs?: AgentSpec[];
  config?: Partial<CanaryManagerConfig>;
  source?: AgentSpecSource;
  locks?: LockProvider;
  idGenerator?: () => string;
}

/**
 * Manager over in-memory spec source, metrics and records
 */
export function createTestSystem(options: TestSystemOptions = {}) {
  const clock = new FakeClock();
  const specs = options.specs ?? [makeSpec()];
  const source =
    options.source ??
    new InMemoryAgentSpecSource(Object.fromEntries(specs.map((spec) => [spec.name, spec])));
  const specStore = new AgentSpecStore(source, silentLogger);
  const metrics = new InMemoryMetricsStore({ clock: clock.now }, silentLogger);
  const records = new InMemoryDeploymentStore();
  const manager = new CanaryManager(
    {
      specs: specStore,
      metrics,
      records,
      clock: clock.now,
      locks: options.locks,
      idGenerator: options.idGenerator ?? sequentialIds(),
    },
    options.config,
    silentLogger
  );

  return { clock, source, specs: specStore, metrics, records, manager };
}
