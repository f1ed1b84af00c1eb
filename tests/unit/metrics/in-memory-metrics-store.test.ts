/**
 * Unit tests for the in-memory metrics store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryMetricsStore } from '@/metrics/in-memory-metrics-store.js';
import { describeWindow } from '@/metrics/metrics-accessor.js';
import { zeroSampleSnapshot } from '@/types/metrics.js';
import { FakeClock, recordOutcomes, silentLogger } from '../../helpers/fixtures.js';

describe('InMemoryMetricsStore', () => {
  let clock: FakeClock;
  let store: InMemoryMetricsStore;

  beforeEach(() => {
    clock = new FakeClock();
    store = new InMemoryMetricsStore({ clock: clock.now }, silentLogger);
  });

  it('should aggregate outcomes in a duration window', async () => {
    store.record('spirit-a', 'canary', { latencyMs: 100, success: true, costCents: 1 });
    store.record('spirit-a', 'canary', { latencyMs: 300, success: false, costCents: 3 });
    store.record('spirit-a', 'canary', { latencyMs: 200, success: true, costCents: 2 });

    const snapshot = await store.query('spirit-a', 'canary', { kind: 'duration', seconds: 60 });

    expect(snapshot).toMatchObject({
      agentName: 'spirit-a',
      variant: 'canary',
      count: 3,
      costCentsTotal: 6,
      windowSeconds: 60,
    });
    expect(snapshot.successRate).toBeCloseTo(2 / 3, 10);
    expect(snapshot.p95LatencyMs).toBeCloseTo(290, 10);
  });

  it('should exclude outcomes older than the duration window', async () => {
    recordOutcomes(store, 'spirit-a', 'canary', 4);
    clock.advance(120_000);
    recordOutcomes(store, 'spirit-a', 'canary', 1, { successRate: 0 });

    const snapshot = await store.query('spirit-a', 'canary', { kind: 'duration', seconds: 60 });

    expect(snapshot.count).toBe(1);
    expect(snapshot.successRate).toBe(0);
  });

  it('should select the last N requests', async () => {
    store.record('spirit-a', 'canary', { latencyMs: 100, success: false });
    clock.advance(10_000);
    store.record('spirit-a', 'canary', { latencyMs: 100, success: true });
    clock.advance(5_000);
    store.record('spirit-a', 'canary', { latencyMs: 100, success: true });

    const snapshot = await store.query('spirit-a', 'canary', { kind: 'requests', count: 2 });

    expect(snapshot.count).toBe(2);
    expect(snapshot.successRate).toBe(1);
    expect(snapshot.windowSeconds).toBe(5);
  });

  it('should return a zero-sample snapshot for an empty window', async () => {
    const snapshot = await store.query('spirit-a', 'canary', { kind: 'duration', seconds: 60 });

    expect(snapshot).toEqual(zeroSampleSnapshot('spirit-a', 'canary', 60));
  });

  it('should keep variants and agents apart', async () => {
    recordOutcomes(store, 'spirit-a', 'canary', 2);
    recordOutcomes(store, 'spirit-a', 'baseline', 3);
    recordOutcomes(store, 'spirit-b', 'canary', 5);

    expect(store.getTotalCounts('spirit-a')).toEqual({ baseline: 3, canary: 2, total: 5 });
    expect(store.getTotalCounts('spirit-b')).toEqual({ baseline: 0, canary: 5, total: 5 });
  });

  it('should drop outcomes past retention', () => {
    const shortLived = new InMemoryMetricsStore({ clock: clock.now, retentionMs: 1_000 });
    recordOutcomes(shortLived, 'spirit-a', 'canary', 3);
    clock.advance(2_000);
    recordOutcomes(shortLived, 'spirit-a', 'canary', 1);

    expect(shortLived.getTotalCounts('spirit-a').canary).toBe(1);
  });

  it('should reset one agent or everything', () => {
    recordOutcomes(store, 'spirit-a', 'canary', 2);
    recordOutcomes(store, 'spirit-b', 'canary', 2);

    store.reset('spirit-a');
    expect(store.getTotalCounts('spirit-a').total).toBe(0);
    expect(store.getTotalCounts('spirit-b').total).toBe(2);

    store.reset();
    expect(store.getTotalCounts('spirit-b').total).toBe(0);
  });
});

describe('describeWindow', () => {
  it('should describe both window kinds', () => {
    expect(describeWindow({ kind: 'requests', count: 500 })).toBe('last 500 requests');
    expect(describeWindow({ kind: 'duration', seconds: 3600 })).toBe('last 3600s');
  });
});
