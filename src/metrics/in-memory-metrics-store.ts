/**
 * In-Memory Metrics Store - Request outcomes held in process
 *
 * Features:
 * - Per agent, per variant request history with a retention window
 * - Last-N-requests and last-T-seconds queries
 * - P95 latency with linear interpolation
 *
 * Serves tests, demos and single-process deployments where the router and
 * the manager share one process.
 *
 * @module metrics/in-memory-metrics-store
 */

import type { Logger } from 'pino';
import type { MetricsSnapshot, MetricsWindow, RequestOutcome, Variant } from '../types/metrics.js';
import { zeroSampleSnapshot } from '../types/metrics.js';
import { percentile, safeDivide, safeSum } from '../utils/math-helpers.js';
import type { MetricsAccessor, MetricsRecorder } from './metrics-accessor.js';

/**
 * Configuration for the in-memory store
 */
export interface InMemoryMetricsStoreConfig {
  /** Outcomes older than this are dropped (default: 24 hours) */
  retentionMs?: number;

  /** Time source (ms since epoch) */
  clock?: () => number;
}

/**
 * Internal request record
 */
interface RequestRecord {
  latencyMs: number;
  success: boolean;
  costCents: number;
  timestamp: number;
}

const DEFAULT_RETENTION_MS = 24 * 60 * 60 * 1000;

/**
 * In-Memory Metrics Store - Records and aggregates request outcomes
 */
export class InMemoryMetricsStore implements MetricsAccessor, MetricsRecorder {
  private readonly requests = new Map<string, RequestRecord[]>();
  private readonly retentionMs: number;
  private readonly clock: () => number;
  private readonly logger?: Logger;

  constructor(config: InMemoryMetricsStoreConfig = {}, logger?: Logger) {
    this.retentionMs = config.retentionMs ?? DEFAULT_RETENTION_MS;
    this.clock = config.clock ?? Date.now;
    this.logger = logger;
  }

  private key(agentName: string, variant: Variant): string {
    return `${agentName}\u0000${variant}`;
  }

  /**
   * Record a request completion
   */
  record(agentName: string, variant: Variant, outcome: RequestOutcome): void {
    const key = this.key(agentName, variant);
    let history = this.requests.get(key);
    if (!history) {
      history = [];
      this.requests.set(key, history);
    }

    history.push({
      latencyMs: outcome.latencyMs,
      success: outcome.success,
      costCents: outcome.costCents ?? 0,
      timestamp: this.clock(),
    });

    this.cleanOldRequests(history);
  }

  /**
   * Drop requests older than the retention window
   */
  private cleanOldRequests(history: RequestRecord[]): void {
    const cutoffTime = this.clock() - this.retentionMs;

    let firstValidIndex = 0;
    while (firstValidIndex < history.length && history[firstValidIndex].timestamp < cutoffTime) {
      firstValidIndex++;
    }

    if (firstValidIndex > 0) {
      history.splice(0, firstValidIndex);
    }
  }

  async query(agentName: string, variant: Variant, window: MetricsWindow): Promise<MetricsSnapshot> {
    const history = this.requests.get(this.key(agentName, variant)) ?? [];
    const now = this.clock();

    let selected: RequestRecord[];
    let windowSeconds: number;

    if (window.kind === 'requests') {
      selected = window.count > 0 ? history.slice(-window.count) : [];
      windowSeconds = selected.length > 0 ? (now - selected[0].timestamp) / 1000 : 0;
    } else {
      const cutoffTime = now - window.seconds * 1000;
      selected = history.filter((r) => r.timestamp >= cutoffTime);
      windowSeconds = window.seconds;
    }

    if (selected.length === 0) {
      return zeroSampleSnapshot(agentName, variant, windowSeconds);
    }

    const successCount = selected.filter((r) => r.success).length;
    const latencies = selected.map((r) => r.latencyMs).sort((a, b) => a - b);

    const snapshot: MetricsSnapshot = {
      agentName,
      variant,
      count: selected.length,
      successRate: safeDivide(successCount, selected.length),
      p95LatencyMs: percentile(latencies, 95),
      costCentsTotal: safeSum(selected.map((r) => r.costCents)),
      windowSeconds,
    };

    this.logger?.debug({ agentName, variant, count: snapshot.count }, 'Metrics queried');
    return snapshot;
  }

  /**
   * Request counts per variant for one agent
   */
  getTotalCounts(agentName: string): { baseline: number; canary: number; total: number } {
    const baseline = this.requests.get(this.key(agentName, 'baseline'))?.length ?? 0;
    const canary = this.requests.get(this.key(agentName, 'canary'))?.length ?? 0;

    return { baseline, canary, total: baseline + canary };
  }

  /**
   * Reset all metrics, or those of one agent
   */
  reset(agentName?: string): void {
    if (agentName === undefined) {
      this.requests.clear();
      return;
    }

    this.requests.delete(this.key(agentName, 'baseline'));
    this.requests.delete(this.key(agentName, 'canary'));
  }
}
