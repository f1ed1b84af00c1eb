/**
 * Metrics Accessor - Read side of per-agent, per-variant request metrics
 *
 * @module metrics/metrics-accessor
 */

import type { MetricsSnapshot, MetricsWindow, RequestOutcome, Variant } from '../types/metrics.js';

/**
 * Aggregate metrics for one agent variant
 *
 * A window without observations yields a zero-sample snapshot (count 0),
 * never an error.
 */
export interface MetricsAccessor {
  query(agentName: string, variant: Variant, window: MetricsWindow): Promise<MetricsSnapshot>;
}

/**
 * Write side: one call per served request
 */
export interface MetricsRecorder {
  record(agentName: string, variant: Variant, outcome: RequestOutcome): void;
}

/**
 * Human-readable window description for logs and CLI output
 */
export function describeWindow(window: MetricsWindow): string {
  return window.kind === 'requests'
    ? `last ${window.count} requests`
    : `last ${window.seconds}s`;
}
