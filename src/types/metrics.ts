/**
 * Metrics types shared by the accessors, the quality gate and the router.
 */

/**
 * Deployment variant a request was served by
 */
export type Variant = 'baseline' | 'canary';

/**
 * Query window: the last N requests or the last T seconds
 */
export type MetricsWindow =
  | { kind: 'requests'; count: number }
  | { kind: 'duration'; seconds: number };

/**
 * Aggregate outcome statistics for one agent variant over a window
 */
export interface MetricsSnapshot {
  agentName: string;
  variant: Variant;

  /** Requests observed in the window */
  count: number;

  /** Successful requests / count (0 when count is 0) */
  successRate: number;

  /** 95th percentile latency (ms) */
  p95LatencyMs: number;

  /** Cost accrued in the window (cents) */
  costCentsTotal: number;

  /** Span of time the window covers (seconds) */
  windowSeconds: number;
}

/**
 * Outcome of one served request
 */
export interface RequestOutcome {
  latencyMs: number;
  success: boolean;
  costCents?: number;
}

/**
 * Sentinel for a window without observations. Callers must read it as
 * "insufficient data", never as passing.
 */
export function zeroSampleSnapshot(
  agentName: string,
  variant: Variant,
  windowSeconds = 0
): MetricsSnapshot {
  return {
    agentName,
    variant,
    count: 0,
    successRate: 0,
    p95LatencyMs: 0,
    costCentsTotal: 0,
    windowSeconds,
  };
}
