/**
 * Prometheus Metrics Accessor
 *
 * Reads agent request metrics through the Prometheus HTTP query API.
 *
 * Expected series (labels `agent_name` and `variant`):
 * - `agent_requests_total{status}` counter
 * - `agent_request_latency_ms_bucket` histogram
 * - `agent_cost_cents_total` counter
 *
 * @module metrics/prometheus-accessor
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { CanaryError } from '../api/errors.js';
import type { MetricsSnapshot, MetricsWindow, Variant } from '../types/metrics.js';
import { zeroSampleSnapshot } from '../types/metrics.js';
import { safeDivide } from '../utils/math-helpers.js';
import type { MetricsAccessor } from './metrics-accessor.js';

/**
 * Configuration for the Prometheus accessor
 */
export interface PrometheusAccessorConfig {
  /** Prometheus base URL, e.g. http://prometheus:9090 */
  baseUrl: string;

  /** Per-query timeout (default: 5000ms) */
  timeoutMs?: number;

  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

const PrometheusResponseSchema = z.object({
  status: z.string(),
  error: z.string().optional(),
  data: z
    .object({
      resultType: z.string(),
      result: z.array(
        z.object({
          metric: z.record(z.string()),
          value: z.tuple([z.number(), z.string()]),
        })
      ),
    })
    .optional(),
});

/**
 * Escape a PromQL label value
 */
function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Prometheus Metrics Accessor - duration windows only
 */
export class PrometheusMetricsAccessor implements MetricsAccessor {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  constructor(config: PrometheusAccessorConfig, logger?: Logger) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 5_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = logger;
  }

  async query(agentName: string, variant: Variant, window: MetricsWindow): Promise<MetricsSnapshot> {
    if (window.kind !== 'duration') {
      throw new CanaryError(
        'ConfigurationError',
        'Prometheus metrics support duration windows only',
        { window }
      );
    }

    const seconds = Math.max(1, Math.round(window.seconds));
    const range = `[${seconds}s]`;
    const labels = `agent_name="${escapeLabel(agentName)}",variant="${escapeLabel(variant)}"`;

    const count =
      (await this.scalar(`sum(increase(agent_requests_total{${labels}}${range}))`)) ?? 0;
    if (count <= 0) {
      return zeroSampleSnapshot(agentName, variant, seconds);
    }

    const [successes, p95, cost] = await Promise.all([
      this.scalar(`sum(increase(agent_requests_total{${labels},status="success"}${range}))`),
      this.scalar(
        `histogram_quantile(0.95, sum by (le) (rate(agent_request_latency_ms_bucket{${labels}}${range})))`
      ),
      this.scalar(`sum(increase(agent_cost_cents_total{${labels}}${range}))`),
    ]);

    // Requests without a latency histogram cannot be judged against the latency SLO
    if (p95 === undefined) {
      throw new CanaryError(
        'UnknownError',
        `No P95 latency for ${agentName}/${variant} over ${seconds}s despite ${Math.round(count)} requests`,
        { agentName, variant, windowSeconds: seconds }
      );
    }

    return {
      agentName,
      variant,
      count: Math.round(count),
      successRate: Math.min(1, safeDivide(successes ?? 0, count)),
      p95LatencyMs: p95,
      costCentsTotal: cost ?? 0,
      windowSeconds: seconds,
    };
  }

  /**
   * Run an instant query and read the first sample (undefined for empty or NaN)
   */
  private async scalar(promql: string): Promise<number | undefined> {
    const url = `${this.baseUrl}/api/v1/query?query=${encodeURIComponent(promql)}`;

    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new CanaryError(
        'UnknownError',
        `Prometheus query failed: ${response.status} ${response.statusText}`,
        { query: promql }
      );
    }

    const parsed = PrometheusResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CanaryError('UnknownError', 'Unexpected Prometheus response shape', {
        query: promql,
      });
    }

    if (parsed.data.status !== 'success') {
      throw new CanaryError(
        'UnknownError',
        `Prometheus query error: ${parsed.data.error ?? parsed.data.status}`,
        { query: promql }
      );
    }

    const first = parsed.data.data?.result[0];
    const value = first ? Number(first.value[1]) : undefined;

    this.logger?.debug({ query: promql, value }, 'Prometheus query');
    return value !== undefined && Number.isFinite(value) ? value : undefined;
  }
}
