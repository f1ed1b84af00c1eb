/**
 * Canary Router - Hash-based percentage routing per agent
 *
 * Features:
 * - MD5-based deterministic routing (same request key → same variant)
 * - Split read from the deployment manager's active canary (pull)
 * - Cache invalidation on manager notifications (push, optional)
 * - LRU cache for performance
 * - Outcome recording for the metrics store
 *
 * @module canary/canary-router
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { MetricsRecorder } from '../metrics/metrics-accessor.js';
import type { Variant } from '../types/metrics.js';
import type { AgentSpec } from '../types/schemas/agent-spec.js';
import { ROUTER } from '../config/defaults.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * What a router needs to know about an agent's live canary
 */
export interface ActiveCanary {
  activeCanaryId: string;
  agentName: string;
  trafficSplitPercent: number;
  canaryConfig: AgentSpec;
}

/**
 * Pull contract: the manager answers "which canary is live for this agent"
 */
export interface CanaryRouteSource {
  getActiveCanary(agentName: string): Promise<ActiveCanary | undefined>;
}

/**
 * Push contract: change notification for one agent
 */
export interface RouteChange {
  agentName: string;
  activeCanaryId?: string;
  trafficSplitPercent: number;
}

export interface RouteNotifier {
  notify(change: RouteChange): void;
}

/**
 * Configuration for canary router
 */
export interface CanaryRouterConfig {
  /** Routing strategy: hash for stickiness, random for distribution */
  strategy: 'hash' | 'random';

  /** Enable LRU cache for routing results (default: true) */
  enableCache?: boolean;

  /** Cache size (default: 10000 entries) */
  cacheSize?: number;
}

/**
 * Routing decision result
 */
export interface RoutingDecision {
  agentName: string;

  /** Variant to route to */
  variant: Variant;

  /** Deployment serving the canary share, if one is live */
  deploymentId?: string;

  /** Canary config to use when variant is canary */
  canaryConfig?: AgentSpec;

  /** Split in effect (0 when no canary is live) */
  percentage: number;

  /** MD5 hash value used for decision */
  hashValue: string;

  /** Whether decision was from cache */
  cached?: boolean;
}

/**
 * Routing statistics
 */
export interface RoutingStats {
  totalRequests: number;
  baselineCount: number;
  canaryCount: number;

  /** Actual canary percentage achieved */
  actualPercentage: number;

  cacheHitRate: number;
  cacheSize: number;
}

/**
 * LRU Cache entry; valid only while the same deployment and split are live
 */
interface CacheEntry {
  variant: Variant;
  deploymentId: string;
  percentage: number;
}

/**
 * Canary Router - Deterministic hash-based routing
 */
export class CanaryRouter implements RouteNotifier {
  private readonly source: CanaryRouteSource;
  private readonly config: Required<CanaryRouterConfig>;
  private readonly recorder?: MetricsRecorder;
  private readonly logger?: Logger;

  private stats = {
    totalRequests: 0,
    baselineCount: 0,
    canaryCount: 0,
    cacheHits: 0,
    cacheMisses: 0,
  };

  // LRU cache: Map preserves insertion order
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    source: CanaryRouteSource,
    config: CanaryRouterConfig,
    recorder?: MetricsRecorder,
    logger?: Logger
  ) {
    this.source = source;
    this.config = {
      strategy: config.strategy,
      enableCache: config.enableCache !== false,
      cacheSize: config.cacheSize ?? ROUTER.CACHE_SIZE,
    };
    this.recorder = recorder;
    this.logger = logger;
  }

  private computeHash(agentName: string, requestKey: string): string {
    return createHash('md5').update(`${agentName}:${requestKey}`).digest('hex');
  }

  private cacheKey(agentName: string, requestKey: string): string {
    return `${agentName}\u0000${requestKey}`;
  }

  private getCached(key: string, canary: ActiveCanary): CacheEntry | undefined {
    if (!this.config.enableCache) {
      return undefined;
    }

    const cached = this.cache.get(key);
    if (
      cached &&
      cached.deploymentId === canary.activeCanaryId &&
      cached.percentage === canary.trafficSplitPercent
    ) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, cached);
      this.stats.cacheHits++;
      return cached;
    }

    this.stats.cacheMisses++;
    return undefined;
  }

  private setCached(key: string, entry: CacheEntry): void {
    if (!this.config.enableCache) {
      return;
    }

    this.cache.delete(key);
    if (this.cache.size >= this.config.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, entry);
  }

  private count(variant: Variant): void {
    this.stats.totalRequests++;
    if (variant === 'canary') {
      this.stats.canaryCount++;
    } else {
      this.stats.baselineCount++;
    }
  }

  /**
   * Route one request of an agent to baseline or canary
   *
   * @param agentName - Agent the request is for
   * @param requestKey - Stickiness key (user, session or request id)
   *
   * @example
   * ```typescript
   * const decision = await router.route('spirit-a', 'user123');
   * const config = decision.canaryConfig ?? baselineSpec;
   * ```
   */
  async route(agentName: string, requestKey: string): Promise<RoutingDecision> {
    const hashValue = this.computeHash(agentName, requestKey);
    const canary = await this.source.getActiveCanary(agentName);

    if (!canary) {
      this.count('baseline');
      return { agentName, variant: 'baseline', percentage: 0, hashValue };
    }

    const decide = (variant: Variant, cached: boolean): RoutingDecision => ({
      agentName,
      variant,
      deploymentId: canary.activeCanaryId,
      canaryConfig: variant === 'canary' ? canary.canaryConfig : undefined,
      percentage: canary.trafficSplitPercent,
      hashValue,
      cached,
    });

    const key = this.cacheKey(agentName, requestKey);
    const cached = this.getCached(key, canary);
    if (cached) {
      this.count(cached.variant);
      return decide(cached.variant, true);
    }

    let variant: Variant;
    if (this.config.strategy === 'random') {
      variant = Math.random() * 100 < canary.trafficSplitPercent ? 'canary' : 'baseline';
    } else {
      // First 8 hex chars → 0.00-99.99
      const hashNum = parseInt(hashValue.substring(0, 8), 16);
      const bucket = (hashNum % 10000) / 100;
      variant = bucket < canary.trafficSplitPercent ? 'canary' : 'baseline';
    }

    this.count(variant);
    lazyLog(
      this.logger,
      'debug',
      () => ({ agentName, variant, deploymentId: canary.activeCanaryId, hashValue }),
      'Routed request'
    );
    this.setCached(key, {
      variant,
      deploymentId: canary.activeCanaryId,
      percentage: canary.trafficSplitPercent,
    });

    return decide(variant, false);
  }

  /**
   * Route a request, run it, and record its outcome
   *
   * @param handler - Executes the request against the chosen variant
   * @param costCents - Cost of the request, if known up front
   */
  async execute<T>(
    agentName: string,
    requestKey: string,
    handler: (decision: RoutingDecision) => Promise<T>,
    costCents?: number
  ): Promise<T> {
    const decision = await this.route(agentName, requestKey);
    const startTime = Date.now();
    let success = false;

    try {
      const result = await handler(decision);
      success = true;
      return result;
    } finally {
      this.recorder?.record(agentName, decision.variant, {
        latencyMs: Date.now() - startTime,
        success,
        costCents,
      });
    }
  }

  /**
   * Manager notification: drop cached decisions for the agent
   */
  notify(change: RouteChange): void {
    const prefix = `${change.agentName}\u0000`;
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
      }
    }

    this.logger?.info(
      {
        agentName: change.agentName,
        deploymentId: change.activeCanaryId,
        percentage: change.trafficSplitPercent,
      },
      'Canary routing updated'
    );
  }

  getStats(): RoutingStats {
    const totalCacheRequests = this.stats.cacheHits + this.stats.cacheMisses;
    const cacheHitRate = totalCacheRequests > 0 ? this.stats.cacheHits / totalCacheRequests : 0;
    const actualPercentage =
      this.stats.totalRequests > 0 ? (this.stats.canaryCount / this.stats.totalRequests) * 100 : 0;

    return {
      totalRequests: this.stats.totalRequests,
      baselineCount: this.stats.baselineCount,
      canaryCount: this.stats.canaryCount,
      actualPercentage,
      cacheHitRate,
      cacheSize: this.cache.size,
    };
  }

  /**
   * Reset statistics (useful for testing)
   */
  resetStats(): void {
    this.stats = {
      totalRequests: 0,
      baselineCount: 0,
      canaryCount: 0,
      cacheHits: 0,
      cacheMisses: 0,
    };
  }

  clearCache(): void {
    this.cache.clear();
  }
}
