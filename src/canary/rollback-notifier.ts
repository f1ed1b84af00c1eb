/**
 * Rollback Notifier - Webhook alerts for rollbacks and expiries
 *
 * Subscribes to a {@link CanaryManager} and posts one JSON document per
 * rollback or expiry. Delivery failures are logged; they never affect the
 * deployment.
 *
 * @module canary/rollback-notifier
 */

import type { Logger } from 'pino';
import type { DeploymentRecord } from '../types/schemas/deployment.js';
import type { CanaryManager, RollbackInfo } from './canary-manager.js';

export interface WebhookNotifierConfig {
  webhookUrl: string;

  /** Per-request timeout (default: 5000ms) */
  timeoutMs?: number;

  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export type CanaryAlertType = 'canary_rolled_back' | 'canary_expired';

export interface CanaryAlert {
  type: CanaryAlertType;
  deploymentId: string;
  agentName: string;
  state: DeploymentRecord['state'];
  reason: string;
  automatic: boolean;
  timestamp: string;
}

export class WebhookRollbackNotifier {
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(config: WebhookNotifierConfig, logger?: Logger) {
    this.webhookUrl = config.webhookUrl;
    this.timeoutMs = config.timeoutMs ?? 5_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = logger;
  }

  /**
   * Subscribe to a manager's rollback and expiry events
   *
   * @returns Function that unsubscribes
   */
  attach(manager: CanaryManager): () => void {
    const onRolledBack = (record: DeploymentRecord, info: RollbackInfo): void => {
      this.dispatch({
        type: 'canary_rolled_back',
        deploymentId: record.id,
        agentName: record.agentName,
        state: record.state,
        reason: info.reason,
        automatic: info.automatic,
        timestamp: record.updatedAt,
      });
    };

    const onExpired = (record: DeploymentRecord): void => {
      const last = record.decisionLog[record.decisionLog.length - 1];
      this.dispatch({
        type: 'canary_expired',
        deploymentId: record.id,
        agentName: record.agentName,
        state: record.state,
        reason: last ? last.reason : 'expired',
        automatic: true,
        timestamp: record.updatedAt,
      });
    };

    manager.on('rolledBack', onRolledBack);
    manager.on('expired', onExpired);

    return () => {
      manager.off('rolledBack', onRolledBack);
      manager.off('expired', onExpired);
    };
  }

  /**
   * Wait for deliveries in flight
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private dispatch(alert: CanaryAlert): void {
    const delivery = this.send(alert).catch((err: unknown) => {
      this.logger?.error(
        { err, deploymentId: alert.deploymentId, type: alert.type },
        'Failed to send webhook alert'
      );
    });

    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  /**
   * Send one alert
   */
  async send(alert: CanaryAlert): Promise<void> {
    const response = await this.fetchImpl(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(alert),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Webhook alert failed: ${response.status} ${response.statusText}`);
    }

    this.logger?.info({ deploymentId: alert.deploymentId, type: alert.type }, 'Webhook alert sent');
  }
}
