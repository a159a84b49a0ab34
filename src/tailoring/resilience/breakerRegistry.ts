/**
 * Circuit Breaker Registry
 *
 * Owns one CircuitBreaker per model, created lazily on first use and kept
 * for the life of the process. Logs every transition and summarizes fleet
 * health for monitoring.
 */

import type { Logger } from 'pino';
import {
  CircuitBreaker,
  CircuitBreakerConfig,
  CircuitState,
  Clock,
  DEFAULT_CIRCUIT_BREAKER_CONFIG
} from './circuitBreaker';
import { loggers } from '../../backend/logger';

export interface BreakerStatus {
  modelId: string;
  state: CircuitState;
  failureCount: number;
  lastFailureAt: Date | null;
  openedAt: Date | null;
  /** Milliseconds until an open circuit admits a probe */
  retryInMs: number;
  isHealthy: boolean;
}

export type OverallHealth = 'healthy' | 'degraded' | 'unstable' | 'critical';

export interface HealthSummary {
  total: number;
  closed: number;
  halfOpen: number;
  open: number;
  /** 1 when every circuit is closed; half-open circuits count half */
  healthScore: number;
  overall: OverallHealth;
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly clock: Clock = Date.now,
    private readonly logger: Logger = loggers.breaker
  ) {}

  get(modelId: string): CircuitBreaker {
    let breaker = this.breakers.get(modelId);
    if (!breaker) {
      breaker = new CircuitBreaker(modelId, this.config, this.clock, (from, to, snapshot) => {
        const fields = { modelId, from, to, failureCount: snapshot.failureCount };
        if (to === 'open') {
          this.logger.warn(fields, 'Circuit opened');
        } else {
          this.logger.info(fields, to === 'closed' ? 'Circuit closed' : 'Circuit half-open, probing');
        }
      });
      this.breakers.set(modelId, breaker);
    }
    return breaker;
  }

  status(modelId: string): BreakerStatus {
    const breaker = this.get(modelId);
    const snapshot = breaker.snapshot();
    return {
      modelId,
      state: snapshot.state,
      failureCount: snapshot.failureCount,
      lastFailureAt: snapshot.lastFailureAt === null ? null : new Date(snapshot.lastFailureAt),
      openedAt: snapshot.openedAt === null ? null : new Date(snapshot.openedAt),
      retryInMs: breaker.remainingCooldown(),
      isHealthy: snapshot.state === 'closed'
    };
  }

  statuses(): BreakerStatus[] {
    return [...this.breakers.keys()].sort().map(id => this.status(id));
  }

  healthSummary(): HealthSummary {
    const states = [...this.breakers.values()].map(b => b.currentState);
    const closed = states.filter(s => s === 'closed').length;
    const halfOpen = states.filter(s => s === 'half_open').length;
    const open = states.length - closed - halfOpen;
    const healthScore = states.length === 0 ? 1 : (closed + halfOpen * 0.5) / states.length;

    let overall: OverallHealth;
    if (healthScore >= 0.9) overall = 'healthy';
    else if (healthScore >= 0.7) overall = 'degraded';
    else if (healthScore >= 0.5) overall = 'unstable';
    else overall = 'critical';

    return { total: states.length, closed, halfOpen, open, healthScore, overall };
  }

  /**
   * Reset one circuit, or all of them when no id is given
   */
  reset(modelId?: string): void {
    const targets = modelId === undefined
      ? [...this.breakers.values()]
      : [this.get(modelId)];
    for (const breaker of targets) {
      breaker.reset();
    }
    this.logger.info({ modelId: modelId ?? 'all' }, 'Circuit breaker reset');
  }
}
