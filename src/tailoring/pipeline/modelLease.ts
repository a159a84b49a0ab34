/**
 * Model Lease
 *
 * Call permission for one model over one pipeline step. Selection already
 * asked the breaker once; the lease spends that grant on the first call and
 * asks again for every later call (multi-chunk embeddings). Calls are made
 * one at a time, and each reports its outcome under the probe token it was
 * granted with, so a half-open circuit only listens to its probe. When the
 * lease holds an unused probe grant, release hands it back so the circuit
 * is not left waiting on a call that never happened.
 */

import type { ModelProfile, TaskType } from '../types';
import type { CircuitBreaker } from '../resilience/circuitBreaker';

export class ModelLease {
  /** Whether the selection grant was the half-open probe */
  readonly isProbe: boolean;
  private grantUnused = true;
  /** Probe token of the grant or call in hand; null for an ordinary call */
  private probe: number | null;

  constructor(
    readonly model: ModelProfile,
    readonly taskType: TaskType,
    private readonly breaker: CircuitBreaker
  ) {
    this.probe = this.grantedProbe();
    this.isProbe = this.probe !== null;
  }

  acquire(): boolean {
    if (this.grantUnused) {
      this.grantUnused = false;
      return true;
    }
    const granted = this.breaker.allow();
    this.probe = granted ? this.grantedProbe() : null;
    return granted;
  }

  succeeded(): void {
    this.breaker.recordSuccess(this.probe);
    this.probe = null;
  }

  failed(): void {
    this.breaker.recordFailure(this.probe);
    this.probe = null;
  }

  /**
   * The dispatched call will never report an outcome (cancelled mid-flight)
   */
  abandon(): void {
    if (this.probe !== null) {
      this.breaker.abandonProbe(this.probe);
      this.probe = null;
    }
  }

  release(): void {
    if (this.grantUnused) {
      this.grantUnused = false;
      this.abandon();
    }
  }

  // A true allow() in HALF_OPEN is always the probe grant
  private grantedProbe(): number | null {
    return this.breaker.currentState === 'half_open' ? this.breaker.activeProbe : null;
  }
}
