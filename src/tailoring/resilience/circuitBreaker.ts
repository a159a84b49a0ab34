/**
 * Circuit Breaker
 *
 * Per-model failure tracking: N failures within a rolling window open the
 * circuit; after the cooldown exactly one probe call is let through in
 * HALF_OPEN, and its outcome decides between CLOSED and OPEN. Each probe
 * carries a token; in HALF_OPEN, outcomes reported under another token (a
 * call admitted before the circuit opened, or an ordinary call) are ignored.
 *
 * Every method is synchronous, so each transition is atomic with respect to
 * other pipelines sharing the breaker.
 */

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  /** Failures within the window that open the circuit */
  failureThreshold: number;
  /** Time spent open before a probe is allowed */
  cooldownMs: number;
  /** Rolling window over which failures are counted */
  windowMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  cooldownMs: 30_000,
  windowMs: 60_000
};

export type Clock = () => number;

export interface CircuitSnapshot {
  modelId: string;
  state: CircuitState;
  failureCount: number;
  lastFailureAt: number | null;
  openedAt: number | null;
  probeInFlight: boolean;
}

export type TransitionListener = (
  from: CircuitState,
  to: CircuitState,
  snapshot: CircuitSnapshot
) => void;

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private failureTimes: number[] = [];
  private lastFailureAt: number | null = null;
  private openedAt: number | null = null;
  private probeSeq = 0;
  private probeToken: number | null = null;

  constructor(
    readonly modelId: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly clock: Clock = Date.now,
    private readonly onTransition?: TransitionListener
  ) {}

  /**
   * Whether a call may be made now. In HALF_OPEN a true result hands the
   * caller the single probe (see activeProbe), which must be resolved with
   * recordSuccess, recordFailure or abandonProbe.
   */
  allow(): boolean {
    switch (this.state) {
      case 'closed':
        return true;

      case 'open': {
        if (this.remainingCooldown() > 0) {
          return false;
        }
        this.probeToken = ++this.probeSeq;
        this.transition('half_open');
        return true;
      }

      case 'half_open':
        if (this.probeToken !== null) {
          return false;
        }
        this.probeToken = ++this.probeSeq;
        return true;
    }
  }

  /**
   * Token of the half-open probe in flight; null when there is none
   */
  get activeProbe(): number | null {
    return this.probeToken;
  }

  /**
   * Outcome of a call. `probe` is the token the call was granted under, null
   * for an ordinary call; callers that do not track grants omit it and are
   * taken to hold the probe.
   */
  recordSuccess(probe?: number | null): void {
    if (this.state !== 'half_open' || !this.heldBy(probe)) {
      return;
    }
    this.failureCount = 0;
    this.failureTimes = [];
    this.probeToken = null;
    this.openedAt = null;
    this.transition('closed');
  }

  recordFailure(probe?: number | null): void {
    if (this.state === 'half_open' && !this.heldBy(probe)) {
      return;
    }

    const now = this.clock();
    this.lastFailureAt = now;

    if (this.state === 'half_open') {
      this.failureCount += 1;
      this.open(now);
      return;
    }

    if (this.state === 'open') {
      // Late result of a call admitted before the circuit opened
      this.failureCount += 1;
      return;
    }

    this.failureTimes = this.failureTimes.filter(t => now - t < this.config.windowMs);
    this.failureTimes.push(now);
    this.failureCount = this.failureTimes.length;

    if (this.failureCount >= this.config.failureThreshold) {
      this.open(now);
    }
  }

  /**
   * Hand back a probe that was granted but never used (budget denial,
   * cancellation before dispatch, every input served from cache). The
   * circuit stays HALF_OPEN and the next allow() grants a fresh probe.
   */
  abandonProbe(probe?: number | null): void {
    if (this.state === 'half_open' && this.heldBy(probe)) {
      this.probeToken = null;
    }
  }

  /**
   * Administrative reset to CLOSED
   */
  reset(): void {
    this.failureCount = 0;
    this.failureTimes = [];
    this.lastFailureAt = null;
    this.openedAt = null;
    this.probeToken = null;
    if (this.state !== 'closed') {
      this.transition('closed');
    }
  }

  get currentState(): CircuitState {
    return this.state;
  }

  /**
   * Milliseconds until an OPEN circuit will grant a probe; 0 otherwise
   */
  remainingCooldown(): number {
    if (this.state !== 'open' || this.openedAt === null) {
      return 0;
    }
    return Math.max(0, this.openedAt + this.config.cooldownMs - this.clock());
  }

  snapshot(): CircuitSnapshot {
    return {
      modelId: this.modelId,
      state: this.state,
      failureCount: this.failureCount,
      lastFailureAt: this.lastFailureAt,
      openedAt: this.openedAt,
      probeInFlight: this.probeToken !== null
    };
  }

  private heldBy(probe: number | null | undefined): boolean {
    return this.probeToken !== null && (probe === undefined || probe === this.probeToken);
  }

  private open(now: number): void {
    this.openedAt = now;
    this.probeToken = null;
    this.transition('open');
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    this.onTransition?.(from, to, this.snapshot());
  }
}
