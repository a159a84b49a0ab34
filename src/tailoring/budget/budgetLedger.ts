/**
 * Budget Ledger
 *
 * Daily spend ceiling per principal. Admission is pessimistic: the estimated
 * cost is reserved before the provider call and replaced by the reported cost
 * afterwards. Admission and reconciliation for one principal run under a
 * per-key lock; different principals never wait on each other.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { BudgetEntry, BudgetStore } from './budgetStore';
import { KeyedLock } from './keyedLock';
import { TailoringErrorFactory } from '../errors/types';
import type { Clock } from '../resilience/circuitBreaker';
import { loggers } from '../../backend/logger';

/** Absorbs floating-point noise when comparing sums of small USD amounts */
const EPSILON = 1e-9;

export interface BudgetKey {
  principalId: string;
  tier: string;
}

/**
 * Provisional hold on part of a principal's daily budget
 */
export interface Reservation {
  readonly id: string;
  readonly key: BudgetKey;
  /** UTC day the reservation counts against */
  readonly date: string;
  readonly amountUsd: number;
}

export interface BudgetUsage {
  principalId: string;
  tier: string;
  date: string;
  limitUsd: number;
  committedCostUsd: number;
  reservedCostUsd: number;
  remainingUsd: number;
  requestCount: number;
}

export interface BudgetLedgerOptions {
  clock?: Clock;
  logger?: Logger;
}

export function utcDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export class BudgetLedger {
  private readonly lock = new KeyedLock();
  private readonly outstanding = new Set<string>();
  private readonly limits: ReadonlyMap<string, number>;
  private readonly fallbackLimit: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: BudgetStore,
    dailyLimits: Record<string, number>,
    options: BudgetLedgerOptions = {}
  ) {
    const entries = Object.entries(dailyLimits);
    if (entries.length === 0) {
      throw TailoringErrorFactory.invalidInput('dailyLimits', 'At least one tier budget must be configured');
    }
    this.limits = new Map(entries);
    // Unknown tiers get the most restrictive configured limit
    this.fallbackLimit = Math.min(...entries.map(([, limit]) => limit));
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? loggers.budget;
  }

  dailyLimit(tier: string): number {
    return this.limits.get(tier) ?? this.fallbackLimit;
  }

  /**
   * Reserve the estimated cost if it fits under today's limit.
   * A null result is a denial, not an error.
   */
  async admit(key: BudgetKey, estimatedCostUsd: number): Promise<Reservation | null> {
    assertAmount('estimatedCostUsd', estimatedCostUsd);
    const date = utcDate(this.clock());
    const limit = this.dailyLimit(key.tier);

    return this.lock.run(key.principalId, async () => {
      const entry = await this.load(key.principalId, date);
      const current = entry.committedCostUsd + entry.reservedCostUsd;

      if (current + estimatedCostUsd > limit + EPSILON) {
        this.logger.info(
          { principalId: key.principalId, tier: key.tier, current, estimatedCostUsd, limit },
          'Budget admission denied'
        );
        return null;
      }

      await this.store.put({
        ...entry,
        reservedCostUsd: entry.reservedCostUsd + estimatedCostUsd,
        requestCount: entry.requestCount + 1
      });

      const reservation: Reservation = {
        id: randomUUID(),
        key: { ...key },
        date,
        amountUsd: estimatedCostUsd
      };
      this.outstanding.add(reservation.id);
      this.logger.debug(
        { principalId: key.principalId, reservationId: reservation.id, estimatedCostUsd },
        'Budget reserved'
      );
      return reservation;
    });
  }

  /**
   * Replace a reservation with the cost the provider actually reported.
   * Each reservation settles once; repeats are ignored.
   */
  async reconcile(reservation: Reservation, actualCostUsd: number): Promise<void> {
    assertAmount('actualCostUsd', actualCostUsd);

    await this.lock.run(reservation.key.principalId, async () => {
      if (!this.outstanding.delete(reservation.id)) {
        this.logger.warn(
          { principalId: reservation.key.principalId, reservationId: reservation.id },
          'Reservation already settled'
        );
        return;
      }

      const entry = await this.load(reservation.key.principalId, reservation.date);
      await this.store.put({
        ...entry,
        reservedCostUsd: Math.max(0, entry.reservedCostUsd - reservation.amountUsd),
        committedCostUsd: Math.max(0, entry.committedCostUsd + actualCostUsd)
      });

      this.logger.debug(
        {
          principalId: reservation.key.principalId,
          reservationId: reservation.id,
          estimatedCostUsd: reservation.amountUsd,
          actualCostUsd
        },
        'Budget reconciled'
      );
    });
  }

  /**
   * Drop a reservation whose call was never dispatched
   */
  async release(reservation: Reservation): Promise<void> {
    await this.reconcile(reservation, 0);
  }

  async usage(key: BudgetKey): Promise<BudgetUsage> {
    const date = utcDate(this.clock());
    const entry = await this.load(key.principalId, date);
    const limitUsd = this.dailyLimit(key.tier);
    return {
      principalId: key.principalId,
      tier: key.tier,
      date,
      limitUsd,
      committedCostUsd: entry.committedCostUsd,
      reservedCostUsd: entry.reservedCostUsd,
      remainingUsd: Math.max(0, limitUsd - entry.committedCostUsd - entry.reservedCostUsd),
      requestCount: entry.requestCount
    };
  }

  async remaining(key: BudgetKey): Promise<number> {
    return (await this.usage(key)).remainingUsd;
  }

  private async load(principalId: string, date: string): Promise<BudgetEntry> {
    return (await this.store.get(principalId, date)) ?? {
      principalId,
      date,
      committedCostUsd: 0,
      reservedCostUsd: 0,
      requestCount: 0
    };
  }
}

function assertAmount(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw TailoringErrorFactory.invalidInput(field, `${field} must be a non-negative finite number, got ${value}`);
  }
}
