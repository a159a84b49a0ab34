/**
 * Model Selector
 *
 * Picks the model for one step of a request. Candidates are filtered by
 * task support, deprecation, exclusion and (optionally) the remaining
 * budget, then ordered by the requested strategy. The first candidate whose
 * circuit breaker admits a call wins; breakers further down the list are not
 * consulted, so no half-open probe is spent on a model that won't be called.
 */

import type { Logger } from 'pino';
import type {
  BalancedWeights,
  BudgetContext,
  ModelProfile,
  SelectionStrategy,
  StrategyName,
  TaskType
} from '../types';
import { QUALITY_RANK } from '../../shared/llm/types';
import { ModelRegistry } from './modelRegistry';
import { CircuitBreakerRegistry } from '../resilience/breakerRegistry';
import { loggers } from '../../backend/logger';

export const DEFAULT_BALANCED_WEIGHTS: BalancedWeights = { cost: 0.5, quality: 0.5 };

export type SelectionFailure = 'no_candidates' | 'over_budget' | 'circuit_open';

export type SelectionOutcome =
  | { model: ModelProfile; reason: null }
  | { model: null; reason: SelectionFailure };

export interface SelectOptions {
  /** Model ids to skip (already failed or denied in this request) */
  exclude?: ReadonlySet<string>;
}

export function strategyFromName(name: StrategyName, weights: BalancedWeights = DEFAULT_BALANCED_WEIGHTS): SelectionStrategy {
  switch (name) {
    case 'cost_optimized':
      return { kind: 'cost_optimized' };
    case 'quality_first':
      return { kind: 'quality_first' };
    case 'balanced':
      return { kind: 'balanced', weights };
  }
}

// ============================================================================
// Comparators
// ============================================================================

type Comparator = (a: ModelProfile, b: ModelProfile) => number;

const byCost: Comparator = (a, b) =>
  a.costPerUnit - b.costPerUnit || a.costPerOutputUnit - b.costPerOutputUnit;

const byId: Comparator = (a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const byQualityDesc: Comparator = (a, b) => QUALITY_RANK[b.qualityTier] - QUALITY_RANK[a.qualityTier];

function chain(...comparators: Comparator[]): Comparator {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };
}

/**
 * Dense rank of each value normalized to [0, 1]; the best value gets 0
 */
function normalizedDenseRanks(values: number[], ascending: boolean): Map<number, number> {
  const distinct = [...new Set(values)].sort((a, b) => (ascending ? a - b : b - a));
  const span = Math.max(1, distinct.length - 1);
  return new Map(distinct.map((value, index) => [value, index / span]));
}

function balancedComparator(pool: readonly ModelProfile[], weights: BalancedWeights): Comparator {
  const costRanks = normalizedDenseRanks(pool.map(p => p.costPerUnit), true);
  const qualityRanks = normalizedDenseRanks(pool.map(p => QUALITY_RANK[p.qualityTier]), false);
  const score = (p: ModelProfile): number =>
    weights.cost * (costRanks.get(p.costPerUnit) ?? 1) +
    weights.quality * (qualityRanks.get(QUALITY_RANK[p.qualityTier]) ?? 1);

  return (a, b) => score(a) - score(b);
}

function comparatorFor(strategy: SelectionStrategy, pool: readonly ModelProfile[]): Comparator {
  switch (strategy.kind) {
    case 'cost_optimized':
      return chain(byCost, byId);
    case 'quality_first':
      return chain(byQualityDesc, byCost, byId);
    case 'balanced':
      return chain(balancedComparator(pool, strategy.weights), byCost, byId);
  }
}

// ============================================================================
// Selector
// ============================================================================

export class ModelSelector {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly logger: Logger = loggers.selector
  ) {}

  /**
   * Order candidates for a task by strategy. Pure: breakers are not read.
   */
  rank(taskType: TaskType, strategy: SelectionStrategy, options: SelectOptions = {}): ModelProfile[] {
    const pool = this.registry
      .forTask(taskType)
      .filter(p => !options.exclude?.has(p.id));
    return [...pool].sort(comparatorFor(strategy, pool));
  }

  /**
   * Select a model and explain a null result
   */
  selectWithReason(
    taskType: TaskType,
    strategy: SelectionStrategy,
    budget?: BudgetContext,
    options: SelectOptions = {}
  ): SelectionOutcome {
    const ranked = this.rank(taskType, strategy, options);
    if (ranked.length === 0) {
      this.logger.warn({ taskType, excluded: [...(options.exclude ?? [])] }, 'No model supports task');
      return { model: null, reason: 'no_candidates' };
    }

    const affordable = budget
      ? ranked.filter(p => this.registry.estimateCost(p, budget.inputTokens, budget.outputTokens) <= budget.remainingUsd)
      : ranked;
    if (affordable.length === 0) {
      this.logger.info({ taskType, remainingUsd: budget?.remainingUsd }, 'No model fits the remaining budget');
      return { model: null, reason: 'over_budget' };
    }

    for (const profile of affordable) {
      if (this.breakers.get(profile.id).allow()) {
        this.logger.debug({ taskType, strategy: strategy.kind, modelId: profile.id }, 'Model selected');
        return { model: profile, reason: null };
      }
    }

    this.logger.warn(
      { taskType, candidates: affordable.map(p => p.id) },
      'Every candidate circuit is open'
    );
    return { model: null, reason: 'circuit_open' };
  }

  select(
    taskType: TaskType,
    strategy: SelectionStrategy,
    budget?: BudgetContext,
    options: SelectOptions = {}
  ): ModelProfile | null {
    return this.selectWithReason(taskType, strategy, budget, options).model;
  }
}
