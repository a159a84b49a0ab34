/**
 * Tailoring Types
 *
 * Core type definitions for model selection, budgeting and the
 * generation pipeline.
 */

import type { z } from 'zod';
import type {
  ArtifactSchema,
  GeneratedContentSchema,
  GenerationResultSchema,
  GenerationStatusSchema,
  JobRequirementsSchema
} from '../../shared/validation/schemas';

export type {
  LLMProvider,
  TaskType,
  LatencyClass,
  QualityTier,
  ModelProfile
} from '../../shared/llm/types';

// ============================================================================
// Model Selection
// ============================================================================

export type StrategyName = 'cost_optimized' | 'quality_first' | 'balanced';

/**
 * Relative weight of cost and quality rank under the balanced strategy
 */
export interface BalancedWeights {
  cost: number;
  quality: number;
}

export type SelectionStrategy =
  | { kind: 'cost_optimized' }
  | { kind: 'quality_first' }
  | { kind: 'balanced'; weights: BalancedWeights };

/**
 * What the selector needs to know to price a candidate against the budget
 */
export interface BudgetContext {
  remainingUsd: number;
  inputTokens: number;
  outputTokens: number;
}

// ============================================================================
// Documents
// ============================================================================

export type DocumentType = 'cv' | 'cover_letter';

/**
 * A piece of user evidence (project, role, publication) with declared skills
 */
export type Artifact = z.infer<typeof ArtifactSchema>;

/**
 * Requirements parsed from a job posting
 */
export type JobRequirements = z.infer<typeof JobRequirementsSchema>;

export type GeneratedContent = z.infer<typeof GeneratedContentSchema>;

export interface GenerationPreferences {
  tone?: string;
  length?: string;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * One "produce tailored content" invocation
 */
export interface GenerationRequest {
  requestId: string;
  userId: string;
  tier: string;
  jobDescription: string;
  companyName?: string;
  roleTitle?: string;
  /** Loaded from the GenerationStore when omitted */
  artifacts?: Artifact[];
  documentType?: DocumentType;
  /** Skips the job-parsing call when supplied */
  requirements?: Partial<JobRequirements>;
  preferences?: GenerationPreferences;
  /** Overrides the configured selection strategy */
  strategy?: StrategyName;
  /** External cancellation */
  signal?: AbortSignal;
}

export type GenerationStatus = z.infer<typeof GenerationStatusSchema>;

export type GenerationResult = z.infer<typeof GenerationResultSchema>;
