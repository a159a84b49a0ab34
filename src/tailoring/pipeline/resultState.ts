/**
 * Generation Result State
 *
 * pending -> processing -> completed | failed. Terminal states are final.
 */

import type { DocumentType, GenerationResult, GenerationStatus } from '../types';
import type { TailoringError } from '../errors/types';

const TRANSITIONS: Record<GenerationStatus, readonly GenerationStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: []
};

export function isTerminal(status: GenerationStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export class IllegalTransitionError extends Error {
  constructor(readonly from: GenerationStatus, readonly to: GenerationStatus) {
    super(`Illegal generation status transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function newResult(
  requestId: string,
  userId: string,
  documentType: DocumentType,
  now: Date
): GenerationResult {
  return {
    requestId,
    userId,
    status: 'pending',
    documentType,
    content: null,
    requirements: null,
    skillMatchScore: null,
    missingSkills: [],
    artifactsUsed: [],
    modelsUsed: [],
    costUsd: 0,
    errorKind: null,
    errorMessage: null,
    createdAt: now,
    completedAt: null
  };
}

/**
 * Return a copy of the result moved to the next status
 * @throws IllegalTransitionError when the move is not allowed
 */
export function transition(
  result: GenerationResult,
  to: GenerationStatus,
  patch: Partial<Omit<GenerationResult, 'status' | 'requestId'>> = {}
): GenerationResult {
  if (!TRANSITIONS[result.status].includes(to)) {
    throw new IllegalTransitionError(result.status, to);
  }
  return { ...result, ...patch, status: to };
}

export function completeResult(
  result: GenerationResult,
  patch: Pick<GenerationResult, 'content' | 'requirements' | 'skillMatchScore' | 'missingSkills' | 'artifactsUsed' | 'modelsUsed' | 'costUsd'>,
  now: Date
): GenerationResult {
  return transition(result, 'completed', { ...patch, completedAt: now });
}

export function failResult(
  result: GenerationResult,
  error: TailoringError,
  spent: Pick<GenerationResult, 'modelsUsed' | 'costUsd'>,
  now: Date
): GenerationResult {
  return transition(result, 'failed', {
    ...spent,
    errorKind: error.kind,
    errorMessage: error.userMessage,
    completedAt: now
  });
}
