/**
 * Cost Accounting
 *
 * USD cost of provider usage, priced from the model catalog.
 */

import type { ModelProfile } from './types';

/** Rough characters-per-token ratio used before a call reports real usage */
const CHARS_PER_TOKEN = 4;

/**
 * Estimate token count of text before sending it
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Price a call from its token counts
 */
export function calculateCost(
  model: ModelProfile,
  inputTokens: number,
  outputTokens: number = 0
): number {
  const inputCost = (inputTokens / 1000) * model.costPerUnit;
  const outputCost = (outputTokens / 1000) * model.costPerOutputUnit;
  return inputCost + outputCost;
}
