/**
 * Model Registry
 *
 * Immutable catalog of ModelProfiles, loaded once from config/models.json
 * and validated before any request is served.
 */

import * as fs from 'fs';
import type { ModelProfile, TaskType } from '../types';
import { ModelCatalogSchema } from '../../shared/validation/schemas';
import { zodErrorToValidationResult, formatValidationErrors } from '../../shared/validation/validator';
import { calculateCost } from '../../shared/llm/cost';
import { ConfigurationError } from '../../backend/config';

/**
 * Read and validate a catalog file
 * @throws ConfigurationError when the file is missing or invalid
 */
export function loadModelCatalog(filePath: string): ModelProfile[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read model catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseModelCatalog(raw, filePath);
}

export function parseModelCatalog(raw: unknown, source: string = 'catalog'): ModelProfile[] {
  const parsed = ModelCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid model catalog ${source}: ${formatValidationErrors(zodErrorToValidationResult(parsed.error))}`
    );
  }
  return parsed.data.models.map(profile => Object.freeze({
    ...profile,
    taskTypes: Object.freeze([...profile.taskTypes])
  }));
}

export class ModelRegistry {
  private readonly profiles: ReadonlyMap<string, ModelProfile>;

  constructor(profiles: readonly ModelProfile[]) {
    const byId = new Map<string, ModelProfile>();
    for (const profile of profiles) {
      if (byId.has(profile.id)) {
        throw new ConfigurationError(`Duplicate model id in catalog: ${profile.id}`);
      }
      byId.set(profile.id, profile);
    }
    this.profiles = byId;
  }

  static fromFile(filePath: string): ModelRegistry {
    return new ModelRegistry(loadModelCatalog(filePath));
  }

  all(): ModelProfile[] {
    return [...this.profiles.values()];
  }

  get(modelId: string): ModelProfile | undefined {
    return this.profiles.get(modelId);
  }

  /**
   * Non-deprecated models that can perform the task
   */
  forTask(taskType: TaskType): ModelProfile[] {
    return this.all().filter(p => !p.deprecated && p.taskTypes.includes(taskType));
  }

  estimateCost(model: ModelProfile, inputTokens: number, outputTokens: number = 0): number {
    return calculateCost(model, inputTokens, outputTokens);
  }
}
