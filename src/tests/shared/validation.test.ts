/**
 * Tests for shared validation schemas and helpers
 */

import { describe, it, expect } from 'vitest';
import type { z } from 'zod';
import {
  ArtifactSchema,
  EmbeddingVectorSchema,
  GeneratedContentSchema,
  GenerationResultSchema,
  JobRequirementsSchema,
  ModelProfileSchema,
  ValidationResult,
  formatValidationErrors,
  zodErrorToValidationResult
} from '../../shared/validation';

function validateWith(schema: z.ZodTypeAny, value: unknown): ValidationResult {
  const parsed = schema.safeParse(value);
  return parsed.success ? { isValid: true, errors: [] } : zodErrorToValidationResult(parsed.error);
}

describe('Shared Validation Utilities', () => {
  describe('Model Profile Validation', () => {
    const valid = {
      id: 'chat-cheap',
      provider: 'openai',
      taskTypes: ['cv_generation'],
      costPerUnit: 0.0001,
      qualityTier: 'medium'
    };

    it('should accept a minimal profile', () => {
      expect(validateWith(ModelProfileSchema, valid)).toEqual({ isValid: true, errors: [] });
    });

    it('should reject negative prices', () => {
      const result = validateWith(ModelProfileSchema, { ...valid, costPerUnit: -1 });

      expect(result.isValid).toBe(false);
      expect(result.errors[0].field).toBe('costPerUnit');
    });

    it('should reject a profile without tasks', () => {
      const result = validateWith(ModelProfileSchema, { ...valid, taskTypes: [] });

      expect(result.errors).toEqual([{ field: 'taskTypes', message: 'A model must support at least one task' }]);
    });

    it('should reject an unknown provider', () => {
      expect(validateWith(ModelProfileSchema, { ...valid, provider: 'local' }).isValid).toBe(false);
    });
  });

  describe('Job Requirements Validation', () => {
    it('should default and trim skill lists', () => {
      const parsed = JobRequirementsSchema.parse({ mustHaveSkills: [' Python ', '', 'Django'] });

      expect(parsed.mustHaveSkills).toEqual(['Python', 'Django']);
      expect(parsed.niceToHaveSkills).toEqual([]);
      expect(parsed.keyResponsibilities).toEqual([]);
    });

    it('should bound the confidence score', () => {
      expect(JobRequirementsSchema.safeParse({ confidenceScore: 1.5 }).success).toBe(false);
      expect(JobRequirementsSchema.safeParse({ confidenceScore: 0.8 }).success).toBe(true);
    });
  });

  describe('Generated Content Validation', () => {
    it('should require a professional summary', () => {
      const result = validateWith(GeneratedContentSchema, { professionalSummary: '   ' });

      expect(result.errors).toEqual([{ field: 'professionalSummary', message: 'Professional summary is missing' }]);
    });

    it('should fill in empty sections', () => {
      const parsed = GeneratedContentSchema.parse({
        professionalSummary: 'Backend engineer',
        experience: [{ title: 'Engineer' }]
      });

      expect(parsed.experience).toEqual([{ title: 'Engineer', organization: '', period: '', highlights: [] }]);
      expect(parsed.projects).toEqual([]);
      expect(parsed.certifications).toEqual([]);
    });
  });

  describe('Artifact Validation', () => {
    it('should default optional text fields', () => {
      expect(ArtifactSchema.parse({ id: 'a1' })).toEqual({ id: 'a1', title: '', content: '', skills: [] });
    });

    it('should require an id', () => {
      expect(ArtifactSchema.safeParse({ id: '' }).success).toBe(false);
    });
  });

  describe('Embedding Validation', () => {
    it('should reject empty and non-finite vectors', () => {
      expect(EmbeddingVectorSchema.safeParse([]).success).toBe(false);
      expect(EmbeddingVectorSchema.safeParse([0.1, Number.POSITIVE_INFINITY]).success).toBe(false);
      expect(EmbeddingVectorSchema.safeParse([0.1, -0.2]).success).toBe(true);
    });
  });

  describe('Generation Result Validation', () => {
    const stored = {
      requestId: 'req-1',
      userId: 'user-1',
      status: 'failed',
      documentType: 'cv',
      content: null,
      requirements: null,
      skillMatchScore: null,
      missingSkills: [],
      artifactsUsed: [],
      modelsUsed: ['embed-small'],
      costUsd: 0.001,
      errorKind: 'BudgetExceeded',
      errorMessage: 'Daily usage budget exceeded',
      createdAt: '2025-03-14T12:00:00.000Z',
      completedAt: '2025-03-14T12:00:01.000Z'
    };

    it('should revive dates from JSON', () => {
      const parsed = GenerationResultSchema.parse(stored);

      expect(parsed.createdAt).toEqual(new Date('2025-03-14T12:00:00.000Z'));
      expect(parsed.completedAt).toEqual(new Date('2025-03-14T12:00:01.000Z'));
    });

    it('should reject an unknown error kind', () => {
      expect(GenerationResultSchema.safeParse({ ...stored, errorKind: 'Oops' }).success).toBe(false);
    });

    it('should keep the skill score within 0..10', () => {
      expect(GenerationResultSchema.safeParse({ ...stored, skillMatchScore: 11 }).success).toBe(false);
      expect(GenerationResultSchema.safeParse({ ...stored, skillMatchScore: 7.5 }).success).toBe(false);
    });
  });

  describe('Error Messages', () => {
    it('should join field errors on one line', () => {
      const parsed = ModelProfileSchema.safeParse({ id: '', provider: 'openai', taskTypes: ['cv_generation'], costPerUnit: 0, qualityTier: 'high' });

      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(formatValidationErrors(zodErrorToValidationResult(parsed.error)))
          .toBe('id: Model id cannot be empty');
      }
    });

    it('should omit an empty field path', () => {
      expect(formatValidationErrors({ isValid: false, errors: [{ field: '', message: 'Embedding vector is empty' }] }))
        .toBe('Embedding vector is empty');
    });
  });
});
