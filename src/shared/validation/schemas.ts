/**
 * Validation Schemas
 *
 * Zod schemas for the model catalog, model output and generation records.
 * Model output is untrusted: every payload read back from a provider or
 * from the cache goes through one of these.
 */

import { z } from 'zod';
import { TailoringErrorKind } from '../../tailoring/errors/types';

// ============================================================================
// Model Catalog
// ============================================================================

export const TaskTypeSchema = z.enum(['embedding', 'job_parsing', 'cv_generation']);

export const ModelProfileSchema = z.object({
  id: z.string().trim().min(1, 'Model id cannot be empty'),
  provider: z.enum(['anthropic', 'openai']),
  taskTypes: z.array(TaskTypeSchema).min(1, 'A model must support at least one task'),
  costPerUnit: z.number().nonnegative(),
  costPerOutputUnit: z.number().nonnegative().default(0),
  latencyClass: z.enum(['fast', 'standard', 'slow']).default('standard'),
  qualityTier: z.enum(['standard', 'medium', 'high', 'premium']),
  dimensions: z.number().int().positive().optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  contextWindow: z.number().int().positive().optional(),
  deprecated: z.boolean().default(false)
}).refine(
  (profile) => !profile.taskTypes.includes('embedding') || profile.dimensions !== undefined,
  { message: 'Embedding models must declare dimensions', path: ['dimensions'] }
);

export const ModelCatalogSchema = z.object({
  models: z.array(ModelProfileSchema).min(1, 'The model catalog is empty')
}).refine(
  (catalog) => new Set(catalog.models.map(m => m.id)).size === catalog.models.length,
  { message: 'Model ids must be unique', path: ['models'] }
);

// ============================================================================
// Model Output
// ============================================================================

const SkillListSchema = z.array(z.string()).default([])
  .transform(skills => skills.map(s => s.trim()).filter(s => s.length > 0));

/**
 * Requirements extracted from a job posting
 */
export const JobRequirementsSchema = z.object({
  roleTitle: z.string().optional(),
  seniorityLevel: z.string().optional(),
  mustHaveSkills: SkillListSchema,
  niceToHaveSkills: SkillListSchema,
  keyResponsibilities: z.array(z.string()).default([]),
  companyValues: z.array(z.string()).default([]),
  confidenceScore: z.number().min(0).max(1).optional()
});

export const ExperienceEntrySchema = z.object({
  title: z.string(),
  organization: z.string().default(''),
  period: z.string().default(''),
  highlights: z.array(z.string()).default([])
});

export const ProjectEntrySchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  technologies: z.array(z.string()).default([])
});

export const EducationEntrySchema = z.object({
  institution: z.string(),
  qualification: z.string().default(''),
  period: z.string().default('')
});

/**
 * Structured sections of a generated document
 */
export const GeneratedContentSchema = z.object({
  professionalSummary: z.string().trim().min(1, 'Professional summary is missing'),
  keySkills: z.array(z.string()).default([]),
  experience: z.array(ExperienceEntrySchema).default([]),
  projects: z.array(ProjectEntrySchema).default([]),
  education: z.array(EducationEntrySchema).default([]),
  certifications: z.array(z.string()).default([])
});

export const EmbeddingVectorSchema = z.array(z.number().finite()).min(1, 'Embedding vector is empty');

// ============================================================================
// Generation Records
// ============================================================================

export const ArtifactSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  content: z.string().default(''),
  skills: z.array(z.string()).default([]),
  kind: z.string().optional()
});

export const GenerationStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);

export const TailoringErrorKindSchema = z.nativeEnum(TailoringErrorKind);

export const GenerationResultSchema = z.object({
  requestId: z.string().min(1),
  userId: z.string(),
  status: GenerationStatusSchema,
  documentType: z.enum(['cv', 'cover_letter']),
  content: GeneratedContentSchema.nullable(),
  requirements: JobRequirementsSchema.nullable(),
  skillMatchScore: z.number().int().min(0).max(10).nullable(),
  missingSkills: z.array(z.string()),
  artifactsUsed: z.array(z.string()),
  modelsUsed: z.array(z.string()),
  costUsd: z.number().nonnegative(),
  errorKind: TailoringErrorKindSchema.nullable(),
  errorMessage: z.string().nullable(),
  createdAt: z.coerce.date(),
  completedAt: z.coerce.date().nullable()
});
