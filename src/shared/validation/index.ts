/**
 * Validation Module
 *
 * Zod schemas and validation helpers.
 */

export * from './validator';
export * from './schemas';
