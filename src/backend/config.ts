/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Everything here is read once at process start and treated as read-only afterwards.
 *
 * Usage:
 *   import { config } from './config';
 *   console.log(config.budget.dailyLimits.free);
 */

import 'dotenv/config';
import * as path from 'path';
import type { StrategyName } from '../tailoring/types';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: string;
}

export interface DatabaseConfig {
  /** SQLite file path, or ':memory:' */
  path: string;
}

export interface LLMConfig {
  anthropicApiKey: string;
  openaiApiKey: string;
  hasAnthropicKey: boolean;
  hasOpenaiKey: boolean;
  /** Upper bound on a single provider call */
  timeoutMs: number;
  /** JSON file holding the model catalog */
  catalogPath: string;
}

export interface SelectionConfig {
  strategy: StrategyName;
  balancedWeights: {
    cost: number;
    quality: number;
  };
}

export interface BudgetConfig {
  /** Daily USD ceiling per tier */
  dailyLimits: Record<string, number>;
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  cooldownMs: number;
  windowMs: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
  maxChunksPerDocument: number;
}

export interface PipelineConfig {
  topArtifacts: number;
}

export interface CacheConfig {
  nearDuplicate: {
    enabled: boolean;
    threshold: number;
    candidateLimit: number;
    allowCrossOwner: boolean;
  };
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  llm: LLMConfig;
  selection: SelectionConfig;
  budget: BudgetConfig;
  circuitBreaker: CircuitBreakerSettings;
  chunking: ChunkingConfig;
  pipeline: PipelineConfig;
  cache: CacheConfig;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Get an environment variable, or an empty string when unset
 */
function getEnv(env: Env, key: string): string {
  return env[key] || '';
}

/**
 * Get an environment variable with a default value
 */
function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get an integer environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Get a decimal environment variable (budgets, weights, thresholds)
 */
function getEnvFloat(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Get a boolean environment variable
 */
function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Validate node environment
 */
function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') return value;
  return 'development'; // default
}

/**
 * Validate selection strategy value
 */
function parseStrategy(value: string): StrategyName {
  switch (value) {
    case 'cost_optimized':
    case 'quality_first':
    case 'balanced':
      return value;
    default:
      throw new ConfigurationError(
        `Invalid MODEL_SELECTION_STRATEGY: "${value}". ` +
        'Expected cost_optimized, quality_first or balanced.'
      );
  }
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));

  const anthropicApiKey = getEnv(env, 'ANTHROPIC_API_KEY');
  const openaiApiKey = getEnv(env, 'OPENAI_API_KEY');

  const defaultLogLevel = nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'debug' : 'info';

  return {
    server: {
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      logLevel: getEnvWithDefault(env, 'LOG_LEVEL', defaultLogLevel),
    },

    database: {
      path: getEnvWithDefault(env, 'DATABASE_PATH', './data/tailoring.db'),
    },

    llm: {
      anthropicApiKey,
      openaiApiKey,
      hasAnthropicKey: !!anthropicApiKey,
      hasOpenaiKey: !!openaiApiKey,
      timeoutMs: getEnvNumber(env, 'PROVIDER_TIMEOUT_MS', 30000),
      catalogPath: getEnvWithDefault(
        env,
        'MODEL_CATALOG_PATH',
        path.resolve(__dirname, '..', '..', 'config', 'models.json')
      ),
    },

    selection: {
      strategy: parseStrategy(getEnvWithDefault(env, 'MODEL_SELECTION_STRATEGY', 'balanced')),
      balancedWeights: {
        cost: getEnvFloat(env, 'BALANCED_COST_WEIGHT', 0.5),
        quality: getEnvFloat(env, 'BALANCED_QUALITY_WEIGHT', 0.5),
      },
    },

    budget: {
      dailyLimits: {
        free: getEnvFloat(env, 'BUDGET_FREE_DAILY_USD', 5),
        pro: getEnvFloat(env, 'BUDGET_PRO_DAILY_USD', 50),
        enterprise: getEnvFloat(env, 'BUDGET_ENTERPRISE_DAILY_USD', 1000),
      },
    },

    circuitBreaker: {
      failureThreshold: getEnvNumber(env, 'CIRCUIT_FAILURE_THRESHOLD', 5),
      cooldownMs: getEnvNumber(env, 'CIRCUIT_COOLDOWN_MS', 30000),
      windowMs: getEnvNumber(env, 'CIRCUIT_WINDOW_MS', 60000),
    },

    chunking: {
      chunkSize: getEnvNumber(env, 'CHUNK_SIZE', 1000),
      overlap: getEnvNumber(env, 'CHUNK_OVERLAP', 200),
      maxChunksPerDocument: getEnvNumber(env, 'MAX_CHUNKS_PER_DOCUMENT', 50),
    },

    pipeline: {
      topArtifacts: getEnvNumber(env, 'TOP_ARTIFACTS', 5),
    },

    cache: {
      nearDuplicate: {
        enabled: getEnvBoolean(env, 'CACHE_NEAR_DUPLICATE', false),
        threshold: getEnvFloat(env, 'CACHE_NEAR_DUPLICATE_THRESHOLD', 0.98),
        candidateLimit: getEnvNumber(env, 'CACHE_NEAR_DUPLICATE_CANDIDATES', 200),
        allowCrossOwner: getEnvBoolean(env, 'CACHE_NEAR_DUPLICATE_CROSS_USER', false),
      },
    },
  };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate configuration values that would otherwise fail deep inside a request
 * Throws ConfigurationError listing every problem found
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  for (const [tier, limit] of Object.entries(config.budget.dailyLimits)) {
    if (limit < 0) errors.push(`Daily budget for tier "${tier}" cannot be negative`);
  }

  const { cost, quality } = config.selection.balancedWeights;
  if (cost < 0 || quality < 0 || cost + quality === 0) {
    errors.push('Balanced weights must be non-negative and not both zero');
  }

  if (config.circuitBreaker.failureThreshold < 1) {
    errors.push('CIRCUIT_FAILURE_THRESHOLD must be at least 1');
  }
  if (config.circuitBreaker.cooldownMs < 0 || config.circuitBreaker.windowMs <= 0) {
    errors.push('CIRCUIT_COOLDOWN_MS must be >= 0 and CIRCUIT_WINDOW_MS must be > 0');
  }

  const { chunkSize, overlap, maxChunksPerDocument } = config.chunking;
  if (chunkSize <= 0) errors.push('CHUNK_SIZE must be positive');
  if (overlap < 0 || overlap >= chunkSize) errors.push('CHUNK_OVERLAP must be in [0, CHUNK_SIZE)');
  if (maxChunksPerDocument < 1) errors.push('MAX_CHUNKS_PER_DOCUMENT must be at least 1');

  if (config.pipeline.topArtifacts < 1) errors.push('TOP_ARTIFACTS must be at least 1');
  if (config.llm.timeoutMs <= 0) errors.push('PROVIDER_TIMEOUT_MS must be positive');

  const { threshold, candidateLimit } = config.cache.nearDuplicate;
  if (threshold <= 0 || threshold > 1) errors.push('CACHE_NEAR_DUPLICATE_THRESHOLD must be in (0, 1]');
  if (candidateLimit < 1) errors.push('CACHE_NEAR_DUPLICATE_CANDIDATES must be at least 1');

  // Live calls need credentials outside of tests
  if (config.server.isProduction && !config.llm.hasAnthropicKey && !config.llm.hasOpenaiKey) {
    errors.push(
      'At least one LLM API key is required (ANTHROPIC_API_KEY or OPENAI_API_KEY)'
    );
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'Configuration validation failed:\n' +
      errors.map(e => `  - ${e}`).join('\n')
    );
  }
}

// =============================================================================
// Export
// =============================================================================

/**
 * Application configuration loaded from environment variables.
 * Validated at import time - will throw on invalid values.
 */
export const config: Config = loadConfig();

validateConfig(config);

/**
 * Re-export the ConfigurationError for consumers
 */
export { ConfigurationError };
