/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, loadConfig, validateConfig } from '../../backend/config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config.server.isTest).toBe(true);
    expect(config.server.logLevel).toBe('silent');
    expect(config.selection.strategy).toBe('balanced');
    expect(config.selection.balancedWeights).toEqual({ cost: 0.5, quality: 0.5 });
    expect(config.budget.dailyLimits).toEqual({ free: 5, pro: 50, enterprise: 1000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 5, cooldownMs: 30000, windowMs: 60000 });
    expect(config.chunking).toEqual({ chunkSize: 1000, overlap: 200, maxChunksPerDocument: 50 });
    expect(config.cache.nearDuplicate.enabled).toBe(false);
    expect(config.llm.catalogPath.endsWith('models.json')).toBe(true);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      OPENAI_API_KEY: 'test-key',
      MODEL_SELECTION_STRATEGY: 'quality_first',
      BUDGET_PRO_DAILY_USD: '12.5',
      CIRCUIT_FAILURE_THRESHOLD: '3',
      CACHE_NEAR_DUPLICATE: 'true',
      DATABASE_PATH: ':memory:'
    });

    expect(config.server.isProduction).toBe(true);
    expect(config.server.logLevel).toBe('info');
    expect(config.llm.hasOpenaiKey).toBe(true);
    expect(config.llm.hasAnthropicKey).toBe(false);
    expect(config.selection.strategy).toBe('quality_first');
    expect(config.budget.dailyLimits.pro).toBe(12.5);
    expect(config.circuitBreaker.failureThreshold).toBe(3);
    expect(config.cache.nearDuplicate.enabled).toBe(true);
    expect(config.database.path).toBe(':memory:');
  });

  it('should fall back to development for an unknown NODE_ENV', () => {
    expect(loadConfig({ NODE_ENV: 'staging' }).server.nodeEnv).toBe('development');
  });

  it('should reject an unknown strategy', () => {
    expect(() => loadConfig({ MODEL_SELECTION_STRATEGY: 'cheapest' })).toThrow(ConfigurationError);
  });

  it('should reject non-numeric values', () => {
    expect(() => loadConfig({ CHUNK_SIZE: 'large' })).toThrow('Invalid numeric value for CHUNK_SIZE: "large". Expected a number.');
    expect(() => loadConfig({ BUDGET_FREE_DAILY_USD: 'lots' })).toThrow(ConfigurationError);
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(loadConfig({ NODE_ENV: 'test' }))).not.toThrow();
  });

  it('should list every problem', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      CHUNK_SIZE: '100',
      CHUNK_OVERLAP: '100',
      BUDGET_FREE_DAILY_USD: '-1',
      CIRCUIT_FAILURE_THRESHOLD: '0'
    });

    expect(() => validateConfig(config)).toThrow(
      'Configuration validation failed:\n' +
      '  - Daily budget for tier "free" cannot be negative\n' +
      '  - CIRCUIT_FAILURE_THRESHOLD must be at least 1\n' +
      '  - CHUNK_OVERLAP must be in [0, CHUNK_SIZE)'
    );
  });

  it('should require a provider key in production', () => {
    expect(() => validateConfig(loadConfig({ NODE_ENV: 'production' }))).toThrow(/At least one LLM API key is required/);
  });
});
