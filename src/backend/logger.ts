/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: silent unless LOG_LEVEL is set
 *
 * Usage:
 *   import { loggers } from './logger';
 *   loggers.budget.info({ principalId: 'user-1' }, 'Reservation admitted');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { config } from './config';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: config.server.logLevel,
  base: {
    pid: process.pid,
    env: config.server.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Provider credentials must never reach the log stream
  redact: {
    paths: [
      'apiKey',
      'token',
      'secret',
      'password',
      '*.apiKey',
      '*.token',
      '*.secret',
      '*.password',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '[{component}] {msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: config.server.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Main application logger instance
 */
export const logger: Logger = pino(
  config.server.isDevelopment ? developmentOptions : productionOptions
);

// =============================================================================
// Child Logger Factories
// =============================================================================

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const cacheLogger = createComponentLogger('cache');
 * cacheLogger.debug({ namespace }, 'Cache hit');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger carrying generation request context
 */
export function createRequestLogger(requestId: string, userId?: string): Logger {
  return logger.child({
    component: 'pipeline',
    requestId,
    ...(userId && { userId }),
  });
}

// =============================================================================
// Specialized Loggers
// =============================================================================

/**
 * Pre-configured loggers for the orchestration components
 */
export const loggers = {
  /** Provider SDK calls */
  llm: createComponentLogger('llm'),
  /** Circuit breaker transitions */
  breaker: createComponentLogger('breaker'),
  /** Budget admission and reconciliation */
  budget: createComponentLogger('budget'),
  /** Content cache */
  cache: createComponentLogger('cache'),
  /** Model selection */
  selector: createComponentLogger('selector'),
  /** Generation pipeline */
  pipeline: createComponentLogger('pipeline'),
  /** Database operations */
  storage: createComponentLogger('storage'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 * Extracts useful properties from Error objects
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = value;
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: config.server.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
