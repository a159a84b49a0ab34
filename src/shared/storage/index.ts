/**
 * Storage Module
 *
 * Persistence for generation results and user artifacts.
 * Backends: memory (testing) and SQLite.
 */

export * from './interface';
export * from './memoryStorage';
export * from './databaseStorage';
