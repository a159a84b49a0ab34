/**
 * Database Generation Store
 *
 * SQLite-based implementation of GenerationStore.
 * Uses better-sqlite3 for synchronous, performant database operations.
 *
 * Schema:
 *   generation_results(request_id, user_id, status, payload, created_at, updated_at)
 *   artifacts(id, user_id, title, content, skills, kind, position)
 *   UNIQUE(user_id, id)
 *
 * Results are stored as JSON and re-validated on the way out.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { Artifact, GenerationResult } from '../../tailoring/types';
import { GenerationStore } from './interface';
import { ArtifactSchema, GenerationResultSchema } from '../validation/schemas';
import { formatValidationErrors, zodErrorToValidationResult } from '../validation/validator';
import { ErrorHandler } from '../errors/handler';
import { loggers } from '../../backend/logger';

const log = loggers.storage;

/** Undefined for unparseable text, so the schema check rejects the row */
function parseStoredJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Connection
// ============================================================================

export interface OpenDatabaseOptions {
  /**
   * Whether to enable WAL mode for better concurrent performance
   * Default: true (ignored for in-memory databases)
   */
  walMode?: boolean;
}

/**
 * Open a SQLite database, creating its directory when needed
 * Use ':memory:' for an in-memory database (useful for testing)
 */
export function openDatabase(databasePath: string, options: OpenDatabaseOptions = {}): Database.Database {
  const inMemory = databasePath === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const db = new Database(databasePath);
  if (!inMemory && options.walMode !== false) {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS generation_results (
      request_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      status TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE INDEX IF NOT EXISTS idx_generation_results_user ON generation_results(user_id)`,
    `CREATE TABLE IF NOT EXISTS artifacts (
      id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      title TEXT NOT NULL DEFAULT '',
      content TEXT NOT NULL DEFAULT '',
      skills TEXT NOT NULL DEFAULT '[]',
      kind TEXT,
      position INTEGER NOT NULL DEFAULT 0,
      UNIQUE(user_id, id)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_artifacts_user ON artifacts(user_id, position)`,
  ],
};

/**
 * Row structure from the artifacts table
 */
interface ArtifactRow {
  id: string;
  user_id: string;
  title: string;
  content: string;
  skills: string;
  kind: string | null;
  position: number;
}

// ============================================================================
// SQLite Generation Store
// ============================================================================

export class SqliteGenerationStore implements GenerationStore {
  private readonly stmtSaveResult: Database.Statement<[string, string, string, string]>;
  private readonly stmtLoadResult: Database.Statement<[string], { payload: string }>;
  private readonly stmtLoadArtifacts: Database.Statement<[string], ArtifactRow>;
  private readonly stmtUpsertArtifact: Database.Statement<[string, string, string, string, string, string | null, number]>;
  private readonly stmtDeleteArtifacts: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database) {
    this.runMigrations();

    this.stmtSaveResult = this.db.prepare<[string, string, string, string]>(`
      INSERT INTO generation_results (request_id, user_id, status, payload, created_at, updated_at)
      VALUES (?, ?, ?, ?, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
      ON CONFLICT(request_id) DO UPDATE SET
        status = excluded.status,
        payload = excluded.payload,
        updated_at = CURRENT_TIMESTAMP
    `);
    this.stmtLoadResult = this.db.prepare<[string], { payload: string }>(
      'SELECT payload FROM generation_results WHERE request_id = ?'
    );
    this.stmtLoadArtifacts = this.db.prepare<[string], ArtifactRow>(
      'SELECT * FROM artifacts WHERE user_id = ? ORDER BY position, id'
    );
    this.stmtUpsertArtifact = this.db.prepare<[string, string, string, string, string, string | null, number]>(`
      INSERT INTO artifacts (id, user_id, title, content, skills, kind, position)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(user_id, id) DO UPDATE SET
        title = excluded.title,
        content = excluded.content,
        skills = excluded.skills,
        kind = excluded.kind,
        position = excluded.position
    `);
    this.stmtDeleteArtifacts = this.db.prepare<[string]>('DELETE FROM artifacts WHERE user_id = ?');
  }

  /**
   * Run database migrations
   */
  private runMigrations(): void {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)');
    const row = this.db
      .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get();
    const currentVersion = row?.version ?? 0;

    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (statements) {
        const transaction = this.db.transaction(() => {
          for (const sql of statements) {
            this.db.exec(sql);
          }
          this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
        });
        transaction();
        log.info({ version: v }, 'Migrated generation store schema');
      }
    }
  }

  async saveResult(requestId: string, result: GenerationResult): Promise<void> {
    ErrorHandler.handle(
      () => this.stmtSaveResult.run(requestId, result.userId, result.status, JSON.stringify(result)),
      (error) => ErrorHandler.createStorageError(
        'Failed to save generation result',
        String(error),
        { requestId }
      )
    );
  }

  async loadResult(requestId: string): Promise<GenerationResult | null> {
    const row = this.stmtLoadResult.get(requestId);
    if (!row) {
      return null;
    }

    const raw: unknown = ErrorHandler.handle(
      () => JSON.parse(row.payload),
      (error) => ErrorHandler.createStorageError('Stored generation result is corrupt', String(error), { requestId })
    );
    const parsed = GenerationResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw ErrorHandler.createStorageError(
        'Stored generation result is corrupt',
        formatValidationErrors(zodErrorToValidationResult(parsed.error)),
        { requestId }
      );
    }
    return parsed.data;
  }

  async loadArtifactSet(userId: string): Promise<Artifact[]> {
    const artifacts: Artifact[] = [];
    for (const row of this.stmtLoadArtifacts.all(userId)) {
      const parsed = ArtifactSchema.safeParse({
        id: row.id,
        title: row.title,
        content: row.content,
        skills: parseStoredJson(row.skills),
        kind: row.kind ?? undefined
      });
      if (parsed.success) {
        artifacts.push(parsed.data);
      } else {
        log.warn({ userId, artifactId: row.id }, 'Skipping malformed artifact row');
      }
    }
    return artifacts;
  }

  /**
   * Replace a user's artifact set in one transaction
   */
  saveArtifacts(userId: string, artifacts: Artifact[]): void {
    const replace = this.db.transaction((items: Artifact[]) => {
      this.stmtDeleteArtifacts.run(userId);
      items.forEach((artifact, position) => {
        this.stmtUpsertArtifact.run(
          artifact.id,
          userId,
          artifact.title,
          artifact.content,
          JSON.stringify(artifact.skills),
          artifact.kind ?? null,
          position
        );
      });
    });
    replace(artifacts);
  }
}
