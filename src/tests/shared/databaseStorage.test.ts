/**
 * Tests for SqliteGenerationStore with file-based SQLite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { SqliteGenerationStore, openDatabase } from '../../shared/storage/databaseStorage';
import { newResult, transition } from '../../tailoring/pipeline/resultState';
import { AppError, ErrorCategory } from '../../shared/errors';

describe('SqliteGenerationStore with file-based SQLite', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tailoring-store-'));
    dbPath = path.join(dir, 'nested', 'tailoring.db');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create the database directory and use WAL mode', () => {
    const db = openDatabase(dbPath);

    expect(fs.existsSync(path.dirname(dbPath))).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    db.close();
  });

  it('should keep results across connections', async () => {
    const result = transition(newResult('req-1', 'user-1', 'cv', new Date('2025-03-14T12:00:00Z')), 'processing');

    const first = openDatabase(dbPath);
    await new SqliteGenerationStore(first).saveResult('req-1', result);
    first.close();

    const second = openDatabase(dbPath);
    expect(await new SqliteGenerationStore(second).loadResult('req-1')).toEqual(result);
    second.close();
  });

  it('should migrate once', () => {
    const db = openDatabase(dbPath);
    new SqliteGenerationStore(db);
    new SqliteGenerationStore(db);

    const versions = db.prepare('SELECT version FROM schema_version').all();
    expect(versions).toEqual([{ version: 1 }]);
    db.close();
  });

  it('should report a corrupt result as a storage error', async () => {
    const db = openDatabase(dbPath);
    const store = new SqliteGenerationStore(db);
    db.prepare('INSERT INTO generation_results (request_id, user_id, status, payload) VALUES (?, ?, ?, ?)')
      .run('req-1', 'user-1', 'completed', '{"requestId": "req-1"}');

    const error = await store.loadResult('req-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ category: ErrorCategory.STORAGE, userMessage: 'Stored generation result is corrupt' });
    db.close();
  });

  it('should skip malformed artifact rows', async () => {
    const db = openDatabase(dbPath);
    const store = new SqliteGenerationStore(db);
    store.saveArtifacts('user-1', [{ id: 'a1', title: 'API', content: 'Built APIs', skills: ['Python'] }]);
    db.prepare('INSERT INTO artifacts (id, user_id, skills, position) VALUES (?, ?, ?, ?)')
      .run('a2', 'user-1', '{"not": "a list"}', 1);

    expect((await store.loadArtifactSet('user-1')).map(a => a.id)).toEqual(['a1']);
    db.close();
  });
});
