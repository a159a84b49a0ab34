/**
 * Cache Backends
 *
 * Synchronous record stores behind ContentCache. Inserts are
 * first-writer-wins: a second insert for the same (namespace, hash)
 * leaves the original record in place and returns it.
 */

import Database from 'better-sqlite3';
import { ErrorHandler } from '../../shared/errors/handler';
import type { TermSignature } from '../matching/similarity';

export interface CacheRecord {
  namespace: string;
  contentHash: string;
  payload: unknown;
  costUsd: number;
  accessCount: number;
  createdAt: number;
  lastAccessedAt: number;
  /** Principal whose request first produced the entry */
  ownerId: string | null;
  /** Term frequencies for near-duplicate matching, when recorded */
  signature: TermSignature | null;
}

export interface InsertOutcome {
  record: CacheRecord;
  created: boolean;
}

export interface CacheStats {
  entries: number;
  namespaces: Record<string, number>;
}

export interface CacheBackend {
  get(namespace: string, contentHash: string): CacheRecord | null;
  insertIfAbsent(record: CacheRecord): InsertOutcome;
  touch(namespace: string, contentHash: string, at: number): void;
  delete(namespace: string, contentHash: string): void;
  /** Most recently created records carrying a signature */
  recent(namespace: string, limit: number): CacheRecord[];
  /** Remove records created before a time with at most the given access count */
  prune(createdBefore: number, maxAccessCount: number): number;
  stats(): CacheStats;
}

// ============================================================================
// In-Memory Backend
// ============================================================================

export class MemoryCacheBackend implements CacheBackend {
  private readonly records = new Map<string, CacheRecord>();

  get(namespace: string, contentHash: string): CacheRecord | null {
    const record = this.records.get(key(namespace, contentHash));
    return record ? { ...record } : null;
  }

  insertIfAbsent(record: CacheRecord): InsertOutcome {
    const k = key(record.namespace, record.contentHash);
    const existing = this.records.get(k);
    if (existing) {
      return { record: { ...existing }, created: false };
    }
    this.records.set(k, { ...record });
    return { record: { ...record }, created: true };
  }

  touch(namespace: string, contentHash: string, at: number): void {
    const record = this.records.get(key(namespace, contentHash));
    if (record) {
      record.accessCount += 1;
      record.lastAccessedAt = at;
    }
  }

  delete(namespace: string, contentHash: string): void {
    this.records.delete(key(namespace, contentHash));
  }

  recent(namespace: string, limit: number): CacheRecord[] {
    return [...this.records.values()]
      .filter(r => r.namespace === namespace && r.signature !== null)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map(r => ({ ...r }));
  }

  prune(createdBefore: number, maxAccessCount: number): number {
    let removed = 0;
    for (const [k, record] of this.records) {
      if (record.createdAt < createdBefore && record.accessCount <= maxAccessCount) {
        this.records.delete(k);
        removed += 1;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const namespaces: Record<string, number> = {};
    for (const record of this.records.values()) {
      namespaces[record.namespace] = (namespaces[record.namespace] ?? 0) + 1;
    }
    return { entries: this.records.size, namespaces };
  }
}

function key(namespace: string, contentHash: string): string {
  return `${namespace}\u0000${contentHash}`;
}

// ============================================================================
// SQLite Backend
// ============================================================================

interface CacheRow {
  namespace: string;
  content_hash: string;
  payload: string;
  cost_usd: number;
  access_count: number;
  created_at: number;
  last_accessed_at: number;
  owner_id: string | null;
  signature: string | null;
}

const CREATE_CACHE_TABLE = [
  `CREATE TABLE IF NOT EXISTS content_cache (
    namespace TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    payload TEXT NOT NULL,
    cost_usd REAL NOT NULL DEFAULT 0,
    access_count INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    last_accessed_at INTEGER NOT NULL,
    owner_id TEXT,
    signature TEXT,
    PRIMARY KEY (namespace, content_hash)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_content_cache_recent ON content_cache(namespace, created_at)`
];

/**
 * better-sqlite3 backed cache. Payloads are stored as JSON text; a row
 * whose JSON no longer parses is returned with an undefined payload so
 * the cache's decoder treats it as inconsistent.
 */
export class SqliteCacheBackend implements CacheBackend {
  private readonly stmtGet: Database.Statement<[string, string], CacheRow>;
  private readonly stmtInsert: Database.Statement<[string, string, string, number, number, number, number, string | null, string | null]>;
  private readonly stmtTouch: Database.Statement<[number, string, string]>;
  private readonly stmtDelete: Database.Statement<[string, string]>;
  private readonly stmtRecent: Database.Statement<[string, number], CacheRow>;
  private readonly stmtPrune: Database.Statement<[number, number]>;
  private readonly stmtStats: Database.Statement<[], { namespace: string; entries: number }>;

  constructor(private readonly db: Database.Database) {
    for (const sql of CREATE_CACHE_TABLE) {
      this.db.exec(sql);
    }

    this.stmtGet = this.db.prepare<[string, string], CacheRow>(
      'SELECT * FROM content_cache WHERE namespace = ? AND content_hash = ?'
    );
    this.stmtInsert = this.db.prepare<[string, string, string, number, number, number, number, string | null, string | null]>(`
      INSERT INTO content_cache
        (namespace, content_hash, payload, cost_usd, access_count, created_at, last_accessed_at, owner_id, signature)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (namespace, content_hash) DO NOTHING
    `);
    this.stmtTouch = this.db.prepare<[number, string, string]>(
      'UPDATE content_cache SET access_count = access_count + 1, last_accessed_at = ? WHERE namespace = ? AND content_hash = ?'
    );
    this.stmtDelete = this.db.prepare<[string, string]>(
      'DELETE FROM content_cache WHERE namespace = ? AND content_hash = ?'
    );
    this.stmtRecent = this.db.prepare<[string, number], CacheRow>(
      'SELECT * FROM content_cache WHERE namespace = ? AND signature IS NOT NULL ORDER BY created_at DESC LIMIT ?'
    );
    this.stmtPrune = this.db.prepare<[number, number]>(
      'DELETE FROM content_cache WHERE created_at < ? AND access_count <= ?'
    );
    this.stmtStats = this.db.prepare<[], { namespace: string; entries: number }>(
      'SELECT namespace, COUNT(*) AS entries FROM content_cache GROUP BY namespace'
    );
  }

  get(namespace: string, contentHash: string): CacheRecord | null {
    const row = this.stmtGet.get(namespace, contentHash);
    return row ? fromRow(row) : null;
  }

  insertIfAbsent(record: CacheRecord): InsertOutcome {
    const result = ErrorHandler.handle(
      () => this.stmtInsert.run(
        record.namespace,
        record.contentHash,
        JSON.stringify(record.payload),
        record.costUsd,
        record.accessCount,
        record.createdAt,
        record.lastAccessedAt,
        record.ownerId,
        record.signature ? JSON.stringify(record.signature) : null
      ),
      (error) => ErrorHandler.createStorageError(
        'Failed to write cache entry',
        String(error),
        { namespace: record.namespace }
      )
    );

    if (result.changes > 0) {
      return { record: { ...record }, created: true };
    }
    const existing = this.get(record.namespace, record.contentHash);
    return { record: existing ?? { ...record }, created: false };
  }

  touch(namespace: string, contentHash: string, at: number): void {
    this.stmtTouch.run(at, namespace, contentHash);
  }

  delete(namespace: string, contentHash: string): void {
    this.stmtDelete.run(namespace, contentHash);
  }

  recent(namespace: string, limit: number): CacheRecord[] {
    return this.stmtRecent.all(namespace, limit).map(fromRow);
  }

  prune(createdBefore: number, maxAccessCount: number): number {
    return this.stmtPrune.run(createdBefore, maxAccessCount).changes;
  }

  stats(): CacheStats {
    const namespaces: Record<string, number> = {};
    let entries = 0;
    for (const row of this.stmtStats.all()) {
      namespaces[row.namespace] = row.entries;
      entries += row.entries;
    }
    return { entries, namespaces };
  }
}

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseSignature(text: string | null): TermSignature | null {
  const value = parseJson(text);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  const signature: TermSignature = {};
  for (const [term, weight] of Object.entries(value)) {
    if (typeof weight === 'number') {
      signature[term] = weight;
    }
  }
  return signature;
}

function fromRow(row: CacheRow): CacheRecord {
  return {
    namespace: row.namespace,
    contentHash: row.content_hash,
    payload: parseJson(row.payload),
    costUsd: row.cost_usd,
    accessCount: row.access_count,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
    ownerId: row.owner_id,
    signature: parseSignature(row.signature)
  };
}
