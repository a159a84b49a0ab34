/**
 * Budget Stores
 *
 * Persistence for daily budget entries, keyed by (principal, UTC date).
 * The ledger serializes access per principal; stores only read and write.
 */

import Database from 'better-sqlite3';
import { ErrorHandler } from '../../shared/errors/handler';

export interface BudgetEntry {
  principalId: string;
  /** UTC calendar date, YYYY-MM-DD */
  date: string;
  committedCostUsd: number;
  reservedCostUsd: number;
  requestCount: number;
}

export interface BudgetStore {
  get(principalId: string, date: string): Promise<BudgetEntry | null>;
  put(entry: BudgetEntry): Promise<void>;
}

// ============================================================================
// In-Memory Store
// ============================================================================

export class MemoryBudgetStore implements BudgetStore {
  private readonly entries = new Map<string, BudgetEntry>();

  async get(principalId: string, date: string): Promise<BudgetEntry | null> {
    const entry = this.entries.get(`${principalId}|${date}`);
    return entry ? { ...entry } : null;
  }

  async put(entry: BudgetEntry): Promise<void> {
    this.entries.set(`${entry.principalId}|${entry.date}`, { ...entry });
  }

  clear(): void {
    this.entries.clear();
  }
}

// ============================================================================
// SQLite Store
// ============================================================================

interface BudgetRow {
  principal_id: string;
  date: string;
  committed_cost_usd: number;
  reserved_cost_usd: number;
  request_count: number;
}

const CREATE_BUDGET_TABLE = `
  CREATE TABLE IF NOT EXISTS budget_entries (
    principal_id TEXT NOT NULL,
    date TEXT NOT NULL,
    committed_cost_usd REAL NOT NULL DEFAULT 0,
    reserved_cost_usd REAL NOT NULL DEFAULT 0,
    request_count INTEGER NOT NULL DEFAULT 0,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (principal_id, date)
  )
`;

/**
 * better-sqlite3 backed store; shares a connection with the other adapters
 */
export class SqliteBudgetStore implements BudgetStore {
  private readonly stmtGet: Database.Statement<[string, string], BudgetRow>;
  private readonly stmtPut: Database.Statement<[string, string, number, number, number]>;
  private readonly stmtReleaseReserved: Database.Statement<[]>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(CREATE_BUDGET_TABLE);

    this.stmtGet = this.db.prepare<[string, string], BudgetRow>(
      'SELECT * FROM budget_entries WHERE principal_id = ? AND date = ?'
    );
    this.stmtPut = this.db.prepare<[string, string, number, number, number]>(`
      INSERT INTO budget_entries (principal_id, date, committed_cost_usd, reserved_cost_usd, request_count)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (principal_id, date) DO UPDATE SET
        committed_cost_usd = excluded.committed_cost_usd,
        reserved_cost_usd = excluded.reserved_cost_usd,
        request_count = excluded.request_count,
        updated_at = CURRENT_TIMESTAMP
    `);
    this.stmtReleaseReserved = this.db.prepare<[]>(`
      UPDATE budget_entries
      SET reserved_cost_usd = 0, updated_at = CURRENT_TIMESTAMP
      WHERE reserved_cost_usd > 0
    `);
  }

  /**
   * Zero the reserved totals written by an earlier process. Open
   * reservations exist only in that process's ledger, so after a restart
   * nothing can reconcile them. Call once at startup, before any admission;
   * assumes one process per database file.
   * @returns number of entries that still held reservations
   */
  releaseOrphanedReservations(): number {
    const info = ErrorHandler.handle(
      () => this.stmtReleaseReserved.run(),
      (error) => ErrorHandler.createStorageError('Failed to release orphaned reservations', String(error))
    );
    return info.changes;
  }

  async get(principalId: string, date: string): Promise<BudgetEntry | null> {
    const row = ErrorHandler.handle(
      () => this.stmtGet.get(principalId, date),
      (error) => ErrorHandler.createStorageError('Failed to read budget entry', String(error), { principalId, date })
    );
    if (!row) return null;
    return {
      principalId: row.principal_id,
      date: row.date,
      committedCostUsd: row.committed_cost_usd,
      reservedCostUsd: row.reserved_cost_usd,
      requestCount: row.request_count
    };
  }

  async put(entry: BudgetEntry): Promise<void> {
    ErrorHandler.handle(
      () => this.stmtPut.run(
        entry.principalId,
        entry.date,
        entry.committedCostUsd,
        entry.reservedCostUsd,
        entry.requestCount
      ),
      (error) => ErrorHandler.createStorageError(
        'Failed to write budget entry',
        String(error),
        { principalId: entry.principalId, date: entry.date }
      )
    );
  }
}
