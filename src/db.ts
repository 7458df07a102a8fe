import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import Database from "better-sqlite3"
import type { Category, FindingDraft, VerdictSource } from "./types"

export interface FindingRow {
  id: number
  timestamp: number
  client_identifier: string
  domain: string
  category: Category
  reason: string
  source: VerdictSource
  created_at: number
}

export interface CursorRow {
  last_processed_timestamp: number
  version: number
  updated_at: number
}

interface LockRow {
  owner: string
  acquired_at: number
  expires_at: number
}

export interface FindingFilter {
  domain?: string
  category?: Category
  source?: VerdictSource
  clientIdentifier?: string
  /** Inclusive lower bound on the query timestamp. */
  since?: number
  /** Inclusive upper bound on the query timestamp. */
  until?: number
  limit?: number
}

export type LockAttempt =
  | { acquired: true; expiresAt: number }
  | { acquired: false; holder: string; expiresAt: number }

export interface AppDbOptions {
  busyTimeoutMs?: number
}

const FINDING_COLUMNS = `
  id, timestamp, client_identifier, domain, category, reason, source, created_at
`

export class AppDb {
  private readonly db: Database.Database

  constructor(path: string, options: AppDbOptions = {}) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true })
    }
    this.db = new Database(path, { timeout: options.busyTimeoutMs ?? 5000 })
    this.db.pragma("journal_mode = WAL")
    this.migrate()
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS findings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp REAL NOT NULL,
        client_identifier TEXT NOT NULL,
        domain TEXT NOT NULL,
        category TEXT NOT NULL,
        reason TEXT NOT NULL,
        source TEXT NOT NULL CHECK (source IN ('AI', 'ThreatIntel')),
        created_at INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_findings_identity
        ON findings(domain, timestamp, category, source);
      CREATE INDEX IF NOT EXISTS idx_findings_timestamp ON findings(timestamp);
      CREATE INDEX IF NOT EXISTS idx_findings_created_at ON findings(created_at);

      CREATE TABLE IF NOT EXISTS cursor_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        last_processed_timestamp REAL NOT NULL,
        version INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS cycle_lock (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        owner TEXT NOT NULL,
        acquired_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );
    `)
  }

  /**
   * Inserts the finding unless one with the same (domain, timestamp, category,
   * source) exists, and returns the stored row either way.
   */
  insertFindingIfAbsent(draft: FindingDraft): { created: boolean; row: FindingRow } {
    const insert = this.db.prepare<[number, string, string, Category, string, VerdictSource, number]>(
      `
        INSERT INTO findings (
          timestamp, client_identifier, domain, category, reason, source, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (domain, timestamp, category, source) DO NOTHING
      `,
    )
    const select = this.db.prepare<[string, number, Category, VerdictSource], FindingRow>(
      `
        SELECT ${FINDING_COLUMNS}
        FROM findings
        WHERE domain = ? AND timestamp = ? AND category = ? AND source = ?
      `,
    )

    const run = this.db.transaction((input: FindingDraft) => {
      const result = insert.run(
        input.timestamp,
        input.clientIdentifier,
        input.domain,
        input.category,
        input.reason,
        input.source,
        input.createdAt,
      )
      const row = select.get(input.domain, input.timestamp, input.category, input.source)
      if (!row) {
        throw new Error(`Finding for ${input.domain}@${input.timestamp} missing after insert`)
      }

      return { created: result.changes > 0, row }
    })

    return run(draft)
  }

  /**
   * Inserts every draft in one transaction; any failure rolls back the whole
   * batch. Results are in draft order.
   */
  insertFindingsIfAbsent(drafts: readonly FindingDraft[]): Array<{ created: boolean; row: FindingRow }> {
    const run = this.db.transaction((batch: readonly FindingDraft[]) =>
      batch.map((draft) => this.insertFindingIfAbsent(draft)),
    )

    return run(drafts)
  }

  /**
   * Lazily iterates findings ordered by query timestamp. The connection stays
   * busy until the iterator is exhausted or returned.
   */
  *iterateFindings(filter: FindingFilter = {}): Generator<FindingRow> {
    const clauses: string[] = []
    const params: Array<string | number> = []

    if (filter.domain !== undefined) {
      clauses.push("domain = ?")
      params.push(filter.domain)
    }
    if (filter.category !== undefined) {
      clauses.push("category = ?")
      params.push(filter.category)
    }
    if (filter.source !== undefined) {
      clauses.push("source = ?")
      params.push(filter.source)
    }
    if (filter.clientIdentifier !== undefined) {
      clauses.push("client_identifier = ?")
      params.push(filter.clientIdentifier)
    }
    if (filter.since !== undefined) {
      clauses.push("timestamp >= ?")
      params.push(filter.since)
    }
    if (filter.until !== undefined) {
      clauses.push("timestamp <= ?")
      params.push(filter.until)
    }

    let sql = `SELECT ${FINDING_COLUMNS} FROM findings`
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(" AND ")}`
    }
    sql += " ORDER BY timestamp ASC, id ASC"
    if (filter.limit !== undefined) {
      sql += " LIMIT ?"
      params.push(filter.limit)
    }

    yield* this.db.prepare<Array<string | number>, FindingRow>(sql).iterate(...params)
  }

  purgeFindingsCreatedBefore(cutoffMs: number): number {
    return this.db.prepare<[number]>(`DELETE FROM findings WHERE created_at <= ?`).run(cutoffMs).changes
  }

  readCursor(): CursorRow | null {
    const row = this.db
      .prepare<[], CursorRow>(
        `SELECT last_processed_timestamp, version, updated_at FROM cursor_state WHERE id = 1`,
      )
      .get()

    return row ?? null
  }

  /**
   * Writes max(current, timestamp) if the stored version still equals
   * `expectedVersion` (0 when no cursor exists). Returns null on a version
   * mismatch.
   */
  compareAndSwapCursor(timestamp: number, expectedVersion: number, now: number): CursorRow | null {
    const swap = this.db.transaction((): CursorRow | null => {
      const current = this.readCursor()
      const currentVersion = current?.version ?? 0
      if (currentVersion !== expectedVersion) {
        return null
      }

      const next: CursorRow = {
        last_processed_timestamp: current
          ? Math.max(current.last_processed_timestamp, timestamp)
          : timestamp,
        version: currentVersion + 1,
        updated_at: now,
      }

      this.db
        .prepare<[number, number, number]>(
          `
            INSERT INTO cursor_state (id, last_processed_timestamp, version, updated_at)
            VALUES (1, ?, ?, ?)
            ON CONFLICT (id) DO UPDATE SET
              last_processed_timestamp = excluded.last_processed_timestamp,
              version = excluded.version,
              updated_at = excluded.updated_at
          `,
        )
        .run(next.last_processed_timestamp, next.version, next.updated_at)

      return next
    })

    return swap.immediate()
  }

  acquireLock(owner: string, ttlMs: number, now: number): LockAttempt {
    const acquire = this.db.transaction((): LockAttempt => {
      const current = this.db
        .prepare<[], LockRow>(`SELECT owner, acquired_at, expires_at FROM cycle_lock WHERE id = 1`)
        .get()

      if (current && current.owner !== owner && current.expires_at > now) {
        return { acquired: false, holder: current.owner, expiresAt: current.expires_at }
      }

      const expiresAt = now + ttlMs
      this.db
        .prepare<[string, number, number]>(
          `
            INSERT INTO cycle_lock (id, owner, acquired_at, expires_at)
            VALUES (1, ?, ?, ?)
            ON CONFLICT (id) DO UPDATE SET
              owner = excluded.owner,
              acquired_at = excluded.acquired_at,
              expires_at = excluded.expires_at
          `,
        )
        .run(owner, now, expiresAt)

      return { acquired: true, expiresAt }
    })

    return acquire.immediate()
  }

  releaseLock(owner: string): boolean {
    return this.db.prepare<[string]>(`DELETE FROM cycle_lock WHERE id = 1 AND owner = ?`).run(owner).changes > 0
  }

  close(): void {
    this.db.close()
  }
}
