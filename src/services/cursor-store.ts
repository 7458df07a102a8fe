import type { AppDb } from "../db"
import { CursorReadError, LockUnavailableError, StateWriteError, errorMessage } from "../errors"
import type { Cursor } from "../types"

/**
 * Where a cycle starts reading the query log. `full-history` and `lookback`
 * only occur before the first successful cycle has written a cursor.
 */
export type StartPoint =
  | { mode: "resume"; since: number }
  | { mode: "lookback"; since: number }
  | { mode: "full-history"; since: null }

export interface CursorStoreOptions {
  /** Window to read on first run, in milliseconds; null reads everything the source has. */
  lookbackMs: number | null
  now?: () => number
}

export class CursorStore {
  private readonly lookbackMs: number | null
  private readonly now: () => number

  constructor(
    private readonly db: AppDb,
    options: CursorStoreOptions,
  ) {
    this.lookbackMs = options.lookbackMs
    this.now = options.now ?? Date.now
  }

  read(): Cursor | null {
    let row
    try {
      row = this.db.readCursor()
    } catch (error) {
      throw new CursorReadError(`Failed to read cursor: ${errorMessage(error)}`, { cause: error })
    }

    if (!row) {
      return null
    }

    return {
      lastProcessedTimestamp: row.last_processed_timestamp,
      version: row.version,
    }
  }

  startPoint(cursor: Cursor | null): StartPoint {
    if (cursor) {
      return { mode: "resume", since: cursor.lastProcessedTimestamp }
    }

    if (this.lookbackMs !== null) {
      return { mode: "lookback", since: (this.now() - this.lookbackMs) / 1000 }
    }

    return { mode: "full-history", since: null }
  }

  /**
   * Advances the cursor to `timestamp` (never backwards). `expected` is the
   * cursor this cycle loaded; a concurrent writer makes the swap fail.
   */
  write(timestamp: number, expected: Cursor | null): Cursor {
    const expectedVersion = expected?.version ?? 0

    let row
    try {
      row = this.db.compareAndSwapCursor(timestamp, expectedVersion, this.now())
    } catch (error) {
      throw new StateWriteError(`Failed to persist cursor: ${errorMessage(error)}`, { cause: error })
    }

    if (!row) {
      throw new StateWriteError(
        `Cursor changed since it was loaded (expected version ${expectedVersion})`,
      )
    }

    return {
      lastProcessedTimestamp: row.last_processed_timestamp,
      version: row.version,
    }
  }

  acquireLock(owner: string, ttlMs: number): void {
    let attempt
    try {
      attempt = this.db.acquireLock(owner, ttlMs, this.now())
    } catch (error) {
      throw new StateWriteError(`Failed to acquire cycle lock: ${errorMessage(error)}`, { cause: error })
    }

    if (!attempt.acquired) {
      throw new LockUnavailableError(attempt.holder, attempt.expiresAt)
    }
  }

  releaseLock(owner: string): boolean {
    try {
      return this.db.releaseLock(owner)
    } catch (error) {
      throw new StateWriteError(`Failed to release cycle lock: ${errorMessage(error)}`, { cause: error })
    }
  }
}
