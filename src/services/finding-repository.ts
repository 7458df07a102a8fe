import type { AppDb, FindingFilter, FindingRow } from "../db"
import { PersistenceError, errorMessage } from "../errors"
import type {
  Finding,
  FindingDraft,
  PersistResult,
  QueryRecord,
  Verdict,
} from "../types"

export interface PersistSummary {
  created: Finding[]
  existing: Finding[]
}

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * One draft per originating record. Benign verdicts produce nothing.
 */
export function attributeVerdict(
  verdict: Verdict,
  records: readonly QueryRecord[],
  createdAt: number,
): FindingDraft[] {
  if (verdict.category === "Benign") {
    return []
  }

  return records.map((record) => ({
    timestamp: record.timestamp,
    clientIdentifier: record.clientIdentifier,
    domain: verdict.domain,
    category: verdict.category,
    reason: verdict.reason,
    source: verdict.source,
    createdAt,
  }))
}

function toFinding(row: FindingRow): Finding {
  return {
    id: row.id,
    timestamp: row.timestamp,
    clientIdentifier: row.client_identifier,
    domain: row.domain,
    category: row.category,
    reason: row.reason,
    source: row.source,
    createdAt: row.created_at,
  }
}

export class FindingRepository {
  constructor(private readonly db: AppDb) {}

  persist(draft: FindingDraft): PersistResult {
    try {
      const { created, row } = this.db.insertFindingIfAbsent(draft)
      return created
        ? { status: "created", finding: toFinding(row) }
        : { status: "exists", finding: toFinding(row) }
    } catch (error) {
      throw new PersistenceError(
        `Failed to persist finding for ${draft.domain}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  /**
   * Persists the findings of every verdict atomically: a failure leaves none
   * of them behind, so a re-run creates (and alerts on) all of them.
   */
  persistVerdicts(
    verdicts: readonly Verdict[],
    recordsByDomain: ReadonlyMap<string, readonly QueryRecord[]>,
    createdAt: number,
  ): PersistSummary {
    const drafts = verdicts.flatMap((verdict) =>
      attributeVerdict(verdict, recordsByDomain.get(verdict.domain) ?? [], createdAt),
    )

    let results
    try {
      results = this.db.insertFindingsIfAbsent(drafts)
    } catch (error) {
      throw new PersistenceError(
        `Failed to persist ${drafts.length} finding(s): ${errorMessage(error)}`,
        { cause: error },
      )
    }

    const summary: PersistSummary = { created: [], existing: [] }
    for (const { created, row } of results) {
      if (created) {
        summary.created.push(toFinding(row))
      } else {
        summary.existing.push(toFinding(row))
      }
    }

    return summary
  }

  /**
   * Findings ordered by query timestamp. Each call starts a fresh read.
   */
  *query(filter: FindingFilter = {}): Generator<Finding> {
    try {
      for (const row of this.db.iterateFindings(filter)) {
        yield toFinding(row)
      }
    } catch (error) {
      throw new PersistenceError(`Failed to query findings: ${errorMessage(error)}`, { cause: error })
    }
  }

  purgeOlderThan(retentionDays: number, now: number = Date.now()): number {
    if (retentionDays <= 0) {
      return 0
    }

    try {
      return this.db.purgeFindingsCreatedBefore(now - retentionDays * DAY_MS)
    } catch (error) {
      throw new PersistenceError(`Failed to purge findings: ${errorMessage(error)}`, { cause: error })
    }
  }
}
