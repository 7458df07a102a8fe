import type { QueryRecord } from "../types"

export interface QueryLogSource {
  readonly name: string
  /**
   * Queries at or after `since` (unix seconds), oldest first; `null` reads
   * everything the source retains. Fails with SourceUnavailableError.
   */
  fetch(since: number | null): Promise<QueryRecord[]>
}
