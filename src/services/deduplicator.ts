import type pino from "pino"
import { canonicalizeDomain, matchIgnoreRule } from "../lib/domain"
import type { QueryRecord, UniqueDomainGroup } from "../types"

export interface DeduplicationResult {
  /** Canonical domain -> originating records, in first-seen order. */
  groups: Map<string, QueryRecord[]>
  dropped: QueryRecord[]
  ignored: QueryRecord[]
}

export interface DeduplicateOptions {
  ignoreDomains?: readonly string[]
  logger?: pino.Logger
}

export function groupByDomain(
  records: readonly QueryRecord[],
  options: DeduplicateOptions = {},
): DeduplicationResult {
  const ignoreDomains = options.ignoreDomains ?? []
  const groups = new Map<string, QueryRecord[]>()
  const dropped: QueryRecord[] = []
  const ignored: QueryRecord[] = []
  const ignoreCache = new Map<string, boolean>()

  for (const record of records) {
    const domain = canonicalizeDomain(record.domain)
    if (domain === null) {
      dropped.push(record)
      options.logger?.warn(
        { domain: record.domain, timestamp: record.timestamp, client: record.clientIdentifier },
        "dropping query with malformed domain",
      )
      continue
    }

    let isIgnored = ignoreCache.get(domain)
    if (isIgnored === undefined) {
      isIgnored = matchIgnoreRule(domain, ignoreDomains) !== null
      ignoreCache.set(domain, isIgnored)
    }
    if (isIgnored) {
      ignored.push(record)
      continue
    }

    const existing = groups.get(domain)
    const canonical = domain === record.domain ? record : Object.freeze({ ...record, domain })
    if (existing) {
      existing.push(canonical)
    } else {
      groups.set(domain, [canonical])
    }
  }

  if (ignored.length > 0) {
    options.logger?.info({ count: ignored.length }, "skipped queries for ignored domains")
  }

  return { groups, dropped, ignored }
}

export function toDomainGroups(groups: ReadonlyMap<string, QueryRecord[]>): UniqueDomainGroup[] {
  return [...groups].map(([domain, records]) => ({ domain, records }))
}
