export const CATEGORIES = [
  "Malicious",
  "AdultContent",
  "Gambling",
  "Dating",
  "IllegalContent",
  "Suspicious",
  "Benign",
] as const

export type Category = (typeof CATEGORIES)[number]

export const VERDICT_SOURCES = ["AI", "ThreatIntel"] as const

export type VerdictSource = (typeof VERDICT_SOURCES)[number]

export const DEFAULT_ALERT_CATEGORIES: readonly Category[] = [
  "Malicious",
  "AdultContent",
  "Gambling",
  "Dating",
  "IllegalContent",
]

export interface QueryRecord {
  readonly timestamp: number
  readonly clientIdentifier: string
  readonly domain: string
  readonly rawMetadata: Readonly<Record<string, unknown>>
}

export interface UniqueDomainGroup {
  domain: string
  records: QueryRecord[]
}

export interface Verdict {
  domain: string
  category: Category
  reason: string
  source: VerdictSource
  confidence?: number
}

export interface FindingDraft {
  timestamp: number
  clientIdentifier: string
  domain: string
  category: Category
  reason: string
  source: VerdictSource
  createdAt: number
}

export interface Finding extends FindingDraft {
  id: number
}

export type PersistResult =
  | { status: "created"; finding: Finding }
  | { status: "exists"; finding: Finding }

export interface Cursor {
  lastProcessedTimestamp: number
  version: number
}

export interface AlertGroup {
  category: Category
  findings: Finding[]
}

export interface AlertBatch {
  findings: Finding[]
  triggeredCategories: Set<Category>
  groups: AlertGroup[]
}
