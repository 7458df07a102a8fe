import type { QueryRecord, VerdictSource } from "../types"

export interface ClassificationRequest {
  domain: string
  records: readonly QueryRecord[]
}

/** Backend output before normalization; `category` may be anything. */
export interface RawVerdict {
  category: string
  reason: string
  confidence?: number
}

/**
 * A classification oracle. Domains missing from the returned map failed for
 * this call; a thrown error fails every domain in the batch.
 */
export interface ClassificationBackend {
  readonly source: VerdictSource
  readonly maxBatchSize: number
  classifyBatch(
    requests: readonly ClassificationRequest[],
    signal: AbortSignal,
  ): Promise<Map<string, RawVerdict>>
}
