import type pino from "pino"
import { ClassificationError, errorMessage } from "../errors"
import { type RetryPolicy, sleep, withTimeout } from "../lib/retry"
import { CATEGORIES, type Category, type QueryRecord, type Verdict, type VerdictSource } from "../types"
import type { ClassificationBackend, ClassificationRequest, RawVerdict } from "./classifier"

export interface ClassificationBatchResult {
  /** In the order the domains were given. */
  verdicts: Verdict[]
  failures: ClassificationError[]
}

export interface ClassificationAdapterOptions {
  batchSize: number
  timeoutMs: number
  retryPolicy: RetryPolicy
  /** Chunks in flight at once. */
  concurrency: number
  /** Oracle calls are started no faster than this. */
  requestsPerSecond: number
  logger: pino.Logger
}

interface ClassificationAdapterDependencies {
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

const CATEGORY_ALIASES: Record<string, Category> = {
  illegal: "IllegalContent",
  adult: "AdultContent",
}

export function normalizeCategory(raw: string): Category | null {
  const key = raw.trim().toLowerCase().replace(/[\s_-]+/g, "")
  const match = CATEGORIES.find((category) => category.toLowerCase() === key)
  return match ?? CATEGORY_ALIASES[key] ?? null
}

export function normalizeVerdict(domain: string, raw: RawVerdict, source: VerdictSource): Verdict {
  const reason = raw.reason.trim() || "no reason given"
  const category = normalizeCategory(raw.category)
  const verdict: Verdict = category
    ? { domain, category, reason, source }
    : { domain, category: "Suspicious", reason: `unrecognized category: ${raw.category} | ${reason}`, source }

  if (
    typeof raw.confidence === "number"
    && Number.isFinite(raw.confidence)
    && raw.confidence >= 0
    && raw.confidence <= 1
  ) {
    verdict.confidence = raw.confidence
  }

  return verdict
}

export class ClassificationAdapter {
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly chunkSize: number
  private readonly minIntervalMs: number
  private nextAvailableAt = 0

  constructor(
    private readonly backend: ClassificationBackend,
    private readonly options: ClassificationAdapterOptions,
    dependencies: ClassificationAdapterDependencies = {},
  ) {
    this.sleep = dependencies.sleep ?? sleep
    this.now = dependencies.now ?? Date.now
    this.chunkSize = Math.max(1, Math.min(options.batchSize, backend.maxBatchSize))
    this.minIntervalMs = 1000 / Math.max(1, options.requestsPerSecond)
  }

  get source(): VerdictSource {
    return this.backend.source
  }

  async classify(domain: string, records: readonly QueryRecord[]): Promise<Verdict> {
    const result = await this.classifyGroups([{ domain, records }])
    const failure = result.failures[0]
    if (failure) {
      throw failure
    }

    const verdict = result.verdicts[0]
    if (!verdict) {
      throw new ClassificationError(domain, this.source, "No verdict produced")
    }

    return verdict
  }

  async classifyGroups(groups: readonly ClassificationRequest[]): Promise<ClassificationBatchResult> {
    const outcomes = new Map<string, Verdict | ClassificationError>()
    const valid = groups.filter((group) => group.domain.trim().length > 0)

    const chunks: ClassificationRequest[][] = []
    for (let index = 0; index < valid.length; index += this.chunkSize) {
      chunks.push(valid.slice(index, index + this.chunkSize))
    }

    const queue = [...chunks]
    const workerCount = Math.min(Math.max(1, this.options.concurrency), queue.length)
    const workers = Array.from({ length: workerCount }, async () => {
      for (let chunk = queue.shift(); chunk; chunk = queue.shift()) {
        await this.classifyChunk(chunk, outcomes)
      }
    })
    await Promise.all(workers)

    const result: ClassificationBatchResult = { verdicts: [], failures: [] }
    for (const group of groups) {
      const outcome = outcomes.get(group.domain)
      if (!outcome) {
        result.failures.push(new ClassificationError(group.domain, this.source, "Domain is empty"))
      } else if (outcome instanceof ClassificationError) {
        result.failures.push(outcome)
      } else {
        result.verdicts.push(outcome)
      }
    }

    return result
  }

  // Slots are reserved before sleeping, so concurrent workers queue up behind each other.
  private async waitForSlot(): Promise<void> {
    const now = this.now()
    const startAt = Math.max(this.nextAvailableAt, now)
    this.nextAvailableAt = startAt + this.minIntervalMs
    if (startAt > now) {
      await this.sleep(startAt - now)
    }
  }

  private async classifyChunk(
    chunk: readonly ClassificationRequest[],
    outcomes: Map<string, Verdict | ClassificationError>,
  ): Promise<void> {
    const { retryPolicy, timeoutMs, logger } = this.options
    let pending = [...chunk]
    let lastError: unknown = null
    let attempt = 0

    while (pending.length > 0 && attempt < retryPolicy.maxAttempts) {
      attempt += 1
      if (attempt > 1) {
        await this.sleep(retryPolicy.delayMs(attempt - 1))
      }

      const batch = pending
      try {
        await this.waitForSlot()
        const raw = await withTimeout(`${this.source} classification`, timeoutMs, (signal) =>
          this.backend.classifyBatch(batch, signal),
        )

        pending = []
        for (const request of batch) {
          const verdict = raw.get(request.domain)
          if (verdict) {
            outcomes.set(request.domain, normalizeVerdict(request.domain, verdict, this.source))
          } else {
            pending.push(request)
          }
        }

        if (pending.length > 0) {
          lastError = new Error(`${this.source} returned no verdict for ${pending.length} domain(s)`)
          logger.warn(
            { source: this.source, attempt, missing: pending.map((request) => request.domain) },
            "classification response incomplete",
          )
        }
      } catch (error) {
        lastError = error
        logger.warn(
          {
            source: this.source,
            attempt,
            maxAttempts: retryPolicy.maxAttempts,
            domains: batch.length,
            error: errorMessage(error),
          },
          "classification attempt failed",
        )
      }
    }

    for (const request of pending) {
      outcomes.set(
        request.domain,
        new ClassificationError(
          request.domain,
          this.source,
          `Classification failed after ${attempt} attempt(s): ${errorMessage(lastError)}`,
          { cause: lastError },
        ),
      )
    }
  }
}
