import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { AppDb, type FindingRow } from "../src/db"
import { CursorReadError, NotificationError, SourceUnavailableError, StateWriteError } from "../src/errors"
import { ClassificationAdapter } from "../src/services/classification-adapter"
import type { ClassificationBackend, ClassificationRequest, RawVerdict } from "../src/services/classifier"
import { CursorStore } from "../src/services/cursor-store"
import { FindingRepository } from "../src/services/finding-repository"
import type { NotificationSink } from "../src/services/notifier"
import { AnalysisPipeline } from "../src/services/pipeline"
import type { QueryLogSource } from "../src/services/query-source"
import {
  type AlertBatch,
  type Cursor,
  DEFAULT_ALERT_CATEGORIES,
  type FindingDraft,
  type QueryRecord,
} from "../src/types"
import { cleanupDb, createDbPath, record, silentLoggers } from "./helpers"

class FakeSource implements QueryLogSource {
  readonly name = "fake"
  readonly calls: Array<number | null> = []
  failure: Error | null = null

  constructor(public records: QueryRecord[]) {}

  async fetch(since: number | null): Promise<QueryRecord[]> {
    this.calls.push(since)
    if (this.failure) {
      throw this.failure
    }
    return this.records.filter((item) => since === null || item.timestamp >= since)
  }
}

class FakeBackend implements ClassificationBackend {
  readonly source = "AI" as const
  readonly maxBatchSize = 50
  readonly seen: string[] = []

  constructor(private readonly verdicts: Record<string, RawVerdict>) {}

  async classifyBatch(requests: readonly ClassificationRequest[]): Promise<Map<string, RawVerdict>> {
    const result = new Map<string, RawVerdict>()
    for (const request of requests) {
      this.seen.push(request.domain)
      const verdict = this.verdicts[request.domain]
      if (verdict) {
        result.set(request.domain, verdict)
      }
    }
    return result
  }
}

class RecordingNotifier implements NotificationSink {
  readonly name = "recording"
  readonly batches: AlertBatch[] = []
  fail = false

  async send(batch: AlertBatch): Promise<void> {
    if (this.fail) {
      throw new NotificationError("Failed to send alert email: connection refused")
    }
    this.batches.push(batch)
  }
}

class FlakyDb extends AppDb {
  /** 1-based insert call that throws; 0 never throws. */
  failingInsertAt = 0
  private inserts = 0

  override insertFindingIfAbsent(draft: FindingDraft): { created: boolean; row: FindingRow } {
    this.inserts += 1
    if (this.inserts === this.failingInsertAt) {
      throw new Error("disk I/O error")
    }
    return super.insertFindingIfAbsent(draft)
  }
}

class FlakyCursorStore extends CursorStore {
  failingWrites = 0
  failingReads = 0

  override read(): Cursor | null {
    if (this.failingReads > 0) {
      this.failingReads -= 1
      throw new CursorReadError("Failed to read cursor: disk I/O error")
    }
    return super.read()
  }

  override write(timestamp: number, expected: Cursor | null): Cursor {
    if (this.failingWrites > 0) {
      this.failingWrites -= 1
      throw new StateWriteError("Failed to persist cursor: disk I/O error")
    }
    return super.write(timestamp, expected)
  }
}

const VERDICTS: Record<string, RawVerdict> = {
  "example.org": { category: "Benign", reason: "well-known site" },
  "bad-example.com": { category: "Malicious", reason: "phishing kit" },
}

function queryLog(): QueryRecord[] {
  return [
    record(100, "10.0.0.5", "bad-example.com"),
    record(101, "10.0.0.6", "bad-example.com"),
    record(102, "10.0.0.5", "example.org"),
  ]
}

describe("analysis pipeline", () => {
  let handle: { db: FlakyDb; path: string }
  let source: FakeSource
  let backend: FakeBackend
  let notifier: RecordingNotifier
  let cursorStore: FlakyCursorStore
  let findings: FindingRepository

  function buildPipeline(owner = "test-worker"): AnalysisPipeline {
    const loggers = silentLoggers()
    const adapter = new ClassificationAdapter(
      backend,
      {
        batchSize: 10,
        timeoutMs: 1_000,
        retryPolicy: { maxAttempts: 1, delayMs: () => 0 },
        concurrency: 1,
        requestsPerSecond: 1_000,
        logger: loggers.app,
      },
      { sleep: async () => {} },
    )

    return new AnalysisPipeline({
      source,
      classifiers: [adapter],
      findings,
      cursorStore,
      notifier,
      loggers,
      alertCategories: DEFAULT_ALERT_CATEGORIES,
      lockTtlMs: 60_000,
      owner,
    })
  }

  beforeEach(() => {
    const path = createDbPath()
    handle = { db: new FlakyDb(path), path }
    source = new FakeSource(queryLog())
    backend = new FakeBackend(VERDICTS)
    notifier = new RecordingNotifier()
    cursorStore = new FlakyCursorStore(handle.db, { lookbackMs: null })
    findings = new FindingRepository(handle.db)
  })

  afterEach(() => {
    cleanupDb(handle.db, handle.path)
  })

  test("classifies new queries, persists findings, alerts and advances the cursor", async () => {
    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("success")
    expect(outcome.stage).toBe("CursorAdvanced")
    expect(outcome.cursorBefore).toBeNull()
    expect(outcome.cursorAfter).toBe(102)
    expect(outcome.counts.domains).toBe(2)
    expect(outcome.counts.created).toBe(2)
    expect(outcome.notification).toBe("sent")
    expect(source.calls).toEqual([null])
    expect(backend.seen).toEqual(["bad-example.com", "example.org"])

    const stored = [...findings.query()]
    expect(stored.map((item) => [item.timestamp, item.clientIdentifier, item.domain, item.category])).toEqual([
      [100, "10.0.0.5", "bad-example.com", "Malicious"],
      [101, "10.0.0.6", "bad-example.com", "Malicious"],
    ])

    expect(notifier.batches.length).toBe(1)
    expect(notifier.batches[0]?.findings.map((item) => item.timestamp)).toEqual([100, 101])
    expect(cursorStore.read()).toEqual({ lastProcessedTimestamp: 102, version: 1 })
  })

  test("leaves the cursor alone when nothing new arrived", async () => {
    await buildPipeline().runCycle()

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("success")
    expect(outcome.stage).toBe("Fetched")
    expect(outcome.counts.selected).toBe(0)
    expect(source.calls).toEqual([null, 102])
    expect(notifier.batches.length).toBe(1)
    expect(cursorStore.read()).toEqual({ lastProcessedTimestamp: 102, version: 1 })
  })

  test("re-running after a failed cursor write creates no duplicates", async () => {
    cursorStore.failingWrites = 1

    const failed = await buildPipeline().runCycle()

    expect(failed.status).toBe("failure")
    expect(failed.stage).toBe("CursorAdvanced")
    expect(failed.errorKind).toBe("StateWriteError")
    expect(failed.operatorAttention).toBe(true)
    expect(cursorStore.read()).toBeNull()
    expect([...findings.query()].length).toBe(2)

    const retried = await buildPipeline().runCycle()

    expect(retried.status).toBe("success")
    expect(retried.counts.created).toBe(0)
    expect(retried.counts.existing).toBe(2)
    expect(retried.notification).toBe("none")
    expect(retried.cursorAfter).toBe(102)
    expect([...findings.query()].length).toBe(2)
    expect(notifier.batches.length).toBe(1)
  })

  test("one unclassifiable domain does not hold back the others", async () => {
    source.records = [
      record(100, "10.0.0.5", "d.example"),
      record(101, "10.0.0.6", "e.example"),
      record(102, "10.0.0.5", "f.example"),
    ]
    backend = new FakeBackend({
      "e.example": { category: "Malicious", reason: "malware host" },
      "f.example": { category: "Gambling", reason: "online casino" },
    })

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("partial")
    expect(outcome.skippedDomains.map((item) => item.domain)).toEqual(["d.example"])
    expect([...findings.query()].map((item) => item.domain)).toEqual(["e.example", "f.example"])
    expect(notifier.batches[0]?.findings.map((item) => item.domain)).toEqual(["e.example", "f.example"])
    expect(outcome.cursorAfter).toBe(102)
  })

  test("a failed persist rolls back every finding and a re-run alerts on all of them", async () => {
    handle.db.failingInsertAt = 2

    const failed = await buildPipeline().runCycle()

    expect(failed.status).toBe("failure")
    expect(failed.stage).toBe("Persisted")
    expect(failed.errorKind).toBe("PersistenceError")
    expect(failed.operatorAttention).toBe(false)
    expect([...findings.query()]).toEqual([])
    expect(notifier.batches).toEqual([])
    expect(cursorStore.read()).toBeNull()

    handle.db.failingInsertAt = 0
    const retried = await buildPipeline().runCycle()

    expect(retried.status).toBe("success")
    expect(retried.counts.created).toBe(2)
    expect(notifier.batches[0]?.findings.map((item) => item.timestamp)).toEqual([100, 101])
    expect(cursorStore.read()?.lastProcessedTimestamp).toBe(102)
  })

  test("an unreadable cursor aborts before any external call", async () => {
    cursorStore.failingReads = 1

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("failure")
    expect(outcome.stage).toBe("CursorLoaded")
    expect(outcome.errorKind).toBe("CursorReadError")
    expect(source.calls).toEqual([])
    expect(backend.seen).toEqual([])
    expect(cursorStore.read()).toBeNull()
  })

  test("a failed alert does not hold back the cursor", async () => {
    notifier.fail = true

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("success")
    expect(outcome.notification).toBe("failed")
    expect(outcome.cursorAfter).toBe(102)
    expect([...findings.query()].length).toBe(2)
  })

  test("an unavailable source leaves state untouched", async () => {
    source.failure = new SourceUnavailableError("Pi-hole unreachable")

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("failure")
    expect(outcome.stage).toBe("Fetched")
    expect(outcome.errorKind).toBe("SourceUnavailable")
    expect(outcome.operatorAttention).toBe(false)
    expect(cursorStore.read()).toBeNull()
    expect([...findings.query()]).toEqual([])
  })

  test("refuses to run while another process holds the cycle lock", async () => {
    cursorStore.acquireLock("other-worker", 60_000)

    const outcome = await buildPipeline().runCycle()

    expect(outcome.status).toBe("failure")
    expect(outcome.stage).toBe("Idle")
    expect(outcome.errorKind).toBe("LockUnavailable")
    expect(source.calls).toEqual([])
    expect(cursorStore.releaseLock("other-worker")).toBe(true)
  })

  test("the cursor only moves forward across cycles", async () => {
    await buildPipeline().runCycle()
    source.records = [...queryLog(), record(150, "clientC", "casino.example")]
    backend = new FakeBackend({ "casino.example": { category: "Gambling", reason: "online casino" } })

    const outcome = await buildPipeline().runCycle()

    expect(outcome.cursorBefore).toBe(102)
    expect(outcome.cursorAfter).toBe(150)
    expect(backend.seen).toEqual(["casino.example"])
    expect(notifier.batches[1]?.groups.map((group) => group.category)).toEqual(["Gambling"])
    expect(cursorStore.read()).toEqual({ lastProcessedTimestamp: 150, version: 2 })
  })
})
