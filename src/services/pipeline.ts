import { randomUUID } from "node:crypto"
import type pino from "pino"
import {
  type PipelineErrorKind,
  StateWriteError,
  errorKind,
  errorMessage,
} from "../errors"
import type { Loggers } from "../logger"
import type { AlertBatch, Category, Cursor, Finding, QueryRecord, Verdict, VerdictSource } from "../types"
import { evaluateAlerts } from "./alert-evaluator"
import type { ClassificationAdapter } from "./classification-adapter"
import type { CursorStore, StartPoint } from "./cursor-store"
import { groupByDomain, toDomainGroups } from "./deduplicator"
import type { FindingRepository } from "./finding-repository"
import type { NotificationSink } from "./notifier"
import type { QueryLogSource } from "./query-source"

export type CycleStage =
  | "Idle"
  | "CursorLoaded"
  | "Fetched"
  | "Deduplicated"
  | "Classified"
  | "Persisted"
  | "Evaluated"
  | "Notified"
  | "CursorAdvanced"

export type CycleStatus = "success" | "partial" | "failure"

export interface CycleCounts {
  fetched: number
  selected: number
  dropped: number
  ignored: number
  domains: number
  verdicts: number
  created: number
  existing: number
  alerted: number
}

export interface SkippedDomain {
  domain: string
  source: VerdictSource
  message: string
}

export interface CycleOutcome {
  cycleId: string
  status: CycleStatus
  /** Last stage entered; on failure, the stage that failed. */
  stage: CycleStage
  errorKind?: PipelineErrorKind | "Unexpected"
  message?: string
  /** Set when findings were persisted but the cursor could not be advanced. */
  operatorAttention: boolean
  cursorBefore: number | null
  cursorAfter: number | null
  counts: CycleCounts
  skippedDomains: SkippedDomain[]
  notification: "sent" | "failed" | "none"
  durationMs: number
}

export interface AnalysisPipelineOptions {
  source: QueryLogSource
  classifiers: readonly ClassificationAdapter[]
  findings: FindingRepository
  cursorStore: CursorStore
  notifier: NotificationSink
  loggers: Loggers
  alertCategories: readonly Category[]
  ignoreDomains?: readonly string[]
  lockTtlMs: number
  /** Identifies this process as the cycle lock holder. */
  owner?: string
  now?: () => number
}

function emptyCounts(): CycleCounts {
  return {
    fetched: 0,
    selected: 0,
    dropped: 0,
    ignored: 0,
    domains: 0,
    verdicts: 0,
    created: 0,
    existing: 0,
    alerted: 0,
  }
}

function selectNewRecords(records: readonly QueryRecord[], start: StartPoint): QueryRecord[] {
  switch (start.mode) {
    case "resume":
      return records.filter((record) => record.timestamp > start.since)
    case "lookback":
      return records.filter((record) => record.timestamp >= start.since)
    case "full-history":
      return [...records]
  }
}

class CycleRun {
  readonly id = randomUUID()
  readonly counts = emptyCounts()
  readonly skippedDomains: SkippedDomain[] = []
  stage: CycleStage = "Idle"
  cursorBefore: number | null = null
  cursorAfter: number | null = null
  notification: CycleOutcome["notification"] = "none"

  constructor(readonly startedAt: number) {}
}

export class AnalysisPipeline {
  private readonly owner: string
  private readonly now: () => number
  private readonly alertCategories: ReadonlySet<Category>

  constructor(private readonly options: AnalysisPipelineOptions) {
    this.owner = options.owner ?? randomUUID()
    this.now = options.now ?? Date.now
    this.alertCategories = new Set(options.alertCategories)
  }

  /**
   * Runs one cycle. Never rejects: every failure is reported in the outcome.
   */
  async runCycle(): Promise<CycleOutcome> {
    const run = new CycleRun(this.now())
    const logger = this.options.loggers.app.child({ cycleId: run.id })

    try {
      this.options.cursorStore.acquireLock(this.owner, this.options.lockTtlMs)
    } catch (error) {
      return this.abort(run, logger, "Idle", error)
    }

    try {
      return await this.execute(run, logger)
    } catch (error) {
      return this.abort(run, logger, run.stage, error)
    } finally {
      try {
        this.options.cursorStore.releaseLock(this.owner)
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "failed to release cycle lock")
      }
    }
  }

  private async execute(run: CycleRun, logger: pino.Logger): Promise<CycleOutcome> {
    const { source, cursorStore, findings, notifier } = this.options

    let cursor: Cursor | null
    let start: StartPoint
    try {
      cursor = cursorStore.read()
      start = cursorStore.startPoint(cursor)
    } catch (error) {
      return this.abort(run, logger, "CursorLoaded", error)
    }
    run.stage = "CursorLoaded"
    run.cursorBefore = cursor?.lastProcessedTimestamp ?? null
    run.cursorAfter = run.cursorBefore
    logger.info({ mode: start.mode, since: start.since }, "cursor loaded")

    let records: QueryRecord[]
    try {
      records = await source.fetch(start.since)
    } catch (error) {
      return this.abort(run, logger, "Fetched", error)
    }
    run.stage = "Fetched"

    const selected = selectNewRecords(records, start)
    run.counts.fetched = records.length
    run.counts.selected = selected.length
    logger.info({ source: source.name, fetched: records.length, selected: selected.length }, "queries fetched")

    if (selected.length === 0) {
      logger.info("no new queries; cursor unchanged")
      return this.complete(run, logger)
    }

    const target = selected.reduce((max, record) => Math.max(max, record.timestamp), Number.NEGATIVE_INFINITY)

    const deduplicated = groupByDomain(selected, {
      ignoreDomains: this.options.ignoreDomains,
      logger,
    })
    run.stage = "Deduplicated"
    run.counts.dropped = deduplicated.dropped.length
    run.counts.ignored = deduplicated.ignored.length
    run.counts.domains = deduplicated.groups.size

    const verdicts = await this.classify(run, logger, deduplicated.groups)
    run.stage = "Classified"
    run.counts.verdicts = verdicts.length

    let created: Finding[]
    try {
      const summary = findings.persistVerdicts(verdicts, deduplicated.groups, this.now())
      created = summary.created
      run.counts.created = summary.created.length
      run.counts.existing = summary.existing.length
    } catch (error) {
      return this.abort(run, logger, "Persisted", error)
    }
    run.stage = "Persisted"
    this.recordFindings(run, created)

    const batch = evaluateAlerts(created, this.alertCategories)
    run.stage = "Evaluated"
    run.counts.alerted = batch?.findings.length ?? 0

    if (batch) {
      await this.notify(run, logger, notifier, batch)
    }
    run.stage = "Notified"

    try {
      const advanced = cursorStore.write(target, cursor)
      run.cursorAfter = advanced.lastProcessedTimestamp
    } catch (error) {
      return this.abort(run, logger, "CursorAdvanced", error)
    }
    run.stage = "CursorAdvanced"

    return this.complete(run, logger)
  }

  private async classify(
    run: CycleRun,
    logger: pino.Logger,
    groups: Map<string, QueryRecord[]>,
  ): Promise<Verdict[]> {
    const requests = toDomainGroups(groups)
    const verdicts: Verdict[] = []
    if (requests.length === 0) {
      return verdicts
    }

    if (this.options.classifiers.length === 0) {
      logger.warn({ domains: requests.length }, "no classification backend enabled")
    }

    for (const classifier of this.options.classifiers) {
      try {
        const result = await classifier.classifyGroups(requests)
        verdicts.push(...result.verdicts)
        for (const failure of result.failures) {
          run.skippedDomains.push({ domain: failure.domain, source: failure.source, message: failure.message })
        }
      } catch (error) {
        for (const request of requests) {
          run.skippedDomains.push({
            domain: request.domain,
            source: classifier.source,
            message: errorMessage(error),
          })
        }
      }
    }

    if (run.skippedDomains.length > 0) {
      // Their records are behind the cursor after this cycle and will not be fetched again.
      logger.warn(
        {
          skipped: run.skippedDomains.map(({ domain, source }) => ({ domain, source })),
        },
        "classification failed for some domains; their queries are not re-analyzed",
      )
    }

    return verdicts
  }

  private recordFindings(run: CycleRun, created: readonly Finding[]): void {
    for (const finding of created) {
      this.options.loggers.security.info(
        {
          cycleId: run.id,
          findingId: finding.id,
          timestamp: finding.timestamp,
          client: finding.clientIdentifier,
          domain: finding.domain,
          category: finding.category,
          source: finding.source,
          reason: finding.reason,
        },
        "finding recorded",
      )
    }
  }

  private async notify(
    run: CycleRun,
    logger: pino.Logger,
    notifier: NotificationSink,
    batch: AlertBatch,
  ): Promise<void> {
    try {
      await notifier.send(batch)
      run.notification = "sent"
      logger.info(
        { sink: notifier.name, findings: batch.findings.length, categories: [...batch.triggeredCategories] },
        "alert sent",
      )
    } catch (error) {
      run.notification = "failed"
      logger.error(
        { sink: notifier.name, errorKind: errorKind(error), error: errorMessage(error) },
        "alert delivery failed; findings remain queryable",
      )
    }
  }

  private complete(run: CycleRun, logger: pino.Logger): CycleOutcome {
    const outcome = this.outcome(run, run.skippedDomains.length > 0 ? "partial" : "success")
    logger.info(
      {
        status: outcome.status,
        stage: outcome.stage,
        counts: outcome.counts,
        cursorBefore: outcome.cursorBefore,
        cursorAfter: outcome.cursorAfter,
        notification: outcome.notification,
        durationMs: outcome.durationMs,
      },
      "analysis cycle finished",
    )
    return outcome
  }

  private abort(run: CycleRun, logger: pino.Logger, stage: CycleStage, error: unknown): CycleOutcome {
    run.stage = stage
    const kind = errorKind(error)
    const operatorAttention = stage === "CursorAdvanced" && error instanceof StateWriteError
    const outcome: CycleOutcome = {
      ...this.outcome(run, "failure"),
      errorKind: kind,
      message: errorMessage(error),
      operatorAttention,
    }

    if (operatorAttention) {
      logger.fatal(
        { stage, errorKind: kind, error: outcome.message, operatorAttention, counts: outcome.counts },
        "findings persisted but cursor could not be advanced; bookkeeping may be out of sync",
      )
    } else {
      logger.error(
        { stage, errorKind: kind, error: outcome.message, counts: outcome.counts },
        "analysis cycle aborted",
      )
    }

    return outcome
  }

  private outcome(run: CycleRun, status: CycleStatus): CycleOutcome {
    return {
      cycleId: run.id,
      status,
      stage: run.stage,
      operatorAttention: false,
      cursorBefore: run.cursorBefore,
      cursorAfter: run.cursorAfter,
      counts: { ...run.counts },
      skippedDomains: [...run.skippedDomains],
      notification: run.notification,
      durationMs: this.now() - run.startedAt,
    }
  }
}
