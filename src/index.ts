#!/usr/bin/env tsx
import { randomUUID } from "node:crypto"
import { hostname } from "node:os"
import { loadConfig } from "./config"
import { AppDb } from "./db"
import { errorMessage } from "./errors"
import { exponentialBackoff } from "./lib/retry"
import { createLoggers } from "./logger"
import { ClassificationAdapter } from "./services/classification-adapter"
import type { ClassificationBackend } from "./services/classifier"
import { CursorStore } from "./services/cursor-store"
import { FindingRepository } from "./services/finding-repository"
import { LlmClassifier } from "./services/llm-classifier"
import { EmailNotifier, LogNotifier } from "./services/notifier"
import { PiholeClient } from "./services/pihole-client"
import { AnalysisPipeline, type CycleOutcome } from "./services/pipeline"
import { SafeBrowsingClient } from "./services/safe-browsing-client"

function exitCodeFor(outcome: CycleOutcome): number {
  if (outcome.status !== "failure") {
    return 0
  }
  return outcome.operatorAttention ? 2 : 1
}

async function main(): Promise<number> {
  const config = loadConfig()
  const loggers = createLoggers(config)
  const db = new AppDb(config.dbPath, { busyTimeoutMs: config.dbBusyTimeoutMs })

  try {
    const findings = new FindingRepository(db)
    const purged = findings.purgeOlderThan(config.retentionDays)
    if (purged > 0) {
      loggers.app.info({ purged, retentionDays: config.retentionDays }, "purged expired findings")
    }

    const backends: ClassificationBackend[] = []
    if (config.threatIntel.enabled) {
      backends.push(new SafeBrowsingClient(config.threatIntel))
    }
    if (config.llm.enabled) {
      backends.push(new LlmClassifier(config.llm))
    }

    const retryPolicy = exponentialBackoff(config.retry)
    const classifiers = backends.map(
      (backend) =>
        new ClassificationAdapter(backend, {
          batchSize: config.classification.batchSize,
          timeoutMs: config.classification.timeoutMs,
          retryPolicy,
          concurrency: config.classification.queueMax,
          requestsPerSecond: config.classification.requestsPerSecond,
          logger: loggers.app,
        }),
    )

    const smtp = config.notification.smtp
    const notifier = smtp
      ? new EmailNotifier(smtp, config.notification.timeoutMs)
      : new LogNotifier(loggers.security)

    const pipeline = new AnalysisPipeline({
      source: new PiholeClient(config.pihole, { logger: loggers.app }),
      classifiers,
      findings,
      cursorStore: new CursorStore(db, { lookbackMs: config.lookbackMs }),
      notifier,
      loggers,
      alertCategories: config.alertCategories,
      ignoreDomains: config.ignoreDomains,
      lockTtlMs: config.lockTtlMs,
      owner: `${hostname()}:${process.pid}:${randomUUID()}`,
    })

    loggers.app.info(
      {
        backends: backends.map((backend) => backend.source),
        notifier: notifier.name,
        alertCategories: config.alertCategories,
        ignoreDomains: config.ignoreDomains.length,
        lookbackMs: config.lookbackMs,
      },
      "dns-watch cycle starting",
    )

    const outcome = await pipeline.runCycle()
    console.log(
      `dns-watch cycle ${outcome.status} at ${outcome.stage}: ` +
        `${outcome.counts.selected} new queries, ${outcome.counts.created} new findings, ` +
        `${outcome.skippedDomains.length} skipped domains`,
    )

    return exitCodeFor(outcome)
  } finally {
    db.close()
    await loggers.close()
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(`dns-watch failed: ${errorMessage(error)}`)
    process.exitCode = 1
  })
