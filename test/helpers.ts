import { randomUUID } from "node:crypto"
import { rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import pino from "pino"
import { AppDb } from "../src/db"
import type { Loggers } from "../src/logger"
import type { QueryRecord } from "../src/types"

export function silentLoggers(): Loggers {
  return {
    app: pino({ level: "silent" }),
    security: pino({ level: "silent" }),
  }
}

export function createDbPath(): string {
  return join(tmpdir(), `dns-watch-${randomUUID()}.db`)
}

export function createDb(): { db: AppDb; path: string } {
  const path = createDbPath()
  return {
    db: new AppDb(path),
    path,
  }
}

export function cleanupDb(db: AppDb, path: string): void {
  db.close()
  for (const suffix of ["", "-wal", "-shm"]) {
    rmSync(`${path}${suffix}`, { force: true })
  }
}

export function record(timestamp: number, clientIdentifier: string, domain: string): QueryRecord {
  return Object.freeze({
    timestamp,
    clientIdentifier,
    domain,
    rawMetadata: Object.freeze({}),
  })
}
