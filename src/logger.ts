import { mkdirSync } from "node:fs"
import { resolve } from "node:path"
import pino from "pino"
import { createStream, type RotatingFileStream } from "rotating-file-stream"
import type { AppConfig } from "./config"

export interface Loggers {
  app: pino.Logger
  security: pino.Logger
}

export interface LoggerHandles extends Loggers {
  /** Ends the rotating streams; their rotation timers otherwise keep the process alive. */
  close(): Promise<void>
}

function endStream(stream: RotatingFileStream): Promise<void> {
  return new Promise((resolve) => {
    stream.end(() => resolve())
  })
}

export function createLoggers(config: AppConfig): LoggerHandles {
  const resolvedLogDir = resolve(config.logDir)
  mkdirSync(resolvedLogDir, { recursive: true })

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const securityStream = createStream("security.log", {
    interval: "1d",
    size: "10M",
    rotate: 90,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "dns-watch",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  )

  // Findings and alerts only; kept longer than the operational log.
  const security = pino(
    {
      level: "info",
      base: {
        service: "dns-watch-findings",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    securityStream,
  )

  return {
    app,
    security,
    close: async () => {
      await Promise.all([endStream(appStream), endStream(securityStream)])
    },
  }
}
