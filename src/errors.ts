import type { VerdictSource } from "./types"

export type PipelineErrorKind =
  | "StateWriteError"
  | "CursorReadError"
  | "SourceUnavailable"
  | "ClassificationError"
  | "PersistenceError"
  | "NotificationError"
  | "LockUnavailable"

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class StateWriteError extends PipelineError {
  readonly kind = "StateWriteError" as const
}

export class CursorReadError extends PipelineError {
  readonly kind = "CursorReadError" as const
}

export class SourceUnavailableError extends PipelineError {
  readonly kind = "SourceUnavailable" as const
}

export class ClassificationError extends PipelineError {
  readonly kind = "ClassificationError" as const

  constructor(
    readonly domain: string,
    readonly source: VerdictSource,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class PersistenceError extends PipelineError {
  readonly kind = "PersistenceError" as const
}

export class NotificationError extends PipelineError {
  readonly kind = "NotificationError" as const
}

export class LockUnavailableError extends PipelineError {
  readonly kind = "LockUnavailable" as const

  constructor(readonly holder: string, readonly expiresAt: number) {
    super(`Cycle lock is held by '${holder}' until ${new Date(expiresAt).toISOString()}`)
  }
}

export function errorKind(error: unknown): PipelineErrorKind | "Unexpected" {
  return error instanceof PipelineError ? error.kind : "Unexpected"
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
