import type { RetrySettings } from "../config"

export interface RetryPolicy {
  readonly maxAttempts: number
  /** Delay to wait after the given (1-based) failed attempt. */
  delayMs(attempt: number): number
}

export interface BackoffDependencies {
  random?: () => number
}

export function exponentialBackoff(
  settings: RetrySettings,
  dependencies: BackoffDependencies = {},
): RetryPolicy {
  const random = dependencies.random ?? Math.random

  return {
    maxAttempts: Math.max(1, settings.maxAttempts),
    delayMs(attempt: number): number {
      const exponential = settings.baseDelayMs * 2 ** Math.max(0, attempt - 1)
      const jitter = Math.floor(random() * 250)
      return Math.min(settings.maxDelayMs, exponential + jitter)
    },
  }
}

export class TimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.name = "TimeoutError"
  }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. Rejects with
 * TimeoutError even if the task ignores the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([task(controller.signal), timeout])
  } finally {
    clearTimeout(timeoutHandle)
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
