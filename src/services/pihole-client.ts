import type pino from "pino"
import { z } from "zod"
import type { PiholeSettings } from "../config"
import { SourceUnavailableError, errorMessage } from "../errors"
import type { QueryRecord } from "../types"
import type { QueryLogSource } from "./query-source"

const AuthResponseSchema = z.object({
  session: z.object({
    valid: z.boolean(),
    sid: z.string().nullable().optional(),
    message: z.string().nullable().optional(),
  }),
})

const PiholeQuerySchema = z.object({
  id: z.number().optional(),
  time: z.number().nullable().optional(),
  type: z.string().nullable().optional(),
  status: z.string().nullable().optional(),
  domain: z.string().nullable().optional(),
  client: z
    .object({
      ip: z.string().nullable().optional(),
      name: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
  upstream: z.string().nullable().optional(),
})

const QueriesResponseSchema = z.object({
  queries: z.array(PiholeQuerySchema),
  cursor: z.number().nullable().optional(),
  recordsFiltered: z.number().optional(),
})

type PiholeQuery = z.infer<typeof PiholeQuerySchema>
type QueriesPage = z.infer<typeof QueriesResponseSchema>

interface PiholeClientDependencies {
  fetchImpl?: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
  logger?: pino.Logger
}

export function toQueryRecord(entry: PiholeQuery): QueryRecord | null {
  if (!entry.domain || !entry.time) {
    return null
  }

  return Object.freeze({
    timestamp: entry.time,
    clientIdentifier: entry.client?.ip || entry.client?.name || "unknown",
    domain: entry.domain,
    rawMetadata: Object.freeze({
      id: entry.id ?? null,
      type: entry.type ?? null,
      status: entry.status ?? null,
      clientName: entry.client?.name ?? null,
      upstream: entry.upstream ?? null,
    }),
  })
}

export class PiholeClient implements QueryLogSource {
  readonly name = "pihole"

  private readonly fetchImpl: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout
  private readonly logger: pino.Logger | undefined

  constructor(
    private readonly settings: PiholeSettings,
    dependencies: PiholeClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.setTimeoutImpl = dependencies.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = dependencies.clearTimeoutImpl ?? clearTimeout
    this.logger = dependencies.logger
  }

  async fetch(since: number | null): Promise<QueryRecord[]> {
    if (!this.settings.baseUrl) {
      throw new SourceUnavailableError("DNSWATCH_PIHOLE_URL is not configured")
    }

    let sid: string | null = null
    try {
      sid = await this.authenticate()
      const entries = await this.fetchEntries(since, sid)

      const records: QueryRecord[] = []
      for (const entry of entries) {
        const record = toQueryRecord(entry)
        if (record) {
          records.push(record)
        } else {
          this.logger?.warn({ id: entry.id }, "skipping query without domain or timestamp")
        }
      }

      return records.sort((a, b) => a.timestamp - b.timestamp)
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error
      }
      throw new SourceUnavailableError(`Pi-hole query log unavailable: ${errorMessage(error)}`, {
        cause: error,
      })
    } finally {
      if (sid) {
        await this.deleteSession(sid)
      }
    }
  }

  private async authenticate(): Promise<string | null> {
    if (!this.settings.password) {
      return null
    }

    const response = await this.request("/api/auth", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ password: this.settings.password }),
    })

    if (!response.ok) {
      const bodyText = await response.text()
      throw new SourceUnavailableError(
        `Pi-hole authentication returned ${response.status}: ${bodyText.slice(0, 500)}`,
      )
    }

    const parsed = AuthResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new SourceUnavailableError("Unexpected Pi-hole authentication response")
    }

    const { session } = parsed.data
    if (!session.valid || !session.sid) {
      throw new SourceUnavailableError(
        `Pi-hole authentication failed: ${session.message ?? "no session issued"}`,
      )
    }

    return session.sid
  }

  /**
   * Pi-hole lists newest first. When the window holds more than maxRecords
   * entries the oldest slice is read, so the next cycle resumes from there.
   */
  private async fetchEntries(since: number | null, sid: string | null): Promise<PiholeQuery[]> {
    const { pageSize, maxRecords } = this.settings
    const first = await this.fetchPage(since, sid, 0, Math.min(pageSize, maxRecords), null)
    const total = first.recordsFiltered ?? null
    const pin = first.cursor ?? null

    let entries: PiholeQuery[] = []
    let start: number
    if (total !== null && total > maxRecords) {
      this.logger?.warn({ total, maxRecords }, "query window exceeds max records; reading oldest slice")
      start = total - maxRecords
    } else {
      entries = [...first.queries]
      start = first.queries.length
      if (first.queries.length < Math.min(pageSize, maxRecords)) {
        return entries
      }
    }

    while (entries.length < maxRecords && (total === null || start < total)) {
      const length = Math.min(pageSize, maxRecords - entries.length)
      const page = await this.fetchPage(since, sid, start, length, pin)
      entries.push(...page.queries)
      start += page.queries.length

      if (page.queries.length < length) {
        break
      }
    }

    return entries
  }

  private async fetchPage(
    since: number | null,
    sid: string | null,
    start: number,
    length: number,
    cursor: number | null,
  ): Promise<QueriesPage> {
    const query = new URLSearchParams({
      start: String(start),
      length: String(length),
    })

    if (since !== null) {
      query.set("from", String(Math.floor(since)))
    }

    if (cursor !== null) {
      query.set("cursor", String(cursor))
    }

    const response = await this.request(`/api/queries?${query.toString()}`, {
      method: "GET",
      headers: this.sessionHeaders(sid),
    })

    if (!response.ok) {
      const bodyText = await response.text()
      throw new SourceUnavailableError(
        `Pi-hole queries returned ${response.status}: ${bodyText.slice(0, 500)}`,
      )
    }

    const parsed = QueriesResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected Pi-hole queries response: ${parsed.error.message}`)
    }

    return parsed.data
  }

  // Pi-hole caps concurrent sessions, so every session is released.
  private async deleteSession(sid: string): Promise<void> {
    try {
      const response = await this.request("/api/auth", {
        method: "DELETE",
        headers: this.sessionHeaders(sid),
      })

      if (!response.ok && response.status !== 410) {
        this.logger?.warn({ status: response.status }, "failed to delete Pi-hole session")
      }
    } catch (error) {
      this.logger?.warn({ error: errorMessage(error) }, "failed to delete Pi-hole session")
    }
  }

  private sessionHeaders(sid: string | null): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" }
    if (sid) {
      headers.sid = sid
    }
    return headers
  }

  private async request(path: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController()
    const timeoutHandle = this.setTimeoutImpl(() => controller.abort(), this.settings.timeoutMs)

    try {
      return await this.fetchImpl(`${this.settings.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      })
    } finally {
      this.clearTimeoutImpl(timeoutHandle)
    }
  }
}
