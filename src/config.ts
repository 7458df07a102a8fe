import { z } from "zod"
import { CATEGORIES, DEFAULT_ALERT_CATEGORIES, type Category } from "./types"

export type LlmProviderName = "openai" | "ollama" | "google"
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface PiholeSettings {
  baseUrl: string
  password: string
  pageSize: number
  maxRecords: number
  timeoutMs: number
}

export interface LlmSettings {
  enabled: boolean
  provider: LlmProviderName
  model: string
  openaiApiKey: string
  googleApiKey: string
  ollamaBaseUrl: string
}

export interface ThreatIntelSettings {
  enabled: boolean
  apiKey: string
  clientId: string
  clientVersion: string
}

export interface ClassificationSettings {
  batchSize: number
  requestsPerSecond: number
  queueMax: number
  timeoutMs: number
}

export interface RetrySettings {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export interface SmtpSettings {
  host: string
  port: number
  user: string
  pass: string
  from: string
  to: string
}

export interface NotificationSettings {
  timeoutMs: number
  smtp: SmtpSettings | null
}

export interface AppConfig {
  pihole: PiholeSettings
  llm: LlmSettings
  threatIntel: ThreatIntelSettings
  classification: ClassificationSettings
  retry: RetrySettings
  alertCategories: Category[]
  ignoreDomains: string[]
  lookbackMs: number | null
  dbPath: string
  dbBusyTimeoutMs: number
  logDir: string
  logLevel: LogLevel
  retentionDays: number
  lockTtlMs: number
  notification: NotificationSettings
}

const CategoryListSchema = z
  .string()
  .optional()
  .transform((value, ctx): Category[] => {
    if (value === undefined || value.trim() === "") {
      return [...DEFAULT_ALERT_CATEGORIES]
    }

    const categories: Category[] = []
    for (const item of value.split(",")) {
      const name = item.trim()
      if (!name) {
        continue
      }

      const match = CATEGORIES.find((category) => category.toLowerCase() === name.toLowerCase())
      if (!match) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown alert category '${name}' (expected one of ${CATEGORIES.join(", ")})`,
        })
        return z.NEVER
      }

      if (!categories.includes(match)) {
        categories.push(match)
      }
    }

    return categories
  })

const EnvSchema = z.object({
  DNSWATCH_PIHOLE_URL: z.string().default(""),
  DNSWATCH_PIHOLE_PASSWORD: z.string().default(""),
  DNSWATCH_PIHOLE_PAGE_SIZE: z.string().optional(),
  DNSWATCH_PIHOLE_MAX_RECORDS: z.string().optional(),
  DNSWATCH_FETCH_TIMEOUT_MS: z.string().optional(),
  DNSWATCH_AI_ENABLED: z.string().optional(),
  DNSWATCH_LLM_PROVIDER: z.enum(["openai", "ollama", "google"]).default("openai"),
  DNSWATCH_LLM_MODEL: z.string().default("gpt-4o-mini"),
  DNSWATCH_OPENAI_API_KEY: z.string().default(""),
  DNSWATCH_GOOGLE_API_KEY: z.string().default(""),
  DNSWATCH_OLLAMA_BASE_URL: z.string().default("http://localhost:11434/api"),
  DNSWATCH_THREAT_INTEL_ENABLED: z.string().optional(),
  DNSWATCH_SAFE_BROWSING_API_KEY: z.string().default(""),
  DNSWATCH_SAFE_BROWSING_CLIENT_ID: z.string().default("dns-watch"),
  DNSWATCH_SAFE_BROWSING_CLIENT_VERSION: z.string().default("0.1.0"),
  DNSWATCH_CLASSIFY_BATCH_SIZE: z.string().optional(),
  DNSWATCH_CLASSIFY_RATE_LIMIT: z.string().optional(),
  DNSWATCH_CLASSIFY_QUEUE_MAX: z.string().optional(),
  DNSWATCH_CLASSIFY_TIMEOUT_MS: z.string().optional(),
  DNSWATCH_RETRY_MAX_ATTEMPTS: z.string().optional(),
  DNSWATCH_RETRY_BASE_DELAY_MS: z.string().optional(),
  DNSWATCH_RETRY_MAX_DELAY_MS: z.string().optional(),
  DNSWATCH_ALERT_CATEGORIES: CategoryListSchema,
  DNSWATCH_IGNORE_DOMAINS: z.string().optional(),
  DNSWATCH_LOOKBACK_MINUTES: z.string().optional(),
  DNSWATCH_DB_PATH: z.string().default("./data/dns-watch.db"),
  DNSWATCH_DB_BUSY_TIMEOUT_MS: z.string().optional(),
  DNSWATCH_LOG_DIR: z.string().default("./data/logs"),
  DNSWATCH_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DNSWATCH_RETENTION_DAYS: z.string().optional(),
  DNSWATCH_LOCK_TTL_MINUTES: z.string().optional(),
  DNSWATCH_NOTIFY_TIMEOUT_MS: z.string().optional(),
  DNSWATCH_SMTP_HOST: z.string().optional(),
  DNSWATCH_SMTP_PORT: z.string().optional(),
  DNSWATCH_SMTP_USER: z.string().optional(),
  DNSWATCH_SMTP_PASS: z.string().optional(),
  DNSWATCH_EMAIL_FROM: z.string().optional(),
  DNSWATCH_EMAIL_TO: z.string().optional(),
})

type ParsedEnv = z.infer<typeof EnvSchema>

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function parseDomainList(input: string | undefined): string[] {
  if (!input) {
    return []
  }

  return [
    ...new Set(
      input
        .split(",")
        .map((item) => item.trim().toLowerCase())
        .map((item) => item.replace(/^\*\./, ""))
        .map((item) => item.replace(/\.+$/, ""))
        .filter((item) => item.length > 0),
    ),
  ]
}

function parseLookback(input: string | undefined): number | null {
  const minutes = toInteger(input, 0)
  return minutes > 0 ? minutes * 60 * 1000 : null
}

function parseSmtp(parsed: ParsedEnv): SmtpSettings | null {
  const host = parsed.DNSWATCH_SMTP_HOST?.trim()
  const user = parsed.DNSWATCH_SMTP_USER?.trim() ?? ""
  const to = parsed.DNSWATCH_EMAIL_TO?.trim()
  if (!host || !to) {
    return null
  }

  return {
    host,
    port: toMinInteger(parsed.DNSWATCH_SMTP_PORT, 587, 1),
    user,
    pass: parsed.DNSWATCH_SMTP_PASS ?? "",
    from: parsed.DNSWATCH_EMAIL_FROM?.trim() || user,
    to,
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    pihole: {
      baseUrl: parsed.DNSWATCH_PIHOLE_URL.trim().replace(/\/+$/, ""),
      password: parsed.DNSWATCH_PIHOLE_PASSWORD,
      pageSize: toMinInteger(parsed.DNSWATCH_PIHOLE_PAGE_SIZE, 1000, 1),
      maxRecords: toMinInteger(parsed.DNSWATCH_PIHOLE_MAX_RECORDS, 20_000, 1),
      timeoutMs: toMinInteger(parsed.DNSWATCH_FETCH_TIMEOUT_MS, 30_000, 1),
    },
    llm: {
      enabled: toBoolean(parsed.DNSWATCH_AI_ENABLED, true),
      provider: parsed.DNSWATCH_LLM_PROVIDER,
      model: parsed.DNSWATCH_LLM_MODEL,
      openaiApiKey: parsed.DNSWATCH_OPENAI_API_KEY,
      googleApiKey: parsed.DNSWATCH_GOOGLE_API_KEY,
      ollamaBaseUrl: parsed.DNSWATCH_OLLAMA_BASE_URL,
    },
    threatIntel: {
      enabled: toBoolean(parsed.DNSWATCH_THREAT_INTEL_ENABLED, false),
      apiKey: parsed.DNSWATCH_SAFE_BROWSING_API_KEY,
      clientId: parsed.DNSWATCH_SAFE_BROWSING_CLIENT_ID,
      clientVersion: parsed.DNSWATCH_SAFE_BROWSING_CLIENT_VERSION,
    },
    classification: {
      batchSize: toMinInteger(parsed.DNSWATCH_CLASSIFY_BATCH_SIZE, 100, 1),
      requestsPerSecond: toMinInteger(parsed.DNSWATCH_CLASSIFY_RATE_LIMIT, 2, 1),
      queueMax: toMinInteger(parsed.DNSWATCH_CLASSIFY_QUEUE_MAX, 100, 1),
      timeoutMs: toMinInteger(parsed.DNSWATCH_CLASSIFY_TIMEOUT_MS, 60_000, 1),
    },
    retry: {
      maxAttempts: toMinInteger(parsed.DNSWATCH_RETRY_MAX_ATTEMPTS, 3, 1),
      baseDelayMs: toMinInteger(parsed.DNSWATCH_RETRY_BASE_DELAY_MS, 1000, 0),
      maxDelayMs: toMinInteger(parsed.DNSWATCH_RETRY_MAX_DELAY_MS, 30_000, 0),
    },
    alertCategories: parsed.DNSWATCH_ALERT_CATEGORIES,
    ignoreDomains: parseDomainList(parsed.DNSWATCH_IGNORE_DOMAINS),
    lookbackMs: parseLookback(parsed.DNSWATCH_LOOKBACK_MINUTES),
    dbPath: parsed.DNSWATCH_DB_PATH,
    dbBusyTimeoutMs: toMinInteger(parsed.DNSWATCH_DB_BUSY_TIMEOUT_MS, 5000, 0),
    logDir: parsed.DNSWATCH_LOG_DIR,
    logLevel: parsed.DNSWATCH_LOG_LEVEL,
    retentionDays: toMinInteger(parsed.DNSWATCH_RETENTION_DAYS, 90, 0),
    lockTtlMs: toMinInteger(parsed.DNSWATCH_LOCK_TTL_MINUTES, 30, 1) * 60 * 1000,
    notification: {
      timeoutMs: toMinInteger(parsed.DNSWATCH_NOTIFY_TIMEOUT_MS, 15_000, 1),
      smtp: parseSmtp(parsed),
    },
  }
}
