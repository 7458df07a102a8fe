import { z } from "zod"
import type { ThreatIntelSettings } from "../config"
import type { ClassificationBackend, ClassificationRequest, RawVerdict } from "./classifier"

const SAFE_BROWSING_ENDPOINT = "https://safebrowsing.googleapis.com/v4/threatMatches:find"

const THREAT_TYPES = [
  "MALWARE",
  "SOCIAL_ENGINEERING",
  "UNWANTED_SOFTWARE",
  "POTENTIALLY_HARMFUL_APPLICATION",
]

// Threat types not listed here are passed through and end up as Suspicious.
const THREAT_CATEGORIES: Record<string, string> = {
  MALWARE: "Malicious",
  SOCIAL_ENGINEERING: "Malicious",
  UNWANTED_SOFTWARE: "Suspicious",
  POTENTIALLY_HARMFUL_APPLICATION: "Suspicious",
}

const MatchesResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        threatType: z.string(),
        threat: z.object({ url: z.string() }),
      }),
    )
    .optional(),
})

interface SafeBrowsingClientDependencies {
  fetchImpl?: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
  endpoint?: string
}

function threatUrl(domain: string): string {
  return `http://${domain}/`
}

export class SafeBrowsingClient implements ClassificationBackend {
  readonly source = "ThreatIntel" as const
  readonly maxBatchSize = 500

  private readonly fetchImpl: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
  private readonly endpoint: string

  constructor(
    private readonly settings: ThreatIntelSettings,
    dependencies: SafeBrowsingClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.endpoint = dependencies.endpoint ?? SAFE_BROWSING_ENDPOINT
  }

  async classifyBatch(
    requests: readonly ClassificationRequest[],
    signal: AbortSignal,
  ): Promise<Map<string, RawVerdict>> {
    if (!this.settings.apiKey) {
      throw new Error("DNSWATCH_SAFE_BROWSING_API_KEY is not configured")
    }

    const domainsByUrl = new Map(requests.map((request) => [threatUrl(request.domain), request.domain]))
    const endpoint = `${this.endpoint}?${new URLSearchParams({ key: this.settings.apiKey }).toString()}`

    const response = await this.fetchImpl(endpoint, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        client: {
          clientId: this.settings.clientId,
          clientVersion: this.settings.clientVersion,
        },
        threatInfo: {
          threatTypes: THREAT_TYPES,
          platformTypes: ["ANY_PLATFORM"],
          threatEntryTypes: ["URL"],
          threatEntries: [...domainsByUrl.keys()].map((url) => ({ url })),
        },
      }),
      signal,
    })

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`Safe Browsing API returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    const parsed = MatchesResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new Error(`Unexpected Safe Browsing response: ${parsed.error.message}`)
    }

    const verdicts = new Map<string, RawVerdict>()
    for (const match of parsed.data.matches ?? []) {
      const domain = domainsByUrl.get(match.threat.url)
      if (!domain) {
        continue
      }

      const category = THREAT_CATEGORIES[match.threatType] ?? match.threatType
      const existing = verdicts.get(domain)
      if (existing && existing.category === "Malicious") {
        continue
      }

      verdicts.set(domain, {
        category,
        reason: `Safe Browsing match: ${match.threatType}`,
      })
    }

    for (const request of requests) {
      if (!verdicts.has(request.domain)) {
        verdicts.set(request.domain, {
          category: "Benign",
          reason: "No Safe Browsing match",
        })
      }
    }

    return verdicts
  }
}
