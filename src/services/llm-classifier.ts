import { generateObject, type LanguageModel } from "ai"
import { createGoogleGenerativeAI } from "@ai-sdk/google"
import { createOpenAI } from "@ai-sdk/openai"
import { createOllama } from "ollama-ai-provider"
import { z } from "zod"
import type { LlmSettings } from "../config"
import { normalizeDomain } from "../lib/domain"
import type { ClassificationBackend, ClassificationRequest, RawVerdict } from "./classifier"

const ClassificationSchema = z.object({
  verdicts: z.array(
    z.object({
      domain: z.string(),
      category: z.string(),
      reason: z.string(),
      confidence: z.number().optional(),
    }),
  ),
})

export type LlmClassification = z.infer<typeof ClassificationSchema>

export type GenerateClassification = (input: {
  prompt: string
  signal: AbortSignal
}) => Promise<LlmClassification>

interface LlmClassifierDependencies {
  generate?: GenerateClassification
}

const CATEGORY_GUIDE = [
  "- Malicious: known malware, phishing, command & control, or other direct security threats.",
  "- AdultContent: pornography or explicit content unsuitable for minors.",
  "- Gambling: online betting, casinos, lotteries.",
  "- Dating: online dating apps or services.",
  "- IllegalContent: illegal streaming, illicit goods or services, other unlawful activity.",
  "- Suspicious: aggressive tracking, potentially unwanted programs, throwaway TLDs associated with spam, or anything that warrants caution without being overtly malicious.",
  "- Benign: none of the above.",
].join("\n")

export function buildClassificationPrompt(requests: readonly ClassificationRequest[]): string {
  const lines = requests.map((request) => {
    const clients = new Set(request.records.map((record) => record.clientIdentifier)).size
    return `${request.domain} (queries: ${request.records.length}, clients: ${clients})`
  })

  return [
    "You are a security classifier for DNS queries observed on a local network.",
    "Assign each domain exactly one category, choosing the most severe one that applies:",
    CATEGORY_GUIDE,
    "Judge from the domain name and common knowledge about the services hosted there.",
    "Return one verdict per domain with a short reason and a confidence between 0 and 1.",
    "Domains:",
    lines.join("\n"),
  ].join("\n\n")
}

export class LlmClassifier implements ClassificationBackend {
  readonly source = "AI" as const
  readonly maxBatchSize = 200

  private readonly generate: GenerateClassification

  constructor(
    private readonly settings: LlmSettings,
    dependencies: LlmClassifierDependencies = {},
  ) {
    this.generate = dependencies.generate ?? ((input) => this.generateWithModel(input))
  }

  async classifyBatch(
    requests: readonly ClassificationRequest[],
    signal: AbortSignal,
  ): Promise<Map<string, RawVerdict>> {
    const requested = new Set(requests.map((request) => request.domain))
    const output = await this.generate({ prompt: buildClassificationPrompt(requests), signal })

    const verdicts = new Map<string, RawVerdict>()
    for (const item of output.verdicts) {
      const domain = normalizeDomain(item.domain)
      if (!requested.has(domain) || verdicts.has(domain)) {
        continue
      }

      verdicts.set(domain, {
        category: item.category,
        reason: item.reason,
        confidence: item.confidence,
      })
    }

    return verdicts
  }

  private async generateWithModel(input: { prompt: string; signal: AbortSignal }): Promise<LlmClassification> {
    const result = await generateObject({
      model: this.getModel(),
      schema: ClassificationSchema,
      temperature: 0,
      maxRetries: 0,
      abortSignal: input.signal,
      prompt: input.prompt,
    })

    return result.object
  }

  private getModel(): LanguageModel {
    if (this.settings.provider === "ollama") {
      const provider = createOllama({
        baseURL: this.settings.ollamaBaseUrl,
      })

      return provider(this.settings.model)
    }

    if (this.settings.provider === "google") {
      if (!this.settings.googleApiKey) {
        throw new Error("DNSWATCH_GOOGLE_API_KEY required when DNSWATCH_LLM_PROVIDER=google")
      }

      const provider = createGoogleGenerativeAI({
        apiKey: this.settings.googleApiKey,
      })

      return provider(this.settings.model)
    }

    if (!this.settings.openaiApiKey) {
      throw new Error("DNSWATCH_OPENAI_API_KEY required when DNSWATCH_LLM_PROVIDER=openai")
    }

    const provider = createOpenAI({
      apiKey: this.settings.openaiApiKey,
    })

    return provider(this.settings.model)
  }
}
