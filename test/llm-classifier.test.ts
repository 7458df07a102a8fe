import { describe, expect, test } from "vitest"
import type { LlmSettings } from "../src/config"
import { buildClassificationPrompt, LlmClassifier } from "../src/services/llm-classifier"
import { record } from "./helpers"

const settings: LlmSettings = {
  enabled: true,
  provider: "openai",
  model: "gpt-4o-mini",
  openaiApiKey: "",
  googleApiKey: "",
  ollamaBaseUrl: "http://localhost:11434/api",
}

const requests = [
  {
    domain: "bad-example.com",
    records: [record(101, "10.0.0.6", "bad-example.com"), record(102, "10.0.0.5", "bad-example.com")],
  },
  { domain: "example.org", records: [record(100, "10.0.0.5", "example.org")] },
]

describe("llm classifier", () => {
  test("summarizes each domain in the prompt", () => {
    const prompt = buildClassificationPrompt(requests)

    expect(prompt).toContain("bad-example.com (queries: 2, clients: 2)\nexample.org (queries: 1, clients: 1)")
  })

  test("keeps only verdicts for requested domains, first one wins", async () => {
    let seenPrompt = ""
    const classifier = new LlmClassifier(settings, {
      generate: async ({ prompt }) => {
        seenPrompt = prompt
        return {
          verdicts: [
            { domain: "Bad-Example.com.", category: "Malicious", reason: "phishing kit", confidence: 0.9 },
            { domain: "bad-example.com", category: "Benign", reason: "second opinion" },
            { domain: "unrequested.example", category: "Gambling", reason: "casino" },
          ],
        }
      },
    })

    const verdicts = await classifier.classifyBatch(requests, new AbortController().signal)

    expect(seenPrompt).toBe(buildClassificationPrompt(requests))
    expect([...verdicts.keys()]).toEqual(["bad-example.com"])
    expect(verdicts.get("bad-example.com")).toEqual({
      category: "Malicious",
      reason: "phishing kit",
      confidence: 0.9,
    })
  })

  test("passes the abort signal to the model call", async () => {
    const controller = new AbortController()
    let received: AbortSignal | null = null
    const classifier = new LlmClassifier(settings, {
      generate: async ({ signal }) => {
        received = signal
        return { verdicts: [] }
      },
    })

    await classifier.classifyBatch(requests, controller.signal)

    expect(received).toBe(controller.signal)
  })

  test("requires an API key for hosted providers", async () => {
    const classifier = new LlmClassifier(settings)

    await expect(classifier.classifyBatch(requests, new AbortController().signal)).rejects.toThrow(
      "DNSWATCH_OPENAI_API_KEY required when DNSWATCH_LLM_PROVIDER=openai",
    )
  })
})
