import type { LlmTokenUsage } from './llm/usage.js'

export type ModelPricing = {
  /** USD per million input tokens. */
  inputPerMillion: number
  /** USD per million output tokens. */
  outputPerMillion: number
}

// Ordered: first pattern that matches the model id wins.
const PRICING_TABLE: ReadonlyArray<{ pattern: RegExp; pricing: ModelPricing }> = [
  { pattern: /^claude-haiku-4-5/, pricing: { inputPerMillion: 1, outputPerMillion: 5 } },
  {
    pattern: /^claude-sonnet-4(?:-5)?(?:-|$)/,
    pricing: { inputPerMillion: 3, outputPerMillion: 15 },
  },
  { pattern: /^claude-opus-4-1/, pricing: { inputPerMillion: 15, outputPerMillion: 75 } },
  { pattern: /^claude-opus-4(?:-|$)/, pricing: { inputPerMillion: 15, outputPerMillion: 75 } },
  { pattern: /^claude-3-5-haiku/, pricing: { inputPerMillion: 0.8, outputPerMillion: 4 } },
]

export function resolveModelPricing(modelId: string): ModelPricing | null {
  const normalized = modelId.trim().toLowerCase()
  return PRICING_TABLE.find((entry) => entry.pattern.test(normalized))?.pricing ?? null
}

export function calculateCostUsd(modelId: string, usage: LlmTokenUsage | null): number | null {
  const pricing = resolveModelPricing(modelId)
  if (!pricing || !usage) return null
  if (usage.promptTokens === null || usage.completionTokens === null) return null
  return (
    (usage.promptTokens * pricing.inputPerMillion +
      usage.completionTokens * pricing.outputPerMillion) /
    1_000_000
  )
}
