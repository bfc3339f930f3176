export type LlmTokenUsage = {
  promptTokens: number | null
  completionTokens: number | null
  totalTokens: number | null
}

function finiteOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

export function normalizeAnthropicUsage(raw: unknown): LlmTokenUsage | null {
  if (!raw || typeof raw !== 'object') return null
  const promptTokens = finiteOrNull(Reflect.get(raw, 'input_tokens'))
  const completionTokens = finiteOrNull(Reflect.get(raw, 'output_tokens'))
  const totalTokens =
    promptTokens !== null && completionTokens !== null ? promptTokens + completionTokens : null
  if (promptTokens === null && completionTokens === null) return null
  return { promptTokens, completionTokens, totalTokens }
}
