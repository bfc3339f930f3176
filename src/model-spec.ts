import { createUnknownModelAliasError, NutshellError } from './errors.js'

export type CostTier = 'low' | 'medium' | 'high'

export type ModelSpec = {
  identifier: string
  costTier: CostTier
}

export type ResolvedModel = ModelSpec & {
  /** Alias the user typed, or null when the token was a literal model id. */
  alias: string | null
  requiresConfirmation: boolean
}

export const MODEL_ALIASES: Readonly<Record<string, Readonly<ModelSpec>>> = Object.freeze({
  haiku: Object.freeze({ identifier: 'claude-haiku-4-5-20251001', costTier: 'low' }),
  'haiku-latest': Object.freeze({ identifier: 'claude-haiku-4-5', costTier: 'low' }),
  sonnet: Object.freeze({ identifier: 'claude-sonnet-4-5-20250929', costTier: 'medium' }),
  'sonnet-latest': Object.freeze({ identifier: 'claude-sonnet-4-5', costTier: 'medium' }),
  opus: Object.freeze({ identifier: 'claude-opus-4-1-20250805', costTier: 'high' }),
  'opus-latest': Object.freeze({ identifier: 'claude-opus-4-1', costTier: 'high' }),
} satisfies Record<string, ModelSpec>)

export const DEFAULT_MODEL_ALIAS = 'sonnet'

const LITERAL_MODEL_ID_PATTERN = /^claude-[a-z0-9][a-z0-9.-]*$/

export function inferCostTier(identifier: string): CostTier {
  const lower = identifier.toLowerCase()
  if (lower.includes('opus')) return 'high'
  if (lower.includes('haiku')) return 'low'
  return 'medium'
}

export function isLiteralModelId(identifier: string): boolean {
  return LITERAL_MODEL_ID_PATTERN.test(identifier.toLowerCase())
}

export function resolveModel(
  token: string,
  { strict = false }: { strict?: boolean } = {}
): ResolvedModel {
  const trimmed = token.trim()
  if (trimmed.length === 0) throw new NutshellError('UnknownModelAlias', 'Missing model id')

  const lower = trimmed.toLowerCase()
  const aliased = Object.hasOwn(MODEL_ALIASES, lower) ? MODEL_ALIASES[lower] : undefined
  if (aliased) {
    return {
      identifier: aliased.identifier,
      costTier: aliased.costTier,
      alias: lower,
      requiresConfirmation: aliased.costTier === 'high',
    }
  }

  const identifier = lower.startsWith('anthropic/') ? trimmed.slice('anthropic/'.length) : trimmed
  if (strict && !isLiteralModelId(identifier)) {
    throw createUnknownModelAliasError(trimmed, Object.keys(MODEL_ALIASES))
  }
  const costTier = inferCostTier(identifier)
  return { identifier, costTier, alias: null, requiresConfirmation: costTier === 'high' }
}
