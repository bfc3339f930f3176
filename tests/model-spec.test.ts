import { describe, expect, it } from 'vitest'

import { MODEL_ALIASES, resolveModel } from '../src/model-spec.js'

describe('model aliases', () => {
  it('maps every alias to its pinned identifier', () => {
    expect(resolveModel('haiku').identifier).toBe('claude-haiku-4-5-20251001')
    expect(resolveModel('haiku-latest').identifier).toBe('claude-haiku-4-5')
    expect(resolveModel('sonnet').identifier).toBe('claude-sonnet-4-5-20250929')
    expect(resolveModel('sonnet-latest').identifier).toBe('claude-sonnet-4-5')
    expect(resolveModel('opus').identifier).toBe('claude-opus-4-1-20250805')
    expect(resolveModel('opus-latest').identifier).toBe('claude-opus-4-1')
  })

  it('asks for confirmation only on the high tier', () => {
    for (const [alias, spec] of Object.entries(MODEL_ALIASES)) {
      const resolved = resolveModel(alias)
      expect(resolved.alias).toBe(alias)
      expect(resolved.costTier).toBe(spec.costTier)
      expect(resolved.requiresConfirmation).toBe(spec.costTier === 'high')
    }
    expect(resolveModel('haiku').costTier).toBe('low')
    expect(resolveModel('sonnet').costTier).toBe('medium')
    expect(resolveModel('opus').requiresConfirmation).toBe(true)
  })

  it('matches aliases case-insensitively', () => {
    expect(resolveModel(' Opus ')).toMatchObject({ alias: 'opus', costTier: 'high' })
  })

  it('passes unknown names through in permissive mode', () => {
    expect(resolveModel('gpt-unknown')).toEqual({
      identifier: 'gpt-unknown',
      costTier: 'medium',
      alias: null,
      requiresConfirmation: false,
    })
  })

  it('infers the tier of literal ids and strips the provider prefix', () => {
    expect(resolveModel('anthropic/claude-opus-4-1')).toEqual({
      identifier: 'claude-opus-4-1',
      costTier: 'high',
      alias: null,
      requiresConfirmation: true,
    })
    expect(resolveModel('claude-3-5-haiku-latest').costTier).toBe('low')
  })

  it('rejects unknown names in strict mode', () => {
    expect(() => resolveModel('gpt-unknown', { strict: true })).toThrow(
      expect.objectContaining({ kind: 'UnknownModelAlias' })
    )
    expect(resolveModel('claude-sonnet-4-5', { strict: true }).identifier).toBe('claude-sonnet-4-5')
  })

  it('rejects an empty model', () => {
    expect(() => resolveModel('  ')).toThrow(
      expect.objectContaining({ kind: 'UnknownModelAlias', message: 'Missing model id' })
    )
  })
})
