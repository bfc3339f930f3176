import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import { NutshellError } from './errors.js'

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type AnthropicConfig = {
  /**
   * API key used instead of `ANTHROPIC_API_KEY` when set.
   */
  apiKey?: string
  /**
   * Override the Anthropic API base URL (e.g. a proxy).
   *
   * Prefer env `ANTHROPIC_BASE_URL` when you need per-run overrides.
   */
  baseUrl?: string
}

export type NutshellConfig = {
  /**
   * Default model alias or id for both subcommands (e.g. "haiku", "claude-sonnet-4-5").
   */
  model?: string
  anthropic?: AnthropicConfig
  cache?: {
    /**
     * Directory holding downloaded PDFs. `~/` is expanded; relative paths resolve against HOME.
     */
    path?: string
  }
  logging?: LoggingConfig
}

export const DEFAULT_ANTHROPIC_BASE_URL = 'https://api.anthropic.com'

function configError(path: string, detail: string): NutshellError {
  return new NutshellError('ConfigError', `Invalid config file ${path}: ${detail}`)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseOptionalString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string') throw configError(path, `"${label}" must be a string.`)
  const trimmed = raw.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function parseOptionalPositiveNumber(
  raw: unknown,
  path: string,
  label: string
): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0) {
    throw configError(path, `"${label}" must be a positive number.`)
  }
  return raw
}

function parseLoggingLevel(raw: unknown, path: string): LoggingLevel {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value
  throw configError(path, '"logging.level" must be one of "debug", "info", "warn", "error".')
}

function parseLoggingFormat(raw: unknown, path: string): LoggingFormat {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (value === 'json' || value === 'pretty') return value
  throw configError(path, '"logging.format" must be one of "json" or "pretty".')
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw configError(path, `comments are not allowed (found /${next} at ${line}:${col}).`)
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  return home ? join(home, '.nutshell', 'config.json') : null
}

export function loadNutshellConfig({ env }: { env: Record<string, string | undefined> }): {
  config: NutshellConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  assertNoComments(raw, path)
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new NutshellError('ConfigError', `Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw configError(path, 'expected an object at the top level')
  }

  const model = parseOptionalString(parsed.model, path, 'model')

  const anthropic = (() => {
    const value = parsed.anthropic
    if (typeof value === 'undefined') return undefined
    if (!isRecord(value)) throw configError(path, '"anthropic" must be an object.')
    const apiKey = parseOptionalString(value.apiKey, path, 'anthropic.apiKey')
    const baseUrl = parseOptionalString(value.baseUrl, path, 'anthropic.baseUrl')
    return apiKey || baseUrl
      ? { ...(apiKey ? { apiKey } : {}), ...(baseUrl ? { baseUrl } : {}) }
      : undefined
  })()

  const cache = (() => {
    const value = parsed.cache
    if (typeof value === 'undefined') return undefined
    if (!isRecord(value)) throw configError(path, '"cache" must be an object.')
    const cachePath = parseOptionalString(value.path, path, 'cache.path')
    return cachePath ? { path: cachePath } : undefined
  })()

  const logging = (() => {
    const value = parsed.logging
    if (typeof value === 'undefined') return undefined
    if (!isRecord(value)) throw configError(path, '"logging" must be an object.')
    if (typeof value.enabled !== 'undefined' && typeof value.enabled !== 'boolean') {
      throw configError(path, '"logging.enabled" must be a boolean.')
    }
    const enabled = value.enabled
    const level =
      typeof value.level === 'undefined' ? undefined : parseLoggingLevel(value.level, path)
    const format =
      typeof value.format === 'undefined' ? undefined : parseLoggingFormat(value.format, path)
    const file = parseOptionalString(value.file, path, 'logging.file')
    const maxMb = parseOptionalPositiveNumber(value.maxMb, path, 'logging.maxMb')
    const maxFilesRaw = parseOptionalPositiveNumber(value.maxFiles, path, 'logging.maxFiles')
    const maxFiles =
      typeof maxFilesRaw === 'number' ? Math.max(1, Math.trunc(maxFilesRaw)) : undefined
    const out: LoggingConfig = {
      ...(typeof enabled === 'boolean' ? { enabled } : {}),
      ...(level ? { level } : {}),
      ...(format ? { format } : {}),
      ...(file ? { file } : {}),
      ...(typeof maxMb === 'number' ? { maxMb } : {}),
      ...(typeof maxFiles === 'number' ? { maxFiles } : {}),
    }
    return Object.keys(out).length > 0 ? out : undefined
  })()

  return {
    config: {
      ...(model ? { model } : {}),
      ...(anthropic ? { anthropic } : {}),
      ...(cache ? { cache } : {}),
      ...(logging ? { logging } : {}),
    },
    path,
  }
}

/**
 * The config file wins over the environment for credentials.
 */
export function resolveAnthropicApiKey({
  config,
  env,
}: {
  config: NutshellConfig | null
  env: Record<string, string | undefined>
}): string | null {
  const fromConfig = config?.anthropic?.apiKey
  if (fromConfig) return fromConfig
  const fromEnv = env.ANTHROPIC_API_KEY?.trim()
  return fromEnv ? fromEnv : null
}

export function resolveAnthropicBaseUrl({
  config,
  env,
}: {
  config: NutshellConfig | null
  env: Record<string, string | undefined>
}): string {
  return (
    config?.anthropic?.baseUrl ?? (env.ANTHROPIC_BASE_URL?.trim() || DEFAULT_ANTHROPIC_BASE_URL)
  )
}
