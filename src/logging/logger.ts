import path from 'node:path'

import { Logger } from 'tslog'

import type { LoggingFormat, LoggingLevel, NutshellConfig } from '../config.js'
import { createRingFileWriter, type RingFileWriter } from './ring-file.js'

export type ResolvedLoggingConfig = {
  level: LoggingLevel
  format: LoggingFormat
  file: string
  maxBytes: number
  maxFiles: number
}

export type RunLogger = {
  logger: Logger<Record<string, unknown>>
  file: ResolvedLoggingConfig | null
  flush: () => Promise<void>
}

const DEFAULT_LOG_LEVEL: LoggingLevel = 'info'
const DEFAULT_LOG_FORMAT: LoggingFormat = 'json'
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

const LOG_LEVEL_MAP: Record<LoggingLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

export function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

export function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(
      args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' ')
    )
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

export function resolveLoggingConfig({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: NutshellConfig | null
}): ResolvedLoggingConfig | null {
  const logging = config?.logging
  if (!logging || logging.enabled !== true) return null

  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  const file =
    logging.file ?? (home ? path.join(home, '.nutshell', 'logs', 'nutshell.jsonl') : null)
  if (!file) return null

  return {
    level: logging.level ?? DEFAULT_LOG_LEVEL,
    format: logging.format ?? DEFAULT_LOG_FORMAT,
    file,
    maxBytes: Math.trunc((logging.maxMb ?? DEFAULT_LOG_MAX_MB) * 1024 * 1024),
    maxFiles: logging.maxFiles ?? DEFAULT_LOG_MAX_FILES,
  }
}

/**
 * Logger for one CLI run. Writes to the rotating log file when `logging.enabled` is set in
 * the config, and mirrors pretty lines to stderr under `--verbose` (which also drops the
 * level to debug). With neither, log calls are no-ops.
 */
export function createRunLogger({
  env,
  config,
  verbose,
  stderr,
}: {
  env: Record<string, string | undefined>
  config: NutshellConfig | null
  verbose: boolean
  stderr: NodeJS.WritableStream
}): RunLogger {
  const file = resolveLoggingConfig({ env, config })
  const writer: RingFileWriter | null = file
    ? createRingFileWriter({
        filePath: file.file,
        maxBytes: file.maxBytes,
        maxFiles: file.maxFiles,
      })
    : null

  const baseSettings = {
    name: 'nutshell',
    minLevel: verbose ? LOG_LEVEL_MAP.debug : LOG_LEVEL_MAP[file?.level ?? DEFAULT_LOG_LEVEL],
    hideLogPositionForProduction: true,
    stylePrettyLogs: false,
    metaProperty: '_meta',
  }

  const emit = (line: string) => {
    writer?.write(line)
    if (verbose) stderr.write(line.endsWith('\n') ? line : `${line}\n`)
  }

  const logger = !writer && !verbose
    ? new Logger<Record<string, unknown>>({ ...baseSettings, type: 'hidden' })
    : file?.format === 'json'
      ? new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'json',
          overwrite: {
            transportJSON: (json) => emit(safeJsonStringify(json)),
          },
        })
      : new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'pretty',
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) =>
              emit(formatPrettyLine({ metaMarkup, args, errors })),
          },
        })

  return {
    logger,
    file,
    flush: async () => {
      await writer?.flush()
    },
  }
}
