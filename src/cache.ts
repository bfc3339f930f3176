import { createHash } from 'node:crypto'
import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'node:fs'
import { isAbsolute, join, resolve as resolvePath } from 'node:path'

import { extractArxivId } from './content/arxiv.js'

export const CACHE_FORMAT_VERSION = 1
export const CACHE_INDEX_FILE = 'index.json'

type CacheIndex = {
  formatVersion: number
  entries: Record<string, { path: string; storedAt: number }>
}

export type PdfCacheStore = {
  dir: string
  get: (key: string) => string | null
  put: (key: string, path: string) => void
  pathForKey: (key: string) => string
  clear: () => number
  stats: () => PdfCacheStats
}

export type PdfCacheStats = {
  dir: string
  files: number
  sizeBytes: number
  indexedEntries: number
}

function resolveHomeDir(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim()
  return home || null
}

export function resolveCacheDir({
  env,
  cachePath,
  cwd,
}: {
  env: Record<string, string | undefined>
  cachePath: string | null
  cwd: string
}): string {
  const home = resolveHomeDir(env)
  const raw = cachePath?.trim()
  if (raw && raw.length > 0) {
    if (raw === '~' || raw.startsWith('~/')) {
      if (!home) return resolvePath(cwd, '.nutshell-cache')
      return resolvePath(raw === '~' ? home : join(home, raw.slice(2)))
    }
    if (isAbsolute(raw)) return raw
    return resolvePath(home ?? cwd, raw)
  }
  if (!home) return resolvePath(cwd, '.nutshell-cache')
  return join(home, '.nutshell', 'cache', 'pdfs')
}

export function hashString(value: string): string {
  return createHash('sha256').update(value).digest('hex')
}

/**
 * File name for a cache key. Deterministic so a lost or stale index still finds the file
 * on the next run.
 */
export function buildCacheFileName(key: string): string {
  const arxivId = extractArxivId(key)
  if (arxivId) return `arxiv-${arxivId}.pdf`
  return `url-${hashString(key).slice(0, 16)}.pdf`
}

function emptyIndex(): CacheIndex {
  return { formatVersion: CACHE_FORMAT_VERSION, entries: {} }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseIndex(raw: string): CacheIndex {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return emptyIndex()
  }
  if (!isRecord(parsed) || parsed.formatVersion !== CACHE_FORMAT_VERSION) return emptyIndex()
  if (!isRecord(parsed.entries)) return emptyIndex()

  const entries: CacheIndex['entries'] = {}
  for (const [key, value] of Object.entries(parsed.entries)) {
    if (!isRecord(value) || typeof value.path !== 'string') continue
    const storedAt = typeof value.storedAt === 'number' ? value.storedAt : 0
    entries[key] = { path: value.path, storedAt }
  }
  return { formatVersion: CACHE_FORMAT_VERSION, entries }
}

export function writeFileAtomic(target: string, data: string | Uint8Array) {
  const tmp = `${target}.${process.pid}.${Date.now().toString(36)}.tmp`
  try {
    writeFileSync(tmp, data)
    renameSync(tmp, target)
  } catch (error) {
    rmSync(tmp, { force: true })
    throw error
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile()
  } catch {
    return false
  }
}

export function createPdfCacheStore({ dir }: { dir: string }): PdfCacheStore {
  const indexPath = join(dir, CACHE_INDEX_FILE)

  const readIndex = (): CacheIndex => {
    try {
      return parseIndex(readFileSync(indexPath, 'utf8'))
    } catch {
      return emptyIndex()
    }
  }

  const pathForKey = (key: string) => join(dir, buildCacheFileName(key))

  const get = (key: string): string | null => {
    const entry = readIndex().entries[key]
    if (entry && isFile(entry.path)) return entry.path
    const fallback = pathForKey(key)
    return isFile(fallback) ? fallback : null
  }

  // Re-reads the index right before writing so a concurrent run's entries survive; the
  // same key written twice keeps whichever rename lands last.
  const put = (key: string, path: string) => {
    mkdirSync(dir, { recursive: true })
    const index = readIndex()
    index.entries[key] = { path, storedAt: Date.now() }
    writeFileAtomic(indexPath, `${JSON.stringify(index, null, 2)}\n`)
  }

  const listPdfFiles = (): string[] => {
    if (!existsSync(dir)) return []
    return readdirSync(dir)
      .filter((name) => name.endsWith('.pdf'))
      .map((name) => join(dir, name))
      .filter(isFile)
  }

  const clear = (): number => {
    const files = listPdfFiles()
    for (const file of files) rmSync(file, { force: true })
    rmSync(indexPath, { force: true })
    return files.length
  }

  const stats = (): PdfCacheStats => {
    const files = listPdfFiles()
    let sizeBytes = 0
    for (const file of files) sizeBytes += statSync(file).size
    return {
      dir,
      files: files.length,
      sizeBytes,
      indexedEntries: Object.keys(readIndex().entries).length,
    }
  }

  return { dir, get, put, pathForKey, clear, stats }
}
