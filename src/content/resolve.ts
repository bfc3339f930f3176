import { statSync } from 'node:fs'
import type { Logger } from 'tslog'

import type { PdfCacheStore } from '../cache.js'
import { createFileNotFoundError } from '../errors.js'
import { downloadPdf } from './download.js'
import { checkPdfFile } from './pdf.js'
import { classifyReference, normalizeRemoteUrl, type ResourceReference } from './reference.js'

export type CacheStatus = 'local' | 'hit' | 'miss' | 'refetch'

export type ResolvedResource = {
  reference: ResourceReference
  path: string
  cacheStatus: CacheStatus
  cacheKey: string | null
}

export type ResourceResolverDeps = {
  cache: PdfCacheStore
  fetchImpl: typeof fetch
  timeoutMs: number
  logger?: Logger<Record<string, unknown>> | null
}

function isExistingFile(path: string): boolean {
  try {
    return statSync(path).isFile()
  } catch {
    return false
  }
}

export async function resolveResource(
  input: string | ResourceReference,
  deps: ResourceResolverDeps
): Promise<ResolvedResource> {
  const reference = typeof input === 'string' ? classifyReference(input) : input
  if (reference.kind === 'local') {
    if (!isExistingFile(reference.path)) throw createFileNotFoundError(reference.path)
    return { reference, path: reference.path, cacheStatus: 'local', cacheKey: null }
  }
  return await resolveRemote(reference, deps)
}

async function resolveRemote(
  reference: Extract<ResourceReference, { kind: 'remote' }>,
  { cache, fetchImpl, timeoutMs, logger }: ResourceResolverDeps
): Promise<ResolvedResource> {
  const cacheKey = normalizeRemoteUrl(reference.url)
  const cachedPath = cache.get(cacheKey)

  let cacheStatus: CacheStatus = 'miss'
  if (cachedPath) {
    const check = await checkPdfFile(cachedPath)
    if (check.ok) {
      logger?.debug('cache hit', { key: cacheKey, path: cachedPath })
      return { reference, path: cachedPath, cacheStatus: 'hit', cacheKey }
    }
    logger?.warn('cached PDF failed validation; downloading again', {
      key: cacheKey,
      path: cachedPath,
      reason: check.reason,
    })
    cacheStatus = 'refetch'
  }

  const destination = cache.pathForKey(cacheKey)
  logger?.info('downloading PDF', { url: reference.url, key: cacheKey, destination })
  const downloaded = await downloadPdf({ url: cacheKey, destination, fetchImpl, timeoutMs })
  cache.put(cacheKey, downloaded.path)
  logger?.debug('cached PDF', { key: cacheKey, sizeBytes: downloaded.sizeBytes })
  return { reference, path: downloaded.path, cacheStatus, cacheKey }
}
