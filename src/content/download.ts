import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

import mime from 'mime'

import { writeFileAtomic } from '../cache.js'
import {
  createDownloadError,
  createUnsupportedContentError,
  formatErrorMessage,
  isNutshellError,
} from '../errors.js'
import { checkPdfBytes, hasPdfHeader } from './pdf.js'

// Servers that do not know better label PDFs with one of these.
const GENERIC_BINARY_TYPES = new Set([
  'application/octet-stream',
  'binary/octet-stream',
  'application/download',
])

export async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal })
  } finally {
    clearTimeout(timeout)
  }
}

function parseContentType(header: string | null): string | null {
  const base = header?.split(';')[0]?.trim().toLowerCase()
  return base ? base : null
}

export function isPdfContentType(contentType: string | null): boolean {
  if (!contentType) return true
  if (GENERIC_BINARY_TYPES.has(contentType)) return true
  return mime.getExtension(contentType) === 'pdf'
}

export type DownloadedPdf = {
  path: string
  sizeBytes: number
  contentType: string | null
}

/**
 * Downloads `url` into `destination`. The body lands under a temporary name first and is
 * renamed into place once it has passed the PDF checks.
 */
export async function downloadPdf({
  url,
  destination,
  fetchImpl,
  timeoutMs,
}: {
  url: string
  destination: string
  fetchImpl: typeof fetch
  timeoutMs: number
}): Promise<DownloadedPdf> {
  let response: Response
  let bytes: Uint8Array
  try {
    response = await fetchWithTimeout(
      fetchImpl,
      url,
      { headers: { Accept: 'application/pdf,*/*;q=0.8' }, redirect: 'follow' },
      timeoutMs
    )
    if (!response.ok) {
      throw createDownloadError(url, `HTTP ${response.status}`)
    }
    bytes = new Uint8Array(await response.arrayBuffer())
  } catch (error) {
    if (isNutshellError(error)) throw error
    if (error instanceof Error && error.name === 'AbortError') {
      throw createDownloadError(url, `timed out after ${timeoutMs}ms`, { cause: error })
    }
    throw createDownloadError(url, formatErrorMessage(error), { cause: error })
  }

  const contentType = parseContentType(response.headers.get('content-type'))
  if (!isPdfContentType(contentType)) {
    throw createUnsupportedContentError(url, `content-type ${contentType}`)
  }
  if (!hasPdfHeader(bytes)) {
    throw createUnsupportedContentError(url, 'missing %PDF- header')
  }
  const check = checkPdfBytes(bytes)
  if (!check.ok) {
    throw createDownloadError(url, `incomplete PDF (${check.reason})`)
  }

  mkdirSync(dirname(destination), { recursive: true })
  writeFileAtomic(destination, bytes)
  return { path: destination, sizeBytes: bytes.byteLength, contentType }
}
