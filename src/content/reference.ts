import { NutshellError } from '../errors.js'
import { extractArxivId, getArxivPdfUrl } from './arxiv.js'

export type ResourceReference = { kind: 'local'; path: string } | { kind: 'remote'; url: string }

const TRACKING_PARAM_PATTERN = /^utm_/i

export function classifyReference(raw: string): ResourceReference {
  const trimmed = raw.trim()
  if (trimmed.length === 0) throw new NutshellError('FileNotFound', 'Missing PDF path or URL')

  let url: URL | null = null
  try {
    url = new URL(trimmed)
  } catch {
    url = null
  }
  if (url && (url.protocol === 'http:' || url.protocol === 'https:')) {
    return { kind: 'remote', url: url.toString() }
  }
  return { kind: 'local', path: trimmed }
}

/**
 * Cache key for a remote PDF. arXiv links collapse onto their canonical pdf URL so
 * `abs/…`, `pdf/….pdf` and `www.` variants share one cached file; other URLs only lose
 * their fragment and `utm_*` parameters.
 */
export function normalizeRemoteUrl(rawUrl: string): string {
  const arxivId = extractArxivId(rawUrl)
  if (arxivId) return getArxivPdfUrl(arxivId)

  const url = new URL(rawUrl)
  url.hash = ''
  for (const name of Array.from(url.searchParams.keys())) {
    if (TRACKING_PARAM_PATTERN.test(name)) url.searchParams.delete(name)
  }
  return url.toString()
}

export function formatReference(reference: ResourceReference): string {
  return reference.kind === 'local' ? reference.path : reference.url
}
