const ARXIV_HOSTS = new Set(['arxiv.org', 'www.arxiv.org', 'export.arxiv.org'])
const ARXIV_ID_PATTERN = /^(?<id>\d{4}\.\d{4,5}(?:v\d+)?)$/

export function isArxivHost(hostname: string): boolean {
  return ARXIV_HOSTS.has(hostname.toLowerCase())
}

/**
 * Pulls the paper id out of an arXiv `abs`/`pdf`/`html` URL.
 *
 * Returns null for non-arXiv URLs and for old-style ids (`hep-th/9901001`).
 */
export function extractArxivId(rawUrl: string): string | null {
  let url: URL
  try {
    url = new URL(rawUrl)
  } catch {
    return null
  }
  if (!isArxivHost(url.hostname)) return null

  const path = url.pathname.replace(/\/+$/, '')
  const match = path.match(/^\/(?:abs|pdf|html)\/(.+)$/)
  const rawId = match?.[1]
  if (!rawId) return null

  const id = rawId.replace(/\.(pdf|html)$/i, '')
  return ARXIV_ID_PATTERN.exec(id)?.groups?.id ?? null
}

export function getArxivPdfUrl(id: string): string {
  return `https://arxiv.org/pdf/${id}`
}
