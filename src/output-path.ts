import path from 'node:path'

import { extractArxivId } from './content/arxiv.js'
import { formatReference, type ResourceReference } from './content/reference.js'
import { createUnderivablePathError } from './errors.js'
import { OPERATIONS, type OperationKind } from './operations.js'

function stripExtension(fileName: string): string {
  const ext = path.extname(fileName)
  return ext && ext !== fileName ? fileName.slice(0, -ext.length) : fileName
}

function stemFromUrl(rawUrl: string): string | null {
  const arxivId = extractArxivId(rawUrl)
  if (arxivId) return arxivId

  const url = new URL(rawUrl)
  const segments = url.pathname.split('/').filter((segment) => segment.length > 0)
  const last = segments.at(-1)
  if (!last) return null

  let decoded: string
  try {
    decoded = decodeURIComponent(last)
  } catch {
    decoded = last
  }
  // A decoded segment may carry separators; keep the output inside cwd.
  const stem = stripExtension(decoded.replace(/[/\\]/g, '_')).trim()
  return stem.length > 0 && stem !== '.' && stem !== '..' ? stem : null
}

/**
 * Default output path: local PDFs get a sibling file, remote PDFs land in `cwd`.
 */
export function deriveOutputPath(
  reference: ResourceReference,
  kind: OperationKind,
  { cwd }: { cwd: string }
): string {
  const suffix = OPERATIONS[kind].outputSuffix
  if (reference.kind === 'local') {
    const parsed = path.parse(reference.path)
    if (!parsed.name) throw createUnderivablePathError(reference.path)
    return path.join(parsed.dir, `${parsed.name}${suffix}`)
  }

  const stem = stemFromUrl(reference.url)
  if (!stem) throw createUnderivablePathError(formatReference(reference))
  return path.join(cwd, `${stem}${suffix}`)
}
