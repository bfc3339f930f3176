import { open } from 'node:fs/promises'

export const PDF_MEDIA_TYPE = 'application/pdf'
export const MIN_PDF_BYTES = 64

const PDF_HEADER = Buffer.from('%PDF-', 'latin1')
const PDF_TRAILER = Buffer.from('%%EOF', 'latin1')
// Readers look for the trailer within the last 1024 bytes of the file.
const TRAILER_WINDOW_BYTES = 1024

export function hasPdfHeader(bytes: Uint8Array): boolean {
  if (bytes.byteLength < PDF_HEADER.byteLength) return false
  return Buffer.from(bytes.buffer, bytes.byteOffset, PDF_HEADER.byteLength).equals(PDF_HEADER)
}

export function hasPdfTrailer(bytes: Uint8Array): boolean {
  const start = Math.max(0, bytes.byteLength - TRAILER_WINDOW_BYTES)
  return Buffer.from(bytes.buffer, bytes.byteOffset + start, bytes.byteLength - start).includes(
    PDF_TRAILER
  )
}

export type PdfCheck = { ok: true } | { ok: false; reason: string }

export function checkPdfBytes(bytes: Uint8Array): PdfCheck {
  if (bytes.byteLength < MIN_PDF_BYTES) {
    return { ok: false, reason: `only ${bytes.byteLength} bytes` }
  }
  if (!hasPdfHeader(bytes)) return { ok: false, reason: 'missing %PDF- header' }
  if (!hasPdfTrailer(bytes)) return { ok: false, reason: 'missing %%EOF trailer' }
  return { ok: true }
}

/**
 * Reads only the head and tail of a file on disk; a cached PDF cut short by an interrupted
 * download fails the trailer check.
 */
export async function checkPdfFile(filePath: string): Promise<PdfCheck> {
  let handle: Awaited<ReturnType<typeof open>>
  try {
    handle = await open(filePath, 'r')
  } catch {
    return { ok: false, reason: 'missing' }
  }
  try {
    const { size } = await handle.stat()
    if (size < MIN_PDF_BYTES) return { ok: false, reason: `only ${size} bytes` }

    const head = Buffer.alloc(PDF_HEADER.byteLength)
    await handle.read(head, 0, head.byteLength, 0)
    if (!hasPdfHeader(head)) return { ok: false, reason: 'missing %PDF- header' }

    const tailLength = Math.min(size, TRAILER_WINDOW_BYTES)
    const tail = Buffer.alloc(tailLength)
    await handle.read(tail, 0, tailLength, size - tailLength)
    if (!hasPdfTrailer(tail)) return { ok: false, reason: 'missing %%EOF trailer' }
    return { ok: true }
  } finally {
    await handle.close()
  }
}
