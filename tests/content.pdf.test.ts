import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { checkPdfBytes, checkPdfFile, hasPdfHeader } from '../src/content/pdf.js'
import { makePdfBytes, makeTruncatedPdfBytes } from './helpers/fixtures.js'

describe('pdf checks', () => {
  it('accepts a complete document', () => {
    expect(checkPdfBytes(makePdfBytes())).toEqual({ ok: true })
  })

  it('reports why a buffer is not a usable pdf', () => {
    expect(checkPdfBytes(new Uint8Array(10))).toEqual({ ok: false, reason: 'only 10 bytes' })
    expect(checkPdfBytes(new Uint8Array(Buffer.from(`<html>${'x'.repeat(80)}</html>`)))).toEqual({
      ok: false,
      reason: 'missing %PDF- header',
    })
    expect(checkPdfBytes(makeTruncatedPdfBytes())).toEqual({
      ok: false,
      reason: 'missing %%EOF trailer',
    })
  })

  it('checks the header on short buffers', () => {
    expect(hasPdfHeader(new Uint8Array(Buffer.from('%PD')))).toBe(false)
    expect(hasPdfHeader(new Uint8Array(Buffer.from('%PDF-1.7')))).toBe(true)
  })

  it('validates files on disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-pdf-'))
    const good = join(dir, 'good.pdf')
    const truncated = join(dir, 'truncated.pdf')
    writeFileSync(good, makePdfBytes())
    writeFileSync(truncated, makeTruncatedPdfBytes())

    await expect(checkPdfFile(good)).resolves.toEqual({ ok: true })
    await expect(checkPdfFile(truncated)).resolves.toEqual({
      ok: false,
      reason: 'missing %%EOF trailer',
    })
    await expect(checkPdfFile(join(dir, 'absent.pdf'))).resolves.toEqual({
      ok: false,
      reason: 'missing',
    })
  })
})
