import { existsSync, mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { createRingFileWriter } from '../src/logging/ring-file.js'

describe('ring file writer', () => {
  it('rotates when size exceeds max bytes', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-ring-'))
    const filePath = join(dir, 'nutshell.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 40, maxFiles: 2 })

    writer.write('first-line-1234567890')
    writer.write('second-line-1234567890')
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe('second-line-1234567890\n')
    expect(readFileSync(`${filePath}.1`, 'utf8')).toBe('first-line-1234567890\n')
    expect(writer.lastError()).toBeNull()
  })

  it('drops the oldest generation', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-ring-'))
    const filePath = join(dir, 'logs', 'nutshell.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 10, maxFiles: 2 })

    writer.write('one-123456')
    writer.write('two-123456')
    writer.write('three-1234')
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe('three-1234\n')
    expect(readFileSync(`${filePath}.1`, 'utf8')).toBe('two-123456\n')
    expect(existsSync(`${filePath}.2`)).toBe(false)
  })

  it('truncates in place when only one file is kept', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-ring-'))
    const filePath = join(dir, 'nutshell.jsonl')
    const writer = createRingFileWriter({ filePath, maxBytes: 10, maxFiles: 1 })

    writer.write('one-123456')
    writer.write('two-123456')
    await writer.flush()

    expect(readFileSync(filePath, 'utf8')).toBe('two-123456\n')
    expect(existsSync(`${filePath}.1`)).toBe(false)
  })
})
