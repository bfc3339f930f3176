import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
}

export type RingFileWriter = {
  write: (line: string) => void
  flush: () => Promise<void>
  /** First write failure, if any. Later writes keep trying. */
  lastError: () => unknown
}

const normalizeMaxFiles = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1

const normalizeMaxBytes = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1024

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size
  } catch {
    return 0
  }
}

async function removeIfPresent(filePath: string) {
  await fs.rm(filePath, { force: true })
}

// log -> log.1 -> log.2 ...; the oldest generation falls off the end.
async function rotate(filePath: string, maxFiles: number) {
  if (maxFiles <= 1) {
    await fs.writeFile(filePath, '', 'utf8')
    return
  }
  await removeIfPresent(`${filePath}.${maxFiles - 1}`)
  for (let i = maxFiles - 2; i >= 0; i -= 1) {
    const src = i === 0 ? filePath : `${filePath}.${i}`
    try {
      await fs.rename(src, `${filePath}.${i + 1}`)
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error
    }
  }
}

export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const filePath = options.filePath
  const maxBytes = normalizeMaxBytes(options.maxBytes)
  const maxFiles = normalizeMaxFiles(options.maxFiles)
  let chain: Promise<void> = fs.mkdir(path.dirname(filePath), { recursive: true }).then(() => {})
  let firstError: unknown = null

  const enqueue = (task: () => Promise<void>) => {
    chain = chain.then(task).catch((error: unknown) => {
      firstError ??= error
    })
  }

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    enqueue(async () => {
      const currentSize = await fileSize(filePath)
      if (currentSize > 0 && currentSize + bytes > maxBytes) {
        await rotate(filePath, maxFiles)
      }
      await fs.appendFile(filePath, normalized, 'utf8')
    })
  }

  const flush = async () => await chain

  return { write, flush, lastError: () => firstError }
}
