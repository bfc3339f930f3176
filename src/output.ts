import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import type { OperationKind } from './operations.js'

export const TRANSCRIPTION_DISCLAIMER =
  '<!-- This is an AI-generated transcript of a PDF. Certain elements of the original document, such as figures and images, have been replaced with descriptions. -->'

export function formatMarkdownOutput(kind: OperationKind, text: string): string {
  const body = text.endsWith('\n') ? text : `${text}\n`
  return kind === 'transcribe' ? `${TRANSCRIPTION_DISCLAIMER}\n\n${body}` : body
}

export async function writeMarkdownOutput({
  kind,
  text,
  outputPath,
}: {
  kind: OperationKind
  text: string
  outputPath: string
}): Promise<void> {
  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true })
  await writeFile(outputPath, formatMarkdownOutput(kind, text), 'utf8')
}
