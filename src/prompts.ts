import { existsSync, readFileSync, statSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { NutshellError } from './errors.js'

const moduleDir = path.dirname(fileURLToPath(import.meta.url))

// src/prompts.ts when run from source, dist/src/prompts.js once built.
const SOURCE_PROMPT_DIR = path.resolve(moduleDir, '..', 'prompts')
const BUILT_PROMPT_DIR = path.resolve(moduleDir, '..', '..', 'prompts')

export function resolveBundledPromptDir(): string {
  if (existsSync(SOURCE_PROMPT_DIR)) return SOURCE_PROMPT_DIR
  return existsSync(BUILT_PROMPT_DIR) ? BUILT_PROMPT_DIR : SOURCE_PROMPT_DIR
}

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile()
  } catch {
    return false
  }
}

/**
 * Resolves a prompt by name. An existing file path is read directly; anything else is looked
 * up in the bundled prompts directory.
 */
export function loadPromptTemplate(
  name: string,
  {
    promptDir = resolveBundledPromptDir(),
    cwd = process.cwd(),
  }: { promptDir?: string; cwd?: string } = {}
): { path: string; text: string } {
  const trimmed = name.trim()
  if (trimmed.length === 0) throw new NutshellError('PromptNotFound', 'Missing prompt name')

  const direct = path.resolve(cwd, trimmed)
  const promptPath = isFile(direct) ? direct : path.join(promptDir, trimmed)
  if (!isFile(promptPath)) {
    throw new NutshellError('PromptNotFound', `Prompt file not found: ${promptPath}`)
  }
  const text = readFileSync(promptPath, 'utf8')
  if (text.trim().length === 0) {
    throw new NutshellError('PromptNotFound', `Prompt file is empty: ${promptPath}`)
  }
  return { path: promptPath, text }
}
