import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { Logger } from 'tslog'

import { createPdfCacheStore, resolveCacheDir } from '../cache.js'
import {
  type NutshellConfig,
  resolveAnthropicApiKey,
  resolveAnthropicBaseUrl,
} from '../config.js'
import { PDF_MEDIA_TYPE } from '../content/pdf.js'
import {
  classifyReference,
  formatReference,
  type ResourceReference,
} from '../content/reference.js'
import { resolveResource } from '../content/resolve.js'
import { NutshellError } from '../errors.js'
import { DEFAULT_MODEL_TIMEOUT, DEFAULT_TIMEOUT, parseDurationMs } from '../flags.js'
import { completeAnthropicDocument } from '../llm/providers/anthropic.js'
import { DEFAULT_MODEL_ALIAS, resolveModel } from '../model-spec.js'
import { OPERATIONS, type OperationKind } from '../operations.js'
import { writeMarkdownOutput } from '../output.js'
import { deriveOutputPath } from '../output-path.js'
import { calculateCostUsd } from '../pricing.js'
import { loadPromptTemplate } from '../prompts.js'
import type { ConfirmFn } from './confirm.js'

export type PaperOptions = {
  output: string | null
  model: string | null
  prompt: string
  yes: boolean
  strictModel: boolean
  downloadTimeoutMs: number
  modelTimeoutMs: number
}

function readString(options: Record<string, unknown>, key: string): string | null {
  const value = options[key]
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null
}

export function parsePaperOptions(
  kind: OperationKind,
  options: Record<string, unknown>
): PaperOptions {
  return {
    output: readString(options, 'output'),
    model: readString(options, 'model'),
    prompt: readString(options, 'prompt') ?? OPERATIONS[kind].defaultPrompt,
    yes: options.yes === true,
    strictModel: options.strictModel === true,
    downloadTimeoutMs: parseDurationMs(readString(options, 'timeout') ?? DEFAULT_TIMEOUT),
    modelTimeoutMs: parseDurationMs(
      readString(options, 'modelTimeout') ?? DEFAULT_MODEL_TIMEOUT,
      '--model-timeout'
    ),
  }
}

const HIGH_COST_WARNING = [
  '⚠ Warning: Opus models are very expensive and may not provide',
  'significant benefits for summarization/transcription tasks.',
  "Consider using 'sonnet' or 'haiku' instead.",
].join('\n')

function anchorReference(reference: ResourceReference, cwd: string): ResourceReference {
  return reference.kind === 'local'
    ? { kind: 'local', path: path.resolve(cwd, reference.path) }
    : reference
}

/**
 * Summarize or transcribe one PDF: pick the model (asking first when it is expensive),
 * resolve the reference to a local file, send it with the prompt, and write the Markdown.
 * Returns false when the user declined the confirmation.
 */
export async function runPaperOperation({
  kind,
  rawReference,
  options,
  config,
  env,
  cwd,
  fetchImpl,
  confirm,
  stdout,
  stderr,
  logger,
}: {
  kind: OperationKind
  rawReference: string
  options: PaperOptions
  config: NutshellConfig | null
  env: Record<string, string | undefined>
  cwd: string
  fetchImpl: typeof fetch
  confirm: ConfirmFn
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  logger: Logger<Record<string, unknown>>
}): Promise<boolean> {
  const operation = OPERATIONS[kind]
  const modelToken = options.model ?? config?.model ?? DEFAULT_MODEL_ALIAS
  const model = resolveModel(modelToken, { strict: options.strictModel })
  logger.debug('resolved model', { token: modelToken, ...model })

  if (model.requiresConfirmation && !options.yes) {
    stderr.write(`\n${HIGH_COST_WARNING}\n\n`)
    if (!(await confirm('Continue with opus? (y/N): '))) {
      stdout.write('Aborted.\n')
      return false
    }
  }

  const apiKey = resolveAnthropicApiKey({ config, env })
  if (!apiKey) {
    throw new NutshellError(
      'MissingApiKey',
      'Missing Anthropic API key: set ANTHROPIC_API_KEY or anthropic.apiKey in ' +
        '~/.nutshell/config.json'
    )
  }

  const reference = anchorReference(classifyReference(rawReference), cwd)
  const outputPath = options.output
    ? path.resolve(cwd, options.output)
    : deriveOutputPath(reference, kind, { cwd })

  const cache = createPdfCacheStore({
    dir: resolveCacheDir({ env, cachePath: config?.cache?.path ?? null, cwd }),
  })
  const resource = await resolveResource(reference, {
    cache,
    fetchImpl,
    timeoutMs: options.downloadTimeoutMs,
    logger,
  })
  logger.info('resolved PDF', {
    reference: formatReference(reference),
    path: resource.path,
    cacheStatus: resource.cacheStatus,
  })

  const prompt = loadPromptTemplate(options.prompt, { cwd })

  stdout.write(`Processing: ${formatReference(reference)}\n`)
  stdout.write(`Using model: ${model.identifier}\n`)
  stdout.write(`Using prompt: ${options.prompt}\n`)

  const bytes = new Uint8Array(await readFile(resource.path))
  const result = await completeAnthropicDocument({
    modelId: model.identifier,
    apiKey,
    prompt: { text: prompt.text, document: { bytes, mediaType: PDF_MEDIA_TYPE } },
    maxOutputTokens: operation.maxOutputTokens,
    timeoutMs: options.modelTimeoutMs,
    fetchImpl,
    baseUrl: resolveAnthropicBaseUrl({ config, env }),
  })
  logger.info('model response', { model: model.identifier, usage: result.usage })

  await writeMarkdownOutput({ kind, text: result.text, outputPath })
  stdout.write(`✓ ${operation.label} saved to: ${outputPath}\n`)

  const usage = result.usage
  if (usage && usage.promptTokens !== null && usage.completionTokens !== null) {
    const input = usage.promptTokens.toLocaleString('en-US')
    const output = usage.completionTokens.toLocaleString('en-US')
    stdout.write(`\nTokens: ${input} in, ${output} out\n`)
    const cost = calculateCostUsd(model.identifier, usage)
    if (cost !== null) stdout.write(`Cost: $${cost.toFixed(4)}\n`)
  }
  return true
}
