import { CommanderError } from 'commander'

import { createPdfCacheStore, resolveCacheDir } from '../cache.js'
import { loadNutshellConfig, type NutshellConfig } from '../config.js'
import { createRunLogger, type RunLogger } from '../logging/logger.js'
import { MODEL_ALIASES } from '../model-spec.js'
import { resolveModelPricing } from '../pricing.js'
import { resolvePackageVersion } from '../version.js'
import { type ConfirmFn, createStreamConfirm } from './confirm.js'
import { buildProgram } from './help.js'
import { parsePaperOptions, runPaperOperation } from './process-paper.js'

export type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  confirm?: ConfirmFn
  stdin?: NodeJS.ReadableStream
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function formatModelTable(): string {
  const rows = Object.entries(MODEL_ALIASES).map(([alias, spec]) => {
    const pricing = resolveModelPricing(spec.identifier)
    const price = pricing
      ? `$${pricing.inputPerMillion}/$${pricing.outputPerMillion} per MTok`
      : '-'
    return `${alias.padEnd(14)}${spec.identifier.padEnd(30)}${spec.costTier.padEnd(8)}${price}`
  })
  const header = `${'alias'.padEnd(14)}${'model'.padEnd(30)}${'tier'.padEnd(8)}price (in/out)`
  return `${header}\n${rows.join('\n')}\n`
}

export async function runCli(
  argv: string[],
  { env, fetch, stdout, stderr, cwd = process.cwd(), confirm, stdin }: RunEnv
): Promise<void> {
  const ask = confirm ?? createStreamConfirm({ input: stdin ?? process.stdin, output: stderr })

  // Loaded on first use; --version, --help and `models` never read it.
  let loaded: NutshellConfig | null | undefined
  const readConfig = (): NutshellConfig | null => {
    if (loaded === undefined) loaded = loadNutshellConfig({ env }).config
    return loaded
  }

  let runLogger: RunLogger | null = null
  const openLogger = (config: NutshellConfig | null, verbose: boolean) => {
    runLogger = createRunLogger({ env, config, verbose, stderr })
    return runLogger.logger
  }
  const openCache = () =>
    createPdfCacheStore({
      dir: resolveCacheDir({ env, cachePath: readConfig()?.cache?.path ?? null, cwd }),
    })

  const program = buildProgram({
    version: resolvePackageVersion(),
    stdout,
    stderr,
    handlers: {
      process: async (kind, reference, rawOptions) => {
        const options = parsePaperOptions(kind, rawOptions)
        const config = readConfig()
        const logger = openLogger(config, rawOptions.verbose === true)
        logger.info('run started', { kind, reference, model: options.model })
        await runPaperOperation({
          kind,
          rawReference: reference,
          options,
          config,
          env,
          cwd,
          fetchImpl: fetch,
          confirm: ask,
          stdout,
          stderr,
          logger,
        })
      },
      cacheStats: async () => {
        const stats = openCache().stats()
        stdout.write(`Cache: ${stats.dir}\n`)
        stdout.write(`Files: ${stats.files}\n`)
        stdout.write(`Size: ${formatBytes(stats.sizeBytes)}\n`)
      },
      cacheClear: async (rawOptions) => {
        const cache = openCache()
        if (rawOptions.yes !== true && !(await ask(`Delete every PDF in ${cache.dir}? (y/N): `))) {
          stdout.write('Aborted.\n')
          return
        }
        const removed = cache.clear()
        stdout.write(`Removed ${removed} cached PDF${removed === 1 ? '' : 's'}.\n`)
      },
      models: async () => {
        stdout.write(formatModelTable())
      },
    },
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    // Help and --version exit through commander with code 0.
    if (error instanceof CommanderError && error.exitCode === 0) return
    throw error
  } finally {
    await flushLogger(runLogger)
  }
}

async function flushLogger(runLogger: RunLogger | null) {
  if (runLogger) await runLogger.flush()
}
