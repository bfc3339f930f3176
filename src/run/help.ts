import { Command, Option } from 'commander'

import { DEFAULT_MODEL_TIMEOUT, DEFAULT_TIMEOUT } from '../flags.js'
import { MODEL_ALIASES } from '../model-spec.js'
import { OPERATIONS, type OperationKind } from '../operations.js'

export type ProgramHandlers = {
  process: (
    kind: OperationKind,
    reference: string,
    options: Record<string, unknown>
  ) => Promise<void>
  cacheStats: (options: Record<string, unknown>) => Promise<void>
  cacheClear: (options: Record<string, unknown>) => Promise<void>
  models: () => Promise<void>
}

const MODEL_HELP = `Model: ${Object.keys(MODEL_ALIASES).join(', ')}, or a full model id (default: sonnet; configurable in ~/.nutshell/config.json via "model")`

function addProcessCommand(
  program: Command,
  {
    name,
    kind,
    description,
    hidden,
    handlers,
  }: {
    name: string
    kind: OperationKind
    description: string
    hidden?: boolean
    handlers: ProgramHandlers
  }
) {
  const operation = OPERATIONS[kind]
  const noun = kind === 'summarize' ? 'summary' : 'transcription'
  program
    .command(name, { hidden: hidden === true })
    .description(description)
    .argument('<reference>', `Path or URL to the PDF to ${kind}`)
    .option(
      '-o, --output <path>',
      `Output path for the ${noun} (default: <pdf_name>${operation.outputSuffix})`
    )
    .option('-m, --model <model>', MODEL_HELP)
    .option(
      '-p, --prompt <name>',
      `Prompt file from prompts/ or a path to one (default: ${operation.defaultPrompt})`,
      operation.defaultPrompt
    )
    .option('-y, --yes', 'Skip the confirmation asked before using an expensive model', false)
    .option(
      '--strict-model',
      'Reject model names that are neither an alias nor a claude-… id',
      false
    )
    .option(
      '--timeout <duration>',
      'Timeout for the PDF download: 30 (seconds), 30s, 2m, 5000ms',
      DEFAULT_TIMEOUT
    )
    .option(
      '--model-timeout <duration>',
      'Timeout for the model request; transcriptions of long papers take minutes',
      DEFAULT_MODEL_TIMEOUT
    )
    .option('--verbose', 'Print debug logs to stderr', false)
    .action(async (reference: string, options: Record<string, unknown>) => {
      await handlers.process(kind, reference, options)
    })
}

export function buildProgram({
  version,
  stdout,
  stderr,
  handlers,
}: {
  version: string
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  handlers: ProgramHandlers
}): Command {
  // Output and exit settings must be in place before subcommands are added; they copy them.
  const program = new Command()
    .name('nutshell')
    .description('Research paper assistant: summarize or transcribe PDFs with Claude.')
    .configureOutput({
      writeOut(str) {
        stdout.write(str)
      },
      writeErr(str) {
        stderr.write(str)
      },
    })
    .exitOverride()
    .version(version, '-V, --version', 'Print version and exit')

  addProcessCommand(program, {
    name: 'summarize',
    kind: 'summarize',
    description: 'Summarize a research paper',
    handlers,
  })
  addProcessCommand(program, {
    name: 'summarise',
    kind: 'summarize',
    description: 'Summarize a research paper (British spelling)',
    hidden: true,
    handlers,
  })
  addProcessCommand(program, {
    name: 'transcribe',
    kind: 'transcribe',
    description: 'Create a full transcription of a research paper',
    handlers,
  })

  const cache = program.command('cache').description('Inspect or clear the downloaded-PDF cache')
  cache
    .command('stats')
    .description('Print the cache location, file count and size')
    .action(async (options: Record<string, unknown>) => {
      await handlers.cacheStats(options)
    })
  cache
    .command('clear')
    .description('Delete every cached PDF')
    .addOption(new Option('-y, --yes', 'Do not ask before deleting').default(false))
    .action(async (options: Record<string, unknown>) => {
      await handlers.cacheClear(options)
    })

  program
    .command('models')
    .description('List model aliases and the model ids they resolve to')
    .action(async () => {
      await handlers.models()
    })

  return program
}
