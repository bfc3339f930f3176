export type NutshellErrorKind =
  | 'FileNotFound'
  | 'DownloadError'
  | 'UnsupportedContentError'
  | 'UnknownModelAlias'
  | 'UnderivablePathError'
  | 'PromptNotFound'
  | 'MissingApiKey'
  | 'ProviderError'
  | 'ConfigError'

export class NutshellError extends Error {
  readonly kind: NutshellErrorKind

  constructor(kind: NutshellErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
  }
}

export function isNutshellError(error: unknown, kind?: NutshellErrorKind): error is NutshellError {
  if (!(error instanceof NutshellError)) return false
  return kind ? error.kind === kind : true
}

export function createFileNotFoundError(filePath: string): NutshellError {
  return new NutshellError('FileNotFound', `PDF file not found: ${filePath}`)
}

export function createDownloadError(
  url: string,
  detail: string,
  options?: { cause?: unknown }
): NutshellError {
  return new NutshellError('DownloadError', `Failed to download ${url}: ${detail}`, options)
}

export function createUnsupportedContentError(url: string, detail: string): NutshellError {
  return new NutshellError('UnsupportedContentError', `Not a PDF: ${url} (${detail})`)
}

export function createUnknownModelAliasError(
  token: string,
  known: readonly string[]
): NutshellError {
  return new NutshellError(
    'UnknownModelAlias',
    `Unknown model "${token}". Use one of ${known.join(', ')} or a full claude-… model id.`
  )
}

export function createUnderivablePathError(reference: string): NutshellError {
  return new NutshellError(
    'UnderivablePathError',
    `Cannot derive an output filename from ${reference}; pass --output <path>.`
  )
}

/**
 * Error raised for a non-2xx provider response. Keeps the status and raw body so callers
 * can turn access failures into a clearer message.
 */
export class ProviderError extends NutshellError {
  readonly statusCode: number | null
  readonly responseBody: string | null

  constructor(
    message: string,
    {
      statusCode,
      responseBody,
      cause,
    }: { statusCode?: number | null; responseBody?: string | null; cause?: unknown } = {}
  ) {
    super('ProviderError', message, { cause })
    this.statusCode = statusCode ?? null
    this.responseBody = responseBody ?? null
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
