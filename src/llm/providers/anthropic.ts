import { ProviderError } from '../../errors.js'
import { type LlmTokenUsage, normalizeAnthropicUsage } from '../usage.js'

export const ANTHROPIC_VERSION = '2023-06-01'

export type DocumentPrompt = {
  text: string
  document: {
    bytes: Uint8Array
    mediaType: string
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64')
}

function parseAnthropicErrorPayload(
  responseBody: string
): { type: string; message: string } | null {
  try {
    const parsed: unknown = JSON.parse(responseBody)
    if (!isRecord(parsed) || parsed.type !== 'error') return null
    const error = parsed.error
    if (!isRecord(error)) return null
    const errorType = typeof error.type === 'string' ? error.type : null
    const errorMessage = typeof error.message === 'string' ? error.message : null
    if (!errorType || !errorMessage) return null
    return { type: errorType, message: errorMessage }
  } catch {
    return null
  }
}

/**
 * Rewrites auth/permission/not-found responses into a hint about model access. Returns
 * null for every other failure.
 */
export function normalizeAnthropicModelAccessError(
  error: ProviderError,
  modelId: string
): ProviderError | null {
  const payload = error.responseBody ? parseAnthropicErrorPayload(error.responseBody) : null
  const combinedMessage = (payload?.message ?? error.message).trim()

  const hasModelMessage = /^model:\s*\S+/i.test(combinedMessage)
  const isAccessStatus =
    error.statusCode === 401 || error.statusCode === 403 || error.statusCode === 404
  const isAccessType =
    payload?.type === 'not_found_error' ||
    payload?.type === 'permission_error' ||
    payload?.type === 'authentication_error'

  if (!hasModelMessage && !isAccessStatus && !isAccessType) return null

  const modelLabel = hasModelMessage ? combinedMessage.replace(/^model:\s*/i, '').trim() : modelId
  const hint = `Anthropic API rejected model "${modelLabel}". Your API key likely lacks access to this model or it is unavailable for your account. Try haiku, sonnet, or another claude-… model id.`
  return new ProviderError(hint, {
    statusCode: error.statusCode,
    responseBody: error.responseBody,
    cause: error,
  })
}

export async function completeAnthropicDocument({
  modelId,
  apiKey,
  prompt,
  system,
  maxOutputTokens,
  timeoutMs,
  fetchImpl,
  baseUrl,
}: {
  modelId: string
  apiKey: string
  prompt: DocumentPrompt
  system?: string
  maxOutputTokens?: number
  timeoutMs: number
  fetchImpl: typeof fetch
  baseUrl: string
}): Promise<{ text: string; usage: LlmTokenUsage | null }> {
  const url = new URL('/v1/messages', baseUrl)
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const payload = {
    model: modelId,
    max_tokens: maxOutputTokens ?? 4096,
    ...(system ? { system } : {}),
    messages: [
      {
        role: 'user',
        content: [
          {
            type: 'document',
            source: {
              type: 'base64',
              media_type: prompt.document.mediaType,
              data: bytesToBase64(prompt.document.bytes),
            },
          },
          { type: 'text', text: prompt.text },
        ],
      },
    ],
  }

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    })

    const bodyText = await response.text()
    if (!response.ok) {
      const error = new ProviderError(`Anthropic API error (${response.status}).`, {
        statusCode: response.status,
        responseBody: bodyText,
      })
      throw normalizeAnthropicModelAccessError(error, modelId) ?? error
    }

    const data: unknown = JSON.parse(bodyText)
    const content = isRecord(data) && Array.isArray(data.content) ? data.content : []
    const text = content
      .map((block: unknown) =>
        isRecord(block) && block.type === 'text' && typeof block.text === 'string' ? block.text : ''
      )
      .join('')
      .trim()
    if (!text) {
      throw new ProviderError(`LLM returned an empty response (model ${modelId}).`)
    }
    return { text, usage: normalizeAnthropicUsage(isRecord(data) ? data.usage : null) }
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ProviderError(`LLM request timed out after ${timeoutMs}ms`, { cause: error })
    }
    throw error
  } finally {
    clearTimeout(timeout)
  }
}
