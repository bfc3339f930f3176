import { Writable } from 'node:stream'

export function collectStream() {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, getText: () => text }
}

export function makePdfBytes(body = 'nutshell test document'): Uint8Array {
  return new Uint8Array(
    Buffer.from(`%PDF-1.4\n% ${body}\n${'0'.repeat(96)}\ntrailer\n%%EOF\n`, 'latin1')
  )
}

export function makeTruncatedPdfBytes(): Uint8Array {
  return new Uint8Array(Buffer.from(`%PDF-1.4\n${'0'.repeat(96)}\nstream`, 'latin1'))
}

export function pdfResponse(bytes: Uint8Array = makePdfBytes()): Response {
  return new Response(bytes, { status: 200, headers: { 'content-type': 'application/pdf' } })
}

export function anthropicResponse({
  text,
  inputTokens = 1200,
  outputTokens = 300,
}: {
  text: string
  inputTokens?: number
  outputTokens?: number
}): Response {
  return new Response(
    JSON.stringify({
      type: 'message',
      content: [{ type: 'text', text }],
      usage: { input_tokens: inputTokens, output_tokens: outputTokens },
    }),
    { status: 200, headers: { 'content-type': 'application/json' } }
  )
}
