export type OperationKind = 'summarize' | 'transcribe'

export type OperationSettings = {
  outputSuffix: string
  defaultPrompt: string
  maxOutputTokens: number
  label: string
}

// Transcriptions reproduce the whole paper and need the larger output budget.
export const OPERATIONS: Readonly<Record<OperationKind, Readonly<OperationSettings>>> = {
  summarize: {
    outputSuffix: '_summary.md',
    defaultPrompt: 'v2_no_scratchpad.txt',
    maxOutputTokens: 4096,
    label: 'Summary',
  },
  transcribe: {
    outputSuffix: '_transcription.md',
    defaultPrompt: 'transcribe_v1.txt',
    maxOutputTokens: 16_384,
    label: 'Transcription',
  },
}
