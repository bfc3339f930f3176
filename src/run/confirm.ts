import { createInterface } from 'node:readline'

export type ConfirmFn = (question: string) => Promise<boolean>

/**
 * Asks a y/N question on `input`. End of input counts as "no".
 */
export function createStreamConfirm({
  input,
  output,
}: {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}): ConfirmFn {
  return async (question) =>
    await new Promise<boolean>((resolve) => {
      const rl = createInterface({ input, output, terminal: false })
      let answered = false
      rl.once('close', () => {
        if (!answered) resolve(false)
      })
      rl.question(question, (answer) => {
        answered = true
        rl.close()
        resolve(isAffirmative(answer))
      })
    })
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}
