import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { loadPromptTemplate, resolveBundledPromptDir } from '../src/prompts.js'

describe('prompt templates', () => {
  it('loads the bundled prompts by name', () => {
    for (const name of ['v1_baseline.txt', 'v2_no_scratchpad.txt', 'transcribe_v1.txt']) {
      const prompt = loadPromptTemplate(name)
      expect(prompt.path).toBe(join(resolveBundledPromptDir(), name))
      expect(prompt.text.trim().length).toBeGreaterThan(0)
    }
  })

  it('reads a prompt file given by path', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-prompt-'))
    writeFileSync(join(dir, 'mine.txt'), 'Summarize in three bullet points.', 'utf8')

    expect(loadPromptTemplate('mine.txt', { cwd: dir })).toEqual({
      path: join(dir, 'mine.txt'),
      text: 'Summarize in three bullet points.',
    })
    expect(loadPromptTemplate(join(dir, 'mine.txt')).text).toBe('Summarize in three bullet points.')
  })

  it('reports missing and empty prompts', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nutshell-prompt-'))
    writeFileSync(join(dir, 'blank.txt'), '  \n', 'utf8')

    expect(() => loadPromptTemplate('nope.txt', { promptDir: dir, cwd: dir })).toThrow(
      expect.objectContaining({
        kind: 'PromptNotFound',
        message: `Prompt file not found: ${join(dir, 'nope.txt')}`,
      })
    )
    expect(() => loadPromptTemplate('blank.txt', { promptDir: dir, cwd: dir })).toThrow(
      `Prompt file is empty: ${join(dir, 'blank.txt')}`
    )
    expect(() => loadPromptTemplate(' ')).toThrow('Missing prompt name')
  })
})
