import { existsSync, mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import {
  createRunLogger,
  formatPrettyLine,
  resolveLoggingConfig,
  safeJsonStringify,
} from '../src/logging/logger.js'
import { collectStream } from './helpers/fixtures.js'

describe('logging config', () => {
  it('stays off unless enabled in the config', () => {
    expect(resolveLoggingConfig({ env: { HOME: '/home/test' }, config: null })).toBeNull()
    expect(
      resolveLoggingConfig({ env: { HOME: '/home/test' }, config: { logging: { level: 'debug' } } })
    ).toBeNull()
  })

  it('fills defaults for an enabled log', () => {
    expect(
      resolveLoggingConfig({ env: { HOME: '/home/test' }, config: { logging: { enabled: true } } })
    ).toEqual({
      level: 'info',
      format: 'json',
      file: join('/home/test', '.nutshell', 'logs', 'nutshell.jsonl'),
      maxBytes: 10 * 1024 * 1024,
      maxFiles: 3,
    })
  })
})

describe('log formatting', () => {
  it('joins meta, arguments and errors', () => {
    expect(
      formatPrettyLine({ metaMarkup: ' INFO ', args: ['downloading', { key: 'k' }], errors: [] })
    ).toBe('INFO downloading {"key":"k"}')
    expect(formatPrettyLine({ metaMarkup: '', args: [], errors: ['boom'] })).toBe('boom')
  })

  it('survives circular values', () => {
    const value: Record<string, unknown> = { name: 'loop' }
    value.self = value
    expect(safeJsonStringify(value)).toBe('{"name":"loop","self":"[Circular]"}')
  })
})

describe('run logger', () => {
  it('writes json lines to the log file', async () => {
    const root = mkdtempSync(join(tmpdir(), 'nutshell-log-'))
    const file = join(root, 'logs', 'run.jsonl')
    const stderr = collectStream()
    const { logger, flush } = createRunLogger({
      env: { HOME: root },
      config: { logging: { enabled: true, file } },
      verbose: false,
      stderr: stderr.stream,
    })

    logger.debug('hidden at info level')
    logger.info('resolved PDF', { cacheStatus: 'hit' })
    await flush()

    const lines = readFileSync(file, 'utf8').trim().split('\n')
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      0: 'resolved PDF',
      1: { cacheStatus: 'hit' },
      _meta: { logLevelName: 'INFO' },
    })
    expect(stderr.getText()).toBe('')
  })

  it('prints debug lines to stderr when verbose', async () => {
    const root = mkdtempSync(join(tmpdir(), 'nutshell-log-'))
    const stderr = collectStream()
    const { logger, flush } = createRunLogger({
      env: { HOME: root },
      config: null,
      verbose: true,
      stderr: stderr.stream,
    })

    logger.debug('cache hit', { key: 'https://arxiv.org/pdf/2402.02896' })
    await flush()

    expect(stderr.getText()).toContain('cache hit {"key":"https://arxiv.org/pdf/2402.02896"}\n')
    expect(existsSync(join(root, '.nutshell', 'logs'))).toBe(false)
  })
})
