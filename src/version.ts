import { readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const moduleDir = path.dirname(fileURLToPath(import.meta.url))

export function resolvePackageVersion(): string {
  for (const candidate of [
    path.resolve(moduleDir, '..', 'package.json'),
    path.resolve(moduleDir, '..', '..', 'package.json'),
  ]) {
    let parsed: unknown
    try {
      parsed = JSON.parse(readFileSync(candidate, 'utf8'))
    } catch {
      continue
    }
    if (typeof parsed !== 'object' || parsed === null) continue
    const version: unknown = Reflect.get(parsed, 'version')
    if (typeof version === 'string' && version.length > 0) return version
  }
  return '0.0.0'
}
