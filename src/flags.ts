const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i

export const DEFAULT_TIMEOUT = '2m'
export const DEFAULT_MODEL_TIMEOUT = '10m'

/**
 * Parses `--timeout` and `--model-timeout` values: `30` (seconds), `30s`, `2m`, `5000ms`, `1h`.
 */
export function parseDurationMs(raw: string, flag = '--timeout'): number {
  const normalized = raw.trim()
  const match = DURATION_PATTERN.exec(normalized)
  if (!match?.groups) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}
