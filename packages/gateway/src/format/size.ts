const MULTIPLIERS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
}

/**
 * Parse a size such as `512MB` or `4.7 GB` into bytes. A bare number is
 * taken as bytes.
 */
export function parseModelSize(text: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*([KMGT]?B)?$/.exec(text.trim().toUpperCase())
  if (!match) {
    return undefined
  }
  const [, amount = '', unit = 'B'] = match
  return Math.floor(Number(amount) * (MULTIPLIERS[unit] ?? 1))
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB']

/** Human-readable size, e.g. `4.7 GB` */
export function formatBytes(bytes: number): string {
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`
}
