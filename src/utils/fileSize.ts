const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const
const NO_VALUE = '—'

/** Byte count as a short size, e.g. "1.5 KB" */
export function formatFileSize(bytes: number, decimals: number = 1): string {
  if (bytes < 0) return NO_VALUE

  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return `${Number(value.toFixed(decimals))} ${SIZE_UNITS[unit]}`
}

export function formatSpeed(bytesPerSecond: number): string {
  return bytesPerSecond > 0 ? `${formatFileSize(bytesPerSecond)}/s` : NO_VALUE
}

/** Remaining time, rounded to the second: "45s", "2m 5s", "1h 2m" */
export function formatETA(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return NO_VALUE

  const total = Math.round(seconds)
  const minutes = Math.floor(total / 60)
  if (minutes === 0) return `${total}s`
  if (minutes < 60) return `${minutes}m ${total % 60}s`
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`
}

/**
 * Format a progress sample as "42.0% (420/1000 bytes)".
 * An empty file counts as complete.
 */
export function formatProgress(transferred: number, total: number): string {
  const percentage = total > 0 ? (transferred / total) * 100 : 100
  return `${percentage.toFixed(1)}% (${transferred}/${total} bytes)`
}
