/**
 * Local-time formatting helpers
 * @module utils/time
 */

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Formats a date as `yyyyMMdd`
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
}

/**
 * Formats a date as `yyyyMMdd-HHmm`.
 * Lexicographic order of the output follows chronological order.
 */
export function formatMinuteStamp(date: Date): string {
  return `${formatDateStamp(date)}-${pad(date.getHours())}${pad(date.getMinutes())}`
}

/**
 * Formats a date as `yyyy-MM-dd HH:mm:ss` for log lines
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}
