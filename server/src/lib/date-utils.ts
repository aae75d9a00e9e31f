/**
 * Date helpers for provider payloads.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Format a Date object to YYYY-MM-DD string.
 */
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear()
  const month = String(date.getUTCMonth() + 1).padStart(2, "0")
  const day = String(date.getUTCDate()).padStart(2, "0")
  return `${year}-${month}-${day}`
}

/**
 * Parse a TMDB release_date value.
 * Returns the normalized YYYY-MM-DD string for a real calendar date, null for
 * anything else (missing, empty, wrong format, or a date like 2021-02-30).
 */
export function parseReleaseDate(value: unknown): string | null {
  if (typeof value !== "string") return null

  const match = ISO_DATE_PATTERN.exec(value.trim())
  if (!match) return null

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)

  // Date.UTC maps years 0-99 onto 1900-1999, which the round-trip check rejects
  const date = new Date(Date.UTC(year, month - 1, day))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null
  }

  return formatDate(date)
}
