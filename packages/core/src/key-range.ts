/**
 * Shard key ranges.
 *
 * Bounds are lowercase hex strings; an empty bound is open on that side.
 */

export interface KeyRange {
  /** @example '' */
  start: string
  /** @example '80' */
  end: string
}

/**
 * Canonical shard name for a key range.
 * @example keyRangeString({ start: '', end: '80' }) === '-80'
 */
export function keyRangeString(range: KeyRange): string {
  return `${range.start}-${range.end}`
}

/**
 * Key range form that is safe inside object names and label values, which
 * cannot start or end with '-'.
 * @example keyRangeSafeName({ start: '', end: '80' }) === 'x-80'
 */
export function keyRangeSafeName(range: KeyRange): string {
  return `${range.start || 'x'}-${range.end || 'x'}`
}

/**
 * Parse a shard name back into a key range.
 * @returns null when the name is not of the form `<hex>-<hex>`
 */
export function parseKeyRange(shard: string): KeyRange | null {
  const match = shard.match(/^([0-9a-f]*)-([0-9a-f]*)$/)
  if (!match) return null
  return { start: match[1], end: match[2] }
}
