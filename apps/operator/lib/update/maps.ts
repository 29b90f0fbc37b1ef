/**
 * Merge helpers for label, annotation and flag maps.
 */

/**
 * Copy every entry of `src` into `dst`, overwriting existing keys.
 * Keys present only in `dst` are kept.
 */
export function mergeStringMap(dst: Record<string, string>, src: Record<string, string> | undefined): void {
  if (!src) return
  for (const [key, value] of Object.entries(src)) {
    dst[key] = value
  }
}

/**
 * New map with the entries of every source, later sources winning.
 */
export function mergedStringMaps(...sources: Array<Record<string, string> | undefined>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const source of sources) {
    mergeStringMap(result, source)
  }
  return result
}
