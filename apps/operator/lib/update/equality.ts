/**
 * Semantic comparison of cluster objects.
 *
 * Objects built in code carry explicit `undefined` fields and empty maps
 * that the API server never returns, so both are dropped before comparing.
 */

import { isDeepStrictEqual } from 'node:util'
import type { ManagedObject } from '@shardwarden/core'

function stripEmpty(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => stripEmpty(item))
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, field] of Object.entries(value)) {
      const stripped = stripEmpty(field)
      if (stripped !== undefined) result[key] = stripped
    }
    return Object.keys(result).length > 0 ? result : undefined
  }
  return value
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Date)
}

export function semanticEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(stripEmpty(a), stripEmpty(b))
}

/**
 * Dotted paths of the fields under `metadata.labels`, `metadata.annotations`
 * and `spec` whose values differ, one level deep. Annotations listed in
 * `ignoredAnnotations` are left out of the comparison.
 * @example ['metadata.annotations', 'spec.containers']
 */
export function changedFields(
  current: ManagedObject,
  desired: ManagedObject,
  ignoredAnnotations: string[] = [],
): string[] {
  const changes: string[] = []

  if (!semanticEqual(current.metadata?.labels, desired.metadata?.labels)) {
    changes.push('metadata.labels')
  }
  const annotations = (obj: ManagedObject) =>
    Object.fromEntries(
      Object.entries(obj.metadata?.annotations ?? {}).filter(([key]) => !ignoredAnnotations.includes(key)),
    )
  if (!semanticEqual(annotations(current), annotations(desired))) {
    changes.push('metadata.annotations')
  }

  const currentSpec = specOf(current)
  const desiredSpec = specOf(desired)
  const specKeys = new Set([...Object.keys(currentSpec), ...Object.keys(desiredSpec)])
  for (const key of [...specKeys].sort()) {
    if (!semanticEqual(currentSpec[key], desiredSpec[key])) {
      changes.push(`spec.${key}`)
    }
  }

  return changes
}

function specOf(obj: object): Record<string, unknown> {
  const spec: unknown = Reflect.get(obj, 'spec')
  return isPlainObject(spec) ? spec : {}
}
