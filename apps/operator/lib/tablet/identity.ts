/**
 * Tablet Identity
 *
 * UIDs and object names are pure functions of where a tablet sits in the
 * shard layout, so the same manifest always yields the same tablets.
 */

import { createHash } from 'node:crypto'
import {
  type KeyRange,
  type TabletAlias,
  type TabletType,
  keyRangeString,
} from '@shardwarden/core'

const MAX_NAME_LENGTH = 63
const NAME_HASH_LENGTH = 8

/**
 * Deterministic tablet UID: the first four bytes (big endian) of the MD5 of
 * `"<cell> <keyspace> <keyRange> <type> <index>\n"`.
 */
export function tabletUid(
  cell: string,
  keyspace: string,
  keyRange: KeyRange,
  type: TabletType,
  index: number,
): number {
  const digest = createHash('md5')
    .update(`${cell} ${keyspace} ${keyRangeString(keyRange)} ${type} ${index}\n`)
    .digest()
  return digest.readUInt32BE(0)
}

/**
 * Name shared by a tablet's Pod and its data volume claim.
 * Lowercased, and shortened with a hash suffix if it exceeds 63 characters.
 * @example 'main-tablet-us-east-2548885007'
 */
export function tabletObjectName(cluster: string, alias: TabletAlias): string {
  const name = `${cluster}-tablet-${alias.cell}-${String(alias.uid).padStart(10, '0')}`.toLowerCase()
  if (name.length <= MAX_NAME_LENGTH) return name

  const hash = createHash('md5').update(name).digest('hex').slice(0, NAME_HASH_LENGTH)
  const prefix = name.slice(0, MAX_NAME_LENGTH - NAME_HASH_LENGTH - 1).replace(/-+$/, '')
  return `${prefix}-${hash}`
}
