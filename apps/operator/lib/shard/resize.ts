/**
 * Volume Resize Propagation
 *
 * Some storage drivers finish a volume expansion only after the Pod using it
 * restarts. Once a claim has been expanded to the requested size and reports
 * a pending filesystem resize, the tablet spec is annotated with the target
 * size so the next rolling recreate picks it up.
 */

import type { V1PersistentVolumeClaim } from '@kubernetes/client-node'
import { type ObjectClient, PvcFilesystemResizeAnnotation, quantitiesEqual } from '@shardwarden/core'
import type { Logger } from '../logger'
import type { TabletSpec } from '../tablet/spec'

export function hasFileSystemResizePending(pvc: V1PersistentVolumeClaim): boolean {
  const condition = pvc.status?.conditions?.find((c) => c.type === 'FileSystemResizePending')
  return condition?.status === 'True'
}

/**
 * Annotate the tablet spec (never the live object) when its claim is waiting
 * for a filesystem resize. Any lookup failure just skips the annotation.
 */
export async function applyFilesystemResizeAnnotation(
  claims: ObjectClient<V1PersistentVolumeClaim>,
  namespace: string,
  tablet: TabletSpec,
  logger: Logger,
): Promise<void> {
  const wanted = tablet.dataVolume?.storage
  if (!wanted || !tablet.dataVolumePvcName) return

  let pvc: V1PersistentVolumeClaim | null
  try {
    pvc = await claims.get({ namespace, name: tablet.dataVolumePvcName })
  } catch (err) {
    logger.debug({ tablet: tablet.aliasStr, err }, 'Skipping resize check, claim lookup failed')
    return
  }
  if (!pvc) return

  if (!quantitiesEqual(pvc.spec?.resources?.requests?.storage, wanted)) return
  if (!hasFileSystemResizePending(pvc)) return

  tablet.annotations[PvcFilesystemResizeAnnotation] = wanted
}
