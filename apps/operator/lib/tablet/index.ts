export { desiredTablets, shardTabletLabels } from './desired'
export { tabletObjectName, tabletUid } from './identity'
export {
  DATA_MOUNT_PATH,
  DATA_VOLUME_NAME,
  MYSQLD_CONTAINER_NAME,
  TABLET_CONTAINER_NAME,
  ZONE_NODE_LABEL,
  aliasFromPod,
  newPod,
  tabletArgs,
  updatePod,
  updatePodInPlace,
} from './pod'
export { newPvc, updatePvcInPlace } from './pvc'
export type { TabletSpec } from './spec'
