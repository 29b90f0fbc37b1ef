export {
  RECREATE_REQUEUE_MS,
  TERMINATING_REASON,
  objectSetPassResult,
  reconcileObjectSet,
  type ObjectSetResult,
  type OrphanedObject,
  type ParentRef,
  type ReconcileObjectSetOptions,
  type Strategy,
} from './object-set'
