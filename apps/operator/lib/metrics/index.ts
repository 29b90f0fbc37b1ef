/**
 * Operator Metrics
 *
 * Everything is named `shardwarden_*` and registered on one registry.
 */

export { OPERATOR_VERSION, buildInfo, registry } from './registry'

export * from './reconcile'
