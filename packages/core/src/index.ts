// Core types - shared across all packages
export * from './types'

// Cluster object store interface - implemented by @shardwarden/kube
export * from './store'

// Topology service interface - implemented by @shardwarden/kube
export * from './topology'

// Label and annotation keys
export * from './labels'

// Key ranges and resource quantities
export * from './key-range'
export * from './quantity'

// Schemas for validation
export * from './schemas/shard'
