import type { V1Affinity } from '@kubernetes/client-node'
import { z } from 'zod'
import { parseKeyRange } from '../key-range'
import { parseQuantity } from '../quantity'

// Object and label names (RFC 1123 label, lowercase alphanumeric with hyphens)
const dnsLabelPattern = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/
const dnsLabel = z
  .string()
  .max(63)
  .regex(dnsLabelPattern, 'Must be lowercase alphanumeric with hyphens, not starting or ending with a hyphen')

const hexBound = z.string().regex(/^[0-9a-f]*$/, 'Must be a lowercase hex string (empty for unbounded)')

const quantityString = z
  .string()
  .refine((value) => parseQuantity(value) !== null, 'Must be a resource quantity (e.g., "10Gi", "500m")')

const stringMap = z.record(z.string(), z.string())

// =============================================================================
// Resources
// =============================================================================

/**
 * Container resource requests and limits
 */
export const resourceRequirementsSchema = z.object({
  requests: z.record(z.string(), quantityString).optional().describe('Minimum resources'),
  limits: z.record(z.string(), quantityString).optional().describe('Maximum resources'),
})

/**
 * Data volume claim template
 */
export const dataVolumeClaimTemplateSchema = z.object({
  accessModes: z
    .array(z.string())
    .min(1)
    .default(['ReadWriteOnce'])
    .describe('Volume access modes'),
  storageClassName: z.string().optional().describe('Storage class for the claim'),
  storage: quantityString.describe('Requested storage size (e.g., "100Gi")'),
})

export const tolerationSchema = z.object({
  key: z.string().optional(),
  operator: z.enum(['Exists', 'Equal']).optional(),
  value: z.string().optional(),
  effect: z.enum(['NoSchedule', 'PreferNoSchedule', 'NoExecute']).optional(),
  tolerationSeconds: z.number().int().optional(),
})

const affinitySchema = z.custom<V1Affinity>(
  (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
  'Must be a Kubernetes affinity object',
)

// =============================================================================
// Tablet Pools
// =============================================================================

export const tabletTypeSchema = z.enum([
  'replica',
  'rdonly',
  'externalmaster',
  'externalreplica',
  'externalrdonly',
])

/**
 * A group of tablets sharing cell and role within a shard
 */
export const tabletPoolSchema = z.object({
  cell: dnsLabel.describe('Cell the tablets run in'),
  type: tabletTypeSchema.describe('Role of the tablets in this pool'),
  replicas: z.number().int().min(0).describe('Number of tablets in this pool'),
  tablet: z
    .object({
      resources: resourceRequirementsSchema.default({}),
      extraFlags: stringMap.default({}).describe('Flags passed to the tablet process'),
    })
    .default({}),
  mysqld: z
    .object({
      resources: resourceRequirementsSchema.default({}),
    })
    .default({}),
  dataVolumeClaimTemplate: dataVolumeClaimTemplateSchema
    .optional()
    .describe('Persistent data volume; omitted for tablets without local storage'),
  backupLocationName: z.string().default('').describe('Name of the backup location to use'),
  annotations: stringMap.default({}),
  extraLabels: stringMap.default({}),
  affinity: affinitySchema.optional(),
  tolerations: z.array(tolerationSchema).default([]),
})

/**
 * Where backups for tablets are stored
 */
export const backupLocationSchema = z.object({
  name: z.string().default('').describe('Location name; empty for the default location'),
  bucket: z.string().optional(),
  path: z.string().optional(),
  annotations: stringMap.default({}),
})

// =============================================================================
// Main Shard Schema
// =============================================================================

/**
 * Shard manifest schema
 * Describes the desired tablets of one shard of one keyspace.
 */
export const shardManifestSchema = z
  .object({
    name: z.string().describe('Shard name, derived from the key range (e.g., "-80")'),
    namespace: dnsLabel.describe('Namespace that holds the tablet objects'),
    cluster: dnsLabel.describe('Cluster the shard belongs to'),
    keyspace: dnsLabel.describe('Keyspace the shard belongs to'),
    uid: z.string().optional().describe('UID of the owning resource, used for owner references'),
    generation: z.number().int().min(0).default(1).describe('Revision of this manifest'),
    keyRange: z.object({ start: hexBound.default(''), end: hexBound.default('') }).default({}),
    databaseName: z.string().optional(),
    images: z.object({
      tablet: z.string().describe('Tablet server image'),
      mysqld: z.string().describe('Database server image'),
    }),
    imagePullPolicy: z.enum(['Always', 'IfNotPresent', 'Never']).optional(),
    extraFlags: stringMap.default({}).describe('Flags applied to every tablet'),
    zoneMap: stringMap.default({}).describe('Cell to availability-zone mapping'),
    backupLocations: z.array(backupLocationSchema).default([]),
    tabletPools: z.array(tabletPoolSchema).default([]),
  })
  .superRefine((shard, ctx) => {
    const range = parseKeyRange(shard.name)
    if (!range || range.start !== shard.keyRange.start || range.end !== shard.keyRange.end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['name'],
        message: `Shard name must match key range "${shard.keyRange.start}-${shard.keyRange.end}"`,
      })
    }

    const seen = new Set<string>()
    shard.tabletPools.forEach((pool, index) => {
      const poolKey = `${pool.cell}/${pool.type}`
      if (seen.has(poolKey)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tabletPools', index],
          message: `Duplicate pool for cell "${pool.cell}" and type "${pool.type}"`,
        })
      }
      seen.add(poolKey)
    })
  })

export type ShardManifestInput = z.input<typeof shardManifestSchema>
export type ShardManifest = z.output<typeof shardManifestSchema>
export type TabletPool = ShardManifest['tabletPools'][number]
export type BackupLocation = ShardManifest['backupLocations'][number]
export type DataVolumeClaimTemplate = z.output<typeof dataVolumeClaimTemplateSchema>
export type ResourceRequirements = z.output<typeof resourceRequirementsSchema>

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Parse and validate shard manifest data
 */
export function parseShardManifest(data: unknown): ShardManifest {
  return shardManifestSchema.parse(data)
}

/**
 * Safely parse shard manifest data, returning result with errors
 */
export function safeParseShardManifest(data: unknown): ParseResult<ShardManifest> {
  const result = shardManifestSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}

/**
 * Find a backup location by name.
 * An empty name selects the default (unnamed) location.
 */
export function findBackupLocation(
  shard: Pick<ShardManifest, 'backupLocations'>,
  name: string,
): BackupLocation | undefined {
  return shard.backupLocations.find((location) => location.name === name)
}
