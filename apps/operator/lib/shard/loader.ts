/**
 * Shard Manifest Loader
 *
 * Reads shard manifests from YAML. Environment variables written as ${VAR}
 * are substituted before parsing; references to unset variables are left
 * as they are.
 */

import { readFileSync, readdirSync, statSync } from 'node:fs'
import { join } from 'node:path'
import { type ShardManifest, safeParseShardManifest } from '@shardwarden/core'
import { YAMLParseError, parse as parseYaml } from 'yaml'
import { ShardValidationError } from '../errors'

export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => env[varName] ?? match)
}

/**
 * Parse and validate manifest text.
 * @param source Where the text came from, for error messages
 */
export function parseShardYaml(content: string, source: string): ShardManifest {
  let raw: unknown
  try {
    raw = parseYaml(interpolateEnvVars(content))
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ShardValidationError(source, [{ path: '/', message: err.message }])
    }
    throw err
  }

  const result = safeParseShardManifest(raw)
  if (!result.success) {
    throw new ShardValidationError(source, result.errors)
  }
  return result.data
}

/**
 * Load and validate a single shard manifest file
 */
export function loadShardFile(filePath: string): ShardManifest {
  return parseShardYaml(readFileSync(filePath, 'utf-8'), filePath)
}

/**
 * Load every .yaml/.yml manifest in a directory, in file name order.
 */
export function loadShardsFromDir(dirPath: string): ShardManifest[] {
  return readdirSync(dirPath)
    .filter((file) => file.endsWith('.yaml') || file.endsWith('.yml'))
    .sort()
    .map((file) => join(dirPath, file))
    .filter((filePath) => statSync(filePath).isFile())
    .map((filePath) => loadShardFile(filePath))
}

/**
 * Load a manifest file, or every manifest in a directory.
 */
export function loadShards(path: string): ShardManifest[] {
  return statSync(path).isDirectory() ? loadShardsFromDir(path) : [loadShardFile(path)]
}
