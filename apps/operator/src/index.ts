#!/usr/bin/env node
import { node } from '@elysiajs/node'
import type { ShardManifest } from '@shardwarden/core'
import { HttpTopologyClient, KubeClusterStore } from '@shardwarden/kube'
import { program } from 'commander'
import { Elysia } from 'elysia'
import pino from 'pino'
import { config } from '../lib/config'
import { isDomainError } from '../lib/errors'
import { type Logger, createLogger } from '../lib/logger'
import { OPERATOR_VERSION } from '../lib/metrics'
import { ShardRunner } from '../lib/runner'
import { loadShardFile, loadShards, reconcileTablets } from '../lib/shard'
import { desiredTablets, shardTabletLabels, tabletObjectName } from '../lib/tablet'
import { createServer } from './server'

interface ClusterOptions {
  kubeconfig?: string
  context?: string
  topoUrl: string
}

// Invalid manifests exit 2 so scripts can tell them from cluster failures.
function fail(err: unknown, fallback: string): never {
  console.error(err instanceof Error ? err.message : fallback)
  process.exit(isDomainError(err) && err.status === 400 ? 2 : 1)
}

function createPass(options: ClusterOptions, logger: Logger) {
  const store = KubeClusterStore.fromConfig({
    kubeconfigPath: options.kubeconfig,
    context: options.context,
  })
  const topology = new HttpTopologyClient({ baseUrl: options.topoUrl })

  return (shard: ShardManifest, signal: AbortSignal) =>
    reconcileTablets(shard, { store, topology, logger, topoTimeoutMs: config.topoTimeoutMs }, signal)
}

program
  .name('shardwarden')
  .description('Reconcile the tablets of sharded database clusters')
  .version(OPERATOR_VERSION)

// ─────────────────────────────────────────────────────────────────────────────
// Offline Commands
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('validate <manifest>')
  .description('Validate a shard manifest')
  .action((manifest: string) => {
    try {
      const shard = loadShardFile(manifest)
      const tablets = desiredTablets(shard, shardTabletLabels(shard))
      console.log(`${shard.keyspace}/${shard.name}: valid, ${tablets.length} tablet(s)`)
    } catch (e) {
      fail(e, 'Validation failed')
    }
  })

program
  .command('tablets <manifest>')
  .description('List the tablets a shard manifest asks for')
  .action((manifest: string) => {
    try {
      const shard = loadShardFile(manifest)
      const tablets = desiredTablets(shard, shardTabletLabels(shard))
      for (const tablet of tablets) {
        const podName = tabletObjectName(shard.cluster, tablet.alias)
        console.log(
          `${tablet.aliasStr.padEnd(24)} ${tablet.type.padEnd(10)} ${podName.padEnd(40)} ${tablet.alias.uid}`,
        )
      }
    } catch (e) {
      fail(e, 'Listing tablets failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Cluster Commands
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('reconcile <manifest>')
  .description('Run one reconciliation pass and print the shard status')
  .option('-k, --kubeconfig <path>', 'Path to kubeconfig')
  .option('-c, --context <name>', 'Kubeconfig context')
  .option('-t, --topo-url <url>', 'Topology service URL', config.topoUrl)
  .action(async (manifest: string, options: ClusterOptions) => {
    try {
      const shard = loadShardFile(manifest)
      // Status goes to stdout, logs to stderr.
      const logger = createLogger(config.logLevel, pino.destination(2))
      const pass = createPass(options, logger)

      const outcome = await pass(shard, AbortSignal.timeout(config.reconcileTimeoutMs))
      console.log(JSON.stringify(outcome.status, null, 2))

      if (outcome.result.error) {
        fail(outcome.result.error, 'Reconcile failed')
      }
      if (outcome.result.requeueAfterMs !== undefined) {
        console.error(`Requeue requested in ${outcome.result.requeueAfterMs}ms`)
      }
    } catch (e) {
      fail(e, 'Reconcile failed')
    }
  })

program
  .command('run <path>')
  .description('Reconcile every shard manifest at a path until interrupted')
  .option('-k, --kubeconfig <path>', 'Path to kubeconfig')
  .option('-c, --context <name>', 'Kubeconfig context')
  .option('-t, --topo-url <url>', 'Topology service URL', config.topoUrl)
  .action((path: string, options: ClusterOptions) => {
    const logger = createLogger(config.logLevel)

    let shards: ShardManifest[]
    try {
      shards = loadShards(path)
    } catch (e) {
      fail(e, 'Loading shards failed')
    }

    const runner = new ShardRunner({
      pass: createPass(options, logger),
      logger,
      reconcileTimeoutMs: config.reconcileTimeoutMs,
      resyncIntervalMs: config.resyncIntervalMs,
      errorBackoffMs: config.errorBackoffMs,
    })

    const app = new Elysia({ adapter: node() })
      .use(createServer({ health: () => runner.health(), logger }))
      .listen({ port: config.metricsPort, hostname: config.metricsHost }, () => {
        logger.info({ host: config.metricsHost, port: config.metricsPort }, 'Metrics server listening')
      })

    runner.start(shards)

    const shutdown = async () => {
      logger.info('Shutting down...')
      await runner.stop()
      await app.stop()
      process.exit(0)
    }
    const onSignal = () => {
      shutdown().catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed')
        process.exit(1)
      })
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
  })

await program.parseAsync()
