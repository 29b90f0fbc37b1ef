export {
  type ShardHealth,
  type ShardPass,
  ShardRunner,
  type ShardRunnerOptions,
  nextPassDelay,
} from './shard-runner'
