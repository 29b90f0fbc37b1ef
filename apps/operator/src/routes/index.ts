/**
 * Route Controllers
 */

export { healthController, type HealthControllerDeps } from './health'
export { metricsController } from './metrics'
