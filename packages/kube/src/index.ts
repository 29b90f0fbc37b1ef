export {
  type CoreApi,
  type KindOperations,
  KubeClusterStore,
  type KubeClusterStoreConfig,
  KubeObjectClient,
  statusCodeOf,
} from './kube-store'
export { HttpTopologyClient, type HttpTopologyClientConfig } from './http-topology'
