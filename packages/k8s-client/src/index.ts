export { KubernetesClient } from './kubernetes-client.js'
export { verifyKubernetesAccess } from './kubernetes-access.js'
export {
  IngressWatcher,
  INGRESS_WATCH_PATH,
  identityOf
} from './ingress-watcher.js'
export type {
  ResourceIdentity,
  IngressList,
  IngressEventHandlers,
  WatchApi
} from './types.js'
