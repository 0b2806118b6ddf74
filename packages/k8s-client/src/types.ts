import type * as k8s from '@kubernetes/client-node'

/**
 * Identity of a namespaced resource
 */
export interface ResourceIdentity {
  readonly namespace: string
  readonly name: string
}

/**
 * Result of a cluster-wide Ingress list
 */
export interface IngressList {
  items: k8s.V1Ingress[]
  resourceVersion?: string
}

/**
 * Callbacks invoked by the IngressWatcher
 */
export interface IngressEventHandlers {
  /** An Ingress was added or modified */
  onUpsert(identity: ResourceIdentity, ingress: k8s.V1Ingress): void
  onDelete(identity: ResourceIdentity): void
  /** A full list replaced the known set (initial sync or reconnect) */
  onResync(ingresses: Array<[ResourceIdentity, k8s.V1Ingress]>): void
}

/**
 * The part of k8s.Watch the watcher relies on
 */
export type WatchApi = Pick<k8s.Watch, 'watch'>

/**
 * The part of KubernetesClient the watcher relies on
 */
export interface IngressLister {
  listIngresses(): Promise<IngressList>
}
