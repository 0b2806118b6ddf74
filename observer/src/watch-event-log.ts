import * as core from '@actions/core'
import type { ResourceIdentity } from '@ingress-observer/k8s-client'

export type WatchEventKind = 'created' | 'updated' | 'deleted'

export function logWatchEvent(
  kind: WatchEventKind,
  identity: ResourceIdentity
): void {
  core.info(`Ingress ${kind}: ${identity.namespace}/${identity.name}`)
}
