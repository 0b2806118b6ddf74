import * as core from '@actions/core'
import type { IngressEventHandlers } from '@ingress-observer/k8s-client'
import type { ResourceIndex } from './resource-index.js'
import { logWatchEvent } from './watch-event-log.js'

/**
 * Watch handlers that keep `index` in step with the cluster
 */
export function createIndexHandlers(
  index: ResourceIndex
): IngressEventHandlers {
  return {
    onUpsert(identity, ingress) {
      logWatchEvent(index.put(identity, ingress), identity)
    },

    onDelete(identity) {
      if (index.remove(identity)) {
        logWatchEvent('deleted', identity)
      } else {
        core.debug(
          `Ingress ${identity.namespace}/${identity.name} was not indexed`
        )
      }
    },

    onResync(ingresses) {
      const { created, updated, deleted } = index.replaceAll(ingresses)
      created.forEach((identity) => logWatchEvent('created', identity))
      updated.forEach((identity) => logWatchEvent('updated', identity))
      deleted.forEach((identity) => logWatchEvent('deleted', identity))
    }
  }
}
