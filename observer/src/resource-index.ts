import type * as k8s from '@kubernetes/client-node'
import type { ResourceIdentity } from '@ingress-observer/k8s-client'

export type ResourceSnapshot = k8s.V1Ingress

export interface IndexEntry {
  readonly identity: ResourceIdentity
  readonly snapshot: ResourceSnapshot
}

export interface ResyncResult {
  created: ResourceIdentity[]
  updated: ResourceIdentity[]
  deleted: ResourceIdentity[]
}

export function identityKey(identity: ResourceIdentity): string {
  return `${identity.namespace}/${identity.name}`
}

/**
 * Latest known body of every watched Ingress, keyed by namespace/name.
 *
 * Entries are replaced wholesale and never mutated in place, so the copy
 * returned by snapshotAll() stays consistent while watch callbacks keep
 * writing to the live map.
 */
export class ResourceIndex {
  private entries = new Map<string, IndexEntry>()

  get size(): number {
    return this.entries.size
  }

  get(identity: ResourceIdentity): ResourceSnapshot | undefined {
    return this.entries.get(identityKey(identity))?.snapshot
  }

  put(
    identity: ResourceIdentity,
    snapshot: ResourceSnapshot
  ): 'created' | 'updated' {
    const key = identityKey(identity)
    const existed = this.entries.has(key)
    this.entries.set(key, {
      identity: { namespace: identity.namespace, name: identity.name },
      snapshot
    })
    return existed ? 'updated' : 'created'
  }

  remove(identity: ResourceIdentity): boolean {
    return this.entries.delete(identityKey(identity))
  }

  /**
   * Point-in-time copy of all entries
   */
  snapshotAll(): ReadonlyMap<string, IndexEntry> {
    return new Map(this.entries)
  }

  /**
   * Swap the whole content for a freshly listed set of resources
   */
  replaceAll(
    resources: Iterable<[ResourceIdentity, ResourceSnapshot]>
  ): ResyncResult {
    const previous = this.entries
    const next = new Map<string, IndexEntry>()
    const result: ResyncResult = { created: [], updated: [], deleted: [] }

    for (const [identity, snapshot] of resources) {
      const key = identityKey(identity)
      const entry: IndexEntry = {
        identity: { namespace: identity.namespace, name: identity.name },
        snapshot
      }
      const old = previous.get(key)

      if (!old) {
        result.created.push(entry.identity)
      } else if (
        old.snapshot.metadata?.resourceVersion !==
          snapshot.metadata?.resourceVersion ||
        snapshot.metadata?.resourceVersion === undefined
      ) {
        result.updated.push(entry.identity)
      }
      next.set(key, entry)
    }

    for (const [key, entry] of previous) {
      if (!next.has(key)) {
        result.deleted.push(entry.identity)
      }
    }

    this.entries = next
    return result
  }
}
