import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import type {
  IngressEventHandlers,
  IngressLister,
  ResourceIdentity,
  WatchApi
} from './types.js'

// Watch retry configuration
const INITIAL_RETRY_DELAY_MS = 1000
const MAX_RETRY_DELAY_MS = 30000

export const INGRESS_WATCH_PATH = '/apis/networking.k8s.io/v1/ingresses'

export interface IngressWatcherOptions {
  /** Watch implementation, defaults to k8s.Watch on the given KubeConfig */
  watch?: WatchApi
  initialRetryDelayMs?: number
  maxRetryDelayMs?: number
}

function isIngress(value: unknown): value is k8s.V1Ingress {
  return typeof value === 'object' && value !== null && 'metadata' in value
}

function describeStatus(value: unknown): string {
  if (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  ) {
    return value.message
  }
  return 'unknown error'
}

export function identityOf(
  ingress: k8s.V1Ingress
): ResourceIdentity | undefined {
  const namespace = ingress.metadata?.namespace
  const name = ingress.metadata?.name
  if (!namespace || !name) {
    return undefined
  }
  return { namespace, name }
}

/**
 * Keeps a cluster-wide view of Ingresses: lists them once, then follows the
 * watch stream. A dropped connection is re-established with exponential
 * backoff; after an error the watcher relists so deletions missed while
 * disconnected are not kept.
 */
export class IngressWatcher {
  private readonly watchApi: WatchApi
  private readonly lister: IngressLister
  private readonly handlers: IngressEventHandlers
  private readonly initialRetryDelayMs: number
  private readonly maxRetryDelayMs: number

  private request?: AbortController
  private retryHandle?: NodeJS.Timeout
  private resourceVersion?: string
  private retryCount = 0
  private stopped = false

  constructor(
    kubeConfig: k8s.KubeConfig,
    lister: IngressLister,
    handlers: IngressEventHandlers,
    options: IngressWatcherOptions = {}
  ) {
    this.watchApi = options.watch ?? new k8s.Watch(kubeConfig)
    this.lister = lister
    this.handlers = handlers
    this.initialRetryDelayMs =
      options.initialRetryDelayMs ?? INITIAL_RETRY_DELAY_MS
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? MAX_RETRY_DELAY_MS
  }

  /**
   * Perform the initial list and open the watch. Errors are thrown to the
   * caller; later connection failures are retried in the background.
   */
  async start(): Promise<void> {
    this.stopped = false
    await this.sync()
  }

  /**
   * Close the watch and cancel any pending reconnect
   */
  stop(): void {
    this.stopped = true
    if (this.retryHandle) {
      clearTimeout(this.retryHandle)
      this.retryHandle = undefined
    }
    if (this.request) {
      this.request.abort()
      this.request = undefined
    }
  }

  get retries(): number {
    return this.retryCount
  }

  private async sync(): Promise<void> {
    const list = await this.lister.listIngresses()
    const entries: Array<[ResourceIdentity, k8s.V1Ingress]> = []

    for (const ingress of list.items) {
      const identity = identityOf(ingress)
      if (identity) {
        entries.push([identity, ingress])
      }
    }

    this.handlers.onResync(entries)
    this.resourceVersion = list.resourceVersion
    core.info(`Synced ${entries.length} ingress(es) from the cluster`)

    await this.openWatch()
  }

  private async openWatch(): Promise<void> {
    const request = await this.watchApi.watch(
      INGRESS_WATCH_PATH,
      {
        allowWatchBookmarks: true,
        resourceVersion: this.resourceVersion
      },
      (type: string, apiObj: unknown) => this.handleEvent(type, apiObj),
      (err: unknown) => this.handleDone(err)
    )

    if (this.stopped) {
      request.abort()
      return
    }
    this.request = request
  }

  private handleEvent(type: string, apiObj: unknown): void {
    if (type === 'ERROR') {
      // Typically 410 Gone: the stored resourceVersion is too old to resume
      this.resourceVersion = undefined
      core.warning(`Ingress watch error event: ${describeStatus(apiObj)}`)
      return
    }

    if (!isIngress(apiObj)) {
      core.debug(`Ignoring ${type} watch event without metadata`)
      return
    }

    this.retryCount = 0
    if (apiObj.metadata?.resourceVersion) {
      this.resourceVersion = apiObj.metadata.resourceVersion
    }

    if (type === 'BOOKMARK') {
      return
    }

    const identity = identityOf(apiObj)
    if (!identity) {
      core.warning(`Ignoring ${type} event for an Ingress without name`)
      return
    }

    switch (type) {
      case 'ADDED':
      case 'MODIFIED':
        this.handlers.onUpsert(identity, apiObj)
        break
      case 'DELETED':
        this.handlers.onDelete(identity)
        break
      default:
        core.debug(`Ignoring unknown watch event type ${type}`)
    }
  }

  private handleDone(err: unknown): void {
    this.request = undefined
    if (this.stopped) {
      return
    }

    if (err) {
      // Resume is unsafe after an error: relist on the next attempt
      this.resourceVersion = undefined
      this.retryCount++
      const retryDelay = this.retryDelay()
      core.info(
        `Ingress watch connection closed (${err instanceof Error ? err.message : String(err)}), retrying in ${retryDelay}ms (attempt ${this.retryCount})...`
      )
      this.scheduleReconnect(retryDelay)
      return
    }

    core.debug('Ingress watch ended, reconnecting')
    this.scheduleReconnect(0)
  }

  private retryDelay(): number {
    return Math.min(
      this.initialRetryDelayMs * Math.pow(2, this.retryCount - 1),
      this.maxRetryDelayMs
    )
  }

  private scheduleReconnect(delayMs: number): void {
    this.retryHandle = setTimeout(() => {
      this.retryHandle = undefined
      void this.reconnect()
    }, delayMs)
  }

  private async reconnect(): Promise<void> {
    if (this.stopped) {
      return
    }

    try {
      if (this.resourceVersion) {
        await this.openWatch()
      } else {
        await this.sync()
      }
    } catch (error) {
      this.resourceVersion = undefined
      this.retryCount++
      const retryDelay = this.retryDelay()
      core.warning(
        `Failed to restart ingress watch (${error instanceof Error ? error.message : String(error)}), retrying in ${retryDelay}ms (attempt ${this.retryCount})...`
      )
      this.scheduleReconnect(retryDelay)
    }
  }
}
