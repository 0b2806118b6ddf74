import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import {
  IngressWatcher,
  verifyKubernetesAccess
} from '@ingress-observer/k8s-client'
import { SecretCertificateLookup } from './certificate-lookup.js'
import { loadObserverConfig } from './config.js'
import { createIndexHandlers } from './ingress-sync.js'
import { ReportBuilder } from './report-builder.js'
import { ReportDelivery } from './report-delivery.js'
import { Reporter } from './reporter.js'
import { ResourceIndex } from './resource-index.js'

export async function run(): Promise<void> {
  const controller = new AbortController()
  let watcher: IngressWatcher | undefined

  try {
    const config = loadObserverConfig()

    core.info('Ingress observer starting')
    core.info(`Cluster: ${config.clusterName}`)
    core.info(`Report endpoint: ${config.reportEndpoint}`)
    core.info(`Report interval: ${config.reportIntervalMs / 1000} seconds`)

    const kubeConfig = new k8s.KubeConfig()
    const client = await verifyKubernetesAccess(
      kubeConfig,
      config.kubernetesContext
    )

    // Single owner of the index; watcher and reporter get it from here
    const index = new ResourceIndex()
    watcher = new IngressWatcher(kubeConfig, client, createIndexHandlers(index))

    const reporter = new Reporter({
      index,
      builder: new ReportBuilder(
        config.clusterName,
        new SecretCertificateLookup(client, {
          timeoutMs: config.lookupTimeoutMs
        })
      ),
      sender: new ReportDelivery(
        config.reportEndpoint,
        config.deliveryTimeoutMs
      ),
      intervalMs: config.reportIntervalMs
    })

    const shutdown = (signal: NodeJS.Signals) => {
      core.info(`Received ${signal}, shutting down`)
      controller.abort()
    }
    process.once('SIGTERM', shutdown)
    process.once('SIGINT', shutdown)
    process.on('SIGHUP', () => {
      void reporter.trigger('signal').catch((error: unknown) => {
        core.error(
          `Report cycle failed: ${error instanceof Error ? error.message : String(error)}`
        )
      })
    })

    await watcher.start()
    await reporter.run(controller.signal)
    await reporter.drain()

    core.info('✅ Ingress observer stopped')
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred'
    core.setFailed(errorMessage)
  } finally {
    watcher?.stop()
  }
}
