import * as core from '@actions/core'
import type * as k8s from '@kubernetes/client-node'
import { KubernetesClient } from './kubernetes-client.js'

/**
 * Load the default kubeconfig (in-cluster service account when running in
 * a pod, ~/.kube/config otherwise), optionally switch context, and check
 * that Ingresses can be listed cluster-wide.
 */
export async function verifyKubernetesAccess(
  kubeConfig: k8s.KubeConfig,
  kubernetesContext?: string
): Promise<KubernetesClient> {
  core.startGroup('Verifying Kubernetes connectivity')

  kubeConfig.loadFromDefault()

  if (kubernetesContext) {
    const contexts = kubeConfig.getContexts()
    const contextExists = contexts.some(
      (ctx) => ctx.name === kubernetesContext
    )

    if (!contextExists) {
      core.error(
        `Cannot find context '${kubernetesContext}' in kubeconfig. Available contexts:`
      )
      contexts.forEach((ctx) => core.info(`  - ${ctx.name}`))
      core.endGroup()
      throw new Error(`Context '${kubernetesContext}' does not exist`)
    }

    kubeConfig.setCurrentContext(kubernetesContext)
    core.info(`Using context: ${kubernetesContext}`)
  }

  const client = new KubernetesClient(kubeConfig)

  try {
    await client.listIngresses(1)
    core.info('✅ Can list Ingress resources in all namespaces')
  } catch (error: unknown) {
    core.endGroup()
    if (client.isForbiddenError(error)) {
      throw new Error(
        'Insufficient permissions to list Ingress resources in all namespaces'
      )
    }
    throw new Error(
      `Cannot connect to the cluster: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  core.info('✅ Successfully connected to cluster')
  core.endGroup()

  return client
}
