import * as k8s from '@kubernetes/client-node'
import type { IngressList } from './types.js'

/**
 * Kubernetes API operations used by the observer
 */
export class KubernetesClient {
  private readonly kubeConfig: k8s.KubeConfig
  private coreApi?: k8s.CoreV1Api
  private networkingApi?: k8s.NetworkingV1Api

  constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig
  }

  private getCoreApi(): k8s.CoreV1Api {
    if (!this.coreApi) {
      this.coreApi = this.kubeConfig.makeApiClient(k8s.CoreV1Api)
    }
    return this.coreApi
  }

  private getNetworkingApi(): k8s.NetworkingV1Api {
    if (!this.networkingApi) {
      this.networkingApi = this.kubeConfig.makeApiClient(k8s.NetworkingV1Api)
    }
    return this.networkingApi
  }

  /**
   * Read a Secret from a namespace. API errors are rethrown unchanged so
   * callers can tell a 404 from other failures.
   */
  async readSecret(name: string, namespace: string): Promise<k8s.V1Secret> {
    return this.getCoreApi().readNamespacedSecret({ name, namespace })
  }

  /**
   * List Ingresses across all namespaces
   */
  async listIngresses(limit?: number): Promise<IngressList> {
    const response = await this.getNetworkingApi().listIngressForAllNamespaces(
      { limit }
    )

    return {
      items: response.items,
      resourceVersion: response.metadata?.resourceVersion
    }
  }

  /**
   * Check if an error is a 404 Not Found error
   */
  isNotFoundError(error: unknown): boolean {
    return this.getStatusCode(error) === 404
  }

  /**
   * Check if an error is a 403 Forbidden error
   */
  isForbiddenError(error: unknown): boolean {
    return this.getStatusCode(error) === 403
  }

  private getStatusCode(error: unknown): number | null {
    if (!(error instanceof Error)) {
      return null
    }
    if ('code' in error && typeof error.code === 'number') {
      return error.code
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode
    }
    return null
  }
}
