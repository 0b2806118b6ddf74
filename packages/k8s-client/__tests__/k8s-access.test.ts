import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { verifyKubernetesAccess } from '../src/kubernetes-access.js'
import { KubernetesClient } from '../src/kubernetes-client.js'

vi.mock('@actions/core')

interface MockNetworkingApi {
  listIngressForAllNamespaces: ReturnType<typeof vi.fn>
}

describe('verifyKubernetesAccess', () => {
  let mockKubeConfig: k8s.KubeConfig
  let mockNetworkingApi: MockNetworkingApi
  let getContexts: ReturnType<typeof vi.fn>
  let setCurrentContext: ReturnType<typeof vi.fn>

  const mockContexts = [{ name: 'minikube' }, { name: 'staging' }]

  const forbiddenError = Object.assign(new Error('Forbidden'), {
    code: 403
  })
  const serverError = Object.assign(new Error('Internal Server Error'), {
    code: 500
  })

  beforeEach(() => {
    vi.clearAllMocks()

    mockNetworkingApi = {
      listIngressForAllNamespaces: vi.fn().mockResolvedValue({ items: [] })
    }
    getContexts = vi.fn().mockReturnValue(mockContexts)
    setCurrentContext = vi.fn()

    mockKubeConfig = {
      loadFromDefault: vi.fn(),
      getContexts,
      setCurrentContext,
      makeApiClient: vi.fn((apiType: unknown) => {
        if (apiType === k8s.NetworkingV1Api) return mockNetworkingApi
        return null
      })
    } as unknown as k8s.KubeConfig
  })

  it('should verify access with the current context', async () => {
    const client = await verifyKubernetesAccess(mockKubeConfig)

    expect(client).toBeInstanceOf(KubernetesClient)
    expect(mockKubeConfig.loadFromDefault).toHaveBeenCalledOnce()
    expect(getContexts).not.toHaveBeenCalled()
    expect(mockNetworkingApi.listIngressForAllNamespaces).toHaveBeenCalledWith(
      { limit: 1 }
    )
    expect(core.info).toHaveBeenCalledWith(
      '✅ Can list Ingress resources in all namespaces'
    )
    expect(core.endGroup).toHaveBeenCalledOnce()
  })

  it('should switch to the requested context', async () => {
    await verifyKubernetesAccess(mockKubeConfig, 'staging')

    expect(setCurrentContext).toHaveBeenCalledWith('staging')
    expect(core.info).toHaveBeenCalledWith('Using context: staging')
  })

  it('should list available contexts when the context does not exist', async () => {
    await expect(
      verifyKubernetesAccess(mockKubeConfig, 'production')
    ).rejects.toThrow("Context 'production' does not exist")

    expect(core.error).toHaveBeenCalledWith(
      "Cannot find context 'production' in kubeconfig. Available contexts:"
    )
    expect(core.info).toHaveBeenCalledWith('  - minikube')
    expect(core.info).toHaveBeenCalledWith('  - staging')
    expect(setCurrentContext).not.toHaveBeenCalled()
  })

  it('should report missing permissions', async () => {
    mockNetworkingApi.listIngressForAllNamespaces.mockRejectedValue(
      forbiddenError
    )

    await expect(verifyKubernetesAccess(mockKubeConfig)).rejects.toThrow(
      'Insufficient permissions to list Ingress resources in all namespaces'
    )
  })

  it('should wrap other connection errors', async () => {
    mockNetworkingApi.listIngressForAllNamespaces.mockRejectedValue(
      serverError
    )

    await expect(verifyKubernetesAccess(mockKubeConfig)).rejects.toThrow(
      'Cannot connect to the cluster: Internal Server Error'
    )
  })
})
