import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as core from '@actions/core'
import type * as k8s from '@kubernetes/client-node'
import { serializeReport } from '@ingress-observer/shared/report'
import {
  ReportBuilder,
  extractHosts,
  getTlsSecretName
} from '../src/report-builder.js'
import { SecretCertificateLookup } from '../src/certificate-lookup.js'
import { ResourceIndex } from '../src/resource-index.js'

vi.mock('@actions/core')

function ingress(
  hosts: Array<string | undefined>,
  tlsSecrets: string[] = []
): k8s.V1Ingress {
  return {
    spec: {
      rules: hosts.map((host) => ({ host })),
      tls: tlsSecrets.map((secretName) => ({ secretName }))
    }
  }
}

describe('extractHosts', () => {
  it('should return hosts in rule order, keeping duplicates', () => {
    expect(
      extractHosts(ingress(['a.example.com', 'b.example.com', 'a.example.com']))
    ).toEqual(['a.example.com', 'b.example.com', 'a.example.com'])
  })

  it('should skip rules without host', () => {
    expect(extractHosts(ingress([undefined, '', 'c.example.com']))).toEqual([
      'c.example.com'
    ])
  })

  it('should return an empty list without spec or rules', () => {
    expect(extractHosts({})).toEqual([])
    expect(extractHosts({ spec: {} })).toEqual([])
  })
})

describe('getTlsSecretName', () => {
  it('should return the first secret only', () => {
    expect(getTlsSecretName(ingress(['a'], ['first', 'second']))).toBe('first')
  })

  it('should return undefined without tls', () => {
    expect(getTlsSecretName(ingress(['a']))).toBeUndefined()
    expect(getTlsSecretName({})).toBeUndefined()
  })

  it('should return undefined when the first tls block has no secret', () => {
    expect(
      getTlsSecretName({ spec: { tls: [{ hosts: ['a'] }] } })
    ).toBeUndefined()
  })
})

describe('ReportBuilder', () => {
  let index: ResourceIndex
  let lookup: { lookup: ReturnType<typeof vi.fn> }
  let builder: ReportBuilder

  const certificate = { name: 'cert1', expires: '2026-04-01T00:00:00.000Z' }

  beforeEach(() => {
    vi.clearAllMocks()
    index = new ResourceIndex()
    lookup = { lookup: vi.fn().mockResolvedValue(undefined) }
    builder = new ReportBuilder('local-minikube', lookup)
  })

  it('should build an empty report from an empty index', async () => {
    const report = await builder.build(index.snapshotAll())

    expect(report).toEqual({ cluster: 'local-minikube', ingresses: [] })
  })

  it('should exclude resources without hosts', async () => {
    index.put({ namespace: 'ns1', name: 'no-hosts' }, ingress([], ['cert1']))
    index.put({ namespace: 'ns1', name: 'web' }, ingress(['web.example.com']))

    const first = await builder.build(index.snapshotAll())
    const second = await builder.build(index.snapshotAll())

    expect(first.ingresses).toEqual([
      { namespace: 'ns1', name: 'web', host: 'web.example.com' }
    ])
    expect(second).toEqual(first)
    expect(lookup.lookup).not.toHaveBeenCalledWith('ns1', 'cert1')
  })

  it('should emit one entry per host sharing one certificate', async () => {
    lookup.lookup.mockResolvedValue(certificate)
    index.put(
      { namespace: 'ns1', name: 'multi' },
      ingress(['a.example.com', 'b.example.com', 'c.example.com'], ['cert1'])
    )

    const report = await builder.build(index.snapshotAll())

    expect(report.ingresses).toHaveLength(3)
    expect(report.ingresses.map((entry) => entry.host)).toEqual([
      'a.example.com',
      'b.example.com',
      'c.example.com'
    ])
    for (const entry of report.ingresses) {
      expect(entry.certificate).toBe(report.ingresses[0].certificate)
      expect(entry.certificate).toEqual(certificate)
    }
    expect(lookup.lookup).toHaveBeenCalledTimes(1)
    expect(lookup.lookup).toHaveBeenCalledWith('ns1', 'cert1')
  })

  it('should omit the certificate field when the lookup finds nothing', async () => {
    index.put(
      { namespace: 'ns1', name: 'ing1' },
      ingress(['a.example.com'], ['cert1'])
    )

    const report = await builder.build(index.snapshotAll())

    expect(report.ingresses).toEqual([
      { namespace: 'ns1', name: 'ing1', host: 'a.example.com' }
    ])
    expect('certificate' in report.ingresses[0]).toBe(false)
  })

  it('should pass an undefined secret name for ingresses without tls', async () => {
    index.put({ namespace: 'ns1', name: 'plain' }, ingress(['a.example.com']))

    await builder.build(index.snapshotAll())

    expect(lookup.lookup).toHaveBeenCalledWith('ns1', undefined)
  })

  it('should keep index order while lookups finish out of order', async () => {
    lookup.lookup.mockImplementation(
      (_namespace: string, secretName: string) =>
        new Promise((resolve) =>
          setTimeout(
            () => resolve({ name: secretName, expires: certificate.expires }),
            secretName === 'slow' ? 20 : 1
          )
        )
    )
    index.put(
      { namespace: 'ns', name: 'first' },
      ingress(['first.example.com'], ['slow'])
    )
    index.put(
      { namespace: 'ns', name: 'second' },
      ingress(['second.example.com'], ['fast'])
    )

    const report = await builder.build(index.snapshotAll())

    expect(report.ingresses.map((entry) => entry.name)).toEqual([
      'first',
      'second'
    ])
  })

  it('should skip a malformed resource and keep the others', async () => {
    const malformed = { spec: { rules: {} } } as unknown as k8s.V1Ingress
    index.put({ namespace: 'ns1', name: 'broken' }, malformed)
    index.put({ namespace: 'ns1', name: 'web' }, ingress(['web.example.com']))

    const report = await builder.build(index.snapshotAll())

    expect(report.ingresses).toEqual([
      { namespace: 'ns1', name: 'web', host: 'web.example.com' }
    ])
    expect(core.error).toHaveBeenCalledWith(
      expect.stringContaining('Error processing Ingress ns1/broken:')
    )
  })

  it('should skip a resource whose lookup throws', async () => {
    lookup.lookup
      .mockRejectedValueOnce(new Error('unexpected'))
      .mockResolvedValueOnce(undefined)
    index.put(
      { namespace: 'ns1', name: 'bad' },
      ingress(['bad.example.com'], ['x'])
    )
    index.put(
      { namespace: 'ns1', name: 'good' },
      ingress(['good.example.com'])
    )

    const report = await builder.build(index.snapshotAll())

    expect(report.ingresses).toEqual([
      { namespace: 'ns1', name: 'good', host: 'good.example.com' }
    ])
    expect(core.error).toHaveBeenCalledWith(
      'Error processing Ingress ns1/bad: unexpected'
    )
  })

  it('should limit the number of lookups in flight', async () => {
    let inFlight = 0
    let maxInFlight = 0
    lookup.lookup.mockImplementation(async () => {
      inFlight++
      maxInFlight = Math.max(maxInFlight, inFlight)
      await new Promise((resolve) => setTimeout(resolve, 1))
      inFlight--
      return undefined
    })
    for (let i = 1; i <= 5; i++) {
      index.put(
        { namespace: 'ns1', name: `ing${i}` },
        ingress([`host${i}.example.com`], [`cert${i}`])
      )
    }

    const limited = new ReportBuilder('local-minikube', lookup, 2)
    const report = await limited.build(index.snapshotAll())

    expect(lookup.lookup).toHaveBeenCalledTimes(5)
    expect(maxInFlight).toBe(2)
    expect(report.ingresses.map((entry) => entry.name)).toEqual([
      'ing1',
      'ing2',
      'ing3',
      'ing4',
      'ing5'
    ])
  })

  it('should build from a snapshot even if the index changes meanwhile', async () => {
    index.put({ namespace: 'ns1', name: 'web' }, ingress(['web.example.com']))
    const snapshot = index.snapshotAll()

    const pending = builder.build(snapshot)
    index.remove({ namespace: 'ns1', name: 'web' })
    index.put({ namespace: 'ns1', name: 'late' }, ingress(['late.example.com']))

    expect((await pending).ingresses).toEqual([
      { namespace: 'ns1', name: 'web', host: 'web.example.com' }
    ])
  })
})

describe('report scenarios', () => {
  const now = new Date('2026-01-01T00:00:00.000Z')
  let readSecret: ReturnType<typeof vi.fn>
  let builder: ReportBuilder
  let index: ResourceIndex

  beforeEach(() => {
    vi.clearAllMocks()
    readSecret = vi.fn()
    builder = new ReportBuilder(
      'local-minikube',
      new SecretCertificateLookup(
        {
          readSecret,
          isNotFoundError: (error: unknown) =>
            error instanceof Error && 'code' in error && error.code === 404
        },
        { timeoutMs: 1000, now: () => now }
      )
    )
    index = new ResourceIndex()
    index.put(
      { namespace: 'ns1', name: 'ing1' },
      ingress(['a.example.com'], ['cert1'])
    )
  })

  it('should report the certificate of an existing TLS secret', async () => {
    readSecret.mockResolvedValue({ data: { 'tls.crt': 'Y2VydA==' } })

    const report = await builder.build(index.snapshotAll())

    expect(serializeReport(report)).toBe(
      '{"cluster":"local-minikube","ingresses":[{"namespace":"ns1","name":"ing1","host":"a.example.com","certificate":{"name":"cert1","expires":"2026-04-01T00:00:00.000Z"}}]}'
    )
  })

  it('should report the ingress without certificate when the secret is missing', async () => {
    readSecret.mockRejectedValue(
      Object.assign(new Error('Not Found'), { code: 404 })
    )

    const report = await builder.build(index.snapshotAll())

    expect(serializeReport(report)).toBe(
      '{"cluster":"local-minikube","ingresses":[{"namespace":"ns1","name":"ing1","host":"a.example.com"}]}'
    )
  })
})
