import * as core from '@actions/core'
import pLimit from 'p-limit'
import { DEFAULT_LOOKUP_CONCURRENCY } from '@ingress-observer/shared/constants'
import type { Report, ReportEntry } from '@ingress-observer/shared/report'
import type { CertificateLookup } from './certificate-lookup.js'
import type { IndexEntry, ResourceSnapshot } from './resource-index.js'

/**
 * Non-empty hosts of spec.rules, in order, duplicates kept
 */
export function extractHosts(snapshot: ResourceSnapshot): string[] {
  const hosts: string[] = []
  const rules = snapshot.spec?.rules ?? []

  for (const rule of rules) {
    if (rule.host) {
      hosts.push(rule.host)
    }
  }

  return hosts
}

/**
 * Secret name of the first spec.tls block, if any
 */
export function getTlsSecretName(
  snapshot: ResourceSnapshot
): string | undefined {
  const tls = snapshot.spec?.tls
  if (tls && tls.length > 0) {
    return tls[0].secretName || undefined
  }
  return undefined
}

/**
 * Turns an index snapshot into the report sent to the receiver
 */
export class ReportBuilder {
  private readonly clusterName: string
  private readonly certificates: CertificateLookup
  private readonly concurrency: number

  constructor(
    clusterName: string,
    certificates: CertificateLookup,
    concurrency: number = DEFAULT_LOOKUP_CONCURRENCY
  ) {
    this.clusterName = clusterName
    this.certificates = certificates
    this.concurrency = Math.max(1, concurrency)
  }

  async build(snapshot: ReadonlyMap<string, IndexEntry>): Promise<Report> {
    if (snapshot.size === 0) {
      core.debug('Ingress index is empty')
    }

    // At most `concurrency` lookups in flight; Promise.all keeps index order
    const limit = pLimit(this.concurrency)
    const perResource = await Promise.all(
      Array.from(snapshot.values(), (entry) =>
        limit(() => this.buildEntries(entry))
      )
    )

    return {
      cluster: this.clusterName,
      ingresses: perResource.flat()
    }
  }

  private async buildEntries(entry: IndexEntry): Promise<ReportEntry[]> {
    const { namespace, name } = entry.identity

    try {
      const hosts = extractHosts(entry.snapshot)
      if (hosts.length === 0) {
        core.debug(`Skipping ${namespace}/${name}: no hosts`)
        return []
      }

      const certificate = await this.certificates.lookup(
        namespace,
        getTlsSecretName(entry.snapshot)
      )

      return hosts.map((host) =>
        certificate
          ? { namespace, name, host, certificate }
          : { namespace, name, host }
      )
    } catch (error) {
      core.error(
        `Error processing Ingress ${namespace}/${name}: ${error instanceof Error ? error.message : String(error)}`
      )
      return []
    }
  }
}
