import * as core from '@actions/core'
import type * as k8s from '@kubernetes/client-node'
import type { KubernetesClient } from '@ingress-observer/k8s-client'
import type { CertificateDescriptor } from '@ingress-observer/shared/report'
import {
  PLACEHOLDER_CERTIFICATE_VALIDITY_DAYS,
  TLS_SECRET_KEYS
} from '@ingress-observer/shared/constants'
import { withTimeout } from '@ingress-observer/shared/time-utils'

const DAY_MS = 24 * 60 * 60 * 1000

export interface CertificateLookup {
  lookup(
    namespace: string,
    secretName: string | undefined
  ): Promise<CertificateDescriptor | undefined>
}

/**
 * Derives a certificate expiry from a TLS secret
 */
export interface CertificateExpiryEstimator {
  estimateExpiry(secret: k8s.V1Secret, now: Date): Date
}

/**
 * Does not parse the certificate: every TLS secret is assumed to be valid
 * for 90 days from the time it was read. Swap in a parsing estimator to
 * report real expiry dates.
 */
export class PlaceholderExpiryEstimator implements CertificateExpiryEstimator {
  estimateExpiry(_secret: k8s.V1Secret, now: Date): Date {
    return new Date(
      now.getTime() + PLACEHOLDER_CERTIFICATE_VALIDITY_DAYS * DAY_MS
    )
  }
}

export type SecretReader = Pick<
  KubernetesClient,
  'readSecret' | 'isNotFoundError'
>

export interface SecretCertificateLookupOptions {
  timeoutMs: number
  estimator?: CertificateExpiryEstimator
  now?: () => Date
}

export function hasTlsData(secret: k8s.V1Secret): boolean {
  const data = secret.data
  if (!data) {
    return false
  }
  return TLS_SECRET_KEYS.some((key) => key in data)
}

/**
 * Best-effort lookup of the TLS secret referenced by an Ingress. Every
 * failure resolves to undefined so one bad secret cannot break a report.
 */
export class SecretCertificateLookup implements CertificateLookup {
  private readonly secrets: SecretReader
  private readonly timeoutMs: number
  private readonly estimator: CertificateExpiryEstimator
  private readonly now: () => Date

  constructor(secrets: SecretReader, options: SecretCertificateLookupOptions) {
    this.secrets = secrets
    this.timeoutMs = options.timeoutMs
    this.estimator = options.estimator ?? new PlaceholderExpiryEstimator()
    this.now = options.now ?? (() => new Date())
  }

  async lookup(
    namespace: string,
    secretName: string | undefined
  ): Promise<CertificateDescriptor | undefined> {
    if (!secretName) {
      return undefined
    }

    let secret: k8s.V1Secret
    try {
      secret = await withTimeout(
        this.secrets.readSecret(secretName, namespace),
        this.timeoutMs,
        `Reading secret ${namespace}/${secretName}`
      )
    } catch (error: unknown) {
      if (this.secrets.isNotFoundError(error)) {
        core.debug(`Secret ${namespace}/${secretName} not found`)
      } else {
        core.warning(
          `Error reading secret ${namespace}/${secretName}: ${error instanceof Error ? error.message : String(error)}`
        )
      }
      return undefined
    }

    if (!hasTlsData(secret)) {
      core.debug(`Secret ${namespace}/${secretName} has no certificate data`)
      return undefined
    }

    return {
      name: secretName,
      expires: this.estimator.estimateExpiry(secret, this.now()).toISOString()
    }
  }
}
