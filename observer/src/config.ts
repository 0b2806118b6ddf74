import {
  DEFAULT_CLUSTER_NAME,
  DEFAULT_DELIVERY_TIMEOUT,
  DEFAULT_LOOKUP_TIMEOUT,
  DEFAULT_REPORT_ENDPOINT,
  DEFAULT_REPORT_INTERVAL
} from '@ingress-observer/shared/constants'
import {
  readEnv,
  readOptionalEnv,
  type Env
} from '@ingress-observer/shared/env-utils'
import {
  parseDuration,
  parseIntervalSeconds
} from '@ingress-observer/shared/time-utils'

export interface ObserverConfig {
  clusterName: string
  reportEndpoint: string
  reportIntervalMs: number
  deliveryTimeoutMs: number
  lookupTimeoutMs: number
  kubernetesContext?: string
}

function parseEndpoint(value: string): string {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new Error(
      `Invalid REPORT_ENDPOINT: ${value}. Expected an http(s) URL`
    )
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(
      `Invalid REPORT_ENDPOINT: ${value}. Expected an http(s) URL`
    )
  }
  return value
}

function parsePositiveDuration(
  name: string,
  value: string,
  parser: (input: string) => number
): number {
  const ms = parser(value)
  if (ms <= 0) {
    throw new Error(`Invalid ${name}: ${value}. Must be greater than zero`)
  }
  return ms
}

export function loadObserverConfig(env: Env = process.env): ObserverConfig {
  return {
    clusterName: readEnv(env, 'CLUSTER_NAME', DEFAULT_CLUSTER_NAME),
    reportEndpoint: parseEndpoint(
      readEnv(env, 'REPORT_ENDPOINT', DEFAULT_REPORT_ENDPOINT)
    ),
    reportIntervalMs: parsePositiveDuration(
      'REPORT_INTERVAL',
      readEnv(env, 'REPORT_INTERVAL', DEFAULT_REPORT_INTERVAL),
      parseIntervalSeconds
    ),
    deliveryTimeoutMs: parsePositiveDuration(
      'DELIVERY_TIMEOUT',
      readEnv(env, 'DELIVERY_TIMEOUT', DEFAULT_DELIVERY_TIMEOUT),
      parseDuration
    ),
    lookupTimeoutMs: parsePositiveDuration(
      'LOOKUP_TIMEOUT',
      readEnv(env, 'LOOKUP_TIMEOUT', DEFAULT_LOOKUP_TIMEOUT),
      parseDuration
    ),
    kubernetesContext: readOptionalEnv(env, 'KUBERNETES_CONTEXT')
  }
}
