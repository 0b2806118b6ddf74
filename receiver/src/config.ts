import {
  DEFAULT_MAX_REPORTS,
  DEFAULT_RECEIVER_PORT
} from '@ingress-observer/shared/constants'
import {
  parseIntegerEnv,
  readEnv,
  type Env
} from '@ingress-observer/shared/env-utils'

export interface ReceiverConfig {
  maxReports: number
  port: number
}

export function loadReceiverConfig(env: Env = process.env): ReceiverConfig {
  const port = parseIntegerEnv(
    'PORT',
    readEnv(env, 'PORT', String(DEFAULT_RECEIVER_PORT)),
    0
  )
  if (port > 65535) {
    throw new Error(`Invalid PORT: ${port}. Expected a port number <= 65535`)
  }

  return {
    maxReports: parseIntegerEnv(
      'MAX_REPORTS',
      readEnv(env, 'MAX_REPORTS', String(DEFAULT_MAX_REPORTS)),
      1
    ),
    port
  }
}
