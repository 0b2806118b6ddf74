/**
 * Defaults shared by the observer and the receiver
 */
export const DEFAULT_CLUSTER_NAME = 'local-minikube'
export const DEFAULT_REPORT_ENDPOINT = 'http://localhost:8080/report'
export const DEFAULT_REPORT_INTERVAL = '45'
export const DEFAULT_DELIVERY_TIMEOUT = '10s'
export const DEFAULT_LOOKUP_TIMEOUT = '10s'
export const DEFAULT_LOOKUP_CONCURRENCY = 5
export const DEFAULT_MAX_REPORTS = 100
export const DEFAULT_RECEIVER_PORT = 8080

/**
 * Placeholder validity assumed for every TLS secret found
 */
export const PLACEHOLDER_CERTIFICATE_VALIDITY_DAYS = 90

/**
 * Secret data keys that mark a secret as TLS-bearing
 */
export const TLS_SECRET_KEYS = ['tls.crt', 'ca.crt'] as const
